// Vitest bootstraps before app/config imports.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

// Avoid rate limiting interfering with automated tests.
if (!process.env.ENABLE_RATE_LIMIT) {
  process.env.ENABLE_RATE_LIMIT = 'false';
}
