import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(4001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  FRONTEND_URL: z.string().url().optional(),

  // Observability
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SENTRY_DSN: z.string().url().optional(),

  // Infrastructure
  ENABLE_RATE_LIMIT: z.string().optional().default('true'),
  RATE_LIMIT_MAX: z.coerce.number().optional().default(100),

  // Packing-slip ingestion limits
  // Requests carry already-extracted page text, never file bytes.
  MAX_DOCUMENTS_PER_REQUEST: z.coerce.number().int().positive().optional().default(50),
  BODY_LIMIT_MB: z.coerce.number().positive().optional().default(10),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = parsed.data;
