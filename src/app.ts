import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import compress from '@fastify/compress';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import packingSlipRoutes from './routes/packingSlipRoutes';
import { config } from './config/env';

export function buildApp(): FastifyInstance {
  const app = Fastify({
    // Trust X-Forwarded-For so rate limiting keys on the client behind a proxy.
    trustProxy: true,
    bodyLimit: config.BODY_LIMIT_MB * 1024 * 1024,
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  // Rate Limiting (in-memory store; one instance per process)
  if (config.ENABLE_RATE_LIMIT === 'true') {
    app.register(rateLimit, {
      max: config.RATE_LIMIT_MAX,
      timeWindow: '1 minute',
    });
  }

  // Compression
  app.register(compress, { global: true });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register CORS
  if (config.NODE_ENV !== 'production') {
    app.register(cors, {
      origin: ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  } else {
    app.register(cors, {
      origin: config.FRONTEND_URL ? [config.FRONTEND_URL] : false,
    });
  }

  // Register Routes
  app.register(packingSlipRoutes, { prefix: '/packing-slips' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error.validation) {
      request.log.warn({ validation: error.validation }, 'Request validation failed');
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.validation,
        },
      });
    }

    const statusCode = error.statusCode || 500;
    const code = error.code || 'INTERNAL_ERROR';
    const message = error.message || 'Something went wrong';

    if (statusCode >= 500) {
      request.log.error(error);

      Sentry.withScope((scope) => {
        scope.setContext('request', {
          method: request.method,
          url: request.url,
        });
        scope.setTag('error_code', code);
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.info({ code, statusCode }, message);
    }

    return reply.status(statusCode).send({
      error: {
        code,
        message,
      },
    });
  });

  return app;
}
