import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import helmet from '@fastify/helmet';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import invoiceRoutes from './routes/invoiceRoutes';
import labelRoutes from './routes/labelRoutes';
import { config } from './config/env';

const MB = 1024 * 1024;

type ErrorWithCode = Error & { code?: string; statusCode?: number };

export function buildApp(): FastifyInstance {
  const app = Fastify({
    // Whole invoices travel as JSON rows between stages
    bodyLimit: config.BODY_LIMIT_MB * MB,
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
    },
  });

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  // Single CSV/TXT upload per request
  app.register(multipart, {
    limits: {
      fileSize: config.MAX_UPLOAD_MB * MB,
      files: 1,
    },
  });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  if (config.NODE_ENV !== 'production') {
    app.register(cors, {
      origin: ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      exposedHeaders: ['Content-Disposition'],
    });
  } else {
    app.register(cors, {
      origin: config.FRONTEND_URL ? [config.FRONTEND_URL] : false,
      exposedHeaders: ['Content-Disposition'],
    });
  }

  app.register(invoiceRoutes, { prefix: '/invoices' });
  app.register(labelRoutes, { prefix: '/labels' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  app.setErrorHandler((error: ErrorWithCode & { validation?: unknown }, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      request.log.warn({ msg: 'Request validation failed', url: request.url, error: error.message });
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.validation ?? error.message,
        },
      });
    }

    if (statusCode >= 500) {
      request.log.error(error);
      Sentry.withScope((scope) => {
        scope.setContext('request', { method: request.method, url: request.url });
        scope.setTag('error_code', error.code ?? 'INTERNAL_ERROR');
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.warn({ msg: 'Request failed', url: request.url, code: error.code, error: error.message });
    }

    return reply.status(statusCode).send({
      error: {
        code: error.code ?? 'INTERNAL_ERROR',
        message: error.message || 'Something went wrong',
      },
    });
  });

  return app;
}
