import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError, ValidationError } from './common/errors.js';
import { registerHealthRoutes } from './core/health/health.routes.js';
import {
  openObservationStore,
  registerObservationModule,
  type ObservationStoreConfig,
} from './modules/observations/index.js';
import type { ObservationStore } from './modules/observations/storage/observation.store.js';

export interface AppDeps {
  /** Owned by the caller. Without it the app opens one from `storeConfig` and closes it with itself. */
  store?: ObservationStore;
  storeConfig?: ObservationStoreConfig;
  logLevel?: string;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
  });

  // Global error handler: every failure is `{ detail }`
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof AppError) {
      if (err instanceof ValidationError) {
        req.log.warn({ detail: err.message }, 'Request rejected');
      } else {
        req.log.error(err);
      }
      return reply.status(err.statusCode).send({ detail: err.message });
    }

    // Fastify request errors (bad JSON, unsupported media type, ...)
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      req.log.warn({ detail: err.message }, 'Request rejected');
      return reply.status(statusCode).send({ detail: err.message });
    }

    req.log.error(err);
    return reply.status(statusCode).send({
      detail: env.NODE_ENV === 'production' ? 'Internal server error' : `Internal error: ${err.message}`,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({ detail: 'Route not found' });
  });

  app.register(async (fastify) => {
    const store = deps.store ?? await openOwnedStore(fastify, deps.storeConfig ?? env);
    const service = await registerObservationModule(fastify, { store });
    await registerHealthRoutes(fastify, service);
  });

  return app;
}

async function openOwnedStore(app: FastifyInstance, config: ObservationStoreConfig): Promise<ObservationStore> {
  app.log.info(`[BOOT] Opening ${config.STORAGE_DRIVER} observation store...`);
  const store = await openObservationStore(config, app.log);
  app.addHook('onClose', async () => {
    await store.close();
  });
  return store;
}
