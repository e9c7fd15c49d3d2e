/**
 * OBSERVATIONS MODULE — Index
 */

import type { FastifyInstance } from 'fastify';
import type { Env } from '../../config/env.js';
import { defaultLogger, type Logger } from '../../common/runtime.js';
import { connectMongo } from '../../db/mongo.js';
import { ObservationService } from './services/observation.service.js';
import { registerObservationRoutes } from './routes/observation.routes.js';
import { registerWebhookRoutes } from './routes/webhook.routes.js';
import { MemoryObservationStore } from './storage/observation.memory.store.js';
import { MongoObservationStore } from './storage/observation.mongo.store.js';
import type { ObservationStore } from './storage/observation.store.js';

// Types
export * from './contracts/observation.types.js';

// Services
export { ObservationService } from './services/observation.service.js';
export { validateObservation, exitPrice } from './services/observation.validator.js';

// Storage
export type { ObservationStore } from './storage/observation.store.js';
export { MemoryObservationStore } from './storage/observation.memory.store.js';
export { MongoObservationStore } from './storage/observation.mongo.store.js';

export type ObservationStoreConfig =
  Pick<Env, 'STORAGE_DRIVER' | 'MONGO_URL' | 'DB_NAME' | 'MONGO_TIMEOUT_MS' | 'STORE_LOCK_TIMEOUT_MS'>;

/**
 * Open the store selected by STORAGE_DRIVER. Created once at startup,
 * closed at shutdown.
 */
export async function openObservationStore(
  config: ObservationStoreConfig,
  logger: Logger = defaultLogger,
): Promise<ObservationStore> {
  if (config.STORAGE_DRIVER === 'memory') {
    logger.warn({ driver: 'memory' }, '[Observations] Using in-memory store (data is not persisted)');
    return new MemoryObservationStore({ lockTimeoutMs: config.STORE_LOCK_TIMEOUT_MS });
  }

  const client = await connectMongo({ url: config.MONGO_URL, timeoutMs: config.MONGO_TIMEOUT_MS });
  try {
    return await MongoObservationStore.open(client, {
      dbName: config.DB_NAME,
      timeoutMs: config.MONGO_TIMEOUT_MS,
      lockTimeoutMs: config.STORE_LOCK_TIMEOUT_MS,
      logger,
    });
  } catch (err) {
    await client.close();
    throw err;
  }
}

/**
 * Register webhook + read routes against an injected store
 */
export async function registerObservationModule(
  app: FastifyInstance,
  deps: { store: ObservationStore },
): Promise<ObservationService> {
  const service = new ObservationService(deps.store);

  await registerWebhookRoutes(app, service);
  await registerObservationRoutes(app, service);

  app.log.info('[Observations] Routes registered');
  return service;
}
