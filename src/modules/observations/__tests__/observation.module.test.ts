import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildApp } from '../../../app.js';
import type { Logger } from '../../../common/runtime.js';
import { openObservationStore, type ObservationStoreConfig } from '../index.js';
import { MemoryObservationStore } from '../storage/observation.memory.store.js';

const memoryConfig: ObservationStoreConfig = {
  STORAGE_DRIVER: 'memory',
  MONGO_URL: 'mongodb://localhost:27017',
  DB_NAME: 'test-db',
  MONGO_TIMEOUT_MS: 1000,
  STORE_LOCK_TIMEOUT_MS: 1000,
};

const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('Observation module wiring', () => {

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should open the memory store and log through the given logger', async () => {
    const logger = createMockLogger();

    const store = await openObservationStore(memoryConfig, logger);

    expect(store).toBeInstanceOf(MemoryObservationStore);
    expect(logger.warn).toHaveBeenCalledWith(
      { driver: 'memory' },
      '[Observations] Using in-memory store (data is not persisted)',
    );
  });

  it('should open its own store on ready and close it with the app', async () => {
    const close = vi.spyOn(MemoryObservationStore.prototype, 'close');
    const app = buildApp({ storeConfig: memoryConfig, logLevel: 'silent' });

    const posted = await app.inject({
      method: 'POST',
      url: '/webhook',
      payload: { symbol: 'AAPL', price: 10, atr: 1 },
    });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(posted.statusCode).toBe(200);
    expect(health.json()).toEqual({ status: 'healthy', database: 'connected', records_count: 1 });
    expect(close).not.toHaveBeenCalled();

    await app.close();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should leave a caller-owned store open on close', async () => {
    const store = new MemoryObservationStore();
    const close = vi.spyOn(store, 'close');
    const app = buildApp({ store, logLevel: 'silent' });

    await app.ready();
    await app.close();

    expect(close).not.toHaveBeenCalled();
  });
});
