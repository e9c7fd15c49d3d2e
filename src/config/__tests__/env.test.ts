import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {

  it('should fall back to defaults', () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: 'development',
      HOST: '0.0.0.0',
      PORT: 8000,
      LOG_LEVEL: 'info',
      CORS_ORIGINS: '*',
      STORAGE_DRIVER: 'mongo',
      MONGO_URL: 'mongodb://localhost:27017',
      DB_NAME: 'investment_data',
      MONGO_TIMEOUT_MS: 5000,
      STORE_LOCK_TIMEOUT_MS: 5000,
    });
  });

  it('should coerce numeric settings', () => {
    const env = loadEnv({ PORT: '9000', STORE_LOCK_TIMEOUT_MS: '250', STORAGE_DRIVER: 'memory' });

    expect(env.PORT).toBe(9000);
    expect(env.STORE_LOCK_TIMEOUT_MS).toBe(250);
    expect(env.STORAGE_DRIVER).toBe('memory');
  });

  it('should refuse invalid settings', () => {
    expect(() => loadEnv({ PORT: 'abc' })).toThrow(/^Invalid environment: PORT: /);
    expect(() => loadEnv({ STORAGE_DRIVER: 'sqlite' })).toThrow(/STORAGE_DRIVER/);
  });
});
