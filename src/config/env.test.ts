import { afterEach, describe, expect, it } from 'vitest';

import { getDatabaseConfig, getStorageType } from './env';

const KEYS = ['DB_TYPE', 'NODE_ENV', 'DB_HOST', 'DB_PORT', 'DB_NAME', 'DB_POOL_MAX'] as const;
const saved = Object.fromEntries(KEYS.map(key => [key, process.env[key]]));

describe('runtime configuration', () => {
  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('reads the storage type on every call', () => {
    process.env.NODE_ENV = 'production';
    process.env.DB_TYPE = 'postgres';
    expect(getStorageType()).toBe('postgres');

    process.env.DB_TYPE = 'memory';
    expect(getStorageType()).toBe('memory');
  });

  it('keeps development on memory unless postgres is asked for', () => {
    process.env.NODE_ENV = 'development';
    process.env.DB_TYPE = 'mysql';
    expect(getStorageType()).toBe('memory');

    process.env.DB_TYPE = 'postgres';
    expect(getStorageType()).toBe('postgres');
  });

  it('builds the pg settings with defaults for unusable values', () => {
    process.env.DB_HOST = 'db.internal';
    process.env.DB_PORT = 'not-a-port';
    delete process.env.DB_NAME;
    process.env.DB_POOL_MAX = '5';

    expect(getDatabaseConfig()).toMatchObject({
      host: 'db.internal',
      port: 5432,
      database: 'shop_gst',
      poolMax: 5,
    });
  });
});
