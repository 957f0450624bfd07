export type StorageType = 'memory' | 'postgres';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  poolMax: number;
}

function parseInteger(value: string | undefined, defaultValue: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Memory storage is used when DB_TYPE=memory, or in development unless
 * DB_TYPE=postgres is set explicitly. Read on every call so tests and
 * dotenv can set the variables after this module loads.
 */
export function getStorageType(): StorageType {
  const dbType = process.env.DB_TYPE || 'memory';
  const nodeEnv = process.env.NODE_ENV || 'development';

  if (dbType === 'memory' || (nodeEnv === 'development' && dbType !== 'postgres')) {
    return 'memory';
  }
  return 'postgres';
}

export function getDatabaseConfig(): DatabaseConfig {
  return {
    host: process.env.DB_HOST || 'localhost',
    port: parseInteger(process.env.DB_PORT, 5432),
    database: process.env.DB_NAME || 'shop_gst',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    poolMax: parseInteger(process.env.DB_POOL_MAX, 20),
  };
}

export const env = {
  PORT: parseInteger(process.env.PORT, 3000),
  NODE_ENV: process.env.NODE_ENV || 'development',
  API_URL: process.env.API_URL || `http://localhost:${process.env.PORT || 3000}`,
  SWAGGER_TITLE: process.env.SWAGGER_TITLE || 'Shop GST API',
  SWAGGER_VERSION: process.env.SWAGGER_VERSION || '1.0.0',
};
