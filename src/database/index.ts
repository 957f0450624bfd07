import type { DatabaseAdapter } from './adapter';
import { PostgreSQLAdapter } from './postgresql';
import { InMemoryAdapter } from './in-memory';
import { getDatabaseConfig, getStorageType } from '../config/env';
import { Logger } from '../utils/logger';

let dbAdapter: DatabaseAdapter | null = null;

const SCHEMA: { table: string; sql: string }[] = [
  {
    table: 'shops',
    sql: `
      CREATE TABLE IF NOT EXISTS shops (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT true,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_shops_active ON shops(is_active);
    `,
  },
  {
    table: 'shop_categories',
    sql: `
      CREATE TABLE IF NOT EXISTS shop_categories (
        id SERIAL PRIMARY KEY,
        shop_id INTEGER NOT NULL REFERENCES shops(id) ON DELETE CASCADE,
        parent_id INTEGER REFERENCES shop_categories(id),
        name VARCHAR(100) NOT NULL,
        slug VARCHAR(100) NOT NULL,
        description TEXT,
        sort_order INTEGER NOT NULL DEFAULT 0,
        is_active BOOLEAN NOT NULL DEFAULT true,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW(),
        CONSTRAINT uq_shop_category_name UNIQUE (shop_id, name),
        CONSTRAINT uq_shop_category_slug UNIQUE (shop_id, slug)
      );

      CREATE INDEX IF NOT EXISTS idx_shop_categories_shop ON shop_categories(shop_id);
      CREATE INDEX IF NOT EXISTS idx_shop_categories_parent ON shop_categories(parent_id);
    `,
  },
  {
    table: 'shop_gst_rules',
    sql: `
      CREATE TABLE IF NOT EXISTS shop_gst_rules (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        shop_id INTEGER NOT NULL REFERENCES shops(id) ON DELETE CASCADE,
        category_id INTEGER NOT NULL REFERENCES shop_categories(id),
        price_condition_type VARCHAR(30) NOT NULL DEFAULT 'ANY' CHECK (price_condition_type IN ('ANY', 'LESS_THAN', 'LESS_THAN_OR_EQUAL', 'GREATER_THAN', 'GREATER_THAN_OR_EQUAL', 'EQUAL')),
        price_condition_value NUMERIC(10,2) CHECK (price_condition_value >= 0),
        gst_rate_percentage NUMERIC(5,2) NOT NULL CHECK (gst_rate_percentage >= 0 AND gst_rate_percentage <= 100),
        is_active BOOLEAN NOT NULL DEFAULT true,
        start_date DATE,
        end_date DATE,
        created_by INTEGER,
        updated_by INTEGER,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW(),
        CONSTRAINT uq_shop_gst_rule_name_shop UNIQUE (name, shop_id)
      );

      CREATE INDEX IF NOT EXISTS idx_shop_gst_rules_shop ON shop_gst_rules(shop_id);
      CREATE INDEX IF NOT EXISTS idx_shop_gst_rules_category ON shop_gst_rules(category_id);
      CREATE INDEX IF NOT EXISTS idx_shop_gst_rules_lookup ON shop_gst_rules(shop_id, category_id) WHERE is_active = true;
    `,
  },
];

export async function initializeDatabase(): Promise<DatabaseAdapter> {
  if (getStorageType() === 'memory') {
    Logger.info('Initializing in-memory database...');
    dbAdapter = new InMemoryAdapter();
    await dbAdapter.connect();
    return dbAdapter;
  }

  Logger.info('Initializing PostgreSQL database...');
  const adapter = new PostgreSQLAdapter(getDatabaseConfig());
  await adapter.connect();
  dbAdapter = adapter;

  for (const { table, sql } of SCHEMA) {
    try {
      await adapter.query(sql);
      Logger.debug(`Table ${table} is ready`);
    } catch (error) {
      Logger.error(`Error creating ${table} table`, error);
      throw error;
    }
  }

  return adapter;
}

export function getDatabase(): DatabaseAdapter {
  if (!dbAdapter) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return dbAdapter;
}

export async function closeDatabase(): Promise<void> {
  if (dbAdapter) {
    await dbAdapter.disconnect();
    dbAdapter = null;
  }
}
