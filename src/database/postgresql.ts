import { Pool, types } from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { DatabaseAdapter } from './adapter';
import type { DatabaseConfig } from '../config/env';
import { Logger } from '../utils/logger';

// DATE columns stay as YYYY-MM-DD strings instead of local-midnight Date objects.
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

export class PostgreSQLAdapter implements DatabaseAdapter {
  private pool: Pool | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  async connect(): Promise<void> {
    this.pool = new Pool({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      max: this.config.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    try {
      // Test connection
      const client = await this.pool.connect();
      try {
        await client.query('SELECT NOW()');
      } finally {
        client.release();
      }
      Logger.info('PostgreSQL connected successfully', { host: this.config.host, database: this.config.database });
    } catch (error) {
      Logger.error('PostgreSQL connection error', error);
      await this.pool.end();
      this.pool = null;
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      Logger.info('PostgreSQL disconnected');
    }
  }

  async query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>> {
    if (!this.pool) {
      throw new Error('Database not connected');
    }
    return this.pool.query<R>(sql, params);
  }

  isConnected(): boolean {
    return this.pool !== null;
  }
}
