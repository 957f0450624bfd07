import type { QueryResult, QueryResultRow } from 'pg';
import type { DatabaseAdapter } from './adapter';
import { Logger } from '../utils/logger';

/**
 * Connection stand-in for memory mode. Data lives in the in-memory
 * repositories, so SQL is never executed here.
 */
export class InMemoryAdapter implements DatabaseAdapter {
  private connected = false;

  async connect(): Promise<void> {
    this.connected = true;
    Logger.info('In-memory database initialized');
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    Logger.info('In-memory database closed');
  }

  async query<R extends QueryResultRow = QueryResultRow>(sql: string): Promise<QueryResult<R>> {
    throw new Error(`In-memory storage does not execute SQL: ${sql.trim().split('\n')[0]}`);
  }

  isConnected(): boolean {
    return this.connected;
  }
}
