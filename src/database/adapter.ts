import type { QueryResult, QueryResultRow } from 'pg';

/**
 * Database adapter interface
 * Allows switching between PostgreSQL and in-memory storage
 */
export interface DatabaseAdapter {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
  isConnected(): boolean;
}
