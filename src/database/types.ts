/**
 * Database configuration types and interfaces
 */

import { types } from 'util';

export type DatabaseType = 'sqlite' | 'postgresql';

export interface DatabaseConfig {
  type: DatabaseType;
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  maxConnections?: number;
  ssl?: boolean;
  // SQLite specific options
  filename?: string;
  // Connection pool options
  pool?: {
    min?: number;
    max?: number;
    idleTimeoutMillis?: number;
  };
}

export interface ConnectionPool {
  acquire(): Promise<DatabaseConnection>;
  release(connection: DatabaseConnection): Promise<void>;
  destroy(): Promise<void>;
}

export type SqlParameter = string | number | boolean | null;

export type Row = Record<string, unknown>;

/**
 * The executor capability the migration core is written against.
 */
export interface DatabaseConnection {
  query<T extends Row = Row>(sql: string, params?: SqlParameter[]): Promise<QueryResult<T>>;
  execute(sql: string, params?: SqlParameter[]): Promise<ExecuteResult>;
  /** First column of the first row, or null when the query returns nothing. */
  queryValue(sql: string, params?: SqlParameter[]): Promise<unknown>;
  close(): Promise<void>;
  isConnected(): boolean;
}

export interface QueryResult<T extends Row = Row> {
  rows: T[];
  rowCount: number;
}

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number | string;
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, originalError?: Error) {
    super(message, 'CONNECTION_ERROR', originalError);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DatabaseError {
  constructor(message: string, public query?: string, originalError?: Error) {
    super(message, 'QUERY_ERROR', originalError);
    this.name = 'QueryError';
  }
}

export function firstColumnValue(rows: Row[]): unknown {
  if (rows.length === 0) {
    return null;
  }

  const [value] = Object.values(rows[0]);
  return value ?? null;
}

// Errors raised by Node internals come from another realm under Jest, so
// `instanceof Error` is not reliable for them.
export function toError(error: unknown): Error {
  return types.isNativeError(error) || error instanceof Error ? error : new Error(String(error));
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
