/**
 * PostgreSQL database adapter with connection pooling
 */

import { Pool, PoolClient, PoolConfig } from 'pg';
import {
  DatabaseConfig,
  DatabaseConnection,
  ConnectionPool,
  QueryResult,
  ExecuteResult,
  ConnectionError,
  DatabaseError,
  QueryError,
  Row,
  SqlParameter,
  errorCode,
  firstColumnValue,
  toError
} from '../types';

const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/;

/**
 * Server-reported failures carry a five-character SQLSTATE. Anything without
 * one (socket loss, timeouts) or in class 08 means the connection is gone.
 */
export function toPostgresError(error: unknown, sql: string, action: 'query' | 'execute'): DatabaseError {
  const cause = toError(error);
  const code = errorCode(error);

  if (code === undefined || !SQLSTATE_PATTERN.test(code) || code.startsWith('08')) {
    return new ConnectionError(`PostgreSQL connection lost during ${action}: ${cause.message}`, cause);
  }
  return new QueryError(`PostgreSQL ${action} failed: ${cause.message}`, sql, cause);
}

export class PostgresConnection implements DatabaseConnection {
  private client: PoolClient;
  private released = false;

  constructor(client: PoolClient) {
    this.client = client;
  }

  async query<T extends Row = Row>(sql: string, params: SqlParameter[] = []): Promise<QueryResult<T>> {
    try {
      const result = await this.client.query<T>(sql, params);
      return {
        rows: result.rows,
        rowCount: result.rowCount || 0
      };
    } catch (error) {
      throw toPostgresError(error, sql, 'query');
    }
  }

  async execute(sql: string, params: SqlParameter[] = []): Promise<ExecuteResult> {
    try {
      const result = await this.client.query(sql, params);
      return {
        affectedRows: result.rowCount || 0
      };
    } catch (error) {
      throw toPostgresError(error, sql, 'execute');
    }
  }

  async queryValue(sql: string, params: SqlParameter[] = []): Promise<unknown> {
    const result = await this.query(sql, params);
    return firstColumnValue(result.rows);
  }

  async close(): Promise<void> {
    // Pooled clients go back to the pool; the pool owns the socket
    if (this.released) {
      return;
    }
    this.released = true;
    this.client.release();
  }

  isConnected(): boolean {
    return !this.released;
  }
}

export function toPoolConfig(config: DatabaseConfig): PoolConfig {
  return {
    connectionString: config.connectionString,
    host: config.host,
    port: config.port || 5432,
    database: config.database,
    user: config.username,
    password: config.password,
    ssl: config.ssl,
    max: config.maxConnections || config.pool?.max || 20,
    min: config.pool?.min || 0,
    idleTimeoutMillis: config.pool?.idleTimeoutMillis || 30000,
    connectionTimeoutMillis: 10000
  };
}

export class PostgresConnectionPool implements ConnectionPool {
  private pool: Pool;
  private destroyed = false;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool(toPoolConfig(config));

    // Idle clients can error when the server goes away; acquire() reports it
    this.pool.on('error', (err) => {
      console.error('PostgreSQL pool error:', err.message);
    });
  }

  async acquire(): Promise<DatabaseConnection> {
    if (this.destroyed) {
      throw new ConnectionError('Connection pool has been destroyed');
    }

    try {
      const client = await this.pool.connect();
      return new PostgresConnection(client);
    } catch (error) {
      const cause = toError(error);
      throw new ConnectionError(`Failed to acquire PostgreSQL connection: ${cause.message}`, cause);
    }
  }

  async release(connection: DatabaseConnection): Promise<void> {
    await connection.close();
  }

  async destroy(): Promise<void> {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    await this.pool.end();
  }
}
