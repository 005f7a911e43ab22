/**
 * SQLite database adapter with connection pooling
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import sqlite3 from 'sqlite3';
import {
  DatabaseConfig,
  DatabaseConnection,
  ConnectionPool,
  QueryResult,
  ExecuteResult,
  ConnectionError,
  QueryError,
  Row,
  SqlParameter,
  firstColumnValue,
  toError
} from '../types';

const IN_MEMORY = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database;
  private closed = false;

  constructor(db: sqlite3.Database) {
    this.db = db;
  }

  async query<T extends Row = Row>(sql: string, params: SqlParameter[] = []): Promise<QueryResult<T>> {
    return new Promise((resolve, reject) => {
      this.db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(new QueryError(`SQLite query failed: ${err.message}`, sql, err));
          return;
        }

        resolve({
          rows,
          rowCount: rows.length
        });
      });
    });
  }

  async execute(sql: string, params: SqlParameter[] = []): Promise<ExecuteResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function(err) {
        if (err) {
          reject(new QueryError(`SQLite execute failed: ${err.message}`, sql, err));
          return;
        }

        resolve({
          affectedRows: this.changes,
          insertId: this.lastID
        });
      });
    });
  }

  async queryValue(sql: string, params: SqlParameter[] = []): Promise<unknown> {
    const result = await this.query(sql, params);
    return firstColumnValue(result.rows);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) {
          reject(new ConnectionError(`Failed to close SQLite connection: ${err.message}`, err));
          return;
        }
        this.closed = true;
        resolve();
      });
    });
  }

  isConnected(): boolean {
    return !this.closed;
  }
}

export class SqliteConnectionPool implements ConnectionPool {
  private config: DatabaseConfig;
  private connections: SqliteConnection[] = [];
  private availableConnections: SqliteConnection[] = [];
  private waitingClients: Array<{
    resolve: (connection: SqliteConnection) => void;
    reject: (error: Error) => void;
  }> = [];
  private maxConnections: number;
  private destroyed = false;

  constructor(config: DatabaseConfig) {
    this.config = config;
    this.maxConnections = config.maxConnections || config.pool?.max || 10;
  }

  async acquire(): Promise<DatabaseConnection> {
    if (this.destroyed) {
      throw new ConnectionError('Connection pool has been destroyed');
    }

    const available = this.availableConnections.pop();
    if (available) {
      return available;
    }

    if (this.connections.length < this.maxConnections) {
      const connection = await this.createConnection();
      this.connections.push(connection);
      return connection;
    }

    return new Promise((resolve, reject) => {
      this.waitingClients.push({ resolve, reject });
    });
  }

  async release(connection: DatabaseConnection): Promise<void> {
    const sqliteConnection = this.connections.find(candidate => candidate === connection);

    if (!sqliteConnection) {
      throw new Error('Connection does not belong to this pool');
    }

    const client = this.waitingClients.shift();
    if (client) {
      client.resolve(sqliteConnection);
      return;
    }

    this.availableConnections.push(sqliteConnection);
  }

  async destroy(): Promise<void> {
    this.destroyed = true;

    this.waitingClients.forEach(client => {
      client.reject(new ConnectionError('Connection pool destroyed'));
    });
    this.waitingClients = [];

    await Promise.all(this.connections.map(conn => conn.close()));

    this.connections = [];
    this.availableConnections = [];
  }

  private async createConnection(): Promise<SqliteConnection> {
    const filename = this.config.filename || this.config.database || IN_MEMORY;
    if (filename !== IN_MEMORY) {
      try {
        await fs.mkdir(path.dirname(filename), { recursive: true });
      } catch (error) {
        const cause = toError(error);
        throw new ConnectionError(`Failed to create directory for ${filename}: ${cause.message}`, cause);
      }
    }

    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(filename, (err) => {
        if (err) {
          reject(new ConnectionError(`Failed to create SQLite connection: ${err.message}`, err));
          return;
        }

        db.serialize(() => {
          db.run('PRAGMA foreign_keys = ON');
        });

        resolve(new SqliteConnection(db));
      });
    });
  }
}
