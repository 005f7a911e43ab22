/**
 * Database connection factory interface and implementation
 */

import { DatabaseConfig, ConnectionPool, DatabaseType } from './types';
import { SqliteConnectionPool } from './adapters/SqliteAdapter';
import { PostgresConnectionPool } from './adapters/PostgresAdapter';
import { DatabaseConfigValidator } from './config';

export interface IConnectionFactory {
  createPool(config: DatabaseConfig): Promise<ConnectionPool>;
  validateConfig(config: DatabaseConfig): Promise<boolean>;
  getSupportedTypes(): DatabaseType[];
}

export class ConnectionFactory implements IConnectionFactory {
  private static instance: ConnectionFactory | undefined;
  private pools: Map<string, ConnectionPool> = new Map();

  private constructor() {}

  public static getInstance(): ConnectionFactory {
    if (!ConnectionFactory.instance) {
      ConnectionFactory.instance = new ConnectionFactory();
    }
    return ConnectionFactory.instance;
  }

  public async createPool(config: DatabaseConfig): Promise<ConnectionPool> {
    const poolKey = this.generatePoolKey(config);

    const existing = this.pools.get(poolKey);
    if (existing) {
      return existing;
    }

    await this.validateConfig(config);

    let pool: ConnectionPool;

    switch (config.type) {
      case 'sqlite':
        pool = new SqliteConnectionPool(config);
        break;
      case 'postgresql':
        pool = new PostgresConnectionPool(config);
        break;
      default:
        throw new Error(`Unsupported database type: ${String(config.type)}`);
    }

    this.pools.set(poolKey, pool);
    return pool;
  }

  public async validateConfig(config: DatabaseConfig): Promise<boolean> {
    if (!this.getSupportedTypes().includes(config.type)) {
      throw new Error(`Unsupported database type: ${config.type}`);
    }

    const [firstError] = DatabaseConfigValidator.validate(config);
    if (firstError) {
      throw new Error(firstError);
    }

    return true;
  }

  public getSupportedTypes(): DatabaseType[] {
    return ['sqlite', 'postgresql'];
  }

  public async closePool(config: DatabaseConfig): Promise<void> {
    const poolKey = this.generatePoolKey(config);
    const pool = this.pools.get(poolKey);

    if (pool) {
      this.pools.delete(poolKey);
      await pool.destroy();
    }
  }

  private generatePoolKey(config: DatabaseConfig): string {
    const location = config.connectionString
      || `${config.host || 'localhost'}:${config.port || 'default'}:${config.database || config.filename}`;
    return `${config.type}:${location}`;
  }
}

export default ConnectionFactory;
