/**
 * Database configuration validation
 */

import { DatabaseConfig } from './types';

export class DatabaseConfigValidator {
  /**
   * Every problem with `config`, in check order. Empty when it is usable.
   */
  static validate(config: DatabaseConfig): string[] {
    const errors: string[] = [];

    switch (config.type) {
      case 'sqlite':
        if (!config.database && !config.filename) {
          errors.push('SQLite requires either database or filename');
        }
        break;

      case 'postgresql':
        if (!config.connectionString && (!config.host || !config.database)) {
          errors.push('PostgreSQL requires either connectionString or host/database');
        }
        if (config.port !== undefined && (config.port < 1 || config.port > 65535)) {
          errors.push('PostgreSQL port must be between 1 and 65535');
        }
        break;

      default:
        errors.push(`Unsupported database type: ${String(config.type)}`);
    }

    if (config.maxConnections !== undefined && config.maxConnections < 1) {
      errors.push('maxConnections must be greater than 0');
    }

    const { pool } = config;
    if (pool?.min !== undefined && pool.min < 0) {
      errors.push('Pool min connections must be >= 0');
    }
    if (pool?.max !== undefined && pool.max < 1) {
      errors.push('Pool max connections must be >= 1');
    }
    if (pool?.min !== undefined && pool.max !== undefined && pool.min > pool.max) {
      errors.push('Pool min connections cannot be greater than max connections');
    }

    return errors;
  }
}
