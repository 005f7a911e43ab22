/**
 * Database configuration utility
 */

import { DatabaseConfig, DatabaseType } from '../database/types';
import { DatabaseConfigValidator } from '../database/config';

export class ConfigurationError extends Error {
  constructor(message: string, public variable?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function isDatabaseType(value: string): value is DatabaseType {
  return value === 'sqlite' || value === 'postgresql';
}

export function parsePort(value: string | undefined, variable: string, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }

  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`${variable} must be an integer between 1 and 65535, got "${value}"`, variable);
  }
  return port;
}

function parseBoolean(value: string | undefined, variable: string): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw new ConfigurationError(`${variable} must be true or false, got "${value}"`, variable);
}

/**
 * Build the database configuration from the environment
 */
export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const dbType = env.DATABASE_TYPE || 'sqlite';
  if (!isDatabaseType(dbType)) {
    throw new ConfigurationError(`Unsupported DATABASE_TYPE "${dbType}"`, 'DATABASE_TYPE');
  }

  let config: DatabaseConfig;

  if (dbType === 'postgresql') {
    const ssl = parseBoolean(env.DB_SSL, 'DB_SSL');
    if (env.DATABASE_URL) {
      config = {
        type: 'postgresql',
        connectionString: env.DATABASE_URL,
        ssl,
        maxConnections: 1
      };
    } else {
      config = {
        type: 'postgresql',
        host: env.DB_HOST || 'localhost',
        port: parsePort(env.DB_PORT, 'DB_PORT', 5432),
        database: env.DB_NAME,
        username: env.DB_USER,
        password: env.DB_PASSWORD,
        ssl,
        maxConnections: 1
      };
    }
  } else {
    config = {
      type: 'sqlite',
      database: env.DATABASE_PATH || './data/migrations.db',
      maxConnections: 1
    };
  }

  const [firstError] = DatabaseConfigValidator.validate(config);
  if (firstError) {
    throw new ConfigurationError(firstError);
  }

  return config;
}
