/**
 * Runtime configuration: environment files, database and migration settings
 */

import * as path from 'path';
import dotenv from 'dotenv';
import { LogLevel, isLogLevel } from '../logging/Logger';
import { ConfigurationError } from './database';

export * from './database';

export interface MigrationSettings {
  migrationsPath: string;
  logLevel: LogLevel;
}

/**
 * Loads `.env.local` first (highest priority) and `.env` as a fallback.
 */
export function loadEnvironment(directory: string = process.cwd()): void {
  dotenv.config({ path: path.join(directory, '.env.local'), override: true });
  dotenv.config({ path: path.join(directory, '.env') });
}

export function getMigrationSettings(env: NodeJS.ProcessEnv = process.env): MigrationSettings {
  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error; got "${logLevel}"`, 'LOG_LEVEL');
  }

  return {
    migrationsPath: env.MIGRATIONS_PATH || './migrations',
    logLevel
  };
}
