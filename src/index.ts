/**
 * sql-batch-migrate: batch-tracked SQL migrations for SQLite and PostgreSQL
 */

export * from './database';
export * from './migrations';
export * from './logging/Logger';
export {
  ConfigurationError,
  getDatabaseConfig,
  getMigrationSettings,
  loadEnvironment
} from './config';
export type { MigrationSettings } from './config';
