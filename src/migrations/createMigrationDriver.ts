import { ConnectionFactory } from '../database/ConnectionFactory';
import { dialectFor } from '../database/dialects';
import { DatabaseConfig } from '../database/types';
import { Logger } from '../logging/Logger';
import { SqlMigrationDriver } from './MigrationDriver';
import { FileStore, MigrationDriver } from './types';

export interface CreateMigrationDriverOptions {
  migrationPath: string;
  fileStore?: FileStore;
  logger?: Logger;
  factory?: ConnectionFactory;
}

/**
 * Opens the single connection a driver holds for its lifetime. The backend
 * dialect is chosen from `config.type`; `closeDriver()` releases the
 * connection and closes the pool.
 */
export async function createMigrationDriver(
  config: DatabaseConfig,
  options: CreateMigrationDriverOptions
): Promise<SqlMigrationDriver> {
  const factory = options.factory ?? ConnectionFactory.getInstance();
  const pool = await factory.createPool(config);

  const acquired = await pool.acquire().catch(async (error: unknown) => {
    await factory.closePool(config);
    throw error;
  });

  return new SqlMigrationDriver({
    connection: acquired,
    dialect: dialectFor(config.type),
    migrationPath: options.migrationPath,
    fileStore: options.fileStore,
    logger: options.logger,
    onClose: async () => {
      try {
        await pool.release(acquired);
      } finally {
        await factory.closePool(config);
      }
    }
  });
}

/**
 * Runs `work` against a fresh driver and closes it on every exit path.
 */
export async function withMigrationDriver<T>(
  config: DatabaseConfig,
  options: CreateMigrationDriverOptions,
  work: (driver: MigrationDriver) => Promise<T>
): Promise<T> {
  const driver = await createMigrationDriver(config, options);
  try {
    return await work(driver);
  } finally {
    await driver.closeDriver();
  }
}
