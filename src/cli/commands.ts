/**
 * CLI commands on top of a MigrationDriver
 */

import { Logger } from '../logging/Logger';
import { FileCatalog } from '../migrations/FileCatalog';
import { MigrationDriver } from '../migrations/types';
import { migrationFilenames } from '../migrations/naming';
import { createSchemaSnapshot } from '../migrations/snapshot';
import { CliInvocation } from './arguments';

export interface CommandContext {
  logger: Logger;
  /** Command output meant for stdout (status listings, dumps). */
  write: (text: string) => void;
  writeFile: (filePath: string, content: string) => Promise<void>;
}

function plural(count: number): string {
  return count === 1 ? 'migration' : 'migrations';
}

async function migrateUp(driver: MigrationDriver, logger: Logger): Promise<void> {
  const result = await driver.runUpMigrations();
  logger.info(`Ran ${result.numRan} ${plural(result.numRan)} in batch ${result.batchNumber}`);
}

async function revertAll(driver: MigrationDriver, logger: Logger): Promise<void> {
  const result = await driver.revertAllMigrations();
  logger.info(`Reverted ${result.numRan} ${plural(result.numRan)}`);
}

export async function printStatus(driver: MigrationDriver, write: (text: string) => void): Promise<void> {
  const status = await driver.getStatus();

  const lines = ['Ran:'];
  lines.push(...(status.ran.length > 0
    ? status.ran.map(entry => `  [${entry.batch}] ${entry.filename}`)
    : ['  (none)']));
  lines.push('Pending:');
  lines.push(...(status.pending.length > 0
    ? status.pending.map(file => `  ${file}`)
    : ['  (none)']));

  write(`${lines.join('\n')}\n`);
}

/**
 * Commands that need a database connection. `create` and `help` are handled by the caller.
 */
export async function runDriverCommand(
  driver: MigrationDriver,
  invocation: CliInvocation,
  context: CommandContext
): Promise<void> {
  const { logger } = context;

  switch (invocation.command) {
    case 'up':
      await driver.ensureMigrationsTableExists();
      await migrateUp(driver, logger);
      return;

    case 'down': {
      await driver.ensureMigrationsTableExists();
      const result = await driver.revertLastRanMigrations();
      logger.info(`Reverted ${result.numRan} ${plural(result.numRan)} from batch ${result.batchNumber}`);
      return;
    }

    case 'reset':
      await driver.ensureMigrationsTableExists();
      await revertAll(driver, logger);
      return;

    case 'refresh':
      await driver.ensureMigrationsTableExists();
      await revertAll(driver, logger);
      await migrateUp(driver, logger);
      return;

    case 'status':
      await driver.ensureMigrationsTableExists();
      await printStatus(driver, context.write);
      return;

    case 'dump': {
      const snapshot = await createSchemaSnapshot(driver, invocation.schema);
      if (invocation.out) {
        await context.writeFile(invocation.out, snapshot);
        logger.info(`Wrote schema snapshot to ${invocation.out}`);
      } else {
        context.write(snapshot);
      }
      return;
    }

    case 'create':
    case 'help':
      throw new Error(`${invocation.command} does not use a database connection`);
  }
}

/**
 * Writes an empty `{timestamp}_{name}.up.sql` / `.down.sql` pair.
 */
export async function createMigrationFiles(
  catalog: FileCatalog,
  directory: string,
  name: string,
  now: Date = new Date()
): Promise<{ up: string; down: string }> {
  const files = migrationFilenames(name, now);
  await catalog.write(directory, files.up, '');
  await catalog.write(directory, files.down, '');
  return files;
}
