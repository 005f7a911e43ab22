/**
 * Reconciles the migration directory with the ledger and applies or reverts scripts
 */

import { DatabaseConnection, QueryError } from '../database/types';
import { SqlDialect, TableIntrospector } from '../database/dialects';
import { collect } from '../database/lazy';
import { Logger, ConsoleLogger } from '../logging/Logger';
import { FileCatalog } from './FileCatalog';
import { Ledger } from './Ledger';
import { splitStatements } from './statements';
import { UP_SUFFIX, compareFilenames, downFilenameFor, isUpMigration } from './naming';
import {
  FileStore,
  LEDGER_TABLE,
  MigrationDriver,
  MigrationLedger,
  MigrationResult,
  MigrationStatus
} from './types';

export interface MigrationDriverOptions {
  connection: DatabaseConnection;
  dialect: SqlDialect;
  /** Directory holding the `.up.sql` / `.down.sql` scripts. */
  migrationPath: string;
  fileStore?: FileStore;
  ledger?: MigrationLedger;
  logger?: Logger;
  /** Replaces `connection.close()` in `closeDriver()`, e.g. to return it to a pool. */
  onClose?: () => Promise<void>;
}

type Direction = 'up' | 'down';

export class SqlMigrationDriver implements MigrationDriver {
  readonly migrationPath: string;
  private connection: DatabaseConnection;
  private catalog: FileCatalog;
  private ledger: MigrationLedger;
  private introspector: TableIntrospector;
  private logger: Logger;
  private onClose?: () => Promise<void>;
  private closed = false;

  constructor(options: MigrationDriverOptions) {
    this.connection = options.connection;
    this.migrationPath = options.migrationPath;
    this.logger = options.logger ?? new ConsoleLogger();
    this.catalog = new FileCatalog(options.fileStore);
    this.ledger = options.ledger ?? new Ledger(options.connection, options.dialect, this.logger);
    this.introspector = options.dialect.createIntrospector(options.connection, LEDGER_TABLE);
    this.onClose = options.onClose;
  }

  async ensureMigrationsTableExists(): Promise<void> {
    await this.ledger.ensureTableExists();
  }

  /**
   * Up-scripts on disk that have no ledger entry in any batch, in ascending filename order.
   */
  async getUpMigrationsToRun(): Promise<string[]> {
    this.logger.debug('Calculating up migrations to run');
    const pending = await this.catalog.listCandidates(this.migrationPath, UP_SUFFIX);

    for await (const entry of this.ledger.allEntries()) {
      pending.delete(entry.filename);
    }

    const files = Array.from(pending).sort(compareFilenames);
    this.logger.debug(`Got ${files.length} files to run: ${files.join(', ')}`);
    return files;
  }

  async runUpMigrations(): Promise<MigrationResult> {
    const result: MigrationResult = {
      numRan: 0,
      batchNumber: await this.ledger.nextBatchNumber()
    };

    for (const file of await this.getUpMigrationsToRun()) {
      const content = await this.catalog.read(this.migrationPath, file);
      if (content.length === 0) {
        this.logger.warn(`Skipping empty migration ${file}; it stays pending until it has content`);
        continue;
      }

      this.logger.info(`Running migration: ${file}`);
      if (await this.runScript(content, file, 'up')) {
        await this.ledger.record(file, result.batchNumber);
        result.numRan++;
      }
    }

    return result;
  }

  async revertLastRanMigrations(): Promise<MigrationResult> {
    const result: MigrationResult = {
      numRan: 0,
      batchNumber: await this.ledger.lastBatchNumber()
    };

    this.logger.debug(`Calculating down migrations to run for batch number ${result.batchNumber}`);

    for await (const file of this.ledger.entriesForBatch(result.batchNumber)) {
      if (await this.revertMigration(file, result.batchNumber)) {
        result.numRan++;
      }
    }

    return result;
  }

  async revertAllMigrations(): Promise<MigrationResult> {
    const result: MigrationResult = { numRan: 0, batchNumber: 0 };

    this.logger.debug('Calculating down migrations to run');

    for await (const entry of this.ledger.allEntries()) {
      if (await this.revertMigration(entry.filename, entry.batch)) {
        result.numRan++;
      }
    }

    return result;
  }

  async getStatus(): Promise<MigrationStatus> {
    return {
      ran: await collect(this.ledger.allEntries()),
      pending: await this.getUpMigrationsToRun()
    };
  }

  listTables(schema?: string): AsyncIterable<string> {
    return this.introspector.listTables(schema);
  }

  createStatementFor(table: string, schema?: string): Promise<string> {
    return this.introspector.createStatementFor(table, schema);
  }

  dropStatementFor(table: string): string {
    return this.introspector.dropStatementFor(table);
  }

  async closeDriver(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.logger.debug('Closing database connection');
    if (this.onClose) {
      await this.onClose();
    } else {
      await this.connection.close();
    }
  }

  /**
   * Reverts one ledger entry. Entries without a down-script stay recorded.
   */
  private async revertMigration(file: string, batch: number): Promise<boolean> {
    if (!isUpMigration(file)) {
      return false;
    }

    this.logger.debug(`Found migration to revert: ${file}`);
    const downFile = downFilenameFor(file);
    if (!(await this.catalog.exists(this.migrationPath, downFile))) {
      this.logger.warn(`No down migration for ${file}; leaving it recorded`);
      return false;
    }

    this.logger.info(`Running down migration: ${downFile}`);
    const content = await this.catalog.read(this.migrationPath, downFile);
    if (!(await this.runScript(content, file, 'down'))) {
      return false;
    }

    await this.ledger.remove(file, batch);
    return true;
  }

  /**
   * Executes each statement in order. A failing statement abandons the script but
   * statements that already ran stay applied; only statement errors are absorbed.
   */
  private async runScript(content: string, migration: string, direction: Direction): Promise<boolean> {
    try {
      for (const statement of splitStatements(content)) {
        await this.connection.execute(statement);
      }
      return true;
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error;
      }
      const action = direction === 'up' ? 'running' : 'reversing';
      this.logger.error(`Error ${action} migration '${migration}': ${error.message}`);
      return false;
    }
  }
}
