/**
 * The `migrations` table: which up-scripts have run, and in which batch
 */

import { ConnectionError, DatabaseConnection, toError } from '../database/types';
import { SqlDialect } from '../database/dialects';
import { lazySequence } from '../database/lazy';
import { LEDGER_TABLE, LedgerEntry, MigrationLedger } from './types';
import { LedgerError } from './errors';
import { Logger, ConsoleLogger } from '../logging/Logger';

type LedgerRow = { filename: string; batch: unknown };
type FilenameRow = { filename: string };

/**
 * Batch values come back as numbers from SQLite and as numbers or numeric
 * strings from PostgreSQL depending on the column type.
 */
export function parseBatchNumber(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  throw new LedgerError(`Unexpected batch value in ${LEDGER_TABLE}: ${String(value)}`);
}

export class Ledger implements MigrationLedger {
  private logger: Logger;

  constructor(
    private connection: DatabaseConnection,
    private dialect: SqlDialect,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger();
  }

  async ensureTableExists(): Promise<void> {
    await this.guard('create ledger table', () =>
      this.connection.execute(this.dialect.createLedgerTableSql(LEDGER_TABLE))
    );
  }

  allEntries(): AsyncIterable<LedgerEntry> {
    return lazySequence(() =>
      this.guard('read ledger', async () => {
        const result = await this.connection.query<LedgerRow>(
          `SELECT filename, batch FROM ${LEDGER_TABLE} ORDER BY batch DESC, filename DESC`
        );
        const entries = result.rows.map(row => ({
          filename: row.filename,
          batch: parseBatchNumber(row.batch)
        }));
        this.logger.debug(`Found ${entries.length} ran migrations`);
        return entries;
      })
    );
  }

  entriesForBatch(batch: number): AsyncIterable<string> {
    return lazySequence(() =>
      this.guard(`read ledger batch ${batch}`, async () => {
        const result = await this.connection.query<FilenameRow>(
          `SELECT filename FROM ${LEDGER_TABLE} WHERE batch = ${this.dialect.placeholder(1)} ORDER BY filename DESC`,
          [batch]
        );
        return result.rows.map(row => row.filename);
      })
    );
  }

  async lastBatchNumber(): Promise<number> {
    const value = await this.guard('read last batch number', () =>
      this.connection.queryValue(`SELECT MAX(batch) FROM ${LEDGER_TABLE}`)
    );
    return parseBatchNumber(value);
  }

  async nextBatchNumber(): Promise<number> {
    return (await this.lastBatchNumber()) + 1;
  }

  async record(filename: string, batch: number): Promise<void> {
    await this.guard(`record ${filename}`, () =>
      this.connection.execute(
        `INSERT INTO ${LEDGER_TABLE}(filename, batch) VALUES (${this.dialect.placeholder(1)}, ${this.dialect.placeholder(2)})`,
        [filename, batch]
      )
    );
  }

  async remove(filename: string, batch: number): Promise<void> {
    await this.guard(`remove ${filename}`, () =>
      this.connection.execute(
        `DELETE FROM ${LEDGER_TABLE} WHERE filename = ${this.dialect.placeholder(1)} AND batch = ${this.dialect.placeholder(2)}`,
        [filename, batch]
      )
    );
  }

  private async guard<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof LedgerError || error instanceof ConnectionError) {
        throw error;
      }
      const cause = toError(error);
      throw new LedgerError(`Failed to ${action}: ${cause.message}`, cause);
    }
  }
}
