/**
 * Migration system types and interfaces
 */

export const LEDGER_TABLE = 'migrations';

export interface LedgerEntry {
  filename: string;
  batch: number;
}

export interface MigrationResult {
  /** Scripts that executed completely and updated the ledger. */
  numRan: number;
  /** Batch affected; 0 for a full revert. */
  batchNumber: number;
}

export interface MigrationStatus {
  ran: LedgerEntry[];
  pending: string[];
}

/**
 * File access the catalog needs. Paths are joined with `path.join`.
 */
export interface FileStore {
  /** Names of regular files directly inside `directory`. */
  listFiles(directory: string): Promise<string[]>;
  readFile(filePath: string): Promise<string>;
  exists(filePath: string): Promise<boolean>;
  writeFile(filePath: string, content: string): Promise<void>;
}

export interface MigrationLedger {
  ensureTableExists(): Promise<void>;
  allEntries(): AsyncIterable<LedgerEntry>;
  entriesForBatch(batch: number): AsyncIterable<string>;
  lastBatchNumber(): Promise<number>;
  nextBatchNumber(): Promise<number>;
  record(filename: string, batch: number): Promise<void>;
  remove(filename: string, batch: number): Promise<void>;
}

export interface MigrationDriver {
  ensureMigrationsTableExists(): Promise<void>;
  runUpMigrations(): Promise<MigrationResult>;
  revertLastRanMigrations(): Promise<MigrationResult>;
  revertAllMigrations(): Promise<MigrationResult>;
  getStatus(): Promise<MigrationStatus>;
  listTables(schema?: string): AsyncIterable<string>;
  createStatementFor(table: string, schema?: string): Promise<string>;
  dropStatementFor(table: string): string;
  closeDriver(): Promise<void>;
}
