/**
 * In-process stand-ins for the migration tests
 */

import * as path from 'path';
import {
  DatabaseConnection,
  ExecuteResult,
  QueryError,
  QueryResult,
  Row,
  SqlParameter,
  firstColumnValue
} from '../../database/types';
import { lazySequence } from '../../database/lazy';
import { Logger, LogLevel } from '../../logging/Logger';
import { MigrationIOError, LedgerError } from '../errors';
import { FileStore, LedgerEntry, MigrationLedger } from '../types';

export class InMemoryFileStore implements FileStore {
  private files = new Map<string, string>();
  private directories = new Set<string>();

  constructor(directory?: string, files: Record<string, string> = {}) {
    if (directory !== undefined) {
      this.directories.add(directory);
      Object.entries(files).forEach(([name, content]) => this.put(directory, name, content));
    }
  }

  put(directory: string, name: string, content: string): void {
    this.directories.add(directory);
    this.files.set(path.join(directory, name), content);
  }

  async listFiles(directory: string): Promise<string[]> {
    if (!this.directories.has(directory)) {
      throw new MigrationIOError(`Failed to list migration directory ${directory}: ENOENT`, directory);
    }
    return Array.from(this.files.keys())
      .filter(filePath => path.dirname(filePath) === directory)
      .map(filePath => path.basename(filePath));
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new MigrationIOError(`Failed to read migration file ${filePath}: ENOENT`, filePath);
    }
    return content;
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    if (this.files.has(filePath)) {
      throw new MigrationIOError(`Failed to write migration file ${filePath}: EEXIST`, filePath);
    }
    this.put(path.dirname(filePath), path.basename(filePath), content);
  }
}

/**
 * Records every executed statement. `failWith` decides which statements throw.
 * Queries are answered from `queryResponses`, keyed by a fragment of the
 * whitespace-collapsed SQL.
 */
export class RecordingConnection implements DatabaseConnection {
  executed: string[] = [];
  queried: Array<{ sql: string; params: SqlParameter[] }> = [];
  closed = false;
  queryResponses = new Map<string, Row[]>();

  constructor(private failWith: (sql: string) => Error | undefined = () => undefined) {}

  async query<T extends Row = Row>(sql: string, params: SqlParameter[] = []): Promise<QueryResult<T>> {
    const collapsed = sql.replace(/\s+/g, ' ').trim();
    this.queried.push({ sql: collapsed, params });
    const match = Array.from(this.queryResponses.keys()).find(fragment => collapsed.includes(fragment));
    const rows = match === undefined ? undefined : this.queryResponses.get(match);
    if (!rows) {
      throw new QueryError(`Fake query failed: ${sql}`, sql);
    }
    return { rows: rows.filter((row): row is T => true), rowCount: rows.length };
  }

  async execute(sql: string): Promise<ExecuteResult> {
    this.executed.push(sql);
    const error = this.failWith(sql);
    if (error) {
      throw error;
    }
    return { affectedRows: 0 };
  }

  async queryValue(sql: string, params: SqlParameter[] = []): Promise<unknown> {
    const result = await this.query(sql, params);
    return firstColumnValue(result.rows);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isConnected(): boolean {
    return !this.closed;
  }
}

export function failOnMatch(fragment: string): (sql: string) => Error | undefined {
  return sql => (sql.includes(fragment) ? new QueryError(`Fake execute failed: ${sql}`, sql) : undefined);
}

export class InMemoryLedger implements MigrationLedger {
  entries: LedgerEntry[] = [];
  tableCreated = 0;
  failOnRecord = false;

  constructor(entries: LedgerEntry[] = []) {
    this.entries = [...entries];
  }

  async ensureTableExists(): Promise<void> {
    this.tableCreated++;
  }

  allEntries(): AsyncIterable<LedgerEntry> {
    return lazySequence(async () =>
      [...this.entries].sort((a, b) =>
        b.batch - a.batch || (a.filename < b.filename ? 1 : a.filename > b.filename ? -1 : 0)
      )
    );
  }

  entriesForBatch(batch: number): AsyncIterable<string> {
    return lazySequence(async () =>
      this.entries
        .filter(entry => entry.batch === batch)
        .map(entry => entry.filename)
        .sort()
        .reverse()
    );
  }

  async lastBatchNumber(): Promise<number> {
    return this.entries.reduce((max, entry) => Math.max(max, entry.batch), 0);
  }

  async nextBatchNumber(): Promise<number> {
    return (await this.lastBatchNumber()) + 1;
  }

  async record(filename: string, batch: number): Promise<void> {
    if (this.failOnRecord) {
      throw new LedgerError(`Failed to record ${filename}: disk full`);
    }
    this.entries.push({ filename, batch });
  }

  async remove(filename: string, batch: number): Promise<void> {
    this.entries = this.entries.filter(entry => !(entry.filename === filename && entry.batch === batch));
  }
}

export class RecordingLogger implements Logger {
  messages: Array<{ level: LogLevel; message: string }> = [];

  debug(message: string): void {
    this.messages.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }

  at(level: LogLevel): string[] {
    return this.messages.filter(entry => entry.level === level).map(entry => entry.message);
  }
}
