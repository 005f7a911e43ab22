/**
 * Backend-specific SQL the migration core needs
 */

import { DatabaseConnection, DatabaseType } from '../types';

/**
 * Table listing and DDL extraction used by schema snapshots.
 */
export interface TableIntrospector {
  /** Base tables of `schema`, ordered by name, without the ledger table. Re-queried on every iteration. */
  listTables(schema?: string): AsyncIterable<string>;
  createStatementFor(table: string, schema?: string): Promise<string>;
  dropStatementFor(table: string): string;
}

export interface SqlDialect {
  readonly type: DatabaseType;
  /** Schema searched when callers do not name one. */
  readonly defaultSchema: string;
  /** Bind parameter marker for the 1-based `position`. */
  placeholder(position: number): string;
  createLedgerTableSql(table: string): string;
  createIntrospector(connection: DatabaseConnection, ledgerTable: string): TableIntrospector;
}

export function quoteDoubled(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}
