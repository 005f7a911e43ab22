/**
 * SQLite dialect: ledger DDL, `?` placeholders and sqlite_master introspection
 */

import { DatabaseConnection, DatabaseError } from '../types';
import { lazySequence } from '../lazy';
import { SqlDialect, TableIntrospector, quoteDoubled } from './types';

type TableNameRow = { name: string };

export class SqliteTableIntrospector implements TableIntrospector {
  constructor(
    private connection: DatabaseConnection,
    private ledgerTable: string,
    private defaultSchema = 'main'
  ) {}

  listTables(schema: string = this.defaultSchema): AsyncIterable<string> {
    return lazySequence(async () => {
      const result = await this.connection.query<TableNameRow>(
        `SELECT name FROM ${quoteDoubled(schema)}.sqlite_master
         WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
         ORDER BY name`
      );
      return result.rows
        .map(row => row.name)
        .filter(name => name !== this.ledgerTable);
    });
  }

  async createStatementFor(table: string, schema: string = this.defaultSchema): Promise<string> {
    const sql = await this.connection.queryValue(
      `SELECT sql FROM ${quoteDoubled(schema)}.sqlite_master WHERE type = 'table' AND name = ?`,
      [table]
    );

    if (typeof sql !== 'string') {
      throw new DatabaseError(`Table ${table} not found in schema ${schema}`, 'TABLE_NOT_FOUND');
    }

    return `${sql};`;
  }

  dropStatementFor(table: string): string {
    return `DROP TABLE IF EXISTS ${quoteDoubled(table)};`;
  }
}

export class SqliteDialect implements SqlDialect {
  readonly type = 'sqlite';
  readonly defaultSchema = 'main';

  placeholder(_position: number): string {
    return '?';
  }

  createLedgerTableSql(table: string): string {
    return `CREATE TABLE IF NOT EXISTS ${table}(
    filename VARCHAR(255) NOT NULL,
    batch INTEGER NOT NULL
  )`;
  }

  createIntrospector(connection: DatabaseConnection, ledgerTable: string): TableIntrospector {
    return new SqliteTableIntrospector(connection, ledgerTable, this.defaultSchema);
  }
}
