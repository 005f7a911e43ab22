/**
 * PostgreSQL dialect: ledger DDL, `$n` placeholders and information_schema introspection
 */

import { DatabaseConnection, DatabaseError } from '../types';
import { lazySequence } from '../lazy';
import { SqlDialect, TableIntrospector, quoteDoubled } from './types';

type TableNameRow = { table_name: string };

type ColumnRow = {
  column_name: string;
  data_type: string;
  udt_name: string;
  character_maximum_length: number | null;
  is_nullable: string;
  column_default: string | null;
};

type KeyColumnRow = { column_name: string };

const sequenceDefaultPattern = /^nextval\('[^']+'(::regclass)?\)$/;

const serialTypes: Record<string, string> = {
  smallint: 'smallserial',
  integer: 'serial',
  bigint: 'bigserial'
};

/**
 * Renders one column definition. Sequence-backed defaults name instance-specific
 * sequences, so they collapse into the matching serial pseudo-type.
 */
export function renderColumnDefinition(column: ColumnRow): string {
  let type: string;
  if (column.data_type === 'USER-DEFINED') {
    type = column.udt_name;
  } else if (column.data_type === 'ARRAY') {
    type = `${column.udt_name.replace(/^_/, '')}[]`;
  } else if (column.character_maximum_length !== null) {
    type = `${column.data_type}(${column.character_maximum_length})`;
  } else {
    type = column.data_type;
  }

  let defaultValue = column.column_default;
  const serialType = serialTypes[column.data_type];
  if (defaultValue !== null && serialType && sequenceDefaultPattern.test(defaultValue)) {
    type = serialType;
    defaultValue = null;
  }

  let definition = `${quoteDoubled(column.column_name)} ${type}`;
  if (defaultValue !== null) {
    definition += ` DEFAULT ${defaultValue}`;
  }
  if (column.is_nullable === 'NO') {
    definition += ' NOT NULL';
  }
  return definition;
}

export class PostgresTableIntrospector implements TableIntrospector {
  constructor(
    private connection: DatabaseConnection,
    private ledgerTable: string,
    private defaultSchema = 'public'
  ) {}

  listTables(schema: string = this.defaultSchema): AsyncIterable<string> {
    return lazySequence(async () => {
      const result = await this.connection.query<TableNameRow>(
        `SELECT table_name FROM information_schema.tables
         WHERE table_schema = $1 AND table_type = 'BASE TABLE'
         ORDER BY table_name`,
        [schema]
      );
      return result.rows
        .map(row => row.table_name)
        .filter(name => name !== this.ledgerTable);
    });
  }

  async createStatementFor(table: string, schema: string = this.defaultSchema): Promise<string> {
    const columns = await this.connection.query<ColumnRow>(
      `SELECT column_name, data_type, udt_name, character_maximum_length, is_nullable, column_default
       FROM information_schema.columns
       WHERE table_schema = $1 AND table_name = $2
       ORDER BY ordinal_position`,
      [schema, table]
    );

    if (columns.rows.length === 0) {
      throw new DatabaseError(`Table ${table} not found in schema ${schema}`, 'TABLE_NOT_FOUND');
    }

    const primaryKey = await this.connection.query<KeyColumnRow>(
      `SELECT kcu.column_name
       FROM information_schema.table_constraints tc
       JOIN information_schema.key_column_usage kcu
         ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
       WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1 AND tc.table_name = $2
       ORDER BY kcu.ordinal_position`,
      [schema, table]
    );

    const lines = columns.rows.map(renderColumnDefinition);
    if (primaryKey.rows.length > 0) {
      const keyColumns = primaryKey.rows.map(row => quoteDoubled(row.column_name)).join(', ');
      lines.push(`PRIMARY KEY (${keyColumns})`);
    }

    return `CREATE TABLE ${quoteDoubled(table)} (\n  ${lines.join(',\n  ')}\n);`;
  }

  dropStatementFor(table: string): string {
    return `DROP TABLE IF EXISTS ${quoteDoubled(table)};`;
  }
}

export class PostgresDialect implements SqlDialect {
  readonly type = 'postgresql';
  readonly defaultSchema = 'public';

  placeholder(position: number): string {
    return `$${position}`;
  }

  // batch is SERIAL but always written explicitly by the ledger
  createLedgerTableSql(table: string): string {
    return `CREATE TABLE IF NOT EXISTS ${table}(
    filename VARCHAR(255) NOT NULL,
    batch SERIAL
  )`;
  }

  createIntrospector(connection: DatabaseConnection, ledgerTable: string): TableIntrospector {
    return new PostgresTableIntrospector(connection, ledgerTable, this.defaultSchema);
  }
}
