import { MigrationDriver } from './types';

/**
 * Drop-then-create DDL for every table in `schema`, ledger excluded.
 */
export async function createSchemaSnapshot(driver: MigrationDriver, schema?: string): Promise<string> {
  const sections: string[] = [];

  for await (const table of driver.listTables(schema)) {
    const create = await driver.createStatementFor(table, schema);
    sections.push(`${driver.dropStatementFor(table)}\n${create}`);
  }

  return sections.length > 0 ? `${sections.join('\n\n')}\n` : '';
}
