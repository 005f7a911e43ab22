/**
 * Migration runner exports
 */

export * from './types';
export * from './errors';
export * from './naming';
export { splitStatements } from './statements';
export { NodeFileStore } from './FileStore';
export { FileCatalog } from './FileCatalog';
export { Ledger, parseBatchNumber } from './Ledger';
export { SqlMigrationDriver } from './MigrationDriver';
export type { MigrationDriverOptions } from './MigrationDriver';
export { createMigrationDriver, withMigrationDriver } from './createMigrationDriver';
export type { CreateMigrationDriverOptions } from './createMigrationDriver';
export { createSchemaSnapshot } from './snapshot';
