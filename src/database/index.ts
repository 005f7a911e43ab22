/**
 * Database module main exports
 */

export * from './types';
export * from './ConnectionFactory';
export * from './config';
export * from './lazy';
export * from './dialects';
export * from './adapters/SqliteAdapter';
export * from './adapters/PostgresAdapter';
