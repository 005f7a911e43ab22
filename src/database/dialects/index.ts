import { DatabaseType } from '../types';
import { SqlDialect } from './types';
import { SqliteDialect } from './SqliteDialect';
import { PostgresDialect } from './PostgresDialect';

export * from './types';
export * from './SqliteDialect';
export * from './PostgresDialect';

export function dialectFor(type: DatabaseType): SqlDialect {
  switch (type) {
    case 'sqlite':
      return new SqliteDialect();
    case 'postgresql':
      return new PostgresDialect();
    default:
      throw new Error(`Unsupported database type: ${String(type)}`);
  }
}
