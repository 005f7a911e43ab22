import { DatabaseError } from '../database/types';

/**
 * A migration directory or script could not be listed or read.
 */
export class MigrationIOError extends Error {
  constructor(message: string, public path: string, public originalError?: Error) {
    super(message);
    this.name = 'MigrationIOError';
  }
}

/**
 * Reading or writing the migrations ledger failed.
 */
export class LedgerError extends DatabaseError {
  constructor(message: string, originalError?: Error) {
    super(message, 'LEDGER_ERROR', originalError);
    this.name = 'LedgerError';
  }
}
