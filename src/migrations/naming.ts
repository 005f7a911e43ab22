/**
 * Migration filename conventions: `{name}.up.sql` paired with an optional `{name}.down.sql`
 */

export const UP_SUFFIX = '.up.sql';
export const DOWN_SUFFIX = '.down.sql';

export function isUpMigration(filename: string): boolean {
  return filename.endsWith(UP_SUFFIX);
}

export function downFilenameFor(upFilename: string): string {
  return upFilename.slice(0, -UP_SUFFIX.length) + DOWN_SUFFIX;
}

export function compareFilenames(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYYMMDDHHMMSS` in UTC, so new files sort after older ones.
 */
export function migrationTimestamp(date: Date): string {
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds())
  ].join('');
}

export function normalizeMigrationName(name: string): string {
  const normalized = name
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-z0-9_]/g, '')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');

  if (normalized.length === 0) {
    throw new Error(`Invalid migration name: "${name}"`);
  }
  return normalized;
}

export function migrationFilenames(name: string, date: Date): { up: string; down: string } {
  const base = `${migrationTimestamp(date)}_${normalizeMigrationName(name)}`;
  return {
    up: base + UP_SUFFIX,
    down: base + DOWN_SUFFIX
  };
}
