/**
 * Command-line argument parsing for sql-batch-migrate
 */

export const COMMANDS = ['up', 'down', 'reset', 'refresh', 'status', 'create', 'dump', 'help'] as const;

export type CommandName = typeof COMMANDS[number];

export interface CliInvocation {
  command: CommandName;
  /** Migration name for `create`. */
  name?: string;
  path?: string;
  schema?: string;
  out?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: sql-batch-migrate <command> [options]

Commands:
  up              Run all pending migrations as a new batch
  down            Revert the most recent batch
  reset           Revert every recorded migration
  refresh         Revert everything, then run all migrations
  status          List ran and pending migrations
  create <name>   Create an empty up/down migration pair
  dump            Print DROP/CREATE statements for every table

Options:
  --path <dir>    Migration directory (default: $MIGRATIONS_PATH or ./migrations)
  --schema <name> Schema to dump (default: main for SQLite, public for PostgreSQL)
  --out <file>    Write the dump to a file instead of stdout
  -h, --help      Show this help
`;

type ValueOption = 'path' | 'schema' | 'out';

const VALUE_OPTIONS: readonly ValueOption[] = ['path', 'schema', 'out'];

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

function isValueOption(value: string): value is ValueOption {
  return VALUE_OPTIONS.some(option => option === value);
}

export function parseArguments(argv: string[]): CliInvocation {
  const positionals: string[] = [];
  const options: Partial<Record<ValueOption, string>> = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (!isValueOption(flag)) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (separator === -1) {
      value = argv[++i];
      if (value !== undefined && value.startsWith('--')) {
        value = undefined;
      }
    } else {
      value = arg.slice(separator + 1);
    }

    if (value === undefined || value === '') {
      throw new UsageError(`Option --${flag} requires a value`);
    }
    options[flag] = value;
  }

  if (help) {
    return { command: 'help' };
  }

  const [command, ...rest] = positionals;
  if (command === undefined) {
    throw new UsageError('No command given');
  }
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  let name: string | undefined;
  if (command === 'create') {
    name = rest.shift();
    if (name === undefined) {
      throw new UsageError('create requires a migration name');
    }
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }

  return { command, name, ...options };
}
