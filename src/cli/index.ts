#!/usr/bin/env node

/**
 * sql-batch-migrate command-line entry point
 */

import { promises as fs } from 'fs';
import { getDatabaseConfig, getMigrationSettings, loadEnvironment } from '../config';
import { ConsoleLogger, Logger } from '../logging/Logger';
import { FileCatalog } from '../migrations/FileCatalog';
import { withMigrationDriver } from '../migrations/createMigrationDriver';
import { CliInvocation, USAGE, UsageError, parseArguments } from './arguments';
import { createMigrationFiles, runDriverCommand } from './commands';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  write?: (text: string) => void;
  now?: () => Date;
}

async function execute(invocation: CliInvocation, logger: Logger, options: Required<MainOptions>): Promise<void> {
  const settings = getMigrationSettings(options.env);
  const migrationPath = invocation.path ?? settings.migrationsPath;

  if (invocation.command === 'create' && invocation.name !== undefined) {
    const files = await createMigrationFiles(new FileCatalog(), migrationPath, invocation.name, options.now());
    logger.info(`Created ${files.up} and ${files.down} in ${migrationPath}`);
    return;
  }

  const config = getDatabaseConfig(options.env);
  await withMigrationDriver(config, { migrationPath, logger }, driver =>
    runDriverCommand(driver, invocation, {
      logger,
      write: options.write,
      writeFile: (filePath, content) => fs.writeFile(filePath, content, 'utf8')
    })
  );
}

/**
 * Runs one command and resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2), options: MainOptions = {}): Promise<number> {
  const resolved: Required<MainOptions> = {
    env: options.env ?? process.env,
    write: options.write ?? (text => { process.stdout.write(text); }),
    now: options.now ?? (() => new Date())
  };

  let invocation: CliInvocation;
  try {
    invocation = parseArguments(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (invocation.command === 'help') {
    resolved.write(USAGE);
    return EXIT_OK;
  }

  if (resolved.env === process.env) {
    loadEnvironment();
  }

  let logger: Logger = new ConsoleLogger();
  try {
    logger = new ConsoleLogger({ level: getMigrationSettings(resolved.env).logLevel });
    await execute(invocation, logger, resolved);
    return EXIT_OK;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  void main().then(code => {
    process.exitCode = code;
  });
}
