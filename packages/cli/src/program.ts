/**
 * sqltrail command line
 *
 * Maps the SQL a Delphi code base runs, method by method.
 */

import { Command } from 'commander';
import { collectCommand, type CollectCommandOptions } from './commands/collect.js';
import { unitCommand, type UnitCommandOptions } from './commands/unit.js';
import { configCommand, type ConfigCommandOptions } from './commands/config.js';
import { ErrorCodes, isCLIError, wrapError } from './lib/errors.js';
import { logger } from './lib/logger.js';

export const VERSION = '0.1.0';

/**
 * Report a failed command and mark the process as failed.
 */
export function reportCommandError(error: unknown, verbose = false): void {
  const cliError = isCLIError(error) ? error : wrapError(error, ErrorCodes.EXTRACT_FAILED);
  logger.error(cliError.toUserStringWithRemediation(verbose));
  process.exitCode = 1;
}

async function runAction(action: () => Promise<void>, verbose = false): Promise<void> {
  try {
    await action();
  } catch (error) {
    reportCommandError(error, verbose);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program.name('sqltrail').description('Recover the SQL each method of a Delphi unit runs').version(VERSION);

  // Collect command - scan a project and write the artifact
  program
    .command('collect')
    .description('Collect database operations from every unit under a directory')
    .option('-t, --target <path>', 'Target directory to analyze (default: current directory)')
    .option('-o, --out <file>', 'Output file path (use --out=- for stdout)')
    .option('-f, --format <format>', 'Output format: json or ndjson', 'json')
    .option('--pretty', 'Pretty-print JSON output', false)
    .option('--quiet', 'Suppress progress messages', false)
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('--dynamic-sql <mode>', 'Dynamic SQL text: template or sentinel (default: from config)')
    .action(async (options: CollectCommandOptions) => {
      logger.configure({ verbose: options.verbose, silent: options.quiet });
      await runAction(() => collectCommand(options), options.verbose);
    });

  // Unit command - inspect one file
  program
    .command('unit <file>')
    .description('Show the database operations found in one unit')
    .option('--json', 'Output the unit extraction as JSON')
    .option('--unit-name <name>', 'Unit name to record (default: from the unit header)')
    .action(async (file: string, options: UnitCommandOptions) => {
      await runAction(() => unitCommand(file, options));
    });

  // Config command - show resolved configuration
  program
    .command('config')
    .description('Show the configuration that applies to a directory')
    .option('-t, --target <path>', 'Target directory (default: current directory)')
    .option('--json', 'Output as JSON')
    .action(async (options: ConfigCommandOptions) => {
      await runAction(() => configCommand(options));
    });

  return program;
}
