/**
 * godoc-extract CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createParseCommand } from './commands/parse.js';
import { createChunksCommand } from './commands/chunks.js';
import { createListCommand } from './commands/list.js';
import { createExportCommand } from './commands/export.js';
import { createConfigCommand } from './commands/config.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

const VERSION = process.env.GODOC_EXTRACT_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('godoc-extract')
  .description('Extract structured API records from `go doc -all` output')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('go doc -all ./cache > cache.txt')}
  ${chalk.cyan('godoc-extract parse cache.txt -n cache -i example.com/cache')}    Show functions and types
  ${chalk.cyan('godoc-extract chunks cache.txt -n cache -i example.com/cache')}   Print text chunks
  ${chalk.cyan('godoc-extract list packages.json')}                               List API items
  ${chalk.cyan('godoc-extract export packages.json --repo acme/cache')}           Write item documents
  ${chalk.cyan('godoc-extract config set parser.description_gap 3')}              Change a setting
`);

/**
 * Create a command context with logging utilities.
 * Passed to all command handlers.
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores global options on the root command after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createParseCommand(getContext));
program.addCommand(createChunksCommand(getContext));
program.addCommand(createListCommand(getContext));
program.addCommand(createExportCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: godoc-extract --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every command handler
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
