/**
 * Error handler for CLI error formatting and display
 *
 * - Colored output for the terminal
 * - JSON output for scripts
 * - Verbose mode with stack traces
 */

import chalk from 'chalk';
import { CLIError, MetadataUnavailableError, StoreError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  missing?: string[];
  cause?: string;
  stack?: string;
}

function toErrorOutput(error: Error, verbose: boolean): ErrorOutput {
  const output: ErrorOutput = {
    error: error.message,
    code: getExitCode(error),
  };
  if (error instanceof CLIError && error.hint) {
    output.hint = error.hint;
  }
  if (error instanceof MetadataUnavailableError) {
    output.missing = error.missing;
  }
  if (error instanceof StoreError && error.originalError) {
    output.cause = error.originalError.message;
  }
  if (verbose && error.stack) {
    output.stack = error.stack;
  }
  return output;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * exiting the process.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    if (json) {
      return JSON.stringify({ error: String(error), code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  if (json) {
    return JSON.stringify(toErrorOutput(error, verbose), null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  if (error instanceof CLIError) {
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
    if (error instanceof StoreError && error.originalError) {
      lines.push(chalk.dim('Cause: ') + error.originalError.message);
    }
  } else if (!verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error. CLIError carries its own, everything
 * else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
