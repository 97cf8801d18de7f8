/**
 * Shared input handling for commands that read documentation text.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';

import { FileNotFoundError } from '../../errors/index.js';
import { loadConfig, toScanOptions, type Config } from '../../config/index.js';
import type { ScanOptions } from '../../parser/index.js';
import type { CommandContext } from '../types.js';

/**
 * Read a captured `go doc -all` output file.
 *
 * @throws FileNotFoundError if the file does not exist
 */
export function readDocFile(docFile: string): string {
  const resolved = path.resolve(docFile);
  if (!fs.existsSync(resolved)) {
    throw new FileNotFoundError(resolved);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

/**
 * Add the --name / --import-path / --description options.
 */
export function withPackageMetaOptions(command: Command): Command {
  return command
    .option('-n, --name <name>', 'Package name (from go list)')
    .option('-i, --import-path <path>', 'Package import path (from go list)')
    .option('-d, --description <text>', 'Package synopsis');
}

/**
 * Load config and derive parser options wired to the command's logger.
 */
export function loadRuntime(ctx: CommandContext): { config: Config; scanOptions: ScanOptions } {
  const config = loadConfig();
  ctx.debug(
    `parser: description_gap=${config.parser.description_gap}, continuation_indent=${config.parser.continuation_indent}`
  );
  return { config, scanOptions: toScanOptions(config, ctx) };
}
