/**
 * Chunks Command
 *
 * Prints the embedding chunks for one captured `go doc -all` output:
 *   godoc-extract chunks cache.txt -n cache -i example.com/cache
 *   godoc-extract --json chunks cache.txt -n cache -i example.com/cache
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { parse } from '../../parser/index.js';
import { formatPackageChunks } from '../../chunker/index.js';
import type { CommandContext, PackageMetaOptions } from '../types.js';
import { loadRuntime, readDocFile, withPackageMetaOptions } from '../utils/doc-input.js';

/** Printed between chunks in text mode */
export const CHUNK_SEPARATOR = '---';

export function createChunksCommand(getContext: () => CommandContext): Command {
  return withPackageMetaOptions(
    new Command('chunks')
      .description('Render go doc output as embedding chunks')
      .argument('<doc-file>', 'File holding `go doc -all` output')
  ).action((docFile: string, options: PackageMetaOptions) => {
    const ctx = getContext();
    const { scanOptions } = loadRuntime(ctx);

    const chunks = formatPackageChunks(parse(readDocFile(docFile), options, scanOptions));

    if (ctx.options.json) {
      console.log(JSON.stringify(chunks, null, 2));
      return;
    }

    if (chunks.length === 0) {
      ctx.log(chalk.yellow('No exported functions or types found.'));
      return;
    }

    chunks.forEach((chunk, i) => {
      if (i > 0) ctx.log(CHUNK_SEPARATOR);
      ctx.log(chunk.content);
    });
  });
}
