/**
 * Export Command
 *
 * Writes one markdown document per API item into the document store:
 *   godoc-extract export packages.json --repo acme/cache
 *   godoc-extract export packages.json --repo acme/cache --version-key v1.2.0-abc123 --force
 *
 * Existing documents are kept unless --force is given.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { parseBatch } from '../../parser/index.js';
import { collectDocEntries, limitItems } from '../../items/index.js';
import { loadManifest } from '../../manifest/loader.js';
import { DocStore, repoSlugFromSource } from '../../store/index.js';
import { resolveOutputDir } from '../../config/index.js';
import type { CommandContext } from '../types.js';
import { loadRuntime } from '../utils/doc-input.js';
import { DEFAULT_VERSION_KEY, parseMaxItems } from '../utils/options.js';

interface ExportOptions {
  repo: string;
  versionKey: string;
  output?: string;
  force: boolean;
  maxItems?: number;
}

/**
 * Counts reported at the end of an export.
 */
export interface ExportSummary {
  repo: string;
  version: string;
  outputDir: string;
  written: number;
  skipped: number;
  failedPackages: number;
}

export function createExportCommand(getContext: () => CommandContext): Command {
  return new Command('export')
    .description('Write API item documents for a package manifest')
    .argument('<manifest>', 'JSON manifest of captured go doc outputs')
    .requiredOption('-r, --repo <source>', 'Repository (owner/repo, GitHub URL or local path)')
    .option('--version-key <key>', 'Version directory for the documents', DEFAULT_VERSION_KEY)
    .option('-o, --output <dir>', 'Output directory (default: output.dir from config)')
    .option('-f, --force', 'Overwrite documents that already exist', false)
    .option('--max-items <n>', 'Maximum number of items (0 = no limit)', parseMaxItems)
    .action((manifest: string, options: ExportOptions) => {
      const ctx = getContext();
      const { config, scanOptions } = loadRuntime(ctx);

      const batch = parseBatch(loadManifest(manifest), scanOptions);
      const entries = limitItems(
        collectDocEntries(batch.packages),
        options.maxItems ?? config.output.max_items
      );

      const summary: ExportSummary = {
        repo: repoSlugFromSource(options.repo),
        version: options.versionKey,
        outputDir: options.output ?? resolveOutputDir(config),
        written: 0,
        skipped: 0,
        failedPackages: batch.failureCount,
      };

      const store = new DocStore(summary.outputDir, { logger: ctx });

      for (const { item, content } of entries) {
        if (!options.force && store.exists(summary.repo, summary.version, item)) {
          ctx.debug(`Skipping existing ${item.itemId}`);
          summary.skipped++;
          continue;
        }
        const doc = store.createDoc(item, content, config.output.generator);
        const written = store.upsert(summary.repo, summary.version, doc);
        ctx.debug(`Wrote ${written}`);
        summary.written++;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...summary, errors: batch.errors }, null, 2));
        return;
      }

      ctx.log(`${chalk.green('✓')} Wrote ${summary.written} document(s) to ${chalk.cyan(summary.outputDir)}`);
      if (summary.skipped > 0) {
        ctx.log(chalk.dim(`${summary.skipped} existing document(s) kept (use --force to overwrite)`));
      }
      if (summary.failedPackages > 0) {
        ctx.log(chalk.yellow(`${summary.failedPackages} package(s) could not be parsed`));
      }
    });
}
