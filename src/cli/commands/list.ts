/**
 * List Command
 *
 * Dry run over a package manifest: one tab-separated line per API item
 * (version, import path, kind, package, signature).
 *   godoc-extract list packages.json
 *   godoc-extract ls packages.json --max-items 20
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { parseBatch } from '../../parser/index.js';
import { collectApiItems, limitItems, type ApiItem } from '../../items/index.js';
import { loadManifest } from '../../manifest/loader.js';
import type { CommandContext } from '../types.js';
import { loadRuntime } from '../utils/doc-input.js';
import { DEFAULT_VERSION_KEY, parseMaxItems } from '../utils/options.js';

interface ListOptions {
  versionKey: string;
  maxItems?: number;
}

/**
 * Render one item as a tab-separated line.
 */
export function formatItemLine(versionKey: string, item: ApiItem): string {
  return [versionKey, item.importPath, item.kind, item.package, item.signature].join('\t');
}

export function createListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List the API items found in a package manifest')
    .argument('<manifest>', 'JSON manifest of captured go doc outputs')
    .option('--version-key <key>', 'Version label printed with each item', DEFAULT_VERSION_KEY)
    .option('--max-items <n>', 'Maximum number of items (0 = no limit)', parseMaxItems)
    .action((manifest: string, options: ListOptions) => {
      const ctx = getContext();
      const { config, scanOptions } = loadRuntime(ctx);

      const batch = parseBatch(loadManifest(manifest), scanOptions);
      const maxItems = options.maxItems ?? config.output.max_items;
      const items = limitItems(collectApiItems(batch.packages), maxItems);
      ctx.debug(`${batch.successCount} package(s) parsed, ${batch.failureCount} failed`);

      if (ctx.options.json) {
        console.log(JSON.stringify({
          version: options.versionKey,
          count: items.length,
          items,
          errors: batch.errors,
        }, null, 2));
        return;
      }

      for (const item of items) {
        ctx.log(formatItemLine(options.versionKey, item));
      }

      if (batch.failureCount > 0) {
        ctx.log(chalk.dim(`${batch.failureCount} package(s) skipped, see warnings above`));
      }
    });
}
