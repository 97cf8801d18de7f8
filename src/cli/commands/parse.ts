/**
 * Parse Command
 *
 * Parses one captured `go doc -all` output file:
 *   godoc-extract parse cache.txt -n cache -i example.com/cache
 *   godoc-extract --json parse cache.txt -n cache -i example.com/cache
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { parse, type PackageRecord } from '../../parser/index.js';
import type { CommandContext, PackageMetaOptions } from '../types.js';
import { loadRuntime, readDocFile, withPackageMetaOptions } from '../utils/doc-input.js';

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Human-readable summary of a package record.
 */
export function formatSummary(pkg: PackageRecord): string[] {
  const lines: string[] = [
    `${chalk.bold(`Package ${pkg.name}`)} ${chalk.dim(`(${pkg.importPath})`)}`,
    `  ${plural(pkg.functions.length, 'function')}, ${plural(pkg.types.length, 'type')}`,
  ];

  if (pkg.functions.length > 0) {
    lines.push('', chalk.dim('Functions:'));
    for (const fn of pkg.functions) {
      lines.push(`  ${fn.signature}`);
      if (fn.description) {
        lines.push(`    ${chalk.dim(fn.description)}`);
      }
    }
  }

  if (pkg.types.length > 0) {
    lines.push('', chalk.dim('Types:'));
    for (const type of pkg.types) {
      lines.push(
        `  ${type.name} (${type.kind}, ${plural(type.fields.length, 'field')}, ${plural(type.methods.length, 'method')})`
      );
    }
  }

  return lines;
}

export function createParseCommand(getContext: () => CommandContext): Command {
  return withPackageMetaOptions(
    new Command('parse')
      .description('Parse go doc output into package records')
      .argument('<doc-file>', 'File holding `go doc -all` output')
  ).action((docFile: string, options: PackageMetaOptions) => {
    const ctx = getContext();
    const { scanOptions } = loadRuntime(ctx);

    const pkg = parse(readDocFile(docFile), options, scanOptions);
    ctx.debug(`Parsed ${docFile}: ${pkg.functions.length} functions, ${pkg.types.length} types`);

    if (ctx.options.json) {
      console.log(JSON.stringify(pkg, null, 2));
      return;
    }

    for (const line of formatSummary(pkg)) {
      ctx.log(line);
    }
  });
}
