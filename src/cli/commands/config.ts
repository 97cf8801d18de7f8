/**
 * Config Command
 *
 * Manages ~/.godoc-extract/config.toml:
 *   godoc-extract config get <key>          - Get a specific value
 *   godoc-extract config set <key> <value>  - Set a value
 *   godoc-extract config list               - Show all configuration
 *   godoc-extract config path               - Show config file location
 *   godoc-extract config reset --force      - Restore defaults
 *
 * Invalid files and rejected values surface as ConfigError through the
 * global error handler.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
} from '../../config/index.js';
import type { CommandContext } from '../types.js';

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., godoc-extract config get parser.description_gap)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log('');
        ctx.log(`Run ${chalk.cyan('godoc-extract config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., godoc-extract config set output.max_items 50)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by section
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        fs.unlinkSync(configPath);
      }
      loadConfig(true);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
      } else {
        ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}
