/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the home directory
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';

import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getEnv } from './env.js';
import { getConfigPath, getHomeDir } from './paths.js';
import { ConfigError } from '../errors/index.js';
import type { ScanOptions } from '../parser/types.js';
import type { Logger } from '../utils/logger.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

function getValueAtPath(root: unknown, key: string): unknown {
  let current: unknown = root;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Read and parse config.toml into a plain record.
 */
function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load the config file and merge it over the defaults.
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(getHomeDir(), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema (allows missing fields)
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Fix ${configPath} or delete it to restore defaults`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('parser.description_gap') => 4
 */
export function getConfigValue(key: string, config: Config = loadConfig()): unknown {
  return getValueAtPath(config, key);
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write the file back.
 *
 * @throws ConfigError for unknown keys or values the schema rejects
 */
export function setConfigValue(key: string, value: string): void {
  if (getValueAtPath(DEFAULT_CONFIG, key) === undefined || isPlainObject(getValueAtPath(DEFAULT_CONFIG, key))) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const configPath = getConfigPath();
  const stored = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  const update: Record<string, unknown> = {};
  const parts = key.split('.');
  let current = update;
  parts.forEach((part, i) => {
    if (i === parts.length - 1) {
      current[part] = parseValue(value);
    } else {
      const next: Record<string, unknown> = {};
      current[part] = next;
      current = next;
    }
  });

  // Validate the complete config before saving
  const result = ConfigSchema.safeParse(deepMerge(deepMerge(DEFAULT_CONFIG, stored), update));
  if (!result.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(result.error.issues)}`,
      'Run: godoc-extract config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(result.data), 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['parser.description_gap', 4]
 */
export function listConfig(config: Config = loadConfig()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * Parser options from config, with an optional logger attached.
 */
export function toScanOptions(config: Config, logger?: Logger): ScanOptions {
  return {
    descriptionGap: config.parser.description_gap,
    continuationIndent: config.parser.continuation_indent,
    logger,
  };
}

/**
 * Output directory, honouring GODOC_EXTRACT_OUTPUT_DIR.
 */
export function resolveOutputDir(config: Config): string {
  return getEnv('GODOC_EXTRACT_OUTPUT_DIR') ?? config.output.dir;
}
