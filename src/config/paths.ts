/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.godoc-extract/       (or $GODOC_EXTRACT_HOME)
 * └── config.toml         (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const DEFAULT_HOME_DIR = join(homedir(), '.godoc-extract');

/**
 * Get the home directory, honouring GODOC_EXTRACT_HOME.
 */
export function getHomeDir(): string {
  return getEnv('GODOC_EXTRACT_HOME') ?? DEFAULT_HOME_DIR;
}

/**
 * Get the config file path (<home>/config.toml)
 */
export function getConfigPath(): string {
  return join(getHomeDir(), 'config.toml');
}
