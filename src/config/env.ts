/**
 * Environment Variable Handler
 *
 * Reads the few environment overrides godoc-extract honours.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

export const EnvSchema = z.object({
  /** Overrides the ~/.godoc-extract home directory */
  GODOC_EXTRACT_HOME: z.string().trim().min(1).optional(),
  /** Overrides output.dir from config.toml */
  GODOC_EXTRACT_OUTPUT_DIR: z.string().trim().min(1).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment (loaded once at first access).
 * _clearEnvCache() resets it for test isolation.
 */
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 * Blank values are treated as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const blankToUndefined = (value: string | undefined) =>
    value === undefined || value.trim() === '' ? undefined : value;

  _envCache = EnvSchema.parse({
    GODOC_EXTRACT_HOME: blankToUndefined(process.env.GODOC_EXTRACT_HOME),
    GODOC_EXTRACT_OUTPUT_DIR: blankToUndefined(process.env.GODOC_EXTRACT_OUTPUT_DIR),
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the cached environment. For tests only.
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
