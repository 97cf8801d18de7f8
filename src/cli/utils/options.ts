/**
 * Option parsers shared by manifest commands.
 */

import { InvalidArgumentError } from 'commander';

/** Version label used when none is given (no tag, unknown commit) */
export const DEFAULT_VERSION_KEY = 'untagged-unknown';

/**
 * Commander argument parser for --max-items.
 */
export function parseMaxItems(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}
