/**
 * Batch Parsing
 *
 * Parses several packages in sequence with per-package result
 * reporting. A package whose metadata is unavailable is recorded as a
 * failure and the batch moves on to the next one.
 */

import { assemblePackage, resolvePackageMeta, type RawPackageMeta } from './assembler.js';
import { scanDocText } from './scanner.js';
import type { PackageRecord, ScanOptions, ScanResult } from './types.js';

/**
 * One package to parse.
 */
export interface PackageInput {
  /** Label used in messages (manifest path, import path, ...) */
  source: string;

  /** Metadata as supplied; validated per package */
  meta: RawPackageMeta;

  /** Documentation text, or null when it could not be obtained */
  docText: string | null;

  /** Why docText is null */
  loadError?: string;
}

/**
 * Outcome for a single package.
 */
export interface PackageParseResult {
  source: string;
  success: boolean;

  /** Present when success is true */
  record?: PackageRecord;

  /** Scan output, present whenever the text was available */
  scan?: ScanResult;

  /** Failure description when success is false */
  error?: string;
}

/**
 * Aggregated outcome of a batch.
 */
export interface BatchParseResult {
  results: PackageParseResult[];

  /** Successful records, in input order */
  packages: PackageRecord[];

  successCount: number;
  failureCount: number;
  totalFunctions: number;
  totalTypes: number;

  /** `source: message` for every failure */
  errors: string[];

  /** Warnings raised while assembling, each naming its import path */
  warnings: string[];
}

/**
 * Parse one input without throwing.
 */
export function parsePackageInput(
  input: PackageInput,
  options: ScanOptions = {},
  onWarning: (message: string) => void = () => {}
): PackageParseResult {
  if (input.docText === null) {
    return {
      source: input.source,
      success: false,
      error: input.loadError ?? 'documentation text unavailable',
    };
  }

  const scan = scanDocText(input.docText, options);

  try {
    const meta = resolvePackageMeta(input.meta);
    const record = assemblePackage(meta, scan, {
      logger: {
        warn: (message) => {
          onWarning(message);
          options.logger?.warn(message);
        },
        debug: options.logger?.debug,
      },
    });
    return { source: input.source, success: true, record, scan };
  } catch (error) {
    return {
      source: input.source,
      success: false,
      scan,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Parse packages in order; failures never abort the remaining inputs.
 */
export function parseBatch(
  inputs: readonly PackageInput[],
  options: ScanOptions = {}
): BatchParseResult {
  const batch: BatchParseResult = {
    results: [],
    packages: [],
    successCount: 0,
    failureCount: 0,
    totalFunctions: 0,
    totalTypes: 0,
    errors: [],
    warnings: [],
  };

  for (const input of inputs) {
    const result = parsePackageInput(input, options, (message) => {
      batch.warnings.push(message);
    });
    batch.results.push(result);

    if (result.success && result.record) {
      batch.successCount++;
      batch.packages.push(result.record);
      batch.totalFunctions += result.record.functions.length;
      batch.totalTypes += result.record.types.length;
    } else {
      batch.failureCount++;
      options.logger?.warn(`${input.source}: ${result.error ?? 'unknown error'}`);
      batch.errors.push(`${input.source}: ${result.error ?? 'unknown error'}`);
    }
  }

  return batch;
}
