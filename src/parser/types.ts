/**
 * Parser Types
 *
 * Records extracted from `go doc -all` output, plus the tagged line
 * classification that drives the scanner.
 */

import { z } from 'zod';
import type { Logger } from '../utils/logger.js';

/**
 * Composite type kinds recognised in documentation text.
 */
export type TypeKind = 'struct' | 'interface';

/**
 * An exported function or method.
 */
export interface FunctionRecord {
  /** Exported identifier (uppercase-leading) */
  readonly name: string;

  /** Canonical form: func (receiver) Name(params) returns */
  readonly signature: string;

  /** Inline description after a wide gap, or '' */
  readonly description: string;

  /** Receiver text without parentheses; '' for free functions */
  readonly receiver: string;

  /** Type parameter list including brackets, '' for non-generic functions */
  readonly typeParams: string;

  /** Parameter group including parentheses, '()' when absent */
  readonly params: string;

  /** Return clause, may be '' */
  readonly returns: string;
}

/**
 * An exported struct or interface.
 */
export interface TypeRecord {
  readonly name: string;
  readonly kind: TypeKind;
  readonly description: string;
  /** Rendered field lines, in documentation order */
  readonly fields: readonly string[];
  /** Embedded `func ...` lines, in documentation order */
  readonly methods: readonly string[];
}

/**
 * Everything recovered from one package's documentation text.
 */
export interface PackageRecord {
  readonly name: string;
  readonly importPath: string;
  readonly functions: readonly FunctionRecord[];
  readonly types: readonly TypeRecord[];
  readonly description: string;
}

/**
 * A rendered, self-describing text block.
 */
export type Chunk = string;

/**
 * Package metadata supplied by the caller (from `go list`).
 */
export const PackageMetaSchema = z.object({
  name: z.string().trim().min(1),
  importPath: z.string().trim().min(1),
  description: z.string().default(''),
});

export type PackageMeta = z.infer<typeof PackageMetaSchema>;

/**
 * Why a line was skipped.
 */
export type SkipReason = 'blank' | 'continuation' | 'banner' | 'unrecognized';

/**
 * Result of classifying the line at the cursor.
 *
 * `type` carries the consumed block: `nextIndex` is the first line the
 * block did not consume.
 */
export type LineClassification =
  | { kind: 'package'; name: string }
  | { kind: 'function'; record: FunctionRecord }
  | { kind: 'type'; record: TypeRecord; nextIndex: number }
  | { kind: 'skip'; reason: SkipReason };

/**
 * Tunables for the line heuristics.
 */
export interface ScanOptions {
  /** Minimum run of spaces that separates a signature from its description */
  descriptionGap?: number;

  /** Leading spaces at which a top-level line counts as a continuation */
  continuationIndent?: number;

  /** Receives debug output about skipped lines and package clauses */
  logger?: Logger;
}

/**
 * Metadata-free output of one scan.
 */
export interface ScanResult {
  /** Name from the last `package` clause seen, or '' */
  declaredPackage: string;
  functions: FunctionRecord[];
  types: TypeRecord[];
  /** Number of lines classified as skip */
  skippedLines: number;
}

export const DEFAULT_DESCRIPTION_GAP = 4;
export const DEFAULT_CONTINUATION_INDENT = 10;
