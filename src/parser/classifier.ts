/**
 * Line Classifier
 *
 * Decides what the line at the cursor declares. Each rule is a small
 * named matcher; they are tried in order and the first hit wins:
 *
 *   package clause → skippable line → function → type block → skip
 *
 * Only the type rule looks past the current line, and only forward.
 */

import { extractSignature } from './signature.js';
import { extractTypeBlock } from './type-block.js';
import {
  DEFAULT_CONTINUATION_INDENT,
  type LineClassification,
  type ScanOptions,
  type SkipReason,
} from './types.js';

const PACKAGE_PATTERN = /^package\s+(\S+)/;

/**
 * Section banners printed by `go doc -all` between declaration groups.
 */
const SECTION_BANNERS = new Set(['CONSTANTS', 'VARIABLES', 'FUNCTIONS', 'TYPES']);

/**
 * A classification rule. Returns null to pass to the next rule.
 */
type LineRule = (
  line: string,
  lines: readonly string[],
  index: number,
  options: ScanOptions
) => LineClassification | null;

/**
 * Extract the package name from a `package` clause.
 */
export function matchPackageClause(line: string): string | null {
  const match = PACKAGE_PATTERN.exec(line);
  return match?.[1] ?? null;
}

/**
 * Decide whether a top-level line carries no declaration.
 *
 * @returns The reason to skip, or null if the line should be matched further
 */
export function skipReasonFor(
  line: string,
  continuationIndent: number = DEFAULT_CONTINUATION_INDENT
): SkipReason | null {
  if (line === '') return 'blank';
  if (line.startsWith(' '.repeat(continuationIndent))) return 'continuation';
  if (SECTION_BANNERS.has(line)) return 'banner';
  return null;
}

const packageRule: LineRule = (line) => {
  const name = matchPackageClause(line);
  return name === null ? null : { kind: 'package', name };
};

const skipRule: LineRule = (line, _lines, _index, options) => {
  const reason = skipReasonFor(line, options.continuationIndent);
  return reason === null ? null : { kind: 'skip', reason };
};

const functionRule: LineRule = (line, _lines, _index, options) => {
  const record = extractSignature(line, options);
  return record === null ? null : { kind: 'function', record };
};

const typeRule: LineRule = (_line, lines, index) => {
  const block = extractTypeBlock(lines, index);
  return block === null
    ? null
    : { kind: 'type', record: block.record, nextIndex: block.nextIndex };
};

const RULES: readonly LineRule[] = [packageRule, skipRule, functionRule, typeRule];

/**
 * Classify the line at `index`.
 *
 * Trailing whitespace is ignored. A line matching no rule is skipped
 * as `unrecognized`; malformed input is never an error.
 */
export function classifyLine(
  lines: readonly string[],
  index: number,
  options: ScanOptions = {}
): LineClassification {
  const line = (lines[index] ?? '').trimEnd();

  for (const rule of RULES) {
    const result = rule(line, lines, index, options);
    if (result !== null) {
      return result;
    }
  }

  return { kind: 'skip', reason: 'unrecognized' };
}
