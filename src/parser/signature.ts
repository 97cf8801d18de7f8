/**
 * Signature Extractor
 *
 * Decomposes a `func` line from `go doc` output into receiver, name,
 * parameters, return clause and inline description.
 *
 *   func (c *Client) Get(key string) (string, error)    returns the value
 *        └receiver┘ └name└─params───┘ └──returns───┘    └─description───┘
 */

import {
  DEFAULT_DESCRIPTION_GAP,
  type FunctionRecord,
  type ScanOptions,
} from './types.js';

/**
 * `func`, optional receiver group, then an exported identifier.
 * Type parameters and the parameter group are read separately so
 * nested brackets (constraints, func-typed parameters) stay balanced.
 */
const FUNC_HEAD_PATTERN = /^func(?:\s+\(([^)]+)\))?\s+([A-Z]\w*)/;

/**
 * Read a balanced bracketed group starting at `start`.
 *
 * @returns Index just past the closing bracket, or -1 if unbalanced
 */
function readBalancedGroup(text: string, start: number, open = '(', close = ')'): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * Locate the last run of at least `gap` consecutive spaces.
 */
function findLastGap(line: string, gap: number): { start: number; end: number } | null {
  const pattern = new RegExp(` {${gap},}`, 'g');
  let last: { start: number; end: number } | null = null;
  for (const match of line.matchAll(pattern)) {
    const start = match.index ?? 0;
    last = { start, end: start + match[0].length };
  }
  return last;
}

/**
 * Render the canonical signature for a function record.
 */
export function renderSignature(
  parts: Pick<FunctionRecord, 'receiver' | 'name' | 'typeParams' | 'params' | 'returns'>
): string {
  let signature = 'func';
  if (parts.receiver) {
    signature += ` (${parts.receiver})`;
  }
  signature += ` ${parts.name}${parts.typeParams}${parts.params}`;
  if (parts.returns) {
    signature += ` ${parts.returns}`;
  }
  return signature;
}

/**
 * Extract a function record from a single documentation line.
 *
 * Lines that do not declare an exported function or method return
 * null; this is a non-match, not an error.
 */
export function extractSignature(
  line: string,
  options: Pick<ScanOptions, 'descriptionGap'> = {}
): FunctionRecord | null {
  const head = FUNC_HEAD_PATTERN.exec(line);
  if (!head) {
    return null;
  }

  const receiver = head[1] ?? '';
  const name = head[2] ?? '';

  let cursor = head[0].length;

  // Type parameters directly follow the name: Map[T any]
  let typeParams = '';
  if (line[cursor] === '[') {
    const groupEnd = readBalancedGroup(line, cursor, '[', ']');
    if (groupEnd !== -1) {
      typeParams = line.slice(cursor, groupEnd);
      cursor = groupEnd;
    }
  }
  const nameEnd = cursor;

  // Optional whitespace, then the parameter group
  while (cursor < line.length && /\s/.test(line[cursor] ?? '')) {
    cursor++;
  }

  let params = '()';
  let tailStart = nameEnd;
  if (line[cursor] === '(') {
    const groupEnd = readBalancedGroup(line, cursor);
    if (groupEnd !== -1) {
      params = line.slice(cursor, groupEnd);
      tailStart = groupEnd;
    }
  }

  // Heuristic: wide padding separates signature from comment column
  const gap = findLastGap(line, options.descriptionGap ?? DEFAULT_DESCRIPTION_GAP);
  const description = gap ? line.slice(gap.end).trim() : '';

  const tailEnd = gap && gap.start >= tailStart ? gap.start : line.length;
  const returns = line.slice(tailStart, tailEnd).trim();

  const parts = { receiver, name, typeParams, params, returns };
  return {
    ...parts,
    signature: renderSignature(parts),
    description,
  };
}
