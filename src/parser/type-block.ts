/**
 * Type Block Extractor
 *
 * Recovers struct/interface bodies from `go doc` output. Bodies have no
 * reliable closing marker in the text stream, so the block is delimited
 * by indentation alone: it runs until the first line at column zero.
 */

import type { TypeKind, TypeRecord } from './types.js';

/** Type parameters, if any, sit between the name and the kind: List[T any] */
const TYPE_DECL_PATTERN = /^type\s+([A-Z]\w*)(?:\[.*\])?\s+(struct|interface)\s*\{?/;

/** fieldName fieldType [trailing text] */
const FIELD_PATTERN = /^(\w+)\s+(\S+)(?:\s+(.*))?$/;

/**
 * A matched `type Name struct|interface` header.
 */
export interface TypeDeclaration {
  name: string;
  kind: TypeKind;
}

/**
 * A consumed type block.
 */
export interface TypeBlockResult {
  record: TypeRecord;
  /** Index of the `type` line */
  startLine: number;
  /** First index the block did not consume */
  nextIndex: number;
}

/**
 * Explicit state while inside a type body.
 */
interface TypeBlockState {
  /** Index of the `type` line that opened the block */
  startLine: number;
  /** Index of the next line to examine */
  cursor: number;
  fields: string[];
  methods: string[];
}

/**
 * Match a type declaration header.
 */
export function matchTypeDeclaration(line: string): TypeDeclaration | null {
  const match = TYPE_DECL_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const kind = match[2] === 'interface' ? 'interface' : 'struct';
  return { name: match[1] ?? '', kind };
}

/**
 * Whether a line still belongs to the open type body.
 * Tabs and spaces both count as indentation.
 */
export function isTypeBodyLine(line: string): boolean {
  return line.startsWith(' ') || line.startsWith('\t');
}

/**
 * Render one field declaration.
 *
 * `Timeout int // seconds` and `Timeout int    seconds` both render as
 * `Timeout int // seconds`; lines that do not split keep their text.
 */
export function renderField(content: string): string {
  const match = FIELD_PATTERN.exec(content);
  if (!match) {
    return content;
  }

  const [, fieldName, fieldType, rest] = match;
  const description = (rest ?? '').replace(/^\/\/+\s*/, '').trim();
  if (!description) {
    return content;
  }
  return `${fieldName} ${fieldType} // ${description}`;
}

/**
 * Classify one consumed body line into the block state.
 */
function consumeBodyLine(state: TypeBlockState, raw: string): void {
  const content = raw.trim();

  if (!content || content.startsWith('//')) {
    return;
  }

  if (/^func\b/.test(content)) {
    state.methods.push(content);
    return;
  }

  state.fields.push(renderField(content));
}

/**
 * Extract a type record starting at `index`.
 *
 * @param lines - All lines of the documentation text
 * @param index - Index of the candidate `type` line
 * @returns The record and the first unconsumed index, or null if the
 *   line is not an exported struct/interface declaration
 */
export function extractTypeBlock(
  lines: readonly string[],
  index: number
): TypeBlockResult | null {
  const declaration = matchTypeDeclaration(lines[index] ?? '');
  if (!declaration) {
    return null;
  }

  const state: TypeBlockState = {
    startLine: index,
    cursor: index + 1,
    fields: [],
    methods: [],
  };

  while (state.cursor < lines.length) {
    const line = lines[state.cursor] ?? '';
    if (!isTypeBodyLine(line)) {
      break;
    }
    consumeBodyLine(state, line);
    state.cursor++;
  }

  return {
    record: {
      name: declaration.name,
      kind: declaration.kind,
      description: '',
      fields: state.fields,
      methods: state.methods,
    },
    startLine: state.startLine,
    nextIndex: state.cursor,
  };
}
