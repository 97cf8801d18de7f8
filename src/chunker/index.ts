/**
 * Chunker Module
 *
 * Renders parsed packages into text chunks ready for embedding.
 *
 * Usage:
 * ```typescript
 * import { parse } from '../parser/index.js';
 * import { formatPackage } from './index.js';
 *
 * const chunks = formatPackage(parse(docText, meta));
 * ```
 */

export {
  formatPackage,
  formatPackageChunks,
  formatFunctionChunk,
  formatTypeChunk,
  NO_FIELDS_PLACEHOLDER,
} from './formatter.js';

export type { ChunkResult, ChunkSymbolType } from './types.js';
