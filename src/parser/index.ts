/**
 * Parser Module
 *
 * Turns `go doc -all` text into typed package records.
 *
 * Usage:
 * ```typescript
 * import { parse } from './parser/index.js';
 *
 * const pkg = parse(docText, { name: 'cache', importPath: 'example.com/cache' });
 * // pkg.functions, pkg.types
 * ```
 */

export { parse, assemblePackage, resolvePackageMeta, type RawPackageMeta } from './assembler.js';
export { scanDocText, splitLines } from './scanner.js';
export { classifyLine, matchPackageClause, skipReasonFor } from './classifier.js';
export { extractSignature, renderSignature } from './signature.js';
export {
  extractTypeBlock,
  matchTypeDeclaration,
  isTypeBodyLine,
  renderField,
  type TypeDeclaration,
  type TypeBlockResult,
} from './type-block.js';
export {
  parseBatch,
  parsePackageInput,
  type PackageInput,
  type PackageParseResult,
  type BatchParseResult,
} from './batch.js';

export {
  PackageMetaSchema,
  DEFAULT_DESCRIPTION_GAP,
  DEFAULT_CONTINUATION_INDENT,
} from './types.js';
export type {
  TypeKind,
  FunctionRecord,
  TypeRecord,
  PackageRecord,
  PackageMeta,
  Chunk,
  SkipReason,
  LineClassification,
  ScanOptions,
  ScanResult,
} from './types.js';
