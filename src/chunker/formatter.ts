/**
 * Chunk Formatter
 *
 * Renders package records into standalone text blocks for embedding.
 * Each chunk repeats the package name so it can be retrieved on its own.
 */

import type { Chunk, FunctionRecord, PackageRecord, TypeRecord } from '../parser/types.js';
import type { ChunkResult, ChunkSymbolType } from './types.js';

/**
 * Placeholder line for a type with no exported fields.
 */
export const NO_FIELDS_PLACEHOLDER = '  (no exported fields)';

/**
 * Render one function or method.
 */
export function formatFunctionChunk(packageName: string, fn: FunctionRecord): Chunk {
  return [
    `Package: ${packageName}`,
    `Function: ${fn.name}`,
    `Signature: ${fn.signature}`,
    `Description: ${fn.description}`,
  ].join('\n').trim();
}

/**
 * Render one struct or interface. The methods section is only present
 * when the type lists at least one method.
 */
export function formatTypeChunk(packageName: string, type: TypeRecord): Chunk {
  const fields = type.fields.length > 0 ? type.fields.join('\n') : NO_FIELDS_PLACEHOLDER;

  let chunk = [
    `Package: ${packageName}`,
    `Type: ${type.name}`,
    `Kind: ${type.kind}`,
    'Fields:',
    fields,
  ].join('\n').trim();

  if (type.methods.length > 0) {
    chunk += `\nMethods:\n${type.methods.join('\n')}`;
  }

  return chunk;
}

/**
 * Render every record of a package: functions first, then types, each
 * in record order.
 */
export function formatPackage(pkg: PackageRecord): Chunk[] {
  return [
    ...pkg.functions.map((fn) => formatFunctionChunk(pkg.name, fn)),
    ...pkg.types.map((type) => formatTypeChunk(pkg.name, type)),
  ];
}

/**
 * Render a package into chunks with retrieval metadata attached.
 *
 * Ids are derived from the import path and symbol, so re-rendering the
 * same record produces the same ids.
 */
export function formatPackageChunks(pkg: PackageRecord): ChunkResult[] {
  const entries: Array<Omit<ChunkResult, 'metadata'> & { symbolName: string; symbolType: ChunkSymbolType }> = [
    ...pkg.functions.map((fn) => ({
      id: `${pkg.importPath}:${fn.signature}`,
      content: formatFunctionChunk(pkg.name, fn),
      symbolName: fn.name,
      symbolType: fn.receiver ? ('method' as const) : ('function' as const),
    })),
    ...pkg.types.map((type) => ({
      id: `${pkg.importPath}:type:${type.name}`,
      content: formatTypeChunk(pkg.name, type),
      symbolName: type.name,
      symbolType: type.kind,
    })),
  ];

  return entries.map(({ id, content, symbolName, symbolType }, chunkIndex) => ({
    id,
    content,
    metadata: {
      packageName: pkg.name,
      importPath: pkg.importPath,
      symbolName,
      symbolType,
      chunkIndex,
      totalChunks: entries.length,
    },
  }));
}
