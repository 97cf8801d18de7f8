/**
 * Chunker Types
 */

/**
 * Symbol kinds a chunk can describe.
 */
export type ChunkSymbolType = 'function' | 'method' | 'struct' | 'interface';

/**
 * A chunk with the metadata an embedding store needs to file it.
 */
export interface ChunkResult {
  /** Stable id: `importPath:signature` or `importPath:type:Name` */
  id: string;

  /** The chunk text */
  content: string;

  metadata: {
    packageName: string;
    importPath: string;

    /** Function, method or type name */
    symbolName: string;

    symbolType: ChunkSymbolType;

    /** Position of this chunk within the package (0-indexed) */
    chunkIndex: number;

    /** Total number of chunks from this package */
    totalChunks: number;
  };
}
