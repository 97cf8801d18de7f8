/**
 * godoc-extract - Library Entry Point
 *
 * Parses `go doc -all` output into function, type and package records
 * and renders them as text chunks.
 *
 * @example
 * ```typescript
 * import { parse, format } from 'godoc-extract';
 *
 * const pkg = parse(docText, {
 *   name: 'cache',
 *   importPath: 'example.com/cache',
 *   description: 'Package cache provides an in-memory cache.',
 * });
 * const chunks = format(pkg);
 * ```
 *
 * The CLI (`godoc-extract`) wraps the same functions with config,
 * manifests and the document store.
 *
 * @packageDocumentation
 */

// Parser
export * from './parser/index.js';

// Chunk formatting
export * from './chunker/index.js';
export { formatPackage as format } from './chunker/index.js';

// API items and document store
export * from './items/index.js';
export * from './store/index.js';
export {
  loadManifest,
  parseManifest,
  entryToInput,
  ManifestEntrySchema,
  ManifestSchema,
  type ManifestEntry,
} from './manifest/loader.js';

// Configuration
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  toScanOptions,
  resolveOutputDir,
  ConfigSchema,
  DEFAULT_CONFIG,
  type Config,
} from './config/index.js';

// Errors and logging
export * from './errors/index.js';
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
