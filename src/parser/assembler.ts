/**
 * Package Assembler
 *
 * Joins caller-supplied package metadata with the records of one scan.
 * Metadata is validated up front by resolvePackageMeta; assembly itself
 * cannot fail.
 */

import { MetadataUnavailableError } from '../errors/index.js';
import { scanDocText } from './scanner.js';
import {
  PackageMetaSchema,
  type PackageMeta,
  type PackageRecord,
  type ScanOptions,
  type ScanResult,
} from './types.js';

/**
 * Raw metadata as it arrives from the caller or a manifest.
 * Both camelCase and snake_case import path keys are accepted.
 */
export interface RawPackageMeta {
  name?: string | null;
  importPath?: string | null;
  import_path?: string | null;
  description?: string | null;
}

/**
 * Validate package metadata.
 *
 * @param raw - Metadata from the external collaborator
 * @param source - Where the metadata came from, for the error message
 * @throws MetadataUnavailableError if name or import path is missing/blank
 */
export function resolvePackageMeta(
  raw: RawPackageMeta | null | undefined,
  source?: string
): PackageMeta {
  const candidate = {
    name: raw?.name ?? undefined,
    importPath: raw?.importPath ?? raw?.import_path ?? undefined,
    description: raw?.description ?? undefined,
  };

  const result = PackageMetaSchema.safeParse(candidate);
  if (!result.success) {
    const missing = [
      ...new Set(result.error.issues.map((issue) => String(issue.path[0] ?? 'metadata'))),
    ];
    throw new MetadataUnavailableError(missing, source);
  }
  return result.data;
}

/**
 * Build a PackageRecord from validated metadata and a scan result.
 *
 * The record always takes its name from the metadata; a differing
 * `package` clause in the text is only reported.
 */
export function assemblePackage(
  meta: PackageMeta,
  scan: ScanResult,
  options: Pick<ScanOptions, 'logger'> = {}
): PackageRecord {
  if (scan.declaredPackage && scan.declaredPackage !== meta.name) {
    options.logger?.warn(
      `${meta.importPath}: documentation declares package '${scan.declaredPackage}', metadata says '${meta.name}'`
    );
  }

  return {
    name: meta.name,
    importPath: meta.importPath,
    functions: [...scan.functions],
    types: [...scan.types],
    description: meta.description,
  };
}

/**
 * Parse one package's documentation text.
 *
 * @param docText - Raw `go doc -all` output
 * @param meta - Package name and import path from `go list`
 * @throws MetadataUnavailableError if the metadata is incomplete
 */
export function parse(
  docText: string,
  meta: RawPackageMeta,
  options: ScanOptions = {}
): PackageRecord {
  const resolved = resolvePackageMeta(meta);
  return assemblePackage(resolved, scanDocText(docText, options), options);
}
