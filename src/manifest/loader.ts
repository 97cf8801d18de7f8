/**
 * Package Manifest Loader
 *
 * A manifest lists packages whose `go doc -all` output has already been
 * captured to files:
 *
 * ```json
 * [
 *   { "name": "cache", "import_path": "example.com/cache", "doc_file": "cache.txt" }
 * ]
 * ```
 *
 * `doc_file` is resolved relative to the manifest. Metadata is left
 * unvalidated here so that one incomplete entry fails on its own during
 * batch parsing.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import type { PackageInput } from '../parser/batch.js';

export const ManifestEntrySchema = z.object({
  name: z.string().optional(),
  import_path: z.string().optional(),
  description: z.string().optional(),
  doc_file: z.string().min(1),
});

export const ManifestSchema = z.array(ManifestEntrySchema);

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/**
 * Parse and validate manifest JSON text.
 *
 * @throws ValidationError on invalid JSON or entries
 */
export function parseManifest(json: string, manifestPath: string): ManifestEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid JSON in manifest ${manifestPath}`, [message]);
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Invalid manifest ${manifestPath}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Turn a manifest entry into a batch input, reading its doc file.
 * An unreadable doc file becomes a per-package load error.
 */
export function entryToInput(entry: ManifestEntry, baseDir: string): PackageInput {
  const docPath = path.resolve(baseDir, entry.doc_file);
  const source = entry.import_path || entry.name || entry.doc_file;
  const meta = {
    name: entry.name,
    importPath: entry.import_path,
    description: entry.description,
  };

  try {
    return { source, meta, docText: fs.readFileSync(docPath, 'utf-8') };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { source, meta, docText: null, loadError: `cannot read ${docPath}: ${message}` };
  }
}

/**
 * Load a manifest file into batch inputs.
 *
 * @throws FileNotFoundError if the manifest does not exist
 * @throws ValidationError if the manifest is malformed
 */
export function loadManifest(manifestPath: string): PackageInput[] {
  const resolved = path.resolve(manifestPath);
  if (!fs.existsSync(resolved)) {
    throw new FileNotFoundError(resolved);
  }

  const entries = parseManifest(fs.readFileSync(resolved, 'utf-8'), resolved);
  const baseDir = path.dirname(resolved);
  return entries.map((entry) => entryToInput(entry, baseDir));
}
