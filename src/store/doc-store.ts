/**
 * Document Store
 *
 * Files one markdown document per API item and keeps a per-version
 * index.json next to them:
 *
 *   <base>/<repo>/<version>/index.json
 *   <base>/<repo>/<version>/<package>/<kind>/<name>.md
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { StoreError } from '../errors/index.js';
import type { ApiItem } from '../items/collect.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { safeSlug } from './slug.js';

/**
 * A rendered document for one item.
 */
export interface GeneratedDoc {
  item: ApiItem;
  content: string;
  /** RFC 3339 UTC timestamp */
  generatedAt: string;
  generator: string;
  model: string;
}

const IndexItemSchema = z.object({
  id: z.string(),
  kind: z.string(),
  name: z.string(),
  package: z.string(),
  import_path: z.string(),
  signature: z.string(),
  path: z.string(),
  generated_at: z.string(),
  generator: z.string(),
  model: z.string(),
});

const IndexFileSchema = z.object({
  repo: z.string(),
  version: z.string(),
  updated_at: z.string(),
  items: z.array(IndexItemSchema),
});

export type IndexItem = z.infer<typeof IndexItemSchema>;
export type IndexFile = z.infer<typeof IndexFileSchema>;

export interface DocStoreOptions {
  /** Clock, for timestamps */
  now?: () => Date;
  /** Receives index warnings; defaults to the console */
  logger?: Logger;
}

/**
 * Format a date as RFC 3339 at second precision (2024-01-02T03:04:05Z).
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class DocStore {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    public readonly baseDir: string,
    options: DocStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Path of the markdown document for an item.
   * Methods are filed as `<receiver>_<name>` so same-named methods on
   * different receivers don't collide.
   */
  docPath(repoSlug: string, version: string, item: ApiItem): string {
    const fileName = item.kind === 'method' && item.receiver
      ? `${item.receiver}_${item.name}`
      : item.name;

    return path.join(
      this.baseDir,
      repoSlug,
      safeSlug(version),
      safeSlug(item.package),
      safeSlug(item.kind),
      `${safeSlug(fileName)}.md`
    );
  }

  indexPath(repoSlug: string, version: string): string {
    return path.join(this.baseDir, repoSlug, safeSlug(version), 'index.json');
  }

  exists(repoSlug: string, version: string, item: ApiItem): boolean {
    return fs.existsSync(this.docPath(repoSlug, version, item));
  }

  /**
   * Write (or overwrite) an item's document and record it in the index.
   *
   * @returns Path of the written document
   * @throws StoreError if the file system refuses the write
   */
  upsert(repoSlug: string, version: string, doc: GeneratedDoc): string {
    const docPath = this.docPath(repoSlug, version, doc.item);

    try {
      fs.mkdirSync(path.dirname(docPath), { recursive: true });
      fs.writeFileSync(docPath, renderMarkdown(doc), 'utf-8');
    } catch (error) {
      throw new StoreError(
        `Failed to write document for ${doc.item.itemId}`,
        error instanceof Error ? error : undefined
      );
    }

    this.updateIndex(repoSlug, version, doc, docPath);
    return docPath;
  }

  /**
   * Read the index for a version. A missing or unreadable index is
   * treated as empty.
   */
  readIndex(repoSlug: string, version: string): IndexFile {
    const indexPath = this.indexPath(repoSlug, version);
    const empty: IndexFile = {
      repo: repoSlug,
      version,
      updated_at: formatTimestamp(this.now()),
      items: [],
    };

    if (!fs.existsSync(indexPath)) {
      return empty;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(indexPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring unreadable index ${indexPath}: ${message}`);
      return empty;
    }

    const parsed = IndexFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed index ${indexPath}`);
      return empty;
    }
    return parsed.data;
  }

  private updateIndex(repoSlug: string, version: string, doc: GeneratedDoc, docPath: string): void {
    const index = this.readIndex(repoSlug, version);

    const entry: IndexItem = {
      id: doc.item.itemId,
      kind: doc.item.kind,
      name: doc.item.name,
      package: doc.item.package,
      import_path: doc.item.importPath,
      signature: doc.item.signature,
      path: path.relative(this.baseDir, docPath),
      generated_at: doc.generatedAt,
      generator: doc.generator,
      model: doc.model,
    };

    const existing = index.items.findIndex((item) => item.id === entry.id);
    if (existing >= 0) {
      index.items[existing] = entry;
    } else {
      index.items.push(entry);
    }
    index.updated_at = formatTimestamp(this.now());

    const indexPath = this.indexPath(repoSlug, version);
    try {
      fs.mkdirSync(path.dirname(indexPath), { recursive: true });
      fs.writeFileSync(indexPath, JSON.stringify(index, null, 2), 'utf-8');
    } catch (error) {
      throw new StoreError(
        `Failed to update index ${indexPath}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Build a GeneratedDoc stamped with this store's clock.
   */
  createDoc(item: ApiItem, content: string, generator: string, model = ''): GeneratedDoc {
    return {
      item,
      content,
      generatedAt: formatTimestamp(this.now()),
      generator,
      model,
    };
  }
}

/**
 * Render a document as front matter followed by its content.
 */
export function renderMarkdown(doc: GeneratedDoc): string {
  const frontMatter = [
    '---',
    `id: ${doc.item.itemId}`,
    `kind: ${doc.item.kind}`,
    `name: ${doc.item.name}`,
    `package: ${doc.item.package}`,
    `import_path: ${doc.item.importPath}`,
    `signature: ${doc.item.signature}`,
    `generated_at: ${doc.generatedAt}`,
    `generator: ${doc.generator}`,
    `model: ${doc.model}`,
    '---',
    '',
  ];
  return frontMatter.join('\n') + doc.content.trim() + '\n';
}
