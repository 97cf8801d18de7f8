/**
 * Tests for the export command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createExportCommand } from '../export.js';
import { KV_DOC, createWorkspace, run, type TestWorkspace } from './helpers.js';

describe('createExportCommand', () => {
  let workspace: TestWorkspace;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let manifest: string;
  let outDir: string;
  let versionDir: string;

  beforeEach(() => {
    workspace = createWorkspace();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    workspace.write('kv.txt', KV_DOC);
    manifest = workspace.write(
      'packages.json',
      JSON.stringify([{ name: 'kv', import_path: 'example.com/kv', doc_file: 'kv.txt' }])
    );
    outDir = join(workspace.dir, 'out');
    versionDir = join(outDir, 'acme_kv', 'untagged-unknown');
  });

  afterEach(() => {
    workspace.cleanup();
    vi.restoreAllMocks();
  });

  it('writes one document per item and an index', async () => {
    await run(createExportCommand(() => workspace.ctx), [manifest, '--repo', 'acme/kv', '-o', outDir]);

    expect(existsSync(join(versionDir, 'kv', 'function', 'Open.md'))).toBe(true);
    expect(existsSync(join(versionDir, 'kv', 'method', 'db_DB_Close.md'))).toBe(true);
    expect(existsSync(join(versionDir, 'kv', 'type', 'DB.md'))).toBe(true);

    const index = JSON.parse(readFileSync(join(versionDir, 'index.json'), 'utf-8'));
    expect(index.repo).toBe('acme_kv');
    expect(index.items).toHaveLength(3);
    expect(index.items[0].generator).toBe('godoc-extract');

    expect(workspace.logOutput).toHaveLength(1);
    expect(workspace.logOutput[0]).toContain('Wrote 3 document(s) to');
  });

  it('keeps existing documents unless forced', async () => {
    const args = [manifest, '--repo', 'acme/kv', '-o', outDir];
    await run(createExportCommand(() => workspace.ctx), args);
    workspace.logOutput.length = 0;

    await run(createExportCommand(() => workspace.ctx), args);
    expect(workspace.logOutput[0]).toContain('Wrote 0 document(s) to');
    expect(workspace.logOutput[1]).toContain('3 existing document(s) kept');

    workspace.logOutput.length = 0;
    await run(createExportCommand(() => workspace.ctx), [...args, '--force']);
    expect(workspace.logOutput[0]).toContain('Wrote 3 document(s) to');
  });

  it('files documents under the version key', async () => {
    await run(createExportCommand(() => workspace.ctx), [
      manifest,
      '--repo',
      'https://github.com/acme/kv.git',
      '-o',
      outDir,
      '--version-key',
      'v2.0.0-1a2b3c4',
      '--max-items',
      '1',
    ]);

    expect(existsSync(join(outDir, 'acme_kv', 'v2.0.0-1a2b3c4', 'kv', 'function', 'Open.md'))).toBe(true);
    expect(existsSync(join(outDir, 'acme_kv', 'v2.0.0-1a2b3c4', 'kv', 'type', 'DB.md'))).toBe(false);
  });

  it('prints a JSON summary', async () => {
    workspace.ctx.options.json = true;

    await run(createExportCommand(() => workspace.ctx), [manifest, '--repo', 'acme/kv', '-o', outDir]);

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
      repo: 'acme_kv',
      version: 'untagged-unknown',
      outputDir: outDir,
      written: 3,
      skipped: 0,
      failedPackages: 0,
      errors: [],
    });
  });
});
