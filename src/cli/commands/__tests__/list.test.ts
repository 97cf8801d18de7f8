/**
 * Tests for the list command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { createListCommand, formatItemLine } from '../list.js';
import { KV_DOC, createWorkspace, run, type TestWorkspace } from './helpers.js';

const OPEN_LINE = 'untagged-unknown\texample.com/kv\tfunction\tkv\tfunc Open(path string) (*DB, error)';
const CLOSE_LINE = 'untagged-unknown\texample.com/kv\tmethod\tkv\tfunc (db *DB) Close() error';
const TYPE_LINE = 'untagged-unknown\texample.com/kv\ttype\tkv\ttype DB struct';

describe('createListCommand', () => {
  let workspace: TestWorkspace;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let manifest: string;

  beforeEach(() => {
    workspace = createWorkspace();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    workspace.write('kv.txt', KV_DOC);
    manifest = workspace.write(
      'packages.json',
      JSON.stringify([{ name: 'kv', import_path: 'example.com/kv', doc_file: 'kv.txt' }])
    );
  });

  afterEach(() => {
    workspace.cleanup();
    vi.restoreAllMocks();
  });

  it('has ls alias', () => {
    expect(createListCommand(() => workspace.ctx).aliases()).toContain('ls');
  });

  it('prints one tab-separated line per item', async () => {
    await run(createListCommand(() => workspace.ctx), [manifest]);

    expect(workspace.logOutput).toEqual([OPEN_LINE, CLOSE_LINE, TYPE_LINE]);
  });

  it('uses the given version key', async () => {
    await run(createListCommand(() => workspace.ctx), [manifest, '--version-key', 'v1.4.0-abc1234']);

    expect(workspace.logOutput[0]?.split('\t')[0]).toBe('v1.4.0-abc1234');
  });

  it('caps the number of items', async () => {
    await run(createListCommand(() => workspace.ctx), [manifest, '--max-items', '2']);

    expect(workspace.logOutput).toEqual([OPEN_LINE, CLOSE_LINE]);
  });

  it('warns about packages it could not parse and lists the rest', async () => {
    manifest = workspace.write(
      'packages.json',
      JSON.stringify([
        { name: 'gone', import_path: 'example.com/gone', doc_file: 'gone.txt' },
        { name: 'kv', import_path: 'example.com/kv', doc_file: 'kv.txt' },
      ])
    );

    await run(createListCommand(() => workspace.ctx), [manifest]);

    expect(workspace.logOutput.slice(0, 3)).toEqual([OPEN_LINE, CLOSE_LINE, TYPE_LINE]);
    expect(workspace.logOutput[3]).toContain('1 package(s) skipped');
    expect(workspace.ctx.warn).toHaveBeenCalledOnce();
    expect(vi.mocked(workspace.ctx.warn).mock.calls[0]?.[0]).toContain(
      `example.com/gone: cannot read ${join(workspace.dir, 'gone.txt')}`
    );
  });

  it('prints items as JSON', async () => {
    workspace.ctx.options.json = true;

    await run(createListCommand(() => workspace.ctx), [manifest, '--max-items', '1']);

    const printed = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(printed.version).toBe('untagged-unknown');
    expect(printed.count).toBe(1);
    expect(printed.items[0].itemId).toBe('example.com/kv:func Open(path string) (*DB, error)');
    expect(printed.errors).toEqual([]);
  });
});

describe('formatItemLine', () => {
  it('joins the columns with tabs', () => {
    expect(
      formatItemLine('v1', {
        itemId: 'example.com/kv:type:DB',
        kind: 'type',
        name: 'DB',
        signature: 'type DB struct',
        package: 'kv',
        importPath: 'example.com/kv',
        receiver: '',
        params: '',
        returns: '',
        typeKind: 'struct',
        fields: [],
        methods: [],
        sourceDescription: '',
      })
    ).toBe('v1\texample.com/kv\ttype\tkv\ttype DB struct');
  });
});
