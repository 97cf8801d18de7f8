/**
 * Tests for the scanner and package assembly
 */

import { describe, it, expect, vi } from 'vitest';
import { scanDocText, splitLines } from '../scanner.js';
import { assemblePackage, parse, resolvePackageMeta } from '../assembler.js';
import { MetadataUnavailableError } from '../../errors/index.js';

const CACHE_DOC = [
  'package cache // import "example.com/cache"',
  '',
  'Package cache provides an in-memory cache.',
  '',
  'FUNCTIONS',
  '',
  'func New(size int) *Cache',
  '    New creates a cache holding at most size entries.',
  '',
  'func helper()',
  '',
  'TYPES',
  '',
  'type Cache struct {',
  '\tSize int // max entries',
  '\t// Has unexported fields.',
  '}',
  '    Cache stores values in memory.',
  '',
  'func (c *Cache) Get(key string) (string, bool)',
  '',
  'type Store interface {',
  '\tGet(key string) (string, bool)',
  '}',
].join('\n');

describe('splitLines', () => {
  it('splits on LF and CRLF', () => {
    expect(splitLines('a\r\nb\nc')).toEqual(['a', 'b', 'c']);
  });
});

describe('scanDocText', () => {
  it('collects functions and types in order', () => {
    const scan = scanDocText(CACHE_DOC);

    expect(scan.declaredPackage).toBe('cache');
    expect(scan.functions.map((fn) => fn.signature)).toEqual([
      'func New(size int) *Cache',
      'func (c *Cache) Get(key string) (string, bool)',
    ]);
    expect(scan.types).toEqual([
      {
        name: 'Cache',
        kind: 'struct',
        description: '',
        fields: ['Size int // max entries'],
        methods: [],
      },
      {
        name: 'Store',
        kind: 'interface',
        description: '',
        fields: ['Get(key string) (string, bool)'],
        methods: [],
      },
    ]);
  });

  it('hands the line that ends a type body back to the scan', () => {
    const scan = scanDocText('type A struct {\n\tX int\nfunc New() *A\ntype B interface{}\nfunc (b B) Run()');

    expect(scan.functions.map((fn) => fn.signature)).toEqual([
      'func New() *A',
      'func (b B) Run()',
    ]);
    expect(scan.types.map((type) => [type.name, type.kind, type.fields])).toEqual([
      ['A', 'struct', ['X int']],
      ['B', 'interface', []],
    ]);
    expect(scan.skippedLines).toBe(0);
  });

  it('counts skipped lines', () => {
    const scan = scanDocText('package foo\r\nfunc A()\r\nfunc b()\r\n');

    expect(scan.functions).toHaveLength(1);
    // 'func b()' and the trailing empty line
    expect(scan.skippedLines).toBe(2);
  });

  it('returns empty lists for empty text', () => {
    expect(scanDocText('')).toEqual({
      declaredPackage: '',
      functions: [],
      types: [],
      skippedLines: 1,
    });
  });

  it('keeps the last package clause', () => {
    const debug = vi.fn();
    const scan = scanDocText('package one\npackage two', { logger: { warn: vi.fn(), debug } });

    expect(scan.declaredPackage).toBe('two');
    expect(debug).toHaveBeenCalledWith("package clause at line 2 replaces 'one' with 'two'");
  });

  it('is deterministic', () => {
    expect(scanDocText(CACHE_DOC)).toEqual(scanDocText(CACHE_DOC));
  });
});

describe('resolvePackageMeta', () => {
  it('accepts camelCase and snake_case import paths', () => {
    expect(resolvePackageMeta({ name: 'foo', importPath: 'example.com/foo' })).toEqual({
      name: 'foo',
      importPath: 'example.com/foo',
      description: '',
    });
    expect(resolvePackageMeta({ name: 'foo', import_path: 'example.com/foo' }).importPath).toBe(
      'example.com/foo'
    );
  });

  it('trims values', () => {
    expect(resolvePackageMeta({ name: ' foo ', importPath: 'example.com/foo\n' })).toMatchObject({
      name: 'foo',
      importPath: 'example.com/foo',
    });
  });

  it('throws MetadataUnavailableError naming the missing keys', () => {
    expect(() => resolvePackageMeta({ name: 'foo' })).toThrow(
      'Package metadata unavailable: missing importPath'
    );

    try {
      resolvePackageMeta({ name: '  ', importPath: '' }, 'manifest entry 2');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MetadataUnavailableError);
      if (error instanceof MetadataUnavailableError) {
        expect(error.missing).toEqual(['name', 'importPath']);
        expect(error.message).toBe(
          'Package metadata unavailable for manifest entry 2: missing name, importPath'
        );
        expect(error.code).toBe(6);
      }
    }
  });

  it('rejects missing metadata entirely', () => {
    expect(() => resolvePackageMeta(null)).toThrow(MetadataUnavailableError);
  });
});

describe('assemblePackage', () => {
  const meta = { name: 'cache', importPath: 'example.com/cache', description: 'In-memory cache.' };

  it('joins metadata with the scan', () => {
    const pkg = assemblePackage(meta, scanDocText(CACHE_DOC));

    expect(pkg.name).toBe('cache');
    expect(pkg.importPath).toBe('example.com/cache');
    expect(pkg.description).toBe('In-memory cache.');
    expect(pkg.functions).toHaveLength(2);
    expect(pkg.types).toHaveLength(2);
  });

  it('warns when the declared package differs from the metadata', () => {
    const warn = vi.fn();
    const pkg = assemblePackage(meta, scanDocText('package lru'), { logger: { warn } });

    expect(pkg.name).toBe('cache');
    expect(warn).toHaveBeenCalledWith(
      "example.com/cache: documentation declares package 'lru', metadata says 'cache'"
    );
  });
});

describe('parse', () => {
  it('returns an empty package for empty text', () => {
    expect(parse('', { name: 'foo', importPath: 'example.com/foo' })).toEqual({
      name: 'foo',
      importPath: 'example.com/foo',
      functions: [],
      types: [],
      description: '',
    });
  });

  it('fails on missing metadata before scanning', () => {
    expect(() => parse(CACHE_DOC, { importPath: 'example.com/cache' })).toThrow(
      MetadataUnavailableError
    );
  });
});
