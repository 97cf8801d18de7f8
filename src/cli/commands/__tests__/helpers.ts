/**
 * Shared setup for command tests: a temp workspace, an isolated config
 * home and a capturing CommandContext.
 */

import { vi } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { _clearEnvCache } from '../../../config/env.js';
import type { CommandContext } from '../../types.js';

export const KV_DOC = [
  'package kv // import "example.com/kv"',
  '',
  'FUNCTIONS',
  '',
  'func Open(path string) (*DB, error)    opens a database file',
  '',
  'TYPES',
  '',
  'type DB struct {',
  '\tPath string',
  '}',
  '',
  'func (db *DB) Close() error',
  '',
].join('\n');

export interface TestWorkspace {
  dir: string;
  logOutput: string[];
  ctx: CommandContext;
  /** Write a file into the workspace and return its path */
  write(name: string, content: string): string;
  cleanup(): void;
}

export function createWorkspace(json = false): TestWorkspace {
  const dir = mkdtempSync(join(tmpdir(), 'godoc-cli-test-'));
  process.env.GODOC_EXTRACT_HOME = join(dir, 'home');
  _clearEnvCache();

  const logOutput: string[] = [];
  const ctx: CommandContext = {
    options: { verbose: false, json },
    log: (message: string) => logOutput.push(message),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  return {
    dir,
    logOutput,
    ctx,
    write(name, content) {
      const filePath = join(dir, name);
      writeFileSync(filePath, content, 'utf-8');
      return filePath;
    },
    cleanup() {
      delete process.env.GODOC_EXTRACT_HOME;
      _clearEnvCache();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/**
 * Run a command the way the CLI would.
 */
export async function run(command: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.addCommand(command);
  await program.parseAsync(['node', 'godoc-extract', command.name(), ...args]);
}
