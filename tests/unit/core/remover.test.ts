import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { remove } from '../../../src/core/remover.js';
import { makeTempDir, snapshot, writeTree } from '../fixtures.js';

const ENTRIES = ['mods/nvmp/client.dll', 'mods/nvmp/config.ini'];

describe('remover', () => {
  let game: string;

  beforeEach(() => {
    game = makeTempDir('game');
  });

  afterEach(() => {
    rmSync(game, { recursive: true, force: true });
  });

  it('deletes every present entry and leaves other files', () => {
    writeTree(game, {
      'mods/nvmp/client.dll': 'dll',
      'mods/nvmp/config.ini': 'ini',
      'mods/other/keep.esp': 'keep',
    });

    const result = remove(game, ENTRIES);

    expect(result.removed).toEqual(ENTRIES);
    expect(result.failed).toEqual([]);
    expect(result.aborted).toBe(false);
    expect(existsSync(join(game, 'mods', 'nvmp', 'client.dll'))).toBe(false);
    expect(existsSync(join(game, 'mods', 'other', 'keep.esp'))).toBe(true);
  });

  it('treats absent entries as already removed', () => {
    writeTree(game, { 'mods/nvmp/client.dll': 'dll' });
    const result = remove(game, ENTRIES);
    expect(result.removed).toEqual(['mods/nvmp/client.dll']);
    expect(result.skipped).toEqual(['mods/nvmp/config.ini']);
    expect(result.failed).toEqual([]);
  });

  it('is idempotent', () => {
    writeTree(game, { 'mods/nvmp/client.dll': 'dll', 'mods/nvmp/config.ini': 'ini' });
    remove(game, ENTRIES);
    const after = snapshot(game);

    const second = remove(game, ENTRIES);

    expect(second.removed).toEqual([]);
    expect(second.skipped).toEqual(ENTRIES);
    expect(second.failed).toEqual([]);
    expect(snapshot(game)).toEqual(after);
  });

  it('removes directories recursively', () => {
    writeTree(game, { 'nvmp/a.dll': 'a', 'nvmp/sub/b.txt': 'b' });
    const result = remove(game, ['nvmp']);
    expect(result.removed).toEqual(['nvmp']);
    expect(existsSync(join(game, 'nvmp'))).toBe(false);
  });

  it('reports each entry to the listener', () => {
    writeTree(game, { 'mods/nvmp/client.dll': 'dll' });
    const listener = vi.fn();
    remove(game, ENTRIES, { listener });
    expect(listener.mock.calls).toEqual([
      [{ type: 'removed', relativePath: 'mods/nvmp/client.dll' }],
      [{ type: 'skipped', relativePath: 'mods/nvmp/config.ini' }],
    ]);
  });
});
