import { mkdirSync, mkdtempSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, relative } from 'node:path';
import type { z } from 'zod';
import { ManifestSchema } from '../../src/config/schema.js';
import type { Manifest } from '../../src/types/manifest.js';

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `nvmp-remover-${prefix}-`));
}

/** Writes `{ 'a/b.txt': 'content' }` under root. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, ...rel.split('/'));
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}

/** Relative path → content for every file below root, directories as 'dir/'. */
export function snapshot(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  const visit = (dir: string): void => {
    for (const name of readdirSync(dir).sort()) {
      const path = join(dir, name);
      const rel = relative(root, path).split('\\').join('/');
      if (statSync(path).isDirectory()) {
        out[`${rel}/`] = '';
        visit(path);
      } else {
        out[rel] = readFileSync(path, 'utf-8');
      }
    }
  };
  visit(root);
  return out;
}

export function testManifest(overrides: Partial<z.input<typeof ManifestSchema>> = {}): Manifest {
  return ManifestSchema.parse({
    name: 'test-mod',
    version: '1.0.0',
    description: 'Test mod',
    game: {
      name: 'Test Game',
      executable: 'Game.exe',
      folderNames: ['Test Game'],
    },
    entries: ['mods/nvmp/client.dll', 'mods/nvmp/config.ini'],
    ...overrides,
  });
}
