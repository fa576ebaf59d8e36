import { execFileSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Game, Manifest } from '../types/manifest.js';
import { dirExists, fileExists } from '../utils/fs.js';
import { dedupePaths, isWindows, type Env } from '../utils/platform.js';
import { NotFoundError } from './errors.js';
import { resolveEntries } from './manifest.js';

export type RegistryQuery = (key: string, value: string) => string | null;

export interface LocateOptions {
  manifest: Manifest;
  /** User-supplied installation path; skips detection when set. */
  gameDir?: string;
  env?: Env;
  platform?: NodeJS.Platform;
  queryRegistry?: RegistryQuery;
}

// ── Registry ────────────────────────────────────────────────────────

export function parseRegQueryOutput(output: string, valueName: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/^\s+(.+?)\s+REG_(?:EXPAND_)?SZ\s+(.*)$/);
    if (match && match[1].toLowerCase() === valueName.toLowerCase()) {
      return match[2].trim();
    }
  }
  return null;
}

export const queryRegistry: RegistryQuery = (key, value) => {
  try {
    const output = execFileSync('reg', ['query', key, '/v', value], {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    return parseRegQueryOutput(output, value);
  } catch {
    // reg exits non-zero when the key does not exist
    return null;
  }
};

function detectFromRegistry(game: Game, query: RegistryQuery): string[] {
  const found: string[] = [];
  for (const { key, value } of game.registryKeys) {
    const path = query(key, value);
    if (path) found.push(path);
  }
  return found;
}

// ── Steam library folders ───────────────────────────────────────────

export function parseLibraryFolders(vdf: string): string[] {
  const paths: string[] = [];
  for (const match of vdf.matchAll(/"\s*path\s*"\s*"([^"]+)"/gi)) {
    paths.push(match[1].replace(/\\\\/g, '\\'));
  }
  return paths;
}

function steamRoots(env: Env): string[] {
  return [env['ProgramFiles(x86)'], env.ProgramFiles]
    .filter((p): p is string => Boolean(p))
    .map((p) => join(p, 'Steam'));
}

function detectFromSteamLibraries(game: Game, env: Env): string[] {
  const found: string[] = [];
  for (const steam of steamRoots(env)) {
    const vdfPath = join(steam, 'steamapps', 'libraryfolders.vdf');
    if (!fileExists(vdfPath)) continue;
    for (const library of parseLibraryFolders(readFileSync(vdfPath, 'utf-8'))) {
      for (const folder of game.folderNames) {
        found.push(join(library, 'steamapps', 'common', folder));
      }
    }
  }
  return found;
}

// ── Common locations ────────────────────────────────────────────────

function detectCommonLocations(game: Game, env: Env): string[] {
  const found: string[] = [];
  const bases = [env['ProgramFiles(x86)'], env.ProgramFiles].filter(
    (p): p is string => Boolean(p),
  );
  for (const base of bases) {
    for (const folder of game.folderNames) {
      found.push(join(base, 'Steam', 'steamapps', 'common', folder));
      found.push(join(base, 'GOG Galaxy', 'Games', folder));
    }
  }
  return found;
}

/**
 * Default install roots holding the game executable, in detection order:
 * registry, Steam libraries, then common install folders.
 */
export function detectCandidates(options: LocateOptions): string[] {
  const { manifest } = options;
  const env = options.env ?? process.env;
  const game = manifest.game;

  const raw = [
    ...(isWindows(options.platform)
      ? detectFromRegistry(game, options.queryRegistry ?? queryRegistry)
      : []),
    ...detectFromSteamLibraries(game, env),
    ...detectCommonLocations(game, env),
  ];
  return dedupePaths(raw).filter((dir) => fileExists(join(dir, game.executable)));
}

export function hasManifestEntry(root: string, manifest: Manifest): boolean {
  return resolveEntries(root, manifest).some((e) => e.present);
}

export function locateInstallation(options: LocateOptions): string {
  const { manifest } = options;

  if (options.gameDir) {
    const root = resolve(options.gameDir);
    if (!dirExists(root)) {
      throw new NotFoundError(`Installation directory not found: ${root}`, root);
    }
    if (!hasManifestEntry(root, manifest)) {
      throw new NotFoundError(`No ${manifest.description} files found in ${root}`, root);
    }
    return root;
  }

  const candidates = detectCandidates(options);
  if (candidates.length === 0) {
    throw new NotFoundError(
      `Could not detect a ${manifest.game.name} installation. Run again with --game <path>.`,
    );
  }
  const found = candidates.find((dir) => hasManifestEntry(dir, manifest));
  if (!found) {
    throw new NotFoundError(
      `No ${manifest.description} files found in: ${candidates.join(', ')}`,
    );
  }
  return found;
}
