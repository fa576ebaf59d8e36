import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join, relative } from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { ManifestSchema } from '../config/schema.js';
import type { Manifest, ResolvedEntry, Signatures } from '../types/manifest.js';
import { dirExists, isInside, pathExists, sameFile, toPosix, walk } from '../utils/fs.js';
import { ConfigError, toError } from './errors.js';

const BUNDLED_MANIFEST = 'nvmp.yaml';

// ── Loading ─────────────────────────────────────────────────────────

export function parseManifest(raw: string): Manifest {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Manifest is not valid YAML: ${toError(err).message}`, toError(err));
  }
  const result = ManifestSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ConfigError(`Invalid manifest: ${issues}`);
  }
  return result.data;
}

export function parseManifestFile(path: string): Manifest {
  if (!existsSync(path)) {
    throw new ConfigError(`Manifest file not found: ${path}`);
  }
  return parseManifest(readFileSync(path, 'utf-8'));
}

export function getBundledManifestPath(): string {
  // src/core or dist/core, both two levels below the package root
  const thisFile = fileURLToPath(import.meta.url);
  const candidate = join(dirname(thisFile), '..', '..', 'manifests', BUNDLED_MANIFEST);
  if (existsSync(candidate)) return candidate;
  throw new ConfigError('Bundled manifest not found');
}

export function loadManifest(path?: string): Manifest {
  return parseManifestFile(path ?? getBundledManifestPath());
}

// ── Signatures ──────────────────────────────────────────────────────

export type SignatureMatcher = (name: string) => boolean;

export function compileSignatures(signatures: Signatures): SignatureMatcher {
  const known = new Set(signatures.knownFilenames.map((n) => n.toLowerCase()));
  const patterns = signatures.patterns.map((p) => new RegExp(p, 'i'));
  return (name) => known.has(name.toLowerCase()) || patterns.some((p) => p.test(name));
}

// ── Resolution ──────────────────────────────────────────────────────

export function normalizeEntry(entry: string): string {
  return entry
    .split(/[\\/]+/)
    .filter((segment) => segment !== '' && segment !== '.')
    .join('/');
}

/** Absolute path of an entry: relative entries live under `root`. */
export function entryPath(root: string, relativePath: string): string {
  return isAbsolute(relativePath) ? relativePath : join(root, ...relativePath.split('/'));
}

function byName(a: string, b: string): number {
  return a.toLowerCase().localeCompare(b.toLowerCase());
}

export interface ResolveOptions {
  /** Absolute paths never scanned, such as the backup destination. */
  exclude?: string[];
  /** Absolute folders outside the installation scanned for signature matches. */
  extraRoots?: string[];
}

/**
 * Resolves the manifest against an installation: fixed entries in manifest
 * order, signature matches inside the installation, then matches under the
 * extra roots, each group sorted case-insensitively. Entries lying inside
 * another selected directory are dropped.
 */
export function resolveEntries(
  root: string,
  manifest: Manifest,
  options: ResolveOptions = {},
): ResolvedEntry[] {
  const fixed: ResolvedEntry[] = [];
  const listed = new Set<string>();

  for (const raw of manifest.entries) {
    const relativePath = normalizeEntry(raw);
    if (!relativePath || listed.has(relativePath.toLowerCase())) continue;
    listed.add(relativePath.toLowerCase());
    fixed.push({
      relativePath,
      source: 'fixed',
      present: pathExists(entryPath(root, relativePath)),
    });
  }

  // A match is the same entry as a fixed one only when both name one file;
  // on a case-sensitive file system NVMP.log and nvmp.log are different files.
  const presentFixed = fixed.filter((e) => e.present);
  const isFixed = (relativePath: string, path: string): boolean =>
    presentFixed.some(
      (e) =>
        e.relativePath === relativePath ||
        (e.relativePath.toLowerCase() === relativePath.toLowerCase() &&
          sameFile(entryPath(root, e.relativePath), path)),
    );

  const matches = scanSignatures(root, manifest, options, isFixed);
  const inside = matches.filter((m) => !isAbsolute(m)).sort(byName);
  const outside = matches.filter((m) => isAbsolute(m)).sort(byName);

  const all: ResolvedEntry[] = [
    ...fixed,
    ...[...inside, ...outside].map((relativePath) => ({
      relativePath,
      source: 'signature' as const,
      present: true,
    })),
  ];

  const dirs = all
    .filter((e) => e.present && dirExists(entryPath(root, e.relativePath)))
    .map((e) => entryPath(root, e.relativePath));
  return all.filter((e) => {
    const path = entryPath(root, e.relativePath);
    return !dirs.some((dir) => dir !== path && isInside(path, dir));
  });
}

function scanSignatures(
  root: string,
  manifest: Manifest,
  options: ResolveOptions,
  isFixed: (relativePath: string, path: string) => boolean,
): string[] {
  const exclude = options.exclude ?? [];
  const matcher = compileSignatures(manifest.signatures);
  const found = new Set<string>();
  const bases = [
    ...manifest.scanRoots.map((scanRoot) => entryPath(root, normalizeEntry(scanRoot))),
    ...(options.extraRoots ?? []),
  ];

  for (const base of bases) {
    if (found.size >= manifest.maxMatches) break;
    if (!dirExists(base)) continue;

    walk(base, (entry) => {
      if (found.size >= manifest.maxMatches) return false;
      if (exclude.some((ex) => isInside(entry.path, ex))) return false;
      if (!matcher(entry.name)) return true;
      const relativePath = isInside(entry.path, root)
        ? toPosix(relative(root, entry.path))
        : entry.path;
      if (!isFixed(relativePath, entry.path)) found.add(relativePath);
      // a matched directory is taken whole
      return false;
    });
  }
  return [...found];
}
