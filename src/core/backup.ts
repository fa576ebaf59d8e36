import { cpSync, existsSync, lstatSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import yaml from 'js-yaml';
import { BACKUP_RECORD_FILE } from '../config/branding.js';
import { BackupRecordSchema } from '../config/schema.js';
import type { BackupRecord } from '../types/manifest.js';
import type { EntryFailure, RunListener } from '../types/run.js';
import { dirExists, ensureDir, isInside, pathExists, toPosix } from '../utils/fs.js';
import { pathKey } from '../utils/platform.js';
import { ConfigError, IOError, NotFoundError, toError } from './errors.js';
import { entryPath } from './manifest.js';

const EXTERNAL_DIR = '_external';

export interface OutsideCopy {
  /** Absolute path the copy came from and is restored to. */
  origin: string;
  /** Path of the copy, relative to the backup destination. */
  copy: string;
}

export interface BackupResult {
  destination: string;
  copied: string[];
  skipped: string[];
  failed: EntryFailure[];
  /** Entries found outside the installation. */
  external: OutsideCopy[];
  textFiles: OutsideCopy[];
}

export interface RestoreResult {
  installation: string;
  restored: string[];
  failed: EntryFailure[];
  textFiles: string[];
}

export interface BackupOptions {
  /** Text files to copy before they are edited. */
  textFiles?: string[];
  /** `name@version` of the manifest, kept in the backup record. */
  manifestLabel?: string;
  listener?: RunListener;
}

/**
 * Where a copy lives inside the backup. Paths inside the installation keep
 * their relative path; others go under `_external/` with their absolute
 * path, drive colon removed.
 */
export function backupCopyPath(installation: string, origin: string): string {
  if (isInside(origin, installation)) {
    return toPosix(relative(installation, origin));
  }
  const flattened = toPosix(resolve(origin)).replace(/:/g, '').replace(/^\/+/, '');
  return `${EXTERNAL_DIR}/${flattened}`;
}

function copyPath(src: string, dest: string): void {
  // throws ENOENT before anything at dest is touched
  lstatSync(src);
  rmSync(dest, { recursive: true, force: true });
  ensureDir(dirname(dest));
  cpSync(src, dest, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true });
}

// ── Backup ──────────────────────────────────────────────────────────

/**
 * Copies every present entry to `destination`, keeping paths relative to
 * the installation; entries outside it go under `_external/`. Prior copies
 * are replaced. Nothing is deleted.
 */
export function backup(
  installation: string,
  entries: string[],
  destination: string,
  options: BackupOptions = {},
): BackupResult {
  const result: BackupResult = {
    destination,
    copied: [],
    skipped: [],
    failed: [],
    external: [],
    textFiles: [],
  };

  try {
    ensureDir(destination);
  } catch (err) {
    throw new IOError(destination, toError(err));
  }

  const emit = options.listener ?? (() => undefined);

  for (const relativePath of entries) {
    const src = entryPath(installation, relativePath);
    if (!pathExists(src)) {
      result.skipped.push(relativePath);
      emit({ type: 'skipped', relativePath });
      continue;
    }
    const copy = backupCopyPath(installation, src);
    try {
      copyPath(src, entryPath(destination, copy));
      result.copied.push(relativePath);
      if (isAbsolute(relativePath)) result.external.push({ origin: src, copy });
      emit({ type: 'copied', relativePath });
    } catch (err) {
      const error = new IOError(src, toError(err));
      result.failed.push({ relativePath, error });
      emit({ type: 'failed', relativePath, error });
    }
  }

  for (const origin of options.textFiles ?? []) {
    const copy = backupCopyPath(installation, origin);
    try {
      copyPath(origin, entryPath(destination, copy));
      result.textFiles.push({ origin, copy });
      emit({ type: 'copied', relativePath: origin });
    } catch (err) {
      const error = new IOError(origin, toError(err));
      result.failed.push({ relativePath: origin, error });
      emit({ type: 'failed', relativePath: origin, error });
    }
  }

  writeBackupRecord(destination, {
    installation,
    manifest: options.manifestLabel ?? 'unknown',
    createdAt: new Date().toISOString(),
    entries: result.copied.filter((e) => !isAbsolute(e)),
    external: result.external,
    textFiles: result.textFiles,
  });

  return result;
}

// ── Backup record ───────────────────────────────────────────────────

export function readBackupRecord(destination: string): BackupRecord {
  const path = join(destination, BACKUP_RECORD_FILE);
  if (!existsSync(path)) {
    throw new NotFoundError(`No backup record found in ${destination}`, path);
  }
  let data: unknown;
  try {
    data = yaml.load(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Backup record is not valid YAML: ${path}`, toError(err));
  }
  const parsed = BackupRecordSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid backup record: ${path}`);
  }
  return parsed.data;
}

/**
 * Writes the record, merging with an earlier record for the same
 * installation so a re-run after a partial removal still restores
 * everything copied the first time.
 */
function writeBackupRecord(destination: string, record: BackupRecord): void {
  const path = join(destination, BACKUP_RECORD_FILE);
  let merged = record;

  if (existsSync(path)) {
    const previous = readBackupRecord(destination);
    if (pathKey(previous.installation) === pathKey(record.installation)) {
      const entries = [...previous.entries];
      for (const e of record.entries) {
        if (!entries.includes(e)) entries.push(e);
      }
      merged = {
        ...record,
        entries,
        external: mergeCopies(previous.external, record.external),
        textFiles: mergeCopies(previous.textFiles, record.textFiles),
      };
    }
  }

  try {
    writeFileSync(path, yaml.dump(merged), 'utf-8');
  } catch (err) {
    throw new IOError(path, toError(err));
  }
}

function mergeCopies(previous: OutsideCopy[], next: OutsideCopy[]): OutsideCopy[] {
  const kept = previous.filter((p) => !next.some((n) => pathKey(n.origin) === pathKey(p.origin)));
  return [...kept, ...next];
}

// ── Restore ─────────────────────────────────────────────────────────

/**
 * Copies the entries and text files listed in the backup record back to
 * where they came from, overwriting what is there. Installation entries go
 * to `installation` when given; entries from outside it always return to
 * their origin.
 */
export function restore(destination: string, installation?: string): RestoreResult {
  const record = readBackupRecord(destination);
  const target = resolve(installation ?? record.installation);
  if (!dirExists(target)) {
    throw new NotFoundError(`Installation directory not found: ${target}`, target);
  }

  const result: RestoreResult = { installation: target, restored: [], failed: [], textFiles: [] };

  for (const relativePath of record.entries) {
    try {
      copyPath(entryPath(destination, relativePath), entryPath(target, relativePath));
      result.restored.push(relativePath);
    } catch (err) {
      result.failed.push({
        relativePath,
        error: new IOError(entryPath(destination, relativePath), toError(err)),
      });
    }
  }

  for (const { origin, copy } of record.external) {
    try {
      copyPath(entryPath(destination, copy), origin);
      result.restored.push(origin);
    } catch (err) {
      result.failed.push({ relativePath: origin, error: new IOError(origin, toError(err)) });
    }
  }

  for (const { origin, copy } of record.textFiles) {
    try {
      copyPath(entryPath(destination, copy), origin);
      result.textFiles.push(origin);
    } catch (err) {
      result.failed.push({ relativePath: origin, error: new IOError(origin, toError(err)) });
    }
  }

  return result;
}
