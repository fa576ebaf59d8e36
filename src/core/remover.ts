import { rmSync } from 'node:fs';
import type { EntryFailure, RunListener } from '../types/run.js';
import { pathExists } from '../utils/fs.js';
import { IOError, isNodeError, toError } from './errors.js';
import { entryPath } from './manifest.js';

export interface RemovalResult {
  removed: string[];
  /** Entries already absent; not an error. */
  skipped: string[];
  failed: EntryFailure[];
  /** Entries left alone after an unrecoverable failure. */
  notAttempted: string[];
  aborted: boolean;
}

export interface RemoveOptions {
  listener?: RunListener;
}

/**
 * Deletes each entry under `installation` in order. A failure on one entry
 * is recorded and removal continues, unless the failure is unrecoverable
 * (locked file, read-only media): then the remaining entries are left as
 * they are. Nothing already removed is put back.
 */
export function remove(
  installation: string,
  entries: string[],
  options: RemoveOptions = {},
): RemovalResult {
  const emit = options.listener ?? (() => undefined);
  const result: RemovalResult = {
    removed: [],
    skipped: [],
    failed: [],
    notAttempted: [],
    aborted: false,
  };

  for (const [index, relativePath] of entries.entries()) {
    const path = entryPath(installation, relativePath);
    if (!pathExists(path)) {
      result.skipped.push(relativePath);
      emit({ type: 'skipped', relativePath });
      continue;
    }

    try {
      rmSync(path, { recursive: true, force: false });
      result.removed.push(relativePath);
      emit({ type: 'removed', relativePath });
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        result.skipped.push(relativePath);
        emit({ type: 'skipped', relativePath });
        continue;
      }
      const error = new IOError(path, toError(err));
      result.failed.push({ relativePath, error });
      emit({ type: 'failed', relativePath, error });
      if (error.unrecoverable) {
        result.aborted = true;
        result.notAttempted = entries.slice(index + 1);
        break;
      }
    }
  }

  return result;
}
