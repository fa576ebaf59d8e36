import { readFileSync, writeFileSync } from 'node:fs';
import type { Manifest } from '../types/manifest.js';
import type { EntryFailure, RunListener, TextEdit, TextPlan } from '../types/run.js';
import { isInside, walk } from '../utils/fs.js';
import { dedupePaths, pathKey, type Env } from '../utils/platform.js';
import { IOError, toError } from './errors.js';
import type { SignatureMatcher } from './manifest.js';
import { profileRoots } from './mod-managers.js';

export interface StripResult {
  kept: string;
  removed: string[];
}

/** Installation first, then the profile directories that exist, then any mod-manager folders. */
export function textRoots(
  installation: string,
  manifest: Manifest,
  env: Env,
  extraRoots: string[] = [],
): string[] {
  return dedupePaths([installation, ...profileRoots(manifest, env), ...extraRoots]);
}

export function findTextTargets(roots: string[], names: string[], exclude: string[] = []): string[] {
  const wanted = new Set(names.map((n) => n.toLowerCase()));
  const seen = new Set<string>();
  const found: string[] = [];

  for (const root of roots) {
    walk(root, (entry) => {
      if (exclude.some((ex) => isInside(entry.path, ex))) return false;
      if (entry.isDirectory || !wanted.has(entry.name.toLowerCase())) return true;
      const key = pathKey(entry.path);
      if (!seen.has(key)) {
        seen.add(key);
        found.push(entry.path);
      }
      return true;
    });
  }
  return found.sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
}

// Load lists and INI files are ANSI or UTF-8; latin1 maps every byte to one
// char and back, so kept lines are written out byte for byte.
const TEXT_ENCODING = 'latin1';

/** Drops lines matching a signature; line endings of kept lines are untouched. */
export function stripSignatureLines(content: string, matcher: SignatureMatcher): StripResult {
  const lines = content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  let kept = '';
  const removed: string[] = [];
  for (const line of lines) {
    const text = line.replace(/\r?\n$/, '');
    if (text.trim() !== '' && matcher(text.trim())) {
      removed.push(text);
    } else {
      kept += line;
    }
  }
  return { kept, removed };
}

/** Reads every target and reports the lines that would go. Nothing is written. */
export function planTextEdits(targets: string[], matcher: SignatureMatcher): TextPlan {
  const plan: TextPlan = { edits: [], failed: [] };
  for (const path of targets) {
    try {
      const { removed } = stripSignatureLines(readFileSync(path, TEXT_ENCODING), matcher);
      if (removed.length > 0) plan.edits.push({ path, removedLines: removed });
    } catch (err) {
      plan.failed.push({ relativePath: path, error: new IOError(path, toError(err)) });
    }
  }
  return plan;
}

export interface CleanResult {
  edited: TextEdit[];
  failed: EntryFailure[];
}

export function cleanTextFiles(
  paths: string[],
  matcher: SignatureMatcher,
  listener?: RunListener,
): CleanResult {
  const emit = listener ?? (() => undefined);
  const result: CleanResult = { edited: [], failed: [] };

  for (const path of paths) {
    try {
      const { kept, removed } = stripSignatureLines(readFileSync(path, TEXT_ENCODING), matcher);
      if (removed.length === 0) continue;
      writeFileSync(path, kept, TEXT_ENCODING);
      result.edited.push({ path, removedLines: removed });
      emit({ type: 'edited', path, lines: removed.length });
    } catch (err) {
      const error = new IOError(path, toError(err));
      result.failed.push({ relativePath: path, error });
      emit({ type: 'failed', relativePath: path, error });
    }
  }
  return result;
}
