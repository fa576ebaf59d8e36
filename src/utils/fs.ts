import {
  accessSync,
  constants,
  lstatSync,
  mkdirSync,
  readdirSync,
  statSync,
} from 'node:fs';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';

export function ensureDir(path: string, mode?: number): void {
  mkdirSync(path, { recursive: true, mode });
}

export function dirExists(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function fileExists(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** True for files, directories and dangling symlinks alike. */
export function pathExists(path: string): boolean {
  try {
    lstatSync(path);
    return true;
  } catch {
    return false;
  }
}

export function isWritable(path: string): boolean {
  try {
    accessSync(path, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/** True when `child` is `parent` itself or lies somewhere below it. */
export function isInside(child: string, parent: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** Both paths name the same file system object (hard links and case aliases included). */
export function sameFile(a: string, b: string): boolean {
  try {
    const sa = lstatSync(a);
    const sb = lstatSync(b);
    return sa.dev === sb.dev && sa.ino === sb.ino;
  } catch {
    return false;
  }
}

export function toPosix(path: string): string {
  return path.split(sep).join('/');
}

export interface WalkEntry {
  path: string;
  name: string;
  isDirectory: boolean;
}

/**
 * Depth-first walk that does not follow symlinks. Unreadable directories
 * are skipped. Returning false from `visit` stops descent into a directory.
 */
export function walk(root: string, visit: (entry: WalkEntry) => boolean | void): void {
  let entries;
  try {
    entries = readdirSync(root, { withFileTypes: true });
  } catch {
    return;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const path = join(root, entry.name);
    const isDirectory = entry.isDirectory();
    const descend = visit({ path, name: entry.name, isDirectory });
    if (isDirectory && descend !== false) {
      walk(path, visit);
    }
  }
}
