import { dirname, join, resolve } from 'node:path';
import type { Manifest } from '../types/manifest.js';
import { dirExists, isInside } from '../utils/fs.js';
import { dedupePaths, expandEnvTemplate, type Env } from '../utils/platform.js';
import { NotFoundError } from './errors.js';

export interface ScanRootOptions {
  installation: string;
  manifest: Manifest;
  env: Env;
  /** Mod Organizer 2 base folder; detected beside the installation when unset. */
  mo2Dir?: string;
  /** Vortex staging or per-game folder; the manifest's defaults are used when unset. */
  vortexDir?: string;
}

function requireDir(path: string, label: string): string {
  const dir = resolve(path);
  if (!dirExists(dir)) {
    throw new NotFoundError(`${label} folder not found: ${dir}`, dir);
  }
  return dir;
}

function expandExisting(templates: string[], env: Env): string[] {
  return templates
    .map((template) => expandEnvTemplate(template, env))
    .filter((dir): dir is string => dir !== null && dirExists(dir));
}

/** User folders named by the manifest (My Games, AppData) that exist. */
export function profileRoots(manifest: Manifest, env: Env): string[] {
  return dedupePaths(expandExisting(manifest.profileDirs, env));
}

export function vortexRoots(manifest: Manifest, env: Env, vortexDir?: string): string[] {
  if (vortexDir) return [requireDir(vortexDir, 'Vortex')];
  return dedupePaths(expandExisting(manifest.modManagers.vortex, env));
}

/** MO2 base folders next to the installation or one level further up. */
export function detectMo2(installation: string, folderName: string): string[] {
  const parent = dirname(resolve(installation));
  return dedupePaths([parent, dirname(parent)].map((dir) => join(dir, folderName))).filter(
    dirExists,
  );
}

export function mo2Roots(manifest: Manifest, installation: string, mo2Dir?: string): string[] {
  const mo2 = manifest.modManagers.mo2;
  if (!mo2) return mo2Dir ? [requireDir(mo2Dir, 'Mod Organizer 2')] : [];
  const bases = mo2Dir
    ? [requireDir(mo2Dir, 'Mod Organizer 2')]
    : detectMo2(installation, mo2.folderName);
  return bases.flatMap((base) =>
    mo2.subdirs.map((sub) => join(base, ...sub.split('/'))).filter(dirExists),
  );
}

/**
 * Folders beyond the installation that may hold NV:MP files: user folders,
 * Vortex and MO2. A root nested in another root is left out.
 */
export function extraScanRoots(options: ScanRootOptions): string[] {
  const { installation, manifest, env } = options;
  const roots = dedupePaths([
    ...profileRoots(manifest, env),
    ...vortexRoots(manifest, env, options.vortexDir),
    ...mo2Roots(manifest, installation, options.mo2Dir),
  ]);
  return roots.filter((root) => !roots.some((other) => other !== root && isInside(root, other)));
}
