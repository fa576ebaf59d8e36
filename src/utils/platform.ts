import { resolve } from 'node:path';

export type Env = Record<string, string | undefined>;

export function isWindows(platform: NodeJS.Platform = process.platform): boolean {
  return platform === 'win32';
}

/**
 * Expands `${VAR}` references. Returns null when any referenced variable
 * is unset or empty, so templates for another platform simply drop out.
 */
export function expandEnvTemplate(template: string, env: Env): string | null {
  let missing = false;
  const expanded = template.replace(/\$\{([A-Za-z_][A-Za-z0-9_()]*)\}/g, (_, name: string) => {
    const value = env[name];
    if (!value) {
      missing = true;
      return '';
    }
    return value;
  });
  return missing ? null : expanded;
}

/** Windows paths compare case-insensitively; we do the same everywhere. */
export function pathKey(path: string): string {
  return resolve(path).toLowerCase();
}

export function dedupePaths(paths: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of paths) {
    const key = pathKey(p);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(resolve(p));
  }
  return out;
}
