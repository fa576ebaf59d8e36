import type { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { APP_NAME } from '../config/branding.js';

export function readVersion(): string {
  // src/commands or dist/commands, both two levels below the package root
  const thisFile = fileURLToPath(import.meta.url);
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(join(dirname(thisFile), '..', '..', 'package.json'), 'utf-8'),
    );
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // running outside the package tree
  }
  return 'dev';
}

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const version = readVersion();

      if (opts.short) {
        console.log(version);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify({ name: APP_NAME, version, node: process.version }, null, 2));
        return;
      }

      console.log(`${APP_NAME} version ${version} (node ${process.version})`);
    });
}
