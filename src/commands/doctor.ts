import type { Command } from 'commander';
import { dirname } from 'node:path';
import { DISPLAY_NAME } from '../config/branding.js';
import * as settings from '../config/settings.js';
import { manifestLabel } from '../core/coordinator.js';
import { detectCandidates, locateInstallation } from '../core/locator.js';
import { loadManifest, parseManifestFile } from '../core/manifest.js';
import { extraScanRoots } from '../core/mod-managers.js';
import { getConfigPath } from '../core/userdata.js';
import type { Manifest } from '../types/manifest.js';
import { dirExists, isWritable } from '../utils/fs.js';
import { fail, info, ok, warn } from '../ui/output.js';

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function registerDoctor(program: Command): void {
  program
    .command('doctor')
    .description('Check settings, manifest and game detection')
    .option('-g, --game <path>', 'Check this installation instead of detecting one')
    .option('--mo2 <path>', 'Mod Organizer 2 base directory')
    .option('--vortex <path>', 'Vortex mods or staging directory')
    .option('--check-manifest <path>', 'Validate a specific manifest file')
    .action((opts: { game?: string; mo2?: string; vortex?: string; checkManifest?: string }) => {
      let problems = 0;
      console.log(`\n${DISPLAY_NAME} Doctor\n`);

      console.log('Settings:');
      try {
        settings.init(getConfigPath());
        ok(`  ${getConfigPath()}`);
      } catch (err) {
        fail(`  ${message(err)}`);
        problems++;
      }
      console.log('');

      console.log('Manifest:');
      let manifest: Manifest | undefined;
      try {
        manifest = opts.checkManifest
          ? parseManifestFile(opts.checkManifest)
          : loadManifest(settings.get('manifest') || undefined);
        ok(`  ${manifestLabel(manifest)}: ${manifest.entries.length} entries, ` +
          `${manifest.signatures.patterns.length} patterns`);
      } catch (err) {
        fail(`  ${message(err)}`);
        problems++;
      }
      console.log('');

      if (manifest) {
        console.log('Installation:');
        const gameDir = opts.game ?? (settings.get('game_dir') || undefined);
        if (!gameDir) {
          const candidates = detectCandidates({ manifest });
          if (candidates.length === 0) {
            warn(`  No ${manifest.game.name} installation detected`);
          }
          for (const candidate of candidates) info(`  Detected: ${candidate}`);
        }
        try {
          const installation = locateInstallation({ manifest, gameDir });
          ok(`  NV:MP files found in ${installation}`);
          if (isWritable(installation)) {
            ok('  Installation is writable');
          } else {
            fail('  Installation is not writable (run as Administrator?)');
            problems++;
          }
          const roots = extraScanRoots({
            installation,
            manifest,
            env: process.env,
            mo2Dir: opts.mo2 ?? (settings.get('mo2_dir') || undefined),
            vortexDir: opts.vortex ?? (settings.get('vortex_dir') || undefined),
          });
          for (const root of roots) info(`  Also scanned: ${root}`);
        } catch (err) {
          warn(`  ${message(err)}`);
        }
        console.log('');
      }

      const backupDir = settings.get('backup_dir');
      if (backupDir) {
        console.log('Backup directory:');
        const target = dirExists(backupDir) ? backupDir : dirname(backupDir);
        if (dirExists(target) && isWritable(target)) {
          ok(`  ${backupDir}`);
        } else {
          fail(`  ${backupDir} is not writable`);
          problems++;
        }
        console.log('');
      }

      if (problems > 0) {
        fail(`Doctor found ${problems} problem(s).`);
        process.exit(1);
      }
      ok('Doctor complete.');
    });
}
