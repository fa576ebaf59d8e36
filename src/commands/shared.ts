import { join } from 'node:path';
import type { Command } from 'commander';
import type { SettingKey } from '../config/schema.js';
import { loadManifest } from '../core/manifest.js';
import type { Manifest } from '../types/manifest.js';
import type { RunOptionsInput } from '../types/run.js';

export interface DiscoveryFlags {
  game?: string;
  mo2?: string;
  vortex?: string;
  manifest?: string;
  backup?: boolean;
  backupDir?: string;
  dryRun?: boolean;
  text?: boolean;
  json?: boolean;
  yes?: boolean;
  verbose?: boolean;
}

export type SettingReader = (key: SettingKey) => string;

export function addDiscoveryOptions(cmd: Command): Command {
  return cmd
    .option('-g, --game <path>', 'Fallout New Vegas installation directory')
    .option('--mo2 <path>', 'Mod Organizer 2 base directory (detected beside the game when omitted)')
    .option('--vortex <path>', 'Vortex mods or staging directory')
    .option('-m, --manifest <file>', 'Manifest file to use instead of the bundled one')
    .option('--no-text', 'Leave load-order lists and INI files untouched')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Print debug output');
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `NVMP_Removed_20260119_143005` for the local time of `now`. */
export function defaultBackupName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `NVMP_Removed_${date}_${time}`;
}

export interface RunInputDefaults {
  now?: Date;
  cwd?: string;
}

/**
 * Command-line flags win over settings; empty settings count as unset.
 * A backup with no directory anywhere goes to a timestamped folder in the
 * working directory.
 */
export function resolveRunInput(
  flags: DiscoveryFlags,
  setting: SettingReader,
  defaults: RunInputDefaults = {},
): RunOptionsInput {
  const doBackup = Boolean(flags.backup || flags.backupDir);
  const configured = flags.backupDir ?? (setting('backup_dir') || undefined);
  const backupDestination =
    configured ??
    (doBackup
      ? join(defaults.cwd ?? process.cwd(), defaultBackupName(defaults.now ?? new Date()))
      : undefined);
  return {
    doBackup,
    backupDestination,
    dryRun: Boolean(flags.dryRun),
    cleanText: flags.text !== false && setting('clean_text') !== 'false',
    gameDir: flags.game ?? (setting('game_dir') || undefined),
    mo2Dir: flags.mo2 ?? (setting('mo2_dir') || undefined),
    vortexDir: flags.vortex ?? (setting('vortex_dir') || undefined),
  };
}

export function loadRunManifest(flags: DiscoveryFlags, setting: SettingReader): Manifest {
  return loadManifest(flags.manifest ?? (setting('manifest') || undefined));
}

export function printLines(lines: string[]): void {
  for (const line of lines) console.log(line);
}
