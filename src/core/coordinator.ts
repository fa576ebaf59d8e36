import { resolve } from 'node:path';
import { RunOptionsSchema } from '../config/schema.js';
import type { Manifest } from '../types/manifest.js';
import type {
  Plan,
  RunListener,
  RunOptions,
  RunOptionsInput,
  RunState,
  RunStatus,
  TextPlan,
} from '../types/run.js';
import { isInside, isWritable } from '../utils/fs.js';
import type { Env } from '../utils/platform.js';
import { backup, type BackupResult } from './backup.js';
import { ConfigError, ExitCode, IOError } from './errors.js';
import { locateInstallation, type RegistryQuery } from './locator.js';
import { compileSignatures, entryPath, resolveEntries } from './manifest.js';
import { extraScanRoots } from './mod-managers.js';
import { remove, type RemovalResult } from './remover.js';
import { cleanTextFiles, findTextTargets, planTextEdits, textRoots, type CleanResult } from './text-cleaner.js';

export interface RunContext {
  manifest: Manifest;
  env?: Env;
  platform?: NodeJS.Platform;
  queryRegistry?: RegistryQuery;
  listener?: RunListener;
}

export interface Outcome {
  status: RunStatus;
  exitCode: ExitCode;
  dryRun: boolean;
  /** Every state the run passed through, starting at idle. */
  states: RunState[];
  plan: Plan;
  backup?: BackupResult;
  removal?: RemovalResult;
  text?: CleanResult;
}

export function manifestLabel(manifest: Manifest): string {
  return `${manifest.name}@${manifest.version}`;
}

export function parseRunOptions(input: RunOptionsInput): RunOptions {
  const result = RunOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => i.message).join('; '));
  }
  return result.data;
}

// ── Discovery ───────────────────────────────────────────────────────

/**
 * Locates the installation and resolves what a run would touch. Reads
 * only; a dry run reports exactly this.
 */
export function plan(input: RunOptionsInput, context: RunContext): Plan {
  const options = parseRunOptions(input);
  const { manifest } = context;
  const env = context.env ?? process.env;

  const installation = locateInstallation({
    manifest,
    gameDir: options.gameDir,
    env,
    platform: context.platform,
    queryRegistry: context.queryRegistry,
  });

  const extraRoots = extraScanRoots({
    installation,
    manifest,
    env,
    mo2Dir: options.mo2Dir,
    vortexDir: options.vortexDir,
  });
  const exclude = options.backupDestination ? [resolve(options.backupDestination)] : [];
  const entries = resolveEntries(installation, manifest, { exclude, extraRoots });

  let text: TextPlan = { edits: [], failed: [] };
  if (options.cleanText && manifest.textFiles.length > 0) {
    // files inside an entry go with the entry
    const removed = entries
      .filter((e) => e.present)
      .map((e) => entryPath(installation, e.relativePath));
    const targets = findTextTargets(
      textRoots(installation, manifest, env, extraRoots),
      manifest.textFiles,
      [...exclude, ...removed],
    );
    text = planTextEdits(targets, compileSignatures(manifest.signatures));
  }

  return { installation, manifest: manifestLabel(manifest), extraRoots, entries, text };
}

function checkDestination(destination: string, installation: string, present: string[]): void {
  if (isInside(installation, destination)) {
    throw new ConfigError(
      `Backup destination must not contain the installation: ${destination}`,
    );
  }
  const inside = present.find((rel) => isInside(destination, entryPath(installation, rel)));
  if (inside) {
    throw new ConfigError(`Backup destination lies inside a file being removed: ${inside}`);
  }
}

function notWritable(path: string): IOError {
  const cause: NodeJS.ErrnoException = new Error(`${path} is not writable`);
  cause.code = 'EACCES';
  return new IOError(path, cause);
}

// ── Run ─────────────────────────────────────────────────────────────

/**
 * Idle → Discovering → (Backing up) → Removing → Done | Failed.
 *
 * Discovery and configuration errors are thrown before anything is
 * touched. When a backup is requested, removal starts only once every
 * present entry has been copied.
 */
export function run(input: RunOptionsInput, context: RunContext): Outcome {
  const emit = context.listener ?? (() => undefined);
  const states: RunState[] = ['idle'];
  const enter = (state: RunState): void => {
    states.push(state);
    emit({ type: 'state', state });
  };

  const options = parseRunOptions(input);
  enter('discovering');

  let discovered: Plan;
  try {
    discovered = plan(options, context);
  } catch (err) {
    enter('failed');
    throw err;
  }

  const base = { dryRun: options.dryRun, states, plan: discovered };
  if (options.dryRun) {
    enter('done');
    const unreadable = discovered.text.failed.length > 0;
    return {
      ...base,
      status: unreadable ? 'partial' : 'success',
      exitCode: unreadable ? ExitCode.PartialFailure : ExitCode.Success,
    };
  }

  const { installation } = discovered;
  const present = discovered.entries.filter((e) => e.present).map((e) => e.relativePath);
  const textPaths = discovered.text.edits.map((e) => e.path);

  try {
    if (!isWritable(installation)) throw notWritable(installation);
    if (options.doBackup && options.backupDestination) {
      checkDestination(resolve(options.backupDestination), installation, present);
    }
  } catch (err) {
    enter('failed');
    throw err;
  }

  let backupResult: BackupResult | undefined;
  if (options.doBackup && options.backupDestination) {
    enter('backing-up');
    try {
      backupResult = backup(installation, present, resolve(options.backupDestination), {
        textFiles: textPaths,
        manifestLabel: discovered.manifest,
        listener: emit,
      });
    } catch (err) {
      enter('failed');
      throw err;
    }
    if (backupResult.failed.length > 0) {
      enter('failed');
      return { ...base, status: 'failed', exitCode: ExitCode.PartialFailure, backup: backupResult };
    }
  }

  enter('removing');
  const removal = remove(installation, present, { listener: emit });
  const text = removal.aborted
    ? undefined
    : cleanTextFiles(textPaths, compileSignatures(context.manifest.signatures), emit);

  const failures =
    removal.failed.length + (text?.failed.length ?? 0) + discovered.text.failed.length;
  enter(removal.aborted ? 'failed' : 'done');

  return {
    ...base,
    status: failures > 0 ? 'partial' : 'success',
    exitCode: failures > 0 ? ExitCode.PartialFailure : ExitCode.Success,
    backup: backupResult,
    removal,
    text,
  };
}
