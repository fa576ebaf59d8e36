import type { Command } from 'commander';
import chalk from 'chalk';
import { APP_NAME } from '../config/branding.js';
import * as settings from '../config/settings.js';
import { plan, run, type RunContext } from '../core/coordinator.js';
import { ConfigError, ExitCode, NotFoundError, exitCodeFor } from '../core/errors.js';
import { getConfigPath } from '../core/userdata.js';
import type { Plan, RunEvent, RunOptionsInput } from '../types/run.js';
import { debug, fail, info, ok, setVerbose, warn } from '../ui/output.js';
import { askConfirm, askInput } from '../ui/prompts.js';
import { describeOutcome, describePlan } from '../ui/report.js';
import { withSpinner } from '../ui/spinner.js';
import {
  addDiscoveryOptions,
  loadRunManifest,
  printLines,
  resolveRunInput,
  type DiscoveryFlags,
} from './shared.js';

function printEvent(event: RunEvent): void {
  switch (event.type) {
    case 'state':
      debug(`state: ${event.state}`);
      break;
    case 'copied':
      ok(`backed up ${event.relativePath}`);
      break;
    case 'removed':
      ok(`removed ${event.relativePath}`);
      break;
    case 'skipped':
      info(`${event.relativePath} already absent`);
      break;
    case 'failed':
      fail(`${event.relativePath}: ${event.error.reason}`);
      break;
    case 'edited':
      ok(`edited ${event.path} (${event.lines} line(s) removed)`);
      break;
  }
}

async function discover(
  input: RunOptionsInput,
  context: RunContext,
  flags: DiscoveryFlags,
): Promise<{ input: RunOptionsInput; plan: Plan }> {
  const interactive = !flags.json && !flags.yes && Boolean(process.stdin.isTTY);
  try {
    return {
      input,
      plan: withSpinner('Scanning for NV:MP files...', () => plan(input, context), Boolean(flags.json)),
    };
  } catch (err) {
    if (!(err instanceof NotFoundError) || input.gameDir || !interactive) throw err;
    warn(err.message);
    const gameDir = (await askInput('Path to your Fallout New Vegas folder:')).trim();
    if (!gameDir) throw err;
    const retry = { ...input, gameDir };
    return { input: retry, plan: plan(retry, context) };
  }
}

export function registerRemove(program: Command): void {
  const cmd = program
    .command('remove', { isDefault: true })
    .description('Back up (optionally) and remove NV:MP files from the game folder')
    .option('-b, --backup', 'Copy files to the backup directory before removing them')
    .option('--backup-dir <path>', 'Backup directory (implies --backup)')
    .option('--dry-run', 'Show what would be removed without changing anything')
    .option('-y, --yes', 'Skip confirmation prompt');

  addDiscoveryOptions(cmd).action(async (opts: DiscoveryFlags) => {
    try {
      setVerbose(Boolean(opts.verbose));
      settings.init(getConfigPath());
      const manifest = loadRunManifest(opts, settings.get);
      const initial = resolveRunInput(opts, settings.get);

      if (opts.json && !opts.yes && !initial.dryRun) {
        throw new ConfigError('--json needs --yes or --dry-run');
      }

      const context: RunContext = { manifest };
      const { input, plan: discovered } = await discover(initial, context, opts);

      if (!opts.json) {
        console.log('');
        printLines(describePlan(discovered, input));
        console.log('');
      }

      if (discovered.entries.every((e) => !e.present) && discovered.text.edits.length === 0) {
        if (opts.json) {
          console.log(JSON.stringify({ status: 'success', plan: discovered }, null, 2));
        } else {
          info('Nothing to remove.');
        }
        return;
      }

      if (!input.dryRun && !opts.yes) {
        const confirmed = await askConfirm(
          input.doBackup ? 'Back up and remove these files?' : 'Permanently remove these files?',
          false,
        );
        if (!confirmed) {
          console.log('Cancelled.');
          return;
        }
      }

      const outcome = run(input, {
        ...context,
        listener: opts.json ? undefined : printEvent,
      });

      if (opts.json) {
        console.log(JSON.stringify(outcome, null, 2));
      } else {
        console.log('');
        printLines(describeOutcome(outcome));
        if (outcome.status === 'success' && !outcome.dryRun) {
          ok(chalk.bold('NV:MP has been removed.'));
        }
        if (outcome.backup && outcome.backup.copied.length > 0) {
          info(`To undo, run: ${APP_NAME} restore "${outcome.backup.destination}"`);
        }
      }

      if (outcome.exitCode !== ExitCode.Success) {
        process.exit(outcome.exitCode);
      }
    } catch (err) {
      fail(err instanceof Error ? err.message : String(err));
      process.exit(exitCodeFor(err));
    }
  });
}
