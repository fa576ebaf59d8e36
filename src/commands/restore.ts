import type { Command } from 'commander';
import { resolve } from 'node:path';
import { restore } from '../core/backup.js';
import { ExitCode, exitCodeFor } from '../core/errors.js';
import { fail, ok } from '../ui/output.js';
import { askConfirm } from '../ui/prompts.js';
import { describeRestore } from '../ui/report.js';

export function registerRestore(program: Command): void {
  program
    .command('restore')
    .description('Copy files from a backup made by remove back into the game folder')
    .argument('<backup-dir>', 'Backup directory written by remove --backup')
    .option('-g, --game <path>', 'Restore into this folder instead of the recorded one')
    .option('--json', 'Output as JSON')
    .option('-y, --yes', 'Skip confirmation prompt')
    .action(async (backupDir: string, opts: { game?: string; json?: boolean; yes?: boolean }) => {
      try {
        if (!opts.yes && !opts.json) {
          const confirmed = await askConfirm(
            `Restore files from ${resolve(backupDir)}? Existing files will be overwritten.`,
          );
          if (!confirmed) {
            console.log('Cancelled.');
            return;
          }
        }

        const result = restore(resolve(backupDir), opts.game);

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          for (const line of describeRestore(result)) console.log(line);
          if (result.failed.length === 0) ok('Restore complete.');
        }
        if (result.failed.length > 0) process.exit(ExitCode.PartialFailure);
      } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
        process.exit(exitCodeFor(err));
      }
    });
}
