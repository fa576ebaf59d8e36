import type { Outcome } from '../core/coordinator.js';
import type { RestoreResult } from '../core/backup.js';
import type { EntryFailure, Plan } from '../types/run.js';

export function countLabel(n: number, singular: string, plural = `${singular}s`): string {
  return `${n} ${n === 1 ? singular : plural}`;
}

function reason(failure: EntryFailure): string {
  return `${failure.relativePath}: ${failure.error.reason}`;
}

export function describePlan(
  plan: Plan,
  options: { doBackup?: boolean; backupDestination?: string } = {},
): string[] {
  const present = plan.entries.filter((e) => e.present);
  const absent = plan.entries.length - present.length;
  const lines = [
    `Installation: ${plan.installation}`,
    `Manifest: ${plan.manifest}`,
    ...plan.extraRoots.map((root) => `Also scanned: ${root}`),
    `Entries to remove: ${present.length} (${absent} already absent)`,
  ];
  for (const entry of plan.entries) {
    lines.push(`  - ${entry.relativePath}${entry.present ? '' : ' (absent)'}`);
  }
  if (plan.text.edits.length > 0) {
    lines.push(`Text files to edit: ${plan.text.edits.length}`);
    for (const edit of plan.text.edits) {
      lines.push(`  - ${edit.path} (${countLabel(edit.removedLines.length, 'line')})`);
    }
  }
  for (const failure of plan.text.failed) {
    lines.push(`Could not read ${reason(failure)}`);
  }
  if (options.doBackup && options.backupDestination) {
    lines.push(`Backup destination: ${options.backupDestination}`);
  }
  return lines;
}

export function describeOutcome(outcome: Outcome): string[] {
  if (outcome.dryRun) {
    return ['Dry run: nothing was changed.'];
  }

  const lines: string[] = [];
  const { backup, removal, text } = outcome;

  if (backup) {
    const items = backup.copied.length + backup.textFiles.length;
    lines.push(`Backed up ${countLabel(items, 'item')} to ${backup.destination}`);
    for (const failure of backup.failed) {
      lines.push(`Backup failed for ${reason(failure)}`);
    }
    if (!removal) {
      lines.push('Nothing was removed because the backup did not complete.');
    }
  }

  if (removal) {
    lines.push(
      `Removed ${countLabel(removal.removed.length, 'entry', 'entries')}, ` +
        `${removal.skipped.length} already absent, ${removal.failed.length} failed.`,
    );
    for (const failure of removal.failed) {
      lines.push(`Failed to remove ${reason(failure)}`);
    }
    if (removal.aborted) {
      lines.push(
        `Stopped after an unrecoverable error; not attempted: ${removal.notAttempted.join(', ') || 'none'}`,
      );
    }
  }

  if (text) {
    if (text.edited.length > 0) {
      lines.push(`Edited ${countLabel(text.edited.length, 'text file')}.`);
    }
    for (const failure of text.failed) {
      lines.push(`Failed to edit ${reason(failure)}`);
    }
  }
  for (const failure of outcome.plan.text.failed) {
    lines.push(`Could not read ${reason(failure)}`);
  }

  return lines;
}

export function describeRestore(result: RestoreResult): string[] {
  const lines = [
    `Restored ${countLabel(result.restored.length, 'entry', 'entries')} and ` +
      `${countLabel(result.textFiles.length, 'text file')} to ${result.installation}`,
  ];
  for (const failure of result.failed) {
    lines.push(`Failed to restore ${reason(failure)}`);
  }
  return lines;
}
