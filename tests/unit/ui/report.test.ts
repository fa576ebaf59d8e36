import { describe, it, expect } from 'vitest';
import type { Outcome } from '../../../src/core/coordinator.js';
import { IOError } from '../../../src/core/errors.js';
import { countLabel, describeOutcome, describePlan, describeRestore } from '../../../src/ui/report.js';
import type { Plan } from '../../../src/types/run.js';

function ioError(path: string, code: string): IOError {
  const cause: NodeJS.ErrnoException = new Error(code);
  cause.code = code;
  return new IOError(path, cause);
}

const plan: Plan = {
  installation: '/games/fnv',
  manifest: 'nvmp@1.0.0',
  extraRoots: [],
  entries: [
    { relativePath: 'nvmp_launcher.exe', source: 'fixed', present: true },
    { relativePath: 'nvmp.log', source: 'fixed', present: false },
  ],
  text: { edits: [{ path: '/games/fnv/plugins.txt', removedLines: ['NVMP.esp'] }], failed: [] },
};

describe('report', () => {
  it('pluralises counts', () => {
    expect(countLabel(1, 'entry', 'entries')).toBe('1 entry');
    expect(countLabel(2, 'entry', 'entries')).toBe('2 entries');
    expect(countLabel(0, 'line')).toBe('0 lines');
  });

  it('describes a plan', () => {
    expect(describePlan(plan, { doBackup: true, backupDestination: '/bak' })).toEqual([
      'Installation: /games/fnv',
      'Manifest: nvmp@1.0.0',
      'Entries to remove: 1 (1 already absent)',
      '  - nvmp_launcher.exe',
      '  - nvmp.log (absent)',
      'Text files to edit: 1',
      '  - /games/fnv/plugins.txt (1 line)',
      'Backup destination: /bak',
    ]);
  });

  it('lists mod-manager folders that were scanned', () => {
    const lines = describePlan({ ...plan, extraRoots: ['/mo2/mods', '/mo2/overwrite'] });
    expect(lines.slice(0, 5)).toEqual([
      'Installation: /games/fnv',
      'Manifest: nvmp@1.0.0',
      'Also scanned: /mo2/mods',
      'Also scanned: /mo2/overwrite',
      'Entries to remove: 1 (1 already absent)',
    ]);
  });

  it('describes a dry run', () => {
    const outcome: Outcome = {
      status: 'success',
      exitCode: 0,
      dryRun: true,
      states: ['idle', 'discovering', 'done'],
      plan,
    };
    expect(describeOutcome(outcome)).toEqual(['Dry run: nothing was changed.']);
  });

  it('describes a partial removal that stopped early', () => {
    const outcome: Outcome = {
      status: 'partial',
      exitCode: 1,
      dryRun: false,
      states: ['idle', 'discovering', 'removing', 'failed'],
      plan: { ...plan, text: { edits: [], failed: [] } },
      removal: {
        removed: ['a.dll'],
        skipped: ['nvmp.log'],
        failed: [{ relativePath: 'b.dll', error: ioError('/games/fnv/b.dll', 'EBUSY') }],
        notAttempted: ['c.dll'],
        aborted: true,
      },
    };
    expect(describeOutcome(outcome)).toEqual([
      'Removed 1 entry, 1 already absent, 1 failed.',
      'Failed to remove b.dll: file in use',
      'Stopped after an unrecoverable error; not attempted: c.dll',
    ]);
  });

  it('explains that nothing was removed when the backup failed', () => {
    const outcome: Outcome = {
      status: 'failed',
      exitCode: 1,
      dryRun: false,
      states: ['idle', 'discovering', 'backing-up', 'failed'],
      plan,
      backup: {
        destination: '/bak',
        copied: ['nvmp_launcher.exe'],
        skipped: [],
        failed: [{ relativePath: 'nvmp.log', error: ioError('/games/fnv/nvmp.log', 'EACCES') }],
        external: [],
        textFiles: [],
      },
    };
    expect(describeOutcome(outcome)).toEqual([
      'Backed up 1 item to /bak',
      'Backup failed for nvmp.log: permission denied',
      'Nothing was removed because the backup did not complete.',
    ]);
  });

  it('describes a restore', () => {
    expect(
      describeRestore({
        installation: '/games/fnv',
        restored: ['a.dll', 'b.dll'],
        failed: [],
        textFiles: ['/games/fnv/plugins.txt'],
      }),
    ).toEqual(['Restored 2 entries and 1 text file to /games/fnv']);
  });
});
