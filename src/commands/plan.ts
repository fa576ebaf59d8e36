import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { plan } from '../core/coordinator.js';
import { exitCodeFor } from '../core/errors.js';
import { getConfigPath } from '../core/userdata.js';
import { fail, info, setVerbose } from '../ui/output.js';
import { withSpinner } from '../ui/spinner.js';
import { printEntries, printTextEdits } from '../ui/table.js';
import { addDiscoveryOptions, loadRunManifest, resolveRunInput, type DiscoveryFlags } from './shared.js';

export function registerPlan(program: Command): void {
  const cmd = program
    .command('plan')
    .description('List the NV:MP files and text-file lines a removal would touch');

  addDiscoveryOptions(cmd).action((opts: DiscoveryFlags) => {
    try {
      setVerbose(Boolean(opts.verbose));
      settings.init(getConfigPath());
      const manifest = loadRunManifest(opts, settings.get);
      const input = { ...resolveRunInput(opts, settings.get), doBackup: false };
      const discovered = withSpinner(
        'Scanning for NV:MP files...',
        () => plan(input, { manifest }),
        Boolean(opts.json),
      );

      if (opts.json) {
        console.log(JSON.stringify(discovered, null, 2));
        return;
      }

      info(`Installation: ${discovered.installation}`);
      if (discovered.entries.length === 0) {
        console.log('No NV:MP entries found.');
      } else {
        printEntries(discovered.entries);
      }

      if (discovered.text.edits.length > 0) {
        printTextEdits(discovered.text.edits);
      }
      for (const failure of discovered.text.failed) {
        fail(`${failure.relativePath}: ${failure.error.reason}`);
      }
    } catch (err) {
      fail(err instanceof Error ? err.message : String(err));
      process.exit(exitCodeFor(err));
    }
  });
}
