import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { exitCodeFor } from '../core/errors.js';
import { getConfigPath } from '../core/userdata.js';
import { fail } from '../ui/output.js';
import { printTable } from '../ui/table.js';

function guarded(fn: () => void): void {
  try {
    fn();
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
    process.exit(exitCodeFor(err));
  }
}

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage user settings (game_dir, backup_dir, manifest, clean_text)');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key')
    .argument('<value>', 'Config value')
    .action((key: string, value: string) =>
      guarded(() => {
        settings.init(getConfigPath());
        settings.set(key, value);
        console.log(`Set ${key} = ${value}`);
      }),
    );

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) =>
      guarded(() => {
        settings.init(getConfigPath());
        const value = settings.isSettingKey(key) ? settings.get(key) : '';
        if (value) {
          console.log(value);
        }
      }),
    );

  cmd
    .command('list')
    .description('List all config values')
    .action(() =>
      guarded(() => {
        settings.init(getConfigPath());
        const rows = Object.entries(settings.all()).map(([k, v]) => [k, String(v)]);
        if (rows.length === 0) {
          console.log(`No settings in ${getConfigPath()}`);
          return;
        }
        printTable(['Key', 'Value'], rows);
      }),
    );
}
