export const APP_NAME = 'nvmp-remover';
export const DISPLAY_NAME = 'NV:MP Remover';
export const DESCRIPTION =
  'Finds the NV:MP multiplayer files in a Fallout: New Vegas installation and its mod managers,\n' +
  'optionally backs them up, and removes them.';
export const HOME_DIR = '.nvmp-remover';
export const ENV_PREFIX = 'NVMP_REMOVER';
export const BACKUP_RECORD_FILE = 'backup-record.yaml';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
