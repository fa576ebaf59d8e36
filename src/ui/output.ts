import chalk from 'chalk';
import { envVar } from '../config/branding.js';

let verbose = process.env[envVar('DEBUG')] === '1';

export function setVerbose(value: boolean): void {
  verbose = value || process.env[envVar('DEBUG')] === '1';
}

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);
export const warn = (msg: string) => console.error(chalk.yellow('⚠'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);

export function debug(msg: string): void {
  if (verbose) console.error(chalk.gray(`· ${msg}`));
}
