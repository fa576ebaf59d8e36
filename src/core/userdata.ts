import { homedir } from 'node:os';
import { join } from 'node:path';
import { HOME_DIR, envVar } from '../config/branding.js';

const CONFIG_FILE = 'config.yaml';

export function getHomeRoot(): string {
  return process.env[envVar('HOME')] ?? join(homedir(), HOME_DIR);
}

export function getConfigPath(): string {
  return process.env[envVar('CONFIG')] ?? join(getHomeRoot(), CONFIG_FILE);
}
