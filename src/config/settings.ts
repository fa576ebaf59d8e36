import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { ConfigError, isNodeError } from '../core/errors.js';
import type { Settings } from '../types/manifest.js';
import { SETTING_KEYS, SettingsSchema, type SettingKey } from './schema.js';

let configPath = '';
let configData: Settings = {};

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

export function init(path: string): void {
  configPath = path;
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      configData = {};
      return;
    }
    throw err;
  }
  const parsed = SettingsSchema.safeParse(yaml.load(raw) ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings file: ${path}`);
  }
  configData = parsed.data;
}

export function get(key: SettingKey): string {
  return configData[key] ?? '';
}

export function set(key: string, value: string): void {
  if (!isSettingKey(key)) {
    throw new ConfigError(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  const parsed = SettingsSchema.safeParse({ ...configData, [key]: value });
  if (!parsed.success) {
    throw new ConfigError(`Invalid value for ${key}: ${parsed.error.issues[0]?.message ?? value}`);
  }
  configData = parsed.data;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData), 'utf-8');
}

export function all(): Settings {
  return { ...configData };
}
