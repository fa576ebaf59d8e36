import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { dedupePaths, expandEnvTemplate, isWindows } from '../../../src/utils/platform.js';

describe('platform', () => {
  it('expands environment references', () => {
    expect(expandEnvTemplate('${LOCALAPPDATA}/FalloutNV', { LOCALAPPDATA: 'C:/Users/u/AppData/Local' })).toBe(
      'C:/Users/u/AppData/Local/FalloutNV',
    );
  });

  it('accepts variable names with parentheses', () => {
    expect(expandEnvTemplate('${ProgramFiles(x86)}/Steam', { 'ProgramFiles(x86)': 'C:/PF86' })).toBe(
      'C:/PF86/Steam',
    );
  });

  it('returns null when a variable is unset or empty', () => {
    expect(expandEnvTemplate('${USERPROFILE}/Documents', {})).toBeNull();
    expect(expandEnvTemplate('${USERPROFILE}/Documents', { USERPROFILE: '' })).toBeNull();
  });

  it('drops duplicate paths ignoring case', () => {
    expect(dedupePaths(['/games/FNV', '/games/fnv/', '/games/other'])).toEqual([
      resolve('/games/FNV'),
      resolve('/games/other'),
    ]);
  });

  it('detects Windows', () => {
    expect(isWindows('win32')).toBe(true);
    expect(isWindows('linux')).toBe(false);
  });
});
