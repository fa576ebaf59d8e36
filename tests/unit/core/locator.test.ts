import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  detectCandidates,
  locateInstallation,
  parseLibraryFolders,
  parseRegQueryOutput,
} from '../../../src/core/locator.js';
import { NotFoundError } from '../../../src/core/errors.js';
import { loadManifest } from '../../../src/core/manifest.js';
import { makeTempDir, testManifest, writeTree } from '../fixtures.js';

describe('locator', () => {
  describe('parseRegQueryOutput', () => {
    it('extracts the value from reg query output', () => {
      const output = [
        '',
        'HKEY_LOCAL_MACHINE\\SOFTWARE\\WOW6432Node\\Bethesda Softworks\\FalloutNV',
        '    Installed Path    REG_SZ    D:\\Games\\Fallout New Vegas\\',
        '',
      ].join('\r\n');
      expect(parseRegQueryOutput(output, 'Installed Path')).toBe('D:\\Games\\Fallout New Vegas\\');
    });

    it('returns null when the value is absent', () => {
      expect(parseRegQueryOutput('    Other    REG_SZ    x', 'Installed Path')).toBeNull();
    });
  });

  describe('parseLibraryFolders', () => {
    it('reads every library path and unescapes backslashes', () => {
      const vdf = `"libraryfolders"
{
  "0"
  {
    "path"    "C:\\\\Program Files (x86)\\\\Steam"
    "label"   ""
  }
  "1"
  {
    "path"    "E:\\\\SteamLibrary"
  }
}`;
      expect(parseLibraryFolders(vdf)).toEqual([
        'C:\\Program Files (x86)\\Steam',
        'E:\\SteamLibrary',
      ]);
    });
  });

  describe('detection', () => {
    let base: string;

    beforeEach(() => {
      base = makeTempDir('locator');
    });

    afterEach(() => {
      rmSync(base, { recursive: true, force: true });
    });

    it('finds installs in Steam libraries and common folders that hold the executable', () => {
      const programFiles = join(base, 'pf86');
      const library = join(base, 'library');
      writeTree(programFiles, {
        'Steam/steamapps/libraryfolders.vdf': `"libraryfolders" { "1" { "path" "${library}" } }`,
        'GOG Galaxy/Games/Test Game/Game.exe': '',
        'Steam/steamapps/common/Test Game/readme.txt': '',
      });
      writeTree(library, { 'steamapps/common/Test Game/Game.exe': '' });

      const candidates = detectCandidates({
        manifest: testManifest(),
        env: { 'ProgramFiles(x86)': programFiles },
        platform: 'linux',
      });
      expect(candidates).toEqual([
        join(library, 'steamapps', 'common', 'Test Game'),
        join(programFiles, 'GOG Galaxy', 'Games', 'Test Game'),
      ]);
    });

    it('asks the registry first on Windows', () => {
      const install = join(base, 'registry-install');
      writeTree(install, { 'Game.exe': '' });
      const query = vi.fn().mockReturnValue(install);

      const candidates = detectCandidates({
        manifest: testManifest({
          game: {
            name: 'Test Game',
            executable: 'Game.exe',
            folderNames: ['Test Game'],
            registryKeys: [{ key: 'HKLM\\SOFTWARE\\Test', value: 'Installed Path' }],
          },
        }),
        env: {},
        platform: 'win32',
        queryRegistry: query,
      });
      expect(query).toHaveBeenCalledWith('HKLM\\SOFTWARE\\Test', 'Installed Path');
      expect(candidates).toEqual([install]);
    });

    it('does not query the registry elsewhere', () => {
      const query = vi.fn();
      detectCandidates({ manifest: testManifest(), env: {}, platform: 'linux', queryRegistry: query });
      expect(query).not.toHaveBeenCalled();
    });

    it('picks the first candidate holding a manifest entry', () => {
      const programFiles = join(base, 'pf');
      writeTree(programFiles, {
        'Steam/steamapps/common/Test Game/Game.exe': '',
        'GOG Galaxy/Games/Test Game/Game.exe': '',
        'GOG Galaxy/Games/Test Game/mods/nvmp/client.dll': 'dll',
      });
      const found = locateInstallation({
        manifest: testManifest(),
        env: { ProgramFiles: programFiles },
        platform: 'linux',
      });
      expect(found).toBe(join(programFiles, 'GOG Galaxy', 'Games', 'Test Game'));
    });

    it('throws NotFoundError when nothing is detected', () => {
      expect(() =>
        locateInstallation({ manifest: testManifest(), env: {}, platform: 'linux' }),
      ).toThrow(NotFoundError);
    });

    it('throws NotFoundError when detected installs hold no manifest entry', () => {
      const programFiles = join(base, 'pf');
      writeTree(programFiles, { 'Steam/steamapps/common/Test Game/Game.exe': '' });
      expect(() =>
        locateInstallation({
          manifest: testManifest(),
          env: { ProgramFiles: programFiles },
          platform: 'linux',
        }),
      ).toThrow(/No Test mod files found/);
    });
  });

  describe('user-supplied path', () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir('game');
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it('accepts a folder holding a manifest entry without the game executable', () => {
      writeTree(root, { 'mods/nvmp/config.ini': '[nvmp]' });
      expect(locateInstallation({ manifest: testManifest(), gameDir: root, env: {} })).toBe(root);
    });

    it('accepts NV:MP files named in upper case with the bundled manifest', () => {
      writeTree(root, { 'FalloutNV.exe': '', 'NVMP.log': 'log', 'NVMP_Launcher.exe': 'exe' });
      expect(locateInstallation({ manifest: loadManifest(), gameDir: root, env: {} })).toBe(root);
    });

    it('rejects a folder without manifest entries', () => {
      writeTree(root, { 'Game.exe': '' });
      expect(() =>
        locateInstallation({ manifest: testManifest(), gameDir: root, env: {} }),
      ).toThrow(NotFoundError);
    });

    it('rejects a folder that does not exist', () => {
      const missing = join(root, 'missing');
      let caught: unknown;
      try {
        locateInstallation({ manifest: testManifest(), gameDir: missing, env: {} });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(NotFoundError);
      expect(caught instanceof NotFoundError && caught.path).toBe(missing);
    });
  });
});
