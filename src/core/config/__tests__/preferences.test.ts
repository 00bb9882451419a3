// src/core/config/__tests__/preferences.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  PreferenceStore,
  containerFromIndex,
  defaultPreferences,
  indexFromContainer,
  indexFromResolution,
  resolutionFromIndex,
} from '../preferences.js';
import { getAppDataDir, getPreferencesPath } from '../app-dirs.js';

describe('PreferenceStore', () => {
  let dir: string;
  let file: string;
  const defaults = { outputDir: '/home/test/downloads', maxResIndex: 0, formatIndex: 0 };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubequeue-prefs-'));
    file = path.join(dir, 'nested', 'preferences.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when no file exists', async () => {
    const store = new PreferenceStore(file, defaults);
    await expect(store.load()).resolves.toEqual(defaults);
  });

  it('round-trips saved values', async () => {
    const store = new PreferenceStore(file, defaults);
    await store.load();
    store.set({ outputDir: '/media/videos', maxResIndex: 3, formatIndex: 1 });
    await store.save();

    const reloaded = new PreferenceStore(file, defaults);
    await expect(reloaded.load()).resolves.toEqual({ outputDir: '/media/videos', maxResIndex: 3, formatIndex: 1 });
  });

  it('replaces out-of-range or mistyped values with defaults', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ outputDir: 42, maxResIndex: 9, formatIndex: '1' }));

    const store = new PreferenceStore(file, defaults);
    await expect(store.load()).resolves.toEqual(defaults);
  });

  it('backs up a corrupt file and falls back to defaults', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{ not json');

    const store = new PreferenceStore(file, defaults);
    await expect(store.load()).resolves.toEqual(defaults);
    expect(existsSync(file + '.bak')).toBe(true);
    expect(existsSync(file)).toBe(false);
  });

  it('resets to defaults on disk', async () => {
    const store = new PreferenceStore(file, defaults);
    store.set({ maxResIndex: 2 });
    await store.reset();

    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual(defaults);
    expect(store.get()).toEqual(defaults);
  });

  it('returns copies', async () => {
    const store = new PreferenceStore(file, defaults);
    const prefs = await store.load();
    prefs.maxResIndex = 4;
    expect(store.get().maxResIndex).toBe(0);
  });
});

describe('index mapping', () => {
  it('maps resolution indices', () => {
    expect(resolutionFromIndex(0)).toBeNull();
    expect(resolutionFromIndex(1)).toBe(2160);
    expect(resolutionFromIndex(4)).toBe(720);
    expect(resolutionFromIndex(7)).toBeNull();
    expect(indexFromResolution(null)).toBe(0);
    expect(indexFromResolution(1080)).toBe(3);
    expect(indexFromResolution(480)).toBe(0);
  });

  it('maps container indices', () => {
    expect(containerFromIndex(0)).toBe('mkv');
    expect(containerFromIndex(1)).toBe('mp4');
    expect(indexFromContainer('mkv')).toBe(0);
    expect(indexFromContainer('mp4')).toBe(1);
  });

  it('defaults the output folder under the working directory', () => {
    expect(defaultPreferences('/work')).toEqual({
      outputDir: path.join('/work', 'downloads'),
      maxResIndex: 0,
      formatIndex: 0,
    });
  });
});

describe('app dirs', () => {
  it('honours XDG_DATA_HOME on linux', () => {
    if (process.platform !== 'linux') return;
    expect(getAppDataDir('tubequeue', { XDG_DATA_HOME: '/xdg' })).toBe(path.join('/xdg', 'tubequeue'));
    expect(getPreferencesPath('tubequeue', { XDG_DATA_HOME: '/xdg' })).toBe(
      path.join('/xdg', 'tubequeue', 'preferences.json')
    );
  });

  it('falls back to ~/.local/share on linux', () => {
    if (process.platform !== 'linux') return;
    expect(getAppDataDir('tubequeue', {})).toBe(path.join(os.homedir(), '.local', 'share', 'tubequeue'));
  });
});
