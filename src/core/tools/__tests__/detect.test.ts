// src/core/tools/__tests__/detect.test.ts
import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { checkTool, findExecutable } from '../detect.js';

const posixIt = process.platform === 'win32' ? it.skip : it;

describe('findExecutable', () => {
  let binDir: string;
  let otherDir: string;
  let winDir: string;

  beforeAll(async () => {
    binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubequeue-bin-'));
    otherDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubequeue-other-'));
    await fs.writeFile(path.join(binDir, 'ffmpeg'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.writeFile(path.join(otherDir, 'yt-dlp'), 'not executable', { mode: 0o644 });
    await fs.mkdir(path.join(otherDir, 'ffprobe'));
    winDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubequeue-win-'));
    await fs.writeFile(path.join(winDir, 'ffmpeg'), 'not a program');
    await fs.writeFile(path.join(winDir, 'ffmpeg.EXE'), 'MZ');
  });

  afterAll(async () => {
    await fs.rm(binDir, { recursive: true, force: true });
    await fs.rm(otherDir, { recursive: true, force: true });
    await fs.rm(winDir, { recursive: true, force: true });
  });

  posixIt('finds an executable on PATH', async () => {
    const env = { PATH: `${otherDir}:${binDir}` };
    await expect(findExecutable('ffmpeg', env, 'linux')).resolves.toBe(path.join(binDir, 'ffmpeg'));
  });

  posixIt('skips files without the execute bit', async () => {
    await expect(findExecutable('yt-dlp', { PATH: otherDir }, 'linux')).resolves.toBeNull();
  });

  posixIt('skips directories', async () => {
    await expect(findExecutable('ffprobe', { PATH: otherDir }, 'linux')).resolves.toBeNull();
  });

  posixIt('checks commands with a directory part directly', async () => {
    const direct = path.join(binDir, 'ffmpeg');
    await expect(findExecutable(direct, { PATH: '' }, 'linux')).resolves.toBe(direct);
  });

  it('prefers PATHEXT matches over a bare name on Windows', async () => {
    const env = { PATH: winDir, PATHEXT: '.COM;.EXE' };
    await expect(findExecutable('ffmpeg', env, 'win32')).resolves.toBe(path.join(winDir, 'ffmpeg.EXE'));
  });

  it('still finds a Windows command given with its extension', async () => {
    const env = { PATH: winDir, PATHEXT: '.EXE' };
    await expect(findExecutable('ffmpeg.EXE', env, 'win32')).resolves.toBe(path.join(winDir, 'ffmpeg.EXE'));
  });

  it('returns null with an empty PATH', async () => {
    await expect(findExecutable('ffmpeg', {}, process.platform)).resolves.toBeNull();
  });

  posixIt('reports tool status', async () => {
    await expect(checkTool('ffmpeg', { PATH: binDir })).resolves.toEqual({
      name: 'ffmpeg',
      available: true,
      path: path.join(binDir, 'ffmpeg'),
    });
    await expect(checkTool('ffmpeg', { PATH: otherDir })).resolves.toEqual({
      name: 'ffmpeg',
      available: false,
      path: null,
    });
  });
});
