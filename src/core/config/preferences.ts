// src/core/config/preferences.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { CONTAINER_CHOICES, RESOLUTION_CHOICES } from './constants.js';
import type { Container } from '../types/index.js';

export interface Preferences {
  outputDir: string;
  maxResIndex: number;
  formatIndex: number;
}

export function defaultPreferences(cwd: string = process.cwd()): Preferences {
  return {
    outputDir: path.join(cwd, 'downloads'),
    maxResIndex: 0,
    formatIndex: 0,
  };
}

export function resolutionFromIndex(index: number): number | null {
  const choice = RESOLUTION_CHOICES[index];
  if (choice === undefined || choice === 'No cap') {
    return null;
  }
  return Number(choice);
}

export function containerFromIndex(index: number): Container {
  return index === 1 ? 'mp4' : 'mkv';
}

export function indexFromResolution(maxResolution: number | null): number {
  if (maxResolution === null) return 0;
  const index = RESOLUTION_CHOICES.findIndex((choice) => choice === String(maxResolution));
  return index === -1 ? 0 : index;
}

export function indexFromContainer(container: Container): number {
  return container === 'mp4' ? 1 : 0;
}

function readIndex(value: unknown, size: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < size ? value : 0;
}

export class PreferenceStore {
  private preferences: Preferences;
  private loaded: boolean = false;

  constructor(
    private readonly filePath: string,
    private readonly defaults: Preferences = defaultPreferences()
  ) {
    this.preferences = { ...defaults };
  }

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<Preferences> {
    if (this.loaded) return this.get();

    if (!existsSync(this.filePath)) {
      this.loaded = true;
      return this.get();
    }

    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      this.preferences = this.parse(JSON.parse(content));
    } catch (error) {
      console.error(`[WARN] Unreadable preferences at ${this.filePath}, using defaults: ${error instanceof Error ? error.message : error}`);
      await this.backupAndRecover();
    }
    this.loaded = true;
    return this.get();
  }

  get(): Preferences {
    return { ...this.preferences };
  }

  set(update: Partial<Preferences>): void {
    this.preferences = { ...this.preferences, ...update };
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(this.preferences, null, 2));
  }

  async reset(): Promise<void> {
    this.preferences = { ...this.defaults };
    await this.save();
  }

  private parse(raw: unknown): Preferences {
    if (typeof raw !== 'object' || raw === null) {
      return { ...this.defaults };
    }
    const outputDir = 'outputDir' in raw ? raw.outputDir : undefined;
    return {
      outputDir:
        typeof outputDir === 'string' && outputDir.length > 0 ? outputDir : this.defaults.outputDir,
      maxResIndex: readIndex('maxResIndex' in raw ? raw.maxResIndex : undefined, RESOLUTION_CHOICES.length),
      formatIndex: readIndex('formatIndex' in raw ? raw.formatIndex : undefined, CONTAINER_CHOICES.length),
    };
  }

  private async backupAndRecover(): Promise<void> {
    const backupPath = this.filePath + '.bak';

    try {
      await fs.rename(this.filePath, backupPath);
    } catch (error) {
      console.error(`[WARN] Could not back up ${this.filePath}: ${error instanceof Error ? error.message : error}`);
    }

    this.preferences = { ...this.defaults };
  }
}
