// src/cli/commands/download.ts
import { mkdir } from 'node:fs/promises';
import * as path from 'path';
import { Command } from 'commander';
import {
  APP_NAME,
  DEFAULT_YTDLP_BINARY,
  FFMPEG_BINARY,
  RESOLUTION_CHOICES,
} from '../../core/config/constants.js';
import { getPreferencesPath } from '../../core/config/app-dirs.js';
import {
  PreferenceStore,
  containerFromIndex,
  indexFromContainer,
  indexFromResolution,
  resolutionFromIndex,
} from '../../core/config/preferences.js';
import { DownloaderError, ErrorCode } from '../../core/errors.js';
import { ExtractionClient, configure, type RetryOverrides } from '../../core/extract/client.js';
import { SpawnProcessRunner, type ProcessRunner } from '../../core/extract/process.js';
import { QueueWorker, type DownloaderFactory } from '../../core/queue/worker.js';
import { buildQueue, readUrls } from '../../core/queue/url-source.js';
import { checkTool, type ToolStatus } from '../../core/tools/detect.js';
import type { Container, DownloadOptions, RunOutcome } from '../../core/types/index.js';
import {
  INTERRUPT_EXIT_CODES,
  InterruptHandler,
  type InterruptSignal,
  type SignalSource,
} from '../interrupts.js';
import { JsonlReporter, TableReporter, createRows, type Reporter } from '../reporter.js';

export interface DownloadCommandOptions {
  file?: string;
  stdin?: boolean;
  out?: string;
  maxRes?: string;
  format?: string;
  retries?: string;
  fragmentRetries?: string;
  jsonl?: boolean;
  verbose?: boolean;
  ytDlp?: string;
}

export interface DownloadDependencies {
  store?: PreferenceStore;
  createDownloader?: DownloaderFactory;
  checkTool?: (command: string) => Promise<ToolStatus>;
  runner?: ProcessRunner;
  signals?: SignalSource;
  /** Receives the worker before the run starts, so callers can stop it. */
  onWorker?: (worker: QueueWorker) => void;
}

export interface DownloadRun {
  outcome: RunOutcome;
  /** Set when a signal aborted the in-flight download. */
  interruptedBy: InterruptSignal | null;
}

// Every resolution choice except the leading "No cap".
const RESOLUTION_CAPS: readonly string[] = RESOLUTION_CHOICES.slice(1);

export function parseMaxResolution(value: string): number | null {
  if (value === 'none') return null;
  if (RESOLUTION_CAPS.includes(value)) return Number(value);
  throw new DownloaderError(
    ErrorCode.INVALID_OPTION,
    `Invalid max resolution: ${value}`,
    false,
    `Use one of: none, ${RESOLUTION_CAPS.join(', ')}`
  );
}

export function parseContainer(value: string): Container {
  const lowered = value.toLowerCase();
  if (lowered === 'mkv' || lowered === 'mp4') return lowered;
  throw new DownloaderError(ErrorCode.INVALID_OPTION, `Invalid format: ${value}`, false, 'Use mkv or mp4');
}

export function parseRetryCount(value: string, flag: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new DownloaderError(ErrorCode.INVALID_OPTION, `${flag} must be a non-negative integer, got ${value}`);
  }
  return count;
}

export function resolveYtDlpBinary(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return flag || env.TUBEQUEUE_YTDLP || DEFAULT_YTDLP_BINARY;
}

export function registerDownloadCommand(program: Command): void {
  program
    .argument('[urls...]', 'Video URLs to download (optional if using --file or --stdin)')
    .option('--file <path>', 'Read URLs from file')
    .option('--stdin', 'Read URLs from stdin')
    .option('--out <dir>', 'Output directory (default: saved preference)')
    .option('--max-res <cap>', `Maximum video height (${['none', ...RESOLUTION_CAPS].join('|')})`)
    .option('--format <container>', 'Merged container (mkv|mp4)')
    .option('--retries <n>', 'Network retries per item', '10')
    .option('--fragment-retries <n>', 'Fragment retries per item', '10')
    .option('--jsonl', 'Output events as JSONL', false)
    .option('--verbose', 'Verbose output', false)
    .option('--yt-dlp <path>', 'yt-dlp executable (default: $TUBEQUEUE_YTDLP or yt-dlp on PATH)')
    .action(async (urls: string[], options: DownloadCommandOptions) => {
      try {
        const run = await runDownload(urls ?? [], options);
        if (run?.interruptedBy) {
          process.exitCode = INTERRUPT_EXIT_CODES[run.interruptedBy];
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        if (error instanceof DownloaderError && error.suggestion) {
          console.error(`Hint: ${error.suggestion}`);
        }
        process.exit(1);
      }
    });
}

async function collectUrls(urls: readonly string[], options: DownloadCommandOptions): Promise<string[]> {
  const collected = [...urls];
  if (options.file) {
    collected.push(...(await readUrls('file', options.file)));
  }
  if (options.stdin) {
    collected.push(...(await readUrls('stdin')));
  }
  return collected;
}

/**
 * Resolves the run options: explicit flags win, saved preferences fill the
 * rest. The store is updated with the effective values.
 */
export async function resolveDownloadOptions(
  options: DownloadCommandOptions,
  store: PreferenceStore
): Promise<DownloadOptions> {
  const saved = await store.load();
  const maxResolution =
    options.maxRes !== undefined ? parseMaxResolution(options.maxRes) : resolutionFromIndex(saved.maxResIndex);
  const container =
    options.format !== undefined ? parseContainer(options.format) : containerFromIndex(saved.formatIndex);
  const outputDir = path.resolve(options.out ?? saved.outputDir);

  store.set({
    outputDir,
    maxResIndex: indexFromResolution(maxResolution),
    formatIndex: indexFromContainer(container),
  });
  return { maxResolution, container, outputDir };
}

export async function runDownload(
  urls: readonly string[],
  options: DownloadCommandOptions,
  deps: DownloadDependencies = {}
): Promise<DownloadRun | null> {
  const all = await collectUrls(urls, options);
  if (all.length === 0) {
    throw new DownloaderError(
      ErrorCode.INVALID_OPTION,
      'URL argument or --file/--stdin is required'
    );
  }

  const { items, rejected } = buildQueue(all);
  for (const url of rejected) {
    console.error(`[WARN] Skipping invalid URL: ${url}`);
  }
  if (items.length === 0) {
    throw new DownloaderError(
      ErrorCode.INVALID_URL,
      'None of the given URLs is a valid http(s) URL',
      false,
      'Pass full links such as https://www.youtube.com/watch?v=...'
    );
  }

  const retryOverrides: RetryOverrides = {
    retries: parseRetryCount(options.retries ?? '10', '--retries'),
    fragmentRetries: parseRetryCount(options.fragmentRetries ?? '10', '--fragment-retries'),
  };

  const store = deps.store ?? new PreferenceStore(getPreferencesPath(APP_NAME));
  const downloadOptions = await resolveDownloadOptions(options, store);
  await mkdir(downloadOptions.outputDir, { recursive: true });

  const lookup = deps.checkTool ?? ((command: string) => checkTool(command));
  const ffmpeg = await lookup(FFMPEG_BINARY);
  if (!ffmpeg.available) {
    console.error('[WARN] FFmpeg not found on PATH. Install it or merges may fail.');
  }

  const binary = resolveYtDlpBinary(options.ytDlp);
  const runner = deps.runner ?? new SpawnProcessRunner();
  const createDownloader: DownloaderFactory =
    deps.createDownloader ??
    ((runOptions) =>
      new ExtractionClient(configure(runOptions, retryOverrides), {
        binary,
        runner,
        verbose: options.verbose ?? false,
      }));

  const worker = new QueueWorker(createDownloader, { verbose: options.verbose ?? false });
  const itemUrls = items.map((item) => item.url);
  const reporter: Reporter = options.jsonl
    ? new JsonlReporter(itemUrls)
    : new TableReporter(createRows(itemUrls));
  worker.onProgress((index, event) => reporter.apply(index, event));
  worker.onFinished((outcome) => reporter.finish(outcome));
  deps.onWorker?.(worker);

  if (options.verbose) {
    console.error(`[INFO] Saving to ${downloadOptions.outputDir} as ${downloadOptions.container}`);
  }

  const interrupts = new InterruptHandler(
    {
      stop: () => worker.stop(),
      abort: (signal) => runner.terminate(signal),
    },
    deps.signals
  );
  interrupts.install();

  try {
    const outcome = await worker.start(items, downloadOptions);
    return { outcome, interruptedBy: interrupts.getInterruptedBy() };
  } finally {
    interrupts.dispose();
    await store.save();
  }
}
