// src/core/extract/client.ts
import * as path from 'path';
import {
  DEFAULT_USER_AGENT,
  DEFAULT_YTDLP_BINARY,
  HTTP_CHUNK_SIZE,
  OUTPUT_TEMPLATE,
  RETRY_COUNTS,
} from '../config/constants.js';
import { DownloaderError, ErrorCode } from '../errors.js';
import { buildFormat } from '../format/selector.js';
import type { DownloadOptions, RawProgress } from '../types/index.js';
import { parseErrorLine, parseProbeTitle, parseProgressLine, PROGRESS_MARKER } from './output.js';
import { SpawnProcessRunner, type ProcessResult, type ProcessRunner } from './process.js';

export interface ClientConfig {
  format: string;
  mergeOutputFormat: string;
  outputTemplate: string;
  httpHeaders: Record<string, string>;
  httpChunkSize: number;
  retries: number;
  fragmentRetries: number;
  continueDownload: boolean;
  ignoreErrors: 'only_download';
  geoBypass: boolean;
  quiet: boolean;
  extractorArgs: Record<string, Record<string, string[]>>;
}

export interface RetryOverrides {
  retries?: number;
  fragmentRetries?: number;
}

export type TitleProbe = { ok: true; title: string } | { ok: false; reason: string };

export type ProgressSink = (raw: RawProgress) => void;

export interface ExtractionClientOptions {
  binary?: string;
  runner?: ProcessRunner;
  verbose?: boolean;
}

export function configure(options: DownloadOptions, overrides: RetryOverrides = {}): ClientConfig {
  return {
    format: buildFormat(options.maxResolution),
    mergeOutputFormat: options.container,
    outputTemplate: path.join(options.outputDir, OUTPUT_TEMPLATE),
    httpHeaders: { 'User-Agent': DEFAULT_USER_AGENT },
    httpChunkSize: HTTP_CHUNK_SIZE,
    retries: overrides.retries ?? RETRY_COUNTS.network,
    fragmentRetries: overrides.fragmentRetries ?? RETRY_COUNTS.fragment,
    continueDownload: true,
    ignoreErrors: 'only_download',
    geoBypass: true,
    quiet: true,
    extractorArgs: { youtube: { player_client: ['android'] } },
  };
}

/** Options shared by the metadata probe and the download itself. */
function commonArgs(config: ClientConfig): string[] {
  const args: string[] = [];
  for (const [name, value] of Object.entries(config.httpHeaders)) {
    args.push('--add-header', `${name}:${value}`);
  }
  for (const [extractor, extractorOptions] of Object.entries(config.extractorArgs)) {
    const joined = Object.entries(extractorOptions)
      .map(([key, values]) => `${key}=${values.join(',')}`)
      .join(';');
    args.push('--extractor-args', `${extractor}:${joined}`);
  }
  if (config.geoBypass) args.push('--geo-bypass');
  args.push('--no-warnings');
  return args;
}

export function toArgs(config: ClientConfig): string[] {
  const args = [
    '--format', config.format,
    '--merge-output-format', config.mergeOutputFormat,
    '--output', config.outputTemplate,
    '--http-chunk-size', String(config.httpChunkSize),
    '--retries', String(config.retries),
    '--fragment-retries', String(config.fragmentRetries),
    config.continueDownload ? '--continue' : '--no-continue',
    // yt-dlp's spelling of ignoreerrors="only_download"
    '--no-abort-on-error',
    ...commonArgs(config),
  ];
  if (config.quiet) {
    // --progress keeps the progress template alive under --quiet
    args.push('--quiet', '--progress');
  }
  args.push('--newline', '--progress-template', `download:${PROGRESS_MARKER}%(progress)j`);
  return args;
}

export class ExtractionClient {
  private readonly binary: string;
  private readonly runner: ProcessRunner;
  private readonly verbose: boolean;

  constructor(
    private readonly config: ClientConfig,
    options: ExtractionClientOptions = {}
  ) {
    this.binary = options.binary ?? DEFAULT_YTDLP_BINARY;
    this.runner = options.runner ?? new SpawnProcessRunner();
    this.verbose = options.verbose ?? false;
  }

  async resolveTitle(url: string): Promise<TitleProbe> {
    const args = [...commonArgs(this.config), '--flat-playlist', '--dump-single-json', '--quiet', url];
    const stdout: string[] = [];

    try {
      const result = await this.runner.run(this.binary, args, {
        onStdoutLine: (line) => stdout.push(line),
      });
      if (result.exitCode !== 0) {
        return { ok: false, reason: `probe exited with code ${result.exitCode}` };
      }
      const title = parseProbeTitle(stdout.join('\n'));
      return title ? { ok: true, title } : { ok: false, reason: 'no title in metadata' };
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  async download(url: string, sink: ProgressSink): Promise<void> {
    const args = [...toArgs(this.config), url];
    const errors: string[] = [];

    if (this.verbose) {
      console.error(`[INFO] ${this.binary} ${args.join(' ')}`);
    }

    let result: ProcessResult;
    try {
      result = await this.runner.run(this.binary, args, {
        onStdoutLine: (line) => {
          const raw = parseProgressLine(line);
          if (raw) sink(raw);
        },
        onStderrLine: (line) => {
          const message = parseErrorLine(line);
          if (message) errors.push(message);
        },
      });
    } catch (error) {
      throw new DownloaderError(
        ErrorCode.UNEXPECTED,
        `could not start ${this.binary}: ${error instanceof Error ? error.message : String(error)}`,
        false,
        'Install yt-dlp or pass its location with --yt-dlp',
        { url }
      );
    }

    if (result.exitCode === 0) {
      return;
    }
    if (result.exitCode === null) {
      throw new DownloaderError(
        ErrorCode.UNEXPECTED,
        `${this.binary} was terminated by ${result.signal ?? 'a signal'}`,
        true,
        undefined,
        { url }
      );
    }
    throw new DownloaderError(
      ErrorCode.EXTRACTION_FAILED,
      errors.at(-1) ?? `${this.binary} exited with code ${result.exitCode}`,
      false,
      undefined,
      { url, exitCode: result.exitCode }
    );
  }
}
