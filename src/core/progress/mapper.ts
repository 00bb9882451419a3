// src/core/progress/mapper.ts
import { humanBytes } from '../format/selector.js';
import { ErrorCode, type DownloaderError } from '../errors.js';
import type {
  DoneEvent,
  DownloadingEvent,
  ErrorEvent,
  MergingEvent,
  RawProgress,
  StartingEvent,
  TitleEvent,
} from '../types/index.js';

export const EXTRACTION_FAILURE_PREFIX = 'Download failed: ';
export const UNEXPECTED_FAILURE_PREFIX = 'An unexpected error occurred: ';

export function computePercent(raw: RawProgress): number {
  const total = raw.total_bytes || raw.total_bytes_estimate || 0;
  const downloaded = raw.downloaded_bytes || 0;
  // Unknown total reads as 0% until the library learns the size.
  return total ? Math.floor((downloaded * 100) / total) : 0;
}

export function formatSpeed(speed?: number | null): string {
  return speed ? `${humanBytes(speed)}/s` : '';
}

/**
 * Translates a library progress payload into an event, or null for phases
 * that carry nothing the presentation shows.
 */
export function mapRawProgress(raw: RawProgress): DownloadingEvent | MergingEvent | null {
  switch (raw.status) {
    case 'downloading':
      return {
        status: 'downloading',
        percent: computePercent(raw),
        speed: formatSpeed(raw.speed),
      };
    case 'finished':
      return { status: 'merging', percent: 100 };
    default:
      return null;
  }
}

export function startingEvent(): StartingEvent {
  return { status: 'starting', percent: 0 };
}

export function titleEvent(title: string): TitleEvent {
  return { status: 'title', title };
}

export function doneEvent(): DoneEvent {
  return { status: 'done', percent: 100 };
}

export function errorEvent(error: DownloaderError): ErrorEvent {
  const prefix =
    error.code === ErrorCode.EXTRACTION_FAILED ? EXTRACTION_FAILURE_PREFIX : UNEXPECTED_FAILURE_PREFIX;
  return { status: 'error', message: prefix + error.message };
}
