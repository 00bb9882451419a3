// src/core/extract/output.ts
import type { RawProgress } from '../types/index.js';

/** Prefix put in front of every JSON progress line through --progress-template. */
export const PROGRESS_MARKER = '[tubequeue-progress] ';

const ERROR_PREFIX = 'ERROR: ';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function parseProgressLine(line: string): RawProgress | null {
  const start = line.indexOf(PROGRESS_MARKER);
  if (start === -1) return null;

  let payload: unknown;
  try {
    payload = JSON.parse(line.slice(start + PROGRESS_MARKER.length));
  } catch {
    return null;
  }
  if (!isRecord(payload) || typeof payload.status !== 'string') {
    return null;
  }

  return {
    status: payload.status,
    downloaded_bytes: optionalNumber(payload.downloaded_bytes),
    total_bytes: optionalNumber(payload.total_bytes),
    total_bytes_estimate: optionalNumber(payload.total_bytes_estimate),
    speed: optionalNumber(payload.speed),
    filename: typeof payload.filename === 'string' ? payload.filename : undefined,
  };
}

export function parseErrorLine(line: string): string | null {
  const trimmed = line.trim();
  return trimmed.startsWith(ERROR_PREFIX) ? trimmed.slice(ERROR_PREFIX.length) : null;
}

export function parseProbeTitle(json: string): string | null {
  let metadata: unknown;
  try {
    metadata = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(metadata)) return null;
  const title = metadata.title;
  return typeof title === 'string' && title.length > 0 ? title : null;
}
