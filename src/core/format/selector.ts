// src/core/format/selector.ts

/**
 * Format selector for the extraction library: best video stream merged with
 * best audio, falling back to the best pre-muxed stream. A cap restricts both
 * alternatives to streams no taller than `maxResolution`.
 */
export function buildFormat(maxResolution?: number | null): string {
  return maxResolution
    ? `bv*[height<=${maxResolution}]+ba/b[height<=${maxResolution}]`
    : 'bv*+ba/b';
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

export function humanBytes(n?: number | null): string {
  if (!n || n <= 0) return '0 B';

  let value = n;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}
