// src/core/queue/url-source.ts
import { readFile } from 'node:fs/promises';
import { DownloaderError, ErrorCode } from '../errors.js';
import type { QueueItem } from '../types/index.js';

// Reads stdin to EOF
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** One URL per line; blank lines and `#` comments are ignored. */
export function parseUrlList(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function readUrls(source: 'file' | 'stdin', filePath?: string): Promise<string[]> {
  if (source === 'file') {
    if (!filePath) {
      throw new DownloaderError(
        ErrorCode.INVALID_OPTION,
        'File path is required when source is "file"'
      );
    }
    return parseUrlList(await readFile(filePath, 'utf-8'));
  }
  return parseUrlList(await readStdin());
}

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export interface QueueBuildResult {
  items: QueueItem[];
  rejected: string[];
}

/** Keeps the order given, dropping entries that are not http(s) URLs. */
export function buildQueue(urls: readonly string[]): QueueBuildResult {
  const items: QueueItem[] = [];
  const rejected: string[] = [];
  for (const url of urls) {
    if (isValidUrl(url)) {
      items.push({ url });
    } else {
      rejected.push(url);
    }
  }
  return { items, rejected };
}
