// src/core/config/constants.ts
export const APP_NAME = 'tubequeue';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const HTTP_CHUNK_SIZE = 10 * 1024 * 1024; // 10 MiB
export const RETRY_COUNTS = {
  network: 10,
  fragment: 10,
} as const;

export const OUTPUT_TEMPLATE = '%(title)s [%(id)s].%(ext)s';
export const DEFAULT_YTDLP_BINARY = 'yt-dlp';
export const FFMPEG_BINARY = 'ffmpeg';

// Index tables shared by the preference store and the CLI options.
export const RESOLUTION_CHOICES = ['No cap', '2160', '1440', '1080', '720'] as const;
export const CONTAINER_CHOICES = ['MKV (safe)', 'MP4'] as const;
