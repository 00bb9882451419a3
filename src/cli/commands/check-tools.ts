// src/cli/commands/check-tools.ts
import { Command } from 'commander';
import { FFMPEG_BINARY } from '../../core/config/constants.js';
import { DownloaderError, ErrorCode } from '../../core/errors.js';
import { checkTool, type ToolStatus } from '../../core/tools/detect.js';
import { resolveYtDlpBinary } from './download.js';

export function formatToolStatus(status: ToolStatus): string {
  return status.available ? `✓ ${status.name}: ${status.path}` : `✗ ${status.name}: not found`;
}

export function registerCheckToolsCommand(
  program: Command,
  lookup: (command: string) => Promise<ToolStatus> = (command) => checkTool(command)
): void {
  program
    .command('check-tools')
    .description('Check that yt-dlp and ffmpeg can be found')
    .option('--yt-dlp <path>', 'yt-dlp executable to check')
    .action(async (options: { ytDlp?: string }) => {
      try {
        await reportTools(lookup, resolveYtDlpBinary(options.ytDlp));
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        if (error instanceof DownloaderError && error.suggestion) {
          console.error(`Hint: ${error.suggestion}`);
        }
        process.exit(1);
      }
    });
}

async function reportTools(lookup: (command: string) => Promise<ToolStatus>, binary: string): Promise<void> {
  const ytDlp = await lookup(binary);
  const ffmpeg = await lookup(FFMPEG_BINARY);

  console.log(formatToolStatus(ytDlp));
  console.log(formatToolStatus(ffmpeg));

  if (!ffmpeg.available) {
    console.log('Note: without ffmpeg, separate video and audio streams cannot be merged.');
  }
  if (!ytDlp.available) {
    throw new DownloaderError(
      ErrorCode.TOOL_NOT_FOUND,
      `${binary} was not found`,
      false,
      'Install yt-dlp, or pass its location with --yt-dlp or TUBEQUEUE_YTDLP',
      { command: binary }
    );
  }
}
