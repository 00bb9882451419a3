#!/usr/bin/env node

import { Command } from 'commander';
import { registerCheckToolsCommand } from './commands/check-tools.js';
import { registerDownloadCommand } from './commands/download.js';
import { registerPrefsCommand } from './commands/prefs.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('tubequeue')
    .description('Queue video URLs and download them one at a time with yt-dlp')
    .version('0.1.0')
    .enablePositionalOptions();

  registerCheckToolsCommand(program);
  registerPrefsCommand(program);
  registerDownloadCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
