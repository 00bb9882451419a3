// src/core/tools/detect.ts
import * as fs from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';

export interface ToolStatus {
  name: string;
  available: boolean;
  path: string | null;
}

async function isExecutableFile(candidate: string, mode: number): Promise<boolean> {
  try {
    await fs.access(candidate, mode);
    return (await fs.stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * Looks a command up on the search path the way a shell would. A command
 * given with a directory part is checked as-is.
 */
export async function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  // PATHEXT before the bare name: on Windows F_OK cannot tell a program from
  // any other file.
  const extensions =
    platform === 'win32' ? [...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean), ''] : [''];
  const mode = platform === 'win32' ? constants.F_OK : constants.X_OK;

  const directories = command.includes('/') || command.includes('\\')
    ? ['']
    : (env.PATH ?? '').split(platform === 'win32' ? ';' : ':').filter(Boolean);

  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = directory ? path.join(directory, command + extension) : command + extension;
      if (await isExecutableFile(candidate, mode)) {
        return candidate;
      }
    }
  }
  return null;
}

export async function checkTool(command: string, env: NodeJS.ProcessEnv = process.env): Promise<ToolStatus> {
  const found = await findExecutable(command, env);
  return { name: command, available: found !== null, path: found };
}
