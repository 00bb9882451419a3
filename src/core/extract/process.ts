// src/core/extract/process.ts
import { spawn, type ChildProcess } from 'child_process';
import { createInterface } from 'readline';

export interface ProcessHandlers {
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Runs an external program to completion, streaming its output line by line.
 * Rejects only when the program cannot be started.
 */
export interface ProcessRunner {
  run(command: string, args: string[], handlers?: ProcessHandlers): Promise<ProcessResult>;
  /** Sends `signal` to every program still running; returns how many were signalled. */
  terminate(signal?: NodeJS.Signals): number;
}

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

export class SpawnProcessRunner implements ProcessRunner {
  private readonly active = new Set<ChildProcess>();

  run(command: string, args: string[], handlers: ProcessHandlers = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      // Own process group on POSIX: a Ctrl+C aimed at the CLI must not reach
      // the in-flight download. terminate() signals the whole group.
      const child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
        windowsHide: true,
      });
      this.active.add(child);

      const pending: Array<Promise<void>> = [];
      const pipeLines = (stream: NodeJS.ReadableStream | null, onLine?: (line: string) => void) => {
        if (!stream) return;
        const reader = createInterface({ input: stream, crlfDelay: Infinity });
        if (onLine) reader.on('line', onLine);
        pending.push(new Promise((done) => reader.once('close', () => done())));
      };
      pipeLines(child.stdout, handlers.onStdoutLine);
      pipeLines(child.stderr, handlers.onStderrLine);

      child.once('error', (error) => {
        this.active.delete(child);
        reject(error);
      });
      child.once('close', (exitCode, signal) => {
        this.active.delete(child);
        void Promise.all(pending).then(() => resolve({ exitCode, signal }));
      });
    });
  }

  terminate(signal: NodeJS.Signals = 'SIGTERM'): number {
    let signalled = 0;
    for (const child of this.active) {
      if (child.pid === undefined) continue;
      if (process.platform === 'win32') {
        child.kill(signal);
        signalled += 1;
        continue;
      }
      try {
        process.kill(-child.pid, signal);
        signalled += 1;
      } catch (error) {
        if (!isMissingProcess(error)) throw error;
      }
    }
    return signalled;
  }
}
