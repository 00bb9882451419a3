// src/core/extract/__tests__/process.test.ts
import { describe, it, expect } from '@jest/globals';
import { SpawnProcessRunner } from '../process.js';

const posixIt = process.platform === 'win32' ? it.skip : it;

function nodeScript(source: string): [string, string[]] {
  return [process.execPath, ['-e', source]];
}

describe('SpawnProcessRunner', () => {
  it('streams stdout and stderr line by line', async () => {
    const runner = new SpawnProcessRunner();
    const stdout: string[] = [];
    const stderr: string[] = [];
    const [command, args] = nodeScript(
      'process.stdout.write("one\\ntwo\\r\\nthree"); process.stderr.write("ERROR: bad\\n");'
    );

    const result = await runner.run(command, args, {
      onStdoutLine: (line) => stdout.push(line),
      onStderrLine: (line) => stderr.push(line),
    });

    expect(result).toEqual({ exitCode: 0, signal: null });
    expect(stdout).toEqual(['one', 'two', 'three']);
    expect(stderr).toEqual(['ERROR: bad']);
  });

  it('delivers output written right before exit', async () => {
    const runner = new SpawnProcessRunner();
    const stdout: string[] = [];
    const [command, args] = nodeScript(
      'for (let i = 0; i < 200; i++) console.log("line " + i); process.exitCode = 2;'
    );

    const result = await runner.run(command, args, { onStdoutLine: (line) => stdout.push(line) });

    expect(result).toEqual({ exitCode: 2, signal: null });
    expect(stdout).toHaveLength(200);
    expect(stdout[199]).toBe('line 199');
  });

  it('reports a non-zero exit code', async () => {
    const [command, args] = nodeScript('process.exit(3)');
    await expect(new SpawnProcessRunner().run(command, args)).resolves.toEqual({ exitCode: 3, signal: null });
  });

  posixIt('reports the signal that ended the program', async () => {
    const [command, args] = nodeScript('process.kill(process.pid, "SIGKILL")');
    await expect(new SpawnProcessRunner().run(command, args)).resolves.toEqual({
      exitCode: null,
      signal: 'SIGKILL',
    });
  });

  it('rejects when the program cannot be started', async () => {
    await expect(
      new SpawnProcessRunner().run('/nonexistent/tubequeue-missing-binary', [])
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });

  posixIt('terminates a running program', async () => {
    const runner = new SpawnProcessRunner();
    const signalled: number[] = [];
    const [command, args] = nodeScript('setInterval(() => undefined, 1000); console.log("ready");');

    const result = await runner.run(command, args, {
      onStdoutLine: (line) => {
        if (line === 'ready') signalled.push(runner.terminate('SIGTERM'));
      },
    });

    expect(signalled).toEqual([1]);
    expect(result).toEqual({ exitCode: null, signal: 'SIGTERM' });
  });

  it('signals nothing once every program has finished', async () => {
    const runner = new SpawnProcessRunner();
    const [command, args] = nodeScript('');
    await runner.run(command, args);

    expect(runner.terminate()).toBe(0);
  });
});
