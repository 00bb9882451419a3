import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command } from 'commander';
import { buildProgram, runCli } from '../index.js';

describe('tubequeue program', () => {
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${code})`);
    });
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should show help for the download command', () => {
    const help = buildProgram().helpInformation();
    expect(help).toContain('[urls...]');
    expect(help).toContain('--file');
    expect(help).toContain('--stdin');
    expect(help).toContain('--max-res');
    expect(help).toContain('--format');
  });

  it('should register prefs and check-tools', () => {
    const names = buildProgram().commands.map((cmd) => cmd.name()).sort();
    expect(names).toEqual(['check-tools', 'prefs']);
  });

  it('runs parseAsync via runCli with provided argv', async () => {
    const parseSpy = jest.spyOn(Command.prototype, 'parseAsync').mockResolvedValue(new Command());

    await runCli(['node', 'tubequeue', '--help']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'tubequeue', '--help']);
  });

  it('should error when no URL or file provided', async () => {
    await expect(buildProgram().parseAsync(['node', 'tubequeue'])).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith('Error:', 'URL argument or --file/--stdin is required');
  });

  it('rejects a malformed retry count before touching preferences', async () => {
    await expect(
      buildProgram().parseAsync(['node', 'tubequeue', 'https://videos.example/watch?v=1', '--retries', 'abc'])
    ).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith('Error:', '--retries must be a non-negative integer, got abc');
  });

  it('reports its version', () => {
    expect(buildProgram().version()).toBe('0.1.0');
  });
});
