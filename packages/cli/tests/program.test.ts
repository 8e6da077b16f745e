// tests/program.test.ts — Command registration and option parsing

import { rmSync } from 'node:fs';
import { CommanderError } from 'commander';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createProgram, parsePositiveInt } from '../src/program.js';
import { createTmpDir } from './fixtures.js';

function optionFlags(name: string): string[] {
  const command = createProgram().commands.find((c) => c.name() === name);
  return command?.options.map((o) => o.long ?? '') ?? [];
}

describe('createProgram', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers every command', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(['analyze', 'delete', 'history', 'doctor', 'init']);
  });

  it('exposes the analyze and delete options', () => {
    expect(optionFlags('analyze')).toEqual(['--states', '--output', '--json', '--no-save', '--quiet']);
    expect(optionFlags('delete')).toEqual(['--execute', '--list', '--analysis', '--states', '--json']);
  });

  it('prints the version', () => {
    let out = '';
    const program = createProgram()
      .exitOverride()
      .configureOutput({ writeOut: (s) => (out += s) });

    expect(() => program.parse(['node', 'helpersweep', '--version'])).toThrow(CommanderError);
    expect(out).toBe('0.1.0\n');
  });

  it('rejects a non-numeric history limit before running the command', async () => {
    const program = createProgram();
    program.exitOverride().configureOutput({ writeErr: () => {} });
    for (const command of program.commands) command.exitOverride().configureOutput({ writeErr: () => {} });

    await expect(program.parseAsync(['node', 'helpersweep', 'history', '--limit', 'abc'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });

  it('runs history against the working directory database', async () => {
    const cwd = createTmpDir();
    vi.spyOn(process, 'cwd').mockReturnValue(cwd);
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      await createProgram().parseAsync(['node', 'helpersweep', 'history', '--json', '--limit', '5']);
      expect(log).toHaveBeenCalledWith('[]');
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }
  });
});

describe('parsePositiveInt', () => {
  it('parses digits', () => {
    expect(parsePositiveInt('12')).toBe(12);
  });

  it('rejects zero, negatives and text', () => {
    for (const value of ['0', '-1', '1.5', 'ten']) {
      expect(() => parsePositiveInt(value)).toThrow('Must be a positive integer.');
    }
  });
});
