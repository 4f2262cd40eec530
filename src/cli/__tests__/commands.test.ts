// src/cli/__tests__/commands.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { Command } from 'commander';
import { registerIngestCommand } from '../commands/ingest.js';
import { registerSyncCommand } from '../commands/sync.js';
import { registerStatusCommand } from '../commands/status.js';

function optionFlags(command: Command | undefined): string[] {
  return (command?.options ?? []).map((option) => option.long ?? option.flags);
}

describe('CLI Commands - ingest', () => {
  it('should register ingest command', () => {
    const program = new Command();
    const spy = jest.spyOn(program, 'command');

    registerIngestCommand(program);

    expect(spy).toHaveBeenCalledWith('ingest');
  });

  it('should take the takeout directory and ingest options', () => {
    const program = new Command();
    registerIngestCommand(program);

    const command = program.commands.find((cmd) => cmd.name() === 'ingest');
    expect(command?.description()).toBe('Merge watch-history export files into the project store');
    expect(command?.registeredArguments.map((arg) => arg.name())).toEqual(['takeout-dir']);
    expect(optionFlags(command)).toEqual([
      '--project',
      '--continue-on-error',
      '--no-incremental',
      '--prune-html',
      '--json',
      '--verbose',
    ]);
  });
});

describe('CLI Commands - sync', () => {
  it('should default to a one day cutoff', () => {
    const program = new Command();
    registerSyncCommand(program);

    const command = program.commands.find((cmd) => cmd.name() === 'sync');
    expect(command?.getOptionValue('cutoff')).toBe('1');
    expect(command?.getOptionValue('unit')).toBe('days');
    expect(optionFlags(command)).toEqual(['--project', '--cutoff', '--unit', '--json', '--verbose']);
  });
});

describe('CLI Commands - status', () => {
  it('should register status command', () => {
    const program = new Command();
    registerStatusCommand(program);

    const command = program.commands.find((cmd) => cmd.name() === 'status');
    expect(command?.description()).toBe('Show what the project store holds');
    expect(optionFlags(command)).toEqual(['--project']);
  });
});
