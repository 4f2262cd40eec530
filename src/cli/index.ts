#!/usr/bin/env node

import { Command } from 'commander';
import { registerIngestCommand } from './commands/ingest.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerStatusCommand } from './commands/status.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('watchtrail')
    .description('Watch-history archive ingestion and metadata sync')
    .version('0.1.0');

  registerIngestCommand(program);
  registerSyncCommand(program);
  registerStatusCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
