// src/cli/commands/sync.ts
import { Command } from 'commander';
import { JsonStore } from '../../core/store/json-store.js';
import { PipelineOrchestrator } from '../../core/orchestrator.js';
import { RunContext } from '../../core/run/context.js';
import { YouTubeDataClient } from '../../core/api/youtube.js';
import { cutoffToMs, isCutoffUnit, loadApiKey, resolveProjectPaths } from '../../core/config/project.js';
import type { CutoffUnit } from '../../core/config/project.js';
import { renderEvents } from '../render.js';

export interface SyncCommandOptions {
  project?: string;
  cutoff: string;
  unit: string;
  json: boolean;
  verbose: boolean;
}

function parseCutoffUnit(value: string): CutoffUnit {
  if (isCutoffUnit(value)) {
    return value;
  }
  throw new Error(`Invalid unit: ${value}. Use hours, days, weeks, or months`);
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Refresh remote metadata of videos not checked recently')
    .option('--project <dir>', 'Project directory (default: app data directory)')
    .option('--cutoff <n>', 'Re-check videos last checked more than n units ago', '1')
    .option('--unit <unit>', 'Cutoff unit (hours|days|weeks|months)', 'days')
    .option('--json', 'Output final stats as JSON', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (options: SyncCommandOptions) => {
      await handleSync(options);
    });
}

export async function handleSync(options: SyncCommandOptions): Promise<void> {
  const paths = resolveProjectPaths(options.project);
  const ctx = new RunContext();
  const onSigint = (): void => ctx.cancel();
  process.once('SIGINT', onSigint);

  const rendering = renderEvents(ctx, { json: options.json });
  try {
    const cutoffMs = cutoffToMs(Number(options.cutoff), parseCutoffUnit(options.unit));
    const client = new YouTubeDataClient({ apiKey: await loadApiKey(paths) });

    const store = new JsonStore(paths.storePath, options.verbose);
    await store.load();

    const orchestrator = new PipelineOrchestrator(store, { verbose: options.verbose });
    const summary = await orchestrator.sync(client, ctx, { cutoffMs, verbose: options.verbose });
    await rendering;

    if (summary.cancelled) {
      console.log('⊘ Stopped the sync run; completed batches are saved');
    }
  } catch (error) {
    ctx.finish();
    const events = await rendering;
    // errors raised inside the run were already printed from its event stream
    if (!events.some((event) => event.kind === 'errors')) {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  } finally {
    process.off('SIGINT', onSigint);
  }
}
