// src/cli/commands/ingest.ts
import { Command } from 'commander';
import { JsonStore } from '../../core/store/json-store.js';
import { PipelineOrchestrator } from '../../core/orchestrator.js';
import { RunContext } from '../../core/run/context.js';
import { locateWatchHistoryFiles } from '../../core/takeout/locate.js';
import { resolveProjectPaths } from '../../core/config/project.js';
import { renderEvents } from '../render.js';

export interface IngestCommandOptions {
  project?: string;
  continueOnError: boolean;
  incremental: boolean;
  pruneHtml: boolean;
  json: boolean;
  verbose: boolean;
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Merge watch-history export files into the project store')
    .argument('<takeout-dir>', 'Directory with watch-history file(s) or extracted takeout bundles')
    .option('--project <dir>', 'Project directory (default: app data directory)')
    .option('--continue-on-error', 'Skip export files without recognizable entries', false)
    .option('--no-incremental', 'Parse every file from the start, ignoring saved markers')
    .option('--prune-html', 'Rewrite export files with their trimmed markup', false)
    .option('--json', 'Output final stats as JSON', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (takeoutDir: string, options: IngestCommandOptions) => {
      await handleIngest(takeoutDir, options);
    });
}

export async function handleIngest(takeoutDir: string, options: IngestCommandOptions): Promise<void> {
  const paths = resolveProjectPaths(options.project);
  const ctx = new RunContext();
  const onSigint = (): void => ctx.cancel();
  process.once('SIGINT', onSigint);

  const rendering = renderEvents(ctx, { json: options.json });
  try {
    // Locate export files
    const located = await locateWatchHistoryFiles(takeoutDir);
    for (const warning of located.warnings) {
      console.warn(`⚠ ${warning}`);
    }
    if (options.verbose) {
      located.files.forEach((file) => console.log(`[Ingest] Found ${file}`));
    }

    // Open store
    const store = new JsonStore(paths.storePath, options.verbose);
    await store.load();

    // Run ingest
    const orchestrator = new PipelineOrchestrator(store, { verbose: options.verbose });
    const stats = await orchestrator.ingest(located.files, ctx, {
      continueOnError: options.continueOnError,
      incremental: options.incremental,
      pruneHtml: options.pruneHtml,
      parseFailsPath: paths.parseFailsPath,
    });
    await rendering;

    if (!stats) {
      console.log('⊘ Stopped the ingest run; the store keeps the last completed state');
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
