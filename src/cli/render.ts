// src/cli/render.ts
import type { IngestStats, ProgressEvent, RunContext, SyncStats } from '../core/run/context.js';

export interface RenderOptions {
  json?: boolean;
}

/**
 * Print a run's events until its channel closes. Start this before the run
 * itself so the channel never fills up.
 */
export async function renderEvents(ctx: RunContext, options: RenderOptions = {}): Promise<ProgressEvent[]> {
  const seen: ProgressEvent[] = [];

  for await (const event of ctx.progress) {
    seen.push(event);
    switch (event.kind) {
      case 'stage':
        if (!options.json) console.log(event.stage);
        break;
      case 'progress':
        if (!options.json) console.log(`  ${event.percent.toFixed(1)}% ${event.message}`);
        break;
      case 'warnings':
        for (const warning of event.warnings) {
          console.warn(`⚠ ${warning}`);
        }
        break;
      case 'errors':
        console.error(`✗ ${event.message}`);
        break;
      case 'stats':
        if (options.json) {
          console.log(JSON.stringify(event.stats, null, 2));
        } else {
          printStats(event.stats);
        }
        break;
      case 'stop':
        // progress is over; stats may still follow
        break;
    }
  }

  return seen;
}

function printStats(stats: IngestStats | SyncStats): void {
  console.log('\n' + '━'.repeat(50));
  if ('totalVideos' in stats) {
    console.log(`Videos / timestamps found: ${stats.totalVideos} / ${stats.totalTimestamps}`);
    console.log(`Inserted: ${stats.inserted} new videos`);
    if (stats.failedEntries > 0) console.log(`Unparsed entries: ${stats.failedEntries}`);
  } else {
    console.log(
      `Summary: ${stats.updated} updated, ${stats.newlyActive} newly active, ${stats.newlyInactive} newly inactive, ` +
        `${stats.deleted} deleted, ${stats.failed} failed`
    );
  }
  console.log(`Records in store: ${stats.recordsInDb} videos, ${stats.timestampsInDb} timestamps`);
}
