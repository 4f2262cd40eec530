/**
 * watchtrail - watch-history export ingestion and metadata sync
 *
 * @example
 * ```typescript
 * import { JsonStore, PipelineOrchestrator, RunContext, locateWatchHistoryFiles } from 'watchtrail';
 *
 * const store = new JsonStore('./project/watchtrail.json');
 * const { files } = await locateWatchHistoryFiles('./takeout');
 *
 * const ctx = new RunContext();
 * const events = ctx.progress.drain();
 * const stats = await new PipelineOrchestrator(store).ingest(files, ctx);
 * console.log(stats, await events);
 * ```
 */

// Parsing
export { parseArchive, parseEntry, extractVideoId } from './core/takeout/parser.js';
export { cleanArchiveMarkup, splitEntries, pruneArchiveFile } from './core/takeout/cleanup.js';
export { parseWatchedAt, isSameEvent, insertTimestamp } from './core/takeout/timestamp.js';
export { markerFor, truncateAtMarker, MarkerTracker } from './core/takeout/marker.js';
export { locateWatchHistoryFiles } from './core/takeout/locate.js';

// Merge and sync
export { Accumulator } from './core/merge/accumulator.js';
export { Reconciler, classifyBatch } from './core/sync/reconciler.js';
export { PipelineOrchestrator } from './core/orchestrator.js';

// Run plumbing and collaborators
export { RunContext } from './core/run/context.js';
export { ProgressChannel } from './core/run/channel.js';
export { JsonStore } from './core/store/json-store.js';
export { YouTubeDataClient } from './core/api/youtube.js';

export * from './core/errors.js';

export { UNKNOWN_IDENTITY } from './core/types/index.js';
export type * from './core/types/index.js';
export type { VideoStore, CursorStore, StoredVideo } from './core/store/types.js';
export type { MetadataClient } from './core/api/types.js';
export type { ProgressEvent, IngestStats, SyncStats } from './core/run/context.js';
export type { SyncOptions, SyncSummary, SyncProgress, SyncCounts } from './core/sync/reconciler.js';
export type { IngestOptions, ProjectStore } from './core/orchestrator.js';
export type { MergeFileStats, AccumulatedResult } from './core/merge/accumulator.js';
