// src/core/orchestrator.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { UNKNOWN_IDENTITY } from './types/index.js';
import type { ArchiveCursor, FailedEntry, VideoRecord } from './types/index.js';
import type { CursorStore, VideoStore } from './store/types.js';
import type { MetadataClient } from './api/types.js';
import type { IngestStats, RunContext, SyncStats } from './run/context.js';
import { Accumulator, type MergeFileStats } from './merge/accumulator.js';
import { parseArchive } from './takeout/parser.js';
import { pruneArchiveFile } from './takeout/cleanup.js';
import { MarkerTracker } from './takeout/marker.js';
import { Reconciler, type SyncOptions, type SyncSummary } from './sync/reconciler.js';
import { CorruptArchiveError, FileNotFoundError, StoreWriteError, toErrorReport } from './errors.js';

export type ProjectStore = VideoStore & CursorStore;

export interface IngestOptions {
  /** Skip files that hold no recognizable entries instead of aborting */
  continueOnError?: boolean;
  /** Use and update per-file markers (default true) */
  incremental?: boolean;
  /** Rewrite each file with its cleaned markup before parsing */
  pruneHtml?: boolean;
  /** Where to dump entries that could not be parsed */
  parseFailsPath?: string;
}

export interface OrchestratorOptions {
  verbose?: boolean;
}

export class PipelineOrchestrator {
  private readonly verbose: boolean;

  constructor(private readonly store: ProjectStore, options: OrchestratorOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  /**
   * Merge export files (oldest first) into the store. Resolves with the
   * run's stats, or undefined when the run was cancelled. The event stream
   * is closed when this settles.
   */
  async ingest(files: string[], ctx: RunContext, options: IngestOptions = {}): Promise<IngestStats | undefined> {
    try {
      return await this.runIngest(files, ctx, options);
    } catch (error) {
      await ctx.emit({ kind: 'errors', message: toErrorReport(error).message });
      throw error;
    } finally {
      ctx.finish();
    }
  }

  /**
   * Refresh remote metadata of stale videos. Resolves with the summary,
   * cancelled runs included; quota, auth and store errors reject.
   */
  async sync(client: MetadataClient, ctx: RunContext, options: SyncOptions): Promise<SyncSummary> {
    try {
      return await this.runSync(client, ctx, options);
    } catch (error) {
      await ctx.emit({ kind: 'errors', message: toErrorReport(error).message });
      throw error;
    } finally {
      ctx.finish();
    }
  }

  private async runIngest(files: string[], ctx: RunContext, options: IngestOptions): Promise<IngestStats | undefined> {
    if (files.length === 0) {
      throw new FileNotFoundError('watch-history.html');
    }

    // Parse and merge
    await ctx.stage('Processing watch-history.html file(s)...');
    const accumulator = new Accumulator();
    const failedFiles: string[] = [];
    const cursors: ArchiveCursor[] = [];
    let entriesSeen = 0;
    let resumed = false;

    for (const [index, file] of files.entries()) {
      if (ctx.isCancelled()) return this.stopped(ctx, 'Ingest');

      try {
        const { stats, cursor, fromMarker } = await this.mergeFile(file, accumulator, options);
        if (cursor) cursors.push(cursor);
        entriesSeen += stats.entries;
        if (fromMarker) resumed = true;
        if (this.verbose) {
          console.log(
            `[Ingest] ${file}: ${stats.entries} entries, ${stats.inserted} new, ${stats.duplicates} duplicates, ${stats.failed} failed`
          );
        }
      } catch (error) {
        if (error instanceof CorruptArchiveError && options.continueOnError) {
          failedFiles.push(file);
          continue;
        }
        throw error;
      }

      await ctx.report(((index + 1) / files.length) * 100, `${index + 1} ${files.length}`);
    }

    if (failedFiles.length === files.length) {
      throw new CorruptArchiveError(failedFiles.join(', '));
    }
    // every file read was empty
    if (entriesSeen === 0 && !resumed) {
      throw new CorruptArchiveError(files.filter((file) => !failedFiles.includes(file)).join(', '));
    }

    // Collect results
    const result = accumulator.finalize();
    if (failedFiles.length > 0) {
      await ctx.emit({ kind: 'warnings', warnings: ['The following files could not be processed:', ...failedFiles] });
    }
    if (result.failedEntries.length > 0) {
      await this.dumpFailedEntries(result.failedEntries, options.parseFailsPath);
      const where = options.parseFailsPath ? `; dumped to ${path.basename(options.parseFailsPath)}` : '';
      await ctx.emit({
        kind: 'warnings',
        warnings: [`Couldn't parse ${result.failedEntries.length} entries${where}`],
      });
    }
    await ctx.report(100, `Videos / timestamps found: ${result.totalVideos} / ${result.totalTimestamps}`);

    if (ctx.isCancelled()) return this.stopped(ctx, 'Ingest');

    // Write records
    await ctx.stage('Inserting video records/timestamps from Takeout...');
    const recordsAtStart = await this.store.countVideos();
    const records = [...result.videos.values()].filter(
      (record) => record.identity !== UNKNOWN_IDENTITY || record.timestamps.length > 0
    );

    const written = await this.writeRecords(records, ctx);
    if (!written) {
      // keep the records written so far; markers only move with a full write
      await this.guardStore(() => this.store.commit());
      return this.stopped(ctx, 'Ingest');
    }

    // Commit with markers
    await this.guardStore(async () => {
      for (const cursor of cursors) {
        await this.store.setCursor(cursor);
      }
      await this.store.commit();
    });

    const recordsInDb = await this.store.countVideos();
    const stats: IngestStats = {
      totalVideos: result.totalVideos,
      totalTimestamps: result.totalTimestamps,
      failedEntries: result.failedEntries.length,
      failedFiles,
      recordsInDb,
      timestampsInDb: await this.store.countTimestamps(),
      inserted: recordsInDb - recordsAtStart,
    };

    await ctx.emit({ kind: 'stop' });
    await ctx.emit({ kind: 'stats', stats });
    return stats;
  }

  private async mergeFile(
    file: string,
    accumulator: Accumulator,
    options: IngestOptions
  ): Promise<{ stats: MergeFileStats; cursor?: ArchiveCursor; fromMarker: boolean }> {
    if (!existsSync(file)) {
      throw new FileNotFoundError(file);
    }

    if (options.pruneHtml && (await pruneArchiveFile(file)) && this.verbose) {
      console.log(`[Ingest] Rewrote ${file} (trimmed junk HTML)`);
    }

    const incremental = options.incremental ?? true;
    const previous = incremental ? await this.store.getCursor(file) : undefined;
    const tracker = new MarkerTracker(previous?.lastSeenMarker);

    const content = await fs.readFile(file, 'utf-8');
    const stats = accumulator.merge(file, tracker.track(parseArchive(content, file)));

    const marker = tracker.next;
    const cursor = tracker.changed && marker !== undefined ? { filePath: file, lastSeenMarker: marker } : undefined;
    return { stats, cursor, fromMarker: previous !== undefined };
  }

  /** Returns false when cancelled before every record was written */
  private async writeRecords(records: VideoRecord[], ctx: RunContext): Promise<boolean> {
    let lastPercent = -1;

    for (const [index, record] of records.entries()) {
      if (ctx.isCancelled()) return false;

      await this.guardStore(async () => {
        await this.store.upsertVideo(record);
        await this.store.upsertTimestamps(record.identity, record.timestamps);
      });

      const percent = Math.floor(((index + 1) / records.length) * 100);
      if (percent !== lastPercent) {
        lastPercent = percent;
        await ctx.report(percent, `${index + 1} ${records.length}`);
      }
    }
    return true;
  }

  private async runSync(client: MetadataClient, ctx: RunContext, options: SyncOptions): Promise<SyncSummary> {
    await ctx.stage('Updating...');

    const reconciler = new Reconciler(this.store, client, { ...options, verbose: options.verbose ?? this.verbose });
    const run = reconciler.run(ctx);

    let step = await run.next();
    while (!step.done) {
      const { percent, processed, total } = step.value;
      await ctx.report(percent, `${processed} ${total}`);
      step = await run.next();
    }
    const summary = step.value;

    if (summary.failed.length > 0) {
      await ctx.emit({
        kind: 'warnings',
        warnings: [`Failed to retrieve metadata for ${summary.failed.length} videos; they will be retried next time`],
      });
    }
    if (summary.cancelled) {
      await this.stopped(ctx, 'Sync');
      return summary;
    }

    const stats: SyncStats = {
      ...summary.counts,
      recordsInDb: await this.store.countVideos(),
      timestampsInDb: await this.store.countTimestamps(),
    };
    await ctx.emit({ kind: 'stop' });
    await ctx.emit({ kind: 'stats', stats });
    return summary;
  }

  private async dumpFailedEntries(entries: FailedEntry[], target?: string): Promise<void> {
    if (!target) return;
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, JSON.stringify(entries, null, 2));
  }

  private async guardStore(write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      if (error instanceof StoreWriteError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreWriteError(`Fatal database error - ${reason}`, error);
    }
  }

  private async stopped(ctx: RunContext, component: string): Promise<undefined> {
    if (this.verbose) console.log(`[${component}] Stopped`);
    await ctx.emit({ kind: 'stop' });
    return undefined;
  }
}
