// src/core/sync/reconciler.ts
import type { MetadataClient } from '../api/types.js';
import type { VideoStore } from '../store/types.js';
import type { RunContext } from '../run/context.js';
import type { SyncOutcome, SyncStatus, VideoIdentity, VideoMetadata } from '../types/index.js';
import { StoreWriteError, TransientError } from '../errors.js';
import { DEFAULT_BACKOFF_BASE_MS, DEFAULT_MAX_ATTEMPTS } from '../config/constants.js';

export interface SyncOptions {
  /** Only videos last checked longer ago than this (or never) are looked up */
  cutoffMs: number;
  batchSize?: number;
  /** Lookup attempts per batch, the first one included */
  maxAttempts?: number;
  backoffBaseMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  verbose?: boolean;
}

export interface SyncCounts {
  updated: number;
  newlyInactive: number;
  newlyActive: number;
  deleted: number;
  failed: number;
}

export interface SyncProgress {
  percent: number;
  processed: number;
  total: number;
  counts: SyncCounts;
}

export interface SyncSummary {
  total: number;
  counts: SyncCounts;
  updated: VideoIdentity[];
  newlyInactive: VideoIdentity[];
  newlyActive: VideoIdentity[];
  deleted: VideoIdentity[];
  failed: VideoIdentity[];
  cancelled: boolean;
}

type Attempted<T> =
  | { status: 'ok'; value: T }
  | { status: 'failed'; error: TransientError }
  | { status: 'cancelled' };

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class Reconciler {
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly store: VideoStore,
    private readonly client: MetadataClient,
    private readonly options: SyncOptions
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Look up every stale video in batches, yielding progress after each batch
   * and returning the summary. Quota, auth and store errors end the run; a
   * batch is written only after its lookup succeeded. Authorization is
   * retried like a lookup and throws once its attempts run out.
   */
  async *run(ctx: RunContext): AsyncGenerator<SyncProgress, SyncSummary, void> {
    const authorized = await this.withRetry(() => this.client.authorize(), ctx);
    if (authorized.status === 'failed') throw authorized.error;
    if (authorized.status === 'cancelled') return { ...emptySummary(0), cancelled: true };

    const cutoff = new Date(this.now().getTime() - this.options.cutoffMs);
    const ids = await this.store.getVideoIdsNeedingRefresh(cutoff);
    const batches = chunk(ids, this.batchSize());
    const summary = emptySummary(ids.length);

    if (this.options.verbose) {
      console.log(`[Sync] ${ids.length} videos last checked before ${cutoff.toISOString()}, ${batches.length} batches`);
    }

    let processed = 0;
    for (const batch of batches) {
      if (ctx.isCancelled()) {
        summary.cancelled = true;
        return summary;
      }

      const previous = await this.store.getSyncStatuses(batch);
      const lookup = await this.withRetry(() => this.client.lookupBatch(batch), ctx);

      if (lookup.status === 'cancelled') {
        summary.cancelled = true;
        return summary;
      }

      if (lookup.status === 'failed') {
        if (this.options.verbose) {
          console.log(`[Sync] Giving up on batch of ${batch.length}: ${lookup.error.message}`);
        }
        summary.failed.push(...batch);
      } else {
        const outcomes = classifyBatch(batch, previous, lookup.value, this.now());
        await this.persist(outcomes);
        applyOutcomes(summary, outcomes);
      }

      processed += batch.length;
      summary.counts = countsOf(summary);
      yield {
        percent: ids.length === 0 ? 100 : (processed / ids.length) * 100,
        processed,
        total: ids.length,
        counts: { ...summary.counts },
      };
    }

    return summary;
  }

  private batchSize(): number {
    const requested = this.options.batchSize ?? this.client.maxBatchSize;
    return Math.max(1, Math.min(requested, this.client.maxBatchSize));
  }

  /** Retries transient failures with exponential backoff; other errors propagate */
  private async withRetry<T>(operation: () => Promise<T>, ctx: RunContext): Promise<Attempted<T>> {
    for (let attempt = 1; ; attempt++) {
      try {
        return { status: 'ok', value: await operation() };
      } catch (error) {
        if (!(error instanceof TransientError)) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          return { status: 'failed', error };
        }

        const delay = this.backoffBaseMs * 2 ** (attempt - 1);
        if (this.options.verbose) {
          console.log(`[Sync] Attempt ${attempt} failed (${error.message}), retrying in ${delay}ms`);
        }
        await this.sleep(delay);
        if (ctx.isCancelled()) {
          return { status: 'cancelled' };
        }
      }
    }
  }

  private async persist(outcomes: SyncOutcome[]): Promise<void> {
    try {
      for (const outcome of outcomes) {
        await this.store.recordSyncOutcome(outcome);
      }
      await this.store.commit();
    } catch (error) {
      if (error instanceof StoreWriteError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreWriteError(`Could not record sync outcomes - ${reason}`, error);
    }
  }
}

export function classifyBatch(
  batch: VideoIdentity[],
  previous: Map<VideoIdentity, SyncStatus>,
  metadata: Map<VideoIdentity, VideoMetadata>,
  checkedAt: Date
): SyncOutcome[] {
  return batch.map((videoIdentity): SyncOutcome => {
    const previousStatus = previous.get(videoIdentity) ?? 'unknown';
    const snapshot = metadata.get(videoIdentity);

    if (snapshot) {
      return { videoIdentity, previousStatus, newStatus: 'active', metadataSnapshot: snapshot, checkedAt };
    }
    // Missing from the response is not proof of removal; the record stays
    const newStatus: SyncStatus = previousStatus === 'active' ? 'inactive' : previousStatus;
    return { videoIdentity, previousStatus, newStatus, checkedAt };
  });
}

function applyOutcomes(summary: SyncSummary, outcomes: SyncOutcome[]): void {
  for (const outcome of outcomes) {
    const { videoIdentity, previousStatus, newStatus } = outcome;
    if (newStatus === 'active') {
      summary.updated.push(videoIdentity);
      if (previousStatus !== 'active') summary.newlyActive.push(videoIdentity);
    } else if (previousStatus === 'active') {
      summary.newlyInactive.push(videoIdentity);
    } else if (previousStatus === 'unknown') {
      summary.deleted.push(videoIdentity);
    }
  }
}

function countsOf(summary: SyncSummary): SyncCounts {
  return {
    updated: summary.updated.length,
    newlyInactive: summary.newlyInactive.length,
    newlyActive: summary.newlyActive.length,
    deleted: summary.deleted.length,
    failed: summary.failed.length,
  };
}

function emptySummary(total: number): SyncSummary {
  return {
    total,
    counts: { updated: 0, newlyInactive: 0, newlyActive: 0, deleted: 0, failed: 0 },
    updated: [],
    newlyInactive: [],
    newlyActive: [],
    deleted: [],
    failed: [],
    cancelled: false,
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
