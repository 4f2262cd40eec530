// src/core/merge/accumulator.ts
import { UNKNOWN_IDENTITY } from '../types/index.js';
import type { FailedEntry, RawEntry, VideoIdentity, VideoRecord, WatchEvent } from '../types/index.js';
import { TimestampParseError } from '../errors.js';
import { insertTimestamp, parseWatchedAt } from '../takeout/timestamp.js';

export interface MergeFileStats {
  entries: number;
  inserted: number;
  duplicates: number;
  failed: number;
}

export interface AccumulatedResult {
  videos: Map<VideoIdentity, VideoRecord>;
  failedEntries: FailedEntry[];
  /** Distinct identities, the unknown bucket excluded */
  totalVideos: number;
  /** Retained events across all identities, the unknown bucket included */
  totalTimestamps: number;
}

type DescriptiveField = 'title' | 'channelId' | 'channelTitle';
const DESCRIPTIVE_FIELDS: DescriptiveField[] = ['title', 'channelId', 'channelTitle'];

export class Accumulator {
  private videos = new Map<VideoIdentity, VideoRecord>();
  private failedEntries: FailedEntry[] = [];

  constructor() {
    this.videos.set(UNKNOWN_IDENTITY, { identity: UNKNOWN_IDENTITY, timestamps: [] });
  }

  merge(filePath: string, entries: Iterable<RawEntry>): MergeFileStats {
    const stats: MergeFileStats = { entries: 0, inserted: 0, duplicates: 0, failed: 0 };

    for (const entry of entries) {
      stats.entries++;

      if (entry.kind === 'unrecognized') {
        this.fail(filePath, entry.text, 'Unrecognized entry');
        stats.failed++;
        continue;
      }

      let watchedAt: Date;
      try {
        watchedAt = parseWatchedAt(entry.rawTimestamp);
      } catch (error) {
        if (!(error instanceof TimestampParseError)) throw error;
        this.fail(filePath, entry.text, error.message);
        stats.failed++;
        continue;
      }

      const event: WatchEvent = {
        videoIdentity: entry.kind === 'video' ? entry.videoId : UNKNOWN_IDENTITY,
        watchedAt,
      };
      const record = this.resolve(event.videoIdentity);
      if (entry.kind === 'video') {
        for (const field of DESCRIPTIVE_FIELDS) {
          const value = entry[field];
          if (!record[field] && value) {
            record[field] = value;
          }
        }
      }

      if (insertTimestamp(record.timestamps, event.watchedAt)) {
        stats.inserted++;
      } else {
        stats.duplicates++;
      }
    }

    return stats;
  }

  /**
   * Drop unknown-bucket timestamps that a known video already carries. An
   * event can show up identified in one export and removed in another.
   */
  finalize(): AccumulatedResult {
    const known = new Set<number>();
    for (const record of this.videos.values()) {
      if (record.identity === UNKNOWN_IDENTITY) continue;
      for (const timestamp of record.timestamps) {
        known.add(timestamp.getTime());
      }
    }

    const unknown = this.resolve(UNKNOWN_IDENTITY);
    unknown.timestamps = unknown.timestamps.filter((timestamp) => !known.has(timestamp.getTime()));

    let totalTimestamps = 0;
    for (const record of this.videos.values()) {
      totalTimestamps += record.timestamps.length;
    }

    return {
      videos: this.videos,
      failedEntries: [...this.failedEntries],
      totalVideos: this.videos.size - 1,
      totalTimestamps,
    };
  }

  get(identity: VideoIdentity): VideoRecord | undefined {
    return this.videos.get(identity);
  }

  private resolve(identity: VideoIdentity): VideoRecord {
    let record = this.videos.get(identity);
    if (!record) {
      record = { identity, timestamps: [] };
      this.videos.set(identity, record);
    }
    return record;
  }

  private fail(filePath: string, text: string, reason: string): void {
    this.failedEntries.push({ filePath, text, reason });
  }
}
