// src/core/store/types.ts
import type {
  ArchiveCursor,
  SyncOutcome,
  SyncStatus,
  VideoIdentity,
  VideoMetadata,
  VideoRecord,
} from '../types/index.js';

/**
 * What the pipeline needs from persistent storage. Writes become durable on
 * `commit()`, which the pipeline calls once per ingest run (cancelled ones
 * included) and after each sync batch.
 */
export interface VideoStore {
  upsertVideo(record: VideoRecord): Promise<void>;
  /** Returns how many of the timestamps were new to the store */
  upsertTimestamps(identity: VideoIdentity, timestamps: Date[]): Promise<number>;
  getVideoIdsNeedingRefresh(cutoff: Date): Promise<VideoIdentity[]>;
  getSyncStatuses(ids: VideoIdentity[]): Promise<Map<VideoIdentity, SyncStatus>>;
  recordSyncOutcome(outcome: SyncOutcome): Promise<void>;
  countVideos(): Promise<number>;
  countTimestamps(): Promise<number>;
  commit(): Promise<void>;
}

export interface CursorStore {
  getCursor(filePath: string): Promise<ArchiveCursor | undefined>;
  setCursor(cursor: ArchiveCursor): Promise<void>;
}

export interface StoredVideo {
  id: VideoIdentity;
  title?: string;
  channelId?: string;
  channelTitle?: string;
  status: SyncStatus;
  lastChecked?: string; // ISO 8601
  metadata?: VideoMetadata;
  timestamps: string[]; // ISO 8601, ascending
}

export interface StoreDocument {
  version: number;
  videos: Record<VideoIdentity, StoredVideo>;
  cursors: Record<string, string>;
}
