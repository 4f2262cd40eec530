// src/core/types/index.ts
export const UNKNOWN_IDENTITY = 'unknown';

export type VideoIdentity = string;

export type SyncStatus = 'active' | 'inactive' | 'unknown';

export interface WatchEvent {
  readonly videoIdentity: VideoIdentity;
  readonly watchedAt: Date;
}

export interface VideoRecord {
  identity: VideoIdentity;
  title?: string;
  channelId?: string;
  channelTitle?: string;
  /** Ascending, deduplicated under the tolerance window */
  timestamps: Date[];
}

export interface ArchiveCursor {
  filePath: string;
  lastSeenMarker: string;
}

export type VideoMetadata = Record<string, unknown>;

export interface SyncOutcome {
  videoIdentity: VideoIdentity;
  previousStatus: SyncStatus;
  newStatus: SyncStatus;
  metadataSnapshot?: VideoMetadata;
  checkedAt: Date;
}

export type RawEntry = RemovedEntry | StoryEntry | VideoEntry | UnrecognizedEntry;

interface EntryBase {
  /** Flattened text of the entry, used as the incremental marker */
  text: string;
}

export interface RemovedEntry extends EntryBase {
  kind: 'removed';
  rawTimestamp: string;
}

export interface StoryEntry extends EntryBase {
  kind: 'story';
  rawTimestamp: string;
}

export interface VideoEntry extends EntryBase {
  kind: 'video';
  videoId: string;
  title?: string;
  channelId?: string;
  channelTitle?: string;
  rawTimestamp: string;
}

export interface UnrecognizedEntry extends EntryBase {
  kind: 'unrecognized';
}

export interface FailedEntry {
  filePath: string;
  text: string;
  reason: string;
}
