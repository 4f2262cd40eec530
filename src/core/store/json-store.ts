// src/core/store/json-store.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { UNKNOWN_IDENTITY } from '../types/index.js';
import type {
  ArchiveCursor,
  SyncOutcome,
  SyncStatus,
  VideoIdentity,
  VideoMetadata,
  VideoRecord,
} from '../types/index.js';
import type { CursorStore, StoreDocument, StoredVideo, VideoStore } from './types.js';
import { StoreWriteError } from '../errors.js';
import { insertTimestamp } from '../takeout/timestamp.js';

const STORE_VERSION = 1;

/**
 * Whole store in one JSON document, read on first use and written back on
 * commit. A file that does not parse is moved aside to `.bak`.
 */
export class JsonStore implements VideoStore, CursorStore {
  private document: StoreDocument = emptyDocument();
  private loaded = false;

  constructor(private readonly storePath: string, private readonly verbose: boolean = false) {}

  async load(): Promise<void> {
    if (this.loaded) return;

    if (!existsSync(this.storePath)) {
      this.loaded = true;
      return;
    }

    try {
      const content = await fs.readFile(this.storePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isStoreDocument(parsed)) {
        throw new Error('Unexpected store layout');
      }
      this.document = parsed;
    } catch (error) {
      await this.backupAndRecover(error);
    }
    this.loaded = true;
  }

  async commit(): Promise<void> {
    const tmpPath = `${this.storePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(this.document, null, 2));
      await fs.rename(tmpPath, this.storePath);
    } catch (error) {
      throw new StoreWriteError(`Could not write store ${this.storePath}`, error);
    }
  }

  async upsertVideo(record: VideoRecord): Promise<void> {
    await this.ensureLoaded();
    const stored = this.resolve(record.identity);

    if (!stored.title && record.title) stored.title = record.title;
    if (!stored.channelId && record.channelId) stored.channelId = record.channelId;
    if (!stored.channelTitle && record.channelTitle) stored.channelTitle = record.channelTitle;
  }

  async upsertTimestamps(identity: VideoIdentity, timestamps: Date[]): Promise<number> {
    await this.ensureLoaded();
    const stored = this.resolve(identity);
    const current = stored.timestamps.map((iso) => new Date(iso));

    let candidates = timestamps;
    if (identity === UNKNOWN_IDENTITY) {
      const known = this.knownTimes();
      candidates = timestamps.filter((timestamp) => !known.has(timestamp.getTime()));
    } else {
      this.dropFromUnknown(timestamps);
    }

    let added = 0;
    for (const timestamp of candidates) {
      if (insertTimestamp(current, timestamp)) added++;
    }
    stored.timestamps = current.map((timestamp) => timestamp.toISOString());
    return added;
  }

  async getVideoIdsNeedingRefresh(cutoff: Date): Promise<VideoIdentity[]> {
    await this.ensureLoaded();
    const cutoffTime = cutoff.getTime();

    return Object.values(this.document.videos)
      .filter((video) => video.id !== UNKNOWN_IDENTITY)
      .filter((video) => !video.lastChecked || new Date(video.lastChecked).getTime() < cutoffTime)
      .map((video) => video.id);
  }

  async getSyncStatuses(ids: VideoIdentity[]): Promise<Map<VideoIdentity, SyncStatus>> {
    await this.ensureLoaded();
    const statuses = new Map<VideoIdentity, SyncStatus>();
    for (const id of ids) {
      statuses.set(id, this.document.videos[id]?.status ?? 'unknown');
    }
    return statuses;
  }

  async recordSyncOutcome(outcome: SyncOutcome): Promise<void> {
    await this.ensureLoaded();
    const stored = this.resolve(outcome.videoIdentity);

    stored.status = outcome.newStatus;
    stored.lastChecked = outcome.checkedAt.toISOString();
    if (outcome.metadataSnapshot) {
      stored.metadata = outcome.metadataSnapshot;
      const snippet = readSnippet(outcome.metadataSnapshot);
      if (snippet.title) stored.title = snippet.title;
      if (snippet.channelId) stored.channelId = snippet.channelId;
      if (snippet.channelTitle) stored.channelTitle = snippet.channelTitle;
    }
  }

  async countVideos(): Promise<number> {
    await this.ensureLoaded();
    return Object.keys(this.document.videos).filter((id) => id !== UNKNOWN_IDENTITY).length;
  }

  async countTimestamps(): Promise<number> {
    await this.ensureLoaded();
    return Object.values(this.document.videos).reduce((sum, video) => sum + video.timestamps.length, 0);
  }

  async getCursor(filePath: string): Promise<ArchiveCursor | undefined> {
    await this.ensureLoaded();
    const marker = this.document.cursors[filePath];
    return marker === undefined ? undefined : { filePath, lastSeenMarker: marker };
  }

  async setCursor(cursor: ArchiveCursor): Promise<void> {
    await this.ensureLoaded();
    this.document.cursors[cursor.filePath] = cursor.lastSeenMarker;
  }

  getVideo(id: VideoIdentity): StoredVideo | undefined {
    return this.document.videos[id];
  }

  private resolve(id: VideoIdentity): StoredVideo {
    let stored = this.document.videos[id];
    if (!stored) {
      stored = { id, status: 'unknown', timestamps: [] };
      this.document.videos[id] = stored;
    }
    return stored;
  }

  private knownTimes(): Set<number> {
    const known = new Set<number>();
    for (const video of Object.values(this.document.videos)) {
      if (video.id === UNKNOWN_IDENTITY) continue;
      for (const iso of video.timestamps) {
        known.add(new Date(iso).getTime());
      }
    }
    return known;
  }

  private dropFromUnknown(timestamps: Date[]): void {
    const unknown = this.document.videos[UNKNOWN_IDENTITY];
    if (!unknown || unknown.timestamps.length === 0) return;

    const times = new Set(timestamps.map((timestamp) => timestamp.getTime()));
    unknown.timestamps = unknown.timestamps.filter((iso) => !times.has(new Date(iso).getTime()));
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.load();
    }
  }

  private async backupAndRecover(cause: unknown): Promise<void> {
    const backupPath = this.storePath + '.bak';
    if (this.verbose) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      console.log(`[Store] Unreadable store (${reason}), moving it to ${backupPath}`);
    }

    try {
      await fs.rename(this.storePath, backupPath);
    } catch (error) {
      throw new StoreWriteError(`Could not back up unreadable store ${this.storePath}`, error);
    }

    this.document = emptyDocument();
  }
}

function emptyDocument(): StoreDocument {
  return { version: STORE_VERSION, videos: {}, cursors: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoreDocument(value: unknown): value is StoreDocument {
  return (
    isRecord(value) &&
    value.version === STORE_VERSION &&
    isRecord(value.videos) &&
    isRecord(value.cursors) &&
    Object.values(value.videos).every((video) => isRecord(video) && Array.isArray(video.timestamps))
  );
}

function readSnippet(metadata: VideoMetadata): { title?: string; channelId?: string; channelTitle?: string } {
  const snippet = metadata.snippet;
  if (!isRecord(snippet)) return {};
  return {
    title: typeof snippet.title === 'string' ? snippet.title : undefined,
    channelId: typeof snippet.channelId === 'string' ? snippet.channelId : undefined,
    channelTitle: typeof snippet.channelTitle === 'string' ? snippet.channelTitle : undefined,
  };
}
