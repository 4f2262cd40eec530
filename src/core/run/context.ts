// src/core/run/context.ts
import { ProgressChannel } from './channel.js';

export interface IngestStats {
  totalVideos: number;
  totalTimestamps: number;
  failedEntries: number;
  failedFiles: string[];
  recordsInDb: number;
  timestampsInDb: number;
  inserted: number;
}

export interface SyncStats {
  updated: number;
  newlyInactive: number;
  newlyActive: number;
  deleted: number;
  failed: number;
  recordsInDb: number;
  timestampsInDb: number;
}

export type ProgressEvent =
  | { kind: 'stage'; stage: string }
  | { kind: 'progress'; percent: number; message: string }
  | { kind: 'warnings'; warnings: string[] }
  | { kind: 'errors'; message: string }
  | { kind: 'stats'; stats: IngestStats | SyncStats }
  | { kind: 'stop' };

/**
 * Per-run state handed to every pipeline call: the cancellation flag and the
 * progress channel the run reports through.
 */
export class RunContext {
  readonly progress: ProgressChannel<ProgressEvent>;
  private cancelled = false;

  constructor(progress: ProgressChannel<ProgressEvent> = new ProgressChannel<ProgressEvent>()) {
    this.progress = progress;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }

  async emit(event: ProgressEvent): Promise<void> {
    if (this.progress.isClosed) return;
    await this.progress.push(event);
  }

  stage(stage: string): Promise<void> {
    return this.emit({ kind: 'stage', stage });
  }

  report(percent: number, message: string): Promise<void> {
    return this.emit({ kind: 'progress', percent: Math.round(percent * 10) / 10, message });
  }

  /** Ends the event stream; the consumer's loop finishes after draining */
  finish(): void {
    this.progress.close();
  }
}
