// src/core/takeout/marker.ts
import type { RawEntry } from '../types/index.js';

export function markerFor(entry: RawEntry): string {
  return entry.text;
}

/**
 * Entries in front of the first one matching the marker. Export files list
 * the newest entry first, so everything from the marker on was seen by an
 * earlier run. Without a marker all entries pass through.
 */
export function* truncateAtMarker<T extends RawEntry>(entries: Iterable<T>, marker?: string): Generator<T> {
  for (const entry of entries) {
    if (marker !== undefined && markerFor(entry) === marker) {
      return;
    }
    yield entry;
  }
}

/**
 * Tracks the newest entry of a pass so the next pass can stop there.
 */
export class MarkerTracker {
  private newest?: string;

  constructor(private readonly previous?: string) {}

  *track<T extends RawEntry>(entries: Iterable<T>): Generator<T> {
    for (const entry of truncateAtMarker(entries, this.previous)) {
      if (this.newest === undefined) {
        this.newest = markerFor(entry);
      }
      yield entry;
    }
  }

  /** Marker to persist: the newest entry seen, or the previous one if nothing was new */
  get next(): string | undefined {
    return this.newest ?? this.previous;
  }

  get changed(): boolean {
    return this.newest !== undefined && this.newest !== this.previous;
  }
}
