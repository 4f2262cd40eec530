import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { JsonStore } from '../json-store.js';
import { UNKNOWN_IDENTITY } from '../../types/index.js';

const at = (iso: string): Date => new Date(iso);

describe('JsonStore', () => {
  let dir: string;
  let storePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'watchtrail-store-'));
    storePath = path.join(dir, 'watchtrail.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts empty when there is no file', async () => {
    const store = new JsonStore(storePath);
    expect(await store.countVideos()).toBe(0);
    expect(await store.countTimestamps()).toBe(0);
    expect(existsSync(storePath)).toBe(false);
  });

  it('persists records on commit', async () => {
    const store = new JsonStore(storePath);
    await store.upsertVideo({ identity: 'v1', title: 'One', timestamps: [] });
    await store.upsertTimestamps('v1', [at('2021-03-14T23:10:00Z')]);
    await store.commit();

    const reopened = new JsonStore(storePath);
    await reopened.load();
    expect(await reopened.countVideos()).toBe(1);
    expect(reopened.getVideo('v1')).toEqual({
      id: 'v1',
      title: 'One',
      status: 'unknown',
      timestamps: ['2021-03-14T23:10:00.000Z'],
    });
    expect(existsSync(`${storePath}.tmp`)).toBe(false);
  });

  it('leaves the file untouched until commit', async () => {
    const store = new JsonStore(storePath);
    await store.upsertVideo({ identity: 'v1', timestamps: [] });
    expect(existsSync(storePath)).toBe(false);
  });

  it('only fills descriptive fields that are still empty', async () => {
    const store = new JsonStore(storePath);
    await store.upsertVideo({ identity: 'v1', title: 'First', timestamps: [] });
    await store.upsertVideo({ identity: 'v1', title: 'Second', channelId: 'UCchan1', channelTitle: 'Chan', timestamps: [] });

    expect(store.getVideo('v1')).toMatchObject({ title: 'First', channelId: 'UCchan1', channelTitle: 'Chan' });
  });

  it('merges timestamps with the stored ones under the tolerance rule', async () => {
    const store = new JsonStore(storePath);
    await store.upsertTimestamps('v1', [at('2021-03-14T23:10:00Z')]);

    const added = await store.upsertTimestamps('v1', [at('2021-03-15T01:05:00Z'), at('2021-03-01T08:00:00Z')]);

    expect(added).toBe(1);
    expect(store.getVideo('v1')?.timestamps).toEqual(['2021-03-01T08:00:00.000Z', '2021-03-14T23:10:00.000Z']);
  });

  it('keeps the unknown bucket free of times a known video has', async () => {
    const store = new JsonStore(storePath);
    await store.upsertTimestamps(UNKNOWN_IDENTITY, [at('2021-03-14T23:10:00Z'), at('2021-02-01T10:00:00Z')]);
    await store.upsertTimestamps('v1', [at('2021-03-14T23:10:00Z')]);

    expect(store.getVideo(UNKNOWN_IDENTITY)?.timestamps).toEqual(['2021-02-01T10:00:00.000Z']);

    expect(await store.upsertTimestamps(UNKNOWN_IDENTITY, [at('2021-03-14T23:10:00Z')])).toBe(0);
    expect(await store.countVideos()).toBe(1);
    expect(await store.countTimestamps()).toBe(2);
  });

  it('selects videos never checked or checked before the cutoff', async () => {
    const store = new JsonStore(storePath);
    for (const id of ['fresh', 'stale', 'never']) {
      await store.upsertVideo({ identity: id, timestamps: [] });
    }
    await store.upsertTimestamps(UNKNOWN_IDENTITY, [at('2021-02-01T10:00:00Z')]);
    await store.recordSyncOutcome({
      videoIdentity: 'fresh',
      previousStatus: 'unknown',
      newStatus: 'inactive',
      checkedAt: at('2024-01-10T00:00:00Z'),
    });
    await store.recordSyncOutcome({
      videoIdentity: 'stale',
      previousStatus: 'unknown',
      newStatus: 'inactive',
      checkedAt: at('2024-01-01T00:00:00Z'),
    });

    const ids = await store.getVideoIdsNeedingRefresh(at('2024-01-05T00:00:00Z'));
    expect(ids.sort()).toEqual(['never', 'stale']);
  });

  it('stores the metadata snapshot and refreshes names from it', async () => {
    const store = new JsonStore(storePath);
    await store.upsertVideo({ identity: 'v1', title: 'Old title', timestamps: [] });
    const snapshot = { id: 'v1', snippet: { title: 'New title', channelId: 'UCchan1', channelTitle: 'Chan' } };

    await store.recordSyncOutcome({
      videoIdentity: 'v1',
      previousStatus: 'unknown',
      newStatus: 'active',
      metadataSnapshot: snapshot,
      checkedAt: at('2024-01-01T00:00:00Z'),
    });

    expect(store.getVideo('v1')).toEqual({
      id: 'v1',
      title: 'New title',
      channelId: 'UCchan1',
      channelTitle: 'Chan',
      status: 'active',
      lastChecked: '2024-01-01T00:00:00.000Z',
      metadata: snapshot,
      timestamps: [],
    });
    expect(await store.getSyncStatuses(['v1', 'other'])).toEqual(
      new Map([
        ['v1', 'active'],
        ['other', 'unknown'],
      ])
    );
  });

  it('round-trips cursors', async () => {
    const store = new JsonStore(storePath);
    expect(await store.getCursor('a.html')).toBeUndefined();

    await store.setCursor({ filePath: 'a.html', lastSeenMarker: 'newest entry' });
    await store.commit();

    const reopened = new JsonStore(storePath);
    expect(await reopened.getCursor('a.html')).toEqual({ filePath: 'a.html', lastSeenMarker: 'newest entry' });
  });

  it('moves an unreadable file aside and starts over', async () => {
    await fs.writeFile(storePath, '{ not json');

    const store = new JsonStore(storePath);
    expect(await store.countVideos()).toBe(0);

    expect(await fs.readFile(`${storePath}.bak`, 'utf-8')).toBe('{ not json');
    expect(existsSync(storePath)).toBe(false);
  });

  it('treats a document of the wrong layout as unreadable', async () => {
    await fs.writeFile(storePath, JSON.stringify({ version: 99, videos: [] }));

    const store = new JsonStore(storePath);
    await store.load();

    expect(existsSync(`${storePath}.bak`)).toBe(true);
  });
});
