import { describe, it, expect } from '@jest/globals';
import { parseArchive, parseEntry, extractVideoId } from '../parser.js';
import { cleanArchiveMarkup, splitEntries } from '../cleanup.js';
import { CorruptArchiveError } from '../../errors.js';
import { buildArchive, removedCell, storyCell, videoCell } from './fixtures.js';

const TIME = 'Mar 14, 2021, 11:10:00 PM EST';

describe('parseArchive', () => {
  it('classifies every entry shape, newest first', () => {
    const content = buildArchive([
      videoCell({ id: 'aaaaaaaaaa1', title: 'A video', channelId: 'UCchan1', channelTitle: 'Channel One', time: TIME }),
      removedCell('Mar 13, 2021, 9:00:00 AM EST'),
      storyCell('Mar 12, 2021, 8:15:30 PM EST'),
      'Viewed an ad<br>Mar 11, 2021, 1:00:00 PM EST<br>',
    ]);

    const entries = [...parseArchive(content, 'watch-history.html')];

    expect(entries.map((entry) => entry.kind)).toEqual(['video', 'removed', 'story', 'unrecognized']);
    expect(entries[0]).toMatchObject({
      kind: 'video',
      videoId: 'aaaaaaaaaa1',
      title: 'A video',
      channelId: 'UCchan1',
      channelTitle: 'Channel One',
      rawTimestamp: TIME,
    });
    expect(entries[1]).toMatchObject({ kind: 'removed', rawTimestamp: 'Mar 13, 2021, 9:00:00 AM EST' });
    expect(entries[2]).toMatchObject({ kind: 'story', rawTimestamp: 'Mar 12, 2021, 8:15:30 PM EST' });
  });

  it('yields entries lazily', () => {
    const entries = parseArchive(
      buildArchive([videoCell({ id: 'aaaaaaaaaa1', title: 'One', time: TIME }), removedCell(TIME)])
    );

    const first = entries.next();
    expect(first.done).toBe(false);
    expect(first.value).toMatchObject({ kind: 'video', videoId: 'aaaaaaaaaa1' });
  });

  it('throws CorruptArchiveError when non-empty content has no entries', () => {
    expect(() => parseArchive('<html><body><p>Nothing</p></body></html>', 'broken.html')).toThrow(CorruptArchiveError);
    expect(() => parseArchive('<html><body><p>Nothing</p></body></html>', 'broken.html')).toThrow(
      'Could not find any records in broken.html'
    );
  });

  it('returns no entries for empty content', () => {
    expect([...parseArchive('   \n')]).toEqual([]);
  });
});

describe('parseEntry', () => {
  const segmentOf = (cell: string): string => splitEntries(cleanArchiveMarkup(buildArchive([cell])))[0];

  it('keeps the id but drops title and channel when the title is the URL', () => {
    const entry = parseEntry(segmentOf(videoCell({ id: 'aaaaaaaaaa1', titleIsUrl: true, time: TIME })));

    expect(entry.kind).toBe('video');
    if (entry.kind !== 'video') return;
    expect(entry.videoId).toBe('aaaaaaaaaa1');
    expect(entry.title).toBeUndefined();
    expect(entry.channelId).toBeUndefined();
    expect(entry.channelTitle).toBeUndefined();
  });

  it('leaves channel fields out when there is no channel link', () => {
    const entry = parseEntry(segmentOf(videoCell({ id: 'aaaaaaaaaa1', title: 'No channel', time: TIME })));

    expect(entry).toMatchObject({ kind: 'video', videoId: 'aaaaaaaaaa1', title: 'No channel', rawTimestamp: TIME });
    expect('channelId' in entry).toBe(false);
  });

  it('decodes entities in titles', () => {
    const entry = parseEntry(segmentOf(videoCell({ id: 'aaaaaaaaaa1', title: 'Tom &amp; Jerry', time: TIME })));
    expect(entry).toMatchObject({ title: 'Tom & Jerry' });
  });

  it('strips a watch URL glued to a story timestamp', () => {
    const entry = parseEntry(
      segmentOf(`Watched story https://www.youtube.com/watch?v=storyvid001${TIME}<br>`)
    );
    expect(entry).toMatchObject({ kind: 'story', rawTimestamp: TIME });
  });

  it('recovers the timestamp of a removed video', () => {
    const entry = parseEntry(segmentOf(removedCell(TIME)));
    expect(entry).toEqual({
      kind: 'removed',
      text: `Watched a video that has been removed${TIME}`,
      rawTimestamp: TIME,
    });
  });
});

describe('extractVideoId', () => {
  it('reads the v parameter', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=aaaaaaaaaa1')).toBe('aaaaaaaaaa1');
  });

  it('drops a time offset', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=aaaaaaaaaa1&t=42s')).toBe('aaaaaaaaaa1');
    expect(extractVideoId('https://www.youtube.com/watch?v=aaaaaaaaaa1%26t%3D42s')).toBe('aaaaaaaaaa1');
  });

  it('returns null without a v parameter', () => {
    expect(extractVideoId('https://www.youtube.com/channel/UCchan1')).toBeNull();
  });
});
