import { describe, it, expect } from '@jest/globals';
import { parseWatchedAt, isSameEvent, insertTimestamp } from '../timestamp.js';
import { TimestampParseError } from '../../errors.js';

const at = (iso: string): Date => new Date(iso);

describe('parseWatchedAt', () => {
  it('reads the wall-clock value as UTC and ignores the zone', () => {
    expect(parseWatchedAt('Mar 14, 2021, 11:10:00 PM EST').toISOString()).toBe('2021-03-14T23:10:00.000Z');
    expect(parseWatchedAt('Mar 14, 2021, 11:10:00 PM CET').toISOString()).toBe('2021-03-14T23:10:00.000Z');
    expect(parseWatchedAt('Mar 14, 2021, 11:10:00 PM').toISOString()).toBe('2021-03-14T23:10:00.000Z');
  });

  it('maps 12 AM and 12 PM', () => {
    expect(parseWatchedAt('Jan 1, 2020, 12:05:09 AM UTC').toISOString()).toBe('2020-01-01T00:05:09.000Z');
    expect(parseWatchedAt('Jan 1, 2020, 12:30:00 PM UTC').toISOString()).toBe('2020-01-01T12:30:00.000Z');
  });

  it('accepts the narrow no-break space before the meridiem', () => {
    expect(parseWatchedAt('Jul 4, 2019, 9:01:02\u202fAM PDT').toISOString()).toBe('2019-07-04T09:01:02.000Z');
  });

  it.each(['yesterday', 'Feb 30, 2021, 1:00:00 PM EST', 'Mar 14, 2021, 13:00:00 PM EST', 'Foo 14, 2021, 1:00:00 PM', ''])(
    'rejects %j',
    (raw) => {
      expect(() => parseWatchedAt(raw)).toThrow(TimestampParseError);
    }
  );
});

describe('isSameEvent', () => {
  it('treats timestamps under two hours apart as one event', () => {
    expect(isSameEvent(at('2021-03-14T23:10:00Z'), at('2021-03-15T01:05:00Z'))).toBe(true);
  });

  it('includes the two hour bound', () => {
    expect(isSameEvent(at('2021-03-14T10:00:00Z'), at('2021-03-14T12:00:00Z'))).toBe(true);
  });

  it('keeps timestamps three hours apart distinct', () => {
    expect(isSameEvent(at('2021-03-14T10:00:00Z'), at('2021-03-14T13:00:00Z'))).toBe(false);
  });

  it('never joins timestamps from different months', () => {
    expect(isSameEvent(at('2021-03-31T23:30:00Z'), at('2021-04-01T00:30:00Z'))).toBe(false);
  });
});

describe('insertTimestamp', () => {
  it('keeps the list ascending', () => {
    const list: Date[] = [];
    expect(insertTimestamp(list, at('2021-03-10T00:00:00Z'))).toBe(true);
    expect(insertTimestamp(list, at('2021-03-01T00:00:00Z'))).toBe(true);
    expect(insertTimestamp(list, at('2021-03-05T00:00:00Z'))).toBe(true);

    expect(list.map((d) => d.toISOString())).toEqual([
      '2021-03-01T00:00:00.000Z',
      '2021-03-05T00:00:00.000Z',
      '2021-03-10T00:00:00.000Z',
    ]);
  });

  it('skips an equivalent event', () => {
    const list = [at('2021-03-14T23:10:00Z')];
    expect(insertTimestamp(list, at('2021-03-15T01:05:00Z'))).toBe(false);
    expect(list).toHaveLength(1);
  });
});
