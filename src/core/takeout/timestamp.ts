// src/core/takeout/timestamp.ts
import { TimestampParseError } from '../errors.js';
import { TIMESTAMP_TOLERANCE_MS } from '../config/constants.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// "Mar 14, 2021, 11:10:00 PM EST"; the zone suffix is optional and ignored
const DISPLAY_RE = /^([A-Z][a-z]{2}) (\d{1,2}), (\d{4}), (\d{1,2}):(\d{2}):(\d{2}) ([AP]M)(?: \S+)?$/;

/**
 * Parse an export display timestamp into an instant. The wall-clock value is
 * taken as UTC; the zone suffix is dropped, which is what the tolerance
 * window in {@link isSameEvent} absorbs.
 */
export function parseWatchedAt(raw: string): Date {
  const normalized = raw
    .replace(/\s+/g, ' ')
    .trim();

  const match = normalized.match(DISPLAY_RE);
  if (!match) {
    throw new TimestampParseError(raw);
  }

  const [, monthName, dayText, yearText, hourText, minuteText, secondText, meridiem] = match;
  const month = MONTHS.indexOf(monthName);
  const day = parseInt(dayText, 10);
  const year = parseInt(yearText, 10);
  const hour12 = parseInt(hourText, 10);
  const minute = parseInt(minuteText, 10);
  const second = parseInt(secondText, 10);

  if (month < 0 || hour12 < 1 || hour12 > 12 || minute > 59 || second > 59) {
    throw new TimestampParseError(raw);
  }

  const hour = (hour12 % 12) + (meridiem === 'PM' ? 12 : 0);
  const date = new Date(Date.UTC(year, month, day, hour, minute, second));

  // Date.UTC rolls "Feb 30" over into March
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    throw new TimestampParseError(raw);
  }

  return date;
}

/**
 * Two timestamps of one record are the same watch event when they share the
 * calendar month and lie within the tolerance window of each other.
 */
export function isSameEvent(a: Date, b: Date): boolean {
  if (a.getUTCFullYear() !== b.getUTCFullYear() || a.getUTCMonth() !== b.getUTCMonth()) {
    return false;
  }
  return Math.abs(a.getTime() - b.getTime()) <= TIMESTAMP_TOLERANCE_MS;
}

/**
 * Insert into an ascending list unless an equivalent event is already there.
 * Returns whether the timestamp was inserted.
 */
export function insertTimestamp(timestamps: Date[], timestamp: Date): boolean {
  if (timestamps.some((existing) => isSameEvent(existing, timestamp))) {
    return false;
  }

  const time = timestamp.getTime();
  let index = timestamps.length;
  while (index > 0 && timestamps[index - 1].getTime() > time) {
    index--;
  }
  timestamps.splice(index, 0, timestamp);
  return true;
}
