// src/core/takeout/parser.ts
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { RawEntry, VideoEntry } from '../types/index.js';
import { CorruptArchiveError } from '../errors.js';
import { cleanArchiveMarkup, splitEntries } from './cleanup.js';

export const REMOVED_PREFIX = 'Watched a video that has been removed';
export const STORY_PREFIX = 'Watched story';

const WATCH_LINK = 'a[href*="watch?v="]';
const CHANNEL_LINK = 'a[href*="youtube.com/channel"]';

/**
 * Parse one export file into its entries, newest first. Entries are parsed
 * one at a time as the returned generator is consumed.
 *
 * @throws CorruptArchiveError when non-empty content holds no entries
 */
export function parseArchive(content: string, filePath: string = '<memory>'): Generator<RawEntry> {
  if (content.trim().length === 0) {
    return emptyEntries();
  }

  const segments = splitEntries(cleanArchiveMarkup(content));
  if (segments.length === 0) {
    throw new CorruptArchiveError(filePath);
  }

  return parseSegments(segments);
}

export function parseEntry(segment: string): RawEntry {
  const $ = cheerio.load(segment, null, false);
  const text = $.root().text().trim();

  if (text.startsWith(REMOVED_PREFIX)) {
    return { kind: 'removed', text, rawTimestamp: text.slice(REMOVED_PREFIX.length).trim() };
  }

  if (text.startsWith(STORY_PREFIX)) {
    return { kind: 'story', text, rawTimestamp: stripWatchUrl(lastLine(text.slice(STORY_PREFIX.length))) };
  }

  const watchLink = linkOf($(WATCH_LINK).first());
  const videoId = watchLink ? extractVideoId(watchLink.href) : null;
  if (!watchLink || !videoId) {
    return { kind: 'unrecognized', text };
  }

  const entry: VideoEntry = { kind: 'video', text, videoId, rawTimestamp: lastLine(text) };

  // Videos that no longer resolve are exported with their URL as the title
  if (watchLink.text && watchLink.text !== watchLink.href) {
    entry.title = watchLink.text;

    const channelLink = linkOf($(CHANNEL_LINK).first());
    if (channelLink) {
      entry.channelId = channelLink.href.slice(channelLink.href.lastIndexOf('/') + 1);
      entry.channelTitle = channelLink.text;
    }
  }

  return entry;
}

/**
 * Value of the `v` parameter, without a trailing time offset.
 */
export function extractVideoId(url: string): string | null {
  let id: string | null;
  try {
    id = new URL(url, 'https://www.youtube.com').searchParams.get('v');
  } catch {
    return null;
  }
  if (!id) return null;

  const offset = id.indexOf('&t=');
  return offset > 0 ? id.slice(0, offset) : id;
}

function* parseSegments(segments: string[]): Generator<RawEntry> {
  for (const segment of segments) {
    yield parseEntry(segment);
  }
}

function* emptyEntries(): Generator<RawEntry> {
  // nothing to parse
}

function linkOf(node: cheerio.Cheerio<Element>): { href: string; text: string } | undefined {
  const href = node.attr('href');
  return href ? { href, text: node.text().trim() } : undefined;
}

function lastLine(text: string): string {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? '';
}

// Story lines sometimes carry the watch URL glued to the timestamp
function stripWatchUrl(line: string): string {
  if (!line.includes('/watch?v=')) return line;
  return line.replace(/^.*\/watch\?v=[\w-]{11}/, '').trim();
}
