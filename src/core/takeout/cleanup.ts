// src/core/takeout/cleanup.ts
import * as fs from 'fs/promises';

export const PRUNED_MARKER = '<span id="Done">';
export const ENTRY_CLASS = 'watch-entry';
export const ENTRY_BOUNDARY = `<div class="${ENTRY_CLASS}">`;

const BODY_WRAPPER = '<div class="mdl-grid">';

/**
 * Applied in this order. The products rule still needs the <br> tags the
 * next rule strips, and the content-cell rename only matches the left cell
 * because its closing quote follows "body-1" directly.
 */
export const CLEANUP_RULES: ReadonlyArray<readonly [string, string]> = [
  [BODY_WRAPPER, ''],
  ['<div class="outer-cell mdl-cell mdl-cell--12-col mdl-shadow--2dp">', ''],
  ['<div class="header-cell mdl-cell mdl-cell--12-col"><p class="mdl-typography--title">YouTube<br></p></div>', ''],
  ['"content-cell mdl-cell mdl-cell--6-col mdl-typography--body-1"', `"${ENTRY_CLASS}"`],
  [
    '<div class="content-cell mdl-cell mdl-cell--6-col mdl-typography--body-1 mdl-typography--text-right"></div>' +
      '<div class="content-cell mdl-cell mdl-cell--12-col mdl-typography--caption"><b>Products:</b><br>&emsp;YouTube<br></div></div></div>',
    '',
  ],
  ['<br>', ''],
  ['<', '\n<'],
  ['>', '>\n'],
];

export function isPruned(content: string): boolean {
  return content.startsWith(PRUNED_MARKER);
}

/**
 * Flattened projection of an export file: page chrome dropped, one entry per
 * boundary div, every tag and text run on its own line.
 */
export function cleanArchiveMarkup(content: string): string {
  if (isPruned(content)) {
    return content;
  }

  let body = sliceBody(content).trim();
  // The export wraps the whole body in one more grid div, closed at the very end
  if (body.startsWith(BODY_WRAPPER) && body.endsWith('</div>')) {
    body = body.slice(0, -'</div>'.length);
  }

  for (const [search, replacement] of CLEANUP_RULES) {
    body = body.split(search).join(replacement);
  }

  return `${PRUNED_MARKER}\n${body}`;
}

/**
 * Markup of each entry, from its boundary div up to the next one.
 */
export function splitEntries(cleaned: string): string[] {
  const segments: string[] = [];
  let start = cleaned.indexOf(ENTRY_BOUNDARY);

  while (start !== -1) {
    const next = cleaned.indexOf(ENTRY_BOUNDARY, start + ENTRY_BOUNDARY.length);
    segments.push(next === -1 ? cleaned.slice(start) : cleaned.slice(start, next));
    start = next;
  }

  return segments;
}

/**
 * Rewrite an export file with its cleaned projection. Returns false when the
 * file was already pruned.
 */
export async function pruneArchiveFile(filePath: string): Promise<boolean> {
  const content = await fs.readFile(filePath, 'utf-8');
  if (isPruned(content)) {
    return false;
  }

  await fs.writeFile(filePath, cleanArchiveMarkup(content), 'utf-8');
  return true;
}

function sliceBody(content: string): string {
  const open = content.match(/<body[^>]*>/);
  if (!open || open.index === undefined) {
    return content;
  }

  const start = open.index + open[0].length;
  const end = content.lastIndexOf('</body>');
  return end > start ? content.slice(start, end) : content.slice(start);
}
