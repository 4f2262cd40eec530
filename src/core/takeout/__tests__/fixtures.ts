// Builders for export markup in the shape the export tool writes it

const OUTER_OPEN = '<div class="outer-cell mdl-cell mdl-cell--12-col mdl-shadow--2dp"><div class="mdl-grid">';
const HEADER = '<div class="header-cell mdl-cell mdl-cell--12-col"><p class="mdl-typography--title">YouTube<br></p></div>';
const CONTENT_OPEN = '<div class="content-cell mdl-cell mdl-cell--6-col mdl-typography--body-1">';
const TRAILER =
  '<div class="content-cell mdl-cell mdl-cell--6-col mdl-typography--body-1 mdl-typography--text-right"></div>' +
  '<div class="content-cell mdl-cell mdl-cell--12-col mdl-typography--caption"><b>Products:</b><br>&emsp;YouTube<br></div></div></div>';

export interface VideoCellOptions {
  id: string;
  title?: string;
  channelId?: string;
  channelTitle?: string;
  time: string;
  titleIsUrl?: boolean;
}

export function videoCell(options: VideoCellOptions): string {
  const url = `https://www.youtube.com/watch?v=${options.id}`;
  const title = options.titleIsUrl ? url : options.title ?? 'Untitled';
  const channel =
    options.channelId && options.channelTitle
      ? `<a href="https://www.youtube.com/channel/${options.channelId}">${options.channelTitle}</a><br>`
      : '';
  return `Watched&nbsp;<a href="${url}">${title}</a><br>${channel}${options.time}<br>`;
}

export function removedCell(time: string): string {
  return `Watched a video that has been removed<br>${time}<br>`;
}

export function storyCell(time: string, id: string = 'storyvid001'): string {
  const url = `https://www.youtube.com/watch?v=${id}`;
  return `Watched story&nbsp;<a href="${url}">${url}</a><br>${time}<br>`;
}

export function entry(cell: string): string {
  return `${OUTER_OPEN}${HEADER}${CONTENT_OPEN}${cell}</div>${TRAILER}`;
}

/** Entries are given newest first, as the export lists them */
export function buildArchive(cells: string[]): string {
  return (
    '<html><head><meta charset="utf-8"><title>Watch history</title></head>' +
    `<body><div class="mdl-grid">${cells.map(entry).join('')}</div></body></html>`
  );
}
