// src/core/config/constants.ts
export const APP_NAME = 'watchtrail';

export const TIMESTAMP_TOLERANCE_MS = 2 * 60 * 60 * 1000; // 2 hours

export const DEFAULT_BATCH_SIZE = 50; // videos.list accepts at most 50 ids
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1000;

export const PROGRESS_CHANNEL_CAPACITY = 256;

export const STORE_FILENAME = 'watchtrail.json';
export const PARSE_FAILS_FILENAME = 'parse_fails.json';
export const API_KEY_FILENAME = 'api_key';
export const API_KEY_ENV = 'WATCHTRAIL_API_KEY';
export const HOME_ENV = 'WATCHTRAIL_HOME';

export const WATCH_HISTORY_FILENAME = 'watch-history.html';
