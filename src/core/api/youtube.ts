// src/core/api/youtube.ts
import type { MetadataClient } from './types.js';
import type { VideoIdentity, VideoMetadata } from '../types/index.js';
import { AuthError, QuotaError, TransientError } from '../errors.js';
import { DEFAULT_BATCH_SIZE } from '../config/constants.js';

const API_BASE = 'https://www.googleapis.com/youtube/v3';
const VIDEO_PARTS = 'snippet,contentDetails,statistics,status,topicDetails';
const QUOTA_REASONS = new Set(['quotaExceeded', 'rateLimitExceeded', 'userRateLimitExceeded', 'dailyLimitExceeded']);

export interface YouTubeClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class YouTubeDataClient implements MetadataClient {
  readonly maxBatchSize = DEFAULT_BATCH_SIZE;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: YouTubeClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? API_BASE;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** Cheapest call the API offers, used to reject a bad key up front */
  async authorize(): Promise<void> {
    if (!this.apiKey) {
      throw new AuthError();
    }
    await this.request('i18nLanguages', { part: 'snippet', hl: 'en_US' }, []);
  }

  async lookupBatch(ids: VideoIdentity[]): Promise<Map<VideoIdentity, VideoMetadata>> {
    if (ids.length > this.maxBatchSize) {
      throw new Error(`At most ${this.maxBatchSize} ids per lookup, got ${ids.length}`);
    }

    const body = await this.request('videos', { part: VIDEO_PARTS, id: ids.join(','), maxResults: String(ids.length) }, ids);
    const results = new Map<VideoIdentity, VideoMetadata>();
    const items: unknown[] = isRecord(body) && Array.isArray(body.items) ? body.items : [];

    for (const item of items) {
      if (isRecord(item) && typeof item.id === 'string') {
        results.set(item.id, item);
      }
    }
    return results;
  }

  private async request(endpoint: string, params: Record<string, string>, ids: VideoIdentity[]): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('key', this.apiKey);

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new TransientError(`Request to ${endpoint} failed`, error);
    }

    let body: unknown = null;
    try {
      body = await response.json();
    } catch (error) {
      if (response.ok) {
        throw new TransientError(`Malformed response from ${endpoint}`, error);
      }
    }

    if (response.ok) {
      return body;
    }

    const reason = errorReason(body);
    const message = errorMessage(body) ?? `${endpoint} returned HTTP ${response.status}`;

    if (response.status === 429 || (reason !== undefined && QUOTA_REASONS.has(reason))) {
      throw new QuotaError(message, ids);
    }
    if (response.status === 400 || response.status === 401 || response.status === 403) {
      throw new AuthError(message);
    }
    throw new TransientError(message);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// { error: { message, errors: [{ reason }] } }
function errorReason(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.error) || !Array.isArray(body.error.errors)) return undefined;
  const first: unknown = body.error.errors[0];
  return isRecord(first) && typeof first.reason === 'string' ? first.reason : undefined;
}

function errorMessage(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.error)) return undefined;
  return typeof body.error.message === 'string' ? body.error.message : undefined;
}
