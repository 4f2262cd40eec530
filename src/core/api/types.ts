// src/core/api/types.ts
import type { VideoIdentity, VideoMetadata } from '../types/index.js';

/**
 * Remote video metadata lookups.
 *
 * Implementations raise AuthError for credential problems, QuotaError when
 * the quota or rate limit is exhausted, and TransientError for anything
 * worth retrying.
 */
export interface MetadataClient {
  readonly maxBatchSize: number;
  authorize(): Promise<void>;
  /** Ids missing from the result have no metadata on the remote side */
  lookupBatch(ids: VideoIdentity[]): Promise<Map<VideoIdentity, VideoMetadata>>;
}
