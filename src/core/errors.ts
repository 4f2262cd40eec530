// src/core/errors.ts

export enum ErrorCode {
  CORRUPT_ARCHIVE = 'corrupt_archive',
  TIMESTAMP_PARSE = 'timestamp_parse',
  FILE_NOT_FOUND = 'file_not_found',
  AUTH_FAILED = 'auth_failed',
  QUOTA_EXCEEDED = 'quota_exceeded',
  TRANSIENT = 'transient',
  STORE_WRITE = 'store_write',
}

export interface ErrorReport {
  code: ErrorCode | 'internal';
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export class WatchtrailError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WatchtrailError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export class CorruptArchiveError extends WatchtrailError {
  constructor(readonly filePath: string) {
    super(
      ErrorCode.CORRUPT_ARCHIVE,
      `Could not find any records in ${filePath}. The file is either corrupt or its contents have been changed.`,
      false,
      'Re-download the export or remove the file from the takeout directory',
      { filePath }
    );
    this.name = 'CorruptArchiveError';
  }
}

export class TimestampParseError extends WatchtrailError {
  constructor(readonly raw: string) {
    super(ErrorCode.TIMESTAMP_PARSE, `Unrecognized timestamp: ${JSON.stringify(raw)}`, false, undefined, { raw });
    this.name = 'TimestampParseError';
  }
}

export class FileNotFoundError extends WatchtrailError {
  constructor(readonly path: string) {
    super(ErrorCode.FILE_NOT_FOUND, `No such file or directory: ${path}`, false, 'Check the takeout path', { path });
    this.name = 'FileNotFoundError';
  }
}

export class AuthError extends WatchtrailError {
  constructor(message: string = 'Missing or invalid API key', cause?: unknown) {
    super(ErrorCode.AUTH_FAILED, message, false, 'Put a valid key in the project api_key file or WATCHTRAIL_API_KEY', {
      cause: describeCause(cause),
    });
    this.name = 'AuthError';
  }
}

export class QuotaError extends WatchtrailError {
  constructor(message: string = 'API quota/rate limit exceeded', readonly batchIds: string[] = []) {
    super(ErrorCode.QUOTA_EXCEEDED, message, false, 'Wait for the daily quota to reset, then run sync again', {
      batchIds,
    });
    this.name = 'QuotaError';
  }
}

export class TransientError extends WatchtrailError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.TRANSIENT, message, true, undefined, { cause: describeCause(cause) });
    this.name = 'TransientError';
  }
}

export class StoreWriteError extends WatchtrailError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORE_WRITE, message, false, 'The store may be inconsistent; restore it from its .bak copy', {
      cause: describeCause(cause),
    });
    this.name = 'StoreWriteError';
  }
}

export function toErrorReport(error: unknown): ErrorReport {
  if (error instanceof WatchtrailError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      suggestion: error.suggestion,
    };
  }
  return {
    code: 'internal',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
