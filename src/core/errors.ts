import type { MemberFailure, MemberSkipped } from './types.js';

/** Stable error codes for whole-operation failures. */
export type ArchiveErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'INVALID_LEVEL'
  | 'CODEC_ERROR'
  | 'IO_ERROR'
  | 'ABORTED'
  | 'ARCHIVE_NOT_FOUND'
  | 'ARCHIVE_UNREADABLE'
  | 'CORRUPT_STREAM'
  | 'INVALID_CONFIG';

/** Base class for every error the engine throws. */
export class ArchiveError extends Error {
  /** Machine-readable error code. */
  readonly code: ArchiveErrorCode;
  /** Path the failing operation was working on, if any. */
  readonly path?: string;

  constructor(code: ArchiveErrorCode, message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ArchiveError';
    this.code = code;
    if (options?.path !== undefined) this.path = options.path;
  }

  toJSON(): { name: string; code: ArchiveErrorCode; message: string; path?: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.path !== undefined ? { path: this.path } : {}),
    };
  }
}

/** Source missing, codec error or write failure while compressing. */
export class CompressionFailure extends ArchiveError {
  constructor(code: ArchiveErrorCode, message: string, options?: { path?: string; cause?: unknown }) {
    super(code, message, options);
    this.name = 'CompressionFailure';
  }
}

/** Archive missing or unreadable, or the decompression codec failed. */
export class ExtractionFailure extends ArchiveError {
  constructor(code: ArchiveErrorCode, message: string, options?: { path?: string; cause?: unknown }) {
    super(code, message, options);
    this.name = 'ExtractionFailure';
  }
}

export class ConfigError extends ArchiveError {
  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Message of anything thrown. Some libraries reject with bare strings
 * (unzipper uses 'BAD_PASSWORD'), so this does not assume an Error.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Render per-member problems as a capped list: the first `limit` lines
 * and a count of the rest.
 */
export function summarizeFailures(
  items: ReadonlyArray<MemberFailure | MemberSkipped>,
  limit = 5
): string[] {
  const lines = items.slice(0, limit).map((item) => `  - ${item.member}: ${item.message}`);
  if (items.length > limit) {
    lines.push(`  ... and ${items.length - limit} more`);
  }
  return lines;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Throw ArchiveError('ABORTED') once `signal` has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, path?: string): void {
  if (signal?.aborted) {
    throw new ArchiveError('ABORTED', 'Operation aborted', path !== undefined ? { path } : undefined);
  }
}
