/**
 * packrat core types
 */

import type { EngineConfig } from './config.js';
import type { Logger } from './logger.js';
import type { ProgressListener } from './progress.js';

/** Archive layouts a compressed file can hold. */
export type ArchiveFormat = 'single-file' | 'container';

/** Hash algorithms accepted by the digest helpers (any name `node:crypto` knows works). */
export type DigestAlgorithm = 'sha256' | 'sha512' | 'sha1' | 'md5';

/** Lifecycle of a compression job, reported through progress events. */
export type JobState =
  | 'initialized'
  | 'hashing'
  | 'streaming'
  | 'finalizing'
  | 'completed'
  | 'failed-cleanup';

export type Operation = 'compress-file' | 'compress-folder' | 'decompress' | 'extract-zip';

/** Options shared by every operation */
export interface EngineOptions {
  /** Read size for chunked I/O in bytes (default: from config, 1 MiB) */
  chunkSize?: number;
  /** Receives structured progress events; failures inside the listener are swallowed */
  onProgress?: ProgressListener;
  logger?: Logger;
  /** Aborting closes the job's streams and deletes partial output */
  signal?: AbortSignal;
  /** Settings not given explicitly; unset fields take the built-in defaults */
  config?: Partial<EngineConfig>;
}

export interface CompressFileOptions extends EngineOptions {
  /** zstd level 1-22 (default: from config, 3) */
  level?: number;
  /** Write a `<dest>.sha256` sidecar (default: true) */
  computeHash?: boolean;
  /** Codec worker threads; values above 1 enable multithreaded encoding */
  threads?: number;
}

export interface CompressFolderOptions extends EngineOptions {
  level?: number;
  /** Files whose path relative to the folder contains any of these substrings are left out */
  excludePatterns?: string[];
  /**
   * Let the codec use the configured thread count (default: true). The
   * default config has `threads: 1`, so this only changes anything once
   * `threads` (or `parallel_threads` in the config file) is raised.
   */
  parallel?: boolean;
}

export interface DecompressOptions extends EngineOptions {
  /** Compare against `<source>.sha256` when present (default: from config, true) */
  verifyHash?: boolean;
}

export interface ExtractZipOptions extends EngineOptions {
  excludePatterns?: string[];
  password?: string;
  /** Run the CRC test over every member before extracting (default: from config, true) */
  verifyIntegrity?: boolean;
}

export interface CompressionResult {
  /** Uncompressed bytes read */
  originalSize: number;
  /** Size of the finished output file */
  compressedSize: number;
  /** Wall time in milliseconds */
  durationMs: number;
  filesProcessed: number;
  /** originalSize / compressedSize, 0 when nothing was written */
  compressionRatio: number;
}

export interface FolderCompressionResult extends CompressionResult {
  /** Files found by the walk after exclusions */
  filesFound: number;
  skipped: MemberSkipped[];
}

export interface DecompressResult {
  success: boolean;
  format: ArchiveFormat;
  /** Whether the format came from the archive's tag or from sniffing its content */
  detectedBy: 'tag' | 'sniff';
  /** Files written (1 for a single-file archive) */
  extractedCount: number;
  /** Decompressed bytes written */
  bytesWritten: number;
  integrity: IntegrityStatus;
  warnings: IntegrityWarning[];
  skipped: MemberSkipped[];
}

export interface ZipExtractionResult {
  /** true when no member failed */
  success: boolean;
  extractedCount: number;
  totalMembers: number;
  failures: MemberFailure[];
  skipped: MemberSkipped[];
  /** Members that failed the integrity test */
  corrupted: string[];
}

/** `unreadable`: a sidecar exists but could not be read */
export type IntegrityStatus = 'verified' | 'mismatch' | 'missing' | 'unreadable' | 'skipped';

export interface IntegrityWarning {
  kind: 'integrity';
  file: string;
  /** Absent when the sidecar could not be read */
  expected?: string;
  actual?: string;
  message: string;
}

export type SkipReason = 'unsafe-path' | 'io-error' | 'unsupported-type';

export interface MemberSkipped {
  member: string;
  reason: SkipReason;
  message: string;
}

export interface MemberFailure {
  member: string;
  message: string;
}

/** One record of a folder archive */
export interface ContainerEntry {
  kind: 'file' | 'directory';
  /** '/'-separated path, first segment is the archived folder's name */
  path: string;
  size: number;
  mode?: number;
  mtime?: Date;
  /** Absolute path on disk */
  source: string;
}

export interface SidecarDigest {
  digest: string;
  fileName: string;
}

export type PlanVerdict = 'extract' | 'excluded' | 'unsafe';

export interface ExtractionPlan {
  member: string;
  target: string | null;
  verdict: PlanVerdict;
}

export interface CompressJob {
  source: string;
  destination: string;
}

export interface CompressFilesOptions extends CompressFileOptions {
  /** Jobs run at once (default: from config, 4) */
  concurrency?: number;
}

export type JobOutcome =
  | { status: 'fulfilled'; job: CompressJob; result: CompressionResult }
  | { status: 'rejected'; job: CompressJob; error: Error };

export interface ArchiveInfo {
  path: string;
  size: number;
  format: ArchiveFormat | 'unknown';
  tagged: boolean;
  /** Digest from the sidecar, if one exists */
  digest?: string;
}
