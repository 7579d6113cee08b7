/**
 * packrat compression engine
 *
 * Streaming zstd (via zstd-napi) over chunked reads. Nothing here holds a
 * whole payload in memory; the codec sees at most one chunk at a time.
 */

import { createReadStream, createWriteStream, lstatSync, rmSync } from 'node:fs';
import type { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import zstd from 'zstd-napi';
import { DEFAULT_CHUNK_SIZE, MAX_LEVEL, MIN_LEVEL } from './config.js';
import { CompressionFailure, ExtractionFailure, describeError } from './errors.js';
import { ByteCounter } from './progress.js';
import { encodeFormatTag } from './sniffer.js';
import type { ArchiveFormat, CompressionResult } from './types.js';

/** Levels from here up reserve windows sized for unknown input unless told otherwise */
const ULTRA_LEVEL = 20;
const MIN_WINDOW_LOG = 10;
const MAX_WINDOW_LOG = 27;

export interface StreamCompressOptions {
  level: number;
  chunkSize?: number;
  /** Codec worker threads; 1 encodes on the calling thread */
  threads?: number;
  /** Expected input size, used to size the match window at ultra levels */
  sizeHint?: number;
  /** Prefix the output with a format tag frame */
  formatTag?: ArchiveFormat;
  /** Called after each compressed chunk with the bytes written so far */
  onChunk?: (bytes: number, total: number) => void;
  /** Called after each chunk read from the input */
  onInput?: (bytes: number, total: number) => void;
  signal?: AbortSignal;
}

export interface StreamDecompressOptions {
  chunkSize?: number;
  /** Called after each decompressed chunk */
  onChunk?: (bytes: number, total: number) => void;
  signal?: AbortSignal;
}

export function isValidLevel(level: number): boolean {
  return Number.isInteger(level) && level >= MIN_LEVEL && level <= MAX_LEVEL;
}

export function assertLevel(level: number): void {
  if (!isValidLevel(level)) {
    throw new CompressionFailure(
      'INVALID_LEVEL',
      `Compression level must be an integer from ${MIN_LEVEL} to ${MAX_LEVEL}, got ${level}`
    );
  }
}

/**
 * Codec parameters for a level. Ultra levels get a window no larger than
 * the input when its size is known.
 */
export function codecParameters(
  level: number,
  threads = 1,
  sizeHint?: number
): { compressionLevel: number; checksumFlag: boolean; nbWorkers?: number; windowLog?: number } {
  const params: { compressionLevel: number; checksumFlag: boolean; nbWorkers?: number; windowLog?: number } = {
    compressionLevel: level,
    checksumFlag: true,
  };
  if (threads > 1) {
    params.nbWorkers = threads;
  }
  if (level >= ULTRA_LEVEL && sizeHint !== undefined) {
    const needed = Math.ceil(Math.log2(Math.max(sizeHint, 1)));
    params.windowLog = Math.min(Math.max(needed, MIN_WINDOW_LOG), MAX_WINDOW_LOG);
  }
  return params;
}

function createEncoder(options: StreamCompressOptions) {
  try {
    return new zstd.CompressStream(codecParameters(options.level, options.threads, options.sizeHint));
  } catch (error) {
    throw new CompressionFailure('CODEC_ERROR', `Cannot set up compressor: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Compress `input` into `output`, returning the compressed byte count
 * (format tag included).
 */
export async function compressStream(
  input: Readable,
  output: Writable,
  options: StreamCompressOptions
): Promise<number> {
  assertLevel(options.level);

  const encoder = createEncoder(options);

  let tagBytes = 0;
  if (options.formatTag) {
    const tag = encodeFormatTag(options.formatTag);
    output.write(tag);
    tagBytes = tag.length;
  }

  const counted = new ByteCounter(options.onInput);
  const written = new ByteCounter(
    options.onChunk && ((bytes, total) => options.onChunk?.(bytes, total + tagBytes))
  );

  await pipeline(input, counted, encoder, written, output, { signal: options.signal });
  return written.bytes + tagBytes;
}

/**
 * Decompress `input` into `output`, returning the decompressed byte count.
 * Codec errors surface as ExtractionFailure('CORRUPT_STREAM').
 */
export async function decompressStream(
  input: Readable,
  output: Writable,
  options: StreamDecompressOptions = {}
): Promise<number> {
  const decoder = new zstd.DecompressStream();
  const counted = new ByteCounter(options.onChunk);
  let codecError: unknown;
  decoder.once('error', (error) => {
    codecError = error;
  });

  try {
    await pipeline(input, decoder, counted, output, { signal: options.signal });
  } catch (error) {
    if (codecError !== undefined && error === codecError) {
      throw new ExtractionFailure('CORRUPT_STREAM', `Decompression failed: ${describeError(error)}`, { cause: error });
    }
    throw error;
  }
  return counted.bytes;
}

/**
 * Remove a partial output file. Directories are never touched.
 */
export function removePartial(path: string): void {
  if (lstatSync(path, { throwIfNoEntry: false })?.isFile()) {
    rmSync(path, { force: true });
  }
}

/**
 * File-to-file compression. Any failure deletes the partial output before
 * the error propagates.
 */
export async function compressFileTo(
  source: string,
  destination: string,
  options: StreamCompressOptions
): Promise<number> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  try {
    return await compressStream(
      createReadStream(source, { highWaterMark: chunkSize }),
      createWriteStream(destination),
      options
    );
  } catch (error) {
    removePartial(destination);
    throw error;
  }
}

export async function decompressFileTo(
  source: string,
  destination: string,
  options: StreamDecompressOptions = {}
): Promise<number> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  try {
    return await decompressStream(
      createReadStream(source, { highWaterMark: chunkSize }),
      createWriteStream(destination, { highWaterMark: chunkSize }),
      options
    );
  } catch (error) {
    removePartial(destination);
    throw error;
  }
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / 1024 / 1024).toFixed(2)}MB`;
  return `${(bytes / 1024 / 1024 / 1024).toFixed(2)}GB`;
}

/**
 * originalSize / compressedSize, 0 when nothing was written.
 */
export function compressionRatio(originalSize: number, compressedSize: number): number {
  return compressedSize > 0 ? originalSize / compressedSize : 0;
}

/**
 * Plain snake_case record of a result, the shape stats files are written in.
 */
export function resultToJSON(result: CompressionResult): Record<string, number> {
  return {
    original_size: result.originalSize,
    compressed_size: result.compressedSize,
    duration: result.durationMs / 1000,
    files_processed: result.filesProcessed,
    compression_ratio: result.compressionRatio,
  };
}
