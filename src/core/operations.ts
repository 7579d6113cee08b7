/**
 * Public archive operations.
 *
 * Each call resolves its own settings and owns its streams; nothing is kept
 * between calls. Whole-operation failures throw (after removing partial
 * output); per-member problems come back in the result.
 */

import { createReadStream, createWriteStream, existsSync, mkdirSync, rmSync, statSync, type Stats } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import {
  assertLevel,
  compressFileTo,
  compressStream,
  compressionRatio,
  decompressFileTo,
  decompressStream,
  formatBytes,
  removePartial,
} from './compressor.js';
import { resolveConfig, type EngineConfig } from './config.js';
import { createContainerStream, createUnpackSink, estimateContainerSize, walkFolder } from './container.js';
import {
  ArchiveError,
  CompressionFailure,
  ExtractionFailure,
  describeError,
  isAbortError,
  isNotFound,
  throwIfAborted,
} from './errors.js';
import { digestFile, readSidecar, sidecarPathFor, verifySidecar, writeSidecar } from './hash.js';
import { silentLogger, type Logger } from './logger.js';
import { notify, type ProgressEvent } from './progress.js';
import { detectFormat, readFormatTag, type FormatDetection } from './sniffer.js';
import type {
  ArchiveInfo,
  CompressFileOptions,
  CompressFilesOptions,
  CompressFolderOptions,
  CompressJob,
  CompressionResult,
  DecompressOptions,
  DecompressResult,
  EngineOptions,
  ExtractZipOptions,
  FolderCompressionResult,
  IntegrityWarning,
  JobOutcome,
  JobState,
  Operation,
  SidecarDigest,
  ZipExtractionResult,
} from './types.js';
import { extractZip as extractZipArchive } from './zip.js';

interface Run {
  config: EngineConfig;
  chunkSize: number;
  logger: Logger;
  emit: (event: ProgressEvent) => void;
  state: (state: JobState) => void;
}

function prepare(operation: Operation, options: EngineOptions): Run {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;
  const emit = (event: ProgressEvent) => notify(options.onProgress, event, logger);
  return {
    config,
    chunkSize: options.chunkSize ?? config.chunkSize,
    logger,
    emit,
    state: (state) => emit({ type: 'state', operation, state }),
  };
}

/** Node system errors carry a syscall; anything else from a pipeline came from the codec. */
function isSystemError(error: unknown): boolean {
  return error instanceof Error && 'syscall' in error;
}

function compressionError(error: unknown, path: string): ArchiveError {
  if (error instanceof ArchiveError) return error;
  if (isAbortError(error)) return new ArchiveError('ABORTED', 'Operation aborted', { path, cause: error });
  if (isSystemError(error)) {
    return new CompressionFailure('IO_ERROR', `I/O error while compressing ${path}: ${describeError(error)}`, { path, cause: error });
  }
  return new CompressionFailure('CODEC_ERROR', `Compression failed for ${path}: ${describeError(error)}`, { path, cause: error });
}

function extractionError(error: unknown, path: string): ArchiveError {
  if (error instanceof ArchiveError) return error;
  if (isAbortError(error)) return new ArchiveError('ABORTED', 'Operation aborted', { path, cause: error });
  if (isSystemError(error)) {
    return new ExtractionFailure('IO_ERROR', `I/O error while extracting ${path}: ${describeError(error)}`, { path, cause: error });
  }
  return new ExtractionFailure('CORRUPT_STREAM', `Decompression failed for ${path}: ${describeError(error)}`, { path, cause: error });
}

function statSource(source: string): Stats {
  try {
    return statSync(source);
  } catch (error) {
    if (isNotFound(error)) {
      throw new CompressionFailure('SOURCE_NOT_FOUND', `The file ${source} does not exist or is not a file.`, {
        path: source,
        cause: error,
      });
    }
    throw new CompressionFailure('IO_ERROR', `Cannot read ${source}: ${describeError(error)}`, { path: source, cause: error });
  }
}

function completionMessage(result: CompressionResult): string {
  return (
    `Compressed ${formatBytes(result.originalSize)} -> ${formatBytes(result.compressedSize)} ` +
    `(ratio ${result.compressionRatio.toFixed(2)}:1, ${(result.durationMs / 1000).toFixed(2)}s)`
  );
}

/**
 * Compress one file to `destination`, writing `<destination>.sha256` unless
 * hashing is turned off.
 */
export async function compressFile(
  source: string,
  destination: string,
  options: CompressFileOptions = {}
): Promise<CompressionResult> {
  const run = prepare('compress-file', options);
  const level = options.level ?? run.config.compressionLevel;
  assertLevel(level);

  const stat = statSource(source);
  if (!stat.isFile()) {
    throw new CompressionFailure('SOURCE_NOT_FOUND', `The file ${source} does not exist or is not a file.`, { path: source });
  }

  const started = Date.now();
  run.emit({ type: 'started', operation: 'compress-file', source, totalBytes: stat.size });
  run.state('initialized');
  run.logger.info(`Compressing ${source} -> ${destination} (level ${level})`);

  try {
    throwIfAborted(options.signal, source);
    mkdirSync(dirname(resolve(destination)), { recursive: true });

    let digest: string | undefined;
    if (options.computeHash ?? true) {
      run.state('hashing');
      digest = await digestFile(source, { chunkSize: run.chunkSize });
      throwIfAborted(options.signal, source);
    }

    run.state('streaming');
    await compressFileTo(source, destination, {
      level,
      chunkSize: run.chunkSize,
      threads: options.threads ?? run.config.threads,
      sizeHint: stat.size,
      formatTag: 'single-file',
      signal: options.signal,
      onInput: (bytes, processed) =>
        run.emit({ type: 'chunk', operation: 'compress-file', bytes, processedBytes: processed, totalBytes: stat.size }),
    });

    run.state('finalizing');
    const compressedSize = statSync(destination).size;
    if (digest !== undefined) {
      writeSidecar(sidecarPathFor(destination), digest, basename(source));
    }

    const result: CompressionResult = {
      originalSize: stat.size,
      compressedSize,
      durationMs: Date.now() - started,
      filesProcessed: 1,
      compressionRatio: compressionRatio(stat.size, compressedSize),
    };
    run.state('completed');
    const message = completionMessage(result);
    run.logger.info(message);
    run.emit({ type: 'completed', operation: 'compress-file', result, message });
    return result;
  } catch (error) {
    run.state('failed-cleanup');
    removePartial(destination);
    const failure = compressionError(error, source);
    run.logger.error(failure.message);
    throw failure;
  }
}

/**
 * Pack a folder into a tar container and compress it as one stream.
 * Files that cannot be read are skipped and reported; the archive is still
 * written.
 */
export async function compressFolder(
  source: string,
  destination: string,
  options: CompressFolderOptions = {}
): Promise<FolderCompressionResult> {
  const run = prepare('compress-folder', options);
  const level = options.level ?? run.config.compressionLevel;
  assertLevel(level);

  const walk = walkFolder(source, { excludePatterns: options.excludePatterns ?? [], logger: run.logger });
  const expected = estimateContainerSize(walk.entries);
  const started = Date.now();

  run.emit({
    type: 'started',
    operation: 'compress-folder',
    source,
    totalBytes: walk.totalBytes,
    totalFiles: walk.fileCount,
  });
  run.state('initialized');
  run.logger.info(`Found ${walk.fileCount} files (${formatBytes(walk.totalBytes)}) in ${source}`);

  const { stream, summary } = createContainerStream(walk.entries, {
    chunkSize: run.chunkSize,
    logger: run.logger,
    onEntry: (entry, index) =>
      run.emit({ type: 'entry', operation: 'compress-folder', name: entry.path, index, total: walk.fileCount }),
  });

  try {
    throwIfAborted(options.signal, source);
    mkdirSync(dirname(resolve(destination)), { recursive: true });

    run.state('streaming');
    await compressStream(stream, createWriteStream(destination), {
      level,
      chunkSize: run.chunkSize,
      threads: options.parallel === false ? 1 : run.config.threads,
      sizeHint: expected,
      formatTag: 'container',
      signal: options.signal,
      onInput: (bytes, processed) =>
        run.emit({ type: 'chunk', operation: 'compress-folder', bytes, processedBytes: processed, totalBytes: expected }),
    });

    run.state('finalizing');
    const compressedSize = statSync(destination).size;
    const result: FolderCompressionResult = {
      originalSize: summary.bytes,
      compressedSize,
      durationMs: Date.now() - started,
      filesProcessed: summary.processed,
      compressionRatio: compressionRatio(summary.bytes, compressedSize),
      filesFound: walk.fileCount,
      skipped: [...walk.skipped, ...summary.skipped],
    };

    for (const skipped of result.skipped) {
      run.emit({ type: 'warning', operation: 'compress-folder', message: `${skipped.member}: ${skipped.message}` });
    }
    run.state('completed');
    const message = `Processed ${result.filesProcessed}/${result.filesFound} files. ${completionMessage(result)}`;
    run.logger.info(message);
    run.emit({ type: 'completed', operation: 'compress-folder', result, message });
    return result;
  } catch (error) {
    run.state('failed-cleanup');
    stream.destroy();
    removePartial(destination);
    const failure = compressionError(error, source);
    run.logger.error(failure.message);
    throw failure;
  }
}

/**
 * Decompress an archive written by compressFile or compressFolder.
 *
 * A single-file archive is written to `destination`; a folder archive is
 * unpacked under `destination`, which then holds the archived folder.
 */
export async function decompress(
  source: string,
  destination: string,
  options: DecompressOptions = {}
): Promise<DecompressResult> {
  const run = prepare('decompress', options);
  if (!existsSync(source)) {
    throw new ExtractionFailure('ARCHIVE_NOT_FOUND', `The file ${source} does not exist.`, { path: source });
  }

  let detection: FormatDetection;
  try {
    detection = await detectFormat(source);
  } catch (error) {
    throw new ExtractionFailure('CORRUPT_STREAM', `Not a readable zstd archive: ${source} (${describeError(error)})`, {
      path: source,
      cause: error,
    });
  }

  const totalBytes = statSync(source).size;
  run.emit({ type: 'started', operation: 'decompress', source, totalBytes });
  run.logger.info(`Decompressing ${source} (${detection.format}, detected by ${detection.detectedBy})`);

  let processed = 0;
  const onChunk = (bytes: number) => {
    processed += bytes;
    run.emit({ type: 'chunk', operation: 'decompress', bytes, processedBytes: processed });
  };

  const result: DecompressResult = {
    success: true,
    format: detection.format,
    detectedBy: detection.detectedBy,
    extractedCount: 0,
    bytesWritten: 0,
    integrity: 'skipped',
    warnings: [],
    skipped: [],
  };

  if (detection.format === 'single-file') {
    try {
      mkdirSync(dirname(resolve(destination)), { recursive: true });
      result.bytesWritten = await decompressFileTo(source, destination, {
        chunkSize: run.chunkSize,
        signal: options.signal,
        onChunk,
      });
    } catch (error) {
      removePartial(destination);
      const failure = extractionError(error, source);
      run.logger.error(failure.message);
      throw failure;
    }
    result.extractedCount = 1;

    if (options.verifyHash ?? run.config.verifyIntegrity) {
      const outcome = await verifySidecar(destination, sidecarPathFor(source), { chunkSize: run.chunkSize });
      result.integrity = outcome.status;
      if (outcome.warning) addWarning(run, result.warnings, outcome.warning);
    }
  } else {
    const existed = existsSync(destination);
    const { sink, summary } = createUnpackSink(destination, {
      logger: run.logger,
      onEntry: (name, index) => run.emit({ type: 'entry', operation: 'decompress', name, index }),
    });

    try {
      mkdirSync(destination, { recursive: true });
      await decompressStream(createReadStream(source, { highWaterMark: run.chunkSize }), sink, {
        chunkSize: run.chunkSize,
        signal: options.signal,
        onChunk,
      });
    } catch (error) {
      if (existed) {
        for (const written of summary.written) removePartial(written);
      } else if (existsSync(destination)) {
        rmSync(destination, { recursive: true, force: true });
      }
      const failure = extractionError(error, source);
      run.logger.error(failure.message);
      throw failure;
    }

    result.extractedCount = summary.extracted;
    result.bytesWritten = summary.bytes;
    result.skipped = summary.skipped;
    for (const skipped of summary.skipped) {
      run.emit({ type: 'warning', operation: 'decompress', message: `${skipped.member}: ${skipped.message}` });
    }
  }

  const message = `Extracted ${result.extractedCount} file${result.extractedCount === 1 ? '' : 's'} (${formatBytes(result.bytesWritten)})`;
  run.logger.info(message);
  run.emit({ type: 'completed', operation: 'decompress', message });
  return result;
}

function addWarning(run: Run, warnings: IntegrityWarning[], warning: IntegrityWarning): void {
  warnings.push(warning);
  run.logger.warn(warning.message);
  run.emit({ type: 'warning', operation: 'decompress', message: warning.message });
}

/**
 * Extract a ZIP archive. `success` is false when any member failed; the
 * members that did extract stay on disk.
 */
export async function extractZip(
  archive: string,
  outputRoot: string,
  options: ExtractZipOptions = {}
): Promise<ZipExtractionResult> {
  const run = prepare('extract-zip', options);
  run.emit({ type: 'started', operation: 'extract-zip', source: archive });

  const result = await extractZipArchive(archive, outputRoot, {
    excludePatterns: options.excludePatterns ?? [],
    password: options.password,
    verifyIntegrity: options.verifyIntegrity ?? run.config.verifyIntegrity,
    logger: run.logger,
    signal: options.signal,
    onMember: (name, index, total) => run.emit({ type: 'entry', operation: 'extract-zip', name, index, total }),
  });

  for (const failure of result.failures) {
    run.emit({ type: 'warning', operation: 'extract-zip', message: `${failure.member}: ${failure.message}` });
  }
  const message = result.success
    ? `Extraction completed successfully. ${result.extractedCount} files extracted.`
    : `Extraction completed with ${result.failures.length} errors.`;
  run.emit({ type: 'completed', operation: 'extract-zip', message });
  return result;
}

/**
 * Compress several files, `concurrency` at a time. One job failing does not
 * stop the others; every job gets an outcome, in input order.
 */
export async function compressFiles(
  jobs: readonly CompressJob[],
  options: CompressFilesOptions = {}
): Promise<JobOutcome[]> {
  const config = resolveConfig(options.config);
  const batchSize = Math.max(1, options.concurrency ?? config.parallelJobs);
  const outcomes: JobOutcome[] = [];

  for (let i = 0; i < jobs.length; i += batchSize) {
    const batch = jobs.slice(i, i + batchSize);
    const settled = await Promise.all(
      batch.map(async (job): Promise<JobOutcome> => {
        try {
          const result = await compressFile(job.source, job.destination, options);
          return { status: 'fulfilled', job, result };
        } catch (error) {
          return { status: 'rejected', job, error: error instanceof Error ? error : new Error(describeError(error)) };
        }
      })
    );
    outcomes.push(...settled);
  }
  return outcomes;
}

/**
 * Describe an archive without extracting it.
 */
export async function inspect(path: string, options: { logger?: Logger } = {}): Promise<ArchiveInfo> {
  const logger = options.logger ?? silentLogger;
  let size: number;
  try {
    size = statSync(path).size;
  } catch (error) {
    throw new ExtractionFailure('ARCHIVE_NOT_FOUND', `The file ${path} does not exist.`, { path, cause: error });
  }

  const tag = await readFormatTag(path);
  let format: ArchiveInfo['format'] = tag ?? 'unknown';
  if (!tag) {
    try {
      format = (await detectFormat(path)).format;
    } catch (error) {
      logger.debug(`Cannot sniff ${path}: ${describeError(error)}`);
    }
  }

  let sidecar: SidecarDigest | undefined;
  try {
    sidecar = readSidecar(sidecarPathFor(path));
  } catch (error) {
    logger.warn(`Could not read hash file ${sidecarPathFor(path)}: ${describeError(error)}`);
  }
  return {
    path,
    size,
    format,
    tagged: tag !== null,
    ...(sidecar && { digest: sidecar.digest }),
  };
}
