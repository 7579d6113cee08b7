/**
 * packrat - streaming zstd archives for files, folders and ZIPs
 *
 * @example
 * ```ts
 * import { compressFile, compressFolder, decompress, extractZip } from 'packrat';
 *
 * // Single file, with a .sha256 sidecar
 * const stats = await compressFile('data.csv', 'data.csv.zst', { level: 9 });
 * console.log(`Ratio: ${stats.compressionRatio.toFixed(2)}:1`);
 *
 * // Folder into one stream
 * await compressFolder('project', 'project.tar.zst', { excludePatterns: ['node_modules'] });
 *
 * // Either kind back to disk
 * const result = await decompress('project.tar.zst', 'restore');
 *
 * // ZIP, optionally encrypted
 * const zip = await extractZip('bundle.zip', 'out', { password: 'secret' });
 * if (!zip.success) console.warn(zip.failures);
 * ```
 *
 * @packageDocumentation
 */

// Operations
export {
  compressFile,
  compressFolder,
  decompress,
  extractZip,
  compressFiles,
  inspect,
} from './core/operations.js';

// Engine
export {
  compressStream,
  decompressStream,
  compressFileTo,
  decompressFileTo,
  formatBytes,
  compressionRatio,
  resultToJSON,
  isValidLevel,
} from './core/compressor.js';

// Building blocks
export { walkFolder, createContainerStream, createUnpackSink, isExcluded } from './core/container.js';
export { detectFormat, classify, encodeFormatTag, decodeFormatTag } from './core/sniffer.js';
export {
  digestFile,
  digestStream,
  readSidecar,
  writeSidecar,
  verifySidecar,
  sidecarPathFor,
} from './core/hash.js';
export { resolveMemberPath, createPathGuard } from './core/path-guard.js';
export { crc32, Crc32 } from './core/crc32.js';

// Config
export {
  loadConfig,
  resolveConfig,
  parseConfig,
  writeUserConfig,
  defaultConfigPath,
  DEFAULT_CONFIG,
  MIN_LEVEL,
  MAX_LEVEL,
} from './core/config.js';
export type { EngineConfig } from './core/config.js';

// Errors
export {
  ArchiveError,
  CompressionFailure,
  ExtractionFailure,
  ConfigError,
  summarizeFailures,
} from './core/errors.js';
export type { ArchiveErrorCode } from './core/errors.js';

// Logging and progress
export { createLogger, silentLogger } from './core/logger.js';
export type { Logger, LogLevel } from './core/logger.js';
export { renderProgressEvent, progressFraction } from './core/progress.js';
export type { ProgressEvent, ProgressListener } from './core/progress.js';

// Types
export type {
  ArchiveFormat,
  ArchiveInfo,
  CompressFileOptions,
  CompressFilesOptions,
  CompressFolderOptions,
  CompressJob,
  CompressionResult,
  ContainerEntry,
  DecompressOptions,
  DecompressResult,
  EngineOptions,
  ExtractZipOptions,
  FolderCompressionResult,
  IntegrityStatus,
  IntegrityWarning,
  JobOutcome,
  JobState,
  MemberFailure,
  MemberSkipped,
  ZipExtractionResult,
} from './core/types.js';
