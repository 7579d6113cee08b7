/**
 * ZIP extraction on top of unzipper.
 *
 * unzipper reads the central directory and inflates/decrypts members but
 * does not check their CRC-32, so every member is streamed through a
 * Crc32Stream and compared against its header value.
 */

import { createWriteStream, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import unzipper from 'unzipper';
import type { CentralDirectory, File as ZipMember } from 'unzipper';
import { removePartial } from './compressor.js';
import { isExcluded } from './container.js';
import { Crc32Stream, formatCrc } from './crc32.js';
import { ArchiveError, ExtractionFailure, describeError, isAbortError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { createPathGuard, type PathGuard } from './path-guard.js';
import type { ExtractionPlan, MemberFailure, MemberSkipped, ZipExtractionResult } from './types.js';

export interface ZipExtractOptions {
  excludePatterns?: string[];
  password?: string;
  /** CRC-test every member before extracting */
  verifyIntegrity?: boolean;
  logger?: Logger;
  /** Called after each member is handled, extracted or not */
  onMember?: (member: string, index: number, total: number) => void;
  signal?: AbortSignal;
}

/** unzipper rejects with these when a member needs a (different) password */
const PASSWORD_ERRORS = new Set(['MISSING_PASSWORD', 'BAD_PASSWORD']);

function isPasswordError(error: unknown): boolean {
  return PASSWORD_ERRORS.has(describeError(error));
}

export async function openArchive(archive: string): Promise<CentralDirectory> {
  if (!existsSync(archive)) {
    throw new ExtractionFailure('ARCHIVE_NOT_FOUND', `The file ${archive} does not exist.`, { path: archive });
  }
  try {
    return await unzipper.Open.file(archive);
  } catch (error) {
    throw new ExtractionFailure('ARCHIVE_UNREADABLE', `Not a readable ZIP archive: ${archive} (${describeError(error)})`, {
      path: archive,
      cause: error,
    });
  }
}

/**
 * Decide what happens to one member: excluded by name, rejected by the
 * guard, or extracted to a target path.
 */
export function planMember(member: string, guard: PathGuard, excludePatterns: readonly string[]): ExtractionPlan {
  if (isExcluded(member, excludePatterns)) {
    return { member, target: null, verdict: 'excluded' };
  }
  const target = guard.resolve(member);
  return target === null ? { member, target, verdict: 'unsafe' } : { member, target, verdict: 'extract' };
}

/**
 * Stream a member's content to `sink` and verify its CRC-32.
 */
async function copyMember(file: ZipMember, sink: Writable, password?: string, signal?: AbortSignal): Promise<void> {
  const check = new Crc32Stream();
  await pipeline(file.stream(password), check, sink, { signal });
  if (check.value !== file.crc32 >>> 0) {
    throw new Error(`CRC-32 mismatch: expected ${formatCrc(file.crc32 >>> 0)}, got ${formatCrc(check.value)}`);
  }
  if (check.bytes !== file.uncompressedSize) {
    throw new Error(`size mismatch: expected ${file.uncompressedSize} bytes, got ${check.bytes}`);
  }
}

function discard(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

/**
 * Read every file member and compare CRC-32s; returns the names that fail.
 * Stops early, without blaming members, when the password is missing or
 * wrong.
 */
export async function testMembers(
  files: readonly ZipMember[],
  options: { password?: string; logger?: Logger; signal?: AbortSignal } = {}
): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const corrupted: string[] = [];

  for (const file of files) {
    if (file.type === 'Directory') continue;
    try {
      await copyMember(file, discard(), options.password, options.signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      if (isPasswordError(error)) {
        logger.warn(`Integrity check failed: ${describeError(error)}`);
        break;
      }
      logger.warn(`Corrupted file detected: ${file.path} (${describeError(error)})`);
      corrupted.push(file.path);
    }
  }
  return corrupted;
}

/**
 * Extract `archive` into `outputRoot`.
 *
 * A missing or unreadable archive throws; a member that fails is recorded
 * in `failures` and its partial output removed, and extraction carries on.
 */
export async function extractZip(
  archive: string,
  outputRoot: string,
  options: ZipExtractOptions = {}
): Promise<ZipExtractionResult> {
  const logger = options.logger ?? silentLogger;
  const patterns = options.excludePatterns ?? [];
  const password = options.password || undefined;

  const directory = await openArchive(archive);
  mkdirSync(outputRoot, { recursive: true });
  const guard = createPathGuard(outputRoot, logger);

  const files = directory.files;
  const result: ZipExtractionResult = {
    success: true,
    extractedCount: 0,
    totalMembers: files.length,
    failures: [],
    skipped: [],
    corrupted: [],
  };

  if (options.verifyIntegrity ?? true) {
    // unzipper adjusts a member's sizes while decrypting it, so the test pass reads its own copy
    const opened = await openArchive(archive);
    result.corrupted = await wrapAbort(testMembers(opened.files, { password, logger, signal: options.signal }), archive);
  }

  const failures: MemberFailure[] = result.failures;
  const skipped: MemberSkipped[] = result.skipped;

  for (const [index, file] of files.entries()) {
    const plan = planMember(file.path, guard, patterns);

    if (plan.verdict === 'excluded') {
      logger.debug(`Excluded ${file.path}`);
    } else if (plan.target === null) {
      skipped.push({ member: file.path, reason: 'unsafe-path', message: 'path escapes the output directory' });
    } else if (file.type === 'Directory') {
      try {
        mkdirSync(plan.target, { recursive: true });
        result.extractedCount++;
      } catch (error) {
        logger.error(`Failed to extract ${file.path}: ${describeError(error)}`);
        failures.push({ member: file.path, message: describeError(error) });
      }
    } else {
      const target = plan.target;
      try {
        mkdirSync(dirname(target), { recursive: true });
        await copyMember(file, createWriteStream(target), password, options.signal);
        result.extractedCount++;
      } catch (error) {
        removePartial(target);
        if (isAbortError(error)) {
          throw new ArchiveError('ABORTED', 'Operation aborted', { path: archive, cause: error });
        }
        logger.error(`Failed to extract ${file.path}: ${describeError(error)}`);
        failures.push({ member: file.path, message: describeError(error) });
      }
    }

    options.onMember?.(file.path, index, files.length);
  }

  result.success = failures.length === 0;
  logger.info(`Extraction completed: ${result.extractedCount}/${result.totalMembers} files`);
  return result;
}

async function wrapAbort<T>(work: Promise<T>, path: string): Promise<T> {
  try {
    return await work;
  } catch (error) {
    if (isAbortError(error)) {
      throw new ArchiveError('ABORTED', 'Operation aborted', { path, cause: error });
    }
    throw error;
  }
}
