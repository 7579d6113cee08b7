/**
 * Folder container: tar records inside the zstd stream.
 *
 * Packing writes the records itself (ustar headers from node-tar, pax
 * headers where a path or size does not fit) so that one unreadable file
 * costs one entry instead of the whole archive. Unpacking goes through
 * node-tar's parser with every member path checked by the PathGuard.
 */

import { createWriteStream, lstatSync, mkdirSync, readdirSync, statSync, utimesSync, type Stats, type WriteStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import { basename, dirname, join, relative, resolve, sep } from 'node:path';
import { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import * as tar from 'tar';
import { DEFAULT_CHUNK_SIZE } from './config.js';
import { removePartial } from './compressor.js';
import { CompressionFailure, ExtractionFailure, describeError, isNotFound } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { createPathGuard } from './path-guard.js';
import type { ContainerEntry, MemberSkipped } from './types.js';

const BLOCK = 512;

export interface FolderWalk {
  /** Absolute path of the walked folder */
  root: string;
  entries: ContainerEntry[];
  skipped: MemberSkipped[];
  /** Regular files among `entries` */
  fileCount: number;
  /** Sum of the file sizes seen by the walk */
  totalBytes: number;
}

/**
 * A path is excluded when it contains any of the patterns as a substring.
 */
export function isExcluded(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => pattern.length > 0 && path.includes(pattern));
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * Depth-first walk of `folder`, children in name order. Entry paths start
 * with the folder's own name. Exclusions apply to files, matched against
 * the path relative to `folder`. Symbolic links to files are packed as the
 * files they point at; links to directories are skipped.
 */
export function walkFolder(
  folder: string,
  options: { excludePatterns?: string[]; logger?: Logger } = {}
): FolderWalk {
  const root = resolve(folder);
  const logger = options.logger ?? silentLogger;
  const patterns = options.excludePatterns ?? [];

  let stat: Stats;
  try {
    stat = statSync(root);
  } catch (error) {
    if (isNotFound(error)) {
      throw new CompressionFailure('SOURCE_NOT_FOUND', `Folder not found: ${folder}`, { path: folder, cause: error });
    }
    throw new CompressionFailure('IO_ERROR', `Cannot read ${folder}: ${describeError(error)}`, { path: folder, cause: error });
  }
  if (!stat.isDirectory()) {
    throw new CompressionFailure('NOT_A_DIRECTORY', `Not a directory: ${folder}`, { path: folder });
  }

  const rootName = basename(root);
  const walk: FolderWalk = {
    root,
    entries: [{ kind: 'directory', path: rootName + '/', size: 0, mode: stat.mode, mtime: stat.mtime, source: root }],
    skipped: [],
    fileCount: 0,
    totalBytes: 0,
  };

  const visit = (dir: string) => {
    let names: string[];
    try {
      names = readdirSync(dir).sort();
    } catch (error) {
      const member = `${rootName}/${toPosix(relative(root, dir))}`;
      logger.warn(`Cannot list ${dir}: ${describeError(error)}`);
      walk.skipped.push({ member, reason: 'io-error', message: describeError(error) });
      return;
    }

    for (const name of names) {
      const full = join(dir, name);
      const rel = toPosix(relative(root, full));
      const member = `${rootName}/${rel}`;

      let info: Stats;
      let linked = false;
      try {
        info = lstatSync(full);
        // Linked files are packed by content; linked directories are never descended into
        if (info.isSymbolicLink()) {
          linked = true;
          info = statSync(full);
        }
      } catch (error) {
        logger.warn(`Skipping ${full}: ${describeError(error)}`);
        walk.skipped.push({ member, reason: 'io-error', message: describeError(error) });
        continue;
      }

      if (linked && info.isDirectory()) {
        logger.warn(`Skipping ${full}: symbolic link to a directory`);
        walk.skipped.push({ member, reason: 'unsupported-type', message: 'symbolic link to a directory' });
      } else if (info.isDirectory()) {
        walk.entries.push({ kind: 'directory', path: member + '/', size: 0, mode: info.mode, mtime: info.mtime, source: full });
        visit(full);
      } else if (info.isFile()) {
        if (isExcluded(rel, patterns)) {
          logger.debug(`Excluded ${rel}`);
          continue;
        }
        walk.entries.push({ kind: 'file', path: member, size: info.size, mode: info.mode, mtime: info.mtime, source: full });
        walk.fileCount++;
        walk.totalBytes += info.size;
      } else {
        walk.skipped.push({ member, reason: 'unsupported-type', message: 'not a regular file or directory' });
      }
    }
  };

  visit(root);
  return walk;
}

/**
 * Header record(s) for an entry: a pax extended header first when the
 * ustar fields cannot hold the path or size.
 */
export function encodeHeader(entry: ContainerEntry): Buffer[] {
  const data: tar.HeaderData = {
    path: entry.path,
    mode: (entry.mode ?? (entry.kind === 'directory' ? 0o755 : 0o644)) & 0o7777,
    uid: 0,
    gid: 0,
    size: entry.kind === 'file' ? entry.size : 0,
    mtime: entry.mtime ?? new Date(),
    type: entry.kind === 'file' ? 'File' : 'Directory',
  };
  const header = new tar.Header(data);
  const block = Buffer.alloc(BLOCK);
  header.encode(block, 0);
  if (!header.needPax) return [block];
  return [new tar.Pax(data).encode(), block];
}

/**
 * Size of the tar stream for `entries`, not counting pax headers.
 */
export function estimateContainerSize(entries: readonly ContainerEntry[]): number {
  let total = BLOCK * 2;
  for (const entry of entries) {
    total += BLOCK;
    if (entry.kind === 'file') total += Math.ceil(entry.size / BLOCK) * BLOCK;
  }
  return total;
}

function padding(size: number): Buffer | null {
  const rest = size % BLOCK;
  return rest === 0 ? null : Buffer.alloc(BLOCK - rest);
}

export interface PackOptions {
  chunkSize?: number;
  logger?: Logger;
  /** Called once a file's content has been packed */
  onEntry?: (entry: ContainerEntry, index: number) => void;
}

export interface PackSummary {
  /** Files whose content was packed in full */
  processed: number;
  /** Bytes of file content packed */
  bytes: number;
  /** Files left out, or packed with zero-filled content */
  skipped: MemberSkipped[];
}

/**
 * Yield the tar byte stream for `entries`, ending with two zero blocks.
 *
 * A file that cannot be opened is left out. A file that fails (or shrinks)
 * part way keeps its header and is zero-filled to the declared size, so the
 * records after it stay aligned.
 */
export async function* packEntries(
  entries: Iterable<ContainerEntry>,
  summary: PackSummary,
  options: PackOptions = {}
): AsyncGenerator<Buffer> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const logger = options.logger ?? silentLogger;
  let index = 0;

  for (const entry of entries) {
    if (entry.kind === 'directory') {
      yield* encodeHeader(entry);
      continue;
    }

    let handle: FileHandle;
    try {
      handle = await open(entry.source, 'r');
    } catch (error) {
      logger.warn(`Skipping ${entry.source}: ${describeError(error)}`);
      summary.skipped.push({ member: entry.path, reason: 'io-error', message: describeError(error) });
      continue;
    }

    try {
      yield* encodeHeader(entry);
      let remaining = entry.size;
      let failure: unknown;

      while (remaining > 0) {
        const buffer = Buffer.alloc(Math.min(chunkSize, remaining));
        let bytesRead = 0;
        try {
          ({ bytesRead } = await handle.read(buffer, 0, buffer.length, null));
        } catch (error) {
          failure = error;
          break;
        }
        if (bytesRead === 0) {
          failure = new Error(`file shrank by ${remaining} bytes while packing`);
          break;
        }
        remaining -= bytesRead;
        summary.bytes += bytesRead;
        yield buffer.subarray(0, bytesRead);
      }

      if (failure !== undefined) {
        logger.warn(`Read failed for ${entry.source}, zero-filling: ${describeError(failure)}`);
        summary.skipped.push({ member: entry.path, reason: 'io-error', message: describeError(failure) });
        while (remaining > 0) {
          const fill = Math.min(chunkSize, remaining);
          remaining -= fill;
          yield Buffer.alloc(fill);
        }
      } else {
        summary.processed++;
        options.onEntry?.(entry, index++);
      }

      const pad = padding(entry.size);
      if (pad) yield pad;
    } finally {
      await handle.close();
    }
  }

  yield Buffer.alloc(BLOCK * 2);
}

/**
 * Readable tar stream over `entries`; `summary` fills in as it is consumed.
 */
export function createContainerStream(
  entries: Iterable<ContainerEntry>,
  options: PackOptions = {}
): { stream: Readable; summary: PackSummary } {
  const summary: PackSummary = { processed: 0, bytes: 0, skipped: [] };
  const stream = Readable.from(packEntries(entries, summary, options), { objectMode: false });
  return { stream, summary };
}

export interface UnpackOptions {
  logger?: Logger;
  /** Called after each file is written */
  onEntry?: (name: string, index: number) => void;
}

export interface UnpackSummary {
  extracted: number;
  bytes: number;
  skipped: MemberSkipped[];
  /** Files created, in order */
  written: string[];
}

const FILE_TYPES = new Set(['File', 'OldFile', 'ContiguousFile']);

/**
 * Writable that parses a tar stream and writes its members under
 * `outputRoot`. Member paths are resolved through a PathGuard; links,
 * devices and other special entries are skipped. The stream fails with
 * ExtractionFailure('ARCHIVE_UNREADABLE') when the input is not a tar
 * archive or ends mid-record.
 */
export function createUnpackSink(
  outputRoot: string,
  options: UnpackOptions = {}
): { sink: Writable; summary: UnpackSummary } {
  const logger = options.logger ?? silentLogger;
  const guard = createPathGuard(outputRoot, logger);
  const summary: UnpackSummary = { extracted: 0, bytes: 0, skipped: [], written: [] };
  const parser = new tar.Parser({ strict: false });
  const pending: Promise<void>[] = [];
  let fatal: ExtractionFailure | undefined;

  const parsed = new Promise<void>((resolveParsed, rejectParsed) => {
    parser.on('end', () => resolveParsed());
    parser.on('error', (error: unknown) => rejectParsed(error));
  });
  // The sink's final() awaits this; an early rejection must not go unhandled meanwhile.
  parsed.catch((error: unknown) => logger.debug(`tar parser failed: ${describeError(error)}`));

  parser.on('warn', (code: string, message: string | Error) => {
    if (code === 'TAR_BAD_ARCHIVE') {
      fatal ??= new ExtractionFailure('ARCHIVE_UNREADABLE', `Not a readable container: ${describeError(message)}`);
    } else {
      logger.warn(`${code}: ${describeError(message)}`);
    }
  });

  const skip = (entry: tar.ReadEntry, skipped: MemberSkipped) => {
    summary.skipped.push(skipped);
    entry.resume();
  };

  const writeEntry = async (entry: tar.ReadEntry): Promise<void> => {
    const member = entry.path;
    const isFile = FILE_TYPES.has(entry.type);
    if (!isFile && entry.type !== 'Directory') {
      logger.warn(`Skipping ${member}: unsupported entry type ${entry.type}`);
      skip(entry, { member, reason: 'unsupported-type', message: `entry type ${entry.type}` });
      return;
    }

    const target = guard.resolve(member);
    if (target === null) {
      skip(entry, { member, reason: 'unsafe-path', message: 'path escapes the output directory' });
      return;
    }

    if (!isFile) {
      try {
        mkdirSync(target, { recursive: true });
      } catch (error) {
        logger.warn(`Cannot create ${target}: ${describeError(error)}`);
        summary.skipped.push({ member, reason: 'io-error', message: describeError(error) });
      }
      entry.resume();
      return;
    }

    let out: WriteStream | undefined;
    try {
      mkdirSync(dirname(target), { recursive: true });
      out = createWriteStream(target, { mode: (entry.mode ?? 0o644) & 0o777 });
      summary.written.push(target);
      entry.pipe(out);
      await finished(out);
      if (entry.mtime) utimesSync(target, entry.mtime, entry.mtime);
      summary.extracted++;
      summary.bytes += entry.size;
      options.onEntry?.(member, summary.extracted - 1);
    } catch (error) {
      logger.warn(`Cannot write ${target}: ${describeError(error)}`);
      if (out) entry.unpipe(out);
      removePartial(target);
      skip(entry, { member, reason: 'io-error', message: describeError(error) });
    }
  };

  parser.on('entry', (entry: tar.ReadEntry) => {
    pending.push(
      writeEntry(entry).catch((error: unknown) => {
        logger.warn(`Skipping ${entry.path}: ${describeError(error)}`);
        skip(entry, { member: entry.path, reason: 'io-error', message: describeError(error) });
      })
    );
  });

  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      if (parser.write(chunk)) {
        callback();
      } else {
        parser.once('drain', () => callback());
      }
    },
    final(callback) {
      parser.end();
      parsed
        .then(() => Promise.all(pending))
        .then(() => callback(fatal ?? null))
        .catch((error: unknown) => callback(error instanceof Error ? error : new Error(describeError(error))));
    },
  });

  return { sink, summary };
}
