/**
 * Archive format detection
 *
 * Archives written by packrat start with a zstd skippable frame that carries
 * a one-byte format tag. zstd decoders skip such frames, so the file stays a
 * plain .zst to every other tool. Archives without the tag (older ones, or
 * made by `tar | zstd`) are classified by looking at their first decompressed
 * bytes, which is a heuristic: a single file that happens to look like a tar
 * header is taken for a container.
 */

import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';
import zstd from 'zstd-napi';
import type { ArchiveFormat } from './types.js';

/** Last of the 16 skippable-frame magic numbers (0x184D2A50-0x184D2A5F) */
export const FORMAT_TAG_MAGIC = 0x184d2a5e;
export const FORMAT_TAG_LENGTH = 9;
export const SNIFF_LENGTH = 512;
const SNIFF_READ_SIZE = 64 * 1024;

const TAG_BYTES: Record<ArchiveFormat, number> = {
  'single-file': 0x01,
  container: 0x02,
};

const OCTAL_DIGITS = new Set([0x30, 0x31, 0x32, 0x33, 0x34, 0x35, 0x36, 0x37]);
const USTAR = Buffer.from('ustar', 'latin1');

/**
 * Skippable frame: magic (LE u32), payload length (LE u32), payload.
 */
export function encodeFormatTag(format: ArchiveFormat): Buffer {
  const frame = Buffer.alloc(FORMAT_TAG_LENGTH);
  frame.writeUInt32LE(FORMAT_TAG_MAGIC, 0);
  frame.writeUInt32LE(1, 4);
  frame[8] = TAG_BYTES[format];
  return frame;
}

export function decodeFormatTag(head: Uint8Array): ArchiveFormat | null {
  if (head.length < FORMAT_TAG_LENGTH) return null;
  const view = Buffer.from(head.buffer, head.byteOffset, head.byteLength);
  if (view.readUInt32LE(0) !== FORMAT_TAG_MAGIC || view.readUInt32LE(4) !== 1) return null;
  switch (view[8]) {
    case TAG_BYTES['single-file']:
      return 'single-file';
    case TAG_BYTES.container:
      return 'container';
    default:
      return null;
  }
}

/** Field bytes with NUL and space padding removed from both ends. */
function stripField(data: Uint8Array, start: number, end: number): Uint8Array {
  let from = start;
  let to = end;
  while (from < to && (data[from] === 0x00 || data[from] === 0x20)) from++;
  while (to > from && (data[to - 1] === 0x00 || data[to - 1] === 0x20)) to--;
  return data.subarray(from, to);
}

function isOctalField(field: Uint8Array): boolean {
  return field.length > 0 && field.every((b) => OCTAL_DIGITS.has(b));
}

/**
 * Classify the first decompressed bytes of an archive.
 *
 * 1. "ustar" within the first 512 bytes.
 * 2. Mode, uid and gid fields ([100,108), [108,116), [116,124)) all octal.
 * 3. A NUL ending a plausible name inside the first 100 bytes, with a
 *    non-empty mode field.
 */
export function classify(head: Uint8Array): ArchiveFormat {
  const window = head.subarray(0, SNIFF_LENGTH);
  if (Buffer.from(window.buffer, window.byteOffset, window.byteLength).includes(USTAR)) {
    return 'container';
  }
  if (head.length < SNIFF_LENGTH) return 'single-file';

  const mode = stripField(head, 100, 108);
  const uid = stripField(head, 108, 116);
  const gid = stripField(head, 116, 124);
  if (isOctalField(mode) && isOctalField(uid) && isOctalField(gid)) {
    return 'container';
  }

  const nameEnd = head.indexOf(0x00);
  if (nameEnd > 0 && nameEnd < 100 && mode.length > 0) {
    return 'container';
  }
  return 'single-file';
}

/**
 * Decompress just enough of `path` to return its first `length` bytes.
 *
 * This is its own decompression pass: the codec cannot rewind, so the real
 * extraction opens the file again from the start. A codec error after some
 * output (a truncated file, say) still yields that output.
 */
export function readDecompressedHead(path: string, length = SNIFF_LENGTH): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const input = createReadStream(path, { highWaterMark: SNIFF_READ_SIZE });
    const decoder = new zstd.DecompressStream();
    const parts: Buffer[] = [];
    let total = 0;
    let settled = false;

    const finish = (error?: unknown) => {
      if (settled) return;
      settled = true;
      input.destroy();
      decoder.destroy();
      if (error !== undefined && total === 0) {
        reject(error);
      } else {
        resolve(Buffer.concat(parts).subarray(0, length));
      }
    };

    decoder.on('data', (chunk: Buffer) => {
      parts.push(chunk);
      total += chunk.length;
      if (total >= length) finish();
    });
    decoder.on('end', () => finish());
    decoder.on('error', (error) => finish(error));
    input.on('error', (error) => finish(error));
    input.pipe(decoder);
  });
}

/**
 * Read the raw format tag, if the archive has one.
 */
export async function readFormatTag(path: string): Promise<ArchiveFormat | null> {
  const handle = await open(path, 'r');
  try {
    const head = Buffer.alloc(FORMAT_TAG_LENGTH);
    const { bytesRead } = await handle.read(head, 0, FORMAT_TAG_LENGTH, 0);
    return decodeFormatTag(head.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export interface FormatDetection {
  format: ArchiveFormat;
  detectedBy: 'tag' | 'sniff';
}

/**
 * Tag first, content sniffing for untagged archives.
 */
export async function detectFormat(path: string): Promise<FormatDetection> {
  const tagged = await readFormatTag(path);
  if (tagged) return { format: tagged, detectedBy: 'tag' };

  const head = await readDecompressedHead(path, SNIFF_LENGTH);
  return { format: classify(head), detectedBy: 'sniff' };
}
