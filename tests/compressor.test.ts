/**
 * Compression engine tests
 */

import { Readable, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import {
  assertLevel,
  codecParameters,
  compressStream,
  compressionRatio,
  decompressStream,
  formatBytes,
  isValidLevel,
  resultToJSON,
} from '../src/core/compressor.js';
import { ArchiveError, ExtractionFailure } from '../src/core/errors.js';
import { FORMAT_TAG_LENGTH, decodeFormatTag } from '../src/core/sniffer.js';

const SAMPLE_TEXT = `
The quick brown fox jumps over the lazy dog.
Pack my box with five dozen liquor jugs.
How vexingly quick daft zebras jump!
`.repeat(200);

function collector(): { sink: Writable; data: () => Buffer } {
  const parts: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      parts.push(chunk);
      callback();
    },
  });
  return { sink, data: () => Buffer.concat(parts) };
}

async function compressBuffer(input: Buffer, level: number, tagged = false): Promise<Buffer> {
  const out = collector();
  await compressStream(Readable.from([input]), out.sink, {
    level,
    ...(tagged && { formatTag: 'single-file' as const }),
  });
  return out.data();
}

describe('levels', () => {
  it('accepts integers from 1 to 22', () => {
    expect(isValidLevel(1)).toBe(true);
    expect(isValidLevel(22)).toBe(true);
    expect(isValidLevel(0)).toBe(false);
    expect(isValidLevel(23)).toBe(false);
    expect(isValidLevel(2.5)).toBe(false);
  });

  it('rejects a bad level with INVALID_LEVEL', () => {
    expect(() => assertLevel(0)).toThrow(ArchiveError);
    try {
      assertLevel(30);
    } catch (error) {
      expect(error).toBeInstanceOf(ArchiveError);
      expect(error instanceof ArchiveError && error.code).toBe('INVALID_LEVEL');
    }
  });

  it('rejects before touching the streams', async () => {
    const out = collector();
    await expect(compressStream(Readable.from([Buffer.from('x')]), out.sink, { level: 0 })).rejects.toMatchObject({
      code: 'INVALID_LEVEL',
    });
    expect(out.data().length).toBe(0);
  });
});

describe('codecParameters', () => {
  it('enables the checksum and leaves workers off by default', () => {
    expect(codecParameters(3)).toEqual({ compressionLevel: 3, checksumFlag: true });
  });

  it('sets workers when more than one thread is asked for', () => {
    expect(codecParameters(3, 4)).toEqual({ compressionLevel: 3, checksumFlag: true, nbWorkers: 4 });
  });

  it('sizes the window from the input at ultra levels', () => {
    expect(codecParameters(20, 1, 1000).windowLog).toBe(10);
    expect(codecParameters(22, 1, 5_000_000).windowLog).toBe(23);
    expect(codecParameters(22, 1, 2 ** 40).windowLog).toBe(27);
    expect(codecParameters(22).windowLog).toBeUndefined();
    expect(codecParameters(19, 1, 1000).windowLog).toBeUndefined();
  });
});

describe('compressStream / decompressStream', () => {
  it('round-trips content', async () => {
    const input = Buffer.from(SAMPLE_TEXT);
    const compressed = await compressBuffer(input, 3);
    expect(compressed.length).toBeLessThan(input.length);

    const out = collector();
    const written = await decompressStream(Readable.from([compressed]), out.sink);
    expect(written).toBe(input.length);
    expect(out.data().equals(input)).toBe(true);
  });

  it('round-trips empty input', async () => {
    const compressed = await compressBuffer(Buffer.alloc(0), 3);
    const out = collector();
    expect(await decompressStream(Readable.from([compressed]), out.sink)).toBe(0);
    expect(out.data().length).toBe(0);
  });

  it('returns the compressed byte count including the format tag', async () => {
    const out = collector();
    const count = await compressStream(Readable.from([Buffer.from(SAMPLE_TEXT)]), out.sink, {
      level: 3,
      formatTag: 'container',
    });
    expect(count).toBe(out.data().length);
    expect(decodeFormatTag(out.data().subarray(0, FORMAT_TAG_LENGTH))).toBe('container');
  });

  it('decodes a tagged stream to the original bytes', async () => {
    const input = Buffer.from(SAMPLE_TEXT);
    const compressed = await compressBuffer(input, 5, true);
    const out = collector();
    await decompressStream(Readable.from([compressed]), out.sink);
    expect(out.data().equals(input)).toBe(true);
  });

  it('reports progress per chunk', async () => {
    const chunks = [Buffer.from('a'.repeat(1000)), Buffer.from('b'.repeat(1000)), Buffer.from('c'.repeat(500))];
    const totals: number[] = [];
    const out = collector();
    await compressStream(Readable.from(chunks), out.sink, {
      level: 1,
      onInput: (_bytes, total) => totals.push(total),
    });
    expect(totals).toEqual([1000, 2000, 2500]);
  });

  it('uses the ultra levels without error', async () => {
    const input = Buffer.from(SAMPLE_TEXT);
    const out = collector();
    await compressStream(Readable.from([input]), out.sink, { level: 22, sizeHint: input.length });
    const restored = collector();
    await decompressStream(Readable.from([out.data()]), restored.sink);
    expect(restored.data().equals(input)).toBe(true);
  });

  it('fails with CORRUPT_STREAM on data that is not zstd', async () => {
    const out = collector();
    const attempt = decompressStream(Readable.from([Buffer.from('definitely not a zstd frame')]), out.sink);
    await expect(attempt).rejects.toBeInstanceOf(ExtractionFailure);
    await expect(attempt).rejects.toMatchObject({ code: 'CORRUPT_STREAM' });
  });
});

describe('formatBytes', () => {
  it('should format bytes correctly', () => {
    expect(formatBytes(0)).toBe('0B');
    expect(formatBytes(100)).toBe('100B');
    expect(formatBytes(1024)).toBe('1.0KB');
    expect(formatBytes(1536)).toBe('1.5KB');
    expect(formatBytes(1048576)).toBe('1.00MB');
    expect(formatBytes(1572864)).toBe('1.50MB');
    expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('3.00GB');
  });
});

describe('compressionRatio', () => {
  it('divides original by compressed size', () => {
    expect(compressionRatio(1000, 250)).toBe(4);
  });

  it('is 0 when nothing was written', () => {
    expect(compressionRatio(1000, 0)).toBe(0);
  });
});

describe('resultToJSON', () => {
  it('uses snake_case keys and seconds', () => {
    expect(
      resultToJSON({ originalSize: 4000, compressedSize: 1000, durationMs: 1500, filesProcessed: 2, compressionRatio: 4 })
    ).toEqual({
      original_size: 4000,
      compressed_size: 1000,
      duration: 1.5,
      files_processed: 2,
      compression_ratio: 4,
    });
  });
});
