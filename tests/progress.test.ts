/**
 * Progress event tests
 */

import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { describe, expect, it } from 'vitest';
import { createLogger } from '../src/core/logger.js';
import { ByteCounter, notify, progressFraction, renderProgressEvent } from '../src/core/progress.js';

describe('renderProgressEvent', () => {
  it('renders each event type', () => {
    expect(renderProgressEvent({ type: 'started', operation: 'compress-file', source: 'a.txt' })).toBe(
      'compress-file: a.txt'
    );
    expect(
      renderProgressEvent({ type: 'started', operation: 'compress-folder', source: 'src', totalFiles: 12 })
    ).toBe('compress-folder: src (12 files)');
    expect(
      renderProgressEvent({ type: 'chunk', operation: 'compress-file', bytes: 10, processedBytes: 250, totalBytes: 1000 })
    ).toBe('  25.0% (250/1000 bytes)');
    expect(renderProgressEvent({ type: 'chunk', operation: 'decompress', bytes: 10, processedBytes: 250 })).toBe(
      '  250 bytes'
    );
    expect(renderProgressEvent({ type: 'entry', operation: 'extract-zip', name: 'x/y.txt', index: 0 })).toBe(
      '  + x/y.txt'
    );
    expect(renderProgressEvent({ type: 'warning', operation: 'decompress', message: 'digest differs' })).toBe(
      '  WARNING: digest differs'
    );
    expect(renderProgressEvent({ type: 'completed', operation: 'decompress', message: 'done' })).toBe('done');
    expect(renderProgressEvent({ type: 'state', operation: 'compress-file', state: 'hashing' })).toBeNull();
  });
});

describe('progressFraction', () => {
  it('is capped at 1 and undefined without a total', () => {
    expect(progressFraction({ type: 'chunk', operation: 'decompress', bytes: 1, processedBytes: 1500, totalBytes: 1000 })).toBe(1);
    expect(progressFraction({ type: 'chunk', operation: 'decompress', bytes: 1, processedBytes: 5 })).toBeUndefined();
    expect(progressFraction({ type: 'completed', operation: 'decompress', message: '' })).toBeUndefined();
  });
});

describe('notify', () => {
  it('logs a failing listener instead of throwing', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'debug', write: (line) => lines.push(line) });

    notify(
      () => {
        throw new Error('boom');
      },
      { type: 'completed', operation: 'decompress', message: 'done' },
      logger
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('progress listener failed: boom')).toBe(true);
  });
});

describe('ByteCounter', () => {
  it('counts bytes and reports running totals', async () => {
    const totals: Array<[number, number]> = [];
    const counter = new ByteCounter((bytes, total) => totals.push([bytes, total]));
    await pipeline(
      Readable.from([Buffer.alloc(3), Buffer.alloc(4)]),
      counter,
      new Writable({
        write(_chunk, _encoding, callback) {
          callback();
        },
      })
    );
    expect(counter.bytes).toBe(7);
    expect(totals).toEqual([
      [3, 3],
      [4, 7],
    ]);
  });
});
