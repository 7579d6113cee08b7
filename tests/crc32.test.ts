/**
 * CRC-32 tests
 */

import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { describe, expect, it } from 'vitest';
import { Crc32, Crc32Stream, crc32, formatCrc } from '../src/core/crc32.js';

describe('crc32', () => {
  it('matches the standard check value', () => {
    expect(crc32(Buffer.from('123456789'))).toBe(0xcbf43926);
  });

  it('is 0 for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('gives the same value when fed in pieces', () => {
    const whole = crc32(Buffer.from('The quick brown fox jumps over the lazy dog'));
    const parts = new Crc32().update(Buffer.from('The quick brown ')).update(Buffer.from('fox jumps over the lazy dog'));
    expect(parts.digest()).toBe(whole);
    expect(whole).toBe(0x414fa339);
  });
});

describe('Crc32Stream', () => {
  it('passes data through and checksums it', async () => {
    const check = new Crc32Stream();
    const seen: Buffer[] = [];
    await pipeline(
      Readable.from([Buffer.from('1234'), Buffer.from('56789')]),
      check,
      new Writable({
        write(chunk: Buffer, _encoding, callback) {
          seen.push(chunk);
          callback();
        },
      })
    );
    expect(Buffer.concat(seen).toString()).toBe('123456789');
    expect(check.bytes).toBe(9);
    expect(check.value).toBe(0xcbf43926);
  });
});

describe('formatCrc', () => {
  it('pads to eight hex digits', () => {
    expect(formatCrc(0xcbf43926)).toBe('cbf43926');
    expect(formatCrc(1)).toBe('00000001');
  });
});
