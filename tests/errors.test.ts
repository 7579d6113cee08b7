/**
 * Error type tests
 */

import { describe, expect, it } from 'vitest';
import {
  ArchiveError,
  CompressionFailure,
  ConfigError,
  ExtractionFailure,
  describeError,
  isAbortError,
  isNotFound,
  summarizeFailures,
  throwIfAborted,
} from '../src/core/errors.js';

describe('error classes', () => {
  it('share the ArchiveError base and keep their code', () => {
    const compress = new CompressionFailure('CODEC_ERROR', 'codec failed', { path: '/tmp/a' });
    const extract = new ExtractionFailure('CORRUPT_STREAM', 'bad frame');
    const config = new ConfigError('bad config');

    expect(compress).toBeInstanceOf(ArchiveError);
    expect(extract).toBeInstanceOf(ArchiveError);
    expect(config.code).toBe('INVALID_CONFIG');
    expect(compress.name).toBe('CompressionFailure');
    expect(compress.toJSON()).toEqual({
      name: 'CompressionFailure',
      code: 'CODEC_ERROR',
      message: 'codec failed',
      path: '/tmp/a',
    });
    expect(extract.toJSON()).toEqual({ name: 'ExtractionFailure', code: 'CORRUPT_STREAM', message: 'bad frame' });
  });

  it('keeps the cause', () => {
    const cause = new Error('underlying');
    expect(new ArchiveError('IO_ERROR', 'wrapped', { cause }).cause).toBe(cause);
  });
});

describe('helpers', () => {
  it('describes anything thrown', () => {
    expect(describeError(new Error('oops'))).toBe('oops');
    expect(describeError('BAD_PASSWORD')).toBe('BAD_PASSWORD');
    expect(describeError(42)).toBe('42');
  });

  it('recognises ENOENT and abort errors', () => {
    expect(isNotFound(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
    expect(isNotFound(new Error('other'))).toBe(false);

    const abort = new Error('stopped');
    abort.name = 'AbortError';
    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new Error('x'))).toBe(false);
  });

  it('throws ABORTED once the signal fires', () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfAborted(controller.signal, 'a.txt')).toThrow(
      expect.objectContaining({ code: 'ABORTED', path: 'a.txt' })
    );
  });

  it('caps failure summaries', () => {
    const failures = Array.from({ length: 7 }, (_, i) => ({ member: `f${i}.txt`, message: 'CRC-32 mismatch' }));
    const lines = summarizeFailures(failures);
    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('  - f0.txt: CRC-32 mismatch');
    expect(lines[5]).toBe('  ... and 2 more');
    expect(summarizeFailures(failures.slice(0, 2))).toEqual(['  - f0.txt: CRC-32 mismatch', '  - f1.txt: CRC-32 mismatch']);
  });
});
