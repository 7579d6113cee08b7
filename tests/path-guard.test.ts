/**
 * Member path confinement tests
 */

import { join, resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import { createLogger } from '../src/core/logger.js';
import { createPathGuard, resolveMemberPath } from '../src/core/path-guard.js';

const ROOT = resolve('/tmp/packrat-out');

describe('resolveMemberPath', () => {
  it('resolves ordinary members under the root', () => {
    expect(resolveMemberPath(ROOT, 'a/b.txt')).toEqual({ ok: true, path: join(ROOT, 'a', 'b.txt') });
    expect(resolveMemberPath(ROOT, 'a/../b.txt')).toEqual({ ok: true, path: join(ROOT, 'b.txt') });
  });

  it('allows the root itself', () => {
    expect(resolveMemberPath(ROOT, './')).toEqual({ ok: true, path: ROOT });
  });

  it('rejects parent traversal', () => {
    const outside = { ok: false, reason: 'resolves outside the output directory' };
    expect(resolveMemberPath(ROOT, '../evil.txt')).toEqual(outside);
    expect(resolveMemberPath(ROOT, 'a/../../evil.txt')).toEqual(outside);
    expect(resolveMemberPath(ROOT, '..')).toEqual(outside);
    expect(resolveMemberPath(ROOT, '..\\evil.txt')).toEqual(outside);
  });

  it('rejects absolute paths', () => {
    const absolute = { ok: false, reason: 'absolute path' };
    expect(resolveMemberPath(ROOT, '/etc/passwd')).toEqual(absolute);
    expect(resolveMemberPath(ROOT, 'C:\\Windows\\evil.dll')).toEqual(absolute);
    expect(resolveMemberPath(ROOT, 'c:relative.txt')).toEqual(absolute);
    expect(resolveMemberPath(ROOT, '\\\\server\\share\\x')).toEqual(absolute);
  });

  it('rejects empty names and NUL bytes', () => {
    expect(resolveMemberPath(ROOT, '')).toEqual({ ok: false, reason: 'empty member name' });
    expect(resolveMemberPath(ROOT, 'a\0b')).toEqual({ ok: false, reason: 'NUL byte in member name' });
  });

  it('does not mistake a sibling with a shared prefix for the root', () => {
    expect(resolveMemberPath(ROOT, '../packrat-out-other/x')).toEqual({
      ok: false,
      reason: 'resolves outside the output directory',
    });
  });
});

describe('createPathGuard', () => {
  it('counts and logs rejections', () => {
    const lines: string[] = [];
    const guard = createPathGuard(ROOT, createLogger({ level: 'warn', write: (line) => lines.push(line) }));

    expect(guard.root).toBe(ROOT);
    expect(guard.resolve('ok.txt')).toBe(join(ROOT, 'ok.txt'));
    expect(guard.resolve('../nope.txt')).toBeNull();
    expect(guard.resolve('/abs')).toBeNull();
    expect(guard.rejected).toBe(2);

    expect(lines).toHaveLength(2);
    expect(lines[0]?.endsWith('Skipping unsafe path "../nope.txt": resolves outside the output directory')).toBe(true);
    expect(lines[1]?.endsWith('Skipping unsafe path "/abs": absolute path')).toBe(true);
  });
});
