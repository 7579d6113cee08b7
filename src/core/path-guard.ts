/**
 * Confines archive member paths to an output root.
 */

import { isAbsolute, relative, resolve, sep, win32 } from 'node:path';
import type { Logger } from './logger.js';

export type GuardResult =
  | { ok: true; path: string }
  | { ok: false; reason: string };

/**
 * Resolve `member` under `root`.
 *
 * Rejects absolute paths (POSIX or Windows, including drive letters and UNC
 * names), NUL bytes, and anything that resolves outside the root. The root
 * itself is allowed, so a "./" directory member is harmless.
 */
export function resolveMemberPath(root: string, member: string): GuardResult {
  if (member.length === 0) {
    return { ok: false, reason: 'empty member name' };
  }
  if (member.includes('\0')) {
    return { ok: false, reason: 'NUL byte in member name' };
  }

  const normalized = member.replace(/\\/g, '/');
  if (isAbsolute(normalized) || win32.isAbsolute(member) || /^[A-Za-z]:/.test(normalized)) {
    return { ok: false, reason: 'absolute path' };
  }

  const base = resolve(root);
  const target = resolve(base, normalized);
  const rel = relative(base, target);

  if (rel === '') return { ok: true, path: target };
  if (rel === '..' || rel.startsWith('..' + sep) || isAbsolute(rel)) {
    return { ok: false, reason: 'resolves outside the output directory' };
  }
  return { ok: true, path: target };
}

export interface PathGuard {
  readonly root: string;
  /** Safe target path, or null when the member was rejected (and logged). */
  resolve(member: string): string | null;
  readonly rejected: number;
}

export function createPathGuard(root: string, logger?: Logger): PathGuard {
  let rejected = 0;
  const base = resolve(root);

  return {
    root: base,
    resolve(member: string): string | null {
      const result = resolveMemberPath(base, member);
      if (result.ok) return result.path;
      rejected++;
      logger?.warn(`Skipping unsafe path ${JSON.stringify(member)}: ${result.reason}`);
      return null;
    },
    get rejected() {
      return rejected;
    },
  };
}
