/**
 * Content digests and `.sha256` sidecar files.
 *
 * Sidecar layout (sha256sum-compatible): "<hex-digest>  <original-filename>\n".
 * Verification never throws on a mismatch or an unreadable sidecar; it
 * reports them.
 */

import { createReadStream, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { createHash } from 'node:crypto';
import type { Readable } from 'node:stream';
import { DEFAULT_CHUNK_SIZE } from './config.js';
import { describeError } from './errors.js';
import type { DigestAlgorithm, IntegrityStatus, IntegrityWarning, SidecarDigest } from './types.js';

export const SIDECAR_SUFFIX = '.sha256';

export function sidecarPathFor(archivePath: string): string {
  return archivePath + SIDECAR_SUFFIX;
}

/**
 * Digest a byte stream incrementally; memory use does not depend on input size.
 */
export async function digestStream(
  stream: Readable,
  algorithm: DigestAlgorithm = 'sha256'
): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export async function digestFile(
  path: string,
  options: { algorithm?: DigestAlgorithm; chunkSize?: number } = {}
): Promise<string> {
  const stream = createReadStream(path, { highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE });
  return digestStream(stream, options.algorithm ?? 'sha256');
}

export function formatSidecar(digest: string, fileName: string): string {
  return `${digest}  ${fileName}\n`;
}

export function writeSidecar(path: string, digest: string, fileName: string): void {
  writeFileSync(path, formatSidecar(digest, fileName));
}

/**
 * Parse sidecar text. Accepts the binary-mode marker sha256sum writes
 * ("<hex> *<name>"). Empty content yields undefined.
 */
export function parseSidecar(text: string): SidecarDigest | undefined {
  const line = text.split('\n').find((l) => l.trim().length > 0);
  if (!line) return undefined;

  const match = /^(\S+)(?:\s+\*?(.*))?$/.exec(line.trim());
  if (!match?.[1]) return undefined;
  return { digest: match[1].toLowerCase(), fileName: match[2] ?? '' };
}

/**
 * Read a sidecar; a missing file yields undefined. A sidecar that exists
 * but cannot be read (a directory, no permission) throws.
 */
export function readSidecar(path: string): SidecarDigest | undefined {
  if (!existsSync(path)) return undefined;
  return parseSidecar(readFileSync(path, 'utf-8'));
}

export interface VerifyOutcome {
  status: Exclude<IntegrityStatus, 'skipped'>;
  warning?: IntegrityWarning;
}

/**
 * Compare `file` against the digest stored at `sidecarPath`.
 */
export async function verifySidecar(
  file: string,
  sidecarPath: string,
  options: { chunkSize?: number } = {}
): Promise<VerifyOutcome> {
  let expected: SidecarDigest | undefined;
  try {
    expected = readSidecar(sidecarPath);
  } catch (error) {
    return {
      status: 'unreadable',
      warning: {
        kind: 'integrity',
        file,
        message: `Could not read hash file ${sidecarPath}: ${describeError(error)}`,
      },
    };
  }
  if (!expected) return { status: 'missing' };

  const actual = await digestFile(file, options);
  if (actual === expected.digest) return { status: 'verified' };

  return {
    status: 'mismatch',
    warning: {
      kind: 'integrity',
      file,
      expected: expected.digest,
      actual,
      message: `File integrity check failed for ${file}: expected ${expected.digest}, got ${actual}`,
    },
  };
}
