/**
 * Structured progress events.
 *
 * Listeners are called synchronously after each chunk. A listener that throws
 * must never stall or fail the I/O loop, so `notify` catches and only logs.
 */

import { Transform, type TransformCallback } from 'node:stream';
import type { Logger } from './logger.js';
import type { CompressionResult, JobState, Operation } from './types.js';
import { describeError } from './errors.js';

export type ProgressEvent =
  | { type: 'started'; operation: Operation; source: string; totalBytes?: number; totalFiles?: number }
  | { type: 'state'; operation: Operation; state: JobState }
  | { type: 'chunk'; operation: Operation; bytes: number; processedBytes: number; totalBytes?: number }
  | { type: 'entry'; operation: Operation; name: string; index: number; total?: number }
  | { type: 'warning'; operation: Operation; message: string }
  | { type: 'completed'; operation: Operation; result?: CompressionResult; message: string };

export type ProgressListener = (event: ProgressEvent) => void;

export function notify(listener: ProgressListener | undefined, event: ProgressEvent, logger?: Logger): void {
  if (!listener) return;
  try {
    listener(event);
  } catch (error) {
    logger?.debug(`progress listener failed: ${describeError(error)}`);
  }
}

/**
 * Pass-through stream that counts bytes and reports every chunk.
 */
export class ByteCounter extends Transform {
  bytes = 0;

  constructor(private readonly onChunk?: (bytes: number, total: number) => void) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    this.onChunk?.(chunk.length, this.bytes);
    callback(null, chunk);
  }
}

/**
 * Fraction done in [0, 1], or undefined when the total is unknown.
 */
export function progressFraction(event: ProgressEvent): number | undefined {
  if (event.type !== 'chunk' || !event.totalBytes) return undefined;
  return Math.min(1, event.processedBytes / event.totalBytes);
}

/**
 * Human-readable line for an event, or null for events a text log skips.
 */
export function renderProgressEvent(event: ProgressEvent): string | null {
  switch (event.type) {
    case 'started':
      return event.totalFiles !== undefined
        ? `${event.operation}: ${event.source} (${event.totalFiles} files)`
        : `${event.operation}: ${event.source}`;
    case 'chunk': {
      const fraction = progressFraction(event);
      return fraction === undefined
        ? `  ${event.processedBytes} bytes`
        : `  ${(fraction * 100).toFixed(1)}% (${event.processedBytes}/${event.totalBytes} bytes)`;
    }
    case 'entry':
      return `  + ${event.name}`;
    case 'warning':
      return `  WARNING: ${event.message}`;
    case 'completed':
      return event.message;
    case 'state':
      return null;
  }
}
