/**
 * CRC-32 (IEEE 0xEDB88320), as stored in ZIP headers.
 */

import { Transform, type TransformCallback } from 'node:stream';

const TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
})();

export class Crc32 {
  private value = 0xffffffff;

  update(chunk: Uint8Array): this {
    let crc = this.value;
    for (const byte of chunk) {
      crc = TABLE[(crc ^ byte) & 0xff]! ^ (crc >>> 8);
    }
    this.value = crc >>> 0;
    return this;
  }

  digest(): number {
    return (this.value ^ 0xffffffff) >>> 0;
  }
}

export function crc32(data: Uint8Array): number {
  return new Crc32().update(data).digest();
}

/**
 * Pass-through that checksums what flows through it.
 */
export class Crc32Stream extends Transform {
  private readonly crc = new Crc32();
  bytes = 0;

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.crc.update(chunk);
    this.bytes += chunk.length;
    callback(null, chunk);
  }

  get value(): number {
    return this.crc.digest();
  }
}

export function formatCrc(value: number): string {
  return value.toString(16).padStart(8, '0');
}
