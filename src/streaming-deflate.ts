/**
 * Streaming Deflate Compression
 *
 * Incremental zlib compression on top of pako. Scanlines are pushed one at
 * a time and compressed output is delivered through a callback, so the
 * encoder never needs the whole filtered image in memory.
 */

import pako from 'pako';
import type { Deflate } from 'pako';
import { ConstraintError } from './errors.js';
import type { CompressionLevel } from './types.js';

export interface StreamingDeflatorOptions {
  /**
   * Compression level (-1 to 9)
   * Default: 6 (balanced)
   */
  level?: number;

  /**
   * Size of pako's output buffers
   * Default: 64KB
   */
  chunkSize?: number;
}

type OnDataCallback = (chunk: Uint8Array) => void;

function isCompressionLevel(level: number): level is CompressionLevel {
  return Number.isInteger(level) && level >= -1 && level <= 9;
}

/**
 * Failures on the compression side are problems with the caller's settings,
 * reported as {@link ConstraintError}
 */
export class StreamingDeflator {
  private readonly deflator: Deflate;
  private finished = false;

  constructor(onData: OnDataCallback, options: StreamingDeflatorOptions = {}) {
    const level = options.level ?? 6;
    if (!isCompressionLevel(level)) {
      throw new ConstraintError(`Compression level must be an integer from -1 to 9, got ${level}`);
    }
    this.deflator = new pako.Deflate({
      level,
      chunkSize: options.chunkSize ?? 64 * 1024
    });

    this.deflator.onData = (chunk: Uint8Array) => {
      if (chunk && chunk.length > 0) {
        onData(chunk);
      }
    };
  }

  /**
   * Push uncompressed data
   */
  push(data: Uint8Array): void {
    if (this.finished) {
      throw new Error('Cannot push after finish()');
    }
    this.deflator.push(data, false);
    this.checkError();
  }

  /**
   * Finish compression, flushing remaining data and finalizing the stream.
   */
  finish(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.deflator.push(new Uint8Array(0), true);
    this.checkError();
  }

  private checkError(): void {
    if (this.deflator.err) {
      throw new ConstraintError(`Deflate error: ${this.deflator.msg || `status ${this.deflator.err}`}`);
    }
  }
}

/**
 * Compress a buffer into a complete zlib stream
 */
export function deflateData(data: Uint8Array, level = 6): Uint8Array {
  const parts: Uint8Array[] = [];
  const deflator = new StreamingDeflator((chunk) => parts.push(chunk), { level });
  deflator.push(data);
  deflator.finish();

  const totalLength = parts.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of parts) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
