/**
 * Streaming Inflate Decompression
 *
 * Wraps pako's incremental inflater so compressed data can be fed in
 * arbitrary slices (one IDAT chunk at a time) while decompressed output is
 * handed to a callback as it becomes available.
 */

import pako from 'pako';
import type { Inflate } from 'pako';
import { DecompressionError } from './errors.js';
import { concatBytes } from './utils.js';

type OnDataCallback = (chunk: Uint8Array) => void;

export interface StreamingInflatorOptions {
  /**
   * Size of pako's output buffers; output is delivered in pieces of this size
   * Default: 64KB
   */
  chunkSize?: number;

  /** Chunk type reported in errors (IDAT, zTXt, iTXt, iCCP) */
  chunkType?: string;
}

/**
 * Incremental zlib decompressor. Errors from the compressed stream surface
 * as {@link DecompressionError}; input that follows the end of the zlib
 * stream is counted but not decompressed.
 */
export class StreamingInflator {
  private readonly inflator: Inflate;
  private readonly chunkType: string | undefined;
  private ended = false;
  private trailing = 0;

  constructor(onData: OnDataCallback, options: StreamingInflatorOptions = {}) {
    this.chunkType = options.chunkType;
    this.inflator = new pako.Inflate({ chunkSize: options.chunkSize ?? 64 * 1024 });

    this.inflator.onData = (data: Uint8Array) => {
      if (data && data.length > 0) {
        onData(data);
      }
    };

    const baseOnEnd = this.inflator.onEnd.bind(this.inflator);
    this.inflator.onEnd = (status: number) => {
      baseOnEnd(status);
      this.ended = true;
    };
  }

  /** True once the end of the zlib stream has been reached */
  get finished(): boolean {
    return this.ended;
  }

  /** Bytes pushed after the end of the zlib stream */
  get trailingBytes(): number {
    return this.trailing;
  }

  push(data: Uint8Array): void {
    if (this.ended) {
      this.trailing += data.length;
      this.checkError();
      return;
    }

    this.inflator.push(data, false);
    this.checkError();
  }

  /**
   * Declare the end of input. Throws if the zlib stream is incomplete.
   */
  finish(): void {
    this.checkError();
    if (!this.ended) {
      throw new DecompressionError('Compressed data ended before the end of the zlib stream', {
        chunkType: this.chunkType
      });
    }
  }

  private checkError(): void {
    if (this.inflator.err) {
      throw new DecompressionError(`Inflate error: ${this.inflator.msg || `status ${this.inflator.err}`}`, {
        chunkType: this.chunkType
      });
    }
  }
}

/**
 * Decompress a complete zlib stream held in memory
 */
export function inflateData(data: Uint8Array, chunkType?: string): Uint8Array {
  const parts: Uint8Array[] = [];
  const inflator = new StreamingInflator((chunk) => parts.push(chunk), { chunkType });
  inflator.push(data);
  inflator.finish();
  return concatBytes(parts);
}
