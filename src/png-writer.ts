import { ConstraintError } from './errors.js';
import type { PngChunk, PngHeader } from './types.js';
import {
  chunkCrc,
  writeUInt32BE,
  stringToBytes,
  PNG_SIGNATURE
} from './utils.js';
import { CHUNK_OVERHEAD, MAX_CHUNK_LENGTH, isValidChunkType } from './png-parser.js';

/**
 * Default IDAT payload limit: the largest length a chunk can declare
 */
export const DEFAULT_CHUNK_SIZE_LIMIT = MAX_CHUNK_LENGTH;

/**
 * Create a PNG chunk
 */
export function createChunk(type: string, data: Uint8Array): PngChunk {
  if (type.length !== 4) {
    throw new ConstraintError('Chunk type must be exactly 4 characters', { chunkType: type });
  }
  if (!isValidChunkType(type)) {
    throw new ConstraintError(`Chunk type must be four ASCII letters, got ${JSON.stringify(type)}`, { chunkType: type });
  }
  if (data.length > MAX_CHUNK_LENGTH) {
    throw new ConstraintError(`Chunk ${type} payload of ${data.length} bytes exceeds 2^31-1`, { chunkType: type });
  }

  return {
    length: data.length,
    type,
    data,
    crc: chunkCrc(type, data)
  };
}

/**
 * Serialize a chunk to bytes
 */
export function serializeChunk(chunk: PngChunk): Uint8Array {
  const buffer = new Uint8Array(CHUNK_OVERHEAD + chunk.length);
  let offset = 0;

  // Write length
  writeUInt32BE(buffer, chunk.length, offset);
  offset += 4;

  // Write type
  const typeBytes = stringToBytes(chunk.type);
  buffer.set(typeBytes, offset);
  offset += 4;

  // Write data
  buffer.set(chunk.data, offset);
  offset += chunk.length;

  // Write CRC
  writeUInt32BE(buffer, chunk.crc, offset);

  return buffer;
}

/**
 * Create IHDR chunk from header information
 */
export function createIHDR(header: PngHeader): PngChunk {
  const data = new Uint8Array(13);

  writeUInt32BE(data, header.width, 0);
  writeUInt32BE(data, header.height, 4);
  data[8] = header.bitDepth;
  data[9] = header.colorType;
  data[10] = 0; // compression method: deflate
  data[11] = 0; // filter method: adaptive, five types
  data[12] = header.interlaced ? 1 : 0;

  return createChunk('IHDR', data);
}

/**
 * Create IEND chunk
 */
export function createIEND(): PngChunk {
  return createChunk('IEND', new Uint8Array(0));
}

/**
 * Build a complete PNG file from chunks
 */
export function buildPng(chunks: PngChunk[]): Uint8Array {
  // Calculate total size
  let totalSize = PNG_SIGNATURE.length;
  for (const chunk of chunks) {
    totalSize += CHUNK_OVERHEAD + chunk.length;
  }

  const buffer = new Uint8Array(totalSize);
  let offset = 0;

  // Write signature
  buffer.set(PNG_SIGNATURE, offset);
  offset += PNG_SIGNATURE.length;

  // Write chunks
  for (const chunk of chunks) {
    const chunkBytes = serializeChunk(chunk);
    buffer.set(chunkBytes, offset);
    offset += chunkBytes.length;
  }

  return buffer;
}

/**
 * Frames a compressed stream into IDAT chunks.
 *
 * Compressed bytes are accumulated until `limit` bytes are available, then
 * emitted as one chunk; `finish()` emits whatever remains. Every chunk but
 * the last is exactly `limit` bytes long.
 */
export class DataChunkWriter {
  private parts: Uint8Array[] = [];
  private buffered = 0;
  private emitted = 0;
  private readonly limit: number;

  constructor(limit: number = DEFAULT_CHUNK_SIZE_LIMIT, private readonly type = 'IDAT') {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_CHUNK_LENGTH) {
      throw new ConstraintError(`chunkSizeLimit must be an integer between 1 and 2^31-1, got ${limit}`);
    }
    this.limit = limit;
  }

  /** Number of chunks produced so far */
  get chunkCount(): number {
    return this.emitted;
  }

  /**
   * Add compressed bytes; returns the chunks that became full
   */
  push(bytes: Uint8Array): PngChunk[] {
    const chunks: PngChunk[] = [];
    let offset = 0;

    while (offset < bytes.length) {
      const take = Math.min(this.limit - this.buffered, bytes.length - offset);
      this.parts.push(bytes.subarray(offset, offset + take));
      this.buffered += take;
      offset += take;

      if (this.buffered === this.limit) {
        chunks.push(this.flush());
      }
    }

    return chunks;
  }

  /**
   * Emit the remaining bytes. An empty stream still produces one chunk.
   */
  finish(): PngChunk[] {
    if (this.buffered > 0 || this.emitted === 0) {
      return [this.flush()];
    }
    return [];
  }

  private flush(): PngChunk {
    const data = new Uint8Array(this.buffered);
    let offset = 0;
    for (const part of this.parts) {
      data.set(part, offset);
      offset += part.length;
    }
    this.parts = [];
    this.buffered = 0;
    this.emitted++;
    return createChunk(this.type, data);
  }
}
