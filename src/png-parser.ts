import { FormatError, FramingError } from './errors.js';
import type { Logger, PngChunk, PngHeader } from './types.js';
import {
  chunkCrc,
  updateCrc32,
  stringToBytes,
  readUInt32BE,
  bytesToString,
  isPngSignature,
  isBitDepth,
  isColorType,
  isLegalBitDepth,
  colorTypeName,
  concatBytes,
  PNG_SIGNATURE
} from './utils.js';

/** Largest chunk length and image dimension the format allows */
export const MAX_CHUNK_LENGTH = 0x7fffffff;

/** length(4) + type(4) + crc(4) */
export const CHUNK_OVERHEAD = 12;

const CHUNK_TYPE_PATTERN = /^[A-Za-z]{4}$/;

/**
 * Property bits carried by the letter case of a chunk type
 */
export interface ChunkTypeProperties {
  /** Lowercase first letter: decoders may skip the chunk */
  ancillary: boolean;
  /** Lowercase second letter: not a registered public chunk */
  private: boolean;
  /** Lowercase third letter: must be uppercase in conforming files */
  reserved: boolean;
  /** Lowercase fourth letter: editors may copy the chunk unchanged */
  safeToCopy: boolean;
}

export function isValidChunkType(type: string): boolean {
  return CHUNK_TYPE_PATTERN.test(type);
}

export function getChunkTypeProperties(type: string): ChunkTypeProperties {
  const isLower = (index: number) => (type.charCodeAt(index) & 0x20) !== 0;
  return {
    ancillary: isLower(0),
    private: isLower(1),
    reserved: isLower(2),
    safeToCopy: isLower(3)
  };
}

export function isCriticalChunk(type: string): boolean {
  return !getChunkTypeProperties(type).ancillary;
}

/**
 * Read and validate the length and type fields of the chunk at `offset`
 * @param baseOffset Absolute stream position of `data[0]`, for error messages
 */
function readChunkPrefix(data: Uint8Array, offset: number, baseOffset: number): { length: number; type: string } {
  const length = readUInt32BE(data, offset);
  const type = bytesToString(data, offset + 4, 4);

  if (!isValidChunkType(type)) {
    throw new FramingError(`Invalid chunk type bytes at byte ${baseOffset + offset}`, {
      offset: baseOffset + offset
    });
  }

  if (length > MAX_CHUNK_LENGTH) {
    throw new FramingError(`Chunk ${type} declares length ${length}, above 2^31-1`, {
      chunkType: type,
      offset: baseOffset + offset
    });
  }

  return { length, type };
}

/**
 * Read one chunk starting at `offset`. Returns null when fewer bytes than
 * the full chunk are available; the caller decides whether that is fatal.
 * @param baseOffset Absolute stream position of `data[0]`, for error messages
 */
export function readChunkAt(data: Uint8Array, offset: number, baseOffset = 0): PngChunk | null {
  if (offset + 8 > data.length) {
    return null;
  }

  const { length, type } = readChunkPrefix(data, offset, baseOffset);

  if (offset + CHUNK_OVERHEAD + length > data.length) {
    return null;
  }

  const chunkData = data.slice(offset + 8, offset + 8 + length);
  const crc = readUInt32BE(data, offset + 8 + length);

  // Verify CRC (includes type + data)
  const calculatedCrc = chunkCrc(type, chunkData);
  if (calculatedCrc !== crc) {
    throw new FramingError(`CRC mismatch for chunk ${type}`, {
      chunkType: type,
      offset: baseOffset + offset
    });
  }

  return { length, type, data: chunkData, crc };
}

/**
 * Parse PNG file and extract chunks
 */
export class PngParser {
  private data: Uint8Array;
  private offset: number;

  constructor(data: Uint8Array) {
    this.data = data;
    this.offset = 0;

    if (!isPngSignature(data)) {
      throw new FramingError('Invalid PNG signature', { offset: 0 });
    }
    this.offset = PNG_SIGNATURE.length;
  }

  /** Current read position in bytes */
  get position(): number {
    return this.offset;
  }

  /**
   * Read the next chunk from the PNG file
   */
  readChunk(): PngChunk | null {
    if (this.offset >= this.data.length) {
      return null;
    }

    const start = this.offset;
    const chunk = readChunkAt(this.data, start);
    if (!chunk) {
      const type = start + 8 <= this.data.length ? bytesToString(this.data, start + 4, 4) : undefined;
      throw new FramingError(
        type ? `Incomplete PNG chunk data for ${type}` : 'Incomplete PNG chunk',
        { chunkType: type, offset: start }
      );
    }

    this.offset += CHUNK_OVERHEAD + chunk.length;
    return chunk;
  }

  /**
   * Read all chunks from the PNG file, up to and including IEND
   */
  readAllChunks(): PngChunk[] {
    const chunks: PngChunk[] = [];
    let chunk: PngChunk | null;

    while ((chunk = this.readChunk()) !== null) {
      chunks.push(chunk);
      if (chunk.type === 'IEND') break;
    }

    return chunks;
  }

  /**
   * Parse IHDR chunk to get image header information
   */
  static parseHeader(chunk: PngChunk): PngHeader {
    if (chunk.type !== 'IHDR') {
      throw new FormatError('Not an IHDR chunk', { chunkType: chunk.type });
    }

    if (chunk.data.length !== 13) {
      throw new FormatError(`Invalid IHDR chunk length ${chunk.data.length}`, { chunkType: 'IHDR' });
    }

    const width = readUInt32BE(chunk.data, 0);
    const height = readUInt32BE(chunk.data, 4);
    const bitDepth = chunk.data[8];
    const colorType = chunk.data[9];
    const compressionMethod = chunk.data[10];
    const filterMethod = chunk.data[11];
    const interlaceMethod = chunk.data[12];

    const fail = (message: string): never => {
      throw new FormatError(message, { chunkType: 'IHDR' });
    };

    if (width === 0 || height === 0 || width > MAX_CHUNK_LENGTH || height > MAX_CHUNK_LENGTH) {
      fail(`Invalid image dimensions ${width}x${height}`);
    }
    if (!isColorType(colorType)) {
      return fail(`Unknown color type ${colorType}`);
    }
    if (!isBitDepth(bitDepth) || !isLegalBitDepth(colorType, bitDepth)) {
      return fail(`Bit depth ${bitDepth} is invalid for ${colorTypeName(colorType)}`);
    }
    if (compressionMethod !== 0) {
      fail(`Unsupported compression method ${compressionMethod}`);
    }
    if (filterMethod !== 0) {
      fail(`Unsupported filter method ${filterMethod}`);
    }
    if (interlaceMethod !== 0 && interlaceMethod !== 1) {
      fail(`Unknown interlace method ${interlaceMethod}`);
    }

    return {
      width,
      height,
      bitDepth,
      colorType,
      interlaced: interlaceMethod === 1
    };
  }

  /**
   * Get PNG header from file
   */
  getHeader(): PngHeader {
    // Reset to start of chunks
    const savedOffset = this.offset;
    this.offset = PNG_SIGNATURE.length;

    const firstChunk = this.readChunk();
    if (!firstChunk || firstChunk.type !== 'IHDR') {
      throw new FormatError('First chunk must be IHDR', { chunkType: firstChunk?.type, offset: 8 });
    }

    const header = PngParser.parseHeader(firstChunk);

    // Restore offset
    this.offset = savedOffset;

    return header;
  }
}

/**
 * Receives what {@link ChunkReader.read} finds, in stream order
 */
export interface ChunkVisitor {
  /** A buffered chunk, CRC already verified */
  chunk(chunk: PngChunk): void;
  /** Start of a streamed chunk; its payload follows through {@link data} */
  begin(type: string, length: number): void;
  /** A piece of the streamed payload, only valid during the call */
  data(bytes: Uint8Array): void;
  /** The streamed chunk is complete and its CRC matched */
  end(type: string, crc: number): void;
}

interface StreamedChunk {
  type: string;
  length: number;
  remaining: number;
  /** Running CRC register over type and payload */
  crc: number;
  /** Absolute offset of the length field */
  start: number;
  /** First error thrown by the visitor for this payload */
  failure: { error: unknown } | null;
}

/**
 * Incremental chunk parser. Bytes may arrive in slices of any size.
 * Buffered chunks are reported once their CRC has been read; the payload of
 * a streamed chunk type is handed on as it arrives and its CRC is checked
 * at the end. Input slices are queued as they are and joined only when a
 * buffered chunk is complete.
 */
export class ChunkReader {
  private queue: Uint8Array[] = [];
  /** Index of the first live slice in `queue` */
  private head = 0;
  private queued = 0;
  /** Absolute stream offset of the first queued byte */
  private consumed = 0;
  private readonly streamedTypes: ReadonlySet<string>;
  private streamed: StreamedChunk | null = null;
  private signatureSeen = false;
  private ended = false;
  private trailingWarned = false;

  constructor(private readonly logger: Logger = console.warn, streamedTypes: Iterable<string> = []) {
    this.streamedTypes = new Set(streamedTypes);
  }

  /** True once IEND has been read */
  get done(): boolean {
    return this.ended;
  }

  /** Total bytes accepted so far, excluding anything after IEND */
  get position(): number {
    return this.consumed + this.queued;
  }

  /**
   * Accept bytes and return every chunk completed by them. Streamed chunk
   * types are collected and returned whole.
   */
  push(bytes: Uint8Array): PngChunk[] {
    const chunks: PngChunk[] = [];
    let parts: Uint8Array[] = [];
    let length = 0;

    this.read(bytes, {
      chunk: (chunk) => chunks.push(chunk),
      begin: (_type, declared) => {
        parts = [];
        length = declared;
      },
      data: (piece) => parts.push(piece.slice()),
      end: (type, crc) => chunks.push({ length, type, data: concatBytes(parts), crc })
    });

    return chunks;
  }

  /**
   * Accept bytes and report what they complete to `visitor`. An error the
   * visitor throws from {@link ChunkVisitor.data} is raised only after the
   * chunk's CRC has been verified, so a damaged chunk reports the CRC first.
   */
  read(bytes: Uint8Array, visitor: ChunkVisitor): void {
    if (this.ended) {
      this.warnTrailing(bytes.length);
      return;
    }

    if (bytes.length > 0) {
      this.queue.push(bytes);
      this.queued += bytes.length;
    }

    if (!this.signatureSeen) {
      if (this.queued < PNG_SIGNATURE.length) return;
      if (!isPngSignature(this.take(PNG_SIGNATURE.length))) {
        throw new FramingError('Invalid PNG signature', { offset: 0 });
      }
      this.signatureSeen = true;
    }

    while (!this.ended) {
      if (this.streamed) {
        if (!this.continueStreamed(this.streamed, visitor)) break;
        continue;
      }

      if (this.queued < 8) break;
      const start = this.consumed;
      const { length, type } = readChunkPrefix(this.peek(8), 0, start);

      if (this.streamedTypes.has(type)) {
        this.take(8);
        this.streamed = {
          type,
          length,
          remaining: length,
          crc: updateCrc32(0xffffffff, stringToBytes(type)),
          start,
          failure: null
        };
        visitor.begin(type, length);
        continue;
      }

      if (this.queued < CHUNK_OVERHEAD + length) break;
      const chunk = readChunkAt(this.take(CHUNK_OVERHEAD + length), 0, start);
      if (!chunk) break;
      visitor.chunk(chunk);
      if (chunk.type === 'IEND') {
        this.ended = true;
      }
    }

    if (this.ended) {
      const rest = this.queued;
      this.queue = [];
      this.head = 0;
      this.queued = 0;
      this.warnTrailing(rest);
    }
  }

  /**
   * Signal end of input. Throws unless IEND was reached.
   */
  finish(): void {
    if (this.ended) return;

    if (!this.signatureSeen) {
      throw new FramingError('Input too short for a PNG signature', { offset: 0 });
    }
    if (this.streamed) {
      throw new FramingError(`Truncated PNG stream inside chunk ${this.streamed.type}`, {
        chunkType: this.streamed.type,
        offset: this.streamed.start
      });
    }
    const type = this.queued >= 8 ? bytesToString(this.peek(8), 4, 4) : undefined;
    throw new FramingError(
      type ? `Truncated PNG stream inside chunk ${type}` : 'PNG stream ended before IEND chunk',
      { chunkType: type, offset: this.consumed }
    );
  }

  /**
   * Forward queued payload of the streamed chunk; true once it is complete
   */
  private continueStreamed(chunk: StreamedChunk, visitor: ChunkVisitor): boolean {
    while (chunk.remaining > 0 && this.queued > 0) {
      const piece = this.shift(chunk.remaining);
      chunk.remaining -= piece.length;
      chunk.crc = updateCrc32(chunk.crc, piece);
      if (chunk.failure) continue;
      try {
        visitor.data(piece);
      } catch (error) {
        chunk.failure = { error };
      }
    }

    if (chunk.remaining > 0 || this.queued < 4) {
      return false;
    }

    const crc = readUInt32BE(this.take(4), 0);
    if (crc !== ((chunk.crc ^ 0xffffffff) >>> 0)) {
      throw new FramingError(`CRC mismatch for chunk ${chunk.type}`, {
        chunkType: chunk.type,
        offset: chunk.start
      });
    }
    this.streamed = null;
    if (chunk.failure) {
      throw chunk.failure.error;
    }
    visitor.end(chunk.type, crc);
    return true;
  }

  /** The first `count` queued bytes, leaving them queued */
  private peek(count: number): Uint8Array {
    const first = this.queue[this.head];
    if (first.length >= count) {
      return first.subarray(0, count);
    }
    const out = new Uint8Array(count);
    let filled = 0;
    for (let i = this.head; filled < count; i++) {
      const piece = this.queue[i];
      const n = Math.min(piece.length, count - filled);
      out.set(piece.subarray(0, n), filled);
      filled += n;
    }
    return out;
  }

  /** Remove the first `count` queued bytes and return them as one array */
  private take(count: number): Uint8Array {
    const out = new Uint8Array(count);
    let filled = 0;
    while (filled < count) {
      const piece = this.shift(count - filled);
      out.set(piece, filled);
      filled += piece.length;
    }
    return out;
  }

  /** Remove up to `max` bytes from the front of the first queued slice */
  private shift(max: number): Uint8Array {
    const first = this.queue[this.head];
    let piece: Uint8Array;
    if (first.length <= max) {
      piece = first;
      this.head++;
      if (this.head === this.queue.length) {
        this.queue = [];
        this.head = 0;
      } else if (this.head >= 1024) {
        this.queue = this.queue.slice(this.head);
        this.head = 0;
      }
    } else {
      piece = first.subarray(0, max);
      this.queue[this.head] = first.subarray(max);
    }
    this.queued -= piece.length;
    this.consumed += piece.length;
    return piece;
  }

  private warnTrailing(count: number): void {
    if (count > 0 && !this.trailingWarned) {
      this.trailingWarned = true;
      this.logger(`Ignoring data after IEND chunk (${count} bytes)`);
    }
  }
}

/**
 * A PNG stream split into its structural parts
 */
export interface PngStreamParts {
  /** The IHDR chunk */
  header: PngChunk;
  /** Every chunk other than IHDR, IDAT and IEND, in arrival order */
  ancillary: PngChunk[];
  /** All IDAT payloads joined in order: one zlib stream */
  imageData: Uint8Array;
  /** Number of IDAT chunks the image data was spread over */
  dataChunkCount: number;
  /** The IEND chunk */
  end: PngChunk;
}

/**
 * Split a complete PNG file into header, other chunks and joined image data
 */
export function splitPngStream(data: Uint8Array): PngStreamParts {
  const chunks = new PngParser(data).readAllChunks();

  const first = chunks[0];
  if (!first || first.type !== 'IHDR') {
    throw new FormatError('First chunk must be IHDR', { chunkType: first?.type, offset: 8 });
  }

  const end = chunks[chunks.length - 1];
  if (end.type !== 'IEND') {
    throw new FramingError('PNG stream ended before IEND chunk', { offset: data.length });
  }

  const ancillary: PngChunk[] = [];
  const dataParts: Uint8Array[] = [];
  for (const chunk of chunks.slice(1, -1)) {
    if (chunk.type === 'IHDR') {
      throw new FormatError('Duplicate IHDR chunk', { chunkType: 'IHDR' });
    }
    if (chunk.type === 'IDAT') {
      dataParts.push(chunk.data);
    } else {
      ancillary.push(chunk);
    }
  }

  if (dataParts.length === 0) {
    throw new FormatError('No IDAT chunks found in PNG', { chunkType: 'IDAT' });
  }

  return {
    header: first,
    ancillary,
    imageData: concatBytes(dataParts),
    dataChunkCount: dataParts.length,
    end
  };
}

/**
 * Parse PNG file and return header information
 */
export function parsePngHeader(data: Uint8Array): PngHeader {
  const parser = new PngParser(data);
  return parser.getHeader();
}

/**
 * Parse PNG file and return all chunks
 */
export function parsePngChunks(data: Uint8Array): PngChunk[] {
  const parser = new PngParser(data);
  return parser.readAllChunks();
}

/**
 * Problem with a header's field combination, or null when it is legal.
 * Shared by the decoder (FormatError) and the encoder (ConstraintError).
 */
export function describeHeaderProblem(header: PngHeader): string | null {
  const { width, height, bitDepth, colorType } = header;
  if (!Number.isInteger(width) || !Number.isInteger(height) ||
      width < 1 || height < 1 || width > MAX_CHUNK_LENGTH || height > MAX_CHUNK_LENGTH) {
    return `Invalid image dimensions ${width}x${height}`;
  }
  if (!isColorType(colorType)) {
    return `Unknown color type ${String(colorType)}`;
  }
  if (!isLegalBitDepth(colorType, bitDepth)) {
    return `Bit depth ${bitDepth} is invalid for ${colorTypeName(colorType)}`;
  }
  return null;
}
