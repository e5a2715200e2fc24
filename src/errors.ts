/**
 * Error types raised by the PNG codec.
 *
 * Every failure is fatal for the current encode/decode call. The `kind`
 * field lets callers branch without `instanceof` chains.
 */

export type PngErrorKind = 'framing' | 'format' | 'decompression' | 'constraint';

export interface PngErrorDetails {
  /** Tag of the chunk being processed when the error was raised */
  chunkType?: string;
  /** Byte offset in the input stream, where known */
  offset?: number;
  cause?: unknown;
}

export abstract class PngError extends Error {
  abstract readonly kind: PngErrorKind;
  readonly chunkType?: string;
  readonly offset?: number;

  constructor(message: string, details: PngErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.chunkType = details.chunkType;
    this.offset = details.offset;
  }
}

/**
 * Malformed chunk framing: bad signature, CRC mismatch, truncated stream,
 * or a length running past the end of the input.
 */
export class FramingError extends PngError {
  readonly kind = 'framing' as const;
}

/**
 * Structurally valid chunks with illegal content: header field combinations,
 * unknown filter bytes, palette indices out of range, chunk order violations.
 */
export class FormatError extends PngError {
  readonly kind = 'format' as const;
}

/** Failure reported by the zlib stream (IDAT, zTXt, iTXt or iCCP payloads) */
export class DecompressionError extends PngError {
  readonly kind = 'decompression' as const;
}

/** The caller asked to encode an inconsistent image/metadata combination */
export class ConstraintError extends PngError {
  readonly kind = 'constraint' as const;
}

export function isPngError(value: unknown): value is PngError {
  return value instanceof PngError;
}

