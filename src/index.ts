/**
 * PNG codec
 *
 * Reads and writes PNG files: chunk framing, scanline filtering, Adam7
 * interlacing, sample packing for every legal bit depth, and a structured
 * view of the ancillary chunks.
 *
 * Key features:
 * - Incremental decoding with bounded working memory
 * - Adaptive or forced filtering on encode
 * - Metadata round-trip, including unknown chunks
 *
 * @example
 * import { decodePng, encodePng } from 'scanline-png';
 *
 * const { header, metadata, raster } = decodePng(bytes);
 * const copy = encodePng({ header, metadata, samples: raster.samples });
 */

// Main API
export { decodePng, decodePngStream, PngDecoder } from './png-decoder.js';
export { encodePng, encodePngChunks } from './png-encoder.js';
export { toRgba, scaleSample } from './pixel-ops.js';
export {
  parseIccProfile,
  encodeIccProfile,
  encodeIccTag,
  createGrayProfile,
  sampleCurve,
  D50
} from './icc-profile.js';
export type {
  IccProfile,
  IccProfileHeader,
  IccTag,
  IccTagValue,
  XyzNumber,
  IccProfileInput,
  IccHeaderInput,
  IccTagInput,
  GrayProfileOptions
} from './icc-profile.js';

// Errors
export {
  PngError,
  FramingError,
  FormatError,
  DecompressionError,
  ConstraintError,
  isPngError
} from './errors.js';
export type { PngErrorKind, PngErrorDetails } from './errors.js';

// Metadata mapping
export {
  DEFAULT_MAPPER_CONFIG,
  METADATA_CHUNK_HANDLERS,
  decodeMetadata,
  encodeMetadata,
  normalizeMetadata,
  normalizePhysicalResolution,
  physicalToDpi,
  timestampFromDate
} from './png-metadata.js';
export { decodeTextChunk, encodeTextEntry } from './png-text.js';

// Low-level APIs for advanced use
export {
  parsePngHeader,
  parsePngChunks,
  splitPngStream,
  PngParser,
  ChunkReader
} from './png-parser.js';
export {
  createChunk,
  createIHDR,
  createIEND,
  serializeChunk,
  buildPng,
  DataChunkWriter,
  DEFAULT_CHUNK_SIZE_LIMIT
} from './png-writer.js';
export { ScanlineDecoder, compressImageData } from './png-decompress.js';
export {
  unfilterScanline,
  applyFilter,
  filterScanline,
  paethPredictor,
  sumOfAbsoluteSigned,
  getBytesPerPixel,
  FilterType
} from './png-filter.js';
export {
  packScanline,
  unpackScanline,
  packSamples,
  unpackSamples,
  scanlineLength,
  rescaleSignificantBits
} from './sample-codec.js';
export { ADAM7_PASSES, getAdam7Passes, getPassDimensions, extractPass, PassCanvas } from './adam7.js';
export { inflateData, StreamingInflator } from './streaming-inflate.js';
export { deflateData, StreamingDeflator } from './streaming-deflate.js';
export * from './types.js';
export {
  crc32,
  readUInt32BE,
  writeUInt32BE,
  isPngSignature,
  PNG_SIGNATURE
} from './utils.js';
