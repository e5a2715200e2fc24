/**
 * PNG Encoder
 *
 * Writes IHDR, the metadata chunks, the image data split into IDAT chunks of
 * at most `chunkSizeLimit` bytes, and IEND. The generator form hands out
 * each serialized chunk as soon as it is complete.
 */

import { ConstraintError } from './errors.js';
import { ColorType } from './types.js';
import type { EncodeOptions, PngHeader, PngImageInput, PngMetadata } from './types.js';
import { DEFAULT_CHUNK_SIZE_LIMIT, DataChunkWriter, createIEND, createIHDR, serializeChunk } from './png-writer.js';
import { describeHeaderProblem } from './png-parser.js';
import { encodeMetadata, normalizeMetadata, resolveMapperConfig } from './png-metadata.js';
import { compressImageData } from './png-decompress.js';
import { PNG_SIGNATURE, concatBytes } from './utils.js';

/**
 * Check the header and metadata of an image before anything is written
 */
export function prepareImage(image: PngImageInput, options: EncodeOptions = {}): { header: PngHeader; metadata: PngMetadata } {
  const problem = describeHeaderProblem(image.header);
  if (problem) {
    throw new ConstraintError(problem, { chunkType: 'IHDR' });
  }

  const header: PngHeader = { ...image.header, interlaced: image.header.interlaced === true };
  const metadata = normalizeMetadata(header, image.metadata, {
    config: resolveMapperConfig(options.mapper),
    textFields: options.textFields
  });

  if (header.colorType === ColorType.PALETTE) {
    const paletteSize = metadata.palette?.length ?? 0;
    for (let i = 0; i < image.samples.length; i++) {
      if (image.samples[i] >= paletteSize) {
        throw new ConstraintError(
          `Palette index ${image.samples[i]} at sample ${i} out of range (${paletteSize} entries)`,
          { chunkType: 'PLTE' }
        );
      }
    }
  }

  return { header, metadata };
}

/**
 * Encode an image, yielding the signature and then each serialized chunk
 */
export function* encodePngChunks(image: PngImageInput, options: EncodeOptions = {}): Generator<Uint8Array> {
  const { header, metadata } = prepareImage(image, options);
  const level = options.compressionLevel ?? 6;
  const writer = new DataChunkWriter(options.chunkSizeLimit ?? DEFAULT_CHUNK_SIZE_LIMIT);
  const { beforeData, afterData } = encodeMetadata(header, metadata, level);

  yield PNG_SIGNATURE.slice();
  yield serializeChunk(createIHDR(header));

  for (const chunk of beforeData) {
    yield serializeChunk(chunk);
  }

  const compressed = compressImageData(header, image.samples, {
    filter: options.filter,
    filterCost: options.filterCost,
    compressionLevel: level
  });
  for (const piece of compressed) {
    for (const chunk of writer.push(piece)) {
      yield serializeChunk(chunk);
    }
  }
  for (const chunk of writer.finish()) {
    yield serializeChunk(chunk);
  }

  for (const chunk of afterData) {
    yield serializeChunk(chunk);
  }

  yield serializeChunk(createIEND());
}

/**
 * Encode an image into a complete PNG file
 */
export function encodePng(image: PngImageInput, options: EncodeOptions = {}): Uint8Array {
  return concatBytes([...encodePngChunks(image, options)]);
}
