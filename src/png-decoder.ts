/**
 * PNG Decoder
 *
 * Chunks are parsed as bytes arrive. IDAT payload bytes go straight into
 * the inflater without waiting for the rest of their chunk, and
 * decompressed rows are unfiltered and placed into the raster immediately,
 * so only the current ancillary chunk, pako's output buffer and the raster
 * itself are held in memory.
 */

import { FormatError, PngError } from './errors.js';
import { ColorType } from './types.js';
import type { DecodeOptions, DecodedPng, Logger, PngChunk, PngHeader, PngRaster } from './types.js';
import { ChunkReader, PngParser } from './png-parser.js';
import type { ChunkVisitor } from './png-parser.js';
import { MetadataCollector, resolveMapperConfig } from './png-metadata.js';
import { ScanlineDecoder, checkRasterSize } from './png-decompress.js';
import { StreamingInflator } from './streaming-inflate.js';
import { createSampleArray, rescaleSignificantBits } from './sample-codec.js';
import { getSamplesPerPixel } from './utils.js';

/** pako output buffer size for image data */
const INFLATE_CHUNK_SIZE = 16 * 1024;

type DataState = 'before' | 'inside' | 'after';

interface HeaderState {
  header: PngHeader;
  collector: MetadataCollector;
}

interface DataPipeline {
  inflator: StreamingInflator;
  scanlines: ScanlineDecoder;
}

/**
 * Incremental decoder: feed the file with {@link push} in slices of any size,
 * then call {@link finish}.
 */
export class PngDecoder {
  private readonly reader: ChunkReader;
  private readonly visitor: ChunkVisitor;
  private readonly logger: Logger;
  private readonly options: DecodeOptions;
  private state: HeaderState | null = null;
  private pipeline: DataPipeline | null = null;
  private dataState: DataState = 'before';
  private failure: PngError | null = null;

  constructor(options: DecodeOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? console.warn;
    this.reader = new ChunkReader(this.logger, ['IDAT']);
    this.visitor = {
      chunk: (chunk) => this.handleChunk(chunk),
      begin: (type) => this.beginData(type),
      data: (bytes) => this.pipeline?.inflator.push(bytes),
      end: () => undefined
    };
  }

  /** Image header, once IHDR has been read */
  get header(): PngHeader | null {
    return this.state?.header ?? null;
  }

  push(bytes: Uint8Array): void {
    if (this.failure) return;

    try {
      this.reader.read(bytes, this.visitor);
    } catch (err) {
      this.recordFailure(err);
    }
  }

  /**
   * Signal end of input and return the decoded image
   */
  finish(): DecodedPng {
    if (!this.failure) {
      try {
        return this.complete();
      } catch (err) {
        this.recordFailure(err);
      }
    }

    const { state, failure } = this;
    if (!state || !failure) {
      throw new FormatError('Decoder finished without a result');
    }
    return {
      header: state.header,
      metadata: state.collector.snapshot(),
      raster: this.pipeline?.scanlines.raster ?? emptyRaster(state.header),
      error: failure
    };
  }

  /**
   * Rethrow unless partial results were requested and the header is known
   */
  private recordFailure(err: unknown): void {
    if (this.options.allowPartial && this.state && err instanceof PngError) {
      this.failure = err;
      return;
    }
    throw err;
  }

  private handleChunk(chunk: PngChunk): void {
    if (!this.state) {
      if (chunk.type !== 'IHDR') {
        throw new FormatError('First chunk must be IHDR', { chunkType: chunk.type, offset: 8 });
      }
      const header = PngParser.parseHeader(chunk);
      checkRasterSize(header);
      const config = resolveMapperConfig(this.options.mapper);
      this.state = { header, collector: new MetadataCollector(header, config, this.logger) };
      return;
    }

    const { collector } = this.state;

    switch (chunk.type) {
      case 'IHDR':
        throw new FormatError('Duplicate IHDR chunk', { chunkType: 'IHDR' });

      case 'IEND':
        if (this.dataState === 'before') {
          throw new FormatError('No IDAT chunks found in PNG', { chunkType: 'IDAT' });
        }
        this.dataState = 'after';
        break;

      default:
        if (this.dataState === 'inside') {
          this.dataState = 'after';
        }
        collector.accept(chunk);
    }
  }

  /**
   * An IDAT chunk starts; its payload arrives through the visitor's `data`
   */
  private beginData(type: string): void {
    if (!this.state) {
      throw new FormatError('First chunk must be IHDR', { chunkType: type, offset: 8 });
    }
    if (this.dataState === 'after') {
      throw new FormatError('IDAT chunks must be consecutive', { chunkType: 'IDAT' });
    }
    this.dataPipeline(this.state.header, this.state.collector);
    this.dataState = 'inside';
  }

  private dataPipeline(header: PngHeader, collector: MetadataCollector): DataPipeline {
    if (this.pipeline) return this.pipeline;

    if (header.colorType === ColorType.PALETTE && collector.paletteSize === 0) {
      throw new FormatError('Missing PLTE chunk before image data', { chunkType: 'PLTE' });
    }
    collector.markData();

    const scanlines = new ScanlineDecoder(header, { paletteSize: collector.paletteSize });
    const inflator = new StreamingInflator((data) => scanlines.push(data), {
      chunkSize: INFLATE_CHUNK_SIZE,
      chunkType: 'IDAT'
    });
    this.pipeline = { inflator, scanlines };
    return this.pipeline;
  }

  private complete(): DecodedPng {
    this.reader.finish();

    const { state, pipeline } = this;
    if (!state || !pipeline) {
      throw new FormatError('No IDAT chunks found in PNG', { chunkType: 'IDAT' });
    }
    const { header, collector } = state;

    pipeline.inflator.finish();
    if (pipeline.inflator.trailingBytes > 0) {
      this.logger(`Ignoring ${pipeline.inflator.trailingBytes} bytes after the end of the compressed image data`);
    }

    const raster = pipeline.scanlines.finish();
    if (pipeline.scanlines.surplusBytes > 0) {
      this.logger(`Ignoring ${pipeline.scanlines.surplusBytes} bytes of surplus decompressed image data`);
    }

    const metadata = collector.finish();

    if (this.options.applySignificantBits && metadata.significantBits && header.colorType !== ColorType.PALETTE) {
      raster.samples = rescaleSignificantBits(
        raster.samples,
        raster.channels,
        raster.bitDepth,
        metadata.significantBits,
        this.options.significantBitsPolicy
      );
    }

    return { header, metadata, raster };
  }
}

function emptyRaster(header: PngHeader): PngRaster {
  const channels = getSamplesPerPixel(header.colorType);
  return {
    width: header.width,
    height: header.height,
    channels,
    bitDepth: header.bitDepth,
    samples: createSampleArray(header.width * header.height * channels, header.bitDepth)
  };
}

/**
 * Decode a complete PNG file held in memory
 */
export function decodePng(data: Uint8Array, options: DecodeOptions = {}): DecodedPng {
  const decoder = new PngDecoder(options);
  decoder.push(data);
  return decoder.finish();
}

/**
 * Decode a PNG delivered in pieces, e.g. a Node.js readable stream
 *
 * @example
 * const image = await decodePngStream(createReadStream('photo.png'));
 */
export async function decodePngStream(
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  options: DecodeOptions = {}
): Promise<DecodedPng> {
  const decoder = new PngDecoder(options);
  for await (const piece of source) {
    decoder.push(piece);
  }
  return decoder.finish();
}
