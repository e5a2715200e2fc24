import { ConstraintError, FormatError } from './errors.js';
import { ColorType } from './types.js';
import type {
  CompressionLevel,
  FilterCostFunction,
  FilterStrategy,
  PngHeader,
  PngRaster,
  SampleArray
} from './types.js';
import { unfilterScanline, filterScanline, bytesPerPixelFor } from './png-filter.js';
import { getSamplesPerPixel } from './utils.js';
import { PassCanvas, PassLayout, extractPass, getAdam7Passes, getFullImageLayout } from './adam7.js';
import { createSampleArray, packScanline, scanlineLength, unpackScanlineInto } from './sample-codec.js';
import { StreamingDeflator } from './streaming-deflate.js';

/**
 * Pass layout for a header: the seven Adam7 passes (empty ones skipped) or
 * the whole image as one pass
 */
export function getScanlineLayout(header: PngHeader): PassLayout[] {
  return header.interlaced
    ? getAdam7Passes(header.width, header.height)
    : getFullImageLayout(header.width, header.height);
}

/**
 * Total size of the decompressed image data: one filter byte plus the
 * packed row for every row of every pass
 */
export function expectedDataLength(header: PngHeader): number {
  const channels = getSamplesPerPixel(header.colorType);
  return getScanlineLayout(header).reduce(
    (sum, pass) => sum + pass.height * (1 + scanlineLength(pass.width, channels, header.bitDepth)),
    0
  );
}

/** Largest raster, in samples, the decoder will allocate */
export const MAX_RASTER_SAMPLES = 0x7fffffff;

/**
 * Refuse headers whose raster cannot be allocated
 */
export function checkRasterSize(header: PngHeader): void {
  const channels = getSamplesPerPixel(header.colorType);
  if (header.width * header.height * channels > MAX_RASTER_SAMPLES) {
    throw new FormatError(
      `Image ${header.width}x${header.height} with ${channels} channels is too large to decode`,
      { chunkType: 'IHDR' }
    );
  }
}

export interface ScanlineDecoderOptions {
  /** Number of palette entries; indices at or beyond it are rejected */
  paletteSize?: number;
}

/**
 * Consumes decompressed image data in slices of any size and rebuilds the
 * raster row by row. Only the row being assembled and the previous row of
 * the current pass are buffered.
 */
export class ScanlineDecoder {
  private readonly passes: PassLayout[];
  private readonly canvas: PassCanvas;
  private readonly channels: number;
  private readonly bytesPerPixel: number;
  private readonly paletteSize: number | undefined;

  private passIndex = 0;
  private passRow = 0;
  private line: Uint8Array = new Uint8Array(0);
  private filled = 0;
  private previous: Uint8Array | null = null;
  private rowSamples: SampleArray = new Uint8Array(0);
  private surplus = 0;
  private consumed = 0;

  constructor(private readonly header: PngHeader, options: ScanlineDecoderOptions = {}) {
    this.channels = getSamplesPerPixel(header.colorType);
    this.bytesPerPixel = bytesPerPixelFor(this.channels, header.bitDepth);
    this.passes = getScanlineLayout(header);
    checkRasterSize(header);
    try {
      this.canvas = new PassCanvas(header.width, header.height, this.channels, header.bitDepth);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      throw new FormatError(`Cannot allocate a ${header.width}x${header.height} raster: ${err.message}`, {
        chunkType: 'IHDR',
        cause: err
      });
    }
    this.paletteSize = header.colorType === ColorType.PALETTE ? options.paletteSize ?? 0 : undefined;
    this.startPass();
  }

  /** True once every row of every pass has been decoded */
  get complete(): boolean {
    return this.passIndex >= this.passes.length;
  }

  /** Decompressed bytes received after the last row */
  get surplusBytes(): number {
    return this.surplus;
  }

  /** The raster as decoded so far; rows not yet received are zero */
  get raster(): PngRaster {
    return {
      width: this.header.width,
      height: this.header.height,
      channels: this.channels,
      bitDepth: this.header.bitDepth,
      samples: this.canvas.samples
    };
  }

  push(data: Uint8Array): void {
    let offset = 0;

    while (offset < data.length) {
      if (this.complete) {
        this.surplus += data.length - offset;
        return;
      }

      const take = Math.min(this.line.length - this.filled, data.length - offset);
      this.line.set(data.subarray(offset, offset + take), this.filled);
      this.filled += take;
      offset += take;

      if (this.filled === this.line.length) {
        this.completeRow();
      }
    }
  }

  /**
   * Check that all rows arrived and return the finished raster
   */
  finish(): PngRaster {
    if (!this.complete) {
      const missing = expectedDataLength(this.header) - this.consumed - this.filled;
      throw new FormatError(`Image data too short: ${missing} more decompressed bytes expected`, {
        chunkType: 'IDAT'
      });
    }
    this.canvas.assertComplete();
    return this.raster;
  }

  private startPass(): void {
    while (this.passIndex < this.passes.length) {
      const pass = this.passes[this.passIndex];
      if (pass.width > 0 && pass.height > 0) {
        this.line = new Uint8Array(1 + scanlineLength(pass.width, this.channels, this.header.bitDepth));
        this.rowSamples = createSampleArray(pass.width * this.channels, this.header.bitDepth);
        this.previous = null;
        this.passRow = 0;
        this.filled = 0;
        return;
      }
      this.passIndex++;
    }
  }

  private completeRow(): void {
    const pass = this.passes[this.passIndex];
    const filterType = this.line[0];
    let row: Uint8Array;
    try {
      row = unfilterScanline(filterType, this.line.subarray(1), this.previous, this.bytesPerPixel);
    } catch (err) {
      if (err instanceof FormatError) {
        throw new FormatError(`${err.message} (pass ${pass.index + 1}, row ${this.passRow})`, {
          chunkType: 'IDAT',
          cause: err
        });
      }
      throw err;
    }

    unpackScanlineInto(row, this.rowSamples.length, this.header.bitDepth, this.rowSamples);
    if (this.paletteSize !== undefined) {
      this.checkPaletteIndices(pass);
    }
    this.canvas.placeRow(pass, this.passRow, this.rowSamples);

    this.consumed += this.line.length;
    this.previous = row;
    this.filled = 0;
    this.passRow++;

    if (this.passRow === pass.height) {
      this.passIndex++;
      this.startPass();
    }
  }

  private checkPaletteIndices(pass: PassLayout): void {
    const limit = this.paletteSize ?? 0;
    for (let px = 0; px < this.rowSamples.length; px++) {
      const index = this.rowSamples[px];
      if (index >= limit) {
        const x = pass.xStart + px * pass.xStep;
        const y = pass.yStart + this.passRow * pass.yStep;
        throw new FormatError(
          `Palette index ${index} at (${x}, ${y}) out of range (${limit} entries)`,
          { chunkType: 'IDAT' }
        );
      }
    }
  }
}

export interface ScanlineEncoderOptions {
  filter?: FilterStrategy;
  filterCost?: FilterCostFunction;
  compressionLevel?: CompressionLevel;
}

/**
 * Filter and compress a raster, yielding the zlib stream in pieces as pako
 * produces them. Each pass is packed and filtered with its own width, and
 * the first row of a pass has no previous row.
 */
export function* compressImageData(
  header: PngHeader,
  samples: ArrayLike<number>,
  options: ScanlineEncoderOptions = {}
): Generator<Uint8Array> {
  const channels = getSamplesPerPixel(header.colorType);
  const expected = header.width * header.height * channels;
  if (samples.length !== expected) {
    throw new ConstraintError(
      `Expected ${expected} samples for ${header.width}x${header.height}x${channels}, got ${samples.length}`
    );
  }

  const bytesPerPixel = bytesPerPixelFor(channels, header.bitDepth);
  const strategy = options.filter ?? 'adaptive';
  const raster: PngRaster<ArrayLike<number>> = {
    width: header.width,
    height: header.height,
    channels,
    bitDepth: header.bitDepth,
    samples
  };

  const output: Uint8Array[] = [];
  const deflator = new StreamingDeflator((chunk) => output.push(chunk), {
    level: options.compressionLevel ?? 6
  });

  for (const pass of getScanlineLayout(header)) {
    const passSamples = header.interlaced ? extractPass(raster, pass) : samples;
    const rowSampleCount = pass.width * channels;
    const line = new Uint8Array(1 + scanlineLength(pass.width, channels, header.bitDepth));
    let previous: Uint8Array | null = null;

    for (let y = 0; y < pass.height; y++) {
      const row = packScanline(passSamples, header.bitDepth, y * rowSampleCount, rowSampleCount);
      const { filterType, filtered } = filterScanline(row, previous, bytesPerPixel, strategy, options.filterCost);
      line[0] = filterType;
      line.set(filtered, 1);
      deflator.push(line);
      previous = row;

      yield* output.splice(0);
    }
  }

  deflator.finish();
  yield* output.splice(0);
}
