/**
 * Adam7 Interlacing Support for PNG
 *
 * Adam7 divides an image into 7 passes, each containing a subset of pixels.
 * Every pass is a small image of its own: it is filtered and packed with its
 * own row width. Passes that come out empty for small images are skipped
 * entirely, both when writing and when reading.
 */

import { FormatError } from './errors.js';
import type { BitDepth, PngRaster, SampleArray } from './types.js';
import { createSampleArray } from './sample-codec.js';

/**
 * Adam7 pass configuration
 * Each pass has different starting pixel coordinates and step sizes
 */
export interface Adam7Pass {
  xStart: number;
  yStart: number;
  xStep: number;
  yStep: number;
}

export const ADAM7_PASSES: readonly Adam7Pass[] = [
  { xStart: 0, yStart: 0, xStep: 8, yStep: 8 }, // Pass 1
  { xStart: 4, yStart: 0, xStep: 8, yStep: 8 }, // Pass 2
  { xStart: 0, yStart: 4, xStep: 4, yStep: 8 }, // Pass 3
  { xStart: 2, yStart: 0, xStep: 4, yStep: 4 }, // Pass 4
  { xStart: 0, yStart: 2, xStep: 2, yStep: 4 }, // Pass 5
  { xStart: 1, yStart: 0, xStep: 2, yStep: 2 }, // Pass 6
  { xStart: 0, yStart: 1, xStep: 1, yStep: 2 }, // Pass 7
];

/**
 * A pass together with its sub-image size for a particular image
 */
export interface PassLayout extends Adam7Pass {
  /** 0-based pass number */
  index: number;
  width: number;
  height: number;
}

/**
 * Calculate dimensions of a specific Adam7 pass
 */
export function getPassDimensions(width: number, height: number, pass: Adam7Pass): { width: number; height: number } {
  const passWidth = Math.ceil((width - pass.xStart) / pass.xStep);
  const passHeight = Math.ceil((height - pass.yStart) / pass.yStep);
  return {
    width: Math.max(0, passWidth),
    height: Math.max(0, passHeight)
  };
}

/**
 * Non-empty passes for an image, in transmission order
 */
export function getAdam7Passes(width: number, height: number): PassLayout[] {
  const layouts: PassLayout[] = [];
  ADAM7_PASSES.forEach((pass, index) => {
    const dims = getPassDimensions(width, height, pass);
    if (dims.width > 0 && dims.height > 0) {
      layouts.push({ ...pass, index, ...dims });
    }
  });
  return layouts;
}

/**
 * The whole image as a single "pass", used for non-interlaced images so the
 * codec can walk both layouts with the same loop.
 */
export function getFullImageLayout(width: number, height: number): PassLayout[] {
  return [{ xStart: 0, yStart: 0, xStep: 1, yStep: 1, index: 0, width, height }];
}

/**
 * Copy the samples belonging to one pass out of a full raster
 */
export function extractPass(raster: PngRaster<ArrayLike<number>>, pass: PassLayout): SampleArray {
  const { channels } = raster;
  const out = createSampleArray(pass.width * pass.height * channels, raster.bitDepth);
  let dst = 0;

  for (let py = 0; py < pass.height; py++) {
    const y = pass.yStart + py * pass.yStep;
    for (let px = 0; px < pass.width; px++) {
      const src = (y * raster.width + pass.xStart + px * pass.xStep) * channels;
      for (let c = 0; c < channels; c++) {
        out[dst++] = raster.samples[src + c];
      }
    }
  }

  return out;
}

/**
 * Decode-side target: receives pass rows one at a time and scatters their
 * samples into the full raster, remembering which pixels were written.
 */
export class PassCanvas {
  readonly samples: SampleArray;
  private readonly covered: Uint8Array;
  private coveredCount = 0;

  constructor(
    readonly width: number,
    readonly height: number,
    readonly channels: number,
    bitDepth: BitDepth
  ) {
    this.samples = createSampleArray(width * height * channels, bitDepth);
    this.covered = new Uint8Array(width * height);
  }

  /**
   * Scatter one unpacked row of a pass into the raster
   * @param rowSamples `pass.width * channels` samples
   * @param passY Row index inside the pass
   */
  placeRow(pass: PassLayout, passY: number, rowSamples: ArrayLike<number>): void {
    const y = pass.yStart + passY * pass.yStep;
    const { channels } = this;

    for (let px = 0; px < pass.width; px++) {
      const x = pass.xStart + px * pass.xStep;
      const pixel = y * this.width + x;
      if (this.covered[pixel] === 0) {
        this.covered[pixel] = 1;
        this.coveredCount++;
      }
      const dst = pixel * channels;
      const src = px * channels;
      for (let c = 0; c < channels; c++) {
        this.samples[dst + c] = rowSamples[src + c];
      }
    }
  }

  get isComplete(): boolean {
    return this.coveredCount === this.width * this.height;
  }

  /**
   * Throw if any pixel was never written by a pass
   */
  assertComplete(): void {
    if (this.isComplete) return;

    for (let pixel = 0; pixel < this.covered.length; pixel++) {
      if (this.covered[pixel] === 0) {
        const x = pixel % this.width;
        const y = Math.floor(pixel / this.width);
        throw new FormatError(
          `Pixel (${x}, ${y}) not covered by image data (${this.width * this.height - this.coveredCount} missing)`
        );
      }
    }
  }
}
