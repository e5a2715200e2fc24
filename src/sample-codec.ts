/**
 * Sample packing
 *
 * Converts between unpacked samples (one number per channel value) and the
 * packed byte rows that PNG filters operate on. Depths 8 and 16 store one or
 * two bytes per sample (16-bit big-endian); depths 1, 2 and 4 pack samples
 * most-significant-bit first and pad the last byte of a row with zero bits.
 */

import { ConstraintError } from './errors.js';
import type { BitDepth, SampleArray, SignificantBitsPolicy } from './types.js';

/**
 * Length in bytes of a packed row of `width` pixels (filter byte excluded)
 */
export function scanlineLength(width: number, channels: number, bitDepth: number): number {
  return Math.ceil((width * channels * bitDepth) / 8);
}

/**
 * Allocate a sample buffer wide enough for the bit depth
 */
export function createSampleArray(length: number, bitDepth: BitDepth): SampleArray {
  return bitDepth === 16 ? new Uint16Array(length) : new Uint8Array(length);
}

/**
 * Pack `count` samples starting at `start` into a byte row
 */
export function packScanline(
  samples: ArrayLike<number>,
  bitDepth: BitDepth,
  start = 0,
  count = samples.length - start
): Uint8Array {
  const row = new Uint8Array(Math.ceil((count * bitDepth) / 8));
  const max = bitDepth === 16 ? 0xffff : (1 << bitDepth) - 1;

  for (let i = 0; i < count; i++) {
    const value = samples[start + i];
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new ConstraintError(`Sample ${value} at index ${start + i} does not fit in ${bitDepth} bits`);
    }

    if (bitDepth === 16) {
      row[i * 2] = value >>> 8;
      row[i * 2 + 1] = value & 0xff;
    } else if (bitDepth === 8) {
      row[i] = value;
    } else {
      const bitOffset = i * bitDepth;
      row[bitOffset >>> 3] |= value << (8 - bitDepth - (bitOffset & 7));
    }
  }

  return row;
}

/**
 * Unpack `count` samples from a byte row into `out` at `outOffset`.
 * Padding bits past the last sample are ignored.
 */
export function unpackScanlineInto(
  row: Uint8Array,
  count: number,
  bitDepth: BitDepth,
  out: SampleArray,
  outOffset = 0
): void {
  if (bitDepth === 16) {
    for (let i = 0; i < count; i++) {
      out[outOffset + i] = (row[i * 2] << 8) | row[i * 2 + 1];
    }
    return;
  }

  if (bitDepth === 8) {
    for (let i = 0; i < count; i++) {
      out[outOffset + i] = row[i];
    }
    return;
  }

  const mask = (1 << bitDepth) - 1;
  for (let i = 0; i < count; i++) {
    const bitOffset = i * bitDepth;
    out[outOffset + i] = (row[bitOffset >>> 3] >> (8 - bitDepth - (bitOffset & 7))) & mask;
  }
}

/**
 * Unpack `count` samples from a byte row
 */
export function unpackScanline(row: Uint8Array, count: number, bitDepth: BitDepth): SampleArray {
  const out = createSampleArray(count, bitDepth);
  unpackScanlineInto(row, count, bitDepth, out);
  return out;
}

/**
 * Pack a whole raster into one byte row per image row
 */
export function packSamples(
  samples: ArrayLike<number>,
  width: number,
  height: number,
  channels: number,
  bitDepth: BitDepth
): Uint8Array[] {
  const samplesPerRow = width * channels;
  if (samples.length !== samplesPerRow * height) {
    throw new ConstraintError(
      `Expected ${samplesPerRow * height} samples for ${width}x${height}x${channels}, got ${samples.length}`
    );
  }

  const rows: Uint8Array[] = [];
  for (let y = 0; y < height; y++) {
    rows.push(packScanline(samples, bitDepth, y * samplesPerRow, samplesPerRow));
  }
  return rows;
}

/**
 * Inverse of {@link packSamples}
 */
export function unpackSamples(
  rows: readonly Uint8Array[],
  width: number,
  channels: number,
  bitDepth: BitDepth
): SampleArray {
  const samplesPerRow = width * channels;
  const out = createSampleArray(rows.length * samplesPerRow, bitDepth);
  rows.forEach((row, y) => unpackScanlineInto(row, samplesPerRow, bitDepth, out, y * samplesPerRow));
  return out;
}

/**
 * Stretch samples whose low bits are padding (per sBIT) to the full range
 * of the bit depth: each value is shifted right to its significant bits and
 * scaled linearly so that the significant maximum maps to 2^bitDepth - 1.
 *
 * With the 'max' policy every channel uses the widest reported width.
 * Returns a new array; channels with `s >= bitDepth` are copied unchanged.
 */
export function rescaleSignificantBits(
  samples: SampleArray,
  channels: number,
  bitDepth: BitDepth,
  significantBits: readonly number[],
  policy: SignificantBitsPolicy = 'max'
): SampleArray {
  if (significantBits.length === 0) {
    throw new ConstraintError('significantBits must list at least one channel width');
  }

  const widest = Math.max(...significantBits);
  const widths: number[] = [];
  for (let c = 0; c < channels; c++) {
    widths.push(policy === 'max' ? widest : significantBits[Math.min(c, significantBits.length - 1)]);
  }

  const fullMax = bitDepth === 16 ? 0xffff : (1 << bitDepth) - 1;
  const result = createSampleArray(samples.length, bitDepth);

  for (let i = 0; i < samples.length; i++) {
    const significant = widths[i % channels];
    if (significant >= bitDepth || significant <= 0) {
      result[i] = samples[i];
      continue;
    }
    const reduced = samples[i] >>> (bitDepth - significant);
    const reducedMax = (1 << significant) - 1;
    result[i] = Math.round((reduced * fullMax) / reducedMax);
  }

  return result;
}
