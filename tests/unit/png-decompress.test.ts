import { test } from 'node:test';
import assert from 'node:assert';
import {
  ScanlineDecoder,
  compressImageData,
  expectedDataLength,
  getScanlineLayout
} from '../../src/png-decompress.js';
import { FilterType } from '../../src/png-filter.js';
import { inflateData } from '../../src/streaming-inflate.js';
import { ConstraintError, FormatError } from '../../src/errors.js';
import { ColorType } from '../../src/types.js';
import type { PngHeader } from '../../src/types.js';
import { concatBytes } from '../../src/utils.js';

function header(width: number, height: number, bitDepth: PngHeader['bitDepth'], colorType: ColorType, interlaced = false): PngHeader {
  return { width, height, bitDepth, colorType, interlaced };
}

function rawImageData(h: PngHeader, samples: number[], filter: FilterType | 'adaptive' = 'adaptive'): Uint8Array {
  return inflateData(concatBytes([...compressImageData(h, samples, { filter })]));
}

test('getScanlineLayout uses one pass unless interlaced', () => {
  assert.strictEqual(getScanlineLayout(header(8, 8, 8, ColorType.GRAYSCALE)).length, 1);
  assert.strictEqual(getScanlineLayout(header(8, 8, 8, ColorType.GRAYSCALE, true)).length, 7);
  assert.strictEqual(getScanlineLayout(header(1, 1, 8, ColorType.GRAYSCALE, true)).length, 1);
});

test('expectedDataLength counts a filter byte per row of every pass', () => {
  assert.strictEqual(expectedDataLength(header(2, 1, 8, ColorType.GRAYSCALE)), 3);
  assert.strictEqual(expectedDataLength(header(8, 8, 1, ColorType.GRAYSCALE)), 16);
  // 15 rows across the seven passes, each 1 filter byte + 1 packed byte
  assert.strictEqual(expectedDataLength(header(8, 8, 1, ColorType.GRAYSCALE, true)), 30);
  assert.strictEqual(expectedDataLength(header(3, 2, 16, ColorType.RGBA)), 2 * (1 + 24));
});

test('compressImageData writes the chosen filter for every row', () => {
  const h = header(3, 2, 8, ColorType.GRAYSCALE);
  assert.deepStrictEqual(Array.from(rawImageData(h, [1, 2, 3, 4, 5, 6], FilterType.Sub)), [
    1, 1, 1, 1,
    1, 4, 1, 1
  ]);
  assert.deepStrictEqual(Array.from(rawImageData(h, [1, 2, 3, 4, 5, 6], FilterType.Up)), [
    2, 1, 2, 3,
    2, 3, 3, 3
  ]);
});

test('compressImageData filters each pass from its own first row', () => {
  const h = header(2, 2, 8, ColorType.GRAYSCALE, true);
  // passes 1, 6 and 7 hold (0,0), (1,0) and row 1
  assert.deepStrictEqual(Array.from(rawImageData(h, [10, 20, 30, 40], FilterType.Up)), [
    2, 10,
    2, 20,
    2, 30, 40
  ]);
});

test('compressImageData rejects a wrong sample count', () => {
  assert.throws(
    () => [...compressImageData(header(2, 2, 8, ColorType.RGB), [1, 2, 3])],
    (err: unknown) => err instanceof ConstraintError && err.message === 'Expected 12 samples for 2x2x3, got 3'
  );
});

test('ScanlineDecoder unfilters rows with no previous row at the top', () => {
  const decoder = new ScanlineDecoder(header(2, 2, 8, ColorType.GRAYSCALE));
  decoder.push(new Uint8Array([2, 5, 6, 2, 1, 1]));

  assert.strictEqual(decoder.complete, true);
  assert.deepStrictEqual(Array.from(decoder.finish().samples), [5, 6, 6, 7]);
});

test('ScanlineDecoder places interlaced passes', () => {
  const decoder = new ScanlineDecoder(header(2, 2, 8, ColorType.GRAYSCALE, true));
  decoder.push(new Uint8Array([2, 10, 2, 20, 2, 30, 40]));
  assert.deepStrictEqual(Array.from(decoder.finish().samples), [10, 20, 30, 40]);
});

test('ScanlineDecoder gives the same raster for any slicing', () => {
  const h = header(9, 6, 4, ColorType.GRAYSCALE, true);
  const samples = Array.from({ length: 54 }, (_, i) => (i * 5) % 16);
  const raw = rawImageData(h, samples);

  for (const size of [1, 2, 7, raw.length]) {
    const decoder = new ScanlineDecoder(h);
    for (let offset = 0; offset < raw.length; offset += size) {
      decoder.push(raw.subarray(offset, offset + size));
    }
    assert.deepStrictEqual(Array.from(decoder.finish().samples), samples, `slice size ${size}`);
  }
});

test('ScanlineDecoder counts surplus bytes and exposes partial rasters', () => {
  const decoder = new ScanlineDecoder(header(2, 2, 8, ColorType.GRAYSCALE));
  decoder.push(new Uint8Array([0, 7, 8]));

  assert.strictEqual(decoder.complete, false);
  assert.deepStrictEqual(Array.from(decoder.raster.samples), [7, 8, 0, 0]);
  assert.throws(
    () => decoder.finish(),
    (err: unknown) =>
      err instanceof FormatError && err.message === 'Image data too short: 3 more decompressed bytes expected'
  );

  decoder.push(new Uint8Array([0, 9, 9, 1, 2]));
  assert.strictEqual(decoder.surplusBytes, 2);
  assert.deepStrictEqual(Array.from(decoder.finish().samples), [7, 8, 9, 9]);
});

test('ScanlineDecoder checks palette indices', () => {
  const decoder = new ScanlineDecoder(header(4, 1, 2, ColorType.PALETTE), { paletteSize: 3 });
  // indices 0, 1, 2, 3 packed MSB first
  assert.throws(
    () => decoder.push(new Uint8Array([0, 0x1b])),
    (err: unknown) =>
      err instanceof FormatError && err.message === 'Palette index 3 at (3, 0) out of range (3 entries)'
  );
});

test('ScanlineDecoder refuses rasters above the sample limit', () => {
  assert.throws(
    () => new ScanlineDecoder(header(50000, 50000, 8, ColorType.GRAYSCALE)),
    (err: unknown) =>
      err instanceof FormatError &&
      err.message === 'Image 50000x50000 with 1 channels is too large to decode' &&
      err.chunkType === 'IHDR'
  );
});
