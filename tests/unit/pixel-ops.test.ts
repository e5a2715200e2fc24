import { test } from 'node:test';
import assert from 'node:assert';
import { scaleSample, toRgba } from '../../src/pixel-ops.js';
import { FormatError } from '../../src/errors.js';
import { ColorType } from '../../src/types.js';
import type { BitDepth, PngHeader, PngMetadata, PngRaster } from '../../src/types.js';
import { createSampleArray } from '../../src/sample-codec.js';
import { getSamplesPerPixel } from '../../src/utils.js';

function image(colorType: ColorType, bitDepth: BitDepth, samples: number[], metadata: PngMetadata = {}) {
  const channels = getSamplesPerPixel(colorType);
  const width = samples.length / channels;
  const header: PngHeader = { width, height: 1, bitDepth, colorType, interlaced: false };
  const stored = createSampleArray(samples.length, bitDepth);
  stored.set(samples);
  const raster: PngRaster = { width, height: 1, channels, bitDepth, samples: stored };
  return { header, metadata, raster };
}

test('scaleSample maps full range to full range', () => {
  assert.strictEqual(scaleSample(1, 1, 8), 255);
  assert.strictEqual(scaleSample(2, 2, 8), 170);
  assert.strictEqual(scaleSample(255, 8, 16), 65535);
  assert.strictEqual(scaleSample(0x8000, 16, 8), 128);
  assert.strictEqual(scaleSample(42, 8, 8), 42);
});

test('palette pixels take their alpha from tRNS', () => {
  const rgba = toRgba(image(ColorType.PALETTE, 8, [0, 1], {
    palette: [[10, 20, 30], [40, 50, 60]],
    transparency: { kind: 'palette', alphas: [0] }
  }));

  assert.strictEqual(rgba.channels, 4);
  assert.strictEqual(rgba.bitDepth, 8);
  assert.deepStrictEqual(Array.from(rgba.samples), [10, 20, 30, 0, 40, 50, 60, 255]);
});

test('palette indices outside the palette are rejected', () => {
  assert.throws(
    () => toRgba(image(ColorType.PALETTE, 2, [2], { palette: [[0, 0, 0], [1, 1, 1]] })),
    (err: unknown) => err instanceof FormatError && err.message === 'Palette index 2 out of range (2 entries)'
  );
});

test('grayscale is replicated and the tRNS key becomes transparent', () => {
  const rgba = toRgba(image(ColorType.GRAYSCALE, 16, [0, 65535, 1000], {
    transparency: { kind: 'gray', value: 1000 }
  }));

  // 1000 * 255 / 65535 = 3.89
  assert.deepStrictEqual(Array.from(rgba.samples), [0, 0, 0, 255, 255, 255, 255, 255, 4, 4, 4, 0]);
});

test('low bit depths are stretched', () => {
  assert.deepStrictEqual(Array.from(toRgba(image(ColorType.GRAYSCALE, 1, [0, 1])).samples), [
    0, 0, 0, 255, 255, 255, 255, 255
  ]);

  const wide = toRgba(image(ColorType.GRAYSCALE, 4, [5]), 16);
  assert.ok(wide.samples instanceof Uint16Array);
  assert.deepStrictEqual(Array.from(wide.samples), [21845, 21845, 21845, 65535]);
});

test('RGB pixels equal to the tRNS key are transparent', () => {
  const rgba = toRgba(image(ColorType.RGB, 8, [1, 2, 3, 4, 5, 6], {
    transparency: { kind: 'rgb', value: [4, 5, 6] }
  }));
  assert.deepStrictEqual(Array.from(rgba.samples), [1, 2, 3, 255, 4, 5, 6, 0]);
});

test('alpha channels are carried over', () => {
  assert.deepStrictEqual(Array.from(toRgba(image(ColorType.GRAYSCALE_ALPHA, 8, [100, 50])).samples), [
    100, 100, 100, 50
  ]);
  // 32768 * 255 / 65535 = 127.5; 257 * 255 / 65535 = 1
  assert.deepStrictEqual(Array.from(toRgba(image(ColorType.RGBA, 16, [65535, 0, 32768, 257])).samples), [
    255, 0, 128, 1
  ]);
});
