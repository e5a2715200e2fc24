import { test } from 'node:test';
import assert from 'node:assert';
import {
  ADAM7_PASSES,
  PassCanvas,
  extractPass,
  getAdam7Passes,
  getFullImageLayout,
  getPassDimensions
} from '../../src/adam7.js';
import { FormatError } from '../../src/errors.js';
import type { PngRaster } from '../../src/types.js';

test('getPassDimensions for an 8x8 image', () => {
  const sizes = ADAM7_PASSES.map((pass) => getPassDimensions(8, 8, pass));
  assert.deepStrictEqual(sizes, [
    { width: 1, height: 1 },
    { width: 1, height: 1 },
    { width: 2, height: 1 },
    { width: 2, height: 2 },
    { width: 4, height: 2 },
    { width: 4, height: 4 },
    { width: 8, height: 4 }
  ]);
});

test('getAdam7Passes skips empty passes', () => {
  assert.deepStrictEqual(getAdam7Passes(1, 1).map((pass) => pass.index), [0]);
  assert.deepStrictEqual(getAdam7Passes(2, 2).map((pass) => pass.index), [0, 5, 6]);
  assert.deepStrictEqual(getAdam7Passes(5, 1).map((pass) => pass.index), [0, 1, 3, 5]);
});

test('every pixel belongs to exactly one pass', () => {
  for (let height = 1; height <= 17; height++) {
    for (let width = 1; width <= 17; width++) {
      const hits = new Uint8Array(width * height);
      for (const pass of getAdam7Passes(width, height)) {
        for (let py = 0; py < pass.height; py++) {
          for (let px = 0; px < pass.width; px++) {
            const x = pass.xStart + px * pass.xStep;
            const y = pass.yStart + py * pass.yStep;
            assert.ok(x < width && y < height, `pass ${pass.index + 1} leaves ${width}x${height}`);
            hits[y * width + x]++;
          }
        }
      }
      assert.ok(hits.every((count) => count === 1), `coverage of ${width}x${height}`);
    }
  }
});

test('getFullImageLayout is a single pass with unit steps', () => {
  assert.deepStrictEqual(getFullImageLayout(3, 2), [
    { xStart: 0, yStart: 0, xStep: 1, yStep: 1, index: 0, width: 3, height: 2 }
  ]);
});

test('PassCanvas reconstructs an interlaced RGBA image from pass rows', () => {
  const canvas = new PassCanvas(2, 2, 4, 8);
  const [pass1, pass6, pass7] = getAdam7Passes(2, 2);

  canvas.placeRow(pass1, 0, [10, 20, 30, 40]);
  canvas.placeRow(pass6, 0, [50, 60, 70, 80]);
  canvas.placeRow(pass7, 0, [90, 100, 110, 120, 130, 140, 150, 160]);

  assert.ok(canvas.isComplete);
  assert.deepStrictEqual(Array.from(canvas.samples), [
    10, 20, 30, 40, 50, 60, 70, 80,
    90, 100, 110, 120, 130, 140, 150, 160
  ]);
});

test('extractPass and PassCanvas are inverses', () => {
  const width = 11;
  const height = 6;
  const samples = new Uint16Array(width * height * 2);
  samples.forEach((_, i) => {
    samples[i] = i * 97;
  });
  const raster: PngRaster = { width, height, channels: 2, bitDepth: 16, samples };

  const canvas = new PassCanvas(width, height, 2, 16);
  for (const pass of getAdam7Passes(width, height)) {
    const passSamples = extractPass(raster, pass);
    assert.strictEqual(passSamples.length, pass.width * pass.height * 2);
    for (let y = 0; y < pass.height; y++) {
      canvas.placeRow(pass, y, passSamples.subarray(y * pass.width * 2, (y + 1) * pass.width * 2));
    }
  }

  canvas.assertComplete();
  assert.deepStrictEqual(canvas.samples, samples);
});

test('assertComplete reports the first pixel no pass wrote', () => {
  const canvas = new PassCanvas(2, 2, 1, 8);
  canvas.placeRow(getAdam7Passes(2, 2)[0], 0, [7]);

  assert.strictEqual(canvas.isComplete, false);
  assert.throws(
    () => canvas.assertComplete(),
    (err: unknown) =>
      err instanceof FormatError && err.message === 'Pixel (1, 0) not covered by image data (3 missing)'
  );
});
