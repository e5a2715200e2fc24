import { test } from 'node:test';
import assert from 'node:assert';
import { PngDecoder, decodePng, decodePngStream } from '../../src/png-decoder.js';
import { encodePng, encodePngChunks } from '../../src/png-encoder.js';
import { parsePngChunks, splitPngStream } from '../../src/png-parser.js';
import { buildPng, createChunk, createIEND, createIHDR } from '../../src/png-writer.js';
import { inflateData } from '../../src/streaming-inflate.js';
import { deflateData } from '../../src/streaming-deflate.js';
import { FilterType } from '../../src/png-filter.js';
import { ConstraintError, DecompressionError, FormatError, FramingError } from '../../src/errors.js';
import { ColorType } from '../../src/types.js';
import type { BitDepth, PngChunk, PngHeader, PngImageInput, RgbTriple } from '../../src/types.js';
import { PNG_SIGNATURE, getSamplesPerPixel } from '../../src/utils.js';

function noise(count: number, modulo: number, seed = 1): number[] {
  const values: number[] = [];
  let state = seed;
  for (let i = 0; i < count; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    values.push((state >>> 16) % modulo);
  }
  return values;
}

type NoiseImage = PngImageInput & { samples: number[] };

function noiseImage(header: PngHeader, seed = 1): NoiseImage {
  const channels = getSamplesPerPixel(header.colorType);
  const count = header.width * header.height * channels;

  if (header.colorType === ColorType.PALETTE) {
    const entries = Math.min(256, 1 << header.bitDepth);
    const palette = Array.from({ length: entries }, (_, i): RgbTriple => [i, 255 - i, (i * 7) & 0xff]);
    return { header, metadata: { palette }, samples: noise(count, entries, seed) };
  }
  return { header, samples: noise(count, 2 ** header.bitDepth, seed) };
}

/** PNG whose IDAT holds exactly `raw` as decompressed data */
function pngWithRawData(header: PngHeader, raw: number[], before: PngChunk[] = []): Uint8Array {
  return buildPng([
    createIHDR(header),
    ...before,
    createChunk('IDAT', deflateData(new Uint8Array(raw))),
    createIEND()
  ]);
}

const gray2x1: PngHeader = { width: 2, height: 1, bitDepth: 8, colorType: ColorType.GRAYSCALE, interlaced: false };

test('a 2x2 RGB image with filter None stores plain rows', () => {
  const samples = [255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255];
  const header: PngHeader = { width: 2, height: 2, bitDepth: 8, colorType: ColorType.RGB, interlaced: false };

  const png = encodePng({ header, samples }, { filter: FilterType.None });
  const chunks = parsePngChunks(png);

  assert.deepStrictEqual(chunks.map((chunk) => chunk.type), ['IHDR', 'IDAT', 'IEND']);
  assert.deepStrictEqual(Array.from(inflateData(splitPngStream(png).imageData)), [
    0, 255, 0, 0, 0, 255, 0,
    0, 0, 0, 255, 255, 255, 255
  ]);

  const decoded = decodePng(png);
  assert.deepStrictEqual(decoded.header, header);
  assert.deepStrictEqual(decoded.metadata, {});
  assert.deepStrictEqual(decoded.raster.channels, 3);
  assert.deepStrictEqual(Array.from(decoded.raster.samples), samples);
});

test('samples survive encode and decode across color types and depths', () => {
  const cases: Array<[ColorType, BitDepth, boolean]> = [
    [ColorType.GRAYSCALE, 1, false],
    [ColorType.GRAYSCALE, 2, true],
    [ColorType.GRAYSCALE, 4, false],
    [ColorType.GRAYSCALE, 16, true],
    [ColorType.RGB, 8, true],
    [ColorType.RGB, 16, false],
    [ColorType.PALETTE, 1, true],
    [ColorType.PALETTE, 4, false],
    [ColorType.PALETTE, 8, true],
    [ColorType.GRAYSCALE_ALPHA, 8, false],
    [ColorType.GRAYSCALE_ALPHA, 16, true],
    [ColorType.RGBA, 8, false],
    [ColorType.RGBA, 16, true]
  ];

  for (const [colorType, bitDepth, interlaced] of cases) {
    const header: PngHeader = { width: 13, height: 7, bitDepth, colorType, interlaced };
    const image = noiseImage(header);
    const decoded = decodePng(encodePng(image));

    const label = `color type ${colorType}, depth ${bitDepth}, interlaced ${interlaced}`;
    assert.deepStrictEqual(decoded.header, header, label);
    assert.strictEqual(decoded.raster.samples instanceof Uint16Array, bitDepth === 16, label);
    assert.deepStrictEqual(Array.from(decoded.raster.samples), image.samples, label);
  }
});

test('interlacing changes the bytes but not the image', () => {
  for (const [width, height] of [[1, 1], [2, 1], [3, 3], [9, 17]]) {
    const header: PngHeader = { width, height, bitDepth: 8, colorType: ColorType.RGBA, interlaced: false };
    const image = noiseImage(header, width * 31 + height);

    const plain = encodePng(image);
    const interlaced = encodePng({ ...image, header: { ...header, interlaced: true } });
    assert.strictEqual(interlaced[8 + 8 + 12], 1, 'IHDR interlace byte');

    const a = decodePng(plain);
    const b = decodePng(interlaced);
    assert.strictEqual(b.header.interlaced, true);
    assert.deepStrictEqual(b.raster.samples, a.raster.samples, `${width}x${height}`);
  }
});

test('chunkSizeLimit changes framing only', () => {
  const header: PngHeader = { width: 32, height: 32, bitDepth: 8, colorType: ColorType.RGB, interlaced: false };
  const image = noiseImage(header);

  const single = encodePng(image);
  const split = encodePng(image, { chunkSizeLimit: 100 });

  const singleParts = splitPngStream(single);
  const splitParts = splitPngStream(split);
  const lengths = parsePngChunks(split).filter((chunk) => chunk.type === 'IDAT').map((chunk) => chunk.length);

  assert.strictEqual(singleParts.dataChunkCount, 1);
  assert.strictEqual(splitParts.dataChunkCount, Math.ceil(singleParts.imageData.length / 100));
  assert.ok(lengths.slice(0, -1).every((length) => length === 100));
  assert.ok(lengths[lengths.length - 1] > 0 && lengths[lengths.length - 1] <= 100);
  assert.deepStrictEqual(splitParts.imageData, singleParts.imageData);
  assert.deepStrictEqual(decodePng(split).raster.samples, decodePng(single).raster.samples);
});

test('encodePngChunks yields the signature and then one piece per chunk', () => {
  const header: PngHeader = { width: 4, height: 4, bitDepth: 8, colorType: ColorType.GRAYSCALE, interlaced: false };
  const pieces = [...encodePngChunks(noiseImage(header), { chunkSizeLimit: 5 })];
  const png = encodePng(noiseImage(header), { chunkSizeLimit: 5 });
  const chunkCount = parsePngChunks(png).length;

  assert.deepStrictEqual(pieces[0], PNG_SIGNATURE);
  assert.notStrictEqual(pieces[0], PNG_SIGNATURE);
  assert.strictEqual(pieces.length, 1 + chunkCount);
  assert.strictEqual(pieces.reduce((sum, piece) => sum + piece.length, 0), png.length);
});

test('incremental decoding matches whole-buffer decoding', () => {
  const header: PngHeader = { width: 11, height: 9, bitDepth: 16, colorType: ColorType.GRAYSCALE_ALPHA, interlaced: true };
  const png = encodePng(noiseImage(header), { chunkSizeLimit: 64 });
  const expected = decodePng(png);

  const decoder = new PngDecoder();
  assert.strictEqual(decoder.header, null);
  for (let i = 0; i < png.length; i++) {
    decoder.push(png.subarray(i, i + 1));
  }
  assert.deepStrictEqual(decoder.header, header);
  assert.deepStrictEqual(decoder.finish(), expected);
});

test('decodePngStream reads an async source', async () => {
  const header: PngHeader = { width: 5, height: 5, bitDepth: 8, colorType: ColorType.RGB, interlaced: false };
  const image = noiseImage(header);
  const png = encodePng(image);

  async function* slices(): AsyncGenerator<Uint8Array> {
    for (let offset = 0; offset < png.length; offset += 7) {
      yield png.slice(offset, offset + 7);
    }
  }

  const decoded = await decodePngStream(slices());
  assert.deepStrictEqual(Array.from(decoded.raster.samples), image.samples);
});

test('a multi-megabyte single IDAT decodes from small slices', async () => {
  const side = 2048;
  const header: PngHeader = { width: side, height: side, bitDepth: 8, colorType: ColorType.GRAYSCALE, interlaced: false };
  const samples = new Uint8Array(side * side);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = (i * 7 + (i >>> 11) * 13) & 0xff;
  }
  const png = encodePng({ header, samples }, { filter: FilterType.None, compressionLevel: 0 });
  assert.strictEqual(splitPngStream(png).dataChunkCount, 1);
  assert.ok(png.length > 4000000);

  function* slices(): Generator<Uint8Array> {
    for (let offset = 0; offset < png.length; offset += 4096) {
      yield png.subarray(offset, offset + 4096);
    }
  }

  const decoded = await decodePngStream(slices());
  assert.ok(decoded.raster.samples instanceof Uint8Array);
  assert.strictEqual(Buffer.compare(decoded.raster.samples, samples), 0);
});

test('metadata and textFields travel through the codec', () => {
  const header: PngHeader = { width: 2, height: 2, bitDepth: 2, colorType: ColorType.PALETTE, interlaced: false };
  const png = encodePng(
    {
      header,
      metadata: {
        palette: [[0, 0, 0], [255, 255, 255]],
        transparency: { kind: 'palette', alphas: [0] },
        physical: [72, 'inch'],
        text: [{ keyword: 'Comment', text: 'hello' }]
      },
      samples: [0, 1, 1, 0]
    },
    { textFields: { Software: 'test-suite' } }
  );

  assert.deepStrictEqual(parsePngChunks(png).map((chunk) => chunk.type), [
    'IHDR', 'PLTE', 'tRNS', 'pHYs', 'tEXt', 'tEXt', 'IDAT', 'IEND'
  ]);

  const { metadata, raster } = decodePng(png);
  assert.deepStrictEqual(metadata.palette, [[0, 0, 0], [255, 255, 255]]);
  assert.deepStrictEqual(metadata.transparency, { kind: 'palette', alphas: [0] });
  assert.deepStrictEqual(metadata.physical, { x: 2835, y: 2835, unit: 1 });
  assert.deepStrictEqual(metadata.text?.map((entry) => entry.text), ['hello', 'test-suite']);
  assert.deepStrictEqual(Array.from(raster.samples), [0, 1, 1, 0]);
});

test('significant bits are applied only on request', () => {
  const png = encodePng({ header: gray2x1, metadata: { significantBits: [5] }, samples: [248, 128] });

  assert.deepStrictEqual(Array.from(decodePng(png).raster.samples), [248, 128]);
  assert.deepStrictEqual(
    Array.from(decodePng(png, { applySignificantBits: true }).raster.samples),
    [255, 132]
  );
});

test('encoder rejects inconsistent input', () => {
  const palette: PngHeader = { width: 2, height: 1, bitDepth: 8, colorType: ColorType.PALETTE, interlaced: false };

  assert.throws(
    () => encodePng({ header: gray2x1, samples: [1, 2, 3] }),
    (err: unknown) => err instanceof ConstraintError && err.message === 'Expected 2 samples for 2x1x1, got 3'
  );
  assert.throws(
    () => encodePng({ header: { ...palette, bitDepth: 16 }, metadata: { palette: [[0, 0, 0]] }, samples: [0, 0] }),
    (err: unknown) => err instanceof ConstraintError && err.message === 'Bit depth 16 is invalid for Indexed-color'
  );
  assert.throws(
    () => encodePng({ header: palette, metadata: { palette: [[0, 0, 0], [1, 1, 1]] }, samples: [0, 3] }),
    (err: unknown) =>
      err instanceof ConstraintError && err.message === 'Palette index 3 at sample 1 out of range (2 entries)'
  );
  assert.throws(() => encodePng({ header: gray2x1, samples: [1, 2] }, { chunkSizeLimit: 0 }), ConstraintError);
});

test('structural problems are FormatErrors', () => {
  const data = deflateData(new Uint8Array([0, 1, 2]));
  const ihdr = createIHDR(gray2x1);
  const idat = createChunk('IDAT', data);
  const paletteHeader: PngHeader = { ...gray2x1, colorType: ColorType.PALETTE };

  const cases: Array<[PngChunk[], string]> = [
    [[createChunk('tEXt', new Uint8Array([65, 0])), ihdr, idat, createIEND()], 'First chunk must be IHDR'],
    [[ihdr, ihdr, idat, createIEND()], 'Duplicate IHDR chunk'],
    [[ihdr, createIEND()], 'No IDAT chunks found in PNG'],
    [[createIHDR(paletteHeader), idat, createIEND()], 'Missing PLTE chunk before image data'],
    [
      [
        ihdr,
        createChunk('IDAT', data.subarray(0, 2)),
        createChunk('tEXt', new Uint8Array([65, 0])),
        createChunk('IDAT', data.subarray(2)),
        createIEND()
      ],
      'IDAT chunks must be consecutive'
    ]
  ];

  for (const [chunks, message] of cases) {
    assert.throws(
      () => decodePng(buildPng(chunks)),
      (err: unknown) => err instanceof FormatError && err.message === message,
      message
    );
  }
});

test('image data problems are reported with their position', () => {
  const paletteHeader: PngHeader = { ...gray2x1, colorType: ColorType.PALETTE };
  const plte = createChunk('PLTE', new Uint8Array([0, 0, 0, 255, 255, 255]));

  const cases: Array<[Uint8Array, string]> = [
    [pngWithRawData(gray2x1, [5, 0, 0]), 'Unknown filter type: 5 (pass 1, row 0)'],
    [pngWithRawData(gray2x1, [0, 1]), 'Image data too short: 1 more decompressed bytes expected'],
    [pngWithRawData(paletteHeader, [0, 1, 5], [plte]), 'Palette index 5 at (1, 0) out of range (2 entries)']
  ];

  for (const [png, message] of cases) {
    assert.throws(
      () => decodePng(png),
      (err: unknown) => err instanceof FormatError && err.message === message && err.chunkType === 'IDAT',
      message
    );
  }
});

test('damaged framing and compression are detected', () => {
  const png = encodePng(noiseImage(gray2x1));
  const corrupted = png.slice();
  corrupted[8 + 25 + 8] ^= 0xff; // first IDAT payload byte

  assert.throws(
    () => decodePng(corrupted),
    (err: unknown) => err instanceof FramingError && err.message === 'CRC mismatch for chunk IDAT'
  );

  const data = deflateData(new Uint8Array([0, 1, 2]));
  const truncated = buildPng([createIHDR(gray2x1), createChunk('IDAT', data.subarray(0, data.length - 4)), createIEND()]);
  assert.throws(
    () => decodePng(truncated),
    (err: unknown) =>
      err instanceof DecompressionError &&
      err.message === 'Compressed data ended before the end of the zlib stream' &&
      err.chunkType === 'IDAT'
  );
});

test('recoverable anomalies are logged', () => {
  const messages: string[] = [];
  const logger = (message: string) => messages.push(message);

  const surplus = pngWithRawData(gray2x1, [0, 1, 2, 3]);
  assert.deepStrictEqual(Array.from(decodePng(surplus, { logger }).raster.samples), [1, 2]);

  const data = deflateData(new Uint8Array([0, 1, 2]));
  const trailing = buildPng([
    createIHDR(gray2x1),
    createChunk('IDAT', data),
    createChunk('IDAT', new Uint8Array([1, 2, 3])),
    createIEND()
  ]);
  decodePng(trailing, { logger });

  const withExtra = new Uint8Array(trailing.length + 2);
  withExtra.set(trailing);
  decodePng(withExtra, { logger });

  assert.deepStrictEqual(messages, [
    'Ignoring 1 bytes of surplus decompressed image data',
    'Ignoring 3 bytes after the end of the compressed image data',
    'Ignoring data after IEND chunk (2 bytes)',
    'Ignoring 3 bytes after the end of the compressed image data'
  ]);
});

test('allowPartial returns the rows decoded before a truncation', () => {
  const header: PngHeader = { width: 200, height: 200, bitDepth: 8, colorType: ColorType.GRAYSCALE, interlaced: false };
  const image = noiseImage(header, 7);
  const png = encodePng(image, { filter: FilterType.None, compressionLevel: 0, chunkSizeLimit: 8192 });
  assert.strictEqual(splitPngStream(png).dataChunkCount, 5);

  // signature, IHDR, three full IDAT chunks and part of the fourth
  const cut = png.subarray(0, 8 + 25 + 3 * (8192 + 12) + 100);

  assert.throws(() => decodePng(cut), FramingError);

  const partial = decodePng(cut, { allowPartial: true });
  assert.ok(partial.error instanceof FramingError);
  assert.strictEqual(partial.error.message, 'Truncated PNG stream inside chunk IDAT');
  assert.deepStrictEqual(partial.header, header);
  assert.strictEqual(partial.raster.samples.length, 200 * 200);

  const rows = 80;
  assert.deepStrictEqual(
    Array.from(partial.raster.samples.subarray(0, rows * 200)),
    image.samples.slice(0, rows * 200)
  );
  assert.ok(Array.from(partial.raster.samples.subarray(199 * 200)).every((value) => value === 0));
});

test('allowPartial still throws before the header is known', () => {
  assert.throws(
    () => decodePng(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9]), { allowPartial: true }),
    (err: unknown) => err instanceof FramingError && err.message === 'Invalid PNG signature'
  );
});

test('headers too large to allocate are refused up front', () => {
  const huge: PngHeader = { width: 65535, height: 65535, bitDepth: 16, colorType: ColorType.RGBA, interlaced: false };
  const png = buildPng([createIHDR(huge), createChunk('IDAT', deflateData(new Uint8Array(0))), createIEND()]);

  for (const allowPartial of [false, true]) {
    assert.throws(
      () => decodePng(png, { allowPartial }),
      (err: unknown) =>
        err instanceof FormatError &&
        err.message === 'Image 65535x65535 with 4 channels is too large to decode' &&
        err.chunkType === 'IHDR'
    );
  }
});
