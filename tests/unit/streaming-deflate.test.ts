import { test } from 'node:test';
import assert from 'node:assert';
import { StreamingDeflator, deflateData } from '../../src/streaming-deflate.js';
import { StreamingInflator, inflateData } from '../../src/streaming-inflate.js';
import { ConstraintError, DecompressionError } from '../../src/errors.js';
import { concatBytes, stringToBytes } from '../../src/utils.js';

const text = stringToBytes('scanline '.repeat(200));

test('deflateData output inflates back to the input', () => {
  const compressed = deflateData(text);
  assert.ok(compressed.length < text.length);
  assert.strictEqual(compressed[0], 0x78, 'zlib header');
  assert.deepStrictEqual(inflateData(compressed), text);
});

test('StreamingDeflator emits a single zlib stream for many pushes', () => {
  const pieces: Uint8Array[] = [];
  const deflator = new StreamingDeflator((chunk) => pieces.push(chunk), { level: 9 });

  for (let offset = 0; offset < text.length; offset += 10) {
    deflator.push(text.subarray(offset, offset + 10));
  }
  deflator.finish();
  deflator.finish();

  assert.deepStrictEqual(inflateData(concatBytes(pieces)), text);
  assert.throws(() => deflator.push(text), /Cannot push after finish\(\)/);
});

test('compression levels outside -1..9 are constraint errors', () => {
  for (const level of [10, -2, 1.5]) {
    assert.throws(
      () => deflateData(text, level),
      (err: unknown) =>
        err instanceof ConstraintError &&
        err.kind === 'constraint' &&
        err.message === `Compression level must be an integer from -1 to 9, got ${level}`
    );
  }
});

test('StreamingInflator accepts input one byte at a time', () => {
  const compressed = deflateData(text);
  const pieces: Uint8Array[] = [];
  const inflator = new StreamingInflator((chunk) => pieces.push(chunk), { chunkSize: 256 });

  for (let i = 0; i < compressed.length; i++) {
    assert.strictEqual(inflator.finished, false);
    inflator.push(compressed.subarray(i, i + 1));
  }
  inflator.finish();

  assert.strictEqual(inflator.finished, true);
  assert.ok(pieces.slice(0, -1).every((piece) => piece.length === 256));
  assert.deepStrictEqual(concatBytes(pieces), text);
});

test('StreamingInflator counts input after the end of the stream', () => {
  const inflator = new StreamingInflator(() => undefined);
  inflator.push(deflateData(text));
  inflator.push(new Uint8Array([1, 2, 3]));
  inflator.push(new Uint8Array([4]));
  inflator.finish();

  assert.strictEqual(inflator.trailingBytes, 4);
});

test('an unfinished stream fails on finish', () => {
  const compressed = deflateData(text);
  const inflator = new StreamingInflator(() => undefined, { chunkType: 'zTXt' });
  inflator.push(compressed.subarray(0, compressed.length - 4));

  assert.throws(
    () => inflator.finish(),
    (err: unknown) =>
      err instanceof DecompressionError &&
      err.message === 'Compressed data ended before the end of the zlib stream' &&
      err.chunkType === 'zTXt'
  );
});

test('a corrupt header fails on push', () => {
  const inflator = new StreamingInflator(() => undefined, { chunkType: 'IDAT' });
  assert.throws(
    () => inflator.push(new Uint8Array([1, 2, 3, 4])),
    (err: unknown) =>
      err instanceof DecompressionError && err.message === 'Inflate error: incorrect header check' && err.chunkType === 'IDAT'
  );
});
