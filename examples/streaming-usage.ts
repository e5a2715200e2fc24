/**
 * Streaming usage example for scanline-png
 *
 * Writes a large image chunk by chunk and reads it back from a file stream,
 * so neither side holds the whole file in memory.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { once } from 'node:events';
import { decodePngStream, encodePngChunks } from '../src/index.js';
import { ColorType, PngHeader } from '../src/index.js';

const OUTPUT = 'examples/output-stream.png';

async function main() {
  const header: PngHeader = {
    width: 2000,
    height: 2000,
    bitDepth: 8,
    colorType: ColorType.GRAYSCALE,
    interlaced: false
  };

  const samples = new Uint8Array(header.width * header.height);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = (i % header.width) ^ Math.floor(i / header.width);
  }

  console.log('[Writing] one IDAT chunk per 64KB of compressed data...');
  const output = createWriteStream(OUTPUT);
  let pieces = 0;
  for (const piece of encodePngChunks({ header, samples }, { chunkSizeLimit: 64 * 1024 })) {
    if (!output.write(piece)) {
      await once(output, 'drain');
    }
    pieces++;
  }
  output.end();
  await once(output, 'finish');
  console.log(`✓ Saved: ${OUTPUT} (${pieces} pieces)`);

  console.log('[Reading] decoding from a file stream...');
  const decoded = await decodePngStream(createReadStream(OUTPUT));
  console.log(`✓ Decoded ${decoded.header.width}x${decoded.header.height}`);
}

main().catch(console.error);
