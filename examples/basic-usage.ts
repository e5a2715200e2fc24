/**
 * Basic usage example for scanline-png
 *
 * Encodes a small gradient with some metadata, decodes it again and prints
 * what came back.
 */

import { writeFileSync } from 'node:fs';
import { decodePng, encodePng, physicalToDpi, timestampFromDate, toRgba } from '../src/index.js';
import { ColorType, PngHeader } from '../src/index.js';

/**
 * Helper function to create an RGB gradient
 */
function createGradient(width: number, height: number): number[] {
  const samples: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      samples.push(Math.round((x / (width - 1)) * 255), Math.round((y / (height - 1)) * 255), 128);
    }
  }
  return samples;
}

function main() {
  const header: PngHeader = {
    width: 64,
    height: 32,
    bitDepth: 8,
    colorType: ColorType.RGB,
    interlaced: true
  };

  const png = encodePng(
    {
      header,
      samples: createGradient(header.width, header.height),
      metadata: {
        gamma: 0.45455,
        physical: [144, 'i'],
        lastModified: timestampFromDate(new Date()),
        text: [{ keyword: 'Comment', text: 'Gradient généré ✓' }]
      }
    },
    { textFields: { Title: 'Gradient', Software: 'scanline-png' } }
  );

  writeFileSync('examples/output-gradient.png', png);
  console.log(`✓ Saved: examples/output-gradient.png (${png.length} bytes)`);

  const { metadata, raster } = decodePng(png);
  console.log(`Decoded ${raster.width}x${raster.height}, ${raster.channels} channels`);
  console.log(`Gamma: ${metadata.gamma}`);
  if (metadata.physical) {
    console.log('DPI:', physicalToDpi(metadata.physical));
  }
  for (const entry of metadata.text ?? []) {
    console.log(`  ${entry.keyword}: ${entry.text}${entry.international ? ' (iTXt)' : ''}`);
  }

  const rgba = toRgba({ header, metadata, raster });
  console.log(`First pixel as RGBA: ${Array.from(rgba.samples.subarray(0, 4)).join(', ')}`);
}

main();
