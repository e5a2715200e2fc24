import { FormatError } from './errors.js';
import { ColorType } from './types.js';
import type { PngHeader, PngMetadata, PngRaster } from './types.js';
import { createSampleArray } from './sample-codec.js';

/**
 * Scale a sample value from one bit depth to another
 */
export function scaleSample(value: number, fromBits: number, toBits: number): number {
  if (fromBits === toBits) return value;

  const fromMax = (1 << fromBits) - 1;
  const toMax = (1 << toBits) - 1;
  return Math.round((value * toMax) / fromMax);
}

/**
 * Convert a decoded image to RGBA at 8 or 16 bits per sample.
 *
 * Palette entries are looked up (with their tRNS alpha), grayscale is
 * replicated into RGB, and a gray or RGB tRNS key makes matching pixels
 * fully transparent. Everything else is opaque.
 */
export function toRgba(
  image: { header: PngHeader; metadata: PngMetadata; raster: PngRaster },
  targetBitDepth: 8 | 16 = 8
): PngRaster {
  const { header, metadata, raster } = image;
  const { width, height, samples } = raster;
  const sourceBits = raster.bitDepth;
  const opaque = targetBitDepth === 16 ? 0xffff : 0xff;
  const out = createSampleArray(width * height * 4, targetBitDepth);
  const transparency = metadata.transparency;

  const write = (pixel: number, r: number, g: number, b: number, a: number) => {
    const o = pixel * 4;
    out[o] = r;
    out[o + 1] = g;
    out[o + 2] = b;
    out[o + 3] = a;
  };

  const pixelCount = width * height;

  switch (header.colorType) {
    case ColorType.PALETTE: {
      const palette = metadata.palette ?? [];
      const alphas = transparency?.kind === 'palette' ? transparency.alphas : [];
      for (let p = 0; p < pixelCount; p++) {
        const index = samples[p];
        const entry = palette[index];
        if (!entry) {
          throw new FormatError(`Palette index ${index} out of range (${palette.length} entries)`);
        }
        write(
          p,
          scaleSample(entry[0], 8, targetBitDepth),
          scaleSample(entry[1], 8, targetBitDepth),
          scaleSample(entry[2], 8, targetBitDepth),
          scaleSample(alphas[index] ?? 0xff, 8, targetBitDepth)
        );
      }
      break;
    }

    case ColorType.GRAYSCALE: {
      const key = transparency?.kind === 'gray' ? transparency.value : -1;
      for (let p = 0; p < pixelCount; p++) {
        const gray = scaleSample(samples[p], sourceBits, targetBitDepth);
        write(p, gray, gray, gray, samples[p] === key ? 0 : opaque);
      }
      break;
    }

    case ColorType.RGB: {
      const key = transparency?.kind === 'rgb' ? transparency.value : null;
      for (let p = 0; p < pixelCount; p++) {
        const s = p * 3;
        const r = samples[s];
        const g = samples[s + 1];
        const b = samples[s + 2];
        const transparent = key !== null && r === key[0] && g === key[1] && b === key[2];
        write(
          p,
          scaleSample(r, sourceBits, targetBitDepth),
          scaleSample(g, sourceBits, targetBitDepth),
          scaleSample(b, sourceBits, targetBitDepth),
          transparent ? 0 : opaque
        );
      }
      break;
    }

    case ColorType.GRAYSCALE_ALPHA:
      for (let p = 0; p < pixelCount; p++) {
        const gray = scaleSample(samples[p * 2], sourceBits, targetBitDepth);
        write(p, gray, gray, gray, scaleSample(samples[p * 2 + 1], sourceBits, targetBitDepth));
      }
      break;

    case ColorType.RGBA:
      for (let i = 0; i < pixelCount * 4; i++) {
        out[i] = scaleSample(samples[i], sourceBits, targetBitDepth);
      }
      break;
  }

  return { width, height, channels: 4, bitDepth: targetBitDepth, samples: out };
}
