import { FormatError } from './errors.js';
import type { FilterCostFunction, FilterStrategy } from './types.js';
import { getSamplesPerPixel } from './utils.js';

/**
 * PNG Filter Types
 * Each scanline in a PNG is preceded by a filter type byte
 */
export enum FilterType {
  None = 0,
  Sub = 1,
  Up = 2,
  Average = 3,
  Paeth = 4
}

/**
 * Filter types in tie-breaking order for adaptive selection
 */
export const FILTER_TYPES: readonly FilterType[] = [
  FilterType.None,
  FilterType.Sub,
  FilterType.Up,
  FilterType.Average,
  FilterType.Paeth
];

/**
 * Paeth predictor function used in PNG filtering.
 * Ties resolve to a (left), then b (up), then c (upper left).
 */
export function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);

  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/**
 * Unfilter a PNG scanline
 * @param filterType The filter type byte
 * @param scanline The filtered scanline (without filter type byte)
 * @param previousLine The previous unfiltered scanline (or null for first line)
 * @param bytesPerPixel Number of bytes per pixel
 */
export function unfilterScanline(
  filterType: number,
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): Uint8Array {
  const result = new Uint8Array(scanline.length);

  switch (filterType) {
    case FilterType.None:
      result.set(scanline);
      break;

    case FilterType.Sub:
      for (let i = 0; i < scanline.length; i++) {
        const left = i >= bytesPerPixel ? result[i - bytesPerPixel] : 0;
        result[i] = (scanline[i] + left) & 0xff;
      }
      break;

    case FilterType.Up:
      for (let i = 0; i < scanline.length; i++) {
        const up = previousLine ? previousLine[i] : 0;
        result[i] = (scanline[i] + up) & 0xff;
      }
      break;

    case FilterType.Average:
      for (let i = 0; i < scanline.length; i++) {
        const left = i >= bytesPerPixel ? result[i - bytesPerPixel] : 0;
        const up = previousLine ? previousLine[i] : 0;
        result[i] = (scanline[i] + ((left + up) >>> 1)) & 0xff;
      }
      break;

    case FilterType.Paeth:
      for (let i = 0; i < scanline.length; i++) {
        const left = i >= bytesPerPixel ? result[i - bytesPerPixel] : 0;
        const up = previousLine ? previousLine[i] : 0;
        const upLeft = previousLine && i >= bytesPerPixel ? previousLine[i - bytesPerPixel] : 0;
        result[i] = (scanline[i] + paethPredictor(left, up, upLeft)) & 0xff;
      }
      break;

    default:
      throw new FormatError(`Unknown filter type: ${filterType}`);
  }

  return result;
}

/**
 * Apply one filter to a raw scanline.
 * Exact inverse of {@link unfilterScanline} for the same previous line.
 */
export function applyFilter(
  filterType: FilterType,
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): Uint8Array {
  const result = new Uint8Array(scanline.length);

  switch (filterType) {
    case FilterType.None:
      result.set(scanline);
      break;

    case FilterType.Sub:
      for (let i = 0; i < scanline.length; i++) {
        const left = i >= bytesPerPixel ? scanline[i - bytesPerPixel] : 0;
        result[i] = (scanline[i] - left) & 0xff;
      }
      break;

    case FilterType.Up:
      for (let i = 0; i < scanline.length; i++) {
        const up = previousLine ? previousLine[i] : 0;
        result[i] = (scanline[i] - up) & 0xff;
      }
      break;

    case FilterType.Average:
      for (let i = 0; i < scanline.length; i++) {
        const left = i >= bytesPerPixel ? scanline[i - bytesPerPixel] : 0;
        const up = previousLine ? previousLine[i] : 0;
        result[i] = (scanline[i] - ((left + up) >>> 1)) & 0xff;
      }
      break;

    case FilterType.Paeth:
      for (let i = 0; i < scanline.length; i++) {
        const left = i >= bytesPerPixel ? scanline[i - bytesPerPixel] : 0;
        const up = previousLine ? previousLine[i] : 0;
        const upLeft = previousLine && i >= bytesPerPixel ? previousLine[i - bytesPerPixel] : 0;
        result[i] = (scanline[i] - paethPredictor(left, up, upLeft)) & 0xff;
      }
      break;

    default:
      throw new RangeError(`Unknown filter type: ${String(filterType)}`);
  }

  return result;
}

/**
 * Default adaptive cost: sum of absolute values with each byte read as signed
 */
export function sumOfAbsoluteSigned(filtered: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < filtered.length; i++) {
    const v = filtered[i];
    sum += v > 128 ? 256 - v : v;
  }
  return sum;
}

/**
 * Filter a scanline, either with a forced filter or by picking the cheapest.
 * Adaptive ties go to the earlier filter: None, Sub, Up, Average, Paeth.
 */
export function filterScanline(
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number,
  strategy: FilterStrategy = 'adaptive',
  cost: FilterCostFunction = sumOfAbsoluteSigned
): { filterType: FilterType; filtered: Uint8Array } {
  if (strategy !== 'adaptive') {
    return { filterType: strategy, filtered: applyFilter(strategy, scanline, previousLine, bytesPerPixel) };
  }

  let bestType = FilterType.None;
  let bestData = scanline;
  let bestSum = Infinity;

  for (const type of FILTER_TYPES) {
    const data = type === FilterType.None
      ? scanline
      : applyFilter(type, scanline, previousLine, bytesPerPixel);
    const sum = cost(data);

    if (sum < bestSum) {
      bestSum = sum;
      bestType = type;
      bestData = data;
    }
  }

  return { filterType: bestType, filtered: bestData };
}

/**
 * Bytes per complete pixel, rounded up and never below 1
 */
export function bytesPerPixelFor(channels: number, bitDepth: number): number {
  return Math.max(1, Math.ceil((channels * bitDepth) / 8));
}

/**
 * Calculate bytes per pixel from PNG header information
 */
export function getBytesPerPixel(bitDepth: number, colorType: number): number {
  return bytesPerPixelFor(getSamplesPerPixel(colorType), bitDepth);
}
