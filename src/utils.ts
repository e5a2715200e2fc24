import { ColorType, BitDepth } from './types.js';

/**
 * CRC32 lookup table for PNG chunk validation
 */
const CRC_TABLE = new Uint32Array(256);

// Initialize CRC table
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = (c & 1) ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  CRC_TABLE[n] = c;
}

/**
 * Feed bytes into a running CRC32 register (start with 0xffffffff)
 */
export function updateCrc32(crc: number, data: Uint8Array, start = 0, length = data.length - start): number {
  let c = crc;
  for (let i = start; i < start + length; i++) {
    c = CRC_TABLE[(c ^ data[i]) & 0xff] ^ (c >>> 8);
  }
  return c;
}

/**
 * Calculate CRC32 checksum for PNG chunk
 */
export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
  return (updateCrc32(0xffffffff, data, start, length) ^ 0xffffffff) >>> 0;
}

/**
 * CRC of a chunk: covers the 4 type bytes followed by the payload
 */
export function chunkCrc(type: string, data: Uint8Array): number {
  const crc = updateCrc32(0xffffffff, stringToBytes(type));
  return (updateCrc32(crc, data) ^ 0xffffffff) >>> 0;
}

/**
 * Read a 32-bit big-endian unsigned integer
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  ) >>> 0;
}

/**
 * Write a 32-bit big-endian unsigned integer
 */
export function writeUInt32BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >>> 16) & 0xff;
  buffer[offset + 2] = (value >>> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
}

export function readUInt16BE(buffer: Uint8Array, offset: number): number {
  return (buffer[offset] << 8) | buffer[offset + 1];
}

export function writeUInt16BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 8) & 0xff;
  buffer[offset + 1] = value & 0xff;
}

/**
 * Convert string to Uint8Array (Latin-1). Characters above U+00FF are not
 * representable; check with {@link isLatin1} first.
 */
export function stringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i);
  }
  return bytes;
}

/**
 * Convert Uint8Array to string (Latin-1)
 */
export function bytesToString(bytes: Uint8Array, start = 0, length = bytes.length - start): string {
  let str = '';
  for (let i = start; i < start + length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

export function isLatin1(str: string): boolean {
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 0xff) return false;
  }
  return true;
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function utf8ToBytes(str: string): Uint8Array {
  return utf8Encoder.encode(str);
}

/**
 * Decode UTF-8, throwing a TypeError on malformed input
 */
export function bytesToUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/**
 * Index of the first zero byte at or after `start`, or -1
 */
export function indexOfNull(bytes: Uint8Array, start = 0): number {
  return bytes.indexOf(0, start);
}

/**
 * Concatenate byte arrays into one buffer
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const totalLength = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * PNG file signature
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/**
 * Verify PNG signature
 */
export function isPngSignature(data: Uint8Array): boolean {
  if (data.length < 8) return false;
  for (let i = 0; i < 8; i++) {
    if (data[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

interface ColorTypeInfo {
  name: string;
  channels: number;
  bitDepths: readonly BitDepth[];
}

const COLOR_TYPES = new Map<number, ColorTypeInfo>([
  [ColorType.GRAYSCALE, { name: 'Grayscale', channels: 1, bitDepths: [1, 2, 4, 8, 16] }],
  [ColorType.RGB, { name: 'Truecolor', channels: 3, bitDepths: [8, 16] }],
  [ColorType.PALETTE, { name: 'Indexed-color', channels: 1, bitDepths: [1, 2, 4, 8] }],
  [ColorType.GRAYSCALE_ALPHA, { name: 'Grayscale + alpha', channels: 2, bitDepths: [8, 16] }],
  [ColorType.RGBA, { name: 'Truecolor + alpha', channels: 4, bitDepths: [8, 16] }]
]);

export function isColorType(value: number): value is ColorType {
  return COLOR_TYPES.has(value);
}

export function isBitDepth(value: number): value is BitDepth {
  return value === 1 || value === 2 || value === 4 || value === 8 || value === 16;
}

/**
 * Whether the bit depth is allowed for the color type
 */
export function isLegalBitDepth(colorType: ColorType, bitDepth: number): boolean {
  const info = COLOR_TYPES.get(colorType);
  return info !== undefined && info.bitDepths.some((depth) => depth === bitDepth);
}

export function colorTypeName(colorType: number): string {
  return COLOR_TYPES.get(colorType)?.name ?? `Unknown (${colorType})`;
}

/**
 * Number of samples per pixel for a color type (palette images store one index)
 */
export function getSamplesPerPixel(colorType: number): number {
  const info = COLOR_TYPES.get(colorType);
  if (!info) {
    throw new Error(`Unknown color type: ${colorType}`);
  }
  return info.channels;
}

export function isGrayscale(colorType: ColorType): boolean {
  return colorType === ColorType.GRAYSCALE || colorType === ColorType.GRAYSCALE_ALPHA;
}

export function maxSampleValue(bitDepth: number): number {
  return (1 << bitDepth) - 1;
}
