/**
 * ICC profiles
 *
 * Reads the fixed 128-byte header and the tag table of an ICC profile, as
 * carried by the iCCP chunk. A handful of simple tag types are decoded;
 * all other tags are returned with their raw bytes only. The same tag
 * types can be written back with {@link encodeIccProfile}.
 */

import { ConstraintError, FormatError } from './errors.js';
import type { Logger } from './types.js';
import {
  bytesToString,
  concatBytes,
  isLatin1,
  readUInt16BE,
  readUInt32BE,
  stringToBytes,
  writeUInt16BE,
  writeUInt32BE
} from './utils.js';

const HEADER_LENGTH = 128;
const TAG_ENTRY_LENGTH = 12;

export type XyzNumber = [number, number, number];

export type IccTagValue =
  | { type: 'text'; text: string }
  | { type: 'desc'; text: string }
  | { type: 'XYZ'; values: XyzNumber[] }
  | { type: 'curv'; curve: { gamma: number } | { table: number[] } }
  | { type: 'sf32'; values: number[] }
  /** Video card gamma table: one table per channel, entries of 1 or 2 bytes */
  | { type: 'vcgt'; entrySize: 1 | 2; tables: number[][] };

export interface IccTag {
  signature: string;
  offset: number;
  size: number;
  /** Four-character type signature of the tag data */
  type: string;
  data: Uint8Array;
  /** Decoded value for the supported types, otherwise null */
  value: IccTagValue | null;
}

export interface IccProfileHeader {
  size: number;
  preferredCmm: string;
  /** Version field as 8 hex digits, e.g. "02100000" */
  version: string;
  profileClass: string;
  colorSpace: string;
  pcs: string;
  /** Creation date as an ISO 8601 string in UTC */
  created: string;
  platform: string;
  flags: number;
  manufacturer: string;
  model: number;
  renderingIntent: number;
  pcsIlluminant: XyzNumber;
  creator: string;
}

export interface IccProfile {
  header: IccProfileHeader;
  tags: IccTag[];
}

function signatureAt(data: Uint8Array, offset: number): string {
  return bytesToString(data, offset, 4);
}

function s15Fixed16(data: Uint8Array, offset: number): number {
  return (readUInt32BE(data, offset) | 0) / 0x10000;
}

function s15Fixed16List(data: Uint8Array, offset: number): number[] {
  const values: number[] = [];
  for (let at = offset; at + 4 <= data.length; at += 4) {
    values.push(s15Fixed16(data, at));
  }
  return values;
}

function readDateTime(data: Uint8Array, offset: number): string {
  const [year, month, day, hour, minute, second] = [0, 1, 2, 3, 4, 5].map((i) => readUInt16BE(data, offset + i * 2));
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}Z`;
}

function trimNulls(text: string): string {
  const end = text.indexOf('\0');
  return end < 0 ? text : text.slice(0, end);
}

function decodeTagValue(type: string, data: Uint8Array): IccTagValue | null {
  switch (type) {
    case 'text':
      return { type: 'text', text: trimNulls(bytesToString(data, 8)) };

    case 'desc': {
      if (data.length < 12) return null;
      const count = readUInt32BE(data, 8);
      const length = Math.min(count, data.length - 12);
      return { type: 'desc', text: trimNulls(bytesToString(data, 12, length)) };
    }

    case 'XYZ ': {
      const flat = s15Fixed16List(data, 8);
      const values: XyzNumber[] = [];
      for (let i = 0; i + 3 <= flat.length; i += 3) {
        values.push([flat[i], flat[i + 1], flat[i + 2]]);
      }
      return { type: 'XYZ', values };
    }

    case 'curv': {
      if (data.length < 12) return null;
      const count = readUInt32BE(data, 8);
      if (count === 0) {
        return { type: 'curv', curve: { gamma: 1 } };
      }
      if (data.length < 12 + count * 2) return null;
      if (count === 1) {
        return { type: 'curv', curve: { gamma: readUInt16BE(data, 12) / 256 } };
      }
      const table: number[] = [];
      for (let i = 0; i < count; i++) {
        table.push(readUInt16BE(data, 12 + i * 2));
      }
      return { type: 'curv', curve: { table } };
    }

    case 'sf32':
      return { type: 'sf32', values: s15Fixed16List(data, 8) };

    case 'vcgt': {
      // only the table form; the formula form stays raw
      if (data.length < 18 || readUInt32BE(data, 8) !== 0) return null;
      const channels = readUInt16BE(data, 12);
      const entryCount = readUInt16BE(data, 14);
      const entrySize = readUInt16BE(data, 16);
      if (entrySize !== 1 && entrySize !== 2) return null;
      if (18 + channels * entryCount * entrySize > data.length) return null;

      const tables: number[][] = [];
      for (let c = 0; c < channels; c++) {
        const table: number[] = [];
        for (let i = 0; i < entryCount; i++) {
          const at = 18 + (c * entryCount + i) * entrySize;
          table.push(entrySize === 1 ? data[at] : readUInt16BE(data, at));
        }
        tables.push(table);
      }
      return { type: 'vcgt', entrySize, tables };
    }

    default:
      return null;
  }
}

/**
 * Parse an ICC profile
 *
 * @example
 * const { metadata } = decodePng(bytes);
 * if (metadata.iccProfile) {
 *   const profile = parseIccProfile(metadata.iccProfile.profile);
 *   console.log(profile.header.colorSpace);
 * }
 */
export function parseIccProfile(data: Uint8Array, options: { logger?: Logger } = {}): IccProfile {
  const logger = options.logger ?? console.warn;

  if (data.length < HEADER_LENGTH) {
    throw new FormatError(`ICC profile is too short (${data.length} bytes)`, { chunkType: 'iCCP' });
  }

  const header: IccProfileHeader = {
    size: readUInt32BE(data, 0),
    preferredCmm: signatureAt(data, 4),
    version: readUInt32BE(data, 8).toString(16).padStart(8, '0'),
    profileClass: signatureAt(data, 12),
    colorSpace: signatureAt(data, 16),
    pcs: signatureAt(data, 20),
    created: readDateTime(data, 24),
    platform: signatureAt(data, 40),
    flags: readUInt32BE(data, 44),
    manufacturer: signatureAt(data, 48),
    model: readUInt32BE(data, 52),
    renderingIntent: readUInt32BE(data, 64),
    pcsIlluminant: [s15Fixed16(data, 68), s15Fixed16(data, 72), s15Fixed16(data, 76)],
    creator: signatureAt(data, 80)
  };

  if (data.length < header.size) {
    logger(`ICC profile size declared to be ${header.size}, but only got ${data.length} bytes`);
  }
  if (signatureAt(data, 36) !== 'acsp') {
    logger('ICC profile is missing its acsp signature');
  }

  const tags: IccTag[] = [];
  if (data.length < HEADER_LENGTH + 4) {
    return { header, tags };
  }

  const tagCount = readUInt32BE(data, HEADER_LENGTH);
  const tableEnd = HEADER_LENGTH + 4 + tagCount * TAG_ENTRY_LENGTH;
  if (tableEnd > data.length) {
    throw new FormatError(`ICC tag table of ${tagCount} entries runs past the end of the profile`, {
      chunkType: 'iCCP'
    });
  }

  const seen = new Set<string>();
  for (let entry = HEADER_LENGTH + 4; entry < tableEnd; entry += TAG_ENTRY_LENGTH) {
    const signature = signatureAt(data, entry);
    const offset = readUInt32BE(data, entry + 4);
    const size = readUInt32BE(data, entry + 8);

    if (seen.has(signature)) {
      logger(`Duplicate ICC tag ${JSON.stringify(signature)} ignored`);
      continue;
    }
    seen.add(signature);

    if (offset + size > data.length) {
      throw new FormatError(`ICC tag ${JSON.stringify(signature)} runs past the end of the profile`, {
        chunkType: 'iCCP'
      });
    }

    const tagData = data.subarray(offset, offset + size);
    const type = tagData.length >= 4 ? signatureAt(tagData, 0) : '';
    tags.push({
      signature,
      offset,
      size,
      type,
      data: tagData,
      value: decodeTagValue(type, tagData)
    });
  }

  return { header, tags };
}

/** D50 illuminant, the white point of the profile connection space */
export const D50: XyzNumber = [0.9642, 1, 0.8249];

const TAG_TYPE_SIGNATURES: Record<IccTagValue['type'], string> = {
  text: 'text',
  desc: 'desc',
  XYZ: 'XYZ ',
  curv: 'curv',
  sf32: 'sf32',
  vcgt: 'vcgt'
};

const NO_SIGNATURE = '\0\0\0\0';

export interface IccTagInput {
  signature: string;
  /** A value to encode, or complete tag data starting with its type signature */
  value: IccTagValue | Uint8Array;
}

export type IccHeaderInput = Partial<Omit<IccProfileHeader, 'size' | 'created'>> & {
  /** Default: now */
  created?: Date;
};

export interface IccProfileInput {
  header?: IccHeaderInput;
  tags?: IccTagInput[];
  /**
   * Add cprt, desc and wtpt tags where the input has none.
   * Default: true
   */
  defaultTags?: boolean;
}

const DEFAULT_TAGS: IccTagInput[] = [
  { signature: 'cprt', value: { type: 'desc', text: 'Copyright unknown.' } },
  { signature: 'desc', value: { type: 'desc', text: 'Created by scanline-png' } },
  { signature: 'wtpt', value: { type: 'XYZ', values: [D50] } }
];

function signatureBytes(value: string, field: string): Uint8Array {
  if (value.length < 1 || value.length > 4 || !isLatin1(value)) {
    throw new ConstraintError(`ICC ${field} must be 1 to 4 Latin-1 characters, got ${JSON.stringify(value)}`);
  }
  return stringToBytes(value.padEnd(4, ' '));
}

function uint(value: number, max: number, field: string): number {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ConstraintError(`ICC ${field} must be an integer from 0 to ${max}, got ${value}`);
  }
  return value;
}

function latin1Text(text: string, field: string): Uint8Array {
  if (!isLatin1(text) || text.includes('\0')) {
    throw new ConstraintError(`ICC ${field} must be Latin-1 text without NUL characters`);
  }
  return stringToBytes(text);
}

function u32Bytes(values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  values.forEach((value, i) => writeUInt32BE(out, value >>> 0, i * 4));
  return out;
}

function u16Bytes(values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 2);
  values.forEach((value, i) => writeUInt16BE(out, value, i * 2));
  return out;
}

function toS15Fixed16(value: number): number {
  const fixed = Math.round(value * 0x10000);
  if (!Number.isFinite(value) || fixed < -0x80000000 || fixed > 0x7fffffff) {
    throw new ConstraintError(`ICC fixed-point value out of range: ${value}`);
  }
  return fixed;
}

/** Tag body that follows the type signature and the 4 reserved bytes */
function encodeTagBody(value: IccTagValue): Uint8Array {
  switch (value.type) {
    case 'text':
      return concatBytes([latin1Text(value.text, 'text tag'), new Uint8Array(1)]);

    case 'desc': {
      const ascii = concatBytes([latin1Text(value.text, 'description'), new Uint8Array(1)]);
      // empty Unicode and ScriptCode parts
      return concatBytes([u32Bytes([ascii.length]), ascii, new Uint8Array(4 + 4 + 2 + 1 + 67)]);
    }

    case 'XYZ':
      return u32Bytes(value.values.flatMap((xyz) => xyz.map(toS15Fixed16)));

    case 'curv': {
      if ('gamma' in value.curve) {
        const gamma = uint(Math.round(value.curve.gamma * 256), 0xffff, 'curve gamma × 256');
        return concatBytes([u32Bytes([1]), u16Bytes([gamma])]);
      }
      const table = value.curve.table.map((entry) => uint(entry, 0xffff, 'curve entry'));
      return concatBytes([u32Bytes([table.length]), u16Bytes(table)]);
    }

    case 'sf32':
      return u32Bytes(value.values.map(toS15Fixed16));

    case 'vcgt': {
      const { entrySize, tables } = value;
      const entryCount = tables[0]?.length ?? 0;
      uint(tables.length, 0xffff, 'vcgt channel count');
      uint(entryCount, 0xffff, 'vcgt entry count');
      if (tables.some((table) => table.length !== entryCount)) {
        throw new ConstraintError('ICC vcgt tables must all have the same length');
      }
      const max = entrySize === 1 ? 0xff : 0xffff;
      const entries = tables.flat().map((entry) => uint(entry, max, 'vcgt entry'));
      return concatBytes([
        u32Bytes([0]),
        u16Bytes([tables.length, entryCount, entrySize]),
        entrySize === 1 ? Uint8Array.from(entries) : u16Bytes(entries)
      ]);
    }
  }
}

/**
 * Complete tag data: type signature, reserved bytes, body
 */
export function encodeIccTag(value: IccTagValue): Uint8Array {
  return concatBytes([stringToBytes(TAG_TYPE_SIGNATURES[value.type]), new Uint8Array(4), encodeTagBody(value)]);
}

function encodeHeader(input: IccHeaderInput, size: number): Uint8Array {
  const out = new Uint8Array(HEADER_LENGTH);
  const version = input.version ?? '02000000';
  if (!/^[0-9a-f]{8}$/i.test(version)) {
    throw new ConstraintError(`ICC version must be 8 hex digits, got ${JSON.stringify(version)}`);
  }
  const created = input.created ?? new Date();
  if (Number.isNaN(created.getTime())) {
    throw new ConstraintError('ICC creation date is invalid');
  }

  writeUInt32BE(out, size, 0);
  out.set(signatureBytes(input.preferredCmm ?? NO_SIGNATURE, 'preferred CMM'), 4);
  writeUInt32BE(out, parseInt(version, 16), 8);
  out.set(signatureBytes(input.profileClass ?? NO_SIGNATURE, 'profile class'), 12);
  out.set(signatureBytes(input.colorSpace ?? NO_SIGNATURE, 'colour space'), 16);
  out.set(signatureBytes(input.pcs ?? 'XYZ ', 'PCS'), 20);
  out.set(u16Bytes([
    created.getUTCFullYear(),
    created.getUTCMonth() + 1,
    created.getUTCDate(),
    created.getUTCHours(),
    created.getUTCMinutes(),
    created.getUTCSeconds()
  ]), 24);
  out.set(stringToBytes('acsp'), 36);
  out.set(signatureBytes(input.platform ?? NO_SIGNATURE, 'platform'), 40);
  writeUInt32BE(out, uint(input.flags ?? 0, 0xffffffff, 'flags'), 44);
  out.set(signatureBytes(input.manufacturer ?? NO_SIGNATURE, 'manufacturer'), 48);
  writeUInt32BE(out, uint(input.model ?? 0, 0xffffffff, 'model'), 52);
  writeUInt32BE(out, uint(input.renderingIntent ?? 0, 0xffffffff, 'rendering intent'), 64);
  out.set(u32Bytes((input.pcsIlluminant ?? D50).map(toS15Fixed16)), 68);
  out.set(signatureBytes(input.creator ?? NO_SIGNATURE, 'creator'), 80);
  return out;
}

/**
 * Build an ICC profile. Tag data is placed in table order, each element
 * starting on a 4-byte boundary.
 *
 * @example
 * const profile = encodeIccProfile({
 *   header: { profileClass: 'mntr', colorSpace: 'RGB ' },
 *   tags: [{ signature: 'rTRC', value: { type: 'curv', curve: { gamma: 2.2 } } }]
 * });
 * encodePng({ header, metadata: { iccProfile: { name: 'Display', profile } }, samples });
 */
export function encodeIccProfile(input: IccProfileInput = {}): Uint8Array {
  const given = input.tags ?? [];
  const seen = new Set<string>();
  for (const tag of given) {
    if (seen.has(tag.signature)) {
      throw new ConstraintError(`Duplicate ICC tag ${JSON.stringify(tag.signature)}`);
    }
    seen.add(tag.signature);
  }

  const defaults = (input.defaultTags ?? true) ? DEFAULT_TAGS.filter((tag) => !seen.has(tag.signature)) : [];
  const tags = [...defaults, ...given];

  const table = new Uint8Array(4 + tags.length * TAG_ENTRY_LENGTH);
  writeUInt32BE(table, tags.length, 0);

  const elements: Uint8Array[] = [];
  let offset = HEADER_LENGTH + table.length;
  tags.forEach((tag, i) => {
    const data = tag.value instanceof Uint8Array ? tag.value : encodeIccTag(tag.value);
    const entry = 4 + i * TAG_ENTRY_LENGTH;
    table.set(signatureBytes(tag.signature, 'tag signature'), entry);
    writeUInt32BE(table, offset, entry + 4);
    writeUInt32BE(table, data.length, entry + 8);

    const padded = (data.length + 3) & ~3;
    elements.push(data, new Uint8Array(padded - data.length));
    offset += padded;
  });

  return concatBytes([encodeHeader(input.header ?? {}, offset), table, ...elements]);
}

/**
 * Sample a transfer function on [0, 1] into a curv table
 */
export function sampleCurve(transfer: (x: number) => number, count = 256): number[] {
  if (!Number.isInteger(count) || count < 2 || count > 0xffff) {
    throw new ConstraintError(`Curve tables need 2 to 65535 entries, got ${count}`);
  }
  const table: number[] = [];
  for (let i = 0; i < count; i++) {
    const y = transfer(i / (count - 1));
    table.push(Math.round(Math.min(1, Math.max(0, y)) * 0xffff));
  }
  return table;
}

export interface GrayProfileOptions {
  /** Input level mapped to black; levels below it clip. Default: 0.07 */
  black?: number;
  entries?: number;
  created?: Date;
}

/**
 * Greyscale input-device profile whose kTRC maps [0, black] to 0 and
 * stretches (black, 1] linearly over the full range
 */
export function createGrayProfile(options: GrayProfileOptions = {}): Uint8Array {
  const black = options.black ?? 0.07;
  if (!(black >= 0 && black < 1)) {
    throw new ConstraintError(`Black point must be in [0, 1), got ${black}`);
  }
  const table = sampleCurve((x) => (x <= black ? 0 : (x - black) / (1 - black)), options.entries);

  return encodeIccProfile({
    header: { profileClass: 'scnr', colorSpace: 'GRAY', pcs: 'XYZ ', created: options.created },
    tags: [{ signature: 'kTRC', value: { type: 'curv', curve: { table } } }]
  });
}
