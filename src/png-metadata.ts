/**
 * Metadata mapping
 *
 * Translates between ancillary chunks (plus PLTE) and the structured
 * {@link PngMetadata} record. Each chunk type has one entry in a static
 * handler table holding its decoder, its encoder and where in the stream it
 * may appear. The table order is also the order chunks are written in.
 *
 * Chunks listed in `ignoredChunkTypes` are accepted and dropped. Anything
 * else the table does not know is kept opaquely in `unknownChunks` together
 * with its position, and written back in the same position on encode.
 */

import { ConstraintError, FormatError } from './errors.js';
import {
  Background,
  ColorType,
  CompressionLevel,
  Logger,
  MetadataMapperConfig,
  PhysicalResolution,
  PhysicalResolutionInput,
  PhysicalUnit,
  PhysicalUnitInput,
  PngChunk,
  PngHeader,
  PngMetadata,
  PngMetadataInput,
  PngTimestamp,
  RgbTriple,
  TextEntry,
  Transparency,
  UnknownChunk,
  ChunkPosition
} from './types.js';
import {
  bytesToString,
  concatBytes,
  getSamplesPerPixel,
  indexOfNull,
  isGrayscale,
  maxSampleValue,
  readUInt16BE,
  readUInt32BE,
  stringToBytes,
  writeUInt16BE,
  writeUInt32BE
} from './utils.js';
import { createChunk } from './png-writer.js';
import { isCriticalChunk } from './png-parser.js';
import { decodeTextChunk, describeKeywordProblem, encodeTextEntry } from './png-text.js';
import { inflateData } from './streaming-inflate.js';
import { deflateData } from './streaming-deflate.js';

/**
 * Default tables for the mapper
 */
export const DEFAULT_MAPPER_CONFIG: MetadataMapperConfig = {
  ignoredChunkTypes: new Set([
    'hIST', // palette histogram
    'sPLT', // suggested palette
    'oFFs', // image offset
    'pCAL', // pixel value calibration
    'sCAL', // physical scale
    'gIFg', // GIF graphic control extension
    'gIFx', // GIF application extension
    'gIFt', // GIF plain text (deprecated)
    'dSIG', // digital signature
    'fRAc' // fractal image parameters
  ]),
  registeredKeywords: [
    'Title',
    'Author',
    'Description',
    'Copyright',
    'Creation Time',
    'Software',
    'Disclaimer',
    'Warning',
    'Source',
    'Comment'
  ]
};

export function resolveMapperConfig(overrides: Partial<MetadataMapperConfig> = {}): MetadataMapperConfig {
  return {
    ignoredChunkTypes: overrides.ignoredChunkTypes ?? DEFAULT_MAPPER_CONFIG.ignoredChunkTypes,
    registeredKeywords: overrides.registeredKeywords ?? DEFAULT_MAPPER_CONFIG.registeredKeywords
  };
}

/**
 * Where a chunk may appear:
 * - beforePalette: before PLTE and the image data
 * - palette: PLTE itself, before the image data
 * - afterPalette: after PLTE (when there is one) and before the image data
 * - beforeData: anywhere before the image data
 * - anywhere: no constraint
 */
export type ChunkPlacement = 'beforePalette' | 'palette' | 'afterPalette' | 'beforeData' | 'anywhere';

interface DecodeContext {
  header: PngHeader;
  metadata: PngMetadata;
}

interface EncodeContext {
  header: PngHeader;
  level: CompressionLevel;
}

export interface MetadataChunkHandler {
  types: readonly string[];
  placement: ChunkPlacement;
  repeatable: boolean;
  decode(chunk: PngChunk, context: DecodeContext): void;
  encode(metadata: PngMetadata, context: EncodeContext): PngChunk[];
}

const SCALE = 100000;

function formatError(chunk: PngChunk, message: string): FormatError {
  return new FormatError(`${chunk.type}: ${message}`, { chunkType: chunk.type });
}

function expectLength(chunk: PngChunk, ...lengths: number[]): void {
  if (!lengths.includes(chunk.length)) {
    throw formatError(chunk, `invalid length ${chunk.length}, expected ${lengths.join(' or ')}`);
  }
}

/**
 * Number of sBIT entries for a color type: palette images describe the RGB
 * palette entries, everything else has one entry per channel
 */
export function significantBitsLength(colorType: ColorType): number {
  return colorType === ColorType.PALETTE ? 3 : getSamplesPerPixel(colorType);
}

function significantBitsMax(header: PngHeader): number {
  return header.colorType === ColorType.PALETTE ? 8 : header.bitDepth;
}

function backgroundKindFor(colorType: ColorType): Background['kind'] {
  if (colorType === ColorType.PALETTE) return 'palette';
  return isGrayscale(colorType) ? 'gray' : 'rgb';
}

function transparencyKindFor(colorType: ColorType): Transparency['kind'] | null {
  switch (colorType) {
    case ColorType.PALETTE: return 'palette';
    case ColorType.GRAYSCALE: return 'gray';
    case ColorType.RGB: return 'rgb';
    default: return null;
  }
}

function readTriple16(data: Uint8Array): RgbTriple {
  return [readUInt16BE(data, 0), readUInt16BE(data, 2), readUInt16BE(data, 4)];
}

function writeTriple16(value: RgbTriple): Uint8Array {
  const data = new Uint8Array(6);
  value.forEach((sample, i) => writeUInt16BE(data, sample, i * 2));
  return data;
}

function uint32Payload(...values: number[]): Uint8Array {
  const data = new Uint8Array(values.length * 4);
  values.forEach((value, i) => writeUInt32BE(data, value, i * 4));
  return data;
}

const CHROMATICITY_FIELDS = [
  'whiteX', 'whiteY', 'redX', 'redY', 'greenX', 'greenY', 'blueX', 'blueY'
] as const;

/**
 * Static chunk handler table, in emission order
 */
export const METADATA_CHUNK_HANDLERS: readonly MetadataChunkHandler[] = [
  {
    types: ['gAMA'],
    placement: 'beforePalette',
    repeatable: false,
    decode(chunk, { metadata }) {
      expectLength(chunk, 4);
      const value = readUInt32BE(chunk.data, 0);
      if (value === 0) {
        throw formatError(chunk, 'gamma must be positive');
      }
      metadata.gamma = value / SCALE;
    },
    encode({ gamma }) {
      return gamma === undefined ? [] : [createChunk('gAMA', uint32Payload(Math.round(gamma * SCALE)))];
    }
  },
  {
    types: ['cHRM'],
    placement: 'beforePalette',
    repeatable: false,
    decode(chunk, { metadata }) {
      expectLength(chunk, 32);
      const [whiteX, whiteY, redX, redY, greenX, greenY, blueX, blueY] =
        CHROMATICITY_FIELDS.map((_, i) => readUInt32BE(chunk.data, i * 4) / SCALE);
      metadata.chromaticities = { whiteX, whiteY, redX, redY, greenX, greenY, blueX, blueY };
    },
    encode({ chromaticities }) {
      if (!chromaticities) return [];
      const values = CHROMATICITY_FIELDS.map((field) => Math.round(chromaticities[field] * SCALE));
      return [createChunk('cHRM', uint32Payload(...values))];
    }
  },
  {
    types: ['sRGB'],
    placement: 'beforePalette',
    repeatable: false,
    decode(chunk, { metadata }) {
      expectLength(chunk, 1);
      const intent = chunk.data[0];
      if (intent > 3) {
        throw formatError(chunk, `unknown rendering intent ${intent}`);
      }
      metadata.renderingIntent = intent;
    },
    encode({ renderingIntent }) {
      return renderingIntent === undefined ? [] : [createChunk('sRGB', new Uint8Array([renderingIntent]))];
    }
  },
  {
    types: ['iCCP'],
    placement: 'beforePalette',
    repeatable: false,
    decode(chunk, { metadata }) {
      const nameEnd = indexOfNull(chunk.data);
      if (nameEnd < 1 || nameEnd + 2 > chunk.length) {
        throw formatError(chunk, 'missing profile name or compression method');
      }
      const method = chunk.data[nameEnd + 1];
      if (method !== 0) {
        throw formatError(chunk, `unsupported compression method ${method}`);
      }
      metadata.iccProfile = {
        name: bytesToString(chunk.data, 0, nameEnd),
        profile: inflateData(chunk.data.subarray(nameEnd + 2), 'iCCP')
      };
    },
    encode({ iccProfile }, { level }) {
      if (!iccProfile) return [];
      return [createChunk('iCCP', concatBytes([
        stringToBytes(iccProfile.name),
        new Uint8Array([0, 0]),
        deflateData(iccProfile.profile, level)
      ]))];
    }
  },
  {
    types: ['sBIT'],
    placement: 'beforePalette',
    repeatable: false,
    decode(chunk, { header, metadata }) {
      expectLength(chunk, significantBitsLength(header.colorType));
      const max = significantBitsMax(header);
      const bits = Array.from(chunk.data);
      if (bits.some((value) => value === 0 || value > max)) {
        throw formatError(chunk, `significant bits ${bits.join(',')} outside 1-${max}`);
      }
      metadata.significantBits = bits;
    },
    encode({ significantBits }) {
      return significantBits ? [createChunk('sBIT', new Uint8Array(significantBits))] : [];
    }
  },
  {
    types: ['PLTE'],
    placement: 'palette',
    repeatable: false,
    decode(chunk, { header, metadata }) {
      if (chunk.length === 0 || chunk.length % 3 !== 0 || chunk.length > 768) {
        throw formatError(chunk, `invalid length ${chunk.length}`);
      }
      if (isGrayscale(header.colorType)) {
        throw formatError(chunk, 'palette not allowed for grayscale images');
      }
      const entries = chunk.length / 3;
      if (header.colorType === ColorType.PALETTE && entries > 1 << header.bitDepth) {
        throw formatError(chunk, `${entries} entries exceed bit depth ${header.bitDepth}`);
      }
      const palette: RgbTriple[] = [];
      for (let i = 0; i < chunk.length; i += 3) {
        palette.push([chunk.data[i], chunk.data[i + 1], chunk.data[i + 2]]);
      }
      metadata.palette = palette;
    },
    encode({ palette }) {
      if (!palette) return [];
      const data = new Uint8Array(palette.length * 3);
      palette.forEach((entry, i) => data.set(entry, i * 3));
      return [createChunk('PLTE', data)];
    }
  },
  {
    types: ['tRNS'],
    placement: 'afterPalette',
    repeatable: false,
    decode(chunk, { header, metadata }) {
      switch (transparencyKindFor(header.colorType)) {
        case 'palette': {
          const paletteSize = metadata.palette?.length ?? 0;
          if (chunk.length > paletteSize) {
            throw formatError(chunk, `${chunk.length} alpha values for ${paletteSize} palette entries`);
          }
          metadata.transparency = { kind: 'palette', alphas: Array.from(chunk.data) };
          break;
        }
        case 'gray':
          expectLength(chunk, 2);
          metadata.transparency = { kind: 'gray', value: readUInt16BE(chunk.data, 0) };
          break;
        case 'rgb':
          expectLength(chunk, 6);
          metadata.transparency = { kind: 'rgb', value: readTriple16(chunk.data) };
          break;
        case null:
          throw formatError(chunk, 'not allowed for images with an alpha channel');
      }
    },
    encode({ transparency }) {
      if (!transparency) return [];
      switch (transparency.kind) {
        case 'palette':
          return [createChunk('tRNS', new Uint8Array(transparency.alphas))];
        case 'gray': {
          const data = new Uint8Array(2);
          writeUInt16BE(data, transparency.value, 0);
          return [createChunk('tRNS', data)];
        }
        case 'rgb':
          return [createChunk('tRNS', writeTriple16(transparency.value))];
      }
    }
  },
  {
    types: ['bKGD'],
    placement: 'afterPalette',
    repeatable: false,
    decode(chunk, { header, metadata }) {
      switch (backgroundKindFor(header.colorType)) {
        case 'palette': {
          expectLength(chunk, 1);
          const index = chunk.data[0];
          const paletteSize = metadata.palette?.length ?? 0;
          if (index >= paletteSize) {
            throw formatError(chunk, `palette index ${index} out of range (${paletteSize} entries)`);
          }
          metadata.background = { kind: 'palette', index };
          break;
        }
        case 'gray':
          expectLength(chunk, 2);
          metadata.background = { kind: 'gray', value: readUInt16BE(chunk.data, 0) };
          break;
        case 'rgb':
          expectLength(chunk, 6);
          metadata.background = { kind: 'rgb', value: readTriple16(chunk.data) };
          break;
      }
    },
    encode({ background }) {
      if (!background) return [];
      switch (background.kind) {
        case 'palette':
          return [createChunk('bKGD', new Uint8Array([background.index]))];
        case 'gray': {
          const data = new Uint8Array(2);
          writeUInt16BE(data, background.value, 0);
          return [createChunk('bKGD', data)];
        }
        case 'rgb':
          return [createChunk('bKGD', writeTriple16(background.value))];
      }
    }
  },
  {
    types: ['pHYs'],
    placement: 'beforeData',
    repeatable: false,
    decode(chunk, { metadata }) {
      expectLength(chunk, 9);
      const unit = chunk.data[8];
      if (unit !== PhysicalUnit.UNSPECIFIED && unit !== PhysicalUnit.METER) {
        throw formatError(chunk, `unknown unit ${unit}`);
      }
      metadata.physical = {
        x: readUInt32BE(chunk.data, 0),
        y: readUInt32BE(chunk.data, 4),
        unit
      };
    },
    encode({ physical }) {
      if (!physical) return [];
      const data = new Uint8Array(9);
      writeUInt32BE(data, physical.x, 0);
      writeUInt32BE(data, physical.y, 4);
      data[8] = physical.unit;
      return [createChunk('pHYs', data)];
    }
  },
  {
    types: ['tIME'],
    placement: 'anywhere',
    repeatable: false,
    decode(chunk, { metadata }) {
      expectLength(chunk, 7);
      const timestamp: PngTimestamp = {
        year: readUInt16BE(chunk.data, 0),
        month: chunk.data[2],
        day: chunk.data[3],
        hour: chunk.data[4],
        minute: chunk.data[5],
        second: chunk.data[6]
      };
      const problem = describeTimestampProblem(timestamp);
      if (problem) {
        throw formatError(chunk, problem);
      }
      metadata.lastModified = timestamp;
    },
    encode({ lastModified }) {
      if (!lastModified) return [];
      const data = new Uint8Array(7);
      writeUInt16BE(data, lastModified.year, 0);
      data.set([lastModified.month, lastModified.day, lastModified.hour, lastModified.minute, lastModified.second], 2);
      return [createChunk('tIME', data)];
    }
  },
  {
    types: ['tEXt', 'zTXt', 'iTXt'],
    placement: 'anywhere',
    repeatable: true,
    decode(chunk, { metadata }) {
      (metadata.text ??= []).push(decodeTextChunk(chunk));
    },
    encode({ text }, { level }) {
      return (text ?? []).map((entry) => encodeTextEntry(entry, level));
    }
  }
];

const HANDLERS_BY_TYPE: ReadonlyMap<string, MetadataChunkHandler> = new Map(
  METADATA_CHUNK_HANDLERS.flatMap((handler) => handler.types.map((type) => [type, handler] as const))
);

const STRUCTURAL_CHUNK_TYPES: ReadonlySet<string> = new Set(['IHDR', 'IDAT', 'IEND']);

/**
 * Whether the mapper interprets this chunk type
 */
export function isKnownChunkType(type: string): boolean {
  return HANDLERS_BY_TYPE.has(type) || STRUCTURAL_CHUNK_TYPES.has(type);
}

function describeTimestampProblem(time: PngTimestamp): string | null {
  const ranges: Array<[keyof PngTimestamp, number, number]> = [
    ['year', 0, 65535],
    ['month', 1, 12],
    ['day', 1, 31],
    ['hour', 0, 23],
    ['minute', 0, 59],
    ['second', 0, 60]
  ];
  for (const [field, min, max] of ranges) {
    const value = time[field];
    if (!Number.isInteger(value) || value < min || value > max) {
      return `${field} ${value} outside ${min}-${max}`;
    }
  }
  return null;
}

/**
 * tIME value for a Date, in UTC
 */
export function timestampFromDate(date: Date): PngTimestamp {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds()
  };
}

/**
 * Collects metadata while the decoder walks the chunk stream. Call
 * {@link MetadataCollector.markData} at the first IDAT so placement rules
 * can be checked.
 */
export class MetadataCollector {
  private readonly metadata: PngMetadata = {};
  private readonly seen = new Set<string>();
  private seenPalette = false;
  private seenData = false;

  constructor(
    private readonly header: PngHeader,
    private readonly config: MetadataMapperConfig = DEFAULT_MAPPER_CONFIG,
    private readonly logger: Logger = console.warn
  ) {}

  markData(): void {
    this.seenData = true;
  }

  /** Number of palette entries read so far */
  get paletteSize(): number {
    return this.metadata.palette?.length ?? 0;
  }

  /** Metadata collected so far, without the final checks */
  snapshot(): PngMetadata {
    return this.metadata;
  }

  private get position(): ChunkPosition {
    if (this.seenData) return 'afterData';
    return this.seenPalette ? 'beforeData' : 'beforePalette';
  }

  accept(chunk: PngChunk): void {
    if (this.config.ignoredChunkTypes.has(chunk.type)) {
      return;
    }

    const handler = HANDLERS_BY_TYPE.get(chunk.type);
    if (!handler) {
      if (STRUCTURAL_CHUNK_TYPES.has(chunk.type)) {
        throw new FormatError(`Unexpected ${chunk.type} chunk`, { chunkType: chunk.type });
      }
      if (isCriticalChunk(chunk.type)) {
        this.logger(`Unknown critical chunk ${chunk.type} kept as opaque data`);
      }
      (this.metadata.unknownChunks ??= []).push({
        type: chunk.type,
        data: chunk.data,
        position: this.position
      });
      return;
    }

    this.checkPlacement(chunk, handler.placement);

    if (!handler.repeatable) {
      if (this.seen.has(chunk.type)) {
        this.logger(`Ignoring duplicate ${chunk.type} chunk`);
        return;
      }
      this.seen.add(chunk.type);
    }

    handler.decode(chunk, { header: this.header, metadata: this.metadata });

    if (chunk.type === 'PLTE') {
      this.seenPalette = true;
    }
  }

  private checkPlacement(chunk: PngChunk, placement: ChunkPlacement): void {
    const fail = (message: string) => new FormatError(`${chunk.type} chunk ${message}`, { chunkType: chunk.type });

    switch (placement) {
      case 'beforePalette':
        if (this.seenData) throw fail('after image data');
        if (this.seenPalette) throw fail('after PLTE');
        break;
      case 'palette':
      case 'beforeData':
        if (this.seenData) throw fail('after image data');
        break;
      case 'afterPalette':
        if (this.seenData) throw fail('after image data');
        if (this.header.colorType === ColorType.PALETTE && !this.seenPalette) throw fail('before PLTE');
        break;
      case 'anywhere':
        break;
    }
  }

  /**
   * Final checks; returns the collected record
   */
  finish(): PngMetadata {
    if (this.header.colorType === ColorType.PALETTE && !this.metadata.palette) {
      throw new FormatError('Missing PLTE chunk for palette image', { chunkType: 'PLTE' });
    }
    return this.metadata;
  }
}

/**
 * Decode metadata from a chunk list in stream order (IHDR and IEND are skipped)
 */
export function decodeMetadata(
  chunks: readonly PngChunk[],
  header: PngHeader,
  options: { config?: MetadataMapperConfig; logger?: Logger } = {}
): PngMetadata {
  const collector = new MetadataCollector(header, options.config, options.logger);
  for (const chunk of chunks) {
    if (chunk.type === 'IHDR' || chunk.type === 'IEND') continue;
    if (chunk.type === 'IDAT') {
      collector.markData();
      continue;
    }
    collector.accept(chunk);
  }
  return collector.finish();
}

function resolveUnit(unit: PhysicalUnitInput): { unit: PhysicalUnit; perMeter: number } {
  switch (unit) {
    case PhysicalUnit.UNSPECIFIED:
    case 'unspecified':
      return { unit: PhysicalUnit.UNSPECIFIED, perMeter: 1 };
    case PhysicalUnit.METER:
    case 'meter':
    case 'm':
      return { unit: PhysicalUnit.METER, perMeter: 1 };
    case 'cm':
      return { unit: PhysicalUnit.METER, perMeter: 100 };
    case 'i':
    case 'inch':
      return { unit: PhysicalUnit.METER, perMeter: 1 / 0.0254 };
    default:
      throw new ConstraintError(`Unknown physical unit ${JSON.stringify(unit)}`, { chunkType: 'pHYs' });
  }
}

/**
 * Bring any accepted pHYs shorthand to the stored form. Inch and centimetre
 * values are converted to pixels per metre and rounded.
 *
 * @example
 * normalizePhysicalResolution([300, 'i']) // { x: 11811, y: 11811, unit: PhysicalUnit.METER }
 */
export function normalizePhysicalResolution(input: PhysicalResolutionInput): PhysicalResolution {
  let x: number;
  let y: number;
  let unitInput: PhysicalUnitInput = PhysicalUnit.UNSPECIFIED;

  if (typeof input === 'number') {
    x = y = input;
  } else if (Array.isArray(input)) {
    if (input.length === 1) {
      x = y = input[0];
    } else if (input.length === 3) {
      [x, y, unitInput] = input;
    } else {
      const [first, second] = input;
      if (Array.isArray(first)) {
        [x, y] = first;
        unitInput = second;
      } else if (typeof second === 'string') {
        x = y = first;
        unitInput = second;
      } else {
        x = first;
        y = second;
      }
    }
  } else {
    x = input.x;
    y = input.y;
    unitInput = input.unit ?? PhysicalUnit.UNSPECIFIED;
  }

  const { unit, perMeter } = resolveUnit(unitInput);
  const result = { x: Math.round(x * perMeter), y: Math.round(y * perMeter), unit };

  for (const value of [result.x, result.y]) {
    if (!Number.isFinite(value) || value < 0 || value > 0xffffffff) {
      throw new ConstraintError(`Physical resolution ${value} outside 0-4294967295`, { chunkType: 'pHYs' });
    }
  }
  return result;
}

/**
 * Dots per inch for a resolution stored per metre, or null when the unit is unspecified
 */
export function physicalToDpi(physical: PhysicalResolution): { x: number; y: number } | null {
  if (physical.unit !== PhysicalUnit.METER) return null;
  return {
    x: Math.round(physical.x * 0.0254),
    y: Math.round(physical.y * 0.0254)
  };
}

function checkSample(value: number, max: number, what: string, chunkType: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ConstraintError(`${what} ${value} outside 0-${max}`, { chunkType });
  }
}

/**
 * Validate encoder metadata against the header and normalize shorthand forms
 */
export function normalizeMetadata(
  header: PngHeader,
  input: PngMetadataInput = {},
  options: { config?: MetadataMapperConfig; textFields?: Record<string, string> } = {}
): PngMetadata {
  const config = options.config ?? DEFAULT_MAPPER_CONFIG;
  const { colorType, bitDepth } = header;
  const sampleMax = maxSampleValue(bitDepth);
  const result: PngMetadata = {};

  const { palette } = input;
  if (palette) {
    if (isGrayscale(colorType)) {
      throw new ConstraintError('Palette not allowed for grayscale images', { chunkType: 'PLTE' });
    }
    const limit = colorType === ColorType.PALETTE ? Math.min(256, 1 << bitDepth) : 256;
    if (palette.length === 0 || palette.length > limit) {
      throw new ConstraintError(`Palette must have 1-${limit} entries, got ${palette.length}`, { chunkType: 'PLTE' });
    }
    palette.forEach((entry) => entry.forEach((value) => checkSample(value, 255, 'Palette value', 'PLTE')));
    result.palette = palette.map((entry): RgbTriple => [entry[0], entry[1], entry[2]]);
  } else if (colorType === ColorType.PALETTE) {
    throw new ConstraintError('Palette images require a palette', { chunkType: 'PLTE' });
  }

  if (input.transparency) {
    const transparency = input.transparency;
    const expected = transparencyKindFor(colorType);
    if (transparency.kind !== expected) {
      throw new ConstraintError(
        expected
          ? `Transparency of kind '${transparency.kind}' does not match color type ${colorType} (expected '${expected}')`
          : `Transparency not allowed for color type ${colorType}, which has an alpha channel`,
        { chunkType: 'tRNS' }
      );
    }
    switch (transparency.kind) {
      case 'palette': {
        const paletteSize = result.palette?.length ?? 0;
        if (transparency.alphas.length > paletteSize) {
          throw new ConstraintError(
            `${transparency.alphas.length} alpha values for ${paletteSize} palette entries`,
            { chunkType: 'tRNS' }
          );
        }
        transparency.alphas.forEach((alpha) => checkSample(alpha, 255, 'Alpha', 'tRNS'));
        result.transparency = { kind: 'palette', alphas: [...transparency.alphas] };
        break;
      }
      case 'gray':
        checkSample(transparency.value, sampleMax, 'Transparent gray', 'tRNS');
        result.transparency = { kind: 'gray', value: transparency.value };
        break;
      case 'rgb':
        transparency.value.forEach((value) => checkSample(value, sampleMax, 'Transparent sample', 'tRNS'));
        result.transparency = { kind: 'rgb', value: [...transparency.value] };
        break;
    }
  }

  if (input.gamma !== undefined) {
    const stored = Math.round(input.gamma * SCALE);
    if (!Number.isFinite(input.gamma) || stored <= 0 || stored > 0xffffffff) {
      throw new ConstraintError(`Gamma ${input.gamma} cannot be stored`, { chunkType: 'gAMA' });
    }
    result.gamma = input.gamma;
  }

  if (input.chromaticities) {
    const chromaticities = input.chromaticities;
    for (const field of CHROMATICITY_FIELDS) {
      const stored = Math.round(chromaticities[field] * SCALE);
      if (!Number.isFinite(chromaticities[field]) || stored < 0 || stored > 0xffffffff) {
        throw new ConstraintError(`Chromaticity ${field} ${chromaticities[field]} cannot be stored`, { chunkType: 'cHRM' });
      }
    }
    result.chromaticities = { ...chromaticities };
  }

  if (input.renderingIntent !== undefined) {
    checkSample(input.renderingIntent, 3, 'Rendering intent', 'sRGB');
    result.renderingIntent = input.renderingIntent;
  }

  if (input.iccProfile) {
    const problem = describeKeywordProblem(input.iccProfile.name);
    if (problem) {
      throw new ConstraintError(`ICC profile name: ${problem}`, { chunkType: 'iCCP' });
    }
    result.iccProfile = { name: input.iccProfile.name, profile: input.iccProfile.profile };
  }

  if (input.significantBits) {
    const expected = significantBitsLength(colorType);
    const max = significantBitsMax(header);
    if (input.significantBits.length !== expected) {
      throw new ConstraintError(
        `Significant bits need ${expected} entries for color type ${colorType}, got ${input.significantBits.length}`,
        { chunkType: 'sBIT' }
      );
    }
    input.significantBits.forEach((bits) => {
      if (!Number.isInteger(bits) || bits < 1 || bits > max) {
        throw new ConstraintError(`Significant bits ${bits} outside 1-${max}`, { chunkType: 'sBIT' });
      }
    });
    result.significantBits = [...input.significantBits];
  }

  if (input.background) {
    const background = input.background;
    const expected = backgroundKindFor(colorType);
    if (background.kind !== expected) {
      throw new ConstraintError(
        `Background of kind '${background.kind}' does not match color type ${colorType} (expected '${expected}')`,
        { chunkType: 'bKGD' }
      );
    }
    switch (background.kind) {
      case 'palette':
        checkSample(background.index, (result.palette?.length ?? 0) - 1, 'Background palette index', 'bKGD');
        result.background = { kind: 'palette', index: background.index };
        break;
      case 'gray':
        checkSample(background.value, sampleMax, 'Background gray', 'bKGD');
        result.background = { kind: 'gray', value: background.value };
        break;
      case 'rgb':
        background.value.forEach((value) => checkSample(value, sampleMax, 'Background sample', 'bKGD'));
        result.background = { kind: 'rgb', value: [...background.value] };
        break;
    }
  }

  if (input.physical !== undefined) {
    result.physical = normalizePhysicalResolution(input.physical);
  }

  if (input.lastModified) {
    const problem = describeTimestampProblem(input.lastModified);
    if (problem) {
      throw new ConstraintError(`Modification time: ${problem}`, { chunkType: 'tIME' });
    }
    result.lastModified = { ...input.lastModified };
  }

  const text: TextEntry[] = (input.text ?? []).map((entry) => ({
    ...entry,
    compressed: entry.compressed ?? false,
    international: entry.international ?? false
  }));
  for (const [keyword, value] of Object.entries(options.textFields ?? {})) {
    if (!config.registeredKeywords.includes(keyword)) {
      throw new ConstraintError(`Keyword ${JSON.stringify(keyword)} is not registered`, { chunkType: 'tEXt' });
    }
    text.push({ keyword, text: value, compressed: false, international: false });
  }
  text.forEach((entry) => {
    const problem = describeKeywordProblem(entry.keyword);
    if (problem) {
      throw new ConstraintError(problem, { chunkType: 'tEXt' });
    }
  });
  if (text.length > 0) {
    result.text = text;
  }

  if (input.unknownChunks && input.unknownChunks.length > 0) {
    result.unknownChunks = input.unknownChunks.map((chunk): UnknownChunk => {
      if (isKnownChunkType(chunk.type) || config.ignoredChunkTypes.has(chunk.type)) {
        throw new ConstraintError(`Chunk ${chunk.type} cannot be written as opaque data`, { chunkType: chunk.type });
      }
      return { ...chunk };
    });
  }

  return result;
}

/**
 * Chunks for a metadata record, split around the image data
 */
export interface EncodedMetadata {
  beforeData: PngChunk[];
  afterData: PngChunk[];
}

/**
 * Encode normalized metadata into ordered chunks. Unknown chunks are placed
 * according to their recorded position.
 */
export function encodeMetadata(
  header: PngHeader,
  metadata: PngMetadata,
  level: CompressionLevel = 6
): EncodedMetadata {
  const context: EncodeContext = { header, level };
  const unknown = metadata.unknownChunks ?? [];
  const opaque = (position: ChunkPosition) =>
    unknown.filter((chunk) => chunk.position === position).map((chunk) => createChunk(chunk.type, chunk.data));

  const beforeData: PngChunk[] = [];
  for (const handler of METADATA_CHUNK_HANDLERS) {
    if (handler.placement === 'palette') {
      beforeData.push(...opaque('beforePalette'));
    }
    beforeData.push(...handler.encode(metadata, context));
  }
  beforeData.push(...opaque('beforeData'));

  return { beforeData, afterData: opaque('afterData') };
}
