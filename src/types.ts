import type { DeflateOptions } from 'pako';
import type { FilterType } from './png-filter.js';

/**
 * PNG chunk structure
 */
export interface PngChunk {
  length: number;
  type: string;
  data: Uint8Array;
  crc: number;
}

/**
 * PNG color types
 */
export enum ColorType {
  GRAYSCALE = 0,
  RGB = 2,
  PALETTE = 3,
  GRAYSCALE_ALPHA = 4,
  RGBA = 6
}

export type BitDepth = 1 | 2 | 4 | 8 | 16;

/**
 * PNG image header (IHDR) information.
 * Compression and filter methods are always 0 and are not carried here.
 */
export interface PngHeader {
  width: number;
  height: number;
  bitDepth: BitDepth;
  colorType: ColorType;
  interlaced: boolean;
}

export type RgbTriple = [number, number, number];

/**
 * tRNS contents. Each variant is only legal for one color type:
 * `palette` for PALETTE, `gray` for GRAYSCALE, `rgb` for RGB.
 */
export type Transparency =
  | { kind: 'palette'; alphas: number[] }
  | { kind: 'gray'; value: number }
  | { kind: 'rgb'; value: RgbTriple };

/**
 * bKGD contents: `palette` for PALETTE, `gray` for GRAYSCALE(_ALPHA),
 * `rgb` for RGB(A).
 */
export type Background =
  | { kind: 'palette'; index: number }
  | { kind: 'gray'; value: number }
  | { kind: 'rgb'; value: RgbTriple };

export interface Chromaticities {
  whiteX: number;
  whiteY: number;
  redX: number;
  redY: number;
  greenX: number;
  greenY: number;
  blueX: number;
  blueY: number;
}

export enum RenderingIntent {
  PERCEPTUAL = 0,
  RELATIVE_COLORIMETRIC = 1,
  SATURATION = 2,
  ABSOLUTE_COLORIMETRIC = 3
}

export enum PhysicalUnit {
  UNSPECIFIED = 0,
  METER = 1
}

export interface PhysicalResolution {
  /** Pixels per unit, X axis */
  x: number;
  /** Pixels per unit, Y axis */
  y: number;
  unit: PhysicalUnit;
}

export type PhysicalUnitName = 'unspecified' | 'meter' | 'm' | 'cm' | 'i' | 'inch';

export type PhysicalUnitInput = PhysicalUnit | PhysicalUnitName;

/**
 * Accepted shorthands for pHYs. All of them normalize to {@link PhysicalResolution}.
 * A pair of plain numbers is always read as (x, y); a unit in second position
 * must be spelled as a name.
 *
 * @example
 * 2835                  // 2835 px/unit on both axes, unit unspecified
 * [300, 'i']            // 300 dpi, stored as 11811 px/m
 * [[300, 150], 'i']     // different dpi per axis
 * [72, 72, 'inch']
 * { x: 1, y: 2, unit: PhysicalUnit.UNSPECIFIED }  // pixel aspect ratio 1:2
 */
export type PhysicalResolutionInput =
  | number
  | [number]
  | [number, number]
  | [number, number, PhysicalUnitInput]
  | [number, PhysicalUnitName]
  | [[number, number], PhysicalUnitInput]
  | { x: number; y: number; unit?: PhysicalUnitInput };

export interface PngTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface IccProfileData {
  /** Profile name, 1-79 Latin-1 characters */
  name: string;
  /** Uncompressed profile bytes */
  profile: Uint8Array;
}

export interface TextEntry {
  keyword: string;
  text: string;
  /** Stored (or to be stored) deflate-compressed: zTXt, or iTXt with the compression flag */
  compressed: boolean;
  /** Stored (or to be stored) as iTXt */
  international: boolean;
  languageTag?: string;
  translatedKeyword?: string;
}

/**
 * Where an opaque chunk sits relative to PLTE and the image data
 */
export type ChunkPosition = 'beforePalette' | 'beforeData' | 'afterData';

export interface UnknownChunk {
  type: string;
  data: Uint8Array;
  position: ChunkPosition;
}

/**
 * Structured view of the ancillary chunks (and PLTE)
 */
export interface PngMetadata {
  palette?: RgbTriple[];
  transparency?: Transparency;
  /** File gamma, e.g. 0.45455; stored as round(gamma * 100000) */
  gamma?: number;
  chromaticities?: Chromaticities;
  renderingIntent?: RenderingIntent;
  iccProfile?: IccProfileData;
  /** One entry per channel, PALETTE images give 3 (RGB of the palette) */
  significantBits?: number[];
  background?: Background;
  physical?: PhysicalResolution;
  lastModified?: PngTimestamp;
  text?: TextEntry[];
  unknownChunks?: UnknownChunk[];
}

/**
 * Metadata as accepted by the encoder: pHYs may be given in any shorthand form
 */
export type PngMetadataInput = Omit<PngMetadata, 'physical' | 'text'> & {
  physical?: PhysicalResolutionInput;
  text?: Array<Pick<TextEntry, 'keyword' | 'text'> & Partial<TextEntry>>;
};

export type SampleArray = Uint8Array | Uint16Array;

/**
 * Unpacked samples in row-major order, `height * width * channels` values.
 * Palette images hold palette indices.
 */
export interface PngRaster<TSamples extends ArrayLike<number> = SampleArray> {
  width: number;
  height: number;
  channels: number;
  bitDepth: BitDepth;
  samples: TSamples;
}

export interface DecodedPng {
  header: PngHeader;
  metadata: PngMetadata;
  raster: PngRaster;
  /**
   * Only set when decoding with `allowPartial`: the error that stopped
   * decoding. The raster then holds whatever rows were complete.
   */
  error?: Error;
}

export interface PngImageInput {
  header: PngHeader;
  metadata?: PngMetadataInput;
  /** Raster samples; width/height/channels/bitDepth are taken from the header */
  samples: ArrayLike<number>;
}

export type Logger = (message: string) => void;

/**
 * Static tables the metadata mapper works from. Passed in rather than
 * registered globally, so concurrent codecs never share state.
 */
export interface MetadataMapperConfig {
  /** Chunks that are accepted and dropped on decode and never written */
  ignoredChunkTypes: ReadonlySet<string>;
  /** Keywords accepted by `EncodeOptions.textFields` */
  registeredKeywords: readonly string[];
}

export type SignificantBitsPolicy = 'max' | 'per-channel';

/**
 * Configuration for decoding
 */
export interface DecodeOptions {
  /**
   * Receives warnings about recoverable anomalies (duplicate chunks,
   * trailing data, unknown critical chunks).
   * Default: console.warn
   */
  logger?: Logger;

  /**
   * Rescale samples using the sBIT chunk so that the significant bits span
   * the full bit depth. Default: false (samples are returned as stored)
   */
  applySignificantBits?: boolean;

  /**
   * How differing per-channel sBIT widths are reconciled.
   * - 'max': every channel uses the largest reported width (default)
   * - 'per-channel': each channel is rescaled with its own width
   */
  significantBitsPolicy?: SignificantBitsPolicy;

  /**
   * Return the rows decoded before an error instead of throwing.
   * Intended for diagnostic tooling. Errors before the header is known
   * are always thrown. Default: false
   */
  allowPartial?: boolean;

  /** Override the ignored-chunk and keyword tables */
  mapper?: Partial<MetadataMapperConfig>;
}

export type CompressionLevel = NonNullable<DeflateOptions['level']>;

/**
 * Cost function used by adaptive filtering; lower is better.
 */
export type FilterCostFunction = (filtered: Uint8Array) => number;

/**
 * 'adaptive' chooses a filter per row by cost; a FilterType forces one filter for every row
 */
export type FilterStrategy = 'adaptive' | FilterType;

/**
 * Configuration for encoding
 */
export interface EncodeOptions {
  /**
   * Maximum payload size of each IDAT chunk in bytes.
   * Default: 2^31 - 1 (one chunk unless the stream is huge)
   */
  chunkSizeLimit?: number;

  /**
   * Scanline filter selection. Default: 'adaptive'
   */
  filter?: FilterStrategy;

  /**
   * Cost heuristic for adaptive filtering.
   * Default: sum of absolute values with bytes read as signed
   */
  filterCost?: FilterCostFunction;

  /**
   * zlib compression level (-1 to 9). Default: 6
   */
  compressionLevel?: CompressionLevel;

  /**
   * Text for registered keywords (see MetadataMapperConfig.registeredKeywords),
   * written as tEXt/iTXt after `metadata.text`.
   *
   * @example
   * textFields: { Title: 'Sunset', Software: 'scanline-png' }
   */
  textFields?: Record<string, string>;

  /** Override the ignored-chunk and keyword tables */
  mapper?: Partial<MetadataMapperConfig>;
}
