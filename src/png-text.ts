/**
 * Textual chunks: tEXt, zTXt and iTXt.
 *
 * Text that cannot be written in Latin-1 is moved to iTXt (UTF-8)
 * automatically instead of being rejected.
 */

import { ConstraintError, FormatError } from './errors.js';
import type { CompressionLevel, PngChunk, TextEntry } from './types.js';
import {
  bytesToString,
  bytesToUtf8,
  concatBytes,
  indexOfNull,
  isLatin1,
  stringToBytes,
  utf8ToBytes
} from './utils.js';
import { createChunk } from './png-writer.js';
import { inflateData } from './streaming-inflate.js';
import { deflateData } from './streaming-deflate.js';

const MAX_KEYWORD_LENGTH = 79;
const LANGUAGE_TAG_PATTERN = /^[A-Za-z0-9-]*$/;

/**
 * Problem with a keyword, or null when it is usable.
 * Keywords are 1-79 printable Latin-1 characters without leading, trailing
 * or consecutive spaces.
 */
export function describeKeywordProblem(keyword: string): string | null {
  if (keyword.length === 0 || keyword.length > MAX_KEYWORD_LENGTH) {
    return `Keyword must be 1-${MAX_KEYWORD_LENGTH} characters, got ${keyword.length}`;
  }
  for (let i = 0; i < keyword.length; i++) {
    const code = keyword.charCodeAt(i);
    const printable = (code >= 32 && code <= 126) || (code >= 161 && code <= 255);
    if (!printable) {
      return `Keyword ${JSON.stringify(keyword)} contains a character outside printable Latin-1`;
    }
  }
  if (keyword.startsWith(' ') || keyword.endsWith(' ') || keyword.includes('  ')) {
    return `Keyword ${JSON.stringify(keyword)} has leading, trailing or consecutive spaces`;
  }
  return null;
}

/**
 * Split "keyword\0rest" and return the keyword plus the offset after the separator
 */
function readKeyword(chunk: PngChunk): { keyword: string; next: number } {
  const end = indexOfNull(chunk.data);
  if (end < 1) {
    throw new FormatError(`${chunk.type} chunk has no keyword`, { chunkType: chunk.type });
  }
  return { keyword: bytesToString(chunk.data, 0, end), next: end + 1 };
}

function decompressText(chunk: PngChunk, method: number, data: Uint8Array): Uint8Array {
  if (method !== 0) {
    throw new FormatError(`Unsupported compression method ${method} in ${chunk.type}`, {
      chunkType: chunk.type
    });
  }
  return inflateData(data, chunk.type);
}

/**
 * Decode a tEXt, zTXt or iTXt chunk
 */
export function decodeTextChunk(chunk: PngChunk): TextEntry {
  const { keyword, next } = readKeyword(chunk);
  const { data } = chunk;

  switch (chunk.type) {
    case 'tEXt':
      return {
        keyword,
        text: bytesToString(data, next),
        compressed: false,
        international: false
      };

    case 'zTXt': {
      if (next >= data.length) {
        throw new FormatError('zTXt chunk is missing its compression method', { chunkType: 'zTXt' });
      }
      const inflated = decompressText(chunk, data[next], data.subarray(next + 1));
      return {
        keyword,
        text: bytesToString(inflated),
        compressed: true,
        international: false
      };
    }

    case 'iTXt': {
      if (next + 2 > data.length) {
        throw new FormatError('iTXt chunk is truncated', { chunkType: 'iTXt' });
      }
      const compressionFlag = data[next];
      const compressionMethod = data[next + 1];
      if (compressionFlag !== 0 && compressionFlag !== 1) {
        throw new FormatError(`Invalid iTXt compression flag ${compressionFlag}`, { chunkType: 'iTXt' });
      }

      const languageEnd = indexOfNull(data, next + 2);
      const translatedEnd = languageEnd < 0 ? -1 : indexOfNull(data, languageEnd + 1);
      if (translatedEnd < 0) {
        throw new FormatError('iTXt chunk is missing a null separator', { chunkType: 'iTXt' });
      }

      const languageTag = bytesToString(data, next + 2, languageEnd - (next + 2));
      let translatedKeyword: string;
      let text: string;
      try {
        translatedKeyword = bytesToUtf8(data.subarray(languageEnd + 1, translatedEnd));
        const body = data.subarray(translatedEnd + 1);
        text = bytesToUtf8(compressionFlag === 1 ? decompressText(chunk, compressionMethod, body) : body);
      } catch (err) {
        if (err instanceof TypeError) {
          throw new FormatError('iTXt chunk holds malformed UTF-8', { chunkType: 'iTXt', cause: err });
        }
        throw err;
      }

      const entry: TextEntry = {
        keyword,
        text,
        compressed: compressionFlag === 1,
        international: true
      };
      if (languageTag) entry.languageTag = languageTag;
      if (translatedKeyword) entry.translatedKeyword = translatedKeyword;
      return entry;
    }

    default:
      throw new FormatError(`Not a text chunk: ${chunk.type}`, { chunkType: chunk.type });
  }
}

/**
 * Which chunk type an entry will be written as
 */
export function textChunkTypeFor(entry: Pick<TextEntry, 'text'> & Partial<TextEntry>): 'tEXt' | 'zTXt' | 'iTXt' {
  const needsInternational =
    entry.international === true ||
    !isLatin1(entry.text) ||
    (entry.languageTag !== undefined && entry.languageTag !== '') ||
    (entry.translatedKeyword !== undefined && entry.translatedKeyword !== '');

  if (needsInternational) return 'iTXt';
  return entry.compressed ? 'zTXt' : 'tEXt';
}

/**
 * Encode a text entry as a tEXt, zTXt or iTXt chunk
 */
export function encodeTextEntry(
  entry: Pick<TextEntry, 'keyword' | 'text'> & Partial<TextEntry>,
  level: CompressionLevel = 6
): PngChunk {
  const problem = describeKeywordProblem(entry.keyword);
  if (problem) {
    throw new ConstraintError(problem, { chunkType: 'tEXt' });
  }

  const keyword = stringToBytes(entry.keyword);
  const separator = new Uint8Array([0]);
  const type = textChunkTypeFor(entry);

  switch (type) {
    case 'tEXt':
      return createChunk(type, concatBytes([keyword, separator, stringToBytes(entry.text)]));

    case 'zTXt':
      return createChunk(type, concatBytes([
        keyword,
        new Uint8Array([0, 0]),
        deflateData(stringToBytes(entry.text), level)
      ]));

    case 'iTXt': {
      const languageTag = entry.languageTag ?? '';
      if (!LANGUAGE_TAG_PATTERN.test(languageTag)) {
        throw new ConstraintError(`Invalid iTXt language tag ${JSON.stringify(languageTag)}`, { chunkType: 'iTXt' });
      }
      const body = utf8ToBytes(entry.text);
      const compressed = entry.compressed === true;
      return createChunk(type, concatBytes([
        keyword,
        new Uint8Array([0, compressed ? 1 : 0, 0]),
        stringToBytes(languageTag),
        separator,
        utf8ToBytes(entry.translatedKeyword ?? ''),
        separator,
        compressed ? deflateData(body, level) : body
      ]));
    }
  }
}
