import fs from 'fs';
import { fileURLToPath } from 'url';
import { CharsetFileSchema } from '../schemas/charset.js';
import { CharsetTableError, UnmappedCharacterError, errorMessage } from '../teletext/errors.js';
import type { CharsetId } from '../types/index.js';

export const DEFAULT_CHARSET_TABLE_PATH = fileURLToPath(new URL('../../data/charsets.json', import.meta.url));

interface CharsetMapping {
  readonly marker: number;
  readonly toUnicode: ReadonlyMap<number, number>;
  readonly fromUnicode: ReadonlyMap<number, number>;
}

export type CharsetTable = ReadonlyMap<CharsetId, CharsetMapping>;

let table: CharsetTable | null = null;
let tablePath: string | null = null;

/**
 * Parse and index a charset table document. Throws CharsetTableError on any
 * structural problem, duplicate charset or duplicate raw code.
 */
export function buildCharsetTable(document: unknown): CharsetTable {
  const parsed = CharsetFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new CharsetTableError(`Invalid charset table: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }

  const result = new Map<CharsetId, CharsetMapping>();
  for (const entry of parsed.data.charsets) {
    if (result.has(entry.id)) {
      throw new CharsetTableError(`Duplicate charset ${entry.id}`);
    }

    const toUnicode = new Map<number, number>();
    const fromUnicode = new Map<number, number>();
    for (const [code, codepoint] of entry.codes) {
      if (toUnicode.has(code)) {
        throw new CharsetTableError(`Duplicate code 0x${code.toString(16)} in charset ${entry.id}`);
      }
      toUnicode.set(code, codepoint);
      if (!fromUnicode.has(codepoint)) {
        fromUnicode.set(codepoint, code);
      }
    }

    result.set(entry.id, Object.freeze({ marker: entry.marker, toUnicode, fromUnicode }));
  }

  return result;
}

/**
 * Load the process-wide table. Only the first call reads the file; later
 * calls without a path, or with the same path, return the same instance.
 * Asking for another file once a table is loaded throws.
 */
export function loadCharsetTable(path?: string): CharsetTable {
  if (table) {
    if (path !== undefined && path !== tablePath) {
      throw new CharsetTableError(`Charset table ${tablePath} is already loaded, cannot switch to ${path}`);
    }
    return table;
  }
  const file = path ?? DEFAULT_CHARSET_TABLE_PATH;

  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new CharsetTableError(`Cannot read charset table ${file}: ${errorMessage(error)}`);
  }

  table = buildCharsetTable(document);
  tablePath = file;
  return table;
}

function getCharset(charset: CharsetId): CharsetMapping {
  const mapping = loadCharsetTable().get(charset);
  if (!mapping) {
    throw new CharsetTableError(`Charset ${charset} is missing from the table`);
  }
  return mapping;
}

export function mapCharacter(charset: CharsetId, rawCode: number): number {
  const codepoint = getCharset(charset).toUnicode.get(rawCode);
  if (codepoint === undefined) {
    throw new UnmappedCharacterError(charset, rawCode);
  }
  return codepoint;
}

export function unmapCodepoint(charset: CharsetId, codepoint: number): number {
  const code = getCharset(charset).fromUnicode.get(codepoint);
  if (code === undefined) {
    throw new UnmappedCharacterError(charset, codepoint);
  }
  return code;
}

export function charsetMarker(charset: CharsetId): number {
  return getCharset(charset).marker;
}

export function listCodes(charset: CharsetId): number[] {
  return Array.from(getCharset(charset).toUnicode.keys());
}
