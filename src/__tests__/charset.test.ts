import { describe, expect, it, vi } from 'vitest';
import {
  buildCharsetTable,
  charsetMarker,
  listCodes,
  mapCharacter,
  unmapCodepoint,
} from '../charset/table.js';
import { CharsetTableError, UnmappedCharacterError } from '../teletext/errors.js';
import type { CharsetId } from '../types/index.js';

const isSextant = (codepoint: number): boolean => codepoint >= 0x1fb00 && codepoint <= 0x1fb3b;
const isHalfOrFullBlock = (codepoint: number): boolean => [0x258c, 0x2590, 0x2588].includes(codepoint);

describe('charset table', () => {
  it('maps contiguous mosaics to legacy computing sextants', () => {
    expect(mapCharacter('g1-mosaic', 0x20)).toBe(0x20);
    expect(mapCharacter('g1-mosaic', 0x21)).toBe(0x1fb00);
    expect(mapCharacter('g1-mosaic', 0x7e)).toBe(0x1fb3b);
  });

  it('maps the two half blocks and the full block outside the sextant range', () => {
    expect(mapCharacter('g1-mosaic', 0x35)).toBe(0x258c);
    expect(mapCharacter('g1-mosaic', 0x6a)).toBe(0x2590);
    expect(mapCharacter('g1-mosaic', 0x7f)).toBe(0x2588);
  });

  it('keeps blast-through capitals in the mosaic set', () => {
    expect(mapCharacter('g1-mosaic', 0x41)).toBe(0x41);
  });

  it('maps the german national option characters', () => {
    expect(String.fromCodePoint(mapCharacter('g0-german', 0x5b))).toBe('Ä');
    expect(String.fromCodePoint(mapCharacter('g0-german', 0x7c))).toBe('ö');
    expect(String.fromCodePoint(mapCharacter('g0-german', 0x7e))).toBe('ß');
    expect(String.fromCodePoint(mapCharacter('g0-german', 0x40))).toBe('§');
  });

  it('differs from the english option where the national sets differ', () => {
    expect(String.fromCodePoint(mapCharacter('g0-latin', 0x23))).toBe('£');
    expect(String.fromCodePoint(mapCharacter('g0-german', 0x23))).toBe('#');
  });

  it('succeeds for every declared mosaic code with a block graphic or latin codepoint', () => {
    const codes = listCodes('g1-mosaic');
    expect(codes).toHaveLength(96);
    for (const code of codes) {
      const codepoint = mapCharacter('g1-mosaic', code);
      const isLatin = codepoint >= 0x20 && codepoint <= 0x5f;
      expect(isSextant(codepoint) || isHalfOrFullBlock(codepoint) || isLatin).toBe(true);
    }
  });

  it('succeeds for every declared code of the text sets', () => {
    const charsets: CharsetId[] = ['g0-latin', 'g0-german'];
    for (const charset of charsets) {
      const codes = listCodes(charset);
      expect(codes).toHaveLength(96);
      for (const code of codes) {
        expect(unmapCodepoint(charset, mapCharacter(charset, code))).toBe(code);
      }
    }
  });

  it('raises UnmappedCharacter for codes outside the table', () => {
    expect(() => mapCharacter('g1-mosaic', 0x10)).toThrow(UnmappedCharacterError);
    expect(() => mapCharacter('g0-german', 0x80)).toThrow(UnmappedCharacterError);
    expect(() => unmapCodepoint('g1-mosaic', 0x1fb70)).toThrow(UnmappedCharacterError);
  });

  it('keeps a marker for the separated set although it has no glyphs', () => {
    expect(charsetMarker('g1-separated')).toBe(1);
    expect(charsetMarker('g1-mosaic')).toBe(0);
    expect(listCodes('g1-separated')).toEqual([]);
    expect(() => mapCharacter('g1-separated', 0x21)).toThrow(UnmappedCharacterError);
  });

  it('maps codepoints back to raw codes', () => {
    expect(unmapCodepoint('g1-mosaic', 0x2588)).toBe(0x7f);
    expect(unmapCodepoint('g0-german', 0xdf)).toBe(0x7e);
  });
});

describe('buildCharsetTable', () => {
  it('rejects documents of the wrong shape', () => {
    expect(() => buildCharsetTable({ version: 1, charsets: [] })).toThrow(CharsetTableError);
    expect(() => buildCharsetTable('not a table')).toThrow(CharsetTableError);
  });

  it('rejects duplicate raw codes', () => {
    const document = {
      version: 1,
      charsets: [{ id: 'g1-mosaic', marker: 0, description: 'test', codes: [[32, 32], [32, 33]] }],
    };
    expect(() => buildCharsetTable(document)).toThrow('Duplicate code 0x20 in charset g1-mosaic');
  });

  it('rejects duplicate charsets', () => {
    const entry = { id: 'g0-latin', marker: 0, description: 'test', codes: [] };
    expect(() => buildCharsetTable({ version: 1, charsets: [entry, entry] })).toThrow('Duplicate charset g0-latin');
  });
});

describe('loadCharsetTable', () => {
  it('fails when the table file is missing', async () => {
    vi.resetModules();
    const { loadCharsetTable } = await import('../charset/table.js');
    expect(() => loadCharsetTable('/nonexistent/charsets.json')).toThrow(/Cannot read charset table/);
  });

  it('returns the same table on every call', async () => {
    vi.resetModules();
    const { loadCharsetTable } = await import('../charset/table.js');
    expect(loadCharsetTable()).toBe(loadCharsetTable());
  });

  it('refuses to switch to another file once a table is loaded', async () => {
    vi.resetModules();
    const { DEFAULT_CHARSET_TABLE_PATH, loadCharsetTable } = await import('../charset/table.js');
    const loaded = loadCharsetTable(DEFAULT_CHARSET_TABLE_PATH);
    expect(loadCharsetTable(DEFAULT_CHARSET_TABLE_PATH)).toBe(loaded);
    expect(() => loadCharsetTable('/tmp/other-charsets.json'))
      .toThrow(`Charset table ${DEFAULT_CHARSET_TABLE_PATH} is already loaded, cannot switch to /tmp/other-charsets.json`);
  });
});
