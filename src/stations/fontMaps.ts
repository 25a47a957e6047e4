import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { FontMapFileSchema } from '../schemas/station.js';
import { FontMapError, errorMessage } from '../teletext/errors.js';
import type { FontGlyph, FontMap } from '../types/index.js';

export const DEFAULT_FONT_MAP_DIR = fileURLToPath(new URL('../../data/fontmaps', import.meta.url));

const cache = new Map<string, FontMap>();

export function buildFontMap(document: unknown): FontMap {
  const parsed = FontMapFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new FontMapError(`Invalid font map: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }

  const glyphs = new Map<number, FontGlyph>();
  for (const { glyph, charset, code } of parsed.data.glyphs) {
    if (glyphs.has(glyph)) {
      throw new FontMapError(`Duplicate glyph ${glyph} in font map ${parsed.data.font}`);
    }
    glyphs.set(glyph, { charset, code });
  }
  return { font: parsed.data.font, glyphs };
}

/** Read data/fontmaps/<name>.json, once per directory and name */
export function loadFontMap(name: string, dir: string = DEFAULT_FONT_MAP_DIR): FontMap {
  const file = path.join(dir, `${name}.json`);
  const cached = cache.get(file);
  if (cached) return cached;

  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new FontMapError(`Cannot read font map ${file}: ${errorMessage(error)}`);
  }

  const fontMap = buildFontMap(document);
  cache.set(file, fontMap);
  return fontMap;
}
