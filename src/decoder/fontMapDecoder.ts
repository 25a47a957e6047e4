import { charsetMarker } from '../charset/table.js';
import { DEFAULT_ATTRIBUTE, createAttribute, rgbToColor } from '../teletext/attribute.js';
import { MalformedPayloadError, UnmappedCharacterError } from '../teletext/errors.js';
import { DecodeContext } from './context.js';
import { anchorLink, applyFlagClasses, classList, loadDocument, walk, type WalkState } from './document.js';
import type { Element } from 'domhandler';
import type { DecodeOptions, DecodedPage, FontMap, FontMapStation } from '../types/index.js';

const FOREGROUND_CLASS_REGEX = /^c([0-9a-f]{3}|[0-9a-f]{6})$/i;
const BACKGROUND_CLASS_REGEX = /^bc([0-9a-f]{3}|[0-9a-f]{6})$/i;

function enterElement(element: Element, state: WalkState, fontMap: FontMap, station: FontMapStation): WalkState {
  const classes = classList(element);
  let { foreground, background } = state.attribute;
  let glyphFont = state.glyphFont;

  for (const cls of classes) {
    const fg = cls.match(FOREGROUND_CLASS_REGEX);
    const bg = cls.match(BACKGROUND_CLASS_REGEX);
    if (fg) {
      foreground = rgbToColor(fg[1]);
    } else if (bg) {
      background = rgbToColor(bg[1]);
    } else if (cls === fontMap.font) {
      glyphFont = true;
    }
  }

  const attribute = applyFlagClasses(
    createAttribute({ ...state.attribute, foreground, background, graphics: state.attribute.graphics || glyphFont }),
    classes,
    station.flagClasses
  );

  return {
    ...state,
    attribute,
    glyphFont,
    collect: state.collect || element.name === 'span' || element.name === 'a',
  };
}

function decodeGlyphs(data: string, state: WalkState, fontMap: FontMap, context: DecodeContext): void {
  for (const char of data) {
    const codepoint = char.codePointAt(0) ?? 0;
    const glyph = fontMap.glyphs.get(codepoint);
    if (!glyph) {
      context.append(context.unmapped(new UnmappedCharacterError(fontMap.font, codepoint)), state.attribute, state.link);
      continue;
    }
    const attribute = createAttribute({ ...state.attribute, charset: charsetMarker(glyph.charset) });
    context.append(context.mapGlyph(glyph.charset, glyph.code), attribute, state.link);
  }
}

/**
 * Decode a page rendered as div rows of colored spans where mosaic cells
 * are characters of a station web font, translated through its font map.
 */
export function decodeFontMapHtml(
  payload: unknown,
  station: FontMapStation,
  fontMap: FontMap,
  options: DecodeOptions = {}
): DecodedPage {
  const $ = loadDocument(payload, station.encodingFixes);
  const content = $('#content');
  if (content.length === 0) {
    throw new MalformedPayloadError(`Missing #content in ${station.id} page`);
  }

  const context = new DecodeContext(options);
  const initial: WalkState = { attribute: DEFAULT_ATTRIBUTE, collect: false, glyphFont: false };

  content.find('div.row').each((_, row) => {
    context.newRow();
    walk(row.children, initial, {
      enter: (element, state) => ({
        ...enterElement(element, state, fontMap, station),
        link: anchorLink(element, state, context, station),
      }),
      text: (data, state) => {
        // a div.row is exactly one display row, <br> included
        const text = data.replace(/[\r\n]/g, '');
        if (state.glyphFont) {
          decodeGlyphs(text, state, fontMap, context);
        } else {
          context.append(text, state.attribute, state.link);
        }
      },
    });
  });

  return { rows: context.build(), warnings: context.warnings };
}
