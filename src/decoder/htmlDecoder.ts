import { charsetMarker } from '../charset/table.js';
import { createAttribute, paletteColor, rgbToColor } from '../teletext/attribute.js';
import { MalformedPayloadError } from '../teletext/errors.js';
import { DecodeContext } from './context.js';
import {
  anchorLink,
  applyFlagClasses,
  classList,
  isFlagClass,
  loadDocument,
  walk,
  type WalkState,
} from './document.js';
import { isTag, type Element } from 'domhandler';
import type { Attribute, CharsetId, DecodeOptions, DecodedPage, HtmlStation } from '../types/index.js';

const STYLE_DECLARATION_REGEX = /(?:^|;)\s*(color|background-color|background)\s*:\s*([^;]+)/gi;

function styleAttribute(element: Element, station: HtmlStation, inherited: Attribute): Attribute {
  let { foreground, background } = inherited;
  const classes = classList(element);

  for (const cls of classes) {
    if (isFlagClass(cls, station.flagClasses)) continue;
    if (station.foregroundClassPrefix && cls.startsWith(station.foregroundClassPrefix)) {
      foreground = paletteColor(cls.slice(station.foregroundClassPrefix.length));
    } else if (station.backgroundClassPrefix && cls.startsWith(station.backgroundClassPrefix)) {
      background = paletteColor(cls.slice(station.backgroundClassPrefix.length));
    }
  }

  const style = element.attribs.style;
  if (style) {
    for (const [, property, value] of style.matchAll(STYLE_DECLARATION_REGEX)) {
      const color = rgbToColor(value.trim());
      if (property.toLowerCase() === 'color') {
        foreground = color;
      } else {
        background = color;
      }
    }
  }

  return applyFlagClasses(createAttribute({ ...inherited, foreground, background }), classes, station.flagClasses);
}

/**
 * Private-use codepoints carry mosaic cells: the offset from the base is the
 * G1 column position, higher offsets are the separated variant.
 */
function mosaicCode(codepoint: number, station: HtmlStation): { charset: CharsetId; code: number } {
  let offset = codepoint - (station.mosaicBase ?? 0);
  let charset: CharsetId = 'g1-mosaic';
  const separatedOffset = station.separatedOffset ?? 0x40;
  if (offset > separatedOffset) {
    offset -= separatedOffset;
    charset = 'g1-separated';
  }

  let code = offset + 0x20;
  if (code >= 0x40 && code <= 0x5f) {
    code += 0x20;
  }
  return { charset, code };
}

function decodeText(data: string, state: WalkState, station: HtmlStation, context: DecodeContext): void {
  const base = station.mosaicBase;
  if (base === undefined) {
    context.append(data, state.attribute, state.link);
    return;
  }

  for (const char of data) {
    const codepoint = char.codePointAt(0) ?? 0;
    if (codepoint < base) {
      context.append(char, state.attribute, state.link);
      continue;
    }
    const { charset, code } = mosaicCode(codepoint, station);
    const attribute = createAttribute({ ...state.attribute, charset: charsetMarker(charset) });
    context.append(context.mapGlyph(charset, code), attribute, state.link);
  }
}

/**
 * Decode a station page that keeps its rows as lines of a preformatted
 * container, colored through palette classes or inline styles.
 */
export function decodeHtml(payload: unknown, station: HtmlStation, options: DecodeOptions = {}): DecodedPage {
  const $ = loadDocument(payload);
  const container = $(station.container).get(0);
  if (!container || !isTag(container)) {
    throw new MalformedPayloadError(`Missing ${station.container} in ${station.id} page`);
  }

  const context = new DecodeContext(options);
  context.newRow();

  const initial: WalkState = {
    attribute: createAttribute({ foreground: station.defaultForeground, background: station.defaultBackground }),
    collect: true,
    glyphFont: false,
  };

  walk(container.children, initial, {
    enter: (element, state) => ({
      ...state,
      attribute: styleAttribute(element, station, state.attribute),
      link: anchorLink(element, state, context, station),
    }),
    text: (data, state) => decodeText(data, state, station, context),
    lineBreak: () => context.newRow(),
  });

  context.trimTrailingRow();
  return { rows: context.build(), warnings: context.warnings };
}
