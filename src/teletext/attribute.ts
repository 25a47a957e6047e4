import { MalformedPayloadError, RecordFormatError } from './errors.js';
import type { Attribute, Color } from '../types/index.js';

// "l" for blue keeps "b" free for black
export const COLOR_CODES: Record<Color, string> = {
  black: 'b',
  red: 'r',
  green: 'g',
  yellow: 'y',
  blue: 'l',
  magenta: 'm',
  cyan: 'c',
  white: 'w',
};

// Teletext palette order, also the bit pattern (red=1, green=2, blue=4)
const PALETTE: readonly Color[] = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'];

const CODE_COLORS = new Map<string, Color>(PALETTE.map((color): [string, Color] => [COLOR_CODES[color], color]));

const UNSET_CODE = '_';

const FLAG_CODES = [
  ['doubleHeight', 'd'],
  ['flashing', 'f'],
  ['concealed', 'h'],
  ['graphics', 'x'],
] as const;

const ATTRIBUTE_CODE_REGEX = /^([brgylmcw_])([brgylmcw_])([1-9])?(d?)(f?)(h?)(x?)$/;

export const DEFAULT_ATTRIBUTE: Attribute = createAttribute({});

export function createAttribute(fields: Partial<Attribute>): Attribute {
  return Object.freeze({
    foreground: fields.foreground ?? null,
    background: fields.background ?? null,
    charset: fields.charset ?? 0,
    doubleHeight: fields.doubleHeight ?? false,
    flashing: fields.flashing ?? false,
    concealed: fields.concealed ?? false,
    graphics: fields.graphics ?? false,
  });
}

export function attributesEqual(a: Attribute, b: Attribute): boolean {
  return a.foreground === b.foreground
    && a.background === b.background
    && a.charset === b.charset
    && a.doubleHeight === b.doubleHeight
    && a.flashing === b.flashing
    && a.concealed === b.concealed
    && a.graphics === b.graphics;
}

/**
 * Compact attribute code: foreground and background letters, then the
 * charset marker digit and flag letters when they are set.
 */
export function encodeAttribute(attribute: Attribute): string {
  let code = colorCode(attribute.foreground) + colorCode(attribute.background);
  if (attribute.charset) {
    code += String(attribute.charset);
  }
  for (const [field, letter] of FLAG_CODES) {
    if (attribute[field]) code += letter;
  }
  return code;
}

export function decodeAttribute(code: string): Attribute {
  const match = code.match(ATTRIBUTE_CODE_REGEX);
  if (!match) {
    throw new RecordFormatError(`Invalid attribute code '${code}'`);
  }

  const [, fg, bg, marker, doubleHeight, flashing, concealed, graphics] = match;
  return createAttribute({
    foreground: codeColor(fg),
    background: codeColor(bg),
    charset: marker ? Number(marker) : 0,
    doubleHeight: Boolean(doubleHeight),
    flashing: Boolean(flashing),
    concealed: Boolean(concealed),
    graphics: Boolean(graphics),
  });
}

function colorCode(color: Color | null): string {
  return color === null ? UNSET_CODE : COLOR_CODES[color];
}

function codeColor(code: string | undefined): Color | null {
  if (code === undefined || code === UNSET_CODE) return null;
  const color = CODE_COLORS.get(code);
  if (!color) {
    throw new RecordFormatError(`Unknown color code '${code}'`);
  }
  return color;
}

export function paletteColor(index: string): Color {
  const color = /^[0-7]$/.test(index) ? PALETTE[Number(index)] : undefined;
  if (!color) {
    throw new MalformedPayloadError(`Unknown palette color '${index}'`);
  }
  return color;
}

/**
 * Reduce a CSS hex color to the nearest teletext color. A channel counts as
 * on above 5 per nibble (#rgb) or above 0x50 per byte (#rrggbb).
 */
export function rgbToColor(hex: string): Color {
  const value = hex.startsWith('#') ? hex.slice(1) : hex;
  if (!/^([0-9a-f]{3}|[0-9a-f]{6})$/i.test(value)) {
    throw new MalformedPayloadError(`Can't convert rgb value '${hex}'`);
  }

  const rgb = parseInt(value, 16);
  const [red, green, blue] = value.length === 3
    ? [((rgb >> 8) & 0xf) > 5, ((rgb >> 4) & 0xf) > 5, (rgb & 0xf) > 5]
    : [((rgb >> 16) & 0xff) > 0x50, ((rgb >> 8) & 0xff) > 0x50, (rgb & 0xff) > 0x50];

  return PALETTE[(red ? 1 : 0) | (green ? 2 : 0) | (blue ? 4 : 0)];
}
