import { charsetMarker } from '../charset/table.js';
import { JsonPayloadSchema, type JsonColumn, type JsonPayload } from '../schemas/station.js';
import { createAttribute, rgbToColor } from '../teletext/attribute.js';
import { MalformedPayloadError } from '../teletext/errors.js';
import { DecodeContext } from './context.js';
import type { DecodeOptions, DecodedPage, JsonStation } from '../types/index.js';

function parsePayload(payload: unknown): JsonPayload {
  let value = payload;
  if (typeof payload === 'string') {
    try {
      value = JSON.parse(payload);
    } catch {
      throw new MalformedPayloadError('Payload is not valid JSON');
    }
  }

  const parsed = JsonPayloadSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedPayloadError(
      `Unexpected payload shape${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`
    );
  }
  return parsed.data;
}

function parsePageNumber(page: string): number {
  const match = page.match(/^(\d{3})/);
  if (!match) {
    throw new MalformedPayloadError(`Invalid page number '${page}'`);
  }
  return parseInt(match[1], 10);
}

function decodeColumn(column: JsonColumn, station: JsonStation, context: DecodeContext): void {
  const graphic = column.graphic === true;
  const link = column.link === undefined ? undefined : context.parseLink(String(column.link), station);

  let text: string;
  if (graphic) {
    const value = String(column.value);
    if (!/^\d+$/.test(value)) {
      throw new MalformedPayloadError(`Graphic cell value '${value}' is not a character code`);
    }
    text = context.mapGlyph('g1-mosaic', parseInt(value, 10));
  } else {
    text = String(column.value);
    // rows end with the row element only
    if (/[\r\n]/.test(text)) {
      throw new MalformedPayloadError(`Cell in row ${context.rowIndex} contains a line break`);
    }
  }

  const attribute = createAttribute({
    foreground: rgbToColor(column.font),
    background: rgbToColor(column.background),
    charset: graphic ? charsetMarker('g1-mosaic') : 0,
    graphics: graphic,
  });
  context.append(text, attribute, link);
}

/**
 * Decode a feed that delivers the page as a grid of cells, one object per
 * column with its own colors.
 */
export function decodeJson(payload: unknown, station: JsonStation, options: DecodeOptions = {}): DecodedPage {
  const data = parsePayload(payload);
  const context = new DecodeContext(options);

  for (const row of data.content.row) {
    context.newRow();
    for (const column of row.columns) {
      decodeColumn(column, station, context);
    }
  }

  return {
    rows: context.build(),
    address: { page: parsePageNumber(data.content.page) },
    warnings: context.warnings,
  };
}
