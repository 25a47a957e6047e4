import { attributesEqual } from './attribute.js';
import { IncompletePageError, MalformedPayloadError } from './errors.js';
import { linksEqual } from './link.js';
import { TimestampSchema } from '../schemas/record.js';
import type { Page, Row, Segment } from '../types/index.js';

export const FIRST_PAGE = 100;
export const LAST_PAGE = 899;

export interface AssembleOptions {
  subPage?: number;
  /** Display columns every row must fill */
  rowWidth?: number;
}

/** Column count of a text, astral mosaic glyphs count once */
export function textWidth(text: string): number {
  return Array.from(text).length;
}

export function rowText(row: Row): string {
  return row.map((segment) => segment.text).join('');
}

function sameKind(a: Segment, b: Segment): boolean {
  return attributesEqual(a.attribute, b.attribute) && linksEqual(a.link, b.link);
}

/**
 * Merge neighbouring segments that share attribute and link target and drop
 * empty ones. The returned row never has two equal neighbours.
 */
export function coalesceRow(row: Row): Segment[] {
  const result: Segment[] = [];
  for (const segment of row) {
    if (!segment.text) continue;

    const previous = result[result.length - 1];
    if (previous && sameKind(previous, segment)) {
      result[result.length - 1] = { ...previous, text: previous.text + segment.text };
    } else {
      result.push(segment);
    }
  }
  return result;
}

function freezeRow(row: Segment[]): Row {
  return Object.freeze(row.map((segment) => Object.freeze(segment.link === undefined
    ? { attribute: segment.attribute, text: segment.text }
    : { attribute: segment.attribute, text: segment.text, link: segment.link })));
}

export function assemble(
  stationId: string,
  pageNumber: number,
  rows: readonly Row[],
  timestamp: string,
  options: AssembleOptions = {}
): Page {
  const subPage = options.subPage ?? 1;

  if (!Number.isInteger(pageNumber) || pageNumber < FIRST_PAGE || pageNumber > LAST_PAGE) {
    throw new MalformedPayloadError(`Page number ${pageNumber} is outside ${FIRST_PAGE}-${LAST_PAGE}`);
  }
  if (!Number.isInteger(subPage) || subPage < 1) {
    throw new MalformedPayloadError(`Invalid sub-page ${subPage} for page ${pageNumber}`);
  }
  if (!TimestampSchema.safeParse(timestamp).success) {
    throw new MalformedPayloadError(`Invalid timestamp '${timestamp}' for page ${pageNumber}`);
  }
  if (rows.length === 0) {
    throw new IncompletePageError(pageNumber, subPage);
  }

  const assembled = rows.map((row, index) => {
    const segments = coalesceRow(row);
    const text = rowText(segments);
    if (text.includes('\n')) {
      throw new MalformedPayloadError(`Row ${index} of page ${pageNumber} contains a line break`);
    }
    if (options.rowWidth !== undefined && textWidth(text) !== options.rowWidth) {
      throw new MalformedPayloadError(
        `Row ${index} of page ${pageNumber} is ${textWidth(text)} columns wide, expected ${options.rowWidth}`
      );
    }
    return freezeRow(segments);
  });

  return Object.freeze({
    stationId,
    page: pageNumber,
    subPage,
    timestamp,
    rows: Object.freeze(assembled),
  });
}
