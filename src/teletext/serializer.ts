import { z } from 'zod';
import { decodeAttribute, encodeAttribute } from './attribute.js';
import { IncompletePageError, RecordFormatError } from './errors.js';
import {
  HeaderLineSchema,
  PageMarkerLineSchema,
  RowLineSchema,
  TimestampSchema,
  type HeaderLine,
  type PageMarkerLine,
  type SegmentLine,
} from '../schemas/record.js';
import type { Page, PageFailure, Row, Segment, SessionHeader, SnapshotRecord } from '../types/index.js';

export type SerializableRecord = Page | SessionHeader | PageFailure;

export interface DeserializeContext {
  /** Station of the enclosing session, page lines do not carry it */
  stationId?: string;
}

export type ParsedLine =
  | { type: 'header'; value: HeaderLine }
  | { type: 'marker'; value: PageMarkerLine }
  | { type: 'row'; value: Row };

// Only timestamps the line schemas read back may be written
function checkTimestamp(timestamp: string): string {
  if (!TimestampSchema.safeParse(timestamp).success) {
    throw new RecordFormatError(`Invalid timestamp '${timestamp}'`);
  }
  return timestamp;
}

export function serializeHeader(header: SessionHeader): string {
  return JSON.stringify({ scraper: header.stationId, timestamp: checkTimestamp(header.timestamp) });
}

export function serializeRow(row: Row): string {
  return JSON.stringify(row.map((segment): SegmentLine => {
    const code = encodeAttribute(segment.attribute);
    if (segment.link === undefined) {
      return [code, segment.text];
    }
    return [code, segment.text, typeof segment.link === 'number' ? segment.link : [segment.link[0], segment.link[1]]];
  }));
}

export function serializePage(page: Page): string {
  const marker = JSON.stringify({ page: page.page, sub_page: page.subPage, timestamp: checkTimestamp(page.timestamp) });
  return [marker, ...page.rows.map(serializeRow)].join('\n');
}

export function serializeFailure(failure: PageFailure): string {
  return JSON.stringify({
    page: failure.page,
    sub_page: failure.subPage,
    timestamp: checkTimestamp(failure.timestamp),
    error: failure.error,
  });
}

/**
 * Serialize a record into its archive line(s). Pages produce the marker line
 * followed by one line per row, joined with newlines.
 */
export function serialize(record: SerializableRecord): string {
  if ('rows' in record) return serializePage(record);
  if ('error' in record) return serializeFailure(record);
  return serializeHeader(record);
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    throw new RecordFormatError(`Line is not valid JSON: ${line.substring(0, 80)}`);
  }
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || 'line'}: ${issue.message}` : 'unknown issue';
}

function toSegment(segment: SegmentLine): Segment {
  const attribute = decodeAttribute(segment[0]);
  const text = segment[1];
  if (segment.length === 2) {
    return { attribute, text };
  }
  const link = segment[2];
  return { attribute, text, link: typeof link === 'number' ? link : [link[0], link[1]] };
}

export function parseLine(line: string): ParsedLine {
  const value = parseJson(line);

  if (Array.isArray(value)) {
    const row = RowLineSchema.safeParse(value);
    if (!row.success) {
      throw new RecordFormatError(`Invalid row line, ${formatIssue(row.error)}`);
    }
    return { type: 'row', value: row.data.map(toSegment) };
  }

  if (typeof value === 'object' && value !== null && 'scraper' in value) {
    const header = HeaderLineSchema.safeParse(value);
    if (!header.success) {
      throw new RecordFormatError(`Invalid header line, ${formatIssue(header.error)}`);
    }
    return { type: 'header', value: header.data };
  }

  const marker = PageMarkerLineSchema.safeParse(value);
  if (!marker.success) {
    throw new RecordFormatError(`Invalid page line, ${formatIssue(marker.error)}`);
  }
  return { type: 'marker', value: marker.data };
}

export function toPageFailure(marker: PageMarkerLine, error: string): PageFailure {
  return { page: marker.page, subPage: marker.sub_page, timestamp: marker.timestamp, error };
}

export function toPage(stationId: string, marker: PageMarkerLine, rows: Row[]): Page {
  if (rows.length === 0) {
    throw new IncompletePageError(marker.page, marker.sub_page);
  }
  return { stationId, page: marker.page, subPage: marker.sub_page, timestamp: marker.timestamp, rows };
}

/**
 * Inverse of serialize for a single record. A page block is its marker line
 * plus row lines and needs the station from the context.
 */
export function deserialize(text: string, context: DeserializeContext = {}): SnapshotRecord {
  const lines = text.split('\n').filter((line) => line.length > 0);
  const [first, ...rest] = lines.map(parseLine);
  if (!first) {
    throw new RecordFormatError('Empty record');
  }

  if (first.type === 'header') {
    if (rest.length > 0) {
      throw new RecordFormatError('Header record spans more than one line');
    }
    return { kind: 'header', header: { stationId: first.value.scraper, timestamp: first.value.timestamp } };
  }

  if (first.type === 'row') {
    throw new RecordFormatError('Row line without a page marker');
  }

  const marker = first.value;
  if (marker.error !== undefined) {
    if (rest.length > 0) {
      throw new RecordFormatError(`Failed page ${marker.page}/${marker.sub_page} has row lines`);
    }
    return { kind: 'failure', failure: toPageFailure(marker, marker.error) };
  }

  if (context.stationId === undefined) {
    throw new RecordFormatError('Page records need a station id in the context');
  }

  const rows = rest.map((line) => {
    if (line.type !== 'row') {
      throw new RecordFormatError(`Page ${marker.page}/${marker.sub_page} is followed by another record`);
    }
    return line.value;
  });

  return { kind: 'page', page: toPage(context.stationId, marker, rows) };
}
