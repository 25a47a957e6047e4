import { RecordFormatError } from './errors.js';
import { parseLine, serialize, toPage, toPageFailure } from './serializer.js';
import type { PageMarkerLine } from '../schemas/record.js';
import type { Page, PageFailure, Row, SessionHeader } from '../types/index.js';

export type PageAddress = readonly [page: number, subPage: number];

export type NavigationDirection = -1 | 0 | 1;

function compareAddress(a: PageAddress, b: PageAddress): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * One station's archive file: the session header followed by page records
 * in the order they were written.
 */
export class Snapshot {
  readonly header: SessionHeader;
  readonly pages: readonly Page[];
  readonly failures: readonly PageFailure[];
  private readonly index: PageAddress[];
  private readonly byAddress: Map<string, Page>;

  constructor(header: SessionHeader, pages: Page[], failures: PageFailure[] = []) {
    this.header = header;
    this.pages = pages;
    this.failures = failures;
    this.byAddress = new Map(pages.map((page) => [`${page.page}/${page.subPage}`, page]));
    this.index = pages
      .map((page): PageAddress => [page.page, page.subPage])
      .sort(compareAddress);
  }

  getPage(page: number, subPage?: number): Page | undefined {
    if (subPage !== undefined) {
      return this.byAddress.get(`${page}/${subPage}`);
    }
    const first = this.index.find((address) => address[0] === page);
    return first ? this.byAddress.get(`${first[0]}/${first[1]}`) : undefined;
  }

  /**
   * Address of the neighbouring page, wrapping around at both ends.
   * Direction 0 resolves to the given address or the next one after it.
   */
  getNextPage(page: number, subPage: number, direction: NavigationDirection = 1): PageAddress | undefined {
    if (this.index.length === 0) return undefined;
    const current: PageAddress = [page, subPage];

    if (direction < 0) {
      for (let i = this.index.length - 1; i >= 0; i--) {
        if (compareAddress(this.index[i], current) < 0) return this.index[i];
      }
      return this.index[this.index.length - 1];
    }

    const found = this.index.find((address) => {
      const order = compareAddress(address, current);
      return direction === 0 ? order >= 0 : order > 0;
    });
    return found ?? this.index[0];
  }
}

export function formatSnapshot(header: SessionHeader, records: ReadonlyArray<Page | PageFailure>): string {
  return [serialize(header), ...records.map(serialize)].join('\n') + '\n';
}

export function parseSnapshot(text: string): Snapshot {
  const lines = text.split('\n').map((line) => line.replace(/\r$/, '')).filter((line) => line.length > 0);
  if (lines.length === 0) {
    throw new RecordFormatError('Empty snapshot');
  }

  const first = parseLine(lines[0]);
  if (first.type !== 'header') {
    throw new RecordFormatError('Snapshot does not start with a session header');
  }
  const header: SessionHeader = { stationId: first.value.scraper, timestamp: first.value.timestamp };

  const pages: Page[] = [];
  const failures: PageFailure[] = [];
  let marker: PageMarkerLine | null = null;
  let rows: Row[] = [];

  const flush = (): void => {
    if (!marker) return;
    if (marker.error !== undefined) {
      failures.push(toPageFailure(marker, marker.error));
    } else {
      pages.push(toPage(header.stationId, marker, rows));
    }
    marker = null;
    rows = [];
  };

  for (let i = 1; i < lines.length; i++) {
    const line = parseLine(lines[i]);
    if (line.type === 'header') {
      throw new RecordFormatError(`Second session header on line ${i + 1}`);
    }
    if (line.type === 'marker') {
      flush();
      marker = line.value;
      continue;
    }
    if (!marker || marker.error !== undefined) {
      throw new RecordFormatError(`Row line ${i + 1} does not belong to a page`);
    }
    rows.push(line.value);
  }
  flush();

  return new Snapshot(header, pages, failures);
}
