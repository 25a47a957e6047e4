import { describe, expect, it } from 'vitest';
import { assemble } from '../teletext/assembler.js';
import { createAttribute } from '../teletext/attribute.js';
import { RecordFormatError } from '../teletext/errors.js';
import { Snapshot, formatSnapshot, parseSnapshot } from '../teletext/snapshot.js';
import type { Page, SessionHeader } from '../types/index.js';

const timestamp = '2024-03-01T12:00:00';
const header: SessionHeader = { stationId: 'sr', timestamp };
const white = createAttribute({ foreground: 'white', background: 'black' });

function textPage(page: number, subPage: number, text: string): Page {
  return assemble('sr', page, [[{ attribute: white, text }]], timestamp, { subPage });
}

const pages = [
  textPage(101, 1, 'Nachrichten'),
  textPage(100, 1, 'Index'),
  textPage(101, 2, 'Nachrichten 2/2'),
  textPage(200, 1, 'Sport'),
];

describe('formatSnapshot', () => {
  it('writes the header, every record and a final newline', () => {
    const text = formatSnapshot(header, [pages[1], { page: 150, subPage: 1, timestamp, error: 'IncompletePage: Page 150/1 has no rows' }]);
    expect(text).toBe([
      '{"scraper":"sr","timestamp":"2024-03-01T12:00:00"}',
      '{"page":100,"sub_page":1,"timestamp":"2024-03-01T12:00:00"}',
      '[["wb","Index"]]',
      '{"page":150,"sub_page":1,"timestamp":"2024-03-01T12:00:00","error":"IncompletePage: Page 150/1 has no rows"}',
      '',
    ].join('\n'));
  });
});

describe('parseSnapshot', () => {
  it('reads back pages and failures in file order', () => {
    const failure = { page: 150, subPage: 1, timestamp, error: 'MalformedPayload: broken' };
    const snapshot = parseSnapshot(formatSnapshot(header, [...pages, failure]));
    expect(snapshot.header).toEqual(header);
    expect(snapshot.pages).toEqual(pages);
    expect(snapshot.failures).toEqual([failure]);
  });

  it('accepts windows line endings', () => {
    const text = formatSnapshot(header, [pages[0]]).replace(/\n/g, '\r\n');
    expect(parseSnapshot(text).pages).toEqual([pages[0]]);
  });

  it('requires the session header first', () => {
    expect(() => parseSnapshot('{"page":100,"sub_page":1,"timestamp":"2024-03-01T12:00:00"}\n[["wb","x"]]'))
      .toThrow('Snapshot does not start with a session header');
    expect(() => parseSnapshot('')).toThrow('Empty snapshot');
  });

  it('rejects a second header and rows without a page', () => {
    const headerLine = '{"scraper":"sr","timestamp":"2024-03-01T12:00:00"}';
    expect(() => parseSnapshot(`${headerLine}\n${headerLine}`)).toThrow('Second session header on line 2');
    expect(() => parseSnapshot(`${headerLine}\n[["wb","x"]]`)).toThrow(RecordFormatError);
    expect(() => parseSnapshot(`${headerLine}\n[["wb","x"]]`)).toThrow('Row line 2 does not belong to a page');
  });
});

describe('Snapshot', () => {
  const snapshot = new Snapshot(header, pages);

  it('finds pages by address', () => {
    expect(snapshot.getPage(101, 2)?.rows[0][0].text).toBe('Nachrichten 2/2');
    expect(snapshot.getPage(101)?.subPage).toBe(1);
    expect(snapshot.getPage(300)).toBeUndefined();
  });

  it('steps through pages in address order and wraps around', () => {
    expect(snapshot.getNextPage(100, 1)).toEqual([101, 1]);
    expect(snapshot.getNextPage(101, 1)).toEqual([101, 2]);
    expect(snapshot.getNextPage(200, 1)).toEqual([100, 1]);
    expect(snapshot.getNextPage(101, 1, -1)).toEqual([100, 1]);
    expect(snapshot.getNextPage(100, 1, -1)).toEqual([200, 1]);
  });

  it('resolves a missing address to the next existing one', () => {
    expect(snapshot.getNextPage(150, 1, 0)).toEqual([200, 1]);
    expect(snapshot.getNextPage(101, 2, 0)).toEqual([101, 2]);
    expect(snapshot.getNextPage(201, 1, 0)).toEqual([100, 1]);
  });

  it('has no neighbours when empty', () => {
    expect(new Snapshot(header, []).getNextPage(100, 1)).toBeUndefined();
  });
});
