import { describe, expect, it } from 'vitest';
import { InvalidLinkTargetError } from '../teletext/errors.js';
import { linksEqual, parseLinkTarget } from '../teletext/link.js';

describe('parseLinkTarget', () => {
  it('parses a bare page number', () => {
    expect(parseLinkTarget('101')).toBe(101);
    expect(parseLinkTarget('/101/')).toBe(101);
  });

  it('parses a page and sub-page pair', () => {
    expect(parseLinkTarget('101/5')).toEqual([101, 5]);
    expect(parseLinkTarget('/101/02')).toEqual([101, 2]);
  });

  it('uses a station pattern when given', () => {
    expect(parseLinkTarget('101_02.htm', /^(\d{3})_(\d{2})\.htm$/)).toEqual([101, 2]);
  });

  it('shifts sub-pages that the station counts from 0', () => {
    const pattern = /^(?:.*\/)?(\d{3})(?:_(\d+))?\.html$/;
    expect(parseLinkTarget('/seiten/klassisch/502_1.html', pattern, 1)).toEqual([502, 2]);
    expect(parseLinkTarget('502.html', pattern, 1)).toBe(502);
  });

  it('rejects targets that are not integers', () => {
    expect(() => parseLinkTarget('abc')).toThrow(InvalidLinkTargetError);
    expect(() => parseLinkTarget('101/x')).toThrow(InvalidLinkTargetError);
    expect(() => parseLinkTarget('101/5/2')).toThrow(InvalidLinkTargetError);
    expect(() => parseLinkTarget('')).toThrow("Invalid link target ''");
  });
});

describe('linksEqual', () => {
  it('compares numbers and pairs', () => {
    expect(linksEqual(101, 101)).toBe(true);
    expect(linksEqual([101, 2], [101, 2])).toBe(true);
    expect(linksEqual([101, 2], [101, 3])).toBe(false);
    expect(linksEqual(101, [101, 1])).toBe(false);
    expect(linksEqual(undefined, undefined)).toBe(true);
    expect(linksEqual(undefined, 101)).toBe(false);
  });
});
