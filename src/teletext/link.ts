import { InvalidLinkTargetError } from './errors.js';
import type { LinkTarget } from '../types/index.js';

// "101", "/101/", "101/5", "/101/05"
export const DEFAULT_LINK_PATTERN = /^\/?(\d+)(?:\/(\d+))?\/?$/;

/**
 * Parse a cross-reference destination into a page number or a
 * [page, subPage] pair. The pattern's first group is the page, the optional
 * second group the sub-page, shifted by `subPageOffset`.
 */
export function parseLinkTarget(
  raw: string,
  pattern: RegExp = DEFAULT_LINK_PATTERN,
  subPageOffset: number = 0
): LinkTarget {
  const match = raw.trim().match(pattern);
  const pageText = match?.[1];
  if (!match || pageText === undefined || !/^\d+$/.test(pageText)) {
    throw new InvalidLinkTargetError(raw);
  }

  const page = parseInt(pageText, 10);
  const subPageText = match[2];
  if (subPageText === undefined) {
    return page;
  }
  if (!/^\d+$/.test(subPageText)) {
    throw new InvalidLinkTargetError(raw);
  }
  return [page, parseInt(subPageText, 10) + subPageOffset];
}

export function linksEqual(a: LinkTarget | undefined, b: LinkTarget | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (typeof a === 'number' || typeof b === 'number') return a === b;
  return a[0] === b[0] && a[1] === b[1];
}
