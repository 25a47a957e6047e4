import type { CheerioAPI } from 'cheerio';
import type { Row } from './teletext.js';
import type { FontMap, UnmappedPolicy } from './station.js';

export type HtmlPayload = string | CheerioAPI;

export interface DecodeOptions {
  unmapped?: UnmappedPolicy;
  placeholder?: string;
  /** Required by html-font-map stations */
  fontMap?: FontMap;
}

export interface DecodeWarning {
  kind: 'InvalidLinkTarget' | 'UnmappedCharacter';
  message: string;
  row: number;
}

export interface DecodedPage {
  rows: Row[];
  /** Page address found inside the payload itself */
  address?: { page: number; subPage?: number };
  warnings: DecodeWarning[];
}
