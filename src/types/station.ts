import type { CharsetId, Color } from './teletext.js';

export type StationFormat = 'html' | 'html-font-map' | 'json';

export type UnmappedPolicy = 'fail' | 'placeholder';

/** Class names that switch on a display flag for the element carrying them */
export interface FlagClasses {
  doubleHeight?: string;
  flashing?: string;
  concealed?: string;
}

/** How a station writes link destinations */
export interface LinkRule {
  /** Anchored pattern with a page group and an optional sub-page group */
  linkPattern?: RegExp;
  /** Added to the captured sub-page where links count sub-pages from 0 */
  linkSubPageOffset?: number;
}

interface StationBase extends LinkRule {
  id: string;
  name: string;
  /** Fixed display width, checked by the assembler when set */
  rowWidth?: number;
  flagClasses?: FlagClasses;
}

export interface HtmlStation extends StationBase {
  format: 'html';
  container: string;
  foregroundClassPrefix?: string;
  backgroundClassPrefix?: string;
  defaultForeground: Color | null;
  defaultBackground: Color | null;
  /** First private-use codepoint of embedded mosaic glyphs */
  mosaicBase?: number;
  /** Offset past which private-use mosaics are the separated variant */
  separatedOffset?: number;
}

export interface FontMapStation extends StationBase {
  format: 'html-font-map';
  fontMap: string;
  encodingFixes?: ReadonlyArray<readonly [string, string]>;
}

export interface JsonStation extends StationBase {
  format: 'json';
}

export type StationConfig = HtmlStation | FontMapStation | JsonStation;

export interface FontGlyph {
  charset: CharsetId;
  code: number;
}

export interface FontMap {
  font: string;
  glyphs: ReadonlyMap<number, FontGlyph>;
}
