export type Color = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white';

export type CharsetId = 'g0-latin' | 'g0-german' | 'g1-mosaic' | 'g1-separated';

export interface Attribute {
  readonly foreground: Color | null;
  readonly background: Color | null;
  /** Marker of the charset the glyphs were taken from, 0 for the primary sets */
  readonly charset: number;
  readonly doubleHeight: boolean;
  readonly flashing: boolean;
  readonly concealed: boolean;
  readonly graphics: boolean;
}

/** Bare page number or a [page, subPage] pair */
export type LinkTarget = number | readonly [number, number];

export interface Segment {
  readonly attribute: Attribute;
  readonly text: string;
  readonly link?: LinkTarget;
}

export type Row = readonly Segment[];

export interface Page {
  readonly stationId: string;
  readonly page: number;
  readonly subPage: number;
  readonly timestamp: string;
  readonly rows: readonly Row[];
}

export interface SessionHeader {
  readonly stationId: string;
  readonly timestamp: string;
}

export interface PageFailure {
  readonly page: number;
  readonly subPage: number;
  readonly timestamp: string;
  readonly error: string;
}

export type SnapshotRecord =
  | { readonly kind: 'header'; readonly header: SessionHeader }
  | { readonly kind: 'page'; readonly page: Page }
  | { readonly kind: 'failure'; readonly failure: PageFailure };
