import type { Page, PageFailure, SessionHeader } from './teletext.js';
import type { DecodeWarning } from './decoder.js';
import type { UnmappedPolicy } from './station.js';

export interface RawPage {
  page?: number;
  subPage?: number;
  payload: unknown;
}

export interface StationRunOptions {
  /** Capture time for the header and every page, defaults to now */
  timestamp?: string;
  /** Charset table file; the table is loaded once per process, a different file later fails the run */
  charsetTable?: string;
  unmapped?: UnmappedPolicy;
  placeholder?: string;
  /** Write failed pages as error markers into the serialized lines */
  includeFailures?: boolean;
  fontMapDir?: string;
  logLevel?: string;
  logFile?: string;
}

export interface PageWarning extends DecodeWarning {
  page: number;
  subPage: number;
}

export interface StationRunResult {
  header: SessionHeader;
  pages: Page[];
  failures: PageFailure[];
  warnings: PageWarning[];
  lines: string[];
}
