import type { Logger } from 'winston';
import { loadCharsetTable } from '../charset/table.js';
import { decode } from '../decoder/index.js';
import { loadFontMap } from '../stations/fontMaps.js';
import { getStation } from '../stations/profiles.js';
import { assemble } from '../teletext/assembler.js';
import { CharsetTableError, FontMapError, MalformedPayloadError, errorMessage } from '../teletext/errors.js';
import { serialize } from '../teletext/serializer.js';
import { createStationLogger } from '../utils/logger.js';
import type {
  FontMap,
  Page,
  PageFailure,
  PageWarning,
  RawPage,
  StationConfig,
  StationRunOptions,
  StationRunResult,
} from '../types/index.js';

/** UTC time to the second, without zone suffix */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 19);
}

/**
 * Decodes, assembles and serializes the pages of one scrape run of a
 * station. A page that fails is logged and reported without stopping the
 * run; a broken charset table or font map stops it.
 */
export class StationRun {
  private readonly station: StationConfig;
  private readonly options: StationRunOptions;
  private readonly logger: Logger;

  constructor(station: StationConfig | string, options: StationRunOptions = {}, logger?: Logger) {
    this.station = typeof station === 'string' ? getStation(station) : station;
    this.options = options;
    this.logger = logger ?? createStationLogger(this.station.id, {
      level: options.logLevel,
      logFile: options.logFile,
    });
  }

  run(rawPages: Iterable<RawPage>): StationRunResult {
    loadCharsetTable(this.options.charsetTable);
    const fontMap = this.station.format === 'html-font-map'
      ? loadFontMap(this.station.fontMap, this.options.fontMapDir)
      : undefined;

    const header = { stationId: this.station.id, timestamp: this.timestamp() };
    const result: StationRunResult = { header, pages: [], failures: [], warnings: [], lines: [serialize(header)] };
    this.logger.info('Run started', { timestamp: header.timestamp });

    let position = 0;
    for (const raw of rawPages) {
      position++;
      const timestamp = this.timestamp();
      try {
        const page = this.processPage(raw, timestamp, fontMap, result.warnings);
        result.pages.push(page);
        result.lines.push(...serialize(page).split('\n'));
        this.logger.debug(`Decoded ${page.rows.length} rows`, { page: `${page.page}/${page.subPage}` });
      } catch (error) {
        if (error instanceof CharsetTableError || error instanceof FontMapError) throw error;

        const failure: PageFailure = {
          page: raw.page ?? 0,
          subPage: raw.subPage ?? 1,
          timestamp,
          error: error instanceof Error ? `${error.name}: ${error.message}` : errorMessage(error),
        };
        result.failures.push(failure);
        if (this.options.includeFailures) {
          result.lines.push(serialize(failure));
        }
        this.logger.warn(`Page #${position} failed`, {
          page: raw.page === undefined ? undefined : `${failure.page}/${failure.subPage}`,
          error: failure.error,
        });
      }
    }

    this.logger.info(
      `Run finished: ${result.pages.length} pages, ${result.failures.length} failures, ${result.warnings.length} warnings`
    );
    return result;
  }

  private processPage(raw: RawPage, timestamp: string, fontMap: FontMap | undefined, warnings: PageWarning[]): Page {
    const decoded = decode(raw.payload, this.station, {
      unmapped: this.options.unmapped,
      placeholder: this.options.placeholder,
      fontMap,
    });

    const pageNumber = raw.page ?? decoded.address?.page;
    if (pageNumber === undefined) {
      throw new MalformedPayloadError('Page number is neither given nor found in the payload');
    }
    const subPage = raw.subPage ?? decoded.address?.subPage ?? 1;

    const page = assemble(this.station.id, pageNumber, decoded.rows, timestamp, {
      subPage,
      rowWidth: this.station.rowWidth,
    });

    for (const warning of decoded.warnings) {
      warnings.push({ ...warning, page: page.page, subPage: page.subPage });
      this.logger.warn(warning.message, { page: `${page.page}/${page.subPage}` });
    }
    return page;
  }

  private timestamp(): string {
    return this.options.timestamp ?? formatTimestamp();
  }
}

export function runStation(
  station: StationConfig | string,
  rawPages: Iterable<RawPage>,
  options: StationRunOptions = {},
  logger?: Logger
): StationRunResult {
  return new StationRun(station, options, logger).run(rawPages);
}
