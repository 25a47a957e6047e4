import { decodeFontMapHtml } from './fontMapDecoder.js';
import { decodeHtml } from './htmlDecoder.js';
import { decodeJson } from './jsonDecoder.js';
import { FontMapError } from '../teletext/errors.js';
import type { DecodeOptions, DecodedPage, StationConfig } from '../types/index.js';

/**
 * Decode one raw page payload into rows, choosing the variant from the
 * station's format.
 */
export function decode(payload: unknown, station: StationConfig, options: DecodeOptions = {}): DecodedPage {
  switch (station.format) {
    case 'html':
      return decodeHtml(payload, station, options);
    case 'html-font-map':
      if (!options.fontMap) {
        throw new FontMapError(`Station ${station.id} needs its font map ${station.fontMap} to decode`);
      }
      return decodeFontMapHtml(payload, station, options.fontMap, options);
    case 'json':
      return decodeJson(payload, station, options);
  }
}

export { DecodeContext } from './context.js';
export { decodeHtml } from './htmlDecoder.js';
export { decodeFontMapHtml } from './fontMapDecoder.js';
export { decodeJson } from './jsonDecoder.js';
