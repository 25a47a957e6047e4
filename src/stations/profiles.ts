import { UnknownStationError } from '../teletext/errors.js';
import type { FontMapStation, StationConfig } from '../types/index.js';

// Latin-1 text that went through a second UTF-8 encoding on the ZDF servers.
// Applied in order, the lone 0xc3 last.
const ZDF_ENCODING_FIXES: ReadonlyArray<readonly [string, string]> = [
  ['Ã\u009c', 'Ü'],
  ['Ã¼', 'ü'],
  ['â\u0080\u0093', '@'],
  ['Ã\u009f', 'ß'],
  ['Ã\u0084', 'Ä'],
  ['Ã¤', 'ä'],
  ['Ã¶', 'ö'],
  ['Â°', '°'],
  ['Ã¿', '\u007f'],
  ['Ö³', 'ó'],
  ['Ã', 'Ö'],
];

// Links point at page files such as ".../502.html" or "502_1.html", the
// suffix counts sub-pages from 0 and is left out for the first
const ZDF_LINK_PATTERN = /^(?:.*\/)?(\d{3})(?:_(\d+))?\.html$/;

function zdfStation(id: string, name: string): FontMapStation {
  return {
    id,
    name,
    format: 'html-font-map',
    fontMap: 'zdf-linedraw',
    encodingFixes: ZDF_ENCODING_FIXES,
    linkPattern: ZDF_LINK_PATTERN,
    linkSubPageOffset: 1,
  };
}

export const STATIONS: Readonly<Record<string, StationConfig>> = {
  ndr: {
    id: 'ndr',
    name: 'NDR Text',
    format: 'html',
    container: 'pre.txt',
    foregroundClassPrefix: 'f',
    backgroundClassPrefix: 'b',
    defaultForeground: 'white',
    defaultBackground: 'black',
    mosaicBase: 0xe000,
    separatedOffset: 0x40,
    rowWidth: 40,
    linkPattern: /^(\d{3})_(\d{2})\.htm$/,
  },
  sr: {
    id: 'sr',
    name: 'Saartext',
    format: 'html',
    container: 'pre.saartext_page',
    defaultForeground: 'white',
    defaultBackground: 'black',
    rowWidth: 40,
  },
  zdf: zdfStation('zdf', 'ZDFtext'),
  'zdf-info': zdfStation('zdf-info', 'ZDFinfo Text'),
  'zdf-neo': zdfStation('zdf-neo', 'ZDFneo Text'),
  '3sat': zdfStation('3sat', '3sat Text'),
  ntv: {
    id: 'ntv',
    name: 'n-tv Text',
    format: 'json',
    rowWidth: 40,
  },
};

export function getStation(id: string): StationConfig {
  const station = STATIONS[id];
  if (!station) {
    throw new UnknownStationError(id);
  }
  return station;
}

export function listStations(): string[] {
  return Object.keys(STATIONS);
}
