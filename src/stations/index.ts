export { STATIONS, getStation, listStations } from './profiles.js';
export { DEFAULT_FONT_MAP_DIR, buildFontMap, loadFontMap } from './fontMaps.js';
