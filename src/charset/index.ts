export {
  DEFAULT_CHARSET_TABLE_PATH,
  buildCharsetTable,
  loadCharsetTable,
  mapCharacter,
  unmapCodepoint,
  charsetMarker,
  listCodes,
  type CharsetTable,
} from './table.js';
