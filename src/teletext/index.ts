export {
  COLOR_CODES,
  DEFAULT_ATTRIBUTE,
  createAttribute,
  attributesEqual,
  encodeAttribute,
  decodeAttribute,
  paletteColor,
  rgbToColor,
} from './attribute.js';
export { DEFAULT_LINK_PATTERN, parseLinkTarget, linksEqual } from './link.js';
export {
  FIRST_PAGE,
  LAST_PAGE,
  assemble,
  coalesceRow,
  rowText,
  textWidth,
  type AssembleOptions,
} from './assembler.js';
export {
  serialize,
  serializeHeader,
  serializePage,
  serializeRow,
  serializeFailure,
  deserialize,
  parseLine,
  type SerializableRecord,
  type DeserializeContext,
  type ParsedLine,
} from './serializer.js';
export {
  Snapshot,
  formatSnapshot,
  parseSnapshot,
  type PageAddress,
  type NavigationDirection,
} from './snapshot.js';
export {
  TeletextError,
  UnmappedCharacterError,
  MalformedPayloadError,
  InvalidLinkTargetError,
  IncompletePageError,
  RecordFormatError,
  CharsetTableError,
  FontMapError,
  UnknownStationError,
  isTeletextError,
  type TeletextErrorKind,
} from './errors.js';
