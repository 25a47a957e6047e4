// Teletext model types
export type {
  Color,
  CharsetId,
  Attribute,
  LinkTarget,
  Segment,
  Row,
  Page,
  SessionHeader,
  PageFailure,
  SnapshotRecord,
} from './teletext.js';

// Station types
export type {
  StationFormat,
  UnmappedPolicy,
  FlagClasses,
  LinkRule,
  HtmlStation,
  FontMapStation,
  JsonStation,
  StationConfig,
  FontGlyph,
  FontMap,
} from './station.js';

// Decoder types
export type {
  HtmlPayload,
  DecodeOptions,
  DecodeWarning,
  DecodedPage,
} from './decoder.js';

// Pipeline types
export type {
  RawPage,
  StationRunOptions,
  PageWarning,
  StationRunResult,
} from './pipeline.js';
