// Charset table schemas
export {
  CharsetIdSchema,
  CodePairSchema,
  CharsetEntrySchema,
  CharsetFileSchema,
  type CharsetEntry,
  type CharsetFile,
} from './charset.js';

// Station payload schemas
export {
  FontGlyphSchema,
  FontMapFileSchema,
  JsonColumnSchema,
  JsonPayloadSchema,
  type FontMapFile,
  type JsonColumn,
  type JsonPayload,
} from './station.js';

// Serialized record schemas
export {
  TimestampSchema,
  HeaderLineSchema,
  PageMarkerLineSchema,
  LinkTargetSchema,
  SegmentLineSchema,
  RowLineSchema,
  type HeaderLine,
  type PageMarkerLine,
  type SegmentLine,
} from './record.js';

// Config schemas
export {
  LogLevelSchema,
  UnmappedPolicySchema,
  AppConfigSchema,
  type AppConfig,
} from './config.js';
