export * from './teletext/index.js';
export * from './charset/index.js';
export * from './decoder/index.js';
export * from './stations/index.js';
export * from './pipeline/index.js';
export { loadConfig } from './config/index.js';
export { createStationLogger, type LoggerOptions } from './utils/index.js';
export * from './schemas/index.js';
export type * from './types/index.js';
