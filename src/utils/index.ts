export { createStationLogger, type LoggerOptions } from './logger.js';
