export { StationRun, runStation, formatTimestamp } from './stationRun.js';
