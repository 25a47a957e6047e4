import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  logFile?: string;
}

/**
 * Logger of one station run. Page addresses and errors passed as meta are
 * rendered as tags: "... INFO [ndr] [100/1] message ERROR: ...".
 */
export function createStationLogger(stationId: string, options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (options.logFile) {
    transports.push(new winston.transports.File({
      filename: options.logFile,
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    }));
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, page, error }) => {
        const pageTag = page ? ` [${page}]` : '';
        const errorTag = error ? ` ERROR: ${error}` : '';
        return `${timestamp} ${level.toUpperCase()} [${stationId}]${pageTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { stationId },
    transports,
  });
}
