import winston from 'winston';
import { config } from '../config/index.js';

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
  const moduleTag = mod ? `[${mod}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level} ${moduleTag} ${message}${metaStr}`;
});

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
  new winston.transports.Console({
    format: combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
  }),
];

if (config.logFile) {
  transports.push(
    new winston.transports.File({
      filename: config.logFile,
      maxsize: 10_000_000, // 10MB
      maxFiles: 5,
    }),
  );
}

if (config.logErrorFile) {
  transports.push(
    new winston.transports.File({
      filename: config.logErrorFile,
      level: 'error',
      maxsize: 10_000_000,
      maxFiles: 3,
    }),
  );
}

export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    timestamp({ format: 'HH:mm:ss.SSS' }),
    logFormat
  ),
  transports,
});

export function createModuleLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}
