import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';

const logsDir = process.env['LOG_DIR'] || './logs';
const isTest = process.env['NODE_ENV'] === 'test';

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const scope = typeof module === 'string' ? ` [${module}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}${scope}: ${message}${metaStr}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  if (isTest) {
    return transports;
  }

  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    // All logs
    new winston.transports.File({
      filename: path.join(logsDir, 'app.log'),
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    }),
    // Errors only
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    })
  );

  return transports;
}

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] || 'info',
  silent: isTest && process.env['LOG_LEVEL'] === undefined,
  transports: buildTransports(),
});

export type Logger = winston.Logger;

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
