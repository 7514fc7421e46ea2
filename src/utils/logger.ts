/**
 * Logger Configuration
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { PATHS } from './constants';

const LOG_DIR = path.resolve(process.cwd(), PATHS.LOG_DIR);
const IS_TEST = process.env.NODE_ENV === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} ${level}: ${message}`;
  })
);

function fileTransports(): winston.transports.FileTransportInstance[] {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }

  return [
    new winston.transports.File({
      filename: path.join(LOG_DIR, 'combined.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(LOG_DIR, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  ];
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  silent: IS_TEST,
  transports: IS_TEST ? [new winston.transports.Console()] : fileTransports(),
});

// Console output competes with the CLI spinners, so it is opt-in
export function enableConsoleLogging(verbose: boolean = false): void {
  const existing = logger.transports.find(
    (t) => t instanceof winston.transports.Console
  );
  if (!existing) {
    logger.add(
      new winston.transports.Console({
        format: consoleFormat,
        level: verbose ? 'debug' : 'info',
      })
    );
  }
}
