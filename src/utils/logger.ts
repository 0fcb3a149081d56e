import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../config/config';
import { LoggingConfig } from '../types/config.types';

/**
 * Custom log format
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    // Add metadata if present
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }

    return log;
  })
);

/**
 * Create a winston logger writing to the console and, when a log file
 * is configured, to rotating files beside it
 */
export function createLogger(options: LoggingConfig): winston.Logger {
  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), logFormat),
    }),
  ];

  if (options.file && !options.silent) {
    // Ensure logs directory exists
    const logDir = path.dirname(options.file);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    transports.push(
      new winston.transports.File({
        filename: options.file,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: logFormat,
    transports,
  });
}

/**
 * Winston logger instance
 */
export const logger = createLogger(loadConfig().logging);

/**
 * Log request details
 */
export function logRequest(
  method: string,
  url: string,
  statusCode: number,
  duration: number
): void {
  const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

  logger.log(level, 'HTTP Request', {
    method,
    url,
    statusCode,
    duration: `${duration}ms`,
  });
}

/**
 * Log error with context
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof Error) {
    logger.error(error.message, {
      stack: error.stack,
      ...context,
    });
    return;
  }

  logger.error('Non-error value thrown', { value: String(error), ...context });
}
