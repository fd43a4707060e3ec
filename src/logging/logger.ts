/**
 * Logging
 *
 * winston logger shared by the gatekeeper. Every level goes to stderr because
 * stdout carries the MCP stdio protocol. An optional rotating file transport
 * mirrors the console in JSON lines.
 */

import winston from 'winston';
import { LOG_LEVELS, type LogLevel } from '../types/index.js';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: LogLevel;
  /** Path of a rotating JSON log file */
  file?: string;
  /** Suppress all output (defaults to true under NODE_ENV=test) */
  silent?: boolean;
}

const LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
const LOG_FILE_MAX_FILES = 5;

const consoleFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
    let line = `${String(timestamp)} [${level}]${component ? ` [${String(component)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    return line;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json()
);

function buildTransports(options: LoggerOptions): winston.transport[] {
  const silent = options.silent ?? process.env.NODE_ENV === 'test';
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: [...LOG_LEVELS],
      silent,
    }),
  ];

  if (options.file) {
    transports.push(
      new winston.transports.File({
        filename: options.file,
        format: fileFormat,
        maxsize: LOG_FILE_MAX_BYTES,
        maxFiles: LOG_FILE_MAX_FILES,
        tailable: true,
        silent,
      })
    );
  }

  return transports;
}

function resolveLevel(options: LoggerOptions): LogLevel {
  return options.level ?? 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: resolveLevel(options),
    transports: buildTransports(options),
  });
}

/**
 * Process-wide logger. Components accept an injected logger and fall back
 * to this one.
 */
export const logger: Logger = createLogger();

/**
 * Reconfigure the shared logger in place once CLI options are known.
 */
export function configureLogger(options: LoggerOptions): Logger {
  logger.configure({
    level: resolveLevel(options),
    transports: buildTransports(options),
  });
  return logger;
}

/**
 * Child logger tagged with the component name.
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
