/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output and log rotation.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import { getLoggingConfig } from './config/index.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// Log context interface
export interface LogContext {
  command?: string;
  strategy?: string;
  shortWindow?: number;
  longWindow?: number;
  file?: string;
  [key: string]: unknown;
}

/**
 * Where log records go; the winston logger below in normal use
 */
export interface LogSink {
  log(level: LogLevel, message: string, meta: LogContext): void;
}

const config = getLoggingConfig();
const isTest = process.env.NODE_ENV === 'test';

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (config.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: config.level,
      // CLI output goes to stdout; logs stay on stderr
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    })
  );
}

// File transports with rotation (never in tests)
if (config.enableFile && !isTest) {
  if (!fs.existsSync(config.logDir)) {
    fs.mkdirSync(config.logDir, { recursive: true });
  }

  transports.push(
    new DailyRotateFile({
      filename: path.join(config.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(config.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: config.level,
  format: structuredFormat,
  defaultMeta: { service: 'crossbar' },
  transports,
  // No transports when console and file logging are both off
  silent: transports.length === 0,
  exitOnError: false,
});

// Logger with package namespacing
class Logger {
  constructor(
    private readonly namespace: string = 'crossbar',
    private readonly sink: LogSink = winstonLogger
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    this.sink.log(level, message, { namespace: this.namespace, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      this.write('error', message, {
        ...context,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      this.write('error', message, { ...context, error });
    } else {
      this.write('error', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }
}

export function createLogger(packageName: string, sink?: LogSink): Logger {
  return new Logger(packageName, sink);
}

// Default logger
export const logger = new Logger('crossbar');

export { Logger };
