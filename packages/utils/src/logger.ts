/**
 * Structured Logging
 * ==================
 * Winston logger with daily-rotated files and per-package namespaces.
 * Every package takes its own logger through createLogger().
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import { AppError } from './errors.js';


/**
 * Structured fields attached to a log line (runName, jobId, ordinal, directory, ...)
 */
export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

/**
 * Logger settings derived from LOG_* environment variables.
 */
export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: env.LOG_CONSOLE !== 'false',
    enableFile: env.LOG_FILE !== 'false' && env.NODE_ENV !== 'test',
    logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const loggerConfig = resolveLoggerConfig();

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (loggerConfig.enableConsole) {
  // stderr keeps stdout free for command output
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: loggerConfig.level,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    })
  );
}

if (loggerConfig.enableFile) {
  if (!fs.existsSync(loggerConfig.logDir)) {
    fs.mkdirSync(loggerConfig.logDir, { recursive: true });
  }

  transports.push(
    new DailyRotateFile({
      filename: path.join(loggerConfig.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: loggerConfig.maxSize,
      maxFiles: loggerConfig.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(loggerConfig.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: loggerConfig.maxSize,
      maxFiles: loggerConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

// Console disabled and no files: keep winston quiet instead of warning about zero transports
if (transports.length === 0) {
  transports.push(new winston.transports.Console({ silent: true }));
}

const winstonLogger = winston.createLogger({
  level: loggerConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'stellar-grid' },
  transports,
  exitOnError: false,
});

type Level = 'error' | 'warn' | 'info' | 'debug';

/**
 * Errors become plain fields; AppErrors keep their code and context.
 */
function serializeError(error: unknown): LogContext {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      context: error.context,
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

class Logger {
  constructor(
    private readonly namespace: string = 'stellar-grid',
    private readonly context: LogContext = {}
  ) {}

  private write(level: Level, message: string, context?: LogContext): void {
    winstonLogger[level](message, { namespace: this.namespace, ...this.context, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error === undefined) {
      this.write('error', message, context);
      return;
    }
    this.write('error', message, { ...context, error: serializeError(error) });
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

  /**
   * Logger for one run or job; the fields go on every line it writes.
   */
  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context });
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger();

/**
 * Directory the rotating file transports write to.
 */
export function getLogDirectory(): string {
  return loggerConfig.logDir;
}

export { Logger, winstonLogger };
