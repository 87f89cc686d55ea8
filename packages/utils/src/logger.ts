/**
 * Structured Logging
 * ==================
 * One winston instance shared by every package. Studies attach their seed and
 * candidate size as context so a log line can be traced back to a replayable
 * trial.
 *
 * Console output goes to stderr: stdout carries the study report.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import { getLoggingConfig } from './config/index.js';
import type { LoggingConfig } from './config/index.js';

export interface LogContext {
  runId?: string;
  seed?: number;
  positionSizePct?: number;
  trialIndex?: number;
  [key: string]: unknown;
}

const ROOT_NAMESPACE = 'sizinglab';
const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const readableFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
  winston.format.printf(({ timestamp, level, message, namespace, ...meta }) => {
    const scope = typeof namespace === 'string' ? ` [${namespace}]` : '';
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${scope}: ${String(message)}${details}`;
  })
);

function rotatingFile(config: LoggingConfig, name: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(path.resolve(process.cwd(), config.logDir), `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level,
    format: jsonFormat,
    maxSize: config.maxSize,
    maxFiles: config.maxFiles,
    zippedArchive: true,
  });
}

/**
 * Transports for a logging config: stderr console and, when enabled,
 * an errors-only file plus a file with every study log line
 */
export function buildTransports(config: LoggingConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        level: config.level,
        format: config.production ? jsonFormat : readableFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (config.enableFile) {
    fs.mkdirSync(path.resolve(process.cwd(), config.logDir), { recursive: true });
    transports.push(rotatingFile(config, 'error', 'error'), rotatingFile(config, 'studies'));
  }

  return transports;
}

const loggingConfig = getLoggingConfig();
const transports = buildTransports(loggingConfig);

export const winstonLogger = winston.createLogger({
  level: loggingConfig.level,
  format: jsonFormat,
  defaultMeta: { service: ROOT_NAMESPACE },
  transports,
  // winston complains about writing with no transports
  silent: transports.length === 0,
  exitOnError: false,
});

/**
 * Namespaced logger carrying persistent context
 */
export class Logger {
  private context: LogContext = {};

  constructor(private readonly namespace: string = ROOT_NAMESPACE) {}

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private entry(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...this.context, ...context };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error === undefined) {
      winstonLogger.error(message, this.entry(context));
      return;
    }
    const detail =
      error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error;
    winstonLogger.error(message, { ...this.entry(context), error: detail });
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.entry(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.entry(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.entry(context));
  }

  child(context: LogContext): Logger {
    const child = new Logger(this.namespace);
    child.setContext({ ...this.context, ...context });
    return child;
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

export const logger = new Logger();
