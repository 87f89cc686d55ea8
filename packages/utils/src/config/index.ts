/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and other
 * environment-based settings.
 */

import { ConfigurationError } from '../errors.js';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
  production: boolean;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'];

/**
 * Load logging configuration from environment variables
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } =
    env;

  const production = NODE_ENV === 'production';
  const level = LOG_LEVEL || (production ? 'info' : 'debug');
  if (!LOG_LEVELS.includes(level)) {
    throw new ConfigurationError(`Unknown log level '${level}'`, 'LOG_LEVEL', {
      allowed: LOG_LEVELS,
    });
  }

  return {
    // winston has no trace level
    level: level === 'trace' ? 'debug' : level,
    enableConsole: LOG_CONSOLE !== 'false',
    // File logging is opt-in; simulation runs are usually interactive
    enableFile: LOG_FILE === 'true' && NODE_ENV !== 'test',
    logDir: LOG_DIR || 'logs',
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
    production,
  };
}
