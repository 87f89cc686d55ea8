/**
 * @sizinglab/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

// Centralized logging system
export { logger, Logger, winstonLogger, createLogger, buildTransports } from './logger.js';
export type { LogContext } from './logger.js';

// Package-aware logging
export { createPackageLogger, LogHelpers } from './logging/index.js';

// Configuration loading
export { getLoggingConfig } from './config/index.js';
export type { LoggingConfig } from './config/index.js';
export { loadStudyFile } from './config/yaml-config.js';
export type { StudyFileContents } from './config/yaml-config.js';

// Error handling
export {
  AppError,
  ValidationError,
  NotFoundError,
  ConfigurationError,
  isOperationalError,
} from './errors.js';
export type { ErrorContext } from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
