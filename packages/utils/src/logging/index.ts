/**
 * Package-aware logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@sizinglab/utils';
 *
 * const logger = createPackageLogger('@sizinglab/simulation');
 * logger.info('Study started', { seed: 42 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

/**
 * Package logger registry
 */
const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log a finished operation with its duration
   */
  static performance(
    logger: Logger,
    operation: string,
    durationMs: number,
    context?: LogContext
  ): void {
    logger.info(`${operation} completed`, { operation, durationMs, ...context });
  }
}
