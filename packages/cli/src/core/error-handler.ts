/**
 * Error Handler - user-facing messages for CLI failures
 */

import { ConfigurationError, handleError } from '@sizinglab/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigurationError && error.configKey) {
    return `${error.message} (parameter: ${error.configKey})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Log the error and terminate the process with a non-zero exit code
 */
export function die(error: unknown): never {
  handleError(error, { source: 'cli' });
  process.stderr.write(`Error: ${formatError(error)}\n`);
  process.exit(1);
}
