/**
 * YAML Configuration Loader
 * ==========================
 * Loads study files (YAML or JSON) into plain objects for schema validation.
 */

import { readFileSync, existsSync } from 'fs';
import { extname, resolve } from 'path';
import { load } from 'js-yaml';
import { ConfigurationError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';

export type StudyFileContents = Record<string, unknown>;

function isRecord(value: unknown): value is StudyFileContents {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a study file from disk
 *
 * `.json` files are parsed as JSON, everything else as YAML (a superset of JSON).
 * The top level must be a mapping.
 */
export function loadStudyFile(filePath: string): StudyFileContents {
  const absolutePath = resolve(filePath);

  if (!existsSync(absolutePath)) {
    throw new NotFoundError('Study file', absolutePath);
  }

  const content = readFileSync(absolutePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = extname(absolutePath).toLowerCase() === '.json' ? JSON.parse(content) : load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse study file: ${error instanceof Error ? error.message : String(error)}`,
      'config',
      { path: absolutePath }
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError('Study file must contain a mapping at the top level', 'config', {
      path: absolutePath,
    });
  }

  logger.debug('Loaded study file', { path: absolutePath, keys: Object.keys(parsed) });
  return parsed;
}
