/**
 * CLI Types
 */

export type OutputFormat = 'json' | 'table' | 'csv';
