/**
 * @sizinglab/cli - command line front end for position sizing studies
 */

export {
  registerSizingCommands,
  buildStudyInput,
  runSizingHandler,
  coerceSizingOptions,
  parseSizingArgs,
} from './commands/sizing.js';
export type { StudyFileLoader } from './commands/sizing.js';
export { runSizingSchema } from './command-defs/sizing.js';
export type { RunSizingArgs } from './command-defs/sizing.js';
export { formatSizingReport, formatSelection, selectTableMetrics } from './formatters/sizing-report.js';
export type { OutputFormat } from './types/index.js';
