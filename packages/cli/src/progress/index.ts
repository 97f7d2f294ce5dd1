/**
 * Progress module exports
 */

export type { ServiceStatus, ProgressReporterOptions, ColorFunctions } from './types.js';
export { PHASE_NAMES } from './types.js';
export { ProgressReporter } from './reporter.js';
export {
  createColorFns,
  SOURCE_NAMES,
  formatConfigDisplay,
  formatDuration,
  formatFileSize,
  formatWinProbability,
  formatScoreLead,
  formatResultTable,
  formatResultJson,
  formatStatsTable,
} from './formatters.js';
