/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  MaintenanceError,
  resolveAbsolutePath,
} from './cli-errors.js';

export {
  formatError,
  handleError,
  exitCodeFor,
  withErrorHandling,
  ANALYSIS_FAILED_EXIT_CODE,
} from './handler.js';
