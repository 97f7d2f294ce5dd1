/**
 * Configuration module exports
 */

// Schema types
export type {
  AnalysisProfile,
  OutputFormat,
  AnalysisConfigSchema,
  EngineConfigSchema,
  DatabasesConfigSchema,
  OpeningBookConfigSchema,
  OutputConfigSchema,
  GobookConfig,
  CliOptions,
} from './schema.js';

// Defaults and profiles
export {
  ANALYSIS_PROFILES,
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_DATABASES_CONFIG,
  DEFAULT_OPENING_BOOK_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
  applyProfile,
  computeEffortFor,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  analysisProfileSchema,
  outputFormatSchema,
  ConfigValidationError,
  validateConfig,
  parsePartialConfig,
  type PartialGobookConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, formatConfig } from './loader.js';
