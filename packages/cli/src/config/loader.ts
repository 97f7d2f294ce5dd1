/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG, applyProfile, ANALYSIS_PROFILES } from './defaults.js';
import type { GobookConfig, CliOptions, AnalysisProfile } from './schema.js';
import {
  ConfigValidationError,
  parsePartialConfig,
  validateConfig,
  type PartialGobookConfig,
} from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, string> = {
  // Analysis
  GOBOOK_PROFILE: 'analysis.profile',
  GOBOOK_VISITS_19: 'analysis.visits19',
  GOBOOK_VISITS_SMALL: 'analysis.visitsSmall',
  GOBOOK_LOOKUP_VISITS: 'analysis.lookupVisits',
  GOBOOK_TOP_MOVES: 'analysis.topMovesCount',
  GOBOOK_ENGINE_TIMEOUT: 'analysis.engineTimeoutMs',
  GOBOOK_DEFAULT_KOMI: 'analysis.defaultKomi',

  // Engine
  GOBOOK_ENGINE_ENABLED: 'engine.enabled',
  GOBOOK_KATAGO_PATH: 'engine.command',
  GOBOOK_KATAGO_MODEL: 'engine.modelPath',
  GOBOOK_KATAGO_CONFIG: 'engine.configPath',
  GOBOOK_ENGINE_MAX_TIME: 'engine.maxTimeMs',

  // Databases
  GOBOOK_CACHE_DB: 'databases.cachePath',
  GOBOOK_OPENING_BOOK: 'databases.openingBookPath',

  // Opening book
  GOBOOK_BOOK_ENABLED: 'openingBook.enabled',
  GOBOOK_SYNTHETIC_FALLBACK: 'openingBook.syntheticFallback',
  GOBOOK_OPENING_ALTERNATIVES: 'openingBook.openingAlternatives',

  // Output
  GOBOOK_OUTPUT_FORMAT: 'output.format',
};

/**
 * Config paths holding booleans
 */
const BOOLEAN_PATHS = new Set([
  'engine.enabled',
  'openingBook.enabled',
  'openingBook.syntheticFallback',
  'openingBook.openingAlternatives',
]);

/**
 * Config paths holding numbers
 */
const NUMERIC_PATHS = new Set([
  'analysis.visits19',
  'analysis.visitsSmall',
  'analysis.lookupVisits',
  'analysis.topMovesCount',
  'analysis.engineTimeoutMs',
  'analysis.defaultKomi',
  'engine.maxTimeMs',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge a partial configuration over a complete one
 * Source values override target values
 */
function deepMerge(target: GobookConfig, source: PartialGobookConfig): GobookConfig {
  const result = structuredClone(target);

  if (source.analysis) {
    result.analysis = { ...result.analysis, ...source.analysis };
  }

  if (source.engine) {
    result.engine = { ...result.engine, ...source.engine };
  }

  if (source.databases) {
    result.databases = { ...result.databases, ...source.databases };
  }

  if (source.openingBook) {
    const { firstMoves, ...rest } = source.openingBook;
    result.openingBook = {
      ...result.openingBook,
      ...rest,
      firstMoves: { ...result.openingBook.firstMoves, ...firstMoves },
    };
  }

  if (source.output) {
    result.output = { ...result.output, ...source.output };
  }

  return result;
}

/**
 * Set a section.key property on an object
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (section === undefined || key === undefined) {
    return;
  }
  const existing = obj[section];
  const target = isRecord(existing) ? existing : {};
  target[key] = value;
  obj[section] = target;
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, path: string): unknown {
  if (BOOLEAN_PATHS.has(path)) {
    return value.toLowerCase() === 'true' || value === '1';
  }

  if (NUMERIC_PATHS.has(path)) {
    const num = parseFloat(value);
    return isNaN(num) ? value : num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialGobookConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return parsePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialGobookConfig | null> {
  const explorer = cosmiconfig('gobook', {
    searchPlaces: [
      'package.json',
      '.gobookrc',
      '.gobookrc.json',
      '.gobookrc.yaml',
      '.gobookrc.yml',
      'gobook.config.js',
      'gobook.config.cjs',
    ],
  });

  let found: { config: unknown; filepath: string } | null;
  try {
    found = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file${configPath ? ` ${configPath}` : ''}: ${error instanceof Error ? error.message : String(error)}`,
      'Check that the file exists and contains valid JSON, YAML or JavaScript',
    );
  }

  if (!found || found.config === undefined || found.config === null) {
    return null;
  }
  return parsePartialConfig(found.config);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialGobookConfig {
  const config: PartialGobookConfig = {};
  const analysis: NonNullable<PartialGobookConfig['analysis']> = {};

  if (options.profile !== undefined) {
    analysis.profile = options.profile;
  }
  if (options.lookupVisits !== undefined) {
    analysis.lookupVisits = options.lookupVisits;
  }
  if (options.timeout !== undefined) {
    analysis.engineTimeoutMs = options.timeout;
  }
  if (Object.keys(analysis).length > 0) {
    config.analysis = analysis;
  }

  if (options.noEngine) {
    config.engine = { enabled: false };
  }

  if (options.json) {
    config.output = { format: 'json' };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Profile preset
 * 5. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<GobookConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config);
  const envConfig = loadEnvConfig(env);
  const cliConfig = mapCliToConfig(cliOptions);

  // The profile only supplies defaults; explicit values from any source win
  const profile: AnalysisProfile =
    cliConfig.analysis?.profile ??
    envConfig.analysis?.profile ??
    fileConfig?.analysis?.profile ??
    DEFAULT_CONFIG.analysis.profile;

  let config = structuredClone(DEFAULT_CONFIG);
  config.analysis = applyProfile(config.analysis, profile);

  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }
  config = deepMerge(config, envConfig);
  config = deepMerge(config, cliConfig);

  validateConfig(config);

  return config;
}

/**
 * Format configuration for display
 */
export function formatConfig(config: GobookConfig): string {
  return JSON.stringify(config, null, 2);
}

export { ANALYSIS_PROFILES, ConfigValidationError };
