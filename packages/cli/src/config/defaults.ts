/**
 * Default configuration values and profile presets
 */

import type { BoardSize } from '@gobook/types';

import type { AnalysisProfile, AnalysisConfigSchema, GobookConfig } from './schema.js';

/**
 * Analysis profile presets
 * Maps profile names to analysis configuration overrides
 */
export const ANALYSIS_PROFILES: Record<AnalysisProfile, Partial<AnalysisConfigSchema>> = {
  quick: {
    visits19: 50,
    visitsSmall: 150,
    engineTimeoutMs: 30000, // 30 seconds
  },
  standard: {
    visits19: 150,
    visitsSmall: 500,
    engineTimeoutMs: 60000,
  },
  deep: {
    visits19: 600,
    visitsSmall: 2000,
    engineTimeoutMs: 180000, // 3 minutes
  },
};

/**
 * Default analysis configuration (standard profile)
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfigSchema = {
  profile: 'standard',
  visits19: 150,
  visitsSmall: 500,
  lookupVisits: 100,
  topMovesCount: 10,
  engineTimeoutMs: 60000,
  defaultKomi: 7.5,
};

/**
 * Default KataGo configuration
 */
export const DEFAULT_ENGINE_CONFIG = {
  enabled: true,
  command: 'katago',
  modelPath: 'katago/model.bin.gz',
  configPath: 'katago/analysis.cfg',
  maxTimeMs: 60000,
  reportIntervalCs: 10,
};

/**
 * Default database paths (relative to the working directory)
 */
export const DEFAULT_DATABASES_CONFIG = {
  cachePath: 'data/analysis.db',
  openingBookPath: 'data/opening_book.json.gz',
};

/**
 * Default opening book configuration
 */
export const DEFAULT_OPENING_BOOK_CONFIG = {
  enabled: true,
  syntheticFallback: true,
  firstMoves: { 9: 'E5', 13: 'G7', 19: 'K10' },
  syntheticVisits: 1000,
  openingAlternatives: false,
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG = {
  format: 'table' as const,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: GobookConfig = {
  analysis: DEFAULT_ANALYSIS_CONFIG,
  engine: DEFAULT_ENGINE_CONFIG,
  databases: DEFAULT_DATABASES_CONFIG,
  openingBook: DEFAULT_OPENING_BOOK_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};

/**
 * Apply profile presets to analysis configuration
 */
export function applyProfile(
  config: AnalysisConfigSchema,
  profile: AnalysisProfile,
): AnalysisConfigSchema {
  const profilePreset = ANALYSIS_PROFILES[profile];
  return {
    ...config,
    ...profilePreset,
    profile,
  };
}

/**
 * Engine visits for a board size
 */
export function computeEffortFor(config: AnalysisConfigSchema, boardSize: BoardSize): number {
  return boardSize === 19 ? config.visits19 : config.visitsSmall;
}
