/**
 * Configuration schema types for the gobook CLI
 */

import type { BoardSize } from '@gobook/types';

/**
 * Analysis profile presets
 */
export type AnalysisProfile = 'quick' | 'standard' | 'deep';

/**
 * Result output format
 */
export type OutputFormat = 'table' | 'json';

/**
 * Analysis configuration
 */
export interface AnalysisConfigSchema {
  /** Analysis profile preset */
  profile: AnalysisProfile;
  /** Engine visits for 19x19 positions */
  visits19: number;
  /** Engine visits for 9x9 and 13x13 positions */
  visitsSmall: number;
  /** Minimum effort a cached entry needs to be accepted */
  lookupVisits: number;
  /** Number of candidate moves kept from a live analysis */
  topMovesCount: number;
  /** Wall-clock limit for one engine call (ms) */
  engineTimeoutMs: number;
  /** Komi used when a request names none */
  defaultKomi: number;
}

/**
 * Live engine configuration
 */
export interface EngineConfigSchema {
  /** Whether the live engine may be used at all */
  enabled: boolean;
  /** KataGo executable */
  command: string;
  /** Neural network model file */
  modelPath: string;
  /** KataGo GTP config file */
  configPath: string;
  /** Engine-side time limit per analysis (ms) */
  maxTimeMs: number;
  /** kata-analyze report interval (centiseconds) */
  reportIntervalCs: number;
}

/**
 * Database paths configuration
 */
export interface DatabasesConfigSchema {
  /** SQLite analysis cache */
  cachePath: string;
  /** Bundled opening book (.json or .json.gz) */
  openingBookPath: string;
}

/**
 * Opening book configuration
 */
export interface OpeningBookConfigSchema {
  /** Whether the opening book is consulted */
  enabled: boolean;
  /** Answer empty-board misses with a synthesized first move */
  syntheticFallback: boolean;
  /** Synthesized first move per board size */
  firstMoves: Record<BoardSize, string>;
  /** Visits reported for synthesized answers */
  syntheticVisits: number;
  /** Add 3-4 and 3-3 point alternatives to empty-board answers */
  openingAlternatives: boolean;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  format: OutputFormat;
}

/**
 * Complete gobook configuration
 */
export interface GobookConfig {
  analysis: AnalysisConfigSchema;
  engine: EngineConfigSchema;
  databases: DatabasesConfigSchema;
  openingBook: OpeningBookConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Analysis profile */
  profile?: AnalysisProfile;
  /** Board size */
  size?: number;
  /** Komi */
  komi?: number;
  /** Move list ("B E5, W C3") */
  moves?: string;
  /** Handicap stones */
  handicap?: number;
  /** Minimum cached effort to accept */
  lookupVisits?: number;
  /** Engine visits for this request */
  visits?: number;
  /** Engine timeout (ms) */
  timeout?: number;
  /** Never start the live engine */
  noEngine?: boolean;
  /** Skip the book and cache and run the engine */
  refresh?: boolean;
  /** Print JSON instead of a table */
  json?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
