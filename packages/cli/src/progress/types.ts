/**
 * Shared types for progress reporter components
 */

import type { LookupState } from '../orchestrator/state-machine.js';

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Lookup state display names
 */
export const PHASE_NAMES: Record<LookupState, string> = {
  querying_book: 'Querying opening book',
  querying_cache: 'Querying analysis cache',
  invoking_engine: 'Running live engine',
  done: 'Done',
  failed: 'Failed',
};

/**
 * Service health status
 */
export interface ServiceStatus {
  name: string;
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}
