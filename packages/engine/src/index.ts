/**
 * @gobook/engine - Analysis engine interface and GTP backend
 */

export type { AnalysisEngine, AnalysisTask } from './types.js';

export {
  EngineError,
  EngineStartupError,
  EngineProcessError,
  EngineCommandError,
  AnalysisCancelledError,
} from './errors.js';

export { GtpEngine } from './gtp/gtp-engine.js';
export type { GtpEngineConfig, EngineProcess, SpawnFunction } from './gtp/gtp-engine.js';

export { parseKataAnalyzeLine, totalVisits } from './gtp/kata-analyze-parser.js';
