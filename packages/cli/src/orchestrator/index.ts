/**
 * Orchestrator module exports
 */

export type { Services } from './services.js';
export { performHealthChecks, createServices, createOrchestrator } from './services.js';

export type {
  OrchestratorConfig,
  OrchestratorServices,
  AnalyzeOptions,
} from './orchestrator.js';
export { FallbackOrchestrator, DEFAULT_ORCHESTRATOR_CONFIG } from './orchestrator.js';

export type { LookupState, StateListener } from './state-machine.js';
export { LookupStateMachine, InvalidTransitionError } from './state-machine.js';

export type { LookupLayer, AttemptOutcome, LayerAttempt } from './errors.js';
export {
  LAYER_NAMES,
  AnalysisFailedError,
  EngineUnavailableError,
  EngineTimeoutError,
  EngineCancelledError,
  EngineFailedError,
} from './errors.js';
