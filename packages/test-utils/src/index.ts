/**
 * @gobook/test-utils
 *
 * Shared test utilities for the analyzer packages
 */

// Mock services
export {
  createMockEngine,
  DEFAULT_ENGINE_ANALYSIS,
  type MockEngine,
  type MockEngineConfig,
} from './mocks/mock-engine.js';

// Builders
export { AnalysisResultBuilder, analysisResult, candidate } from './builders/analysis-result-builder.js';
export {
  BookBundleBuilder,
  bookBundle,
  type BookEntryInput,
  type StandardBundle,
  type CompactBundle,
} from './builders/book-builder.js';

// Assertions
export {
  assertSortedByWinProbability,
  assertNoOccupiedSuggestions,
  assertAnsweredBy,
} from './assertions/analysis-assertions.js';

// Fixtures
export { createTempDir, removeTempDir, writeJsonFixture } from './fixtures/temp-files.js';
