/**
 * @bridge-analyst/test-utils
 *
 * Shared builders, mock collaborators and fixtures for tests
 */

// Fixture loading
export { loadPbnSync, loadJsonSync, getFixturePath } from './fixtures/loader.js';

// Mock collaborators
export { createMockEngine, type MockEngine, type MockEngineConfig } from './mocks/mock-engine.js';

export {
  createMockTextGenerator,
  DEFAULT_MOCK_COMPLETION,
  type MockTextGenerator,
  type MockTextGeneratorConfig,
} from './mocks/mock-llm.js';

// Builders
export { BoardBuilder, board, SAMPLE_HANDS } from './builders/board-builder.js';

export {
  EngineAnalysisBuilder,
  engineAnalysis,
  failedAnalysis,
} from './builders/engine-analysis-builder.js';
