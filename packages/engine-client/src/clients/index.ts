export {
  AnalysisEngineClient,
  DEFAULT_ENGINE_CONFIG,
  ANALYZE_PATH,
  toEngineRequest,
  type AnalysisEngineConfig,
  type EngineRequest,
} from './analysis-engine.js';
