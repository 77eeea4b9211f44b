export { type Handler, type HandlerResult, handle, ok } from './handle.js';
export { home, health, apiInfo, ENDPOINTS, SERVICE_NAME } from './info.js';
export { parsePbnHandler, analyzePbnHandler, quickAnalyzeHandler, extractPbnText } from './pbn.js';
export {
  manualAnalyzeHandler,
  geminiAnalyzeHandler,
  benAnalyzeHandler,
  combinedAnalyzeHandler,
  compareAnalyzeHandler,
  rawEngineBody,
} from './board.js';
