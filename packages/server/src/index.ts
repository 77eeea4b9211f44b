/**
 * @bridge-analyst/server - HTTP API and CLI
 *
 * Wires the PBN parser, key-moment extractor, engine client and report
 * generator behind an Express application.
 */

export { VERSION } from './version.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './handlers/index.js';

export { createApp, startServer } from './app.js';
export { createServices, type Services } from './services.js';
export { analyzeBoard, type PipelineOptions, type PipelinePhase, type PipelineResult } from './pipeline.js';
export { parseBoardBody, boardRecordSchema } from './board-schema.js';
export { toWireMoment, toWireMoments, type WireKeyMoment, type WireAlternative } from './serialize.js';
export { Logger, requestLogger, type LoggerOptions, type LogSink, type LogFields } from './logger.js';
export { createProgram, parseCliOptions, type CommandOptions } from './cli.js';
