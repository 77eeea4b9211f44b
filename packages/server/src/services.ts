/**
 * Collaborators built once at start-up from configuration
 */

import { AnalysisEngineClient } from '@bridge-analyst/engine-client';
import { OpenAIClient, ReportGenerator, createLLMConfig } from '@bridge-analyst/llm';
import type { AnalysisEngine } from '@bridge-analyst/types';

import type { BridgeAnalystConfig } from './config/schema.js';
import { Logger } from './logger.js';

/**
 * Everything a request handler needs
 *
 * `engine` and `reporter` are absent when their configuration is missing.
 */
export interface Services {
  config: BridgeAnalystConfig;
  logger: Logger;
  engine?: AnalysisEngine | undefined;
  reporter?: ReportGenerator | undefined;
}

/**
 * Build the services for a configuration
 */
export function createServices(config: BridgeAnalystConfig, logger?: Logger): Services {
  const log = logger ?? new Logger({ level: config.logging.level, color: config.logging.color });

  const engine = config.engine.baseUrl
    ? new AnalysisEngineClient({
        baseUrl: config.engine.baseUrl,
        timeoutMs: config.engine.timeoutMs,
      })
    : undefined;

  const reporter = config.llm.apiKey
    ? new ReportGenerator(
        new OpenAIClient(
          createLLMConfig({
            apiKey: config.llm.apiKey,
            baseUrl: config.llm.baseUrl,
            model: config.llm.model,
            temperature: config.llm.temperature,
            timeout: config.llm.timeout,
            maxTokens: config.llm.maxTokens,
          }),
        ),
        {
          maxPlayCards: config.report.maxPlayCards,
          onError: (error) => log.warn('Report generation failed', { error: error.message }),
        },
      )
    : undefined;

  return { config, logger: log, engine, reporter };
}
