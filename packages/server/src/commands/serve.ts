/**
 * Serve command implementation
 */

import { startServer } from '../app.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions } from '../config/schema.js';
import { Logger } from '../logger.js';
import { createServices } from '../services.js';

export async function serveCommand(options: CliOptions): Promise<void> {
  const config = await loadConfig(options);
  if (options.showConfig) {
    console.log(formatConfig(config));
    return;
  }

  const logger = new Logger({ level: config.logging.level, color: config.logging.color });
  const services = createServices(config, logger);

  if (!services.engine) {
    logger.warn('BEN_API_URL not configured; engine endpoints will answer 500');
  }
  if (!services.reporter) {
    logger.warn('GEMINI_API_KEY not configured; LLM endpoints will answer 500');
  }

  const server = await startServer(services);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', { error: error.message });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
