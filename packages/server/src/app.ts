/**
 * Express application and HTTP listener
 */

import type { Server } from 'node:http';

import cors from 'cors';
import express, { type Express, type RequestHandler } from 'express';

import { errorMiddleware } from './errors/handler.js';
import {
  analyzePbnHandler,
  apiInfo,
  benAnalyzeHandler,
  combinedAnalyzeHandler,
  compareAnalyzeHandler,
  geminiAnalyzeHandler,
  handle,
  type Handler,
  health,
  home,
  manualAnalyzeHandler,
  parsePbnHandler,
  quickAnalyzeHandler,
} from './handlers/index.js';
import { requestLogger } from './logger.js';
import type { Services } from './services.js';

/**
 * Body size accepted by the JSON and text parsers
 */
const BODY_LIMIT = '1mb';

function route(services: Services, handler: Handler): RequestHandler {
  return (req, res, next) => {
    handle(handler, services, req.body)
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  };
}

/**
 * Build the application for a set of services
 */
export function createApp(services: Services): Express {
  const app = express();

  app.use(cors());
  app.use(requestLogger(services.logger));
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(express.text({ type: ['text/*', 'application/x-pbn'], limit: BODY_LIMIT }));

  app.get('/', route(services, home));
  app.get('/health', route(services, health));
  app.get('/api/info', route(services, apiInfo));

  app.post('/api/parse/pbn', route(services, parsePbnHandler));
  app.post('/api/analyze/pbn', route(services, analyzePbnHandler));
  app.post('/api/analyze/quick', route(services, quickAnalyzeHandler));

  app.post('/api/analyze/manual', route(services, manualAnalyzeHandler));
  app.post('/api/analyze/gemini', route(services, geminiAnalyzeHandler));
  app.post('/api/analyze/ben', route(services, benAnalyzeHandler));
  app.post('/api/analyze/combined', route(services, combinedAnalyzeHandler));
  app.post('/api/analyze/compare', route(services, compareAnalyzeHandler));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: `Not found: ${req.method} ${req.path}` });
  });
  app.use(errorMiddleware(services.logger));

  return app;
}

/**
 * Start listening on the configured host and port
 */
export function startServer(services: Services): Promise<Server> {
  const { host, port } = services.config.server;
  const app = createApp(services);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      services.logger.info(`Listening on http://${host}:${boundPort}`, {
        engine: services.engine !== undefined,
        llm: services.reporter !== undefined,
      });
      resolve(server);
    });
    server.once('error', reject);
  });
}
