import path from 'path';
import express, { Express, Request, Response } from 'express';
import { ShakemapCache } from '../cache/shakemap-cache';
import { ShakemapConfig } from '../config/shakemap';
import { createMetricsRouter, metricsMiddleware } from '../observability/metrics';
import { createRoutes } from './routes';
import { Simulator } from './routes/shakemap';
import {
  configureCORS,
  createComputeRateLimiter,
  errorHandler,
  requestLogger
} from './middleware/production-safety';

// <repo>/static from both src/api and dist/api
export const STATIC_DIR = path.resolve(__dirname, '..', '..', 'static');

export interface AppDeps {
  config: ShakemapConfig;
  cache: ShakemapCache;
  simulate: Simulator;
}

/**
 * Build the Express app without listening, so tests can mount it on an
 * ephemeral port
 */
export function createApp(deps: AppDeps): Express {
  const { config, cache, simulate } = deps;
  const app = express();

  // Metrics middleware (must be first to capture all requests)
  app.use(metricsMiddleware());

  // Request logging
  app.use(requestLogger);

  // CORS before body parsing so preflights never touch the body
  app.use(configureCORS(config.corsAllowedOrigins));

  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.use('/', createMetricsRouter());

  app.use('/static', express.static(STATIC_DIR));
  app.get('/', (_req: Request, res: Response) => {
    res.sendFile(path.join(STATIC_DIR, 'index.html'));
  });

  const computeLimiter = createComputeRateLimiter(config.rateLimitWindowMs, config.rateLimitMax);
  app.use('/', createRoutes({ cache, simulate, computeLimiter }));

  // must stay last
  app.use(errorHandler);

  return app;
}
