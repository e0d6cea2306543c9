import { Router, Request, Response } from 'express';
import { createHealthRoutes } from './health';
import { createShakemapRoutes, ShakemapRouteDeps } from './shakemap';

export function createRoutes(deps: ShakemapRouteDeps): Router {
  const router = Router();

  router.use('/', createHealthRoutes(deps.cache));
  router.use('/', createShakemapRoutes(deps));

  router.get('/api', (_req: Request, res: Response) => {
    return res.status(200).json({
      name: 'SHAKEMAP API',
      description: 'Shakemap overlay for the latest regional earthquake, with event simulation',
      version: '1.2.0',
      endpoints: buildEndpointList()
    });
  });

  return router;
}

function buildEndpointList(): Record<string, string> {
  return {
    'GET /': 'Landing page',
    'GET /api/run': 'Shakemap for the latest event (cached)',
    'POST /api/run': 'Shakemap for the latest event; {force: true} recomputes, {mode: "simulate", ...} simulates',
    'POST /api/refresh': 'Recompute the latest event shakemap',
    'GET /api/cache_state': 'Cache slot state',
    'POST /api/simulate': 'Shakemap for a simulated event {lat, lon, depth, mag}',
    'GET /health': 'Health check',
    'GET /ready': 'Readiness probe',
    'GET /live': 'Liveness probe',
    'GET /metrics': 'Prometheus metrics',
    'GET /metrics/json': 'JSON metrics',
    'GET /api': 'API information'
  };
}
