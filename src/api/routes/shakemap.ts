import { Router, Request, Response, RequestHandler } from 'express';
import { ShakemapCache } from '../../cache/shakemap-cache';
import { SimulateParams } from '../../overlay/simulator';
import { OverlayResult } from '../../types/overlay';
import { metrics } from '../../observability/metrics';
import { buildErrorResponse } from '../error-response';
import { logError } from '../middleware/production-safety';
import { isPlainObject, isSimulateMode, parseForceFlag, parseSimulateParams, readRunBody } from '../params';

export type Simulator = (params: SimulateParams) => OverlayResult;

export interface ShakemapRouteDeps {
  cache: ShakemapCache;
  simulate: Simulator;
  /** guards the endpoints that always compute (refresh, simulate) */
  computeLimiter: RequestHandler;
}

function sendError(res: Response, err: unknown, context: string): Response {
  logError(err, { context });
  const { status, body } = buildErrorResponse(err);
  return res.status(status).json(body);
}

function runSimulation(simulate: Simulator, body: unknown): OverlayResult {
  const params = parseSimulateParams(body);
  const data = simulate(params);
  metrics.incrementSimulation();
  return data;
}

/**
 * POST /api/run only costs a computation when it simulates or forces;
 * plain cached reads skip the limiter
 */
function limitUncachedRuns(limiter: RequestHandler): RequestHandler {
  return (req, res, next) => {
    const body: unknown = req.body;
    if (isPlainObject(body) && (isSimulateMode(body) || parseForceFlag(body.force))) {
      limiter(req, res, next);
      return;
    }
    next();
  };
}

export function createShakemapRoutes(deps: ShakemapRouteDeps): Router {
  const router = Router();
  const { cache, simulate, computeLimiter } = deps;

  // browser/test entry: cached overlay, computed on first use
  router.get('/api/run', async (_req: Request, res: Response) => {
    try {
      const data = await cache.getOrCompute(false);
      return res.status(200).json(data);
    } catch (err) {
      return sendError(res, err, 'api_run_get');
    }
  });

  // {} | {force: true} | {mode: "simulate", lat, lon, depth, mag}
  router.post('/api/run', limitUncachedRuns(computeLimiter), async (req: Request, res: Response) => {
    try {
      const body = readRunBody(req.body);

      if (isSimulateMode(body)) {
        return res.status(200).json(runSimulation(simulate, body));
      }

      const data = await cache.getOrCompute(parseForceFlag(body.force));
      return res.status(200).json(data);
    } catch (err) {
      return sendError(res, err, 'api_run_post');
    }
  });

  // forced refresh of the latest event (admin/devtools)
  router.post('/api/refresh', computeLimiter, async (_req: Request, res: Response) => {
    try {
      const { data, eventKey } = await cache.getOrComputeWithState(true);
      return res.status(200).json({
        ok: true,
        meta: data.meta,
        event_key: eventKey
      });
    } catch (err) {
      return sendError(res, err, 'api_refresh');
    }
  });

  // debug view of the cache slot
  router.get('/api/cache_state', (_req: Request, res: Response) => {
    return res.status(200).json(cache.peekState());
  });

  router.post('/api/simulate', computeLimiter, (req: Request, res: Response) => {
    try {
      return res.status(200).json(runSimulation(simulate, req.body));
    } catch (err) {
      return sendError(res, err, 'api_simulate');
    }
  });

  return router;
}
