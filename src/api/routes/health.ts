import { Router, Request, Response } from 'express';
import { ShakemapCache } from '../../cache/shakemap-cache';

export function createHealthRoutes(cache: ShakemapCache): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    const state = cache.peekState();
    return res.status(200).json({
      status: 'healthy',
      cache: state.has_cache ? 'warm' : 'empty',
      computing: cache.isComputing(),
      event_key: state.event_key,
      timestamp: new Date().toISOString()
    });
  });

  // Readiness probe: ready once a shakemap has been computed
  router.get('/ready', (_req: Request, res: Response) => {
    if (cache.peekState().has_cache) {
      return res.status(200).send('OK');
    }
    return res.status(503).send('NOT READY');
  });

  // Liveness probe
  router.get('/live', (_req: Request, res: Response) => {
    return res.status(200).send('OK');
  });

  return router;
}
