import 'dotenv/config';
import { getConfig } from './config/shakemap';
import { createApp } from './api/app';
import { logError } from './api/middleware/production-safety';
import { ShakemapCache } from './cache/shakemap-cache';
import { UsgsEventSource } from './sources/usgs-event-source';
import { computeOverlayFromEvent, OverlayOptions } from './overlay/overlay-computer';
import { simulateEvent } from './overlay/simulator';

/**
 * SHAKEMAP API - Entry Point
 *
 * Features:
 * - Latest regional event from the USGS FDSN feed
 * - Single-slot shakemap cache, one computation at a time
 * - Event simulation (uncached)
 * - Prometheus-compatible metrics
 * - Rate limiting on the endpoints that always compute
 * - Graceful shutdown
 */
async function main() {
  const config = getConfig();

  console.log('Shakemap configuration:');
  console.log(`  Cache TTL: ${config.cacheTtlSec === null ? 'disabled (refresh only)' : `${config.cacheTtlSec}s`}`);
  console.log(`  Event feed: ${config.eventFeedUrl}`);
  console.log(`  Region: lat ${config.region.minLat}..${config.region.maxLat}, lon ${config.region.minLon}..${config.region.maxLon}`);
  console.log(`  Min magnitude: ${config.minMagnitude}`);
  console.log(`  Grid: ±${config.overlayRadiusDeg}° at ${config.overlayStepDeg}°`);

  const overlayOptions: OverlayOptions = {
    radiusDeg: config.overlayRadiusDeg,
    stepDeg: config.overlayStepDeg,
    minMmi: config.overlayMinMmi,
  };

  const source = new UsgsEventSource({
    feedUrl: config.eventFeedUrl,
    region: config.region,
    minMagnitude: config.minMagnitude,
    timeoutMs: config.fetchTimeoutMs,
  });

  // one cache for the whole process, handed to the routes
  const cache = new ShakemapCache({
    source,
    computeOverlay: (event) => computeOverlayFromEvent(event, overlayOptions),
    ttlSec: config.cacheTtlSec,
  });

  const app = createApp({
    config,
    cache,
    simulate: (params) => simulateEvent(params, overlayOptions),
  });

  if (config.cacheWarmOnStart) {
    try {
      await cache.getOrCompute(false);
      console.log(`✓ Cache warmed: ${cache.peekState().event_key}`);
    } catch (err) {
      logError(err, { context: 'cache_warm_failed', note: 'first request will retry' });
    }
  }

  const server = app.listen(config.port, () => {
    console.log(`\nSHAKEMAP API listening on port ${config.port}`);
    console.log(`\nEndpoints:`);
    console.log(`  GET  /                 - Landing page`);
    console.log(`  GET  /api/run          - Latest event shakemap (cached)`);
    console.log(`  POST /api/run          - Latest / forced / simulated shakemap`);
    console.log(`  POST /api/refresh      - Force recomputation`);
    console.log(`  GET  /api/cache_state  - Cache state`);
    console.log(`  POST /api/simulate     - Simulated event shakemap`);
    console.log(`  GET  /health           - Health check`);
    console.log(`  GET  /metrics          - Prometheus metrics`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);

    server.close((err) => {
      if (err) {
        logError(err, { context: 'server_close_failed' });
        process.exit(1);
      }
      console.log('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Unhandled rejection handler
  process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });
}

// Run
main().catch((err) => {
  console.error('Fatal error during startup:', err);
  process.exit(1);
});
