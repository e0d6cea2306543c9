import { EventMeta } from '../types/event';
import { OverlayResult } from '../types/overlay';
import { ComputationError } from '../errors/shakemap-errors';
import { toBangkokIso } from '../utils/time';
import { DEFAULT_OVERLAY_OPTIONS, OverlayOptions, computeOverlayFromEvent } from './overlay-computer';

export interface SimulateParams {
  lat: number;
  lon: number;
  depth_km: number;
  mag: number;
}

// deepest recorded earthquakes sit around 700 km
export const MAX_SIMULATED_DEPTH_KM = 700;

/**
 * Shakemap for a hypothetical event at the given location and time.
 * Never touches the cache.
 */
export function simulateEvent(
  params: SimulateParams,
  options: OverlayOptions = DEFAULT_OVERLAY_OPTIONS,
  now: Date = new Date()
): OverlayResult {
  if (params.depth_km > MAX_SIMULATED_DEPTH_KM) {
    throw new ComputationError(
      `depth must not exceed ${MAX_SIMULATED_DEPTH_KM} km: ${params.depth_km}`
    );
  }

  const event: EventMeta = {
    event_id: `sim-${now.getTime()}`,
    time_utc: now.toISOString(),
    time_th: toBangkokIso(now.getTime()),
    lat: params.lat,
    lon: params.lon,
    depth_km: params.depth_km,
    mag: params.mag,
    place: 'Simulated event',
    source: 'simulation',
  };

  return computeOverlayFromEvent(event, options, now);
}
