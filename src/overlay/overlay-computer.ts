import { EventMeta } from '../types/event';
import { CellFeature, OverlayGrid, OverlayResult } from '../types/overlay';
import { ComputationError } from '../errors/shakemap-errors';
import { MMI_LEGEND, emptyBands, haversineKm, mmiLevel, predictMmi } from './intensity';

export interface OverlayOptions {
  /** half-width of the square grid around the epicentre */
  radiusDeg: number;
  stepDeg: number;
  /** cells below this intensity are left out of the GeoJSON features */
  minMmi: number;
}

export const DEFAULT_OVERLAY_OPTIONS: OverlayOptions = {
  radiusDeg: 3.0,
  stepDeg: 0.1,
  minMmi: 2.0,
};

// keeps a misconfigured grid from allocating millions of cells
const MAX_CELLS_PER_SIDE = 401;

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function validateEvent(event: Pick<EventMeta, 'lat' | 'lon' | 'depth_km' | 'mag'>): void {
  if (!Number.isFinite(event.lat) || event.lat < -90 || event.lat > 90) {
    throw new ComputationError(`latitude out of range: ${event.lat}`);
  }
  if (!Number.isFinite(event.lon) || event.lon < -180 || event.lon > 180) {
    throw new ComputationError(`longitude out of range: ${event.lon}`);
  }
  if (!Number.isFinite(event.depth_km) || event.depth_km < 0) {
    throw new ComputationError(`depth must be a non-negative number of km: ${event.depth_km}`);
  }
  if (!Number.isFinite(event.mag) || event.mag < 0 || event.mag > 10) {
    throw new ComputationError(`magnitude out of range: ${event.mag}`);
  }
}

function validateOptions(options: OverlayOptions): number {
  if (!(options.stepDeg > 0) || !(options.radiusDeg > 0)) {
    throw new ComputationError('overlay grid radius and step must be positive');
  }
  const half = Math.round(options.radiusDeg / options.stepDeg);
  if (2 * half + 1 > MAX_CELLS_PER_SIDE) {
    throw new ComputationError(
      `overlay grid too large: ${2 * half + 1} cells per side (max ${MAX_CELLS_PER_SIDE})`
    );
  }
  return half;
}

/**
 * longitude in [-180, 180); values already in range pass through untouched
 */
export function wrapLongitude(lon: number): number {
  if (lon >= -180 && lon < 180) {
    return lon;
  }
  return roundTo(((((lon + 180) % 360) + 360) % 360) - 180, 6);
}

function clampLongitude(lon: number): number {
  return Math.min(180, Math.max(-180, lon));
}

// cells on the antimeridian are cut at +-180 rather than wrapped
function cellPolygon(lat: number, lon: number, halfStep: number): [number, number][][] {
  const south = roundTo(lat - halfStep, 6);
  const north = roundTo(lat + halfStep, 6);
  const west = clampLongitude(roundTo(lon - halfStep, 6));
  const east = clampLongitude(roundTo(lon + halfStep, 6));
  return [[
    [west, south],
    [east, south],
    [east, north],
    [west, north],
    [west, south],
  ]];
}

/**
 * Shakemap overlay for one event
 *
 * Samples predicted intensity on a regular grid centred on the epicentre.
 * Rows run north to south and rows past a pole are dropped. Columns wrap
 * at the antimeridian, so a grid crossing it has bounds.west > bounds.east.
 */
export function computeOverlayFromEvent(
  event: EventMeta,
  options: OverlayOptions = DEFAULT_OVERLAY_OPTIONS,
  computedAt: Date = new Date()
): OverlayResult {
  validateEvent(event);
  const half = validateOptions(options);
  const step = options.stepDeg;

  const latitudes: number[] = [];
  for (let i = half; i >= -half; i--) {
    const lat = roundTo(event.lat + i * step, 6);
    if (lat >= -90 && lat <= 90) {
      latitudes.push(lat);
    }
  }
  const longitudes: number[] = [];
  for (let j = -half; j <= half; j++) {
    longitudes.push(wrapLongitude(roundTo(event.lon + j * step, 6)));
  }

  const bands = emptyBands();
  const features: CellFeature[] = [];
  const values: number[] = [];
  let maxMmi = 0;

  for (const lat of latitudes) {
    for (const lon of longitudes) {
      const distanceKm = haversineKm(event.lat, event.lon, lat, lon);
      const mmi = roundTo(predictMmi(event.mag, distanceKm, event.depth_km), 1);
      const level = mmiLevel(mmi);

      values.push(mmi);
      bands[level]++;
      maxMmi = Math.max(maxMmi, mmi);

      if (mmi >= options.minMmi) {
        features.push({
          type: 'Feature',
          geometry: { type: 'Polygon', coordinates: cellPolygon(lat, lon, step / 2) },
          properties: { mmi, level },
        });
      }
    }
  }

  const grid: OverlayGrid = {
    bounds: {
      north: latitudes[0],
      south: latitudes[latitudes.length - 1],
      west: longitudes[0],
      east: longitudes[longitudes.length - 1],
    },
    rows: latitudes.length,
    cols: longitudes.length,
    step_deg: step,
    mmi: values,
  };

  return {
    meta: {
      ...event,
      max_mmi: maxMmi,
      computed_at: computedAt.toISOString(),
    },
    grid,
    bands,
    features: { type: 'FeatureCollection', features },
    legend: MMI_LEGEND.map(entry => ({ ...entry })),
  };
}
