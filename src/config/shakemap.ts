/**
 * Shakemap Configuration
 * centralized config read once from the environment at process start
 */

export interface RegionBounds {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export interface ShakemapConfig {
  port: number;

  // cache: null ttl means a result stays valid until a forced refresh
  cacheTtlSec: number | null;
  cacheWarmOnStart: boolean;

  // cors
  corsAllowedOrigins: string[];

  // upstream event feed
  eventFeedUrl: string;
  region: RegionBounds;
  minMagnitude: number;
  fetchTimeoutMs: number;

  // overlay grid
  overlayRadiusDeg: number;
  overlayStepDeg: number;
  overlayMinMmi: number;

  // protection for uncached endpoints
  rateLimitWindowMs: number;
  rateLimitMax: number;
  jsonBodyLimit: string;
}

export const DEFAULT_EVENT_FEED_URL = 'https://earthquake.usgs.gov/fdsnws/event/1/query';

export const DEFAULT_CORS_ORIGINS = [
  'https://eqshakemap.pages.dev',
  'https://map.shakemap.org',
  'https://shakemap.org',
];

const TTL_DISABLED_VALUES = new Set(['', '0', 'none', 'null', 'disabled', 'off']);

function parseIntEnv(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseFloatEnv(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseFloat(val);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  return val.toLowerCase() === 'true' || val === '1';
}

function parseListEnv(key: string): string[] {
  const val = process.env[key];
  if (!val) {
    return [];
  }
  return val.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * parse CACHE_TTL_SEC
 * unset, zero, negative or one of the "disabled" words turn expiry off
 */
export function parseTtlSec(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const normalized = raw.trim().toLowerCase();
  if (TTL_DISABLED_VALUES.has(normalized)) {
    return null;
  }
  const parsed = parseInt(normalized, 10);
  if (isNaN(parsed) || parsed <= 0) {
    return null;
  }
  return parsed;
}

export function loadShakemapConfig(): ShakemapConfig {
  return {
    port: parseIntEnv('PORT', 3000),

    cacheTtlSec: parseTtlSec(process.env.CACHE_TTL_SEC),
    cacheWarmOnStart: parseBoolEnv('CACHE_WARM_ON_START', false),

    corsAllowedOrigins: [...DEFAULT_CORS_ORIGINS, ...parseListEnv('CORS_ALLOWED_ORIGINS')],

    eventFeedUrl: process.env.EVENT_FEED_URL || DEFAULT_EVENT_FEED_URL,
    region: {
      minLat: parseFloatEnv('EVENT_REGION_MIN_LAT', 5.0),
      maxLat: parseFloatEnv('EVENT_REGION_MAX_LAT', 21.0),
      minLon: parseFloatEnv('EVENT_REGION_MIN_LON', 92.0),
      maxLon: parseFloatEnv('EVENT_REGION_MAX_LON', 110.0),
    },
    minMagnitude: parseFloatEnv('EVENT_MIN_MAGNITUDE', 2.5),
    fetchTimeoutMs: parseIntEnv('EVENT_FETCH_TIMEOUT_MS', 10000),

    overlayRadiusDeg: parseFloatEnv('OVERLAY_RADIUS_DEG', 3.0),
    overlayStepDeg: parseFloatEnv('OVERLAY_STEP_DEG', 0.1),
    overlayMinMmi: parseFloatEnv('OVERLAY_MIN_MMI', 2.0),

    rateLimitWindowMs: parseIntEnv('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
    rateLimitMax: parseIntEnv('RATE_LIMIT_MAX', 60),
    jsonBodyLimit: process.env.JSON_BODY_LIMIT || '16kb',
  };
}

// singleton config instance
let configInstance: ShakemapConfig | null = null;

export function getConfig(): ShakemapConfig {
  if (!configInstance) {
    configInstance = loadShakemapConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
