import { EventMeta } from '../types/event';
import { RegionBounds } from '../config/shakemap';
import { UpstreamFetchError } from '../errors/shakemap-errors';
import { metrics } from '../observability/metrics';
import { toBangkokIso } from '../utils/time';
import { EventSource } from './event-source';

/**
 * USGS FDSN Event Client
 *
 * Asks the FDSN event web service for the single most recent event inside a
 * lat/lon box, newest first, in GeoJSON. Every failure mode (network, timeout,
 * non-2xx, malformed body, empty result) surfaces as UpstreamFetchError.
 */

export interface UsgsEventSourceOptions {
  feedUrl: string;
  region: RegionBounds;
  minMagnitude: number;
  timeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Turn a GeoJSON feature from the FDSN service into EventMeta
 */
export function parseUsgsFeature(feature: unknown): EventMeta {
  if (!isRecord(feature) || !isRecord(feature.properties) || !isRecord(feature.geometry)) {
    throw new UpstreamFetchError('USGS feed returned a malformed feature');
  }

  const { properties, geometry } = feature;
  const coordinates = geometry.coordinates;
  if (!Array.isArray(coordinates) || coordinates.length < 3) {
    throw new UpstreamFetchError('USGS feature is missing coordinates');
  }

  const [lon, lat, depth] = coordinates;
  if (!isFiniteNumber(lon) || !isFiniteNumber(lat) || !isFiniteNumber(depth)) {
    throw new UpstreamFetchError('USGS feature has non-numeric coordinates');
  }
  if (!isFiniteNumber(properties.mag)) {
    throw new UpstreamFetchError('USGS feature is missing a magnitude');
  }
  if (!isFiniteNumber(properties.time)) {
    throw new UpstreamFetchError('USGS feature is missing an origin time');
  }

  const eventId = typeof feature.id === 'string' ? feature.id : `usgs-${properties.time}`;

  return {
    event_id: eventId,
    time_utc: new Date(properties.time).toISOString(),
    time_th: toBangkokIso(properties.time),
    lat,
    lon,
    depth_km: depth,
    mag: properties.mag,
    place: typeof properties.place === 'string' ? properties.place : null,
    source: 'usgs',
  };
}

export class UsgsEventSource implements EventSource {
  private readonly options: UsgsEventSourceOptions;

  constructor(options: UsgsEventSourceOptions) {
    this.options = options;
  }

  buildQueryUrl(): string {
    const { feedUrl, region, minMagnitude } = this.options;
    const url = new URL(feedUrl);
    url.searchParams.set('format', 'geojson');
    url.searchParams.set('orderby', 'time');
    url.searchParams.set('limit', '1');
    url.searchParams.set('minlatitude', String(region.minLat));
    url.searchParams.set('maxlatitude', String(region.maxLat));
    url.searchParams.set('minlongitude', String(region.minLon));
    url.searchParams.set('maxlongitude', String(region.maxLon));
    url.searchParams.set('minmagnitude', String(minMagnitude));
    return url.toString();
  }

  async fetchLatestEvent(): Promise<EventMeta> {
    const url = this.buildQueryUrl();
    const startTime = Date.now();

    // covers the whole exchange, body included
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (err) {
        throw this.unreachable(err, controller.signal);
      }

      if (!response.ok) {
        throw new UpstreamFetchError(`USGS feed error (${response.status})`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        if (controller.signal.aborted) {
          throw this.unreachable(err, controller.signal);
        }
        throw new UpstreamFetchError('USGS feed returned invalid JSON', { cause: err });
      }

      if (!isRecord(body) || !Array.isArray(body.features)) {
        throw new UpstreamFetchError('USGS feed returned an unexpected payload');
      }
      if (body.features.length === 0) {
        throw new UpstreamFetchError('No recent events found in the configured region');
      }

      const event = parseUsgsFeature(body.features[0]);
      console.log(`[EventSource] latest event ${event.event_id} M${event.mag} at ${event.time_utc}`);
      return event;
    } finally {
      clearTimeout(timeout);
      metrics.recordUpstreamLatency(Date.now() - startTime);
    }
  }

  private unreachable(err: unknown, signal: AbortSignal): UpstreamFetchError {
    const reason = signal.aborted
      ? `timed out after ${this.options.timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    return new UpstreamFetchError(`USGS feed unreachable: ${reason}`, { cause: err });
  }
}
