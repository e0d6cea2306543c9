/**
 * Event identity key
 * diagnostics only: the cache never decides a hit by comparing keys
 */

export interface EventKeySource {
  time_utc?: string | null;
  time_th?: string | null;
  lat?: number | null;
  lon?: number | null;
  mag?: number | null;
  depth_km?: number | null;
}

const KEY_DELIMITER = '|';

function keyPart(value: string | number | null | undefined): string {
  return value === null || value === undefined ? 'null' : String(value);
}

/**
 * time (UTC, else Thai time) | lat | lon | mag | depth_km
 */
export function makeEventKey(meta: EventKeySource): string {
  return [
    keyPart(meta.time_utc || meta.time_th),
    keyPart(meta.lat),
    keyPart(meta.lon),
    keyPart(meta.mag),
    keyPart(meta.depth_km),
  ].join(KEY_DELIMITER);
}
