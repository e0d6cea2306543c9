/**
 * Earthquake event metadata as delivered by an event source
 */
export interface EventMeta {
  event_id: string;
  /** ISO 8601 in UTC */
  time_utc: string;
  /** ISO 8601 in Asia/Bangkok (+07:00) */
  time_th: string;
  lat: number;
  lon: number;
  depth_km: number;
  mag: number;
  place: string | null;
  source: 'usgs' | 'simulation';
}
