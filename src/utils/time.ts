// Asia/Bangkok has no daylight saving
const BANGKOK_OFFSET_MS = 7 * 60 * 60 * 1000;

/**
 * 2025-03-28T06:20:52.715Z -> 2025-03-28T13:20:52.715+07:00
 */
export function toBangkokIso(epochMs: number): string {
  return new Date(epochMs + BANGKOK_OFFSET_MS).toISOString().replace('Z', '+07:00');
}
