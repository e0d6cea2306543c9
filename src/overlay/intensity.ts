import { LegendEntry, MmiLevel } from '../types/overlay';

/**
 * Intensity prediction
 *
 * MMI = C0 + C1*M - C2*log10(R) - C3*R, R = hypocentral distance in km,
 * clamped to the I..X scale. R is floored at 1 km so a surface point right
 * above a zero-depth source stays finite.
 */

export const IPE_COEFFICIENTS = {
  c0: 2.0,
  c1: 1.5,
  c2: 2.5,
  c3: 0.0015,
} as const;

export const MIN_MMI = 1;
export const MAX_MMI = 10;

const EARTH_RADIUS_KM = 6371;

export const MMI_LEGEND: LegendEntry[] = [
  { level: 'I', value: 1, label: 'Not felt', color: '#FFFFFF' },
  { level: 'II', value: 2, label: 'Weak', color: '#BFCCFF' },
  { level: 'III', value: 3, label: 'Weak', color: '#A0E6FF' },
  { level: 'IV', value: 4, label: 'Light', color: '#80FFFF' },
  { level: 'V', value: 5, label: 'Moderate', color: '#7AFF93' },
  { level: 'VI', value: 6, label: 'Strong', color: '#FFFF00' },
  { level: 'VII', value: 7, label: 'Very strong', color: '#FFC800' },
  { level: 'VIII', value: 8, label: 'Severe', color: '#FF9100' },
  { level: 'IX', value: 9, label: 'Violent', color: '#FF0000' },
  { level: 'X', value: 10, label: 'Extreme', color: '#C80000' },
];

const DEG_TO_RAD = Math.PI / 180;

/**
 * great-circle distance in km
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = (lat2 - lat1) * DEG_TO_RAD;
  const dLon = (lon2 - lon1) * DEG_TO_RAD;
  const a = Math.sin(dLat / 2) ** 2
    + Math.cos(lat1 * DEG_TO_RAD) * Math.cos(lat2 * DEG_TO_RAD) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

export function predictMmi(mag: number, epicentralKm: number, depthKm: number): number {
  const hypocentralKm = Math.max(1, Math.sqrt(epicentralKm ** 2 + depthKm ** 2));
  const { c0, c1, c2, c3 } = IPE_COEFFICIENTS;
  const mmi = c0 + c1 * mag - c2 * Math.log10(hypocentralKm) - c3 * hypocentralKm;
  return Math.min(MAX_MMI, Math.max(MIN_MMI, mmi));
}

/**
 * nearest whole intensity as a roman numeral
 */
export function mmiLevel(mmi: number): MmiLevel {
  const index = Math.min(MAX_MMI, Math.max(MIN_MMI, Math.round(mmi))) - 1;
  return MMI_LEGEND[index].level;
}

export function emptyBands(): Record<MmiLevel, number> {
  return { I: 0, II: 0, III: 0, IV: 0, V: 0, VI: 0, VII: 0, VIII: 0, IX: 0, X: 0 };
}
