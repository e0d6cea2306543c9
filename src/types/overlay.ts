import { EventMeta } from './event';

export type MmiLevel = 'I' | 'II' | 'III' | 'IV' | 'V' | 'VI' | 'VII' | 'VIII' | 'IX' | 'X';

export interface OverlayMeta extends EventMeta {
  max_mmi: number;
  computed_at: string;
}

export interface GridBounds {
  north: number;
  south: number;
  west: number;
  east: number;
}

/**
 * Regular lat/lon grid, row-major from the north-west corner
 */
export interface OverlayGrid {
  bounds: GridBounds;
  rows: number;
  cols: number;
  step_deg: number;
  mmi: number[];
}

export interface CellFeature {
  type: 'Feature';
  geometry: {
    type: 'Polygon';
    coordinates: [number, number][][];
  };
  properties: {
    mmi: number;
    level: MmiLevel;
  };
}

export interface CellFeatureCollection {
  type: 'FeatureCollection';
  features: CellFeature[];
}

export interface LegendEntry {
  level: MmiLevel;
  value: number;
  label: string;
  color: string;
}

/**
 * Full shakemap payload, the value held by the cache
 */
export interface OverlayResult {
  meta: OverlayMeta;
  grid: OverlayGrid;
  bands: Record<MmiLevel, number>;
  features: CellFeatureCollection;
  legend: LegendEntry[];
}
