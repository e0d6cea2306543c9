import { describe, it, expect } from 'vitest';
import { computeOverlayFromEvent, DEFAULT_OVERLAY_OPTIONS, wrapLongitude } from '../../src/overlay/overlay-computer';
import { ComputationError } from '../../src/errors/shakemap-errors';
import { TINY_GRID, makeEvent } from '../helpers/fixtures';

const COMPUTED_AT = new Date('2025-01-07T00:00:00.000Z');

describe('computeOverlayFromEvent', () => {
  describe('grid', () => {
    it('should lay out a square grid around the epicentre', () => {
      const result = computeOverlayFromEvent(makeEvent({ lat: 13.75, lon: 100.5 }), TINY_GRID, COMPUTED_AT);

      expect(result.grid.rows).toBe(5);
      expect(result.grid.cols).toBe(5);
      expect(result.grid.step_deg).toBe(0.1);
      expect(result.grid.mmi).toHaveLength(25);
      expect(result.grid.bounds).toEqual({
        north: 13.95,
        south: 13.55,
        west: 100.3,
        east: 100.7
      });
    });

    it('should peak at the epicentre cell', () => {
      const result = computeOverlayFromEvent(
        makeEvent({ lat: 13.75, lon: 100.5, depth_km: 0, mag: 5 }),
        TINY_GRID,
        COMPUTED_AT
      );

      // R floors at 1 km: 2.0 + 1.5 * 5 - 0.0015 = 9.4985
      expect(result.grid.mmi[12]).toBe(9.5);
      expect(result.meta.max_mmi).toBe(9.5);
      expect(Math.max(...result.grid.mmi)).toBe(9.5);
    });

    it('should clamp intensity at X', () => {
      const result = computeOverlayFromEvent(
        makeEvent({ depth_km: 0, mag: 8 }),
        TINY_GRID,
        COMPUTED_AT
      );

      expect(result.meta.max_mmi).toBe(10);
      expect(result.bands.X).toBeGreaterThanOrEqual(1);
    });

    it('should decrease away from the epicentre', () => {
      const result = computeOverlayFromEvent(makeEvent({ depth_km: 10, mag: 6 }), TINY_GRID, COMPUTED_AT);
      const { mmi } = result.grid;

      // centre row: cells 10..14, centre at 12
      expect(mmi[12]).toBeGreaterThan(mmi[11]);
      expect(mmi[11]).toBeGreaterThan(mmi[10]);
      expect(mmi[12]).toBeGreaterThan(mmi[13]);
      expect(mmi[13]).toBeGreaterThan(mmi[14]);
    });

    it('should drop rows beyond the pole', () => {
      const result = computeOverlayFromEvent(makeEvent({ lat: 89.9, lon: 0 }), TINY_GRID, COMPUTED_AT);

      expect(result.grid.rows).toBe(4);
      expect(result.grid.bounds.north).toBe(90);
      expect(result.grid.bounds.south).toBe(89.7);
      expect(result.grid.mmi).toHaveLength(20);
    });
  });

  describe('antimeridian', () => {
    const nearDateline = makeEvent({ lat: -17.8, lon: 179.9, depth_km: 500, mag: 6 });
    const wideGrid = { radiusDeg: 0.3, stepDeg: 0.1, minMmi: 1 };

    it('should wrap columns past 180 into the western hemisphere', () => {
      const result = computeOverlayFromEvent(nearDateline, wideGrid, COMPUTED_AT);

      expect(result.grid.cols).toBe(7);
      expect(result.grid.bounds.west).toBe(179.6);
      expect(result.grid.bounds.east).toBe(-179.8);
    });

    it('should keep every polygon vertex within valid longitudes', () => {
      const result = computeOverlayFromEvent(nearDateline, wideGrid, COMPUTED_AT);
      const vertexLons = result.features.features.flatMap(feature =>
        feature.geometry.coordinates[0].map(([lon]) => lon)
      );

      expect(result.features.features).toHaveLength(49);
      expect(Math.max(...vertexLons)).toBeLessThanOrEqual(180);
      expect(Math.min(...vertexLons)).toBeGreaterThanOrEqual(-180);
    });

    it('should cut the cell on the antimeridian at -180', () => {
      const result = computeOverlayFromEvent(nearDateline, wideGrid, COMPUTED_AT);
      const edgeCells = result.features.features.filter(
        feature => feature.geometry.coordinates[0][0][0] === -180
      );

      expect(edgeCells).toHaveLength(7);
      expect(edgeCells[0].geometry.coordinates[0][1][0]).toBe(-179.95);
    });

    it('should leave in-range longitudes untouched', () => {
      expect(wrapLongitude(100.3)).toBe(100.3);
      expect(wrapLongitude(180)).toBe(-180);
      expect(wrapLongitude(-180.2)).toBe(179.8);
    });
  });

  describe('bands and features', () => {
    it('should count every cell in exactly one band', () => {
      const result = computeOverlayFromEvent(makeEvent(), TINY_GRID, COMPUTED_AT);
      const total = Object.values(result.bands).reduce((a, b) => a + b, 0);

      expect(total).toBe(25);
    });

    it('should only emit features at or above the minimum intensity', () => {
      const result = computeOverlayFromEvent(
        makeEvent({ lat: 13.75, lon: 100.5, depth_km: 0, mag: 5 }),
        { ...TINY_GRID, minMmi: 9 },
        COMPUTED_AT
      );

      expect(result.features.type).toBe('FeatureCollection');
      expect(result.features.features).toHaveLength(1);
      expect(result.features.features[0]).toEqual({
        type: 'Feature',
        geometry: {
          type: 'Polygon',
          coordinates: [[
            [100.45, 13.7],
            [100.55, 13.7],
            [100.55, 13.8],
            [100.45, 13.8],
            [100.45, 13.7]
          ]]
        },
        properties: { mmi: 9.5, level: 'X' }
      });
    });

    it('should include the full legend', () => {
      const result = computeOverlayFromEvent(makeEvent(), TINY_GRID, COMPUTED_AT);

      expect(result.legend).toHaveLength(10);
      expect(result.legend[0]).toEqual({ level: 'I', value: 1, label: 'Not felt', color: '#FFFFFF' });
      expect(result.legend[9].level).toBe('X');
    });
  });

  describe('meta', () => {
    it('should carry the event fields with max intensity and computation time', () => {
      const event = makeEvent();
      const result = computeOverlayFromEvent(event, TINY_GRID, COMPUTED_AT);

      expect(result.meta).toMatchObject(event);
      expect(result.meta.computed_at).toBe('2025-01-07T00:00:00.000Z');
      expect(typeof result.meta.max_mmi).toBe('number');
    });
  });

  describe('validation', () => {
    it('should reject out-of-range latitude', () => {
      expect(() => computeOverlayFromEvent(makeEvent({ lat: 95 }), TINY_GRID))
        .toThrow(ComputationError);
    });

    it('should reject out-of-range longitude', () => {
      expect(() => computeOverlayFromEvent(makeEvent({ lon: -181 }), TINY_GRID))
        .toThrow('longitude out of range: -181');
    });

    it('should reject negative depth', () => {
      expect(() => computeOverlayFromEvent(makeEvent({ depth_km: -1 }), TINY_GRID))
        .toThrow('depth must be a non-negative number of km: -1');
    });

    it('should reject magnitude above 10', () => {
      expect(() => computeOverlayFromEvent(makeEvent({ mag: 11 }), TINY_GRID))
        .toThrow('magnitude out of range: 11');
    });

    it('should reject NaN coordinates', () => {
      expect(() => computeOverlayFromEvent(makeEvent({ lat: NaN }), TINY_GRID))
        .toThrow(ComputationError);
    });

    it('should reject an oversized grid', () => {
      expect(() => computeOverlayFromEvent(makeEvent(), { radiusDeg: 30, stepDeg: 0.1, minMmi: 2 }))
        .toThrow('overlay grid too large: 601 cells per side (max 401)');
    });

    it('should reject a non-positive step', () => {
      expect(() => computeOverlayFromEvent(makeEvent(), { ...DEFAULT_OVERLAY_OPTIONS, stepDeg: 0 }))
        .toThrow('overlay grid radius and step must be positive');
    });
  });
});
