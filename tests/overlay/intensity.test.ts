import { describe, it, expect } from 'vitest';
import { haversineKm, mmiLevel, predictMmi, emptyBands } from '../../src/overlay/intensity';

describe('intensity', () => {
  describe('haversineKm', () => {
    it('should be zero for the same point', () => {
      expect(haversineKm(13.75, 100.5, 13.75, 100.5)).toBe(0);
    });

    it('should measure one degree of latitude as about 111 km', () => {
      expect(haversineKm(0, 100, 1, 100)).toBeCloseTo(111.19, 1);
    });

    it('should be symmetric', () => {
      expect(haversineKm(13.75, 100.5, 18.8, 98.98)).toBeCloseTo(haversineKm(18.8, 98.98, 13.75, 100.5), 9);
    });
  });

  describe('predictMmi', () => {
    it('should floor hypocentral distance at 1 km', () => {
      expect(predictMmi(5, 0, 0)).toBeCloseTo(9.4985, 6);
    });

    it('should apply the attenuation terms', () => {
      // R = 100: 2.0 + 1.5 * 6 - 2.5 * 2 - 0.15
      expect(predictMmi(6, 0, 100)).toBeCloseTo(5.85, 6);
    });

    it('should clamp to the I..X scale', () => {
      expect(predictMmi(9.5, 0, 0)).toBe(10);
      expect(predictMmi(0, 500, 10)).toBe(1);
    });
  });

  describe('mmiLevel', () => {
    it('should round to the nearest level', () => {
      expect(mmiLevel(4.4)).toBe('IV');
      expect(mmiLevel(4.5)).toBe('V');
      expect(mmiLevel(7.0)).toBe('VII');
    });

    it('should stay within I..X', () => {
      expect(mmiLevel(0.2)).toBe('I');
      expect(mmiLevel(12)).toBe('X');
    });
  });

  it('should start every band at zero', () => {
    expect(Object.values(emptyBands())).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
