import { describe, it, expect } from 'vitest';
import {
  assertGeodeticPoint,
  inverse,
  normalizeAzimuth,
  normalizeLongitude,
} from '../lib/geodesy.js';
import { InvalidInputError } from '../lib/errors.js';

describe('Great-circle geodesy', () => {
  describe('normalizeLongitude', () => {
    it('should wrap into (-180, 180]', () => {
      expect(normalizeLongitude(0)).toBe(0);
      expect(normalizeLongitude(190)).toBe(-170);
      expect(normalizeLongitude(-190)).toBe(170);
      expect(normalizeLongitude(180)).toBe(180);
      expect(normalizeLongitude(-180)).toBe(180);
      expect(normalizeLongitude(540)).toBe(180);
    });
  });

  describe('normalizeAzimuth', () => {
    it('should wrap into [0, 360)', () => {
      expect(normalizeAzimuth(-90)).toBe(270);
      expect(normalizeAzimuth(360)).toBe(0);
      expect(normalizeAzimuth(720.5)).toBe(0.5);
      expect(normalizeAzimuth(-1e-15)).toBe(0);
    });
  });

  describe('inverse', () => {
    const origin = { latitude: 0, longitude: 0 };

    it('should head north along a meridian', () => {
      const solution = inverse(origin, { latitude: 1, longitude: 0 });

      expect(solution.forwardAzimuth).toBeCloseTo(0, 10);
      expect(solution.backAzimuth).toBeCloseTo(180, 10);
      expect(solution.distance).toBeCloseTo(111195.08, 1);
    });

    it('should head east and west along the equator', () => {
      const east = inverse(origin, { latitude: 0, longitude: 10 });
      const west = inverse(origin, { latitude: 0, longitude: -10 });

      expect(east.forwardAzimuth).toBeCloseTo(90, 10);
      expect(east.backAzimuth).toBeCloseTo(270, 10);
      expect(west.forwardAzimuth).toBeCloseTo(270, 10);
      expect(west.backAzimuth).toBeCloseTo(90, 10);
    });

    it('should be symmetric in distance', () => {
      const a = { latitude: 38.9, longitude: -77.0 };
      const b = { latitude: 51.5, longitude: -0.1 };

      expect(inverse(a, b).distance).toBeCloseTo(inverse(b, a).distance, 6);
    });
  });

  describe('assertGeodeticPoint', () => {
    it('should accept the corners of the range', () => {
      expect(() => assertGeodeticPoint({ latitude: -90, longitude: -180 })).not.toThrow();
      expect(() => assertGeodeticPoint({ latitude: 90, longitude: 180, altitude: 10 })).not.toThrow();
    });

    it('should reject out-of-range values', () => {
      expect(() => assertGeodeticPoint({ latitude: 91, longitude: 0 })).toThrow(
        'Invalid latitude: 91 (must be -90..90)'
      );
      expect(() => assertGeodeticPoint({ latitude: 0, longitude: -181 })).toThrow(
        'Invalid longitude: -181 (must be -180..180)'
      );
      expect(() => assertGeodeticPoint({ latitude: NaN, longitude: 0 })).toThrow(
        InvalidInputError
      );
      expect(() => assertGeodeticPoint({ latitude: 0, longitude: 0, altitude: Infinity })).toThrow(
        'Invalid altitude: Infinity'
      );
    });
  });
});
