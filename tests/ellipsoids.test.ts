import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ELLIPSOID,
  Ellipsoid,
  defaultEllipsoid,
  getAllModels,
  getEllipsoid,
  getEllipsoidModel,
  getEllipsoidNames,
  isEllipsoidName,
} from '../lib/ellipsoids.js';

describe('Reference ellipsoids', () => {
  describe('registry', () => {
    it('should list every shipped model', () => {
      expect(getEllipsoidNames()).toEqual([
        'airy1830',
        'bessel1841',
        'clarke1866',
        'grs80',
        'international1924',
        'krassovsky1940',
        'wgs72',
        'wgs84',
      ]);
      expect(getAllModels()).toEqual({ ellipsoids: getEllipsoidNames() });
    });

    it('should default to WGS-84', () => {
      expect(DEFAULT_ELLIPSOID).toBe('wgs84');
      expect(defaultEllipsoid().id).toBe('wgs84');
    });

    it('should return the raw model record', () => {
      expect(getEllipsoidModel('wgs84')).toEqual({
        name: 'WGS-84',
        description: 'World Geodetic System 1984, the GPS reference ellipsoid',
        source: 'NIMA TR8350.2, 3rd edition',
        a: 6378137,
        invFlattening: 298.257223563,
      });
    });

    it('should cache instances', () => {
      expect(getEllipsoid('grs80')).toBe(getEllipsoid('grs80'));
    });

    it('should report unknown names', () => {
      expect(getEllipsoid('mars2000')).toBeUndefined();
      expect(getEllipsoidModel('mars2000')).toBeUndefined();
      expect(isEllipsoidName('mars2000')).toBe(false);
      expect(isEllipsoidName('wgs72')).toBe(true);
    });
  });

  describe('WGS-84 geometry', () => {
    const wgs84 = defaultEllipsoid();

    it('should derive the semi-minor axis and eccentricity', () => {
      expect(wgs84.a).toBe(6378137);
      expect(wgs84.b).toBeCloseTo(6356752.3142, 3);
      expect(wgs84.e2).toBeCloseTo(0.00669437999014, 12);
    });

    it('should compute the prime-vertical radius', () => {
      expect(wgs84.nRad(0)).toBe(6378137);
      expect(wgs84.nRad(Math.PI / 2)).toBeCloseTo(6399593.6258, 3);
    });

    it('should compute the meridional radius', () => {
      expect(wgs84.mRad(0)).toBeCloseTo(6335439.3273, 3);
    });

    it('should compute the geocentric radius', () => {
      expect(wgs84.geocentricRadius(0)).toBeCloseTo(6378137, 6);
      expect(wgs84.geocentricRadius(Math.PI / 2)).toBeCloseTo(6356752.3142, 3);
    });

    it('should compute circumferences', () => {
      expect(wgs84.equatorialCircumference).toBeCloseTo(40075016.6856, 3);
      expect(wgs84.polarCircumference).toBeCloseTo(40007862.9173, 3);
    });

    it('should serialize back to its model', () => {
      expect(wgs84.toModel()).toEqual(getEllipsoidModel('wgs84'));
    });
  });

  it('should accept a custom model', () => {
    const sphere = new Ellipsoid('sphere', {
      name: 'Sphere',
      description: 'Near-spherical test body',
      source: 'test',
      a: 1000,
      invFlattening: 1e12,
    });

    expect(sphere.nRad(0.7)).toBeCloseTo(1000, 6);
    expect(sphere.mRad(0.7)).toBeCloseTo(1000, 6);
  });
});
