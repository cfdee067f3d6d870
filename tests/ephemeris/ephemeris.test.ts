/**
 * Ephemeris Engine Test Suite
 */

import { describe, it, expect } from 'vitest';
import {
  AstronomyEphemeris,
  J2000_UNIX_SECONDS,
  defaultEphemeris,
} from '../../lib/ephemeris.js';
import { getEllipsoid } from '../../lib/ellipsoids.js';

const JUNE_SOLSTICE = Date.UTC(2008, 5, 20, 23, 59) / 1000;

describe('AstronomyEphemeris', () => {
  const engine = new AstronomyEphemeris();

  it('should anchor J2000 at noon UTC on 2000-01-01', () => {
    expect(J2000_UNIX_SECONDS).toBe(Date.UTC(2000, 0, 1, 12) / 1000);
  });

  it('should default to aberration on and WGS-84', () => {
    expect(engine.aberration).toBe(true);
    expect(engine.earth.id).toBe('wgs84');
  });

  it('should share one default engine', () => {
    expect(defaultEphemeris()).toBe(defaultEphemeris());
  });

  it('should echo the queried epoch', () => {
    expect(engine.universal(JUNE_SOLSTICE).epoch).toBeCloseTo(JUNE_SOLSTICE, 3);
    expect(engine.universal(J2000_UNIX_SECONDS).epoch).toBeCloseTo(J2000_UNIX_SECONDS, 6);
  });

  it('should return angles in radians', () => {
    const sample = engine.universal(JUNE_SOLSTICE);

    expect(sample.psi).toBeGreaterThan(0.40);
    expect(sample.psi).toBeLessThan(0.42);
    expect(sample.lambda).toBeGreaterThan(-Math.PI);
    expect(sample.lambda).toBeLessThanOrEqual(Math.PI);
  });

  it('should return the height in kilometers', () => {
    const sample = engine.universal(JUNE_SOLSTICE);

    expect(sample.height).toBeGreaterThan(1.47e8);
    expect(sample.height).toBeLessThan(1.53e8);
  });

  it('should place the Sun nearer at perihelion than at aphelion', () => {
    const perihelion = engine.universal(Date.UTC(2008, 0, 3) / 1000);
    const aphelion = engine.universal(Date.UTC(2008, 6, 4) / 1000);

    expect(perihelion.height).toBeLessThan(aphelion.height);
  });

  it('should shift the longitude slightly without aberration', () => {
    const geometric = new AstronomyEphemeris({ aberration: false });
    const delta = Math.abs(
      geometric.universal(JUNE_SOLSTICE).lambda - engine.universal(JUNE_SOLSTICE).lambda
    );

    // annual aberration is about 20 arcseconds
    expect(delta).toBeGreaterThan(0);
    expect(delta).toBeLessThan(1e-3);
  });

  it('should measure height from the chosen Earth model', () => {
    const wgs84 = getEllipsoid('wgs84');
    const clarke = getEllipsoid('clarke1866');
    if (!wgs84 || !clarke) {
      throw new Error('ellipsoid data missing');
    }

    const a = new AstronomyEphemeris({ earth: wgs84 }).universal(JUNE_SOLSTICE);
    const b = new AstronomyEphemeris({ earth: clarke }).universal(JUNE_SOLSTICE);

    expect(b.psi).toBe(a.psi);
    expect(b.height - a.height).toBeCloseTo(
      (wgs84.geocentricRadius(a.psi) - clarke.geocentricRadius(a.psi)) / 1000,
      4
    );
  });
});
