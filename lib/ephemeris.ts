/**
 * Solar ephemeris engine backed by astronomy-engine.
 *
 * The Sun is far enough away that the ellipsoid normal through its
 * geodetic sub-point is parallel to the geocentric Sun direction, so the
 * geodetic latitude is the apparent declination and the longitude is the
 * apparent right ascension less Greenwich apparent sidereal time.
 */

import {
  Body,
  EquatorFromVector,
  GeoVector,
  KM_PER_AU,
  MakeTime,
  RotateVector,
  Rotation_EQJ_EQD,
  SiderealTime,
} from 'astronomy-engine';
import { defaultEllipsoid, type Ellipsoid } from './ellipsoids.js';
import { DEG2RAD, normalizeLongitude } from './geodesy.js';
import type { SubSolarSample, SunEphemeris } from './types.js';

export const SECONDS_PER_DAY = 86400;

/** 2000-01-01T12:00:00Z as Unix seconds */
export const J2000_UNIX_SECONDS = 946728000;

export interface AstronomyEphemerisOptions {
  /** Correct the Sun's direction for aberration (default true) */
  aberration?: boolean;
  /** Earth model used for the height above the surface (default WGS-84) */
  earth?: Ellipsoid;
}

export class AstronomyEphemeris implements SunEphemeris {
  readonly aberration: boolean;
  readonly earth: Ellipsoid;

  constructor(options: AstronomyEphemerisOptions = {}) {
    this.aberration = options.aberration ?? true;
    this.earth = options.earth ?? defaultEllipsoid();
  }

  universal(epochSeconds: number): SubSolarSample {
    const time = MakeTime(new Date(epochSeconds * 1000));

    // J2000 mean equator -> true equator and equinox of date
    const j2000 = GeoVector(Body.Sun, time, this.aberration);
    const ofDate = RotateVector(Rotation_EQJ_EQD(time), j2000);
    const equ = EquatorFromVector(ofDate);

    const psi = equ.dec * DEG2RAD;
    const lambda = normalizeLongitude((equ.ra - SiderealTime(time)) * 15) * DEG2RAD;
    const height = equ.dist * KM_PER_AU - this.earth.geocentricRadius(psi) / 1000;

    return {
      psi,
      lambda,
      height,
      epoch: time.ut * SECONDS_PER_DAY + J2000_UNIX_SECONDS,
    };
  }
}

let sharedEphemeris: AstronomyEphemeris | null = null;

/**
 * Process-wide engine with default options
 */
export function defaultEphemeris(): AstronomyEphemeris {
  if (!sharedEphemeris) {
    sharedEphemeris = new AstronomyEphemeris();
  }
  return sharedEphemeris;
}
