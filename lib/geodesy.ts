/**
 * Great-circle helpers
 *
 * Bearings and distances between geodetic points on a spherical Earth,
 * computed by Turf.
 */

import { bearing } from '@turf/bearing';
import { distance } from '@turf/distance';
import { InvalidInputError } from './errors.js';
import type { GeodeticPoint, GreatCircleSolution } from './types.js';

export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;

/**
 * Wrap a longitude into (-180, 180]
 */
export function normalizeLongitude(deg: number): number {
  const wrapped = ((deg % 360) + 360) % 360;
  return wrapped > 180 ? wrapped - 360 : wrapped;
}

/**
 * Wrap an azimuth into [0, 360)
 */
export function normalizeAzimuth(deg: number): number {
  return ((deg % 360) + 360) % 360;
}

/**
 * Throw unless the point is a finite latitude/longitude pair in range
 */
export function assertGeodeticPoint(point: GeodeticPoint): void {
  const { latitude, longitude, altitude } = point;

  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidInputError(`Invalid latitude: ${latitude} (must be -90..90)`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidInputError(`Invalid longitude: ${longitude} (must be -180..180)`);
  }
  if (altitude !== undefined && !Number.isFinite(altitude)) {
    throw new InvalidInputError(`Invalid altitude: ${altitude}`);
  }
}

/**
 * Inverse problem: azimuths and distance from one point to another.
 *
 * Azimuths are in degrees clockwise from North, distance in meters.
 */
export function inverse(from: GeodeticPoint, to: GeodeticPoint): GreatCircleSolution {
  const start = [from.longitude, from.latitude];
  const end = [to.longitude, to.latitude];

  return {
    forwardAzimuth: normalizeAzimuth(bearing(start, end)),
    backAzimuth: normalizeAzimuth(bearing(end, start)),
    distance: distance(start, end, { units: 'meters' }),
  };
}
