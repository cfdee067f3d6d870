/**
 * subsolar
 *
 * Geodetic position of the Sun over the surface of the Earth.
 *
 * @example
 * ```typescript
 * import { SolarPositionCalculator, computeFix } from 'subsolar';
 *
 * const calc = new SolarPositionCalculator();
 * const fix = calc.point(); // now
 * console.log(`Latitude: ${fix.latitude}, Longitude: ${fix.longitude}`);
 *
 * // Stateless
 * const solstice = computeFix(new Date('2008-06-20T23:59:00Z'));
 * ```
 */

export {
  SolarPositionCalculator,
  computeFix,
  computeTrack,
  groundSpeed,
  toDate,
  MAX_TRACK_POINTS,
  SUN_HEADING,
  SUN_SOURCE,
} from './solar.js';
export type { EllipsoidResult, SolarPositionCalculatorOptions } from './solar.js';

export {
  Ellipsoid,
  DEFAULT_ELLIPSOID,
  defaultEllipsoid,
  getAllModels,
  getEllipsoid,
  getEllipsoidModel,
  getEllipsoidNames,
  isEllipsoidName,
} from './ellipsoids.js';

export {
  AstronomyEphemeris,
  defaultEphemeris,
  J2000_UNIX_SECONDS,
  SECONDS_PER_DAY,
} from './ephemeris.js';
export type { AstronomyEphemerisOptions } from './ephemeris.js';

export {
  inverse,
  normalizeAzimuth,
  normalizeLongitude,
  assertGeodeticPoint,
} from './geodesy.js';

export {
  SolarPositionError,
  InvalidInputError,
  InvalidStateError,
} from './errors.js';
export type { SolarErrorCode } from './errors.js';

// Re-export types
export type {
  FixQuality,
  GeodeticFix,
  GeodeticPoint,
  SubSolarSample,
  SunEphemeris,
  EllipsoidModel,
  GreatCircleSolution,
  InstantInput,
  TrackRange,
} from './types.js';
