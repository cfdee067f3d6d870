/**
 * Sub-Solar Point Type Definitions
 *
 * Types shared by the calculator, the ephemeris engine and the REST API.
 */

/**
 * Fix quality reported with a geodetic fix
 */
export type FixQuality = 'none' | '2D' | '3D';

/**
 * Geodetic fix of the sub-solar point
 *
 * Shaped like a GPS fix so it can be fed to the same consumers.
 */
export interface GeodeticFix {
  /** Float seconds since the Unix epoch (UTC), as seen by the ephemeris engine */
  readonly time: number;
  /** Geodetic latitude (signed decimal degrees) */
  readonly latitude: number;
  /** Geodetic longitude (signed decimal degrees, -180 < lon <= 180) */
  readonly longitude: number;
  /** Height above the reference ellipsoid (m) */
  readonly altitude: number;
  /** Ground-track speed of the sub-solar point (m/s) */
  readonly speed: number;
  /** Degrees clockwise from North */
  readonly heading: number;
  readonly fixQuality: FixQuality;
  /** Label identifying the origin of the fix */
  readonly source: string;
}

/**
 * A point on (or above) the reference ellipsoid
 */
export interface GeodeticPoint {
  /** Geodetic latitude (deg, -90..90) */
  latitude: number;
  /** Geodetic longitude (deg, -180..180) */
  longitude: number;
  /** Height above the ellipsoid (m) */
  altitude?: number;
}

/**
 * Geodetic sub-point of the Sun as returned by an ephemeris engine
 */
export interface SubSolarSample {
  /** Geodetic latitude (radians) */
  psi: number;
  /** Longitude (radians) */
  lambda: number;
  /** Height above the ellipsoid (km) */
  height: number;
  /** The engine's canonical instant, float seconds since the Unix epoch */
  epoch: number;
}

/**
 * Solar ephemeris engine
 *
 * Any implementation must be a pure function of the epoch.
 */
export interface SunEphemeris {
  /**
   * Position of the Sun at a Unix epoch.
   *
   * @param epochSeconds - Float seconds since the Unix epoch (UTC)
   */
  universal(epochSeconds: number): SubSolarSample;
}

/**
 * Reference ellipsoid metadata from JSON files
 */
export interface EllipsoidModel {
  /** Model name (e.g., "WGS-84") */
  name: string;
  /** Description of the model */
  description: string;
  /** Source reference */
  source: string;
  /** Semi-major axis (m) */
  a: number;
  /** Inverse flattening (1/f) */
  invFlattening: number;
}

/**
 * Result of an inverse great-circle computation
 */
export interface GreatCircleSolution {
  /** Bearing at the start point (deg, 0..360) */
  forwardAzimuth: number;
  /** Bearing at the end point, pointing back toward the start (deg, 0..360) */
  backAzimuth: number;
  /** Distance along the great circle (m) */
  distance: number;
}

/**
 * Anything the calculator accepts as an instant: a Date,
 * an ISO-8601 string or milliseconds since the Unix epoch
 */
export type InstantInput = Date | string | number;

/**
 * Time range for a sub-solar ground track
 */
export interface TrackRange {
  start: Date;
  end: Date;
  /** Seconds between consecutive fixes */
  stepSeconds: number;
}
