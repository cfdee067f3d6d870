/**
 * Sub-solar point calculator
 *
 * `computeFix` is the pure core; `SolarPositionCalculator` keeps an instant,
 * an ellipsoid and an optional observer station between calls.
 */

import { defaultEllipsoid, getEllipsoid, Ellipsoid } from './ellipsoids.js';
import { defaultEphemeris, SECONDS_PER_DAY } from './ephemeris.js';
import { InvalidInputError, InvalidStateError } from './errors.js';
import { assertGeodeticPoint, inverse, RAD2DEG } from './geodesy.js';
import type {
  GeodeticFix,
  GeodeticPoint,
  GreatCircleSolution,
  InstantInput,
  SunEphemeris,
  TrackRange,
} from './types.js';

/** Placeholder heading: the sub-solar point drifts roughly westward */
export const SUN_HEADING = 270;

export const SUN_SOURCE = 'sun';

/** Limit on the number of fixes in one track */
export const MAX_TRACK_POINTS = 10000;

// Date and time with no zone designator
const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Convert an instant input to a Date.
 *
 * Strings without a zone designator are read as UTC.
 *
 * @throws InvalidInputError if the value is not a valid timestamp
 */
export function toDate(input: InstantInput): Date {
  let date: Date;
  if (input instanceof Date) {
    date = new Date(input.getTime());
  } else if (typeof input === 'string') {
    const zoneless = ZONELESS_DATE_TIME.exec(input.trim());
    date = new Date(zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : input);
  } else {
    date = new Date(input);
  }
  if (Number.isNaN(date.getTime())) {
    throw new InvalidInputError(`Invalid timestamp: ${String(input)}`);
  }
  return date;
}

/**
 * Ground-track speed of a point that circles the polar axis once a day (m/s).
 *
 * Uses the prime-vertical radius of curvature, so R·cos(lat) is the
 * distance from the polar axis to the ellipsoid surface.
 */
export function groundSpeed(psi: number, ellipsoid: Ellipsoid): number {
  return (2 * Math.PI * ellipsoid.nRad(psi) * Math.cos(psi)) / SECONDS_PER_DAY;
}

/**
 * Compute the geodetic fix of the sub-solar point at an instant.
 */
export function computeFix(
  instant: Date,
  ellipsoid: Ellipsoid = defaultEllipsoid(),
  ephemeris: SunEphemeris = defaultEphemeris()
): GeodeticFix {
  const epoch = instant.getTime() / 1000;
  const { psi, lambda, height, epoch: time } = ephemeris.universal(epoch);

  const fix: GeodeticFix = {
    time,
    latitude: psi * RAD2DEG,
    longitude: lambda * RAD2DEG,
    altitude: height * 1000,
    speed: groundSpeed(psi, ellipsoid),
    heading: SUN_HEADING,
    fixQuality: '3D',
    source: SUN_SOURCE,
  };
  return Object.freeze(fix);
}

/**
 * Fixes from range.start to range.end (inclusive) every range.stepSeconds.
 */
export function computeTrack(
  range: TrackRange,
  ellipsoid: Ellipsoid = defaultEllipsoid(),
  ephemeris: SunEphemeris = defaultEphemeris()
): GeodeticFix[] {
  const t0 = range.start.getTime();
  const tf = range.end.getTime();
  const stepMs = range.stepSeconds * 1000;

  if (!Number.isFinite(stepMs) || stepMs <= 0) {
    throw new InvalidInputError('Invalid step value (must be positive number)');
  }
  if (tf < t0) {
    throw new InvalidInputError('End of track must not precede its start');
  }

  const count = Math.floor((tf - t0) / stepMs) + 1;
  if (count > MAX_TRACK_POINTS) {
    throw new InvalidInputError(
      `Too many points (${count}). Maximum allowed is ${MAX_TRACK_POINTS}. Increase step size.`
    );
  }

  const fixes: GeodeticFix[] = [];
  for (let i = 0; i < count; i++) {
    fixes.push(computeFix(new Date(t0 + i * stepMs), ellipsoid, ephemeris));
  }
  return fixes;
}

export interface SolarPositionCalculatorOptions {
  /** Ellipsoid instance or registry name (default WGS-84) */
  ellipsoid?: Ellipsoid | string;
  ephemeris?: SunEphemeris;
  /** Initial instant (default: now) */
  instant?: InstantInput;
  station?: GeodeticPoint;
}

export type EllipsoidResult =
  | { ok: true; ellipsoid: Ellipsoid }
  | { ok: false; error: InvalidInputError };

function resolveEllipsoid(model: Ellipsoid | string): EllipsoidResult {
  if (model instanceof Ellipsoid) {
    return { ok: true, ellipsoid: model };
  }
  const ellipsoid = getEllipsoid(model);
  if (!ellipsoid) {
    return { ok: false, error: new InvalidInputError(`Unknown ellipsoid: ${model}`) };
  }
  return { ok: true, ellipsoid };
}

/**
 * Calculates the geodetic position of the Sun over the surface of the Earth.
 *
 * @example
 * ```typescript
 * const calc = new SolarPositionCalculator();
 * const fix = calc.setInstant('2008-06-20T23:59:00Z').point();
 * console.log(fix.latitude, fix.longitude);
 *
 * calc.setStation({ latitude: 38.9, longitude: -77.0 });
 * console.log('Bearing to the Sun:', calc.bearing());
 * ```
 *
 * Not safe for interleaved use: setInstant() followed by point() reads
 * back shared state. Call computeFix() directly when sharing.
 */
export class SolarPositionCalculator {
  readonly ephemeris: SunEphemeris;
  private _ellipsoid: Ellipsoid;
  private _instant: Date;
  private _station: GeodeticPoint | undefined;

  constructor(options: SolarPositionCalculatorOptions = {}) {
    const resolved = resolveEllipsoid(options.ellipsoid ?? defaultEllipsoid());
    if (!resolved.ok) {
      throw resolved.error;
    }
    this._ellipsoid = resolved.ellipsoid;
    this.ephemeris = options.ephemeris ?? defaultEphemeris();
    this._instant = options.instant === undefined ? new Date() : toDate(options.instant);
    if (options.station) {
      assertGeodeticPoint(options.station);
      this._station = { ...options.station };
    }
  }

  get ellipsoid(): Ellipsoid {
    return this._ellipsoid;
  }

  /**
   * Replace the ellipsoid. On failure the current ellipsoid is kept.
   */
  setEllipsoid(model: Ellipsoid | string): EllipsoidResult {
    const result = resolveEllipsoid(model);
    if (result.ok) {
      this._ellipsoid = result.ellipsoid;
    }
    return result;
  }

  get instant(): Date {
    return new Date(this._instant.getTime());
  }

  setInstant(t: InstantInput): this {
    this._instant = toDate(t);
    return this;
  }

  get station(): GeodeticPoint | undefined {
    return this._station ? { ...this._station } : undefined;
  }

  setStation(point: GeodeticPoint): this {
    assertGeodeticPoint(point);
    this._station = { ...point };
    return this;
  }

  clearStation(): this {
    this._station = undefined;
    return this;
  }

  /**
   * Sub-solar fix at the current instant
   */
  point(): GeodeticFix {
    return computeFix(this._instant, this._ellipsoid, this.ephemeris);
  }

  /**
   * setInstant(t) followed by point()
   */
  pointAt(t: InstantInput): GeodeticFix {
    return this.setInstant(t).point();
  }

  /**
   * Initial bearing from the station to the sub-solar point (deg, 0..360)
   *
   * @throws InvalidStateError if no station is set
   */
  bearing(): number {
    return this.solveFromStation().forwardAzimuth;
  }

  /**
   * Great-circle distance from the station to the sub-solar point (m)
   *
   * @throws InvalidStateError if no station is set
   */
  distance(): number {
    return this.solveFromStation().distance;
  }

  /**
   * Full inverse solution from the station to the sub-solar point
   */
  solveFromStation(): GreatCircleSolution {
    if (!this._station) {
      throw new InvalidStateError('Station is not defined. Call setStation() first.');
    }
    return inverse(this._station, this.point());
  }
}
