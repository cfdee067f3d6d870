/**
 * Query parameter parsing for the REST API
 *
 * Every parser throws InvalidInputError with a message fit for a 400 response.
 */

import { getEllipsoid, type Ellipsoid } from './ellipsoids.js';
import { InvalidInputError } from './errors.js';
import { assertGeodeticPoint } from './geodesy.js';
import { toDate } from './solar.js';
import type { GeodeticPoint, TrackRange } from './types.js';

export type StepUnit = 'sec' | 'min';

function optionalString(name: string, value: unknown): string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidInputError(`Invalid ${name} parameter (expected a single value)`);
  }
  return value;
}

function requiredNumber(name: string, value: unknown): number {
  const str = optionalString(name, value);
  if (str === undefined) {
    throw new InvalidInputError(`Missing ${name} query parameter`);
  }
  const num = Number(str);
  if (Number.isNaN(num)) {
    throw new InvalidInputError(`Invalid ${name} value`);
  }
  return num;
}

// Bare four-digit values are ISO-8601 years, not milliseconds
const EPOCH_MILLIS = /^-?(?!\d{4}$)\d+(\.\d+)?$/;

/**
 * Parse an instant given as ISO-8601 or as milliseconds since the Unix epoch.
 * A missing value means now.
 */
export function parseInstant(value: unknown, name = 'time'): Date {
  const str = optionalString(name, value);
  if (str === undefined) {
    return new Date();
  }
  return EPOCH_MILLIS.test(str) ? toDate(Number(str)) : toDate(str);
}

/**
 * Resolve an ellipsoid name, falling back to the given default
 */
export function parseEllipsoid(value: unknown, fallback: string): Ellipsoid {
  const name = optionalString('model', value) ?? fallback;
  const ellipsoid = getEllipsoid(name);
  if (!ellipsoid) {
    throw new InvalidInputError(`Unknown model: ${name}`);
  }
  return ellipsoid;
}

export function parseStation(lat: unknown, lon: unknown): GeodeticPoint {
  const station: GeodeticPoint = {
    latitude: requiredNumber('lat', lat),
    longitude: requiredNumber('lon', lon),
  };
  assertGeodeticPoint(station);
  return station;
}

export interface TrackQuery {
  t0?: unknown;
  tf?: unknown;
  step?: unknown;
  unit?: unknown;
}

/**
 * Parse ?t0=&tf=&step=&unit=sec|min into a track range
 */
export function parseTrackRange(query: TrackQuery): TrackRange & { unit: StepUnit } {
  if (optionalString('t0', query.t0) === undefined) {
    throw new InvalidInputError('Missing t0 query parameter');
  }
  if (optionalString('tf', query.tf) === undefined) {
    throw new InvalidInputError('Missing tf query parameter');
  }

  const unit = optionalString('unit', query.unit) ?? 'sec';
  if (unit !== 'sec' && unit !== 'min') {
    throw new InvalidInputError('Invalid unit (must be sec or min)');
  }

  const step = requiredNumber('step', query.step);
  if (step <= 0) {
    throw new InvalidInputError('Invalid step value (must be positive number)');
  }

  const start = parseInstant(query.t0, 't0');
  const end = parseInstant(query.tf, 'tf');
  if (end.getTime() <= start.getTime()) {
    throw new InvalidInputError('tf must be greater than t0');
  }

  return {
    start,
    end,
    stepSeconds: unit === 'min' ? step * 60 : step,
    unit,
  };
}
