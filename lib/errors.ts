/**
 * Error classes thrown by the sub-solar calculator.
 */

export type SolarErrorCode = 'INVALID_STATE' | 'INVALID_INPUT';

export class SolarPositionError extends Error {
  readonly code: SolarErrorCode;

  constructor(code: SolarErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The calculator is missing something an operation needs (e.g. a station)
 */
export class InvalidStateError extends SolarPositionError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

/**
 * A caller-supplied value could not be used
 */
export class InvalidInputError extends SolarPositionError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}
