// src/lib/errors.ts
// Typed failures of the chart engine. Each one is raised where it is detected;
// nothing in the engine retries or substitutes a default value.

export type ChartErrorCode =
  | 'MALFORMED_INPUT'
  | 'UNKNOWN_TIMEZONE'
  | 'EPHEMERIS_RANGE'
  | 'INVALID_COORDINATE'
  | 'HOUSE_SYSTEM_DEGENERATE'
  | 'NODE_FRAME'
  | 'EPHEMERIS_BATCH';

export class ChartEngineError extends Error {
  readonly code: ChartErrorCode;
  readonly details?: unknown;

  constructor(code: ChartErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ChartEngineError';
    this.code = code;
    this.details = details;
  }
}

/** Civil date/time fields that do not parse or fall outside the calendar. */
export class MalformedInputError extends ChartEngineError {
  constructor(message: string, details?: unknown) {
    super('MALFORMED_INPUT', message, details);
    this.name = 'MalformedInputError';
  }
}

export class UnknownTimezoneError extends ChartEngineError {
  readonly zone: string;

  constructor(zone: string) {
    super('UNKNOWN_TIMEZONE', `Unknown timezone "${zone}".`, { zone });
    this.name = 'UnknownTimezoneError';
    this.zone = zone;
  }
}

/** The oracle could not produce a position for this body at this time. */
export class EphemerisRangeError extends ChartEngineError {
  readonly body: string;
  readonly jd: number;

  constructor(body: string, jd: number, reason?: string) {
    super(
      'EPHEMERIS_RANGE',
      `Ephemeris cannot compute ${body} at JD ${jd.toFixed(5)}${reason ? `: ${reason}` : ''}.`,
      { body, jd },
    );
    this.name = 'EphemerisRangeError';
    this.body = body;
    this.jd = jd;
  }
}

export class InvalidCoordinateError extends ChartEngineError {
  constructor(latitude: number, longitude: number) {
    super(
      'INVALID_COORDINATE',
      `Coordinates out of range: latitude ${latitude}, longitude ${longitude}.`,
      { latitude, longitude },
    );
    this.name = 'InvalidCoordinateError';
  }
}

/** House division is undefined or numerically unstable at this latitude. */
export class HouseSystemDegenerateError extends ChartEngineError {
  constructor(system: string, latitude: number) {
    super(
      'HOUSE_SYSTEM_DEGENERATE',
      `House system ${system} is degenerate at latitude ${latitude.toFixed(4)}°.`,
      { system, latitude },
    );
    this.name = 'HouseSystemDegenerateError';
  }
}

/** Lunar nodes exist only in the geocentric frame. */
export class NodeFrameError extends ChartEngineError {
  constructor(body: string) {
    super('NODE_FRAME', `${body} is defined only for geocentric positions.`, { body });
    this.name = 'NodeFrameError';
  }
}

/** A range export step failed; the whole batch stops at that step. */
export class EphemerisBatchError extends ChartEngineError {
  readonly stepIndex: number;

  constructor(stepIndex: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('EPHEMERIS_BATCH', `Ephemeris range failed at step ${stepIndex}: ${reason}`, {
      stepIndex,
      cause: cause instanceof ChartEngineError ? cause.code : undefined,
    });
    this.name = 'EphemerisBatchError';
    this.stepIndex = stepIndex;
    this.cause = cause;
  }
}

export type ErrorPayload = {
  code: ChartErrorCode | 'INTERNAL_ERROR';
  message: string;
  details?: unknown;
};

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ChartEngineError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return { code: 'INTERNAL_ERROR', message: 'Internal error.' };
}
