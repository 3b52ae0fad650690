import { describe, expect, it } from 'vitest';
import {
  ChartEngineError,
  EphemerisBatchError,
  EphemerisRangeError,
  HouseSystemDegenerateError,
  InvalidCoordinateError,
  MalformedInputError,
  NodeFrameError,
  UnknownTimezoneError,
  toErrorPayload,
} from '@/lib/errors';

describe('error taxonomy', () => {
  it('gives every error a code and a name', () => {
    const cases: Array<[ChartEngineError, string, string]> = [
      [new MalformedInputError('bad date'), 'MALFORMED_INPUT', 'MalformedInputError'],
      [new UnknownTimezoneError('Nowhere/Void'), 'UNKNOWN_TIMEZONE', 'UnknownTimezoneError'],
      [new EphemerisRangeError('Pluto', 0), 'EPHEMERIS_RANGE', 'EphemerisRangeError'],
      [new InvalidCoordinateError(91, 0), 'INVALID_COORDINATE', 'InvalidCoordinateError'],
      [new HouseSystemDegenerateError('placidus', 70), 'HOUSE_SYSTEM_DEGENERATE', 'HouseSystemDegenerateError'],
      [new NodeFrameError('NorthNode'), 'NODE_FRAME', 'NodeFrameError'],
      [new EphemerisBatchError(3, new Error('x')), 'EPHEMERIS_BATCH', 'EphemerisBatchError'],
    ];
    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(ChartEngineError);
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it('names the body and day in range errors', () => {
    const err = new EphemerisRangeError('Pluto', 2451545, 'outside table');
    expect(err.message).toBe('Ephemeris cannot compute Pluto at JD 2451545.00000: outside table.');
    expect(err.details).toEqual({ body: 'Pluto', jd: 2451545 });
  });

  it('keeps the triggering error on batch failures', () => {
    const cause = new UnknownTimezoneError('Nowhere/Void');
    const err = new EphemerisBatchError(4, cause);
    expect(err.cause).toBe(cause);
    expect(err.stepIndex).toBe(4);
    expect(err.message).toBe('Ephemeris range failed at step 4: Unknown timezone "Nowhere/Void".');
  });
});

describe('toErrorPayload', () => {
  it('exposes engine errors', () => {
    expect(toErrorPayload(new InvalidCoordinateError(95, 10))).toEqual({
      code: 'INVALID_COORDINATE',
      message: 'Coordinates out of range: latitude 95, longitude 10.',
      details: { latitude: 95, longitude: 10 },
    });
  });

  it('hides anything else', () => {
    expect(toErrorPayload(new TypeError('boom'))).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal error.' });
    expect(toErrorPayload('boom')).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal error.' });
  });
});
