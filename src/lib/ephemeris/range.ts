// src/lib/ephemeris/range.ts
// Positions sampled at a fixed step over [start, end], end included.
import type { DateTime } from 'luxon';
import { EphemerisBatchError, MalformedInputError } from '@/lib/errors';
import type { Center, EphemerisOracle, NodeType, SiderealFrame } from '@/lib/ephemeris/oracle';
import type { Logger } from '@/lib/log';
import type { Body } from '@/lib/planets/bodies';
import { ayanamsa, resolvePositions } from '@/lib/planets/runtime';
import { civilToDateTime, momentFromDateTime, parseCivil, type TimezoneSpec } from '@/lib/time';

export type RangeStep = 'hour' | '6h' | 'day';

export const STEP_HOURS: Record<RangeStep, number> = { hour: 1, '6h': 6, day: 24 };

// bounds one export; callers split longer spans
export const MAX_RANGE_ROWS = 200_000;

export type CivilInstant = { date: string; time: string };

export type RangeRequest = {
  start: CivilInstant;
  end: CivilInstant;
  step: RangeStep;
  timezone: TimezoneSpec;
  zodiac?: 'tropical' | 'sidereal';
  center?: Center;
  nodeType?: NodeType;
  includeNodes?: boolean;
  siderealFrame?: SiderealFrame;
  ayanamsaOffset?: number;
};

export type RangeRow = {
  timestamp: string;       // UT, e.g. 1962-07-03T04:33Z
  jd: number;
  longitudes: number[];    // same order as EphemerisRange.bodies
};

export type EphemerisRange = {
  zodiac: 'tropical' | 'sidereal';
  step: RangeStep;
  bodies: Body[];
  rows: RangeRow[];
};

export function isRangeStep(x: string): x is RangeStep {
  return x === 'hour' || x === '6h' || x === 'day';
}

function instant(at: CivilInstant, tz: TimezoneSpec): { dt: DateTime; label: string } {
  return civilToDateTime(parseCivil(at.date, at.time), tz);
}

export function ephemerisRange(request: RangeRequest, oracle: EphemerisOracle, logger?: Logger): EphemerisRange {
  const start = instant(request.start, request.timezone);
  const end = instant(request.end, request.timezone);
  const stepMs = STEP_HOURS[request.step] * 3_600_000;
  const span = end.dt.toMillis() - start.dt.toMillis();
  if (span < 0) {
    throw new MalformedInputError('Range end precedes its start.', { start: request.start, end: request.end });
  }
  const count = Math.floor(span / stepMs) + 1;
  if (count > MAX_RANGE_ROWS) {
    throw new MalformedInputError(`Range has ${count} steps; the limit is ${MAX_RANGE_ROWS}.`, { count });
  }

  const zodiac = request.zodiac ?? 'tropical';
  const frame = request.siderealFrame ?? 'fagan_bradley';
  const options = {
    center: request.center ?? 'geo',
    nodeType: request.nodeType ?? 'true',
    includeNodes: request.includeNodes ?? true,
  };

  let bodies: Body[] = [];
  const rows: RangeRow[] = [];
  for (let i = 0; i < count; i++) {
    try {
      // offsets from the start, not accumulated, so rows never drift
      const moment = momentFromDateTime(start.dt.plus({ milliseconds: i * stepMs }), start.label);
      const ayan = ayanamsa(oracle, moment, frame, request.ayanamsaOffset ?? 0);
      const positions = resolvePositions(oracle, moment, ayan, options);
      if (i === 0) bodies = positions.map((p) => p.body);
      rows.push({
        timestamp: moment.utc.iso,
        jd: moment.jd,
        longitudes: positions.map((p) => (zodiac === 'sidereal' ? p.sidereal : p.tropical)),
      });
    } catch (err) {
      logger?.error('range.step_failed', { stepIndex: i, error: err instanceof Error ? err.message : String(err) });
      throw new EphemerisBatchError(i, err);
    }
  }

  logger?.info('range.done', { rows: rows.length, step: request.step, zodiac });
  return { zodiac, step: request.step, bodies, rows };
}
