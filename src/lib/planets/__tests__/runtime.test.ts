import { describe, expect, it } from 'vitest';
import { FakeOracle } from '@/lib/__tests__/fakeOracle';
import { signFromLongitude } from '@/lib/astro';
import { AstronomyEngineOracle } from '@/lib/ephemeris/astronomyEngine';
import { EphemerisRangeError, MalformedInputError, NodeFrameError } from '@/lib/errors';
import { ALL_BODIES, PLANETS } from '@/lib/planets/bodies';
import {
  ayanamsa,
  resolvePositions,
  siderealLongitude,
  toBodyPosition,
  tropicalLongitude,
} from '@/lib/planets/runtime';
import { normalizeMoment } from '@/lib/time';

const moment = normalizeMoment('1962-07-02', '23:33', { kind: 'fixed', offsetHours: -5 });

describe('tropicalLongitude', () => {
  it('normalizes whatever the oracle returns', () => {
    const oracle = new FakeOracle({ longitudes: { Sun: -10, Moon: 725 } });
    expect(tropicalLongitude(oracle, moment, 'Sun')).toBe(350);
    expect(tropicalLongitude(oracle, moment, 'Moon')).toBe(5);
  });

  it('reflects the north node for the south node', () => {
    const oracle = new FakeOracle({ nodes: { true: 300, mean: 302 } });
    expect(tropicalLongitude(oracle, moment, 'NorthNode')).toBe(300);
    expect(tropicalLongitude(oracle, moment, 'SouthNode')).toBe(120);
    expect(tropicalLongitude(oracle, moment, 'SouthNode', { nodeType: 'mean' })).toBe(122);
  });

  it('forwards the center to the oracle', () => {
    const oracle = new FakeOracle();
    tropicalLongitude(oracle, moment, 'Mars', { center: 'helio' });
    expect(oracle.calls[0]).toEqual({ jd: moment.jd, target: 'Mars', flags: { center: 'helio' } });
  });

  it('rejects nodes in the heliocentric frame', () => {
    expect(() => tropicalLongitude(new FakeOracle(), moment, 'NorthNode', { center: 'helio' }))
      .toThrow(NodeFrameError);
  });

  it('surfaces oracle failures with the body and jd', () => {
    const oracle = new FakeOracle({ failFor: ['Mars'] });
    try {
      tropicalLongitude(oracle, moment, 'Mars');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EphemerisRangeError);
      if (err instanceof EphemerisRangeError) {
        expect(err.body).toBe('Mars');
        expect(err.jd).toBe(moment.jd);
      }
    }
  });

  it('treats a non-finite answer as a failure', () => {
    const oracle = new FakeOracle({ longitudes: { Venus: Number.NaN } });
    expect(() => tropicalLongitude(oracle, moment, 'Venus')).toThrow(EphemerisRangeError);
  });
});

describe('ayanamsa and sidereal longitudes', () => {
  it('adds the extra offset to the frame value', () => {
    const a = ayanamsa(new FakeOracle({ ayanamsa: 24 }), moment, 'fagan_bradley', 0.25);
    expect(a).toEqual({ frame: 'fagan_bradley', base: 24, extraOffset: 0.25, value: 24.25 });
  });

  it('rejects a non-finite extra offset', () => {
    const oracle = new FakeOracle({ ayanamsa: 24 });
    expect(() => ayanamsa(oracle, moment, 'lahiri', Number.NaN)).toThrow(MalformedInputError);
    expect(() => ayanamsa(oracle, moment, 'lahiri', Number.POSITIVE_INFINITY)).toThrow('Invalid ayanamsa offset: Infinity.');
  });

  it('subtracts the ayanamsa modulo 360', () => {
    const a = ayanamsa(new FakeOracle({ ayanamsa: 24 }), moment, 'lahiri');
    expect(siderealLongitude(10, a)).toBe(346);
    expect(siderealLongitude(100, a)).toBe(76);
  });

  it('formats both zodiacs on a position', () => {
    const a = ayanamsa(new FakeOracle({ ayanamsa: 24 }), moment, 'fagan_bradley');
    const p = toBodyPosition('NorthNode', 100.5, a);
    expect(p.label).toBe('North Node');
    expect(p.glyph).toBe('☊');
    expect(p.tropicalSign).toBe(`10°30'00" Cancer`);
    expect(p.siderealSign).toBe(`16°30'00" Gemini`);
  });
});

describe('resolvePositions', () => {
  const oracle = new FakeOracle({
    longitudes: { Sun: 100, Moon: 200, Mars: 359.5 },
    nodes: { true: 45, mean: 46 },
    ayanamsa: 24,
  });
  const ayan = ayanamsa(oracle, moment, 'fagan_bradley');

  it('lists planets then nodes when geocentric', () => {
    const rows = resolvePositions(oracle, moment, ayan);
    expect(rows.map((r) => r.body)).toEqual([...ALL_BODIES]);
    expect(rows[10].tropical).toBe(45);
    expect(rows[11].tropical).toBe(225);
  });

  it('keeps every longitude in range and applies one ayanamsa', () => {
    for (const r of resolvePositions(oracle, moment, ayan)) {
      expect(r.tropical).toBeGreaterThanOrEqual(0);
      expect(r.tropical).toBeLessThan(360);
      expect(r.sidereal).toBe(siderealLongitude(r.tropical, ayan));
    }
  });

  it('drops nodes when heliocentric or when asked to', () => {
    expect(resolvePositions(oracle, moment, ayan, { center: 'helio' }).map((r) => r.body)).toEqual([...PLANETS]);
    expect(resolvePositions(oracle, moment, ayan, { includeNodes: false })).toHaveLength(10);
  });
});

describe('with the astronomy-engine backend', () => {
  const oracle = new AstronomyEngineOracle();

  it('puts the Sun in Cancer in early July 1962', () => {
    const sun = tropicalLongitude(oracle, moment, 'Sun');
    expect(signFromLongitude(sun)).toBe('Cancer');
  });

  it('keeps all bodies in [0, 360)', () => {
    const ayan = ayanamsa(oracle, moment, 'fagan_bradley');
    const rows = resolvePositions(oracle, moment, ayan);
    expect(rows).toHaveLength(12);
    for (const r of rows) {
      expect(r.tropical).toBeGreaterThanOrEqual(0);
      expect(r.tropical).toBeLessThan(360);
    }
    expect(rows[11].tropical).toBeCloseTo((rows[10].tropical + 180) % 360, 9);
  });

  it('fails past the backend time window', () => {
    const far = normalizeMoment('6000-01-01', '00:00', { kind: 'fixed', offsetHours: 0 });
    expect(() => tropicalLongitude(oracle, far, 'Sun')).toThrow(EphemerisRangeError);
  });
});
