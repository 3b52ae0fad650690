import { describe, expect, it } from 'vitest';
import { FakeOracle } from '@/lib/__tests__/fakeOracle';
import { deg, normalizeDeg, rad } from '@/lib/astro';
import { J2000 } from '@/lib/ephemeris/ayanamsa';
import { AstronomyEngineOracle } from '@/lib/ephemeris/astronomyEngine';
import {
  EphemerisRangeError,
  HouseSystemDegenerateError,
  InvalidCoordinateError,
  MalformedInputError,
} from '@/lib/errors';
import { houseOf, isBeyondPolarCircle, parseHouseSystem } from '@/lib/houses/common';
import { computePlacidusCusps } from '@/lib/houses/placidus';
import { computeHouses } from '@/lib/houses/runtime';
import type { EphemerisOracle } from '@/lib/ephemeris/oracle';
import { normalizeMoment } from '@/lib/time';

const moment = normalizeMoment('1962-07-02', '23:33', { kind: 'fixed', offsetHours: -5 });
const EQUAL = parseHouseSystem('E');
const MID = parseHouseSystem('EQUAL_ASC_MID');
const PLACIDUS = parseHouseSystem('P');

const fake = new FakeOracle({
  houses: {
    cusps: [100, 128, 158, 190, 222, 253, 280, 308, 338, 370, 42, 73],
    ascendant: 100,
    midheaven: 10,
  },
});

describe('parseHouseSystem', () => {
  it('collapses legacy codes onto three kinds', () => {
    expect(parseHouseSystem('E')).toEqual({ kind: 'equal-cusp' });
    expect(parseHouseSystem('equal')).toEqual({ kind: 'equal-cusp' });
    expect(parseHouseSystem('EQUAL_ASC_CUSP')).toEqual({ kind: 'equal-cusp' });
    expect(parseHouseSystem('equal-mid')).toEqual({ kind: 'equal-mid' });
    expect(parseHouseSystem('p')).toEqual({ kind: 'placidus' });
    expect(parseHouseSystem(' Placidus ')).toEqual({ kind: 'placidus' });
  });

  it('rejects anything else', () => {
    expect(() => parseHouseSystem('whole')).toThrow(MalformedInputError);
  });
});

describe('computeHouses', () => {
  it('puts the Ascendant on cusp 1 for equal houses', () => {
    const h = computeHouses(fake, moment, 40, -74, EQUAL);
    expect(h.system).toBe('equal-cusp');
    expect(h.cusps[0]).toBe(100);
    expect(h.cusps[0]).toBeCloseTo(h.ascendant, 9);
    expect(h.cusps[9]).toBe(10);
    for (let i = 0; i < 12; i++) {
      expect(normalizeDeg(h.cusps[(i + 1) % 12] - h.cusps[i])).toBe(30);
    }
  });

  it('centers house 1 on the Ascendant for equal-mid', () => {
    const h = computeHouses(fake, moment, 40, -74, MID);
    expect(h.cusps[0]).toBe(85);
    expect(h.cusps[1]).toBe(115);
  });

  it('takes Placidus cusps from the oracle, normalized', () => {
    const h = computeHouses(fake, moment, 40, -74, PLACIDUS);
    expect(h.cusps[9]).toBe(10);
    expect(h.midheaven).toBe(10);
    expect(h.cusps).toHaveLength(12);
  });

  it('validates coordinates', () => {
    expect(() => computeHouses(fake, moment, 91, 0, EQUAL)).toThrow(InvalidCoordinateError);
    expect(() => computeHouses(fake, moment, 0, 181, EQUAL)).toThrow(InvalidCoordinateError);
    expect(() => computeHouses(fake, moment, Number.NaN, 0, EQUAL)).toThrow(InvalidCoordinateError);
  });

  it('refuses degenerate latitudes', () => {
    expect(() => computeHouses(fake, moment, 90, 0, EQUAL)).toThrow(HouseSystemDegenerateError);
    expect(() => computeHouses(fake, moment, 70, 0, PLACIDUS)).toThrow(HouseSystemDegenerateError);
    expect(computeHouses(fake, moment, 70, 0, EQUAL).cusps[0]).toBe(100);
  });

  it('never returns NaN cusps', () => {
    const broken = new FakeOracle({ houses: { cusps: [], ascendant: Number.NaN, midheaven: 0 } });
    expect(() => computeHouses(broken, moment, 40, 0, EQUAL)).toThrow(HouseSystemDegenerateError);
    const partial = new FakeOracle({
      houses: { cusps: [0, 30, 60, Number.NaN, 120, 150, 180, 210, 240, 270, 300, 330], ascendant: 0, midheaven: 270 },
    });
    expect(() => computeHouses(partial, moment, 40, 0, PLACIDUS)).toThrow(HouseSystemDegenerateError);
  });

  it('wraps other oracle failures', () => {
    const failing: EphemerisOracle = {
      position: () => ({ longitude: 0, latitude: 0, distance: 0 }),
      ayanamsa: () => 0,
      houses: () => {
        throw new Error('no tables');
      },
    };
    expect(() => computeHouses(failing, moment, 40, 0, EQUAL)).toThrow(EphemerisRangeError);
  });
});

describe('houseOf', () => {
  const cusps = Array.from({ length: 12 }, (_, i) => normalizeDeg(100 + i * 30));

  it('assigns longitudes to houses across the 0° seam', () => {
    expect(houseOf(100, cusps)).toBe(1);
    expect(houseOf(105, cusps)).toBe(1);
    expect(houseOf(95, cusps)).toBe(12);
    expect(houseOf(10, cusps)).toBe(10);
    expect(houseOf(5, cusps)).toBe(9);
  });

  it('needs twelve cusps', () => {
    expect(() => houseOf(0, [0, 30])).toThrow(MalformedInputError);
  });
});

describe('Placidus', () => {
  it('knows where the polar circle is', () => {
    expect(isBeyondPolarCircle(67, J2000)).toBe(true);
    expect(isBeyondPolarCircle(-67, J2000)).toBe(true);
    expect(isBeyondPolarCircle(60, J2000)).toBe(false);
  });

  it('trisects right ascension at the equator', () => {
    const eps = 23.44;
    const lambda = (ra: number) =>
      normalizeDeg(deg(Math.atan2(Math.sin(rad(ra)), Math.cos(rad(ra)) * Math.cos(rad(eps)))));
    const c = computePlacidusCusps(0, 0, eps);
    expect(c[0]).toBeCloseTo(90, 9);
    expect(c[9]).toBeCloseTo(0, 9);
    expect(c[10]).toBeCloseTo(lambda(30), 9);
    expect(c[11]).toBeCloseTo(lambda(60), 9);
    expect(c[1]).toBeCloseTo(lambda(120), 9);
    expect(c[2]).toBeCloseTo(lambda(150), 9);
    expect(c[6]).toBeCloseTo(270, 9);
  });

  it('gives ordered cusps from the astronomy-engine backend', () => {
    const h = computeHouses(new AstronomyEngineOracle(), moment, 40.7128, -74.006, PLACIDUS);
    expect(h.cusps[0]).toBe(h.ascendant);
    expect(h.cusps[9]).toBe(h.midheaven);
    expect(h.cusps[6]).toBeCloseTo(normalizeDeg(h.ascendant + 180), 9);
    for (let i = 0; i < 12; i++) {
      const step = normalizeDeg(h.cusps[(i + 1) % 12] - h.cusps[i]);
      expect(step).toBeGreaterThan(0);
      expect(step).toBeLessThan(90);
    }
  });
});
