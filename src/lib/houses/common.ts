// src/lib/houses/common.ts
// House system variant and helpers shared by the house modules.

import { normalizeDeg } from '@/lib/astro';
import { J2000 } from '@/lib/ephemeris/ayanamsa';
import { MalformedInputError } from '@/lib/errors';

export type HouseSystem =
  | { kind: 'equal-cusp' }   // Ascendant on the cusp of house 1
  | { kind: 'equal-mid' }    // Ascendant at the middle of house 1
  | { kind: 'placidus' };

export type HouseSystemKind = HouseSystem['kind'];

export const HOUSE_SYSTEMS: readonly HouseSystemKind[] = ['equal-cusp', 'equal-mid', 'placidus'];

const ALIASES: Record<string, HouseSystemKind> = {
  'E': 'equal-cusp',
  'EQUAL': 'equal-cusp',
  'EQUAL-CUSP': 'equal-cusp',
  'EQUAL_ASC_CUSP': 'equal-cusp',
  'EQUAL-MID': 'equal-mid',
  'EQUAL_ASC_MID': 'equal-mid',
  'P': 'placidus',
  'PLACIDUS': 'placidus',
};

/** Accepts the canonical kinds and the legacy codes (E, P, EQUAL_ASC_MID, ...). */
export function parseHouseSystem(code: string): HouseSystem {
  const kind = ALIASES[code.trim().toUpperCase()];
  if (!kind) throw new MalformedInputError(`Unknown house system "${code}".`, { code });
  return { kind };
}

export function clamp(x: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, x));
}

/** Mean obliquity of the ecliptic in degrees (Meeus 22.2). */
export function meanObliquity(jd: number): number {
  const T = (jd - J2000) / 36525.0;
  const seconds = 21.448 - T * (46.815 + T * (0.00059 - T * 0.001813));
  return 23 + 26 / 60 + seconds / 3600;
}

/** Placidus is undefined where ecliptic points become circumpolar. */
export function isBeyondPolarCircle(latDeg: number, jd: number): boolean {
  return Math.abs(latDeg) >= 90 - meanObliquity(jd);
}

/** True if b lies on the arc from a (inclusive) to c (exclusive), moving forward mod 360. */
export function isBetweenAngles(a: number, b: number, c: number): boolean {
  a = normalizeDeg(a);
  b = normalizeDeg(b);
  c = normalizeDeg(c);
  if (a === c) return true;
  if (a < c) return b >= a && b < c;
  return b >= a || b < c;
}

/** House number 1..12 containing the longitude, given cusps in house order. */
export function houseOf(longitude: number, cusps: readonly number[]): number {
  if (cusps.length !== 12) {
    throw new MalformedInputError(`Expected 12 cusps, got ${cusps.length}.`);
  }
  for (let i = 0; i < 12; i++) {
    if (isBetweenAngles(cusps[i], longitude, cusps[(i + 1) % 12])) return i + 1;
  }
  return 12;
}
