// src/lib/ephemeris/ayanamsa.ts
// Sidereal frames as (epoch, ayanamsa at epoch); the value at any other time
// adds the general precession in longitude accumulated since the epoch.

import type { SiderealFrame } from '@/lib/ephemeris/oracle';

export const J2000 = 2451545.0;

type FrameDef = {
  label: string;
  epochJd: number;
  valueAtEpoch: number; // degrees
};

export const SIDEREAL_FRAMES: Record<SiderealFrame, FrameDef> = {
  fagan_bradley: { label: 'Fagan/Bradley', epochJd: 2433282.42346, valueAtEpoch: 24.042044444 },
  lahiri:        { label: 'Lahiri',        epochJd: 2435553.5,     valueAtEpoch: 23.245522556 },
  raman:         { label: 'Raman',         epochJd: 2415020.0,     valueAtEpoch: 21.014444 },
  krishnamurti:  { label: 'Krishnamurti',  epochJd: 2415020.0,     valueAtEpoch: 22.363889 },
};

export function isSiderealFrame(x: string): x is SiderealFrame {
  return Object.prototype.hasOwnProperty.call(SIDEREAL_FRAMES, x);
}

/** IAU 2006 general precession in longitude p_A, in degrees, T in Julian centuries from J2000. */
export function generalPrecession(T: number): number {
  const arcsec =
    5028.796195 * T +
    1.1054348 * T * T +
    0.00007964 * T * T * T -
    0.000023857 * T * T * T * T -
    0.0000000383 * T * T * T * T * T;
  return arcsec / 3600;
}

export function ayanamsaFor(jd: number, frame: SiderealFrame): number {
  const def = SIDEREAL_FRAMES[frame];
  const T = (jd - J2000) / 36525;
  const T0 = (def.epochJd - J2000) / 36525;
  return def.valueAtEpoch + generalPrecession(T) - generalPrecession(T0);
}
