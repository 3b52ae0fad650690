// src/lib/houses/placidus.ts
// Chart angles from the sidereal angle of the meridian (ARMC), and Placidus
// cusps by fixed-point iteration on the semi-arcs: intermediate cusps sit at
// one and two thirds of the diurnal (houses 11, 12) or nocturnal (houses 2, 3)
// semi-arc; 5, 6, 8, 9 are their opposites.

import { deg, normalizeDeg, rad } from '@/lib/astro';
import { clamp } from '@/lib/houses/common';
import { HouseSystemDegenerateError } from '@/lib/errors';

const MAX_ITER = 100;
const EPSILON_DEG = 1e-10;

/** Ecliptic longitude λ (β=0) → right ascension and declination, degrees. */
function eclToEq(λ: number, ε: number): { ra: number; dec: number } {
  const l = rad(λ);
  const e = rad(ε);
  const ra = normalizeDeg(deg(Math.atan2(Math.sin(l) * Math.cos(e), Math.cos(l))));
  const dec = deg(Math.asin(clamp(Math.sin(l) * Math.sin(e), -1, 1)));
  return { ra, dec };
}

/** Right ascension of an ecliptic point → its longitude. */
function raToLambda(α: number, ε: number): number {
  const a = rad(α);
  return normalizeDeg(deg(Math.atan2(Math.sin(a), Math.cos(a) * Math.cos(rad(ε)))));
}

/** Diurnal semi-arc in degrees, or null when the point never rises or never sets. */
function semiArc(φ: number, dec: number): number | null {
  const x = -Math.tan(rad(φ)) * Math.tan(rad(dec));
  if (!Number.isFinite(x) || Math.abs(x) > 1) return null;
  return deg(Math.acos(x));
}

export function midheavenFromArmc(armc: number, ε: number): number {
  const θ = rad(armc);
  return normalizeDeg(deg(Math.atan2(Math.sin(θ), Math.cos(θ) * Math.cos(rad(ε)))));
}

export function ascendantFromArmc(armc: number, φ: number, ε: number): number {
  const θ = rad(armc);
  const e = rad(ε);
  const y = Math.cos(θ);
  const x = -(Math.sin(θ) * Math.cos(e) + Math.tan(rad(φ)) * Math.sin(e));
  return normalizeDeg(deg(Math.atan2(y, x)));
}

/**
 * One intermediate cusp. `above` selects the diurnal quadrant between MC and
 * ASC (RA = ARMC + f·SA), otherwise the nocturnal one between ASC and IC
 * (RA = ARMC + 180 − f·NSA).
 */
function placidusCusp(armc: number, φ: number, ε: number, f: number, above: boolean): number {
  let ra = above ? armc + f * 90 : armc + 180 - f * 90;
  let λ = raToLambda(normalizeDeg(ra), ε);

  for (let i = 0; i < MAX_ITER; i++) {
    const { dec } = eclToEq(λ, ε);
    const sa = semiArc(φ, dec);
    if (sa === null) throw new HouseSystemDegenerateError('placidus', φ);
    ra = above ? armc + f * sa : armc + 180 - f * (180 - sa);
    const next = raToLambda(normalizeDeg(ra), ε);
    const delta = Math.abs(normalizeDeg(next - λ + 180) - 180);
    λ = next;
    if (delta < EPSILON_DEG) return λ;
  }
  throw new HouseSystemDegenerateError('placidus', φ);
}

/** Twelve Placidus cusps, house 1 first, from ARMC, latitude and obliquity (degrees). */
export function computePlacidusCusps(armc: number, latDeg: number, obliquityDeg: number): number[] {
  const asc = ascendantFromArmc(armc, latDeg, obliquityDeg);
  const mc = midheavenFromArmc(armc, obliquityDeg);

  const c11 = placidusCusp(armc, latDeg, obliquityDeg, 1 / 3, true);
  const c12 = placidusCusp(armc, latDeg, obliquityDeg, 2 / 3, true);
  const c2 = placidusCusp(armc, latDeg, obliquityDeg, 2 / 3, false);
  const c3 = placidusCusp(armc, latDeg, obliquityDeg, 1 / 3, false);

  const cusps = [
    asc, c2, c3, mc + 180, c11 + 180, c12 + 180,
    asc + 180, c2 + 180, c3 + 180, mc, c11, c12,
  ].map(normalizeDeg);

  if (cusps.some((c) => !Number.isFinite(c))) throw new HouseSystemDegenerateError('placidus', latDeg);
  return cusps;
}
