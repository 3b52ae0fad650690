// src/lib/astro.ts
// Angular primitives and zodiac-sign helpers shared by every layer.

export const SIGN_NAMES = [
  'Aries', 'Taurus', 'Gemini', 'Cancer', 'Leo', 'Virgo',
  'Libra', 'Scorpio', 'Sagittarius', 'Capricorn', 'Aquarius', 'Pisces'
] as const;

export type SignName = typeof SIGN_NAMES[number];

/** Angle in degrees reduced to [0, 360). */
export function normalizeDeg(x: number): number {
  let d = x % 360;
  if (d < 0) d += 360;
  // -1e-15 % 360 + 360 rounds to exactly 360
  return d >= 360 ? 0 : d;
}

export function rad(d: number): number { return (d * Math.PI) / 180; }
export function deg(r: number): number { return (r * 180) / Math.PI; }

export function signIndex(lon: number): number {
  return Math.floor(normalizeDeg(lon) / 30) % 12;
}

export function signFromLongitude(lon: number): SignName {
  return SIGN_NAMES[signIndex(lon)];
}

/** Degrees inside the sign, [0, 30). */
export function degreeInSign(lon: number): number {
  const l = normalizeDeg(lon);
  return l - signIndex(l) * 30;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * `DD°MM'SS" Sign`, seconds rounded. Rounding up to 30°00'00" rolls over
 * into the next sign.
 */
export function formatZodiac(lon: number): string {
  const totalSeconds = Math.round(normalizeDeg(lon) * 3600);
  const wrapped = totalSeconds % (360 * 3600);
  const si = Math.floor(wrapped / (30 * 3600));
  const inSign = wrapped - si * 30 * 3600;
  const d = Math.floor(inSign / 3600);
  const m = Math.floor((inSign - d * 3600) / 60);
  const s = inSign - d * 3600 - m * 60;
  return `${pad2(d)}°${pad2(m)}'${pad2(s)}" ${SIGN_NAMES[si]}`;
}
