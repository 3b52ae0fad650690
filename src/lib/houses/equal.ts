// src/lib/houses/equal.ts
// Equal houses from the Ascendant: 12 cusps, 30° apart.

import { normalizeDeg } from '@/lib/astro';

/** Ascendant on the cusp of house 1. */
export function equalCuspsFromAsc(ascDeg: number): number[] {
  return Array.from({ length: 12 }, (_, i) => normalizeDeg(ascDeg + i * 30));
}

/** Ascendant at the middle of house 1: the first cusp sits 15° before it. */
export function equalMidCuspsFromAsc(ascDeg: number): number[] {
  return equalCuspsFromAsc(ascDeg - 15);
}
