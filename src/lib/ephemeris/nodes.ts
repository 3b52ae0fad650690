// src/lib/ephemeris/nodes.ts
// Ascending lunar node, Meeus ch. 47 (mean node polynomial + main periodic
// terms of the true node). Geocentric only.

import { normalizeDeg, rad } from '@/lib/astro';
import { J2000 } from '@/lib/ephemeris/ayanamsa';
import type { NodeType } from '@/lib/ephemeris/oracle';

function centuries(jd: number): number {
  return (jd - J2000) / 36525;
}

export function meanNode(jd: number): number {
  const T = centuries(jd);
  return normalizeDeg(
    125.0445479 - 1934.1362891 * T + 0.0020754 * T * T + (T * T * T) / 467441 - (T * T * T * T) / 60616000,
  );
}

export function trueNode(jd: number): number {
  const T = centuries(jd);
  const T2 = T * T;
  const T3 = T2 * T;
  const T4 = T3 * T;
  // Moon's mean elongation, Sun's and Moon's mean anomaly, Moon's argument of latitude
  const D = 297.8501921 + 445267.1114034 * T - 0.0018819 * T2 + T3 / 545868 - T4 / 113065000;
  const M = 357.5291092 + 35999.0502909 * T - 0.0001536 * T2 + T3 / 24490000;
  const Mp = 134.9633964 + 477198.8675055 * T + 0.0087414 * T2 + T3 / 69699 - T4 / 14712000;
  const F = 93.272095 + 483202.0175233 * T - 0.0036539 * T2 - T3 / 3526000 + T4 / 863310000;

  return normalizeDeg(
    meanNode(jd)
      - 1.4979 * Math.sin(rad(2 * (D - F)))
      - 0.15 * Math.sin(rad(M))
      - 0.1226 * Math.sin(rad(2 * D))
      + 0.1176 * Math.sin(rad(2 * F))
      - 0.0801 * Math.sin(rad(2 * (Mp - F))),
  );
}

export function ascendingNode(jd: number, type: NodeType): number {
  return type === 'mean' ? meanNode(jd) : trueNode(jd);
}
