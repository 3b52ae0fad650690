// src/lib/graphics/polar.ts
/**
 * Polar layout for chart wheels. One angular convention everywhere:
 * longitude 0 sits at the leftmost point of the circle and longitude grows
 * clockwise on screen (SVG y axis pointing down).
 *
 *   θ = 180° − λ,  x = cx + r·cos θ,  y = cy − r·sin θ
 */

import { deg, normalizeDeg, rad } from '@/lib/astro';

export interface XY {
  x: number;
  y: number;
}

export interface Polar {
  radius: number;
  longitude: number;
}

const ORIGIN: XY = { x: 0, y: 0 };

/** Normalize to [0, 360). */
export function wrapDeg(value: number): number {
  return normalizeDeg(value);
}

export function project(radius: number, longitude: number, center: XY = ORIGIN): XY {
  const theta = rad(180 - longitude);
  return {
    x: center.x + radius * Math.cos(theta),
    y: center.y - radius * Math.sin(theta),
  };
}

/** Inverse of `project`. The center itself maps to radius 0, longitude 0. */
export function unproject(point: XY, center: XY = ORIGIN): Polar {
  const dx = point.x - center.x;
  const dy = center.y - point.y;
  const radius = Math.hypot(dx, dy);
  if (radius === 0) return { radius: 0, longitude: 0 };
  const theta = deg(Math.atan2(dy, dx));
  return { radius, longitude: wrapDeg(180 - theta) };
}

function fmt(n: number): string {
  return Number(n.toFixed(3)).toString();
}

/**
 * SVG arc from startLon to endLon, drawn in the direction of increasing
 * longitude (clockwise on screen, sweep-flag 1).
 */
export function describeArc(center: XY, radius: number, startLon: number, endLon: number): string {
  const start = project(radius, startLon, center);
  const end = project(radius, endLon, center);
  const span = wrapDeg(endLon - startLon);
  const largeArcFlag = span > 180 ? 1 : 0;
  return `M ${fmt(start.x)} ${fmt(start.y)} A ${fmt(radius)} ${fmt(radius)} 0 ${largeArcFlag} 1 ${fmt(end.x)} ${fmt(end.y)}`;
}

/** Radial segment at one longitude, from innerR out to outerR. */
export function leaderLine(center: XY, innerR: number, outerR: number, longitude: number): string {
  const p1 = project(innerR, longitude, center);
  const p2 = project(outerR, longitude, center);
  return `M ${fmt(p1.x)} ${fmt(p1.y)} L ${fmt(p2.x)} ${fmt(p2.y)}`;
}

/**
 * Spreads longitudes so neighbours are at least minSep apart, walking forward
 * in increasing longitude and across the 0/360 seam. Output keeps input order.
 * With n * minSep >= 360 no spacing can satisfy every pair; the values are
 * then spread as far as the forward pass gets.
 */
export function resolveCollisions(longitudes: readonly number[], minSep = 8): number[] {
  const n = longitudes.length;
  if (n < 2) return longitudes.map(wrapDeg);

  const items = longitudes.map((a, idx) => ({ idx, a: wrapDeg(a) }));
  items.sort((u, v) => u.a - v.a || u.idx - v.idx);

  const pushForward = () => {
    for (let i = 1; i < n; i++) {
      if (items[i].a - items[i - 1].a < minSep) {
        items[i].a = items[i - 1].a + minSep;
      }
    }
  };

  pushForward();

  // seam: last item crowding the first one after wrap-around
  const gap = items[0].a + 360 - items[n - 1].a;
  if (gap < minSep) {
    items[0].a = items[n - 1].a + minSep - 360;
    pushForward();
  }

  const out = new Array<number>(n);
  for (const it of items) out[it.idx] = wrapDeg(it.a);
  return out;
}
