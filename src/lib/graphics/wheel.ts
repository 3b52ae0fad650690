// src/lib/graphics/wheel.ts
// Renderer-neutral wheel geometry for a ChartSnapshot.
import { SIGN_NAMES, normalizeDeg, type SignName } from '@/lib/astro';
import { longitudeIn, type ChartSnapshot, type Zodiac } from '@/lib/chart';
import type { Body } from '@/lib/planets/bodies';
import { signChar } from '@/lib/graphics/glyphs';
import { describeArc, leaderLine, project, resolveCollisions, type XY } from '@/lib/graphics/polar';
import { SIGN_COLORS, WHEEL } from '@/lib/graphics/tokens';

export type WheelOptions = {
  size?: number;
  radius?: number;         // default size / 2 - margin
  minBodySeparation?: number;
};

export type SignSector = {
  sign: SignName;
  glyph: string;
  color: string;
  start: number;           // sector start longitude
  spoke: { from: XY; to: XY };
  arc: string;             // SVG path of the sector's outer edge
  label: XY;               // at R - 26, mid-sector
};

export type CuspSpoke = {
  house: number;           // 1..12
  longitude: number;
  from: XY;
  to: XY;
  path: string;
};

export type BodyMarker = {
  body: Body;
  glyph: string;
  longitude: number;       // true position in the snapshot's zodiac
  displayLongitude: number;
  point: XY;               // at R - 60, spread apart
  anchor: XY;              // true position on the same ring
};

export type AspectConnector = {
  a: Body;
  b: Body;
  key: string;
  symbol: string;
  color: string;
  from: XY;
  to: XY;
};

export type WheelLayout = {
  size: number;
  center: XY;
  radius: number;
  zodiac: Zodiac;
  signs: SignSector[];
  cusps: CuspSpoke[];
  bodies: BodyMarker[];
  aspects: AspectConnector[];
};

/**
 * House cusps are stored tropical; a sidereal wheel shifts them by the same
 * ayanamsa applied to the bodies.
 */
function cuspLongitudes(snapshot: ChartSnapshot): number[] {
  if (!snapshot.houses) return [];
  const shift = snapshot.zodiac === 'sidereal' ? snapshot.ayanamsa.value : 0;
  return snapshot.houses.cusps.map((c) => normalizeDeg(c - shift));
}

export function buildWheelLayout(snapshot: ChartSnapshot, options: WheelOptions = {}): WheelLayout {
  const size = options.size ?? WHEEL.size;
  const radius = options.radius ?? size / 2 - WHEEL.margin;
  const center: XY = { x: size / 2, y: size / 2 };
  const at = (r: number, lon: number) => project(r, lon, center);

  const signs = SIGN_NAMES.map((sign, i): SignSector => {
    const start = i * 30;
    return {
      sign,
      glyph: signChar(sign),
      color: SIGN_COLORS[sign],
      start,
      spoke: { from: center, to: at(radius, start) },
      arc: describeArc(center, radius, start, start + 30),
      label: at(radius - WHEEL.signGlyphInset, start + 15),
    };
  });

  const cuspRing = radius - WHEEL.signGlyphInset * 2;
  const cusps = cuspLongitudes(snapshot).map((longitude, i): CuspSpoke => ({
    house: i + 1,
    longitude,
    from: center,
    to: at(cuspRing, longitude),
    path: leaderLine(center, 0, cuspRing, longitude),
  }));

  const bodyRing = radius - WHEEL.bodyInset;
  const longitudes = snapshot.positions.map((p) => longitudeIn(p, snapshot.zodiac));
  const spread = resolveCollisions(longitudes, options.minBodySeparation ?? WHEEL.minBodySeparation);
  const bodies = snapshot.positions.map((p, i): BodyMarker => ({
    body: p.body,
    glyph: p.glyph,
    longitude: longitudes[i],
    displayLongitude: spread[i],
    point: at(bodyRing, spread[i]),
    anchor: at(bodyRing, longitudes[i]),
  }));

  const anchorOf = new Map(bodies.map((b) => [b.body, b.anchor]));
  const aspects: AspectConnector[] = [];
  for (const hit of snapshot.aspects ?? []) {
    const from = anchorOf.get(hit.a);
    const to = anchorOf.get(hit.b);
    if (!from || !to) continue;
    aspects.push({
      a: hit.a,
      b: hit.b,
      key: hit.aspect.key,
      symbol: hit.aspect.symbol,
      color: hit.aspect.color,
      from,
      to,
    });
  }

  return { size, center, radius, zodiac: snapshot.zodiac, signs, cusps, bodies, aspects };
}
