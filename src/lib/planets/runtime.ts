// src/lib/planets/runtime.ts
// Tropical and sidereal longitudes of the chart bodies for one Moment.
import { formatZodiac, normalizeDeg } from '@/lib/astro';
import { EphemerisRangeError, MalformedInputError, NodeFrameError } from '@/lib/errors';
import { bodyChar } from '@/lib/graphics/glyphs';
import { PLANETS, bodyLabel, isNode, type Body } from '@/lib/planets/bodies';
import {
  targetName,
  type Center,
  type EphemerisOracle,
  type NodeType,
  type OracleTarget,
  type SiderealFrame,
} from '@/lib/ephemeris/oracle';
import type { Moment } from '@/lib/time';

export type PositionOptions = {
  center?: Center;       // default 'geo'
  nodeType?: NodeType;   // default 'true'
};

export type Ayanamsa = {
  frame: SiderealFrame;
  base: number;          // oracle value for the frame
  extraOffset: number;   // caller calibration, may be negative
  value: number;         // base + extraOffset
};

export type BodyPosition = {
  body: Body;
  label: string;
  glyph: string;
  tropical: number;
  sidereal: number;
  tropicalSign: string;
  siderealSign: string;
};

function queryLongitude(oracle: EphemerisOracle, moment: Moment, body: Body, target: OracleTarget, center: Center): number {
  let lon: number;
  try {
    lon = oracle.position(moment.jd, target, { center }).longitude;
  } catch (err) {
    throw new EphemerisRangeError(body, moment.jd, err instanceof Error ? err.message : String(err));
  }
  if (!Number.isFinite(lon)) {
    throw new EphemerisRangeError(body, moment.jd, `non-finite longitude for ${targetName(target)}`);
  }
  return normalizeDeg(lon);
}

/**
 * Tropical longitude in [0, 360). The South Node is never queried: it is the
 * North Node reflected by 180°.
 */
export function tropicalLongitude(
  oracle: EphemerisOracle,
  moment: Moment,
  body: Body,
  options: PositionOptions = {},
): number {
  const center = options.center ?? 'geo';
  if (isNode(body)) {
    if (center !== 'geo') throw new NodeFrameError(body);
    const north = queryLongitude(oracle, moment, 'NorthNode', { node: options.nodeType ?? 'true' }, 'geo');
    return body === 'NorthNode' ? north : normalizeDeg(north + 180);
  }
  return queryLongitude(oracle, moment, body, body, center);
}

export function ayanamsa(
  oracle: EphemerisOracle,
  moment: Moment,
  frame: SiderealFrame,
  extraOffset = 0,
): Ayanamsa {
  if (!Number.isFinite(extraOffset)) {
    throw new MalformedInputError(`Invalid ayanamsa offset: ${extraOffset}.`, { frame, extraOffset });
  }
  let base: number;
  try {
    base = oracle.ayanamsa(moment.jd, frame);
  } catch (err) {
    throw new EphemerisRangeError(`ayanamsa(${frame})`, moment.jd, err instanceof Error ? err.message : String(err));
  }
  if (!Number.isFinite(base)) throw new EphemerisRangeError(`ayanamsa(${frame})`, moment.jd, 'non-finite value');
  return { frame, base, extraOffset, value: base + extraOffset };
}

export function siderealLongitude(tropical: number, ayan: Ayanamsa): number {
  return normalizeDeg(tropical - ayan.value);
}

export function toBodyPosition(body: Body, tropical: number, ayan: Ayanamsa): BodyPosition {
  const sidereal = siderealLongitude(tropical, ayan);
  return {
    body,
    label: bodyLabel(body),
    glyph: bodyChar(body),
    tropical,
    sidereal,
    tropicalSign: formatZodiac(tropical),
    siderealSign: formatZodiac(sidereal),
  };
}

export type ResolveOptions = PositionOptions & {
  includeNodes?: boolean;  // default true; ignored under 'helio'
};

/**
 * The ten planets, then the nodes when geocentric. One ayanamsa value is
 * applied to every body so the sidereal positions stay mutually consistent.
 */
export function resolvePositions(
  oracle: EphemerisOracle,
  moment: Moment,
  ayan: Ayanamsa,
  options: ResolveOptions = {},
): BodyPosition[] {
  const center = options.center ?? 'geo';
  const rows = PLANETS.map((body) => toBodyPosition(body, tropicalLongitude(oracle, moment, body, options), ayan));

  if ((options.includeNodes ?? true) && center === 'geo') {
    const north = tropicalLongitude(oracle, moment, 'NorthNode', options);
    rows.push(toBodyPosition('NorthNode', north, ayan));
    rows.push(toBodyPosition('SouthNode', normalizeDeg(north + 180), ayan));
  }
  return rows;
}
