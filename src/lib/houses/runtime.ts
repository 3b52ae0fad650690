// src/lib/houses/runtime.ts
import { normalizeDeg } from '@/lib/astro';
import { EphemerisRangeError, HouseSystemDegenerateError, InvalidCoordinateError } from '@/lib/errors';
import type { EphemerisOracle, OracleHouses } from '@/lib/ephemeris/oracle';
import { equalCuspsFromAsc, equalMidCuspsFromAsc } from '@/lib/houses/equal';
import { isBeyondPolarCircle, type HouseSystem } from '@/lib/houses/common';
import type { Moment } from '@/lib/time';

export type HouseResult = {
  system: HouseSystem['kind'];
  cusps: number[];   // 12, house 1 first, [0, 360)
  ascendant: number;
  midheaven: number;
};

function assertCoordinates(latitude: number, longitude: number): void {
  const ok =
    Number.isFinite(latitude) && Number.isFinite(longitude) &&
    latitude >= -90 && latitude <= 90 &&
    longitude >= -180 && longitude <= 180;
  if (!ok) throw new InvalidCoordinateError(latitude, longitude);
}

function queryHouses(
  oracle: EphemerisOracle,
  moment: Moment,
  latitude: number,
  longitude: number,
  system: HouseSystem,
): OracleHouses {
  const division = system.kind === 'placidus' ? 'placidus' : 'equal';
  try {
    return oracle.houses(moment.jd, latitude, longitude, division);
  } catch (err) {
    if (err instanceof HouseSystemDegenerateError) throw err;
    throw new EphemerisRangeError('houses', moment.jd, err instanceof Error ? err.message : String(err));
  }
}

function cuspsFor(system: HouseSystem, ascendant: number, oracleCusps: number[], latitude: number): number[] {
  switch (system.kind) {
    case 'equal-cusp':
      return equalCuspsFromAsc(ascendant);
    case 'equal-mid':
      return equalMidCuspsFromAsc(ascendant);
    case 'placidus':
      if (oracleCusps.length !== 12 || oracleCusps.some((c) => !Number.isFinite(c))) {
        throw new HouseSystemDegenerateError(system.kind, latitude);
      }
      return oracleCusps.map(normalizeDeg);
  }
}

/**
 * Cusps and angles for an observer. Equal systems derive their cusps from the
 * oracle's Ascendant; Placidus cusps come from the oracle's own division.
 */
export function computeHouses(
  oracle: EphemerisOracle,
  moment: Moment,
  latitude: number,
  longitude: number,
  system: HouseSystem,
): HouseResult {
  assertCoordinates(latitude, longitude);
  if (Math.abs(latitude) === 90) throw new HouseSystemDegenerateError(system.kind, latitude);
  if (system.kind === 'placidus' && isBeyondPolarCircle(latitude, moment.jd)) {
    throw new HouseSystemDegenerateError(system.kind, latitude);
  }

  const raw = queryHouses(oracle, moment, latitude, longitude, system);
  if (!Number.isFinite(raw.ascendant) || !Number.isFinite(raw.midheaven)) {
    throw new HouseSystemDegenerateError(system.kind, latitude);
  }

  const ascendant = normalizeDeg(raw.ascendant);
  const midheaven = normalizeDeg(raw.midheaven);

  const cusps = cuspsFor(system, ascendant, raw.cusps, latitude);
  return { system: system.kind, cusps, ascendant, midheaven };
}
