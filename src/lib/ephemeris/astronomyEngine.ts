// src/lib/ephemeris/astronomyEngine.ts
// In-process ephemeris backend on astronomy-engine.
import * as Astronomy from 'astronomy-engine';
import { normalizeDeg } from '@/lib/astro';
import { J2000, ayanamsaFor } from '@/lib/ephemeris/ayanamsa';
import { ascendingNode } from '@/lib/ephemeris/nodes';
import { equalCuspsFromAsc } from '@/lib/houses/equal';
import { meanObliquity } from '@/lib/houses/common';
import { ascendantFromArmc, computePlacidusCusps, midheavenFromArmc } from '@/lib/houses/placidus';
import type {
  EclipticPosition,
  EphemerisOracle,
  HouseDivision,
  OracleHouses,
  OracleTarget,
  PlanetName,
  PositionFlags,
  SiderealFrame,
} from '@/lib/ephemeris/oracle';

const BODY_ENUM: Record<PlanetName, Astronomy.Body> = {
  Sun: Astronomy.Body.Sun,
  Moon: Astronomy.Body.Moon,
  Mercury: Astronomy.Body.Mercury,
  Venus: Astronomy.Body.Venus,
  Mars: Astronomy.Body.Mars,
  Jupiter: Astronomy.Body.Jupiter,
  Saturn: Astronomy.Body.Saturn,
  Uranus: Astronomy.Body.Uranus,
  Neptune: Astronomy.Body.Neptune,
  Pluto: Astronomy.Body.Pluto,
};

// J2000 ± 3000 Julian years
const MAX_SPAN_DAYS = 3000 * 365.25;
export const MIN_JD = J2000 - MAX_SPAN_DAYS;
export const MAX_JD = J2000 + MAX_SPAN_DAYS;

function astroTime(jd: number): Astronomy.AstroTime {
  if (!Number.isFinite(jd) || jd < MIN_JD || jd > MAX_JD) {
    throw new RangeError(`JD ${jd} outside supported range [${MIN_JD}, ${MAX_JD}]`);
  }
  return new Astronomy.AstroTime(jd - J2000);
}

export class AstronomyEngineOracle implements EphemerisOracle {
  position(jd: number, target: OracleTarget, flags: PositionFlags): EclipticPosition {
    const time = astroTime(jd);

    if (typeof target !== 'string') {
      if (flags.center !== 'geo') throw new RangeError('lunar nodes are geocentric only');
      return { longitude: ascendingNode(jd, target.node), latitude: 0, distance: 0 };
    }

    // heliocentric Sun sits at the origin
    if (flags.center === 'helio' && target === 'Sun') {
      return { longitude: 0, latitude: 0, distance: 0 };
    }

    const body = BODY_ENUM[target];
    const vec = flags.center === 'helio'
      ? Astronomy.HelioVector(body, time)
      : Astronomy.GeoVector(body, time, true);
    const ecl = Astronomy.Ecliptic(vec); // true ecliptic of date
    return { longitude: ecl.elon, latitude: ecl.elat, distance: vec.Length() };
  }

  ayanamsa(jd: number, frame: SiderealFrame): number {
    astroTime(jd);
    return ayanamsaFor(jd, frame);
  }

  houses(jd: number, latitude: number, longitude: number, division: HouseDivision): OracleHouses {
    const time = astroTime(jd);
    const armc = normalizeDeg(Astronomy.SiderealTime(time) * 15 + longitude);
    const eps = meanObliquity(jd);
    const ascendant = ascendantFromArmc(armc, latitude, eps);
    const midheaven = midheavenFromArmc(armc, eps);
    const cusps = division === 'placidus'
      ? computePlacidusCusps(armc, latitude, eps)
      : equalCuspsFromAsc(ascendant);
    return { cusps, ascendant, midheaven };
  }
}
