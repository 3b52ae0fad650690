// src/lib/ephemeris/oracle.ts
// The three capabilities the engine needs from an ephemeris backend.
// Input is always a Julian Day (UT), output always degrees.

export type PlanetName =
  | 'Sun' | 'Moon' | 'Mercury' | 'Venus' | 'Mars'
  | 'Jupiter' | 'Saturn' | 'Uranus' | 'Neptune' | 'Pluto';

export type NodeType = 'true' | 'mean';

/** A planet, or the ascending lunar node in its true or mean variant. */
export type OracleTarget = PlanetName | { node: NodeType };

export type Center = 'geo' | 'helio';

export type PositionFlags = {
  center: Center;
};

export type EclipticPosition = {
  longitude: number;  // may come back outside [0, 360)
  latitude: number;
  distance: number;   // AU
};

export type SiderealFrame = 'fagan_bradley' | 'lahiri' | 'raman' | 'krishnamurti';

export type HouseDivision = 'equal' | 'placidus';

export type OracleHouses = {
  cusps: number[];    // 12, house 1 first
  ascendant: number;
  midheaven: number;
};

export interface EphemerisOracle {
  position(jd: number, target: OracleTarget, flags: PositionFlags): EclipticPosition;
  ayanamsa(jd: number, frame: SiderealFrame): number;
  houses(jd: number, latitude: number, longitude: number, division: HouseDivision): OracleHouses;
}

export function targetName(target: OracleTarget): string {
  return typeof target === 'string' ? target : `${target.node} node`;
}
