// src/lib/chart.ts
// One chart request → one ChartSnapshot value. Callers keep the snapshot and
// hand it to renderers themselves; nothing is cached here.
import {
  DEFAULT_ASPECTS,
  detectAspects,
  parseOrbList,
  withOrbs,
  type AspectDefinition,
  type AspectHit,
} from '@/lib/aspects';
import { loadConfig, type EngineConfig } from '@/lib/config';
import { AstronomyEngineOracle } from '@/lib/ephemeris/astronomyEngine';
import type { Center, EphemerisOracle } from '@/lib/ephemeris/oracle';
import { parseHouseSystem } from '@/lib/houses/common';
import { computeHouses, type HouseResult } from '@/lib/houses/runtime';
import type { Logger } from '@/lib/log';
import type { Body } from '@/lib/planets/bodies';
import { ayanamsa, resolvePositions, type Ayanamsa, type BodyPosition } from '@/lib/planets/runtime';
import { parseChartRequest, type ChartRequest, type TimezoneInput } from '@/lib/schemas';
import { normalizeMoment, parseTimezoneSpec, type Moment, type TimezoneSpec } from '@/lib/time';

export type Zodiac = 'tropical' | 'sidereal';

export type ChartSnapshot = {
  moment: Moment;
  center: Center;
  zodiac: Zodiac;
  ayanamsa: Ayanamsa;
  positions: BodyPosition[];
  houses?: HouseResult;           // tropical; present when coordinates were given
  aspects?: AspectHit<Body>[];    // over the snapshot's zodiac
  aspectTable?: AspectDefinition[];
};

export type ChartOptions = {
  oracle?: EphemerisOracle;
  config?: EngineConfig;
  logger?: Logger;
};

// built-in defaults only; callers pass loadConfig(process.env) to honour the environment
const BUILTIN_CONFIG = loadConfig({});

function toTimezoneSpec(input: TimezoneInput | undefined, config: EngineConfig): TimezoneSpec {
  if (input === undefined) return { kind: 'fixed', offsetHours: config.DEFAULT_FIXED_UTC_OFFSET };
  if (typeof input === 'string' || typeof input === 'number') return parseTimezoneSpec(input);
  return input;
}

/** Orb table for a request: explicit table, else defaults with the orb list applied. */
export function aspectTableFor(request: ChartRequest, config: EngineConfig = BUILTIN_CONFIG): AspectDefinition[] {
  if (request.aspects) return request.aspects;
  const orb = request.orb ?? config.DEFAULT_ORB;
  const orbs = parseOrbList(request.orbList ?? config.DEFAULT_ORB_LIST, orb, DEFAULT_ASPECTS.length);
  return withOrbs(DEFAULT_ASPECTS, orbs);
}

/** Longitude of a position in the given zodiac. */
export function longitudeIn(position: BodyPosition, zodiac: Zodiac): number {
  return zodiac === 'sidereal' ? position.sidereal : position.tropical;
}

export function computeChart(input: unknown, options: ChartOptions = {}): ChartSnapshot {
  const request = parseChartRequest(input);
  const config = options.config ?? BUILTIN_CONFIG;
  const oracle = options.oracle ?? new AstronomyEngineOracle();

  const moment = normalizeMoment(request.date, request.time, toTimezoneSpec(request.timezone, config));
  const center = request.center ?? config.DEFAULT_CENTER;
  const zodiac = request.zodiac ?? config.DEFAULT_ZODIAC;
  const ayan = ayanamsa(
    oracle,
    moment,
    request.siderealFrame ?? config.SIDEREAL_FRAME,
    request.ayanamsaOffset ?? config.AYANAMSA_EXTRA_OFFSET,
  );

  const positions = resolvePositions(oracle, moment, ayan, {
    center,
    nodeType: request.nodeType ?? config.DEFAULT_NODE_TYPE,
    includeNodes: request.includeNodes ?? true,
  });

  const snapshot: ChartSnapshot = { moment, center, zodiac, ayanamsa: ayan, positions };

  if (request.latitude !== undefined && request.longitude !== undefined) {
    const system = parseHouseSystem(request.houseSystem ?? config.DEFAULT_HOUSE_SYSTEM);
    snapshot.houses = computeHouses(oracle, moment, request.latitude, request.longitude, system);
  }

  if (request.includeAspects ?? true) {
    const table = aspectTableFor(request, config);
    snapshot.aspectTable = table;
    snapshot.aspects = detectAspects(
      positions.map((p) => p.body),
      positions.map((p) => longitudeIn(p, zodiac)),
      table,
    );
  }

  options.logger?.debug('chart.computed', {
    jd: moment.jd,
    zone: moment.zoneLabel,
    center,
    zodiac,
    bodies: positions.length,
    houses: snapshot.houses?.system ?? null,
    aspects: snapshot.aspects?.length ?? 0,
  });
  return snapshot;
}
