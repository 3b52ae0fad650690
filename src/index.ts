// src/index.ts
export * from '@/lib/errors';
export * from '@/lib/astro';
export * from '@/lib/time';
export { zoneForCoordinates, resolveZoneOrDefault, type ResolvedZone } from '@/lib/time/resolveTz';
export * from '@/lib/ephemeris/oracle';
export { AstronomyEngineOracle, MIN_JD, MAX_JD } from '@/lib/ephemeris/astronomyEngine';
export { SIDEREAL_FRAMES, ayanamsaFor, isSiderealFrame } from '@/lib/ephemeris/ayanamsa';
export { meanNode, trueNode } from '@/lib/ephemeris/nodes';
export * from '@/lib/ephemeris/range';
export { toCsv } from '@/lib/ephemeris/csv';
export * from '@/lib/planets/bodies';
export * from '@/lib/planets/runtime';
export { parseHouseSystem, houseOf, HOUSE_SYSTEMS, type HouseSystem, type HouseSystemKind } from '@/lib/houses/common';
export { computeHouses, type HouseResult } from '@/lib/houses/runtime';
export * from '@/lib/aspects';
export * from '@/lib/graphics/polar';
export * from '@/lib/graphics/wheel';
export { bodyChar, signChar } from '@/lib/graphics/glyphs';
export * from '@/lib/chart';
export * from '@/lib/schemas';
export { loadConfig, type EngineConfig } from '@/lib/config';
export { createLogger, type Logger, type LogLevel, type LogSink } from '@/lib/log';
