// src/lib/time/resolveTz.ts
// Caller-side timezone policy: pick a zone from coordinates, or fall back to
// a default zone when the requested one does not resolve. The engine itself
// never falls back.

import tzlookup from 'tz-lookup';
import { IANAZone } from 'luxon';
import { UnknownTimezoneError, InvalidCoordinateError } from '@/lib/errors';
import type { TimezoneSpec } from '@/lib/time';

/** IANA zone name for a geographic point (offline lookup). */
export function zoneForCoordinates(lat: number, lon: number): string {
  if (!Number.isFinite(lat) || !Number.isFinite(lon) || Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    throw new InvalidCoordinateError(lat, lon);
  }
  return tzlookup(lat, lon);
}

export type ResolvedZone = {
  spec: TimezoneSpec;
  fallbackApplied: boolean;
};

/**
 * Returns the named zone if it resolves, otherwise the fallback zone.
 * Fixed offsets pass through. A fallback that does not resolve either throws.
 */
export function resolveZoneOrDefault(spec: TimezoneSpec, fallbackZone: string): ResolvedZone {
  if (spec.kind === 'fixed' || IANAZone.isValidZone(spec.zone.trim())) {
    return { spec, fallbackApplied: false };
  }
  if (!IANAZone.isValidZone(fallbackZone)) throw new UnknownTimezoneError(fallbackZone);
  return { spec: { kind: 'named', zone: fallbackZone }, fallbackApplied: true };
}
