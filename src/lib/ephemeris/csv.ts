// src/lib/ephemeris/csv.ts
import type { EphemerisRange } from '@/lib/ephemeris/range';

/** Header `timestamp_utc,Sun,Moon,...`, one line per row, longitudes to 6 decimals. */
export function toCsv(range: EphemerisRange): string {
  const lines = [['timestamp_utc', ...range.bodies].join(',')];
  for (const row of range.rows) {
    lines.push([row.timestamp, ...row.longitudes.map((v) => v.toFixed(6))].join(','));
  }
  return lines.join('\n') + '\n';
}
