// scripts/export-ephemeris-csv.ts
/* Writes body longitudes over a time range as CSV.

   Usage:
     tsx scripts/export-ephemeris-csv.ts --start 2024-01-01T00:00 --end 2024-01-31T00:00 \
       [--step hour|6h|day] [--tz UTC+0] [--zodiac sidereal] [--frame lahiri] \
       [--nodes mean] [--no-nodes] [--center helio] [--out range.csv]
*/

import 'dotenv/config';
import { writeFileSync } from 'node:fs';
import { parseFlags, booleanFlag, numberFlag, stringFlag } from '@/lib/cli';
import { loadConfig } from '@/lib/config';
import { MalformedInputError, toErrorPayload } from '@/lib/errors';
import { AstronomyEngineOracle } from '@/lib/ephemeris/astronomyEngine';
import { toCsv } from '@/lib/ephemeris/csv';
import { isSiderealFrame } from '@/lib/ephemeris/ayanamsa';
import { ephemerisRange, isRangeStep, type CivilInstant } from '@/lib/ephemeris/range';
import { createLogger } from '@/lib/log';
import { parseTimezoneSpec, type TimezoneSpec } from '@/lib/time';

const config = loadConfig();
// stdout carries the CSV, so log lines go to stderr
const log = createLogger('export-ephemeris-csv', config.LOG_LEVEL, (_level, line) => console.error(line));

function civilInstant(flag: string, text: string | undefined): CivilInstant {
  if (!text) throw new MalformedInputError(`--${flag} is required (YYYY-MM-DDTHH:MM).`, { flag });
  const [date, time = '00:00'] = text.split('T');
  return { date, time };
}

function main() {
  const flags = parseFlags(process.argv.slice(2));

  const step = stringFlag(flags, 'step') ?? 'day';
  if (!isRangeStep(step)) throw new MalformedInputError(`--step must be hour, 6h or day, got "${step}".`, { step });

  const zodiac = stringFlag(flags, 'zodiac') ?? config.DEFAULT_ZODIAC;
  if (zodiac !== 'tropical' && zodiac !== 'sidereal') {
    throw new MalformedInputError(`--zodiac must be tropical or sidereal, got "${zodiac}".`, { zodiac });
  }
  const center = stringFlag(flags, 'center') ?? config.DEFAULT_CENTER;
  if (center !== 'geo' && center !== 'helio') {
    throw new MalformedInputError(`--center must be geo or helio, got "${center}".`, { center });
  }
  const nodeType = stringFlag(flags, 'nodes') ?? config.DEFAULT_NODE_TYPE;
  if (nodeType !== 'true' && nodeType !== 'mean') {
    throw new MalformedInputError(`--nodes must be true or mean, got "${nodeType}".`, { nodeType });
  }
  const frame = stringFlag(flags, 'frame') ?? config.SIDEREAL_FRAME;
  if (!isSiderealFrame(frame)) throw new MalformedInputError(`Unknown sidereal frame "${frame}".`, { frame });

  const tzText = stringFlag(flags, 'tz');
  const timezone: TimezoneSpec = tzText === undefined ? { kind: 'fixed', offsetHours: 0 } : parseTimezoneSpec(tzText);

  log.info('start', { step, zodiac, center });
  const range = ephemerisRange(
    {
      start: civilInstant('start', stringFlag(flags, 'start')),
      end: civilInstant('end', stringFlag(flags, 'end')),
      step,
      timezone,
      zodiac,
      center,
      nodeType,
      includeNodes: !booleanFlag(flags, 'no-nodes'),
      siderealFrame: frame,
      ayanamsaOffset: numberFlag(flags, 'ayanamsa-offset') ?? config.AYANAMSA_EXTRA_OFFSET,
    },
    new AstronomyEngineOracle(),
    log,
  );

  const csv = toCsv(range);
  const out = stringFlag(flags, 'out');
  if (out) {
    writeFileSync(out, csv, 'utf8');
    log.info('written', { path: out, rows: range.rows.length });
  } else {
    process.stdout.write(csv);
  }
}

try {
  main();
} catch (err) {
  log.error('failed', { ...toErrorPayload(err), stack: err instanceof Error ? err.stack : undefined });
  process.exit(1);
}
