// scripts/print-chart.ts
/* Prints a chart snapshot as JSON (with its wheel layout under --wheel), or
   the aspect grid as a table.

   Usage:
     tsx scripts/print-chart.ts --date 1962-07-02 --time 23:33 --tz -5 \
       [--lat 40.71 --lon -74.0] [--house E|P|equal-mid] [--zodiac sidereal] \
       [--center helio] [--nodes mean] [--no-nodes] [--orb 6] [--orb-list 8,5,6,6,8] \
       [--frame lahiri] [--ayanamsa-offset 0] [--grid] [--wheel]
*/

import 'dotenv/config';
import { aspectGrid } from '@/lib/aspects';
import { computeChart, longitudeIn } from '@/lib/chart';
import { booleanFlag, numberFlag, parseFlags, stringFlag } from '@/lib/cli';
import { loadConfig } from '@/lib/config';
import { toErrorPayload } from '@/lib/errors';
import { buildWheelLayout } from '@/lib/graphics/wheel';
import { createLogger } from '@/lib/log';
import { resolveZoneOrDefault, zoneForCoordinates } from '@/lib/time/resolveTz';
import { parseTimezoneSpec } from '@/lib/time';

const config = loadConfig();
const log = createLogger('print-chart', config.LOG_LEVEL);

function main() {
  const flags = parseFlags(process.argv.slice(2));
  const date = stringFlag(flags, 'date') ?? '1962-07-02';
  const time = stringFlag(flags, 'time') ?? '23:33';
  const latitude = numberFlag(flags, 'lat');
  const longitude = numberFlag(flags, 'lon');

  // --tz wins; otherwise the zone at the coordinates; otherwise the configured fixed offset
  const tzText = stringFlag(flags, 'tz');
  let timezone = tzText === undefined ? undefined : parseTimezoneSpec(tzText);
  if (timezone === undefined && latitude !== undefined && longitude !== undefined) {
    timezone = { kind: 'named', zone: zoneForCoordinates(latitude, longitude) };
  }
  if (timezone?.kind === 'named') {
    const resolved = resolveZoneOrDefault(timezone, config.DEFAULT_TZ);
    if (resolved.fallbackApplied) log.warn('timezone.fallback', { requested: timezone.zone, used: config.DEFAULT_TZ });
    timezone = resolved.spec;
  }

  const snapshot = computeChart(
    {
      date,
      time,
      timezone,
      latitude,
      longitude,
      houseSystem: stringFlag(flags, 'house'),
      zodiac: stringFlag(flags, 'zodiac'),
      center: stringFlag(flags, 'center'),
      nodeType: stringFlag(flags, 'nodes'),
      includeNodes: !booleanFlag(flags, 'no-nodes'),
      siderealFrame: stringFlag(flags, 'frame'),
      ayanamsaOffset: numberFlag(flags, 'ayanamsa-offset'),
      orb: numberFlag(flags, 'orb'),
      orbList: stringFlag(flags, 'orb-list'),
    },
    { config, logger: log },
  );

  if (booleanFlag(flags, 'grid')) {
    const grid = aspectGrid(
      snapshot.positions.map((p) => p.label),
      snapshot.positions.map((p) => longitudeIn(p, snapshot.zodiac)),
      snapshot.aspectTable,
    );
    const width = Math.max(...grid.names.map((n) => n.length), 9);
    const pad = (s: string) => s.padEnd(width);
    console.log([pad(''), ...grid.names.map(pad)].join(' '));
    grid.rows.forEach((row, i) => console.log([pad(grid.names[i]), ...row.map(pad)].join(' ')));
    return;
  }

  const output = booleanFlag(flags, 'wheel') ? { snapshot, wheel: buildWheelLayout(snapshot) } : snapshot;
  console.log(JSON.stringify(output, null, 2));
}

try {
  main();
} catch (err) {
  log.error('failed', { ...toErrorPayload(err), stack: err instanceof Error ? err.stack : undefined });
  process.exit(1);
}
