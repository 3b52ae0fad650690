// src/lib/time.ts
// Civil date/time + timezone → Moment (Julian Day, UT).
import { DateTime, FixedOffsetZone, IANAZone, type Zone } from 'luxon';
import { MalformedInputError, UnknownTimezoneError } from '@/lib/errors';

export type TimezoneSpec =
  | { kind: 'fixed'; offsetHours: number }   // never DST-adjusted
  | { kind: 'named'; zone: string };         // IANA, e.g. "America/New_York"

export type CivilFields = {
  year: number;   // astronomical numbering: 0 = 1 BC, -1 = 2 BC
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

export type Moment = Readonly<{
  jd: number;
  utc: Readonly<CivilFields & { iso: string }>;
  local: string;          // YYYY-MM-DD HH:MM as entered
  offsetMinutes: number;  // offset in effect at that local time
  zoneLabel: string;
}>;

const DATE_RE = /^([+-]?\d{1,6})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const MAX_OFFSET_HOURS = 18;

function isLeapYear(y: number): boolean {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Parses `[-]YYYY-MM-DD` and `HH:MM[:SS]`, checking calendar ranges. */
export function parseCivil(date: string, time: string): CivilFields {
  const dm = DATE_RE.exec(date.trim());
  const tm = TIME_RE.exec(time.trim());
  if (!dm) throw new MalformedInputError(`Invalid date "${date}"; expected YYYY-MM-DD.`, { date });
  if (!tm) throw new MalformedInputError(`Invalid time "${time}"; expected HH:MM.`, { time });

  const fields: CivilFields = {
    year: Number(dm[1]),
    month: Number(dm[2]),
    day: Number(dm[3]),
    hour: Number(tm[1]),
    minute: Number(tm[2]),
    second: tm[3] === undefined ? 0 : Number(tm[3]),
  };

  const { year, month, day, hour, minute, second } = fields;
  if (month < 1 || month > 12) throw new MalformedInputError(`Month out of range: ${month}.`, fields);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new MalformedInputError(`Day out of range: ${date}.`, fields);
  }
  if (hour > 23 || minute > 59 || second > 59) {
    throw new MalformedInputError(`Time out of range: ${time}.`, fields);
  }
  return fields;
}

/**
 * Julian Day for a proleptic Gregorian date and fractional UT hour
 * (Meeus, Astronomical Algorithms, ch. 7). Valid for negative years.
 */
export function julianDay(year: number, month: number, day: number, hour: number): number {
  let y = year;
  let m = month;
  if (m <= 2) {
    y -= 1;
    m += 12;
  }
  const a = Math.floor(y / 100);
  const b = 2 - a + Math.floor(a / 4);
  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + day + b - 1524.5 + hour / 24;
}

export function fixedOffsetLabel(offsetHours: number): string {
  const sign = offsetHours < 0 ? '-' : '+';
  const totalMinutes = Math.round(Math.abs(offsetHours) * 60);
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  return `UTC${sign}${h}${m ? `:${String(m).padStart(2, '0')}` : ''} (fixed)`;
}

function resolveZone(tz: TimezoneSpec): { zone: Zone; label: string } {
  if (tz.kind === 'fixed') {
    if (!Number.isFinite(tz.offsetHours) || Math.abs(tz.offsetHours) > MAX_OFFSET_HOURS) {
      throw new MalformedInputError(`UTC offset out of range: ${tz.offsetHours}.`, tz);
    }
    return {
      zone: FixedOffsetZone.instance(Math.round(tz.offsetHours * 60)),
      label: fixedOffsetLabel(tz.offsetHours),
    };
  }
  const name = tz.zone.trim();
  if (!name || !IANAZone.isValidZone(name)) throw new UnknownTimezoneError(tz.zone);
  return { zone: IANAZone.create(name), label: name };
}

/** Builds a Moment from a luxon DateTime carrying the zone it was entered in. */
export function momentFromDateTime(dt: DateTime, zoneLabel: string): Moment {
  if (!dt.isValid) {
    throw new MalformedInputError(`Invalid date/time: ${dt.invalidExplanation ?? dt.invalidReason ?? 'unknown'}.`);
  }
  const u = dt.toUTC();
  const hour = u.hour + u.minute / 60 + u.second / 3600;
  const utc = Object.freeze({
    year: u.year,
    month: u.month,
    day: u.day,
    hour: u.hour,
    minute: u.minute,
    second: u.second,
    iso: u.toFormat(u.second === 0 ? "yyyy-LL-dd'T'HH:mm'Z'" : "yyyy-LL-dd'T'HH:mm:ss'Z'"),
  });
  return Object.freeze({
    jd: julianDay(u.year, u.month, u.day, hour),
    utc,
    local: dt.toFormat('yyyy-LL-dd HH:mm'),
    offsetMinutes: dt.offset,
    zoneLabel,
  });
}

/** Attaches the resolved zone (or fixed offset) to the civil fields. */
export function civilToDateTime(fields: CivilFields, tz: TimezoneSpec): { dt: DateTime; label: string } {
  const { zone, label } = resolveZone(tz);
  const dt = DateTime.fromObject(
    {
      year: fields.year,
      month: fields.month,
      day: fields.day,
      hour: fields.hour,
      minute: fields.minute,
      second: fields.second,
    },
    { zone },
  );
  return { dt, label };
}

/** Civil date/time in a zone → Moment. Identical inputs give bit-identical output. */
export function normalizeMoment(date: string, time: string, tz: TimezoneSpec): Moment {
  const fields = parseCivil(date, time);
  const { dt, label } = civilToDateTime(fields, tz);
  return momentFromDateTime(dt, label);
}

/**
 * Reads a timezone from free text: a number (`-5`, `+5.5`) or `UTC±h[:mm]`
 * is a fixed offset, anything else an IANA zone name.
 */
export function parseTimezoneSpec(input: string | number): TimezoneSpec {
  if (typeof input === 'number') return { kind: 'fixed', offsetHours: input };
  const raw = input.trim();
  const num = /^[+-]?\d+(?:\.\d+)?$/.exec(raw);
  if (num) return { kind: 'fixed', offsetHours: Number(raw) };
  const utc = /^UTC([+-])(\d{1,2})(?::(\d{2}))?$/i.exec(raw);
  if (utc) {
    const hours = Number(utc[2]) + (utc[3] ? Number(utc[3]) / 60 : 0);
    return { kind: 'fixed', offsetHours: utc[1] === '-' ? -hours : hours };
  }
  return { kind: 'named', zone: raw };
}
