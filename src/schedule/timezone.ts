/**
 * Wall-clock arithmetic in an IANA zone on top of Intl.DateTimeFormat.
 *
 * Slots are civil times ("Monday 07:00 in America/New_York"), so every
 * computation goes through the zone's calendar rather than UTC offsets.
 */

/** Calendar date in the configured zone. Month is 1-based. */
export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

export interface ZonedParts extends CivilDate, TimeOfDay {
  /** 0 = Monday .. 6 = Sunday */
  weekday: number;
}

const WEEKDAY_INDEX: Record<string, number> = {
  Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6,
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      weekday: 'short',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const values: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    values[part.type] = part.value;
  }
  return {
    year: Number(values.year),
    month: Number(values.month),
    day: Number(values.day),
    hour: Number(values.hour) % 24,
    minute: Number(values.minute),
    second: Number(values.second),
    weekday: WEEKDAY_INDEX[values.weekday] ?? 0,
  };
}

/** Offset of `timeZone` from UTC at `date`, in minutes (east positive). */
export function zoneOffsetMinutes(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = Math.floor(date.getTime() / 1000) * 1000;
  return Math.round((asUtc - truncated) / 60000);
}

/**
 * The instant at which the zone's wall clock reads `civil` + `time`.
 * Wall times skipped by a DST jump move forward by the size of the jump
 * (02:30 on a spring-forward night becomes 03:30).
 */
export function zonedTimeToUtc(civil: CivilDate, time: TimeOfDay, timeZone: string): Date {
  const guess = Date.UTC(civil.year, civil.month - 1, civil.day, time.hour, time.minute, time.second);
  const firstOffset = zoneOffsetMinutes(new Date(guess), timeZone);
  const first = guess - firstOffset * 60000;
  const secondOffset = zoneOffsetMinutes(new Date(first), timeZone);
  if (secondOffset === firstOffset) {
    return new Date(first);
  }
  const second = guess - secondOffset * 60000;
  if (zoneOffsetMinutes(new Date(second), timeZone) === secondOffset) {
    return new Date(second);
  }
  return new Date(Math.max(first, second));
}

function pad(value: number, width = 2): string {
  return String(Math.abs(value)).padStart(width, '0');
}

/** ISO-8601 with the zone's offset, e.g. "2026-10-19T07:00:00-04:00". */
export function formatIsoInZone(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  const offset = zoneOffsetMinutes(date, timeZone);
  const sign = offset < 0 ? '-' : '+';
  const offsetText = `${sign}${pad(Math.trunc(Math.abs(offset) / 60))}:${pad(Math.abs(offset) % 60)}`;
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}${offsetText}`;
}

/** "2026-10-19 07:00" in the zone, for operator output. */
export function formatLocal(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

function isValidCivil(civil: CivilDate): boolean {
  if (civil.month < 1 || civil.month > 12 || civil.day < 1) return false;
  const check = new Date(Date.UTC(civil.year, civil.month - 1, civil.day));
  return check.getUTCFullYear() === civil.year
    && check.getUTCMonth() === civil.month - 1
    && check.getUTCDate() === civil.day;
}

/**
 * Parse an ISO-8601 timestamp. One without an offset is read as wall time
 * in `timeZone`. Returns null when the text is not a valid timestamp.
 */
export function parseScheduleTime(text: string, timeZone: string): Date | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) return null;

  const civil: CivilDate = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  const time: TimeOfDay = {
    hour: Number(match[4] ?? 0),
    minute: Number(match[5] ?? 0),
    second: Number(match[6] ?? 0),
  };
  if (!isValidCivil(civil) || time.hour > 23 || time.minute > 59 || time.second > 59) {
    return null;
  }

  const zone = match[7];
  if (zone === undefined) {
    return zonedTimeToUtc(civil, time, timeZone);
  }

  let offsetMinutes = 0;
  if (zone.toUpperCase() !== 'Z') {
    const digits = zone.slice(1).replace(':', '');
    const hours = Number(digits.slice(0, 2));
    const minutes = Number(digits.slice(2, 4));
    if (hours > 23 || minutes > 59) return null;
    offsetMinutes = (zone.startsWith('-') ? -1 : 1) * (hours * 60 + minutes);
  }
  const utc = Date.UTC(civil.year, civil.month - 1, civil.day, time.hour, time.minute, time.second);
  return new Date(utc - offsetMinutes * 60000);
}

export function addDays(civil: CivilDate, days: number): CivilDate {
  const shifted = new Date(Date.UTC(civil.year, civil.month - 1, civil.day + days));
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

/** 0 = Monday .. 6 = Sunday */
export function weekdayOf(civil: CivilDate): number {
  return (new Date(Date.UTC(civil.year, civil.month - 1, civil.day)).getUTCDay() + 6) % 7;
}

export function civilDateOf(date: Date, timeZone: string): CivilDate {
  const { year, month, day } = zonedParts(date, timeZone);
  return { year, month, day };
}
