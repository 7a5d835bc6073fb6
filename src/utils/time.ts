/**
 * Time-zone arithmetic on top of `Intl`, which knows the IANA database but
 * only formats. Offsets are derived by formatting an instant in the zone and
 * reading the wall-clock fields back as UTC.
 */

export interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
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

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function wallClockIn(date: Date, timeZone: string): WallClock {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  return {
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour,
    minute: fields.minute,
    second: fields.second,
  };
}

function wallClockAsUtc(clock: WallClock): number {
  return Date.UTC(clock.year, clock.month - 1, clock.day, clock.hour, clock.minute, clock.second);
}

/** Minutes east of UTC in `timeZone` at `date`. */
export function offsetMinutes(date: Date, timeZone: string): number {
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return Math.round((wallClockAsUtc(wallClockIn(date, timeZone)) - wholeSeconds) / 60000);
}

export function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const mins = String(abs % 60).padStart(2, '0');
  return `${sign}${hours}:${mins}`;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** ISO 8601 local time with offset, e.g. `2024-01-15T21:00:00+09:00`. */
export function toZonedIso(date: Date, timeZone: string): string {
  const c = wallClockIn(date, timeZone);
  const offset = formatOffset(offsetMinutes(date, timeZone));
  return `${pad(c.year, 4)}-${pad(c.month)}-${pad(c.day)}T${pad(c.hour)}:${pad(c.minute)}:${pad(c.second)}${offset}`;
}

/**
 * Instant at which the wall clock in `timeZone` reads `clock`. Inside a DST
 * gap the result lands after the transition; in an overlap it is the earlier
 * of the two instants.
 */
export function zonedToUtc(clock: WallClock, timeZone: string): Date {
  const guess = wallClockAsUtc(clock);
  const firstOffset = offsetMinutes(new Date(guess), timeZone);
  const first = guess - firstOffset * 60000;
  const secondOffset = offsetMinutes(new Date(first), timeZone);
  if (secondOffset === firstOffset) {
    return new Date(first);
  }

  const second = guess - secondOffset * 60000;
  if (offsetMinutes(new Date(second), timeZone) === secondOffset) {
    return new Date(second);
  }
  // Neither candidate reads back as `clock`: the wall time was skipped.
  return new Date(Math.max(first, second));
}

const LOCAL_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

/** Parses `YYYY-MM-DD HH:MM[:SS]` (or with `T`); `null` when malformed. */
export function parseLocalDateTime(value: string): WallClock | null {
  const match = LOCAL_DATETIME.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match;
  const clock: WallClock = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: second ? Number(second) : 0,
  };

  const roundTrip = new Date(wallClockAsUtc(clock));
  if (
    roundTrip.getUTCFullYear() !== clock.year ||
    roundTrip.getUTCMonth() + 1 !== clock.month ||
    roundTrip.getUTCDate() !== clock.day ||
    clock.hour > 23 ||
    clock.minute > 59 ||
    clock.second > 59
  ) {
    return null;
  }
  return clock;
}

/** Whether `timeZone` observes daylight saving time at `date`. */
export function isDaylightSaving(date: Date, timeZone: string): boolean {
  const year = date.getUTCFullYear();
  const january = offsetMinutes(new Date(Date.UTC(year, 0, 1)), timeZone);
  const july = offsetMinutes(new Date(Date.UTC(year, 6, 1)), timeZone);
  if (january === july) {
    return false;
  }
  return offsetMinutes(date, timeZone) === Math.max(january, july);
}

export function timeZoneAbbreviation(date: Date, timeZone: string): string {
  const part = new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'short' })
    .formatToParts(date)
    .find((p) => p.type === 'timeZoneName');
  return part?.value ?? timeZone;
}

export function weekdayIn(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('en-US', { timeZone, weekday: 'long' }).format(date);
}
