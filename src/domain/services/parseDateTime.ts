/** A recognized date, normalized to a UTC instant. */
export interface ParsedDateTime {
  readonly value: Date;
  /** Whether the source carried a time of day. */
  readonly hasTime: boolean;
  /** Name of the rule that recognized the value. */
  readonly format: DateFormatName;
}

export type DateFormatName =
  | 'iso-date'
  | 'iso-date-time'
  | 'year-slash-month-day'
  | 'month-day-year'
  | 'day-month-year'
  | 'spreadsheet-serial';

interface DateRule {
  readonly name: DateFormatName;
  readonly pattern: RegExp;
  readonly build: (match: RegExpExecArray) => ParsedDateTime | null;
}

const MS_PER_DAY = 86_400_000;
/** Day zero of spreadsheet serial dates (1900 date system, including the 1900 leap-year quirk). */
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
/** Serial number of 9999-12-31. */
const MAX_SERIAL = 2_958_465;

/**
 * Text rules tried in priority order. The first rule whose pattern matches
 * decides; a calendar-invalid match (e.g. `2024-02-30`) fails outright.
 */
const TEXT_RULES: readonly DateRule[] = [
  {
    name: 'iso-date',
    pattern: /^(\d{4})-(\d{2})-(\d{2})$/,
    build: (m) => calendarDate('iso-date', m[1], m[2], m[3]),
  },
  {
    name: 'iso-date-time',
    pattern: /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i,
    build: (m) => isoDateTime(m),
  },
  {
    name: 'year-slash-month-day',
    pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/,
    build: (m) => calendarDate('year-slash-month-day', m[1], m[2], m[3]),
  },
  {
    name: 'month-day-year',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    build: (m) => calendarDate('month-day-year', m[3], m[1], m[2]),
  },
  {
    name: 'day-month-year',
    pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    build: (m) => calendarDate('day-month-year', m[3], m[2], m[1]),
  },
];

/**
 * Recognize a date in text: ISO 8601 date, ISO 8601 date-time, `YYYY/MM/DD`,
 * `MM/DD/YYYY`, `DD-MM-YYYY`, tried in that order.
 *
 * Date-times without an offset are read as UTC.
 */
export function parseDateText(text: string): ParsedDateTime | null {
  const trimmed = text.trim();

  for (const rule of TEXT_RULES) {
    const match = rule.pattern.exec(trimmed);
    if (match) return rule.build(match);
  }

  return null;
}

/**
 * Convert a spreadsheet serial date (days since 1899-12-30; the fraction is
 * the time of day) into a UTC instant, rounded to the second.
 */
export function parseSerialDate(serial: number): ParsedDateTime | null {
  if (!Number.isFinite(serial) || serial < 0 || serial >= MAX_SERIAL + 1) return null;

  let days = Math.floor(serial);
  let seconds = Math.round((serial - days) * 86_400);
  if (seconds === 86_400) {
    days += 1;
    seconds = 0;
  }
  const value = new Date(SERIAL_EPOCH_MS + days * MS_PER_DAY + seconds * 1000);

  return { value, hasTime: seconds !== 0, format: 'spreadsheet-serial' };
}

/** Whether a native `Date` carries a non-midnight UTC time of day. */
export function hasTimeOfDay(date: Date): boolean {
  return date.getTime() % MS_PER_DAY !== 0;
}

function calendarDate(
  format: DateFormatName,
  year: string | undefined,
  month: string | undefined,
  day: string | undefined,
): ParsedDateTime | null {
  const value = utcDate(Number(year), Number(month), Number(day));
  return value ? { value, hasTime: false, format } : null;
}

function isoDateTime(m: RegExpExecArray): ParsedDateTime | null {
  const [, year, month, day, hour, minute, second = '0', fraction = '', offset] = m;
  const date = utcDate(Number(year), Number(month), Number(day));
  if (!date) return null;

  const h = Number(hour);
  const min = Number(minute);
  const s = Number(second);
  if (h > 23 || min > 59 || s > 59) return null;

  const ms = fraction === '' ? 0 : Math.round(Number(`0.${fraction}`) * 1000);
  const local = date.getTime() + ((h * 60 + min) * 60 + s) * 1000 + ms;
  const offsetMinutes = parseOffset(offset);
  if (offsetMinutes === null) return null;

  return { value: new Date(local - offsetMinutes * 60_000), hasTime: true, format: 'iso-date-time' };
}

function parseOffset(offset: string | undefined): number | null {
  if (offset === undefined || offset.toUpperCase() === 'Z') return 0;
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(offset);
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 23 || minutes > 59) return null;
  return (match[1] === '-' ? -1 : 1) * (hours * 60 + minutes);
}

function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 to 1900-1999.
  date.setUTCFullYear(year);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}
