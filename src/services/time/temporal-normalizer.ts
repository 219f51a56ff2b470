// src/services/time/temporal-normalizer.ts
import { DateTime, IANAZone } from 'luxon';
import { InvalidTimeFormatError } from '../../utils/errors.js';

/**
 * Calendar date without a time of day
 */
export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

export interface LocalTime {
  hour: number;
  minute: number;
}

/**
 * Result of resolving a date/time expression.
 * `instant` carries a UTC instant; `date` is an all-day point stored as UTC midnight.
 */
export type ResolvedTime =
  | { kind: 'instant'; value: Date; localDate: LocalDate }
  | { kind: 'date'; value: Date; localDate: LocalDate };

export interface ResolveInput {
  date: string;
  time?: string;
  /** Reference instant for relative expressions such as "tomorrow" */
  now: Date;
}

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{1,2}:\d{2})(?::\d{2})?$/;
const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const RELATIVE = /^in\s+(\d+)\s+(day|days|week|weeks)$/;
const WEEKDAY = /^(?:(?:next|this|on)\s+)?(monday|tuesday|wednesday|thursday|friday|saturday|sunday)$/;
const CLOCK_24 = /^(\d{1,2}):(\d{2})$/;
const CLOCK_12 = /^(\d{1,2})(?::(\d{2}))?\s*([ap])\.?m\.?$/;

export function formatLocalDate(date: LocalDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${date.year}-${mm}-${dd}`;
}

/**
 * Normalizes a 4-digit military time ("1400") to "HH:MM"
 */
export function normalizeMilitaryTime(value: string): string {
  if (!/^\d{4}$/.test(value)) {
    throw new InvalidTimeFormatError(`Military time must be exactly 4 digits: '${value}'`);
  }
  const hour = Number(value.slice(0, 2));
  const minute = Number(value.slice(2));
  if (hour > 23 || minute > 59) {
    throw new InvalidTimeFormatError(`Military time out of range: '${value}'`);
  }
  return `${value.slice(0, 2)}:${value.slice(2)}`;
}

/**
 * Parses a time-of-day expression: "1400", "14:00", "2 pm", "2:30pm", "noon", "midnight"
 */
export function parseTimeOfDay(expression: string): LocalTime {
  const value = expression.trim().toLowerCase();

  if (value === 'noon') return { hour: 12, minute: 0 };
  if (value === 'midnight') return { hour: 0, minute: 0 };

  // Any all-digit string is treated as military time
  const clock = /^\d+$/.test(value) ? normalizeMilitaryTime(value) : value;

  const match24 = CLOCK_24.exec(clock);
  if (match24) {
    const hour = Number(match24[1]);
    const minute = Number(match24[2]);
    if (hour > 23 || minute > 59) {
      throw new InvalidTimeFormatError(`Time out of range: '${expression}'`);
    }
    return { hour, minute };
  }

  const match12 = CLOCK_12.exec(clock);
  if (match12) {
    const rawHour = Number(match12[1]);
    const minute = match12[2] ? Number(match12[2]) : 0;
    if (rawHour < 1 || rawHour > 12 || minute > 59) {
      throw new InvalidTimeFormatError(`Time out of range: '${expression}'`);
    }
    const pm = match12[3] === 'p';
    const hour = (rawHour % 12) + (pm ? 12 : 0);
    return { hour, minute };
  }

  throw new InvalidTimeFormatError(`Unrecognized time expression: '${expression}'`);
}

/**
 * Turns loose date/time input into UTC using a single named zone.
 *
 * The offset applied to a date is the one in effect at local midnight of that
 * date, and it is used for every time on that date. On a transition day this
 * means times after the switch keep the pre-switch offset.
 */
export class TemporalNormalizer {
  readonly zone: string;

  constructor(zone = 'America/Denver') {
    if (!IANAZone.isValidZone(zone)) {
      throw new Error(`Unknown time zone: ${zone}`);
    }
    this.zone = zone;
  }

  /**
   * Resolves a date expression, plus an optional time, to an instant or an all-day date
   */
  resolve(input: ResolveInput): ResolvedTime {
    const dateExpression = input.date.trim();

    if (ISO_WITH_OFFSET.test(dateExpression) && !input.time) {
      const absolute = DateTime.fromISO(dateExpression, { setZone: true });
      if (!absolute.isValid) {
        throw new InvalidTimeFormatError(`Invalid date-time: '${input.date}'`);
      }
      const instant = absolute.toJSDate();
      return { kind: 'instant', value: instant, localDate: this.localDateOf(instant) };
    }

    let timeExpression = input.time?.trim();
    let datePart = dateExpression;
    const combined = ISO_DATE_TIME.exec(dateExpression);
    if (combined) {
      datePart = combined[1];
      timeExpression = timeExpression || combined[2];
    }

    const localDate = this.resolveDate(datePart, input.now);

    if (!timeExpression) {
      return { kind: 'date', value: this.dateValue(localDate), localDate };
    }

    const time = parseTimeOfDay(timeExpression);
    return { kind: 'instant', value: this.toUtc(localDate, time), localDate };
  }

  /**
   * Resolves a date expression against the zone-local date of `now`
   */
  resolveDate(expression: string, now: Date): LocalDate {
    const value = expression.trim().toLowerCase().replace(/\s+/g, ' ');
    const today = DateTime.fromJSDate(now, { zone: this.zone }).startOf('day');

    const fromToday = (days: number): LocalDate => toLocalDate(today.plus({ days }));

    switch (value) {
      case 'today':
      case 'now':
        return fromToday(0);
      case 'tomorrow':
        return fromToday(1);
      case 'yesterday':
        return fromToday(-1);
      case 'next week':
        return fromToday(7);
    }

    const relative = RELATIVE.exec(value);
    if (relative) {
      const amount = Number(relative[1]);
      return fromToday(relative[2].startsWith('week') ? amount * 7 : amount);
    }

    const weekday = WEEKDAY.exec(value);
    if (weekday) {
      const target = WEEKDAYS.indexOf(weekday[1]) + 1;
      const ahead = (target - today.weekday + 7) % 7 || 7;
      return fromToday(ahead);
    }

    const iso = ISO_DATE.exec(value);
    if (iso) {
      return this.checkedDate(Number(iso[1]), Number(iso[2]), Number(iso[3]), expression);
    }

    const us = US_DATE.exec(value);
    if (us) {
      return this.checkedDate(Number(us[3]), Number(us[1]), Number(us[2]), expression);
    }

    throw new InvalidTimeFormatError(`Unrecognized date expression: '${expression}'`);
  }

  /**
   * UTC offset in minutes in effect at local midnight of the given date
   */
  offsetMinutes(date: LocalDate): number {
    return DateTime.fromObject({ ...date, hour: 0 }, { zone: this.zone }).offset;
  }

  /**
   * Converts a local wall-clock time on a date to a UTC instant
   */
  toUtc(date: LocalDate, time: LocalTime): Date {
    const wallClock = Date.UTC(date.year, date.month - 1, date.day, time.hour, time.minute);
    return new Date(wallClock - this.offsetMinutes(date) * 60_000);
  }

  /**
   * Inverse of toUtc for the same date
   */
  toLocal(instant: Date, date: LocalDate): LocalTime {
    const shifted = new Date(instant.getTime() + this.offsetMinutes(date) * 60_000);
    return { hour: shifted.getUTCHours(), minute: shifted.getUTCMinutes() };
  }

  /**
   * Zone-local calendar date of an instant
   */
  localDateOf(instant: Date): LocalDate {
    return toLocalDate(DateTime.fromJSDate(instant, { zone: this.zone }));
  }

  /**
   * UTC instant of local midnight on the given date
   */
  startOfDay(date: LocalDate): Date {
    return this.toUtc(date, { hour: 0, minute: 0 });
  }

  addDays(date: LocalDate, days: number): LocalDate {
    return toLocalDate(DateTime.fromObject(date, { zone: 'utc' }).plus({ days }));
  }

  /**
   * All-day dates are carried as UTC midnight
   */
  dateValue(date: LocalDate): Date {
    return new Date(Date.UTC(date.year, date.month - 1, date.day));
  }

  private checkedDate(year: number, month: number, day: number, expression: string): LocalDate {
    const candidate = DateTime.fromObject({ year, month, day }, { zone: 'utc' });
    if (!candidate.isValid) {
      throw new InvalidTimeFormatError(`Invalid calendar date: '${expression}'`);
    }
    return { year, month, day };
  }
}

function toLocalDate(value: DateTime): LocalDate {
  return { year: value.year, month: value.month, day: value.day };
}
