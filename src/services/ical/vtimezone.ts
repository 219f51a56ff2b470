// src/services/ical/vtimezone.ts
import { DateTime, IANAZone } from 'luxon';
import { findComponents, firstProperty, type ICalComponent } from './ical-lines.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEKDAYS = ['SU', 'MO', 'TU', 'WE', 'TH', 'FR', 'SA'];

/**
 * UTC offset rules of one time zone. Wall-clock times are carried as the
 * epoch milliseconds of the same fields read as UTC.
 */
export interface ZoneRules {
  readonly name: string;
  /** Minutes east of UTC in force at an instant */
  offsetAt(instant: number): number;
  toUtc(wallTime: number): number;
}

export class IanaZoneRules implements ZoneRules {
  private readonly zone: IANAZone;

  constructor(readonly name: string) {
    this.zone = IANAZone.create(name);
  }

  offsetAt(instant: number): number {
    return this.zone.offset(instant);
  }

  toUtc(wallTime: number): number {
    const wall = DateTime.fromMillis(wallTime, { zone: 'utc' });
    return DateTime.fromObject(
      {
        year: wall.year,
        month: wall.month,
        day: wall.day,
        hour: wall.hour,
        minute: wall.minute,
        second: wall.second,
      },
      { zone: this.zone },
    ).toMillis();
  }
}

interface YearlyRule {
  month: number;
  /** 1 to 5 from the start of the month, -1 to -5 from its end */
  week: number;
  weekday: number;
  until?: number;
}

interface Observance {
  /** Wall-clock onset in the offset it replaces */
  start: number;
  offsetFrom: number;
  offsetTo: number;
  rule?: YearlyRule;
  rdates: number[];
}

/**
 * Offsets defined by an embedded VTIMEZONE: STANDARD and DAYLIGHT observances
 * with a DTSTART and an optional yearly RRULE or RDATE list.
 */
export class VTimezoneRules implements ZoneRules {
  private constructor(
    readonly name: string,
    private readonly observances: Observance[],
  ) {}

  /**
   * Reads a VTIMEZONE; undefined when it has no usable observance
   */
  static fromComponent(component: ICalComponent): VTimezoneRules | undefined {
    const name = firstProperty(component, 'TZID')?.value.trim();
    if (!name) return undefined;

    const observances: Observance[] = [];
    for (const child of component.components) {
      if (child.name !== 'STANDARD' && child.name !== 'DAYLIGHT') continue;
      const observance = parseObservance(child);
      if (observance) observances.push(observance);
    }
    return observances.length > 0 ? new VTimezoneRules(name, observances) : undefined;
  }

  offsetAt(instant: number): number {
    const year = new Date(instant).getUTCFullYear();
    let latest: { onset: number; offset: number } | undefined;

    for (const observance of this.observances) {
      for (const wall of onsets(observance, year)) {
        const onset = wall - observance.offsetFrom * 60_000;
        if (onset <= instant && (!latest || onset > latest.onset)) {
          latest = { onset, offset: observance.offsetTo };
        }
      }
    }
    if (latest) return latest.offset;

    // Before the first onset the earliest observance's previous offset applies
    const earliest = this.observances.reduce((first, current) =>
      current.start < first.start ? current : first,
    );
    return earliest.offsetFrom;
  }

  toUtc(wallTime: number): number {
    const guess = this.offsetAt(wallTime);
    const offset = this.offsetAt(wallTime - guess * 60_000);
    return wallTime - offset * 60_000;
  }
}

/**
 * Collects the VTIMEZONE definitions of a calendar object by TZID
 */
export function zoneTable(root: ICalComponent): Map<string, VTimezoneRules> {
  const zones = new Map<string, VTimezoneRules>();
  for (const component of findComponents(root, ['VTIMEZONE'])) {
    const rules = VTimezoneRules.fromComponent(component);
    if (rules) zones.set(rules.name, rules);
  }
  return zones;
}

/**
 * Parses a basic-format DATE-TIME ("20261020T090000", with or without Z) as a wall time
 */
export function parseWallTime(value: string): number | undefined {
  const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z?$/i.exec(value.trim());
  if (!match) return undefined;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const wall = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(wall);
  const valid =
    check.getUTCFullYear() === year &&
    check.getUTCMonth() === month - 1 &&
    check.getUTCDate() === day &&
    check.getUTCHours() === hour &&
    check.getUTCMinutes() === minute;
  return valid ? wall : undefined;
}

export function formatWallTime(wallTime: number): string {
  return new Date(wallTime)
    .toISOString()
    .replace(/[-:]/g, '')
    .replace(/\.\d{3}Z$/, '');
}

function parseObservance(component: ICalComponent): Observance | undefined {
  const start = parseWallTime(firstProperty(component, 'DTSTART')?.value ?? '');
  const offsetFrom = parseOffset(firstProperty(component, 'TZOFFSETFROM')?.value);
  const offsetTo = parseOffset(firstProperty(component, 'TZOFFSETTO')?.value);
  if (start === undefined || offsetFrom === undefined || offsetTo === undefined) return undefined;

  const rdates: number[] = [];
  for (const property of component.properties) {
    if (property.name !== 'RDATE') continue;
    for (const value of property.value.split(',')) {
      const wall = parseWallTime(value);
      if (wall !== undefined) rdates.push(wall);
    }
  }

  const rrule = firstProperty(component, 'RRULE');
  return {
    start,
    offsetFrom,
    offsetTo,
    rule: rrule ? parseYearlyRule(rrule.value) : undefined,
    rdates,
  };
}

/**
 * "-0400" or "+053000" to minutes east of UTC
 */
function parseOffset(value: string | undefined): number | undefined {
  const match = /^([+-])(\d{2})(\d{2})(\d{2})?$/.exec(value?.trim() ?? '');
  if (!match) return undefined;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

/**
 * Supports the FREQ=YEARLY;BYMONTH=m;BYDAY=nXX form time zone definitions use
 */
function parseYearlyRule(value: string): YearlyRule | undefined {
  const parts = new Map<string, string>();
  for (const part of value.split(';')) {
    const eq = part.indexOf('=');
    if (eq > 0) parts.set(part.slice(0, eq).toUpperCase(), part.slice(eq + 1).toUpperCase());
  }
  if (parts.get('FREQ') !== 'YEARLY') return undefined;

  const month = Number(parts.get('BYMONTH'));
  const byDay = /^([+-]?[1-5])(SU|MO|TU|WE|TH|FR|SA)$/.exec(parts.get('BYDAY') ?? '');
  if (!byDay || !(month >= 1 && month <= 12)) return undefined;

  const until = parts.get('UNTIL');
  return {
    month,
    week: Number(byDay[1]),
    weekday: WEEKDAYS.indexOf(byDay[2]),
    until: until ? (parseWallTime(until) ?? parseWallTime(`${until}T000000`)) : undefined,
  };
}

/**
 * Wall-clock onsets of an observance in the given year and the one before
 */
function onsets(observance: Observance, year: number): number[] {
  const found = [observance.start, ...observance.rdates];
  const { rule } = observance;
  if (!rule) return found;

  const timeOfDay = ((observance.start % DAY_MS) + DAY_MS) % DAY_MS;
  for (const candidateYear of [year - 1, year]) {
    const wall = nthWeekday(candidateYear, rule.month, rule.week, rule.weekday) + timeOfDay;
    if (wall < observance.start) continue;
    if (rule.until !== undefined && wall - observance.offsetFrom * 60_000 > rule.until) continue;
    found.push(wall);
  }
  return found;
}

function nthWeekday(year: number, month: number, week: number, weekday: number): number {
  if (week > 0) {
    const firstWeekday = new Date(Date.UTC(year, month - 1, 1)).getUTCDay();
    const day = 1 + ((weekday - firstWeekday + 7) % 7) + (week - 1) * 7;
    return Date.UTC(year, month - 1, day);
  }
  const last = new Date(Date.UTC(year, month, 0));
  const day = last.getUTCDate() - ((last.getUTCDay() - weekday + 7) % 7) + (week + 1) * 7;
  return Date.UTC(year, month - 1, day);
}
