// src/services/ical/calendar-codec.ts
import { IANAZone } from 'luxon';
import { nanoid } from 'nanoid';
import type {
  CalendarItem,
  CalendarItemDraft,
  EventItem,
  TodoItem,
  TodoStatus,
  WireObject,
} from '../../models/index.js';
import { MalformedCalendarObjectError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import {
  escapeText,
  findComponents,
  firstProperty,
  foldLine,
  parseComponents,
  removeProperties,
  replaceProperty,
  serializeCalendar,
  unescapeText,
  type ICalComponent,
  type ICalProperty,
} from './ical-lines.js';
import {
  formatWallTime,
  IanaZoneRules,
  parseWallTime,
  zoneTable,
  type ZoneRules,
} from './vtimezone.js';

const logger = createLogger('calendar-codec');

const DAY_MS = 24 * 60 * 60 * 1000;

// Control characters would split or corrupt the content line
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

const STATUS_FROM_WIRE = new Map<string, TodoStatus>([
  ['NEEDS-ACTION', 'not-started'],
  ['IN-PROCESS', 'in-progress'],
  ['IN-PROGRESS', 'in-progress'],
  ['COMPLETED', 'completed'],
  ['DONE', 'completed'],
  ['CANCELLED', 'cancelled'],
  ['CANCELED', 'cancelled'],
]);

const STATUS_TO_WIRE: Record<TodoStatus, string> = {
  'not-started': 'NEEDS-ACTION',
  'in-progress': 'IN-PROCESS',
  completed: 'COMPLETED',
  cancelled: 'CANCELLED',
};

export interface CodecOptions {
  /** Zone for floating times and TZIDs that are neither IANA names nor defined in the object */
  defaultZone?: string;
  prodId?: string;
  clock?: () => Date;
  generateUid?: () => string;
}

interface ParsedDate {
  value: Date;
  isDate: boolean;
}

type ZoneTable = Map<string, ZoneRules>;

/**
 * Maps a provider status string to a todo status; anything unknown is not-started
 */
export function parseTodoStatus(value: string | undefined): TodoStatus {
  if (!value) return 'not-started';
  return STATUS_FROM_WIRE.get(value.trim().toUpperCase()) ?? 'not-started';
}

export function formatUtcDateTime(value: Date): string {
  return value
    .toISOString()
    .replace(/[-:]/g, '')
    .replace(/\.\d{3}Z$/, 'Z');
}

export function formatDateValue(value: Date): string {
  return value.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * A todo at 100 percent is completed, whatever status it was given
 */
export function applyCompletionRule(todo: TodoItem): TodoItem {
  if (todo.percentComplete >= 100 && todo.status !== 'completed') {
    return { ...todo, status: 'completed' };
  }
  return todo;
}

/**
 * Encodes calendar items to iCalendar objects and decodes them back
 */
export class CalendarCodec {
  private readonly defaultZone: string;
  private readonly prodId: string;
  private readonly clock: () => Date;
  private readonly generateUid: () => string;

  constructor(options: CodecOptions = {}) {
    this.defaultZone = options.defaultZone ?? 'America/Denver';
    this.prodId = options.prodId ?? '-//mcp-caldav-calendar//EN';
    this.clock = options.clock ?? (() => new Date());
    this.generateUid = options.generateUid ?? (() => nanoid());
  }

  /**
   * Gives a draft its identifier, keeping a caller-supplied one
   */
  materialize(draft: CalendarItemDraft): CalendarItem {
    const uid = draft.uid?.trim() || this.generateUid();
    if (CONTROL_CHARACTERS.test(uid)) {
      throw new MalformedCalendarObjectError('UID must not contain control characters', { uid });
    }
    return draft.type === 'event' ? { ...draft, uid } : applyCompletionRule({ ...draft, uid });
  }

  /**
   * Encodes an item as a VCALENDAR object holding one VEVENT or VTODO
   */
  encode(item: CalendarItem): WireObject {
    const component = item.type === 'event' ? 'VEVENT' : 'VTODO';
    const lines: string[] = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      `PRODID:${this.prodId}`,
      'CALSCALE:GREGORIAN',
      `BEGIN:${component}`,
      `UID:${item.uid}`,
      `DTSTAMP:${formatUtcDateTime(this.clock())}`,
    ];

    if (item.created) lines.push(`CREATED:${formatUtcDateTime(item.created)}`);
    if (item.lastModified) lines.push(`LAST-MODIFIED:${formatUtcDateTime(item.lastModified)}`);

    lines.push(`SUMMARY:${escapeText(item.title)}`);
    if (item.description) lines.push(`DESCRIPTION:${escapeText(item.description)}`);
    if (item.location) lines.push(`LOCATION:${escapeText(item.location)}`);

    if (item.type === 'event') {
      lines.push(this.dateLine('DTSTART', item.start, item.allDay));
      lines.push(this.dateLine('DTEND', item.end, item.allDay));
    } else {
      lines.push(...this.todoLines(applyCompletionRule(item)));
    }

    lines.push(`END:${component}`, 'END:VCALENDAR');

    return { data: lines.map(foldLine).join('\r\n') + '\r\n' };
  }

  /**
   * Decodes a calendar object. Only a missing UID, or a missing/unparsable event
   * start, is fatal; everything else falls back to defaults.
   */
  decode(wire: WireObject, calendarId?: string): CalendarItem {
    const root = parseComponents(wire.data);
    return this.decodeComponent(this.masterOf(root, wire.href), zoneTable(root), wire.href, calendarId);
  }

  /**
   * UID of the object's main component, read without decoding the rest
   */
  uidOf(wire: WireObject): string | undefined {
    const [component] = findComponents(parseComponents(wire.data), ['VEVENT', 'VTODO']);
    return component ? firstProperty(component, 'UID')?.value.trim() : undefined;
  }

  /**
   * Writes an item's fields into a stored object. Only the properties whose
   * value changed are rewritten; every other property, VALARM, VTIMEZONE and
   * recurrence override is carried over as it was.
   */
  patch(wire: WireObject, item: CalendarItem): WireObject {
    const root = parseComponents(wire.data);
    const zones = zoneTable(root);
    const component = this.masterOf(root, wire.href);
    const previous = this.decodeComponent(component, zones, wire.href);
    if (previous.type !== item.type) {
      throw new MalformedCalendarObjectError(`Stored object ${previous.uid} is not a ${item.type}`, {
        href: wire.href,
      });
    }

    const changed: string[] = [];
    const set = (name: string, value: string | undefined): void => {
      changed.push(name);
      if (value === undefined) removeProperties(component, name);
      else replaceProperty(component, { name, params: {}, value });
    };
    const setText = (name: string, next: string | undefined, current: string | undefined): void => {
      const wanted = next === '' ? undefined : next;
      if (wanted !== current) set(name, wanted === undefined ? undefined : escapeText(wanted));
    };
    const setDate = (name: string, next: Date | undefined, current: Date | undefined, allDay: boolean): void => {
      if (!next && !current) return;
      if (sameInstant(next, current) && allDay === previous.allDay) return;
      changed.push(name);
      if (next) this.writeDate(component, zones, name, next, allDay);
      else removeProperties(component, name);
    };

    setText('SUMMARY', item.title, previous.title);
    setText('DESCRIPTION', item.description, previous.description);
    setText('LOCATION', item.location, previous.location);

    if (item.type === 'event' && previous.type === 'event') {
      const startChanged = !sameInstant(item.start, previous.start) || item.allDay !== previous.allDay;
      const endChanged = !sameInstant(item.end, previous.end) || item.allDay !== previous.allDay;
      const hasDuration = firstProperty(component, 'DURATION') !== undefined;
      setDate('DTSTART', item.start, previous.start, item.allDay);
      // A DURATION would carry the old length over to a moved start
      if (endChanged || (startChanged && hasDuration)) {
        changed.push('DTEND');
        removeProperties(component, 'DURATION');
        this.writeDate(component, zones, 'DTEND', item.end, item.allDay);
      }
    } else if (item.type === 'todo' && previous.type === 'todo') {
      const todo = applyCompletionRule(item);
      setDate('DTSTART', todo.start, previous.start, todo.allDay);
      setDate('DUE', todo.due, previous.due, todo.allDay);
      if (todo.status !== previous.status) set('STATUS', STATUS_TO_WIRE[todo.status]);
      if (todo.percentComplete !== previous.percentComplete) {
        set('PERCENT-COMPLETE', String(Math.round(todo.percentComplete)));
      }
      if (todo.priority !== previous.priority) {
        set('PRIORITY', todo.priority ? String(todo.priority) : undefined);
      }
      if (todo.status !== 'completed') {
        if (previous.completedAt) set('COMPLETED', undefined);
      } else if (!previous.completedAt || (todo.completedAt && !sameInstant(todo.completedAt, previous.completedAt))) {
        set('COMPLETED', formatUtcDateTime(todo.completedAt ?? this.clock()));
      }
    }

    const now = formatUtcDateTime(this.clock());
    replaceProperty(component, { name: 'DTSTAMP', params: {}, value: now });
    replaceProperty(component, { name: 'LAST-MODIFIED', params: {}, value: now });
    if (changed.length > 0) {
      const sequence = Number.parseInt(firstProperty(component, 'SEQUENCE')?.value ?? '', 10);
      set('SEQUENCE', String(Number.isNaN(sequence) ? 1 : sequence + 1));
    }

    return { href: wire.href, etag: wire.etag, data: serializeCalendar(root) };
  }

  /**
   * Recurrence overrides share the master's UID; the master is the component without a RECURRENCE-ID
   */
  private masterOf(root: ICalComponent, href: string | undefined): ICalComponent {
    const candidates = findComponents(root, ['VEVENT', 'VTODO']);
    const component =
      candidates.find((candidate) => !firstProperty(candidate, 'RECURRENCE-ID')) ?? candidates[0];

    if (!component) {
      throw new MalformedCalendarObjectError('Calendar object has no VEVENT or VTODO', { href });
    }
    return component;
  }

  /**
   * Only a missing UID, or a missing/unparsable event start, is fatal; everything
   * else falls back to defaults.
   */
  private decodeComponent(
    component: ICalComponent,
    zones: ZoneTable,
    href: string | undefined,
    calendarId?: string,
  ): CalendarItem {
    const uid = firstProperty(component, 'UID')?.value.trim();
    if (!uid) {
      throw new MalformedCalendarObjectError('Calendar object is missing its UID', { href });
    }

    const summary = firstProperty(component, 'SUMMARY');
    const base = {
      uid,
      calendarId,
      title: summary ? unescapeText(summary.value) : 'Untitled',
      description: this.optionalText(component, 'DESCRIPTION'),
      location: this.optionalText(component, 'LOCATION'),
      created: this.optionalDate(component, 'CREATED', zones)?.value,
      lastModified: this.optionalDate(component, 'LAST-MODIFIED', zones)?.value,
    };

    if (component.name === 'VEVENT') {
      return this.decodeEvent(component, zones, base, href);
    }
    return this.decodeTodo(component, zones, base);
  }

  private decodeEvent(
    component: ICalComponent,
    zones: ZoneTable,
    base: Omit<EventItem, 'type' | 'start' | 'end' | 'allDay'>,
    href: string | undefined,
  ): EventItem {
    const start = this.optionalDate(component, 'DTSTART', zones);
    if (!start) {
      throw new MalformedCalendarObjectError(`Event ${base.uid} has no parsable DTSTART`, {
        href,
      });
    }

    let end = this.optionalDate(component, 'DTEND', zones)?.value;
    if (!end) {
      const duration = firstProperty(component, 'DURATION');
      const durationMs = duration ? parseDuration(duration.value) : undefined;
      if (durationMs !== undefined) {
        end = new Date(start.value.getTime() + durationMs);
      } else {
        end = new Date(start.value.getTime() + (start.isDate ? DAY_MS : 0));
      }
    }

    return { ...base, type: 'event', start: start.value, end, allDay: start.isDate };
  }

  private decodeTodo(
    component: ICalComponent,
    zones: ZoneTable,
    base: Omit<TodoItem, 'type' | 'status' | 'percentComplete' | 'allDay'>,
  ): TodoItem {
    const start = this.optionalDate(component, 'DTSTART', zones);
    const due = this.optionalDate(component, 'DUE', zones);
    const percent = Number.parseInt(firstProperty(component, 'PERCENT-COMPLETE')?.value ?? '', 10);
    const priority = Number.parseInt(firstProperty(component, 'PRIORITY')?.value ?? '', 10);

    return applyCompletionRule({
      ...base,
      type: 'todo',
      start: start?.value,
      due: due?.value,
      allDay: (due ?? start)?.isDate ?? false,
      status: parseTodoStatus(firstProperty(component, 'STATUS')?.value),
      percentComplete: Number.isNaN(percent) ? 0 : Math.min(100, Math.max(0, percent)),
      priority: priority >= 1 && priority <= 9 ? priority : undefined,
      completedAt: this.optionalDate(component, 'COMPLETED', zones)?.value,
    });
  }

  private todoLines(todo: TodoItem): string[] {
    const lines: string[] = [];
    if (todo.start) lines.push(this.dateLine('DTSTART', todo.start, todo.allDay));
    if (todo.due) lines.push(this.dateLine('DUE', todo.due, todo.allDay));
    lines.push(`STATUS:${STATUS_TO_WIRE[todo.status]}`);
    lines.push(`PERCENT-COMPLETE:${Math.round(todo.percentComplete)}`);
    if (todo.priority) lines.push(`PRIORITY:${todo.priority}`);
    if (todo.status === 'completed') {
      lines.push(`COMPLETED:${formatUtcDateTime(todo.completedAt ?? this.clock())}`);
    }
    return lines;
  }

  private dateLine(name: string, value: Date, allDay: boolean): string {
    return allDay
      ? `${name};VALUE=DATE:${formatDateValue(value)}`
      : `${name}:${formatUtcDateTime(value)}`;
  }

  private optionalText(component: ICalComponent, name: string): string | undefined {
    const property = firstProperty(component, name);
    return property && property.value !== '' ? unescapeText(property.value) : undefined;
  }

  private optionalDate(component: ICalComponent, name: string, zones: ZoneTable): ParsedDate | undefined {
    const property = firstProperty(component, name);
    return property ? this.parseDate(property, zones) : undefined;
  }

  /**
   * Parses DATE and DATE-TIME values; local times with a TZID are converted to UTC
   */
  private parseDate(property: ICalProperty, zones: ZoneTable): ParsedDate | undefined {
    const value = property.value.trim();

    const date = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
    if (date) {
      return {
        value: new Date(Date.UTC(Number(date[1]), Number(date[2]) - 1, Number(date[3]))),
        isDate: true,
      };
    }

    const wall = parseWallTime(value);
    if (wall === undefined) return undefined;
    if (/z$/i.test(value)) return { value: new Date(wall), isDate: false };

    const tzid = property.params.TZID;
    const rules = (tzid ? this.lookupZone(tzid, zones) : undefined) ?? this.fallbackZone(tzid);
    return { value: new Date(rules.toUtc(wall)), isDate: false };
  }

  /**
   * IANA names first, then vendor-prefixed IANA names, then the object's own VTIMEZONE
   */
  private lookupZone(tzid: string, zones: ZoneTable): ZoneRules | undefined {
    if (IANAZone.isValidZone(tzid)) return new IanaZoneRules(tzid);

    // Some producers prefix the zone with a vendor path, e.g. /mozilla.org/20050126_1/America/New_York
    const tail = tzid.split('/').filter(Boolean).slice(-2).join('/');
    if (IANAZone.isValidZone(tail)) return new IanaZoneRules(tail);

    return zones.get(tzid);
  }

  private fallbackZone(tzid: string | undefined): ZoneRules {
    if (tzid) logger.debug(`Unknown TZID '${tzid}', using ${this.defaultZone}`);
    return new IanaZoneRules(this.defaultZone);
  }

  /**
   * Writes a changed date, keeping the zone the stored property was written in
   */
  private writeDate(component: ICalComponent, zones: ZoneTable, name: string, value: Date, allDay: boolean): void {
    if (allDay) {
      replaceProperty(component, { name, params: { VALUE: 'DATE' }, value: formatDateValue(value) });
      return;
    }

    const tzid = firstProperty(component, name)?.params.TZID;
    const rules = tzid ? this.lookupZone(tzid, zones) : undefined;
    if (tzid && rules) {
      const wall = value.getTime() + rules.offsetAt(value.getTime()) * 60_000;
      replaceProperty(component, { name, params: { TZID: tzid }, value: formatWallTime(wall) });
      return;
    }
    replaceProperty(component, { name, params: {}, value: formatUtcDateTime(value) });
  }
}

function sameInstant(a: Date | undefined, b: Date | undefined): boolean {
  return a?.getTime() === b?.getTime();
}

/**
 * Parses an RFC 5545 duration ("PT30M", "P1D", "-PT15M") into milliseconds
 */
export function parseDuration(value: string): number | undefined {
  const match =
    /^([+-])?P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/i.exec(value.trim());
  if (!match) return undefined;

  const [, sign, weeks, days, hours, minutes, seconds] = match;
  const total =
    Number(weeks ?? 0) * 7 * DAY_MS +
    Number(days ?? 0) * DAY_MS +
    Number(hours ?? 0) * 3_600_000 +
    Number(minutes ?? 0) * 60_000 +
    Number(seconds ?? 0) * 1000;
  return sign === '-' ? -total : total;
}
