import { describe, it, expect } from 'vitest';
import {
  applyCompletionRule,
  CalendarCodec,
  parseDuration,
  parseTodoStatus,
} from '../src/services/ical/calendar-codec.js';
import { foldLine, unfoldLines } from '../src/services/ical/ical-lines.js';
import type { CalendarItem, EventItem, TodoItem } from '../src/models/index.js';
import { MalformedCalendarObjectError } from '../src/utils/errors.js';
import { ics } from './helpers/fake-dav.js';
import { EXCHANGE_ZONE, WEEKLY_MEETING, WEEKLY_OVERRIDE } from './helpers/fixtures.js';

function asEvent(item: CalendarItem): EventItem {
  if (item.type !== 'event') throw new Error(`expected an event, got a ${item.type}`);
  return item;
}

const CLOCK = new Date('2026-10-19T16:00:00Z');

function createCodec(): CalendarCodec {
  let counter = 0;
  return new CalendarCodec({
    defaultZone: 'America/Denver',
    clock: () => CLOCK,
    generateUid: () => `generated-${++counter}`,
  });
}

const teamSync: EventItem = {
  type: 'event',
  uid: 'evt-team-sync',
  title: 'Team Sync',
  description: 'Agenda: status, blockers; next steps\nBring notes',
  location: 'Room 4, second floor',
  start: new Date('2026-10-20T20:00:00Z'),
  end: new Date('2026-10-20T20:30:00Z'),
  allDay: false,
};

describe('CalendarCodec.encode', () => {
  it('writes a VCALENDAR with UTC times and CRLF line endings', () => {
    const { data } = createCodec().encode(teamSync);
    const lines = data.split('\r\n');

    expect(lines[0]).toBe('BEGIN:VCALENDAR');
    expect(lines).toContain('VERSION:2.0');
    expect(lines).toContain('BEGIN:VEVENT');
    expect(lines).toContain('UID:evt-team-sync');
    expect(lines).toContain('DTSTAMP:20261019T160000Z');
    expect(lines).toContain('DTSTART:20261020T200000Z');
    expect(lines).toContain('DTEND:20261020T203000Z');
    expect(lines).toContain('LOCATION:Room 4\\, second floor');
    expect(data.endsWith('END:VEVENT\r\nEND:VCALENDAR\r\n')).toBe(true);
  });

  it('writes all-day dates as DATE values', () => {
    const { data } = createCodec().encode({
      ...teamSync,
      start: new Date('2026-12-24T00:00:00Z'),
      end: new Date('2026-12-25T00:00:00Z'),
      allDay: true,
    });

    expect(data).toContain('DTSTART;VALUE=DATE:20261224\r\n');
    expect(data).toContain('DTEND;VALUE=DATE:20261225\r\n');
  });

  it('stamps completion on completed todos', () => {
    const todo: TodoItem = {
      type: 'todo',
      uid: 'todo-1',
      title: 'File report',
      allDay: false,
      status: 'completed',
      percentComplete: 100,
    };
    const { data } = createCodec().encode(todo);

    expect(data).toContain('BEGIN:VTODO\r\n');
    expect(data).toContain('STATUS:COMPLETED\r\n');
    expect(data).toContain('PERCENT-COMPLETE:100\r\n');
    expect(data).toContain('COMPLETED:20261019T160000Z\r\n');
  });
});

describe('CalendarCodec.decode', () => {
  it('reads back what it writes', () => {
    const codec = createCodec();
    const decoded = codec.decode(codec.encode(teamSync), 'work');

    expect(decoded).toMatchObject({ ...teamSync, calendarId: 'work' });
  });

  it('reads back todos with due dates and priority', () => {
    const codec = createCodec();
    const todo: TodoItem = {
      type: 'todo',
      uid: 'todo-2',
      title: 'Review report',
      due: new Date('2026-10-23T00:00:00Z'),
      allDay: true,
      status: 'in-progress',
      percentComplete: 40,
      priority: 2,
    };

    expect(codec.decode(codec.encode(todo))).toMatchObject(todo);
  });

  it('converts TZID-qualified times to UTC', () => {
    const data = ics('VEVENT', [
      'UID:tz-1',
      'SUMMARY:Call',
      'DTSTART;TZID=America/New_York:20261020T090000',
      'DURATION:PT45M',
    ]);
    const decoded = createCodec().decode({ data });

    expect(decoded.type).toBe('event');
    if (decoded.type !== 'event') return;
    expect(decoded.start.toISOString()).toBe('2026-10-20T13:00:00.000Z');
    expect(decoded.end.toISOString()).toBe('2026-10-20T13:45:00.000Z');
    expect(decoded.allDay).toBe(false);
  });

  it('accepts vendor-prefixed TZIDs', () => {
    const data = ics('VEVENT', [
      'UID:tz-2',
      'SUMMARY:Call',
      'DTSTART;TZID="/mozilla.org/20050126_1/America/New_York":20261020T090000',
      'DTEND;TZID="/mozilla.org/20050126_1/America/New_York":20261020T100000',
    ]);
    const decoded = createCodec().decode({ data });

    expect(decoded.type === 'event' && decoded.end.toISOString()).toBe('2026-10-20T14:00:00.000Z');
  });

  it('reads floating times in the default zone', () => {
    const data = ics('VEVENT', ['UID:float-1', 'SUMMARY:Standup', 'DTSTART:20261020T090000']);
    const decoded = createCodec().decode({ data });

    expect(decoded.type === 'event' && decoded.start.toISOString()).toBe('2026-10-20T15:00:00.000Z');
    // No DTEND or DURATION: zero length
    expect(decoded.type === 'event' && decoded.end.toISOString()).toBe('2026-10-20T15:00:00.000Z');
  });

  it('gives an all-day event without an end a length of one day', () => {
    const data = ics('VEVENT', ['UID:day-1', 'SUMMARY:Holiday', 'DTSTART;VALUE=DATE:20261224']);
    const decoded = createCodec().decode({ data });

    expect(decoded).toMatchObject({ allDay: true, title: 'Holiday' });
    expect(decoded.type === 'event' && decoded.end.toISOString()).toBe('2026-12-25T00:00:00.000Z');
  });

  it('falls back to defaults for unknown or missing fields', () => {
    const data = ics('VTODO', ['UID:todo-3', 'STATUS:WAITING', 'PRIORITY:12', 'PERCENT-COMPLETE:150']);
    const decoded = createCodec().decode({ data });

    // 150 clamps to 100, which completes the todo
    expect(decoded).toMatchObject({
      type: 'todo',
      title: 'Untitled',
      status: 'completed',
      percentComplete: 100,
      priority: undefined,
    });
  });

  it('maps an unknown status to not-started', () => {
    const data = ics('VTODO', ['UID:todo-4', 'SUMMARY:Call back', 'STATUS:WAITING']);
    expect(createCodec().decode({ data })).toMatchObject({ status: 'not-started', percentComplete: 0 });
  });

  it('prefers the master over recurrence overrides', () => {
    const data = [
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:series-1',
      'RECURRENCE-ID:20261027T160000Z',
      'SUMMARY:Moved occurrence',
      'DTSTART:20261027T180000Z',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:series-1',
      'SUMMARY:Weekly review',
      'DTSTART:20261020T160000Z',
      'END:VEVENT',
      'END:VCALENDAR',
    ].join('\r\n');

    expect(createCodec().decode({ data }).title).toBe('Weekly review');
  });

  it('rejects objects without a component, a UID or an event start', () => {
    const codec = createCodec();

    expect(() => codec.decode({ data: 'BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n' })).toThrow(
      MalformedCalendarObjectError,
    );
    expect(() => codec.decode({ data: ics('VEVENT', ['SUMMARY:No uid', 'DTSTART:20261020T160000Z']) })).toThrow(
      'missing its UID',
    );
    expect(() => codec.decode({ data: ics('VEVENT', ['UID:no-start', 'SUMMARY:No start']) })).toThrow(
      'no parsable DTSTART',
    );
  });
});

describe('CalendarCodec.materialize', () => {
  it('refuses uids that would break the content line', () => {
    const { uid: _uid, ...draft } = teamSync;

    expect(() => createCodec().materialize({ ...draft, uid: 'abc\r\nRRULE:FREQ=DAILY' })).toThrow(
      'UID must not contain control characters',
    );
  });

  it('generates a uid only when none is given', () => {
    const codec = createCodec();
    const { uid: _uid, ...draft } = teamSync;

    expect(codec.materialize(draft).uid).toBe('generated-1');
    expect(codec.materialize({ ...draft, uid: 'mine' }).uid).toBe('mine');
  });

  it('completes todos at 100 percent', () => {
    const todo = createCodec().materialize({
      type: 'todo',
      title: 'Done already',
      allDay: false,
      status: 'in-progress',
      percentComplete: 100,
    });

    expect(todo).toMatchObject({ status: 'completed' });
  });
});

describe('line folding', () => {
  it('folds long lines at 75 octets and unfolds them back', () => {
    const line = `DESCRIPTION:${'é'.repeat(60)}${'x'.repeat(40)}`;
    const folded = foldLine(line);

    for (const part of folded.split('\r\n')) {
      expect(Buffer.byteLength(part, 'utf8')).toBeLessThanOrEqual(75);
    }
    expect(unfoldLines(folded)).toEqual([line]);
  });
});

describe('helpers', () => {
  it('parses durations', () => {
    expect(parseDuration('PT30M')).toBe(30 * 60_000);
    expect(parseDuration('P1DT2H')).toBe(26 * 3_600_000);
    expect(parseDuration('-PT15M')).toBe(-15 * 60_000);
    expect(parseDuration('soon')).toBeUndefined();
  });

  it('maps provider statuses', () => {
    expect(parseTodoStatus('IN-PROCESS')).toBe('in-progress');
    expect(parseTodoStatus('done')).toBe('completed');
    expect(parseTodoStatus('CANCELED')).toBe('cancelled');
    expect(parseTodoStatus(undefined)).toBe('not-started');
  });

  it('leaves todos below 100 percent alone', () => {
    const todo: TodoItem = {
      type: 'todo',
      uid: 't',
      title: 't',
      allDay: false,
      status: 'in-progress',
      percentComplete: 99,
    };
    expect(applyCompletionRule(todo)).toBe(todo);
  });
});

describe('embedded time zones', () => {
  const exchangeEvent = (dtstart: string): string =>
    [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      ...EXCHANGE_ZONE,
      'BEGIN:VEVENT',
      'UID:exchange-1',
      'SUMMARY:Planning',
      `DTSTART;TZID=Eastern Standard Time:${dtstart}`,
      'DURATION:PT1H',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ].join('\r\n');

  it('resolves a non-IANA TZID through the VTIMEZONE daylight rule', () => {
    const event = asEvent(createCodec().decode({ data: exchangeEvent('20261020T090000') }));

    expect(event.start.toISOString()).toBe('2026-10-20T13:00:00.000Z');
    expect(event.end.toISOString()).toBe('2026-10-20T14:00:00.000Z');
  });

  it('switches to the standard offset after the first Sunday in November', () => {
    const event = asEvent(createCodec().decode({ data: exchangeEvent('20261203T090000') }));

    expect(event.start.toISOString()).toBe('2026-12-03T14:00:00.000Z');
  });
});

describe('CalendarCodec.patch', () => {
  it('rewrites only the changed properties and keeps the rest of the object', () => {
    const codec = createCodec();
    const stored = codec.decode({ data: WEEKLY_MEETING });

    const patched = codec.patch({ data: WEEKLY_MEETING }, { ...stored, title: 'Daily standup' });

    expect(patched.data).toBe(
      [
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        'PRODID:-//Example Corp//Mail Server//EN',
        ...EXCHANGE_ZONE,
        'BEGIN:VEVENT',
        'UID:weekly',
        'DTSTAMP:20261019T160000Z',
        'SEQUENCE:3',
        'SUMMARY:Daily standup',
        'DTSTART;TZID=Eastern Standard Time:20261020T090000',
        'DTEND;TZID=Eastern Standard Time:20261020T093000',
        'RRULE:FREQ=WEEKLY;BYDAY=TU',
        'EXDATE;TZID=Eastern Standard Time:20261027T090000',
        'ATTENDEE;CN=Sam Lee;PARTSTAT=ACCEPTED:mailto:sam@example.test',
        'CATEGORIES:Meetings',
        'LAST-MODIFIED:20261019T160000Z',
        'BEGIN:VALARM',
        'ACTION:DISPLAY',
        'DESCRIPTION:Reminder',
        'TRIGGER:-PT15M',
        'END:VALARM',
        'END:VEVENT',
        ...WEEKLY_OVERRIDE,
        'END:VCALENDAR',
        '',
      ].join('\r\n'),
    );
  });

  it('writes a moved start in the zone the object uses', () => {
    const codec = createCodec();
    const stored = asEvent(codec.decode({ data: WEEKLY_MEETING }));

    const patched = codec.patch(
      { data: WEEKLY_MEETING },
      { ...stored, start: new Date('2026-11-10T14:00:00Z'), end: new Date('2026-11-10T14:30:00Z') },
    );

    expect(patched.data).toContain('DTSTART;TZID=Eastern Standard Time:20261110T090000\r\n');
    expect(patched.data).toContain('DTEND;TZID=Eastern Standard Time:20261110T093000\r\n');
    expect(asEvent(codec.decode(patched)).start.toISOString()).toBe('2026-11-10T14:00:00.000Z');
  });

  it('replaces a DURATION when the event moves', () => {
    const codec = createCodec();
    const data = ics('VEVENT', ['UID:dur-1', 'SUMMARY:Call', 'DTSTART:20261020T200000Z', 'DURATION:PT45M']);
    const stored = asEvent(codec.decode({ data }));

    const patched = codec.patch(
      { data },
      { ...stored, start: new Date('2026-10-21T20:00:00Z'), end: new Date('2026-10-21T20:45:00Z') },
    );

    expect(patched.data).toContain('DTSTART:20261021T200000Z\r\nDTEND:20261021T204500Z\r\n');
    expect(patched.data).not.toContain('DURATION');
  });

  it('removes cleared text and completion', () => {
    const codec = createCodec();
    const data = ics('VTODO', [
      'UID:todo-p',
      'SUMMARY:File report',
      'DESCRIPTION:Quarterly numbers',
      'STATUS:COMPLETED',
      'PERCENT-COMPLETE:100',
      'COMPLETED:20261018T120000Z',
    ]);
    const stored = codec.decode({ data });
    if (stored.type !== 'todo') throw new Error('expected a todo');

    const patched = codec.patch(
      { data },
      { ...stored, description: '', status: 'in-progress', percentComplete: 40, completedAt: undefined },
    );

    expect(patched.data).toBe(
      ics('VTODO', [
        'UID:todo-p',
        'SUMMARY:File report',
        'STATUS:IN-PROCESS',
        'PERCENT-COMPLETE:40',
        'DTSTAMP:20261019T160000Z',
        'LAST-MODIFIED:20261019T160000Z',
        'SEQUENCE:1',
      ]),
    );
  });
});
