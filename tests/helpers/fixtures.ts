// tests/helpers/fixtures.ts

export const EXCHANGE_ZONE = [
  'BEGIN:VTIMEZONE',
  'TZID:Eastern Standard Time',
  'BEGIN:STANDARD',
  'DTSTART:16010101T020000',
  'TZOFFSETFROM:-0400',
  'TZOFFSETTO:-0500',
  'RRULE:FREQ=YEARLY;INTERVAL=1;BYDAY=1SU;BYMONTH=11',
  'END:STANDARD',
  'BEGIN:DAYLIGHT',
  'DTSTART:16010101T020000',
  'TZOFFSETFROM:-0500',
  'TZOFFSETTO:-0400',
  'RRULE:FREQ=YEARLY;INTERVAL=1;BYDAY=2SU;BYMONTH=3',
  'END:DAYLIGHT',
  'END:VTIMEZONE',
];

export const WEEKLY_MASTER = [
  'BEGIN:VEVENT',
  'UID:weekly',
  'DTSTAMP:20261001T120000Z',
  'SEQUENCE:2',
  'SUMMARY:Weekly sync',
  'DTSTART;TZID=Eastern Standard Time:20261020T090000',
  'DTEND;TZID=Eastern Standard Time:20261020T093000',
  'RRULE:FREQ=WEEKLY;BYDAY=TU',
  'EXDATE;TZID=Eastern Standard Time:20261027T090000',
  'ATTENDEE;CN=Sam Lee;PARTSTAT=ACCEPTED:mailto:sam@example.test',
  'CATEGORIES:Meetings',
  'BEGIN:VALARM',
  'ACTION:DISPLAY',
  'DESCRIPTION:Reminder',
  'TRIGGER:-PT15M',
  'END:VALARM',
  'END:VEVENT',
];

export const WEEKLY_OVERRIDE = [
  'BEGIN:VEVENT',
  'UID:weekly',
  'RECURRENCE-ID;TZID=Eastern Standard Time:20261103T090000',
  'SUMMARY:Weekly sync (moved)',
  'DTSTART;TZID=Eastern Standard Time:20261103T110000',
  'DTEND;TZID=Eastern Standard Time:20261103T113000',
  'END:VEVENT',
];

/**
 * Recurring meeting as an Exchange-style producer writes it: a Windows zone
 * name defined by an embedded VTIMEZONE, attendees, an alarm and one override
 */
export const WEEKLY_MEETING = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Example Corp//Mail Server//EN',
  ...EXCHANGE_ZONE,
  ...WEEKLY_MASTER,
  ...WEEKLY_OVERRIDE,
  'END:VCALENDAR',
  '',
].join('\r\n');
