// src/models/calendar.ts

/**
 * iCalendar component names a collection can hold
 */
export type ComponentType = 'VEVENT' | 'VTODO';

export type ItemType = 'event' | 'todo';

/**
 * Represents one calendar collection on the CalDAV server
 */
export interface CalendarCollection {
  /** Last path segment of the collection URL */
  id: string;
  displayName: string;
  /** Absolute URL of the collection, with a trailing slash */
  url: string;
  components: ComponentType[];
  color?: string;
  ctag?: string;
  readOnly?: boolean;
}

export const TODO_STATUSES = ['not-started', 'in-progress', 'completed', 'cancelled'] as const;

export type TodoStatus = (typeof TODO_STATUSES)[number];

interface CalendarItemBase {
  /** Stable unique identifier, never changed after creation */
  uid: string;
  /** Owning collection id */
  calendarId?: string;
  title: string;
  description?: string;
  location?: string;
  /** When set, dates are UTC midnight and carry no time of day */
  allDay: boolean;
  created?: Date;
  lastModified?: Date;
}

/**
 * Represents a calendar event
 */
export interface EventItem extends CalendarItemBase {
  type: 'event';
  start: Date;
  end: Date;
}

/**
 * Represents a todo (VTODO)
 */
export interface TodoItem extends CalendarItemBase {
  type: 'todo';
  start?: Date;
  due?: Date;
  status: TodoStatus;
  /** 0 to 100 */
  percentComplete: number;
  /** 1 = highest, 9 = lowest */
  priority?: number;
  completedAt?: Date;
}

export type CalendarItem = EventItem | TodoItem;

/**
 * Item as submitted for creation; the uid is generated when absent
 */
export type EventDraft = Omit<EventItem, 'uid' | 'created' | 'lastModified'> & { uid?: string };
export type TodoDraft = Omit<TodoItem, 'uid' | 'created' | 'lastModified'> & { uid?: string };
export type CalendarItemDraft = EventDraft | TodoDraft;

/**
 * Calendar object as exchanged with the server
 */
export interface WireObject {
  href?: string;
  etag?: string;
  /** iCalendar text */
  data: string;
}

/**
 * Half-open time range: start inclusive, end exclusive
 */
export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Filter for event/todo searches
 */
export interface SearchQuery {
  type: ItemType;
  range?: TimeRange;
  /** Calendar references (id, URL or display name); all calendars when omitted */
  calendars?: string[];
  text?: string;
  status?: TodoStatus;
  limit?: number;
}
