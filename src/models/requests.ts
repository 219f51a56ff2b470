// src/models/requests.ts
import type { TodoStatus } from './calendar.js';

/**
 * Identifies an existing item inside a calendar
 */
export interface ItemReference {
  calendar: string;
  uid: string;
}

/**
 * Event creation request. Dates and times are loose expressions resolved
 * in the configured time zone ("tomorrow", "1400", "2:30 pm").
 */
export interface CreateEventRequest {
  calendar: string;
  title: string;
  date: string;
  /** Omit for an all-day event */
  time?: string;
  endDate?: string;
  endTime?: string;
  durationMinutes?: number;
  description?: string;
  location?: string;
  uid?: string;
}

export interface UpdateEventRequest extends ItemReference {
  title?: string;
  date?: string;
  time?: string;
  endDate?: string;
  endTime?: string;
  durationMinutes?: number;
  description?: string;
  location?: string;
}

export interface CreateTodoRequest {
  calendar: string;
  title: string;
  description?: string;
  dueDate?: string;
  dueTime?: string;
  status?: TodoStatus;
  percentComplete?: number;
  priority?: number;
  uid?: string;
}

export interface UpdateTodoRequest extends ItemReference {
  title?: string;
  description?: string;
  dueDate?: string;
  dueTime?: string;
  status?: TodoStatus;
  percentComplete?: number;
  priority?: number;
}

/**
 * Search request with loose date expressions
 */
export interface SearchRequest {
  calendars?: string[];
  text?: string;
  from?: string;
  to?: string;
  limit?: number;
}

export interface TodoSearchRequest extends SearchRequest {
  status?: TodoStatus;
}
