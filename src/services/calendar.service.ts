// src/services/calendar.service.ts
import type { AxiosInstance } from 'axios';
import type { CalDavConfig, CalendarSettings } from '../config/config.js';
import {
  CalendarUtils,
  success,
  failure,
  type BatchOperation,
  type BatchRequest,
  type BatchResult,
  type CalendarCollection,
  type CalendarItem,
  type CreateEventRequest,
  type CreateTodoRequest,
  type EventItem,
  type ItemReference,
  type ItemType,
  type SearchQuery,
  type SearchRequest,
  type TimeRange,
  type TodoItem,
  type TodoSearchRequest,
  type ToolResult,
  type UpdateEventRequest,
  type UpdateTodoRequest,
} from '../models/index.js';
import {
  CalendarNotFoundError,
  InvalidTimeFormatError,
  NotFoundError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { applyCompletionRule, CalendarCodec } from './ical/calendar-codec.js';
import {
  formatLocalDate,
  parseTimeOfDay,
  TemporalNormalizer,
  type ResolvedTime,
} from './time/temporal-normalizer.js';
import { XmlService } from './xml/xml-service.js';
import { CalDavXmlBuilder } from './xml/caldav-xml-builder.js';
import { HttpClient } from './calendar/http-client.js';
import { CalDavAdapter } from './calendar/caldav-adapter.js';
import { CollectionDiscovery } from './calendar/collection-discovery.js';
import { CollectionCache } from './calendar/collection-cache.js';
import { CalendarRouter, type FanOutResult } from './calendar/calendar-router.js';
import { BatchExecutor, type BatchOperations } from './calendar/batch-executor.js';

const logger = createLogger('calendar-service');

const DEFAULT_SEARCH_DAYS = 30;

/**
 * Read-only collaborators shared by every operation
 */
export interface CalendarContext {
  router: CalendarRouter;
  normalizer: TemporalNormalizer;
  defaultEventDurationMinutes: number;
  maxConcurrency: number;
  /** Reference instant for relative dates */
  clock?: () => Date;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * Collection details plus item counts
 */
export interface CalendarInfo extends CalendarCollection {
  eventCount?: number;
  todoCount?: number;
}

/**
 * Tool-facing calendar operations. Every method returns a result object and
 * never throws; failures carry their error kind.
 */
export class CalendarService implements BatchOperations {
  private readonly router: CalendarRouter;
  private readonly normalizer: TemporalNormalizer;
  private readonly defaultDurationMs: number;
  private readonly clock: () => Date;
  private readonly batchExecutor: BatchExecutor;

  constructor(context: CalendarContext) {
    this.router = context.router;
    this.normalizer = context.normalizer;
    this.defaultDurationMs = context.defaultEventDurationMinutes * 60_000;
    this.clock = context.clock ?? (() => new Date());
    this.batchExecutor = new BatchExecutor(this, context.maxConcurrency);
  }

  // Calendars

  async listCalendars(options: { refresh?: boolean } = {}): Promise<ToolResult<CalendarCollection[]>> {
    return this.attempt('list calendars', async () => [...(await this.router.listCollections(options))]);
  }

  /**
   * Get detailed information about a specific calendar
   */
  async getCalendarInfo(calendar: string, options: OperationOptions = {}): Promise<ToolResult<CalendarInfo>> {
    return this.attempt('get calendar info', async () => {
      const collection = await this.router.resolve(calendar);
      const adapter = this.router.adapterFor(collection);
      const info: CalendarInfo = { ...collection };

      for (const type of ['event', 'todo'] as const) {
        if (!CalendarUtils.supports(collection, type)) continue;
        let count = 0;
        for await (const _item of adapter.query({ type }, options)) count++;
        if (type === 'event') info.eventCount = count;
        else info.todoCount = count;
      }
      return info;
    });
  }

  // Events

  async createEvent(request: CreateEventRequest, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('create event', async () => {
      const now = this.clock();
      const start = this.normalizer.resolve({ date: request.date, time: request.time, now });
      const end = this.resolveEnd(start, request, now);

      const collection = await this.targetCollection(request.calendar, 'event');
      return this.router.adapterFor(collection).create(
        {
          type: 'event',
          uid: request.uid,
          calendarId: collection.id,
          title: request.title,
          description: request.description,
          location: request.location,
          start: start.value,
          end,
          allDay: start.kind === 'date',
        },
        options,
      );
    });
  }

  async getEvent(reference: ItemReference, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('get event', () => this.readItem(reference, 'event', options));
  }

  async updateEvent(request: UpdateEventRequest, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('update event', async () => {
      const now = this.clock();
      this.validateExpressions(now, [request.date, request.endDate], [request.time, request.endTime]);

      const collection = await this.targetCollection(request.calendar, 'event');
      const adapter = this.router.adapterFor(collection);
      const existing = await adapter.read(request.uid, { type: 'event', signal: options.signal });
      if (existing.type !== 'event') throw new NotFoundError('Event', request.uid);

      const currentStart = this.fromItem(existing.start, existing.allDay);
      const moved = request.date !== undefined || request.time !== undefined;
      const start = moved ? this.movedStart(currentStart, request.date, request.time, now) : currentStart;

      let end: Date;
      if (request.endDate !== undefined || request.endTime !== undefined || request.durationMinutes !== undefined) {
        end = this.resolveEnd(start, request, now);
      } else if (moved) {
        // Moving an event keeps its length
        end = new Date(start.value.getTime() + (existing.end.getTime() - existing.start.getTime()));
      } else {
        end = existing.end;
      }

      const updated: EventItem = {
        ...existing,
        title: request.title ?? existing.title,
        description: mergeText(request.description, existing.description),
        location: mergeText(request.location, existing.location),
        start: start.value,
        end,
        allDay: start.kind === 'date',
      };
      return adapter.update(request.uid, updated, options);
    });
  }

  async deleteEvent(reference: ItemReference, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('delete event', () => this.deleteItem(reference, 'event', options));
  }

  async searchEvents(request: SearchRequest, options: OperationOptions = {}): Promise<ToolResult<FanOutResult>> {
    return this.attempt('search events', () => {
      const range = this.searchRange(request, true);
      return this.router.fanOutSearch(this.toQuery('event', request, range), options.signal);
    });
  }

  // Todos

  async createTodo(request: CreateTodoRequest, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('create todo', async () => {
      const now = this.clock();
      const due = this.resolveDue(request.dueDate, request.dueTime, now);
      const status = request.status ?? 'not-started';

      const collection = await this.targetCollection(request.calendar, 'todo');
      return this.router.adapterFor(collection).create(
        {
          type: 'todo',
          uid: request.uid,
          calendarId: collection.id,
          title: request.title,
          description: request.description,
          due: due?.value,
          allDay: due?.kind === 'date',
          status,
          percentComplete: request.percentComplete ?? (status === 'completed' ? 100 : 0),
          priority: request.priority,
          completedAt: status === 'completed' ? now : undefined,
        },
        options,
      );
    });
  }

  async getTodo(reference: ItemReference, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('get todo', () => this.readItem(reference, 'todo', options));
  }

  async updateTodo(request: UpdateTodoRequest, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('update todo', async () => {
      const now = this.clock();
      this.validateExpressions(now, [request.dueDate], [request.dueTime]);

      const collection = await this.targetCollection(request.calendar, 'todo');
      const adapter = this.router.adapterFor(collection);
      const existing = await adapter.read(request.uid, { type: 'todo', signal: options.signal });
      if (existing.type !== 'todo') throw new NotFoundError('Todo', request.uid);

      let due = existing.due;
      let allDay = existing.allDay;
      if (request.dueDate !== undefined || request.dueTime !== undefined) {
        const resolved = existing.due
          ? this.movedStart(this.fromItem(existing.due, existing.allDay), request.dueDate, request.dueTime, now)
          : this.resolveDue(request.dueDate, request.dueTime, now);
        due = resolved?.value;
        allDay = resolved?.kind === 'date';
      }

      const updated = this.withCompletion(
        {
          ...existing,
          title: request.title ?? existing.title,
          description: mergeText(request.description, existing.description),
          due,
          allDay,
          status: request.status ?? existing.status,
          percentComplete: request.percentComplete ?? existing.percentComplete,
          priority: request.priority ?? existing.priority,
        },
        now,
      );
      return adapter.update(request.uid, updated, options);
    });
  }

  /**
   * Marks a todo completed at 100 percent
   */
  async completeTodo(reference: ItemReference, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('complete todo', async () => {
      const collection = await this.targetCollection(reference.calendar, 'todo');
      const adapter = this.router.adapterFor(collection);
      const existing = await adapter.read(reference.uid, { type: 'todo', signal: options.signal });
      if (existing.type !== 'todo') throw new NotFoundError('Todo', reference.uid);

      const completed = this.withCompletion(
        { ...existing, status: 'completed', percentComplete: 100 },
        this.clock(),
      );
      return adapter.update(reference.uid, completed, options);
    });
  }

  async deleteTodo(reference: ItemReference, options: OperationOptions = {}): Promise<ToolResult<CalendarItem>> {
    return this.attempt('delete todo', () => this.deleteItem(reference, 'todo', options));
  }

  async searchTodos(request: TodoSearchRequest, options: OperationOptions = {}): Promise<ToolResult<FanOutResult>> {
    return this.attempt('search todos', () => {
      const range = this.searchRange(request, false);
      const query = { ...this.toQuery('todo', request, range), status: request.status };
      return this.router.fanOutSearch(query, options.signal);
    });
  }

  // Batch

  async batch(request: BatchRequest, options: OperationOptions = {}): Promise<ToolResult<BatchResult>> {
    return this.attempt('execute batch', () => this.batchExecutor.execute(request, options.signal));
  }

  /**
   * Dispatches one batch operation to its single-item counterpart
   */
  async run(operation: BatchOperation, signal?: AbortSignal): Promise<ToolResult<CalendarItem>> {
    const options = { signal };
    switch (operation.action) {
      case 'create-event':
        return this.createEvent(operation.request, options);
      case 'create-todo':
        return this.createTodo(operation.request, options);
      case 'update-event':
        return this.updateEvent(operation.request, options);
      case 'update-todo':
        return this.updateTodo(operation.request, options);
      case 'delete-event':
        return this.deleteEvent(operation.request, options);
      case 'delete-todo':
        return this.deleteTodo(operation.request, options);
    }
  }

  /**
   * Runs one operation and turns any thrown error into a failure result
   */
  private async attempt<T>(operation: string, work: () => Promise<T>): Promise<ToolResult<T>> {
    try {
      return success(await work());
    } catch (error) {
      const result = failure(error);
      logger.warn(`Failed to ${operation}: [${result.error.kind}] ${result.error.message}`);
      return result;
    }
  }

  // Helpers

  private async targetCollection(reference: string, type: ItemType): Promise<CalendarCollection> {
    const collection = await this.router.resolve(reference);
    if (!CalendarUtils.supports(collection, type)) {
      throw new CalendarNotFoundError(reference, `Calendar '${reference}' does not accept ${type}s`);
    }
    return collection;
  }

  private async readItem(reference: ItemReference, type: ItemType, options: OperationOptions): Promise<CalendarItem> {
    const collection = await this.router.resolve(reference.calendar);
    return this.router.adapterFor(collection).read(reference.uid, { type, signal: options.signal });
  }

  private async deleteItem(reference: ItemReference, type: ItemType, options: OperationOptions): Promise<CalendarItem> {
    const collection = await this.router.resolve(reference.calendar);
    return this.router.adapterFor(collection).delete(reference.uid, { type, signal: options.signal });
  }

  /**
   * Parses date and time expressions up front so bad input fails before any request
   */
  private validateExpressions(now: Date, dates: Array<string | undefined>, times: Array<string | undefined>): void {
    for (const date of dates) {
      if (date !== undefined) this.normalizer.resolve({ date, now });
    }
    for (const time of times) {
      if (time !== undefined) parseTimeOfDay(time);
    }
  }

  /**
   * Computes an event end from an explicit end date/time, a duration, or the default length
   */
  private resolveEnd(
    start: ResolvedTime,
    request: { endDate?: string; endTime?: string; durationMinutes?: number },
    now: Date,
  ): Date {
    let end: Date;

    if (start.kind === 'date') {
      // All-day ends are exclusive: an event on one day ends at the next midnight
      const last = request.endDate
        ? this.normalizer.resolve({ date: request.endDate, now }).localDate
        : start.localDate;
      end = this.normalizer.dateValue(this.normalizer.addDays(last, 1));
    } else if (request.endDate !== undefined || request.endTime !== undefined) {
      const endDate = request.endDate ?? formatLocalDate(start.localDate);
      const endTime = request.endTime ?? this.localTimeOf(start);
      end = this.normalizer.resolve({ date: endDate, time: endTime, now }).value;
    } else {
      const durationMs =
        request.durationMinutes !== undefined ? request.durationMinutes * 60_000 : this.defaultDurationMs;
      end = new Date(start.value.getTime() + durationMs);
    }

    if (end.getTime() <= start.value.getTime()) {
      throw new InvalidTimeFormatError('Event end must be after its start');
    }
    return end;
  }

  private resolveDue(dueDate: string | undefined, dueTime: string | undefined, now: Date): ResolvedTime | undefined {
    if (dueDate === undefined && dueTime === undefined) return undefined;
    return this.normalizer.resolve({ date: dueDate ?? 'today', time: dueTime, now });
  }

  /**
   * New start for an update: a new date keeps the old time of day, a new time keeps the old date
   */
  private movedStart(
    current: ResolvedTime,
    date: string | undefined,
    time: string | undefined,
    now: Date,
  ): ResolvedTime {
    const keptTime = current.kind === 'instant' ? this.localTimeOf(current) : undefined;
    return this.normalizer.resolve({
      date: date ?? formatLocalDate(current.localDate),
      time: time ?? keptTime,
      now,
    });
  }

  private fromItem(value: Date, allDay: boolean): ResolvedTime {
    if (allDay) {
      return {
        kind: 'date',
        value,
        localDate: { year: value.getUTCFullYear(), month: value.getUTCMonth() + 1, day: value.getUTCDate() },
      };
    }
    return { kind: 'instant', value, localDate: this.normalizer.localDateOf(value) };
  }

  private localTimeOf(time: ResolvedTime): string {
    const { hour, minute } = this.normalizer.toLocal(time.value, time.localDate);
    return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
  }

  /**
   * Keeps status, percentage and completion timestamp consistent
   */
  private withCompletion(todo: TodoItem, now: Date): TodoItem {
    const normalized = applyCompletionRule(todo);
    if (normalized.status === 'completed') {
      return { ...normalized, completedAt: normalized.completedAt ?? now };
    }
    return { ...normalized, completedAt: undefined };
  }

  /**
   * Local-date search window: `from` inclusive, `to` inclusive of its whole day.
   * Without bounds, events default to the next 30 days and todos are unbounded.
   */
  private searchRange(request: SearchRequest, defaultToUpcoming: boolean): TimeRange | undefined {
    if (!request.from && !request.to && !defaultToUpcoming) return undefined;

    const now = this.clock();
    const fromDate = this.normalizer.resolveDate(request.from ?? 'today', now);
    const lastDate = request.to
      ? this.normalizer.resolveDate(request.to, now)
      : this.normalizer.addDays(fromDate, DEFAULT_SEARCH_DAYS - 1);

    const range = {
      start: this.normalizer.startOfDay(fromDate),
      end: this.normalizer.startOfDay(this.normalizer.addDays(lastDate, 1)),
    };
    if (range.end.getTime() <= range.start.getTime()) {
      throw new InvalidTimeFormatError('Search range end must not be before its start');
    }
    return range;
  }

  private toQuery(type: ItemType, request: SearchRequest, range: TimeRange | undefined): SearchQuery {
    return {
      type,
      range,
      calendars: request.calendars,
      text: request.text,
      limit: request.limit,
    };
  }
}

export interface CalendarServiceOptions {
  /** Replaces the default axios instance, e.g. with an in-process adapter */
  axiosInstance?: AxiosInstance;
  clock?: () => Date;
}

/**
 * Wires the CalDAV stack for one account
 */
export function createCalendarService(
  config: CalDavConfig,
  settings: CalendarSettings,
  options: CalendarServiceOptions = {},
): CalendarService {
  const http = new HttpClient(config, {
    timeoutMs: settings.requestTimeoutMs,
    axiosInstance: options.axiosInstance,
  });
  const xml = new XmlService();
  const builder = new CalDavXmlBuilder();
  const codec = new CalendarCodec({ defaultZone: settings.timezone, clock: options.clock });

  const router = new CalendarRouter(
    new CollectionDiscovery(http, xml, builder),
    (collection) => new CalDavAdapter(collection, { http, xml, builder, codec }),
    new CollectionCache(settings.collectionCacheTtlMs),
    settings.maxConcurrency,
  );

  return new CalendarService({
    router,
    normalizer: new TemporalNormalizer(settings.timezone),
    defaultEventDurationMinutes: settings.defaultEventDurationMinutes,
    maxConcurrency: settings.maxConcurrency,
    clock: options.clock,
  });
}

/**
 * An omitted field keeps its value; an empty string removes it
 */
function mergeText(next: string | undefined, current: string | undefined): string | undefined {
  if (next === '') return undefined;
  return next ?? current;
}
