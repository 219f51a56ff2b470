// src/tools/calendar-tools.ts
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { TODO_STATUSES, type ToolResult } from '../models/index.js';
import type { CalendarService } from '../services/calendar.service.js';
import type { McpToolResponse } from '../types/mcp.js';

const todoStatus = z.enum(TODO_STATUSES);

const calendarRef = z
  .string()
  .min(1)
  .describe('Calendar id, URL or display name (case-insensitive)');
export const itemUid = z
  .string()
  .min(1)
  .regex(/^[^\u0000-\u001f\u007f]+$/, 'UID must not contain control characters')
  .describe('Unique identifier of the item');
const dateExpr = z
  .string()
  .describe('Date: YYYY-MM-DD, MM/DD/YYYY, today, tomorrow, yesterday, a weekday, next week, in N days');
const timeExpr = z.string().describe('Time of day: 1400, 14:00, 2pm, 2:30 pm, noon, midnight');

const itemReferenceShape = {
  calendar: calendarRef,
  uid: itemUid,
};

const createEventShape = {
  calendar: calendarRef,
  title: z.string().min(1),
  date: dateExpr,
  time: timeExpr.optional().describe('Start time; omit for an all-day event'),
  endDate: dateExpr.optional(),
  endTime: timeExpr.optional(),
  durationMinutes: z.number().int().positive().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
  uid: itemUid.optional(),
};

const updateEventShape = {
  ...itemReferenceShape,
  title: z.string().min(1).optional(),
  date: dateExpr.optional(),
  time: timeExpr.optional(),
  endDate: dateExpr.optional(),
  endTime: timeExpr.optional(),
  durationMinutes: z.number().int().positive().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
};

const createTodoShape = {
  calendar: calendarRef,
  title: z.string().min(1),
  description: z.string().optional(),
  dueDate: dateExpr.optional(),
  dueTime: timeExpr.optional(),
  status: todoStatus.optional(),
  percentComplete: z.number().int().min(0).max(100).optional(),
  priority: z.number().int().min(1).max(9).optional().describe('1 = highest, 9 = lowest'),
  uid: itemUid.optional(),
};

const updateTodoShape = {
  ...itemReferenceShape,
  title: z.string().min(1).optional(),
  description: z.string().optional(),
  dueDate: dateExpr.optional(),
  dueTime: timeExpr.optional(),
  status: todoStatus.optional(),
  percentComplete: z.number().int().min(0).max(100).optional(),
  priority: z.number().int().min(1).max(9).optional(),
};

const searchShape = {
  calendars: z.array(z.string()).optional().describe('Calendars to search; all when omitted'),
  text: z.string().optional().describe('Case-insensitive match on title or description'),
  from: dateExpr.optional(),
  to: dateExpr.optional().describe('Last day included in the search'),
  limit: z.number().int().positive().optional(),
};

const correlationId = z.string().min(1).describe('Echoed back in the matching result entry');

const batchItem = z.discriminatedUnion('action', [
  z.object({ action: z.literal('create-event'), correlationId, request: z.object(createEventShape) }),
  z.object({ action: z.literal('create-todo'), correlationId, request: z.object(createTodoShape) }),
  z.object({ action: z.literal('update-event'), correlationId, request: z.object(updateEventShape) }),
  z.object({ action: z.literal('update-todo'), correlationId, request: z.object(updateTodoShape) }),
  z.object({ action: z.literal('delete-event'), correlationId, request: z.object(itemReferenceShape) }),
  z.object({ action: z.literal('delete-todo'), correlationId, request: z.object(itemReferenceShape) }),
]);

/**
 * Renders a service result as a JSON text block
 */
export function toToolResponse<T>(result: ToolResult<T>): McpToolResponse {
  if (!result.ok) {
    return {
      isError: true,
      content: [{ type: 'text', text: JSON.stringify({ success: false, error: result.error }, null, 2) }],
    };
  }
  return {
    content: [{ type: 'text', text: JSON.stringify({ success: true, result: result.value }, null, 2) }],
  };
}

/**
 * Registers calendar tools with the MCP server
 */
export function registerCalendarTools(server: McpServer, service: CalendarService): void {
  server.registerTool(
    'list_calendars',
    {
      description: 'List the calendars available on the CalDAV server',
      inputSchema: {
        refresh: z.boolean().optional().describe('Rediscover calendars instead of using the cached list'),
      },
    },
    async ({ refresh }) => toToolResponse(await service.listCalendars({ refresh })),
  );

  server.registerTool(
    'get_calendar_info',
    {
      description: 'Get details of one calendar, including how many events and todos it holds',
      inputSchema: { calendar: calendarRef },
    },
    async ({ calendar }, { signal }) => toToolResponse(await service.getCalendarInfo(calendar, { signal })),
  );

  // Events

  server.registerTool(
    'create_event',
    {
      description:
        'Create an event. Without an end, it lasts the default duration; without a time, it is all-day.',
      inputSchema: createEventShape,
    },
    async (args, { signal }) => toToolResponse(await service.createEvent(args, { signal })),
  );

  server.registerTool(
    'get_event',
    { description: 'Get an event by its uid', inputSchema: itemReferenceShape },
    async (args, { signal }) => toToolResponse(await service.getEvent(args, { signal })),
  );

  server.registerTool(
    'update_event',
    {
      description: 'Update an event. Omitted fields keep their value; moving the start keeps the duration.',
      inputSchema: updateEventShape,
    },
    async (args, { signal }) => toToolResponse(await service.updateEvent(args, { signal })),
  );

  server.registerTool(
    'delete_event',
    { description: 'Delete an event by its uid', inputSchema: itemReferenceShape },
    async (args, { signal }) => toToolResponse(await service.deleteEvent(args, { signal })),
  );

  server.registerTool(
    'search_events',
    {
      description: 'Search events across calendars. Defaults to the next 30 days.',
      inputSchema: searchShape,
    },
    async (args, { signal }) => toToolResponse(await service.searchEvents(args, { signal })),
  );

  // Todos

  server.registerTool(
    'create_todo',
    {
      description: `Create a todo. Status is one of ${TODO_STATUSES.join(', ')}; 100 percent marks it completed.`,
      inputSchema: createTodoShape,
    },
    async (args, { signal }) => toToolResponse(await service.createTodo(args, { signal })),
  );

  server.registerTool(
    'get_todo',
    { description: 'Get a todo by its uid', inputSchema: itemReferenceShape },
    async (args, { signal }) => toToolResponse(await service.getTodo(args, { signal })),
  );

  server.registerTool(
    'update_todo',
    { description: 'Update a todo. Omitted fields keep their value.', inputSchema: updateTodoShape },
    async (args, { signal }) => toToolResponse(await service.updateTodo(args, { signal })),
  );

  server.registerTool(
    'complete_todo',
    { description: 'Mark a todo as completed', inputSchema: itemReferenceShape },
    async (args, { signal }) => toToolResponse(await service.completeTodo(args, { signal })),
  );

  server.registerTool(
    'delete_todo',
    { description: 'Delete a todo by its uid', inputSchema: itemReferenceShape },
    async (args, { signal }) => toToolResponse(await service.deleteTodo(args, { signal })),
  );

  server.registerTool(
    'search_todos',
    {
      description: 'Search todos across calendars, optionally by status and due-date range',
      inputSchema: { ...searchShape, status: todoStatus.optional() },
    },
    async (args, { signal }) => toToolResponse(await service.searchTodos(args, { signal })),
  );

  // Batch

  server.registerTool(
    'batch_operations',
    {
      description:
        'Run several create, update and delete operations. Each item succeeds or fails on its own; ' +
        'results come back in request order.',
      inputSchema: {
        items: z.array(batchItem).min(1),
      },
    },
    async ({ items }, { signal }) => toToolResponse(await service.batch({ items }, { signal })),
  );
}
