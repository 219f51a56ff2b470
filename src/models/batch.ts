// src/models/batch.ts
import type { CalendarItem } from './calendar.js';
import type { ToolFailure } from '../utils/errors.js';
import type {
  CreateEventRequest,
  CreateTodoRequest,
  ItemReference,
  UpdateEventRequest,
  UpdateTodoRequest,
} from './requests.js';

/**
 * One operation inside a batch
 */
export type BatchOperation =
  | { action: 'create-event'; request: CreateEventRequest }
  | { action: 'create-todo'; request: CreateTodoRequest }
  | { action: 'update-event'; request: UpdateEventRequest }
  | { action: 'update-todo'; request: UpdateTodoRequest }
  | { action: 'delete-event'; request: ItemReference }
  | { action: 'delete-todo'; request: ItemReference };

export type BatchItem = BatchOperation & {
  /** Caller-supplied token echoed back in the matching result entry */
  correlationId: string;
};

export interface BatchRequest {
  items: BatchItem[];
}

export type BatchEntry =
  | { index: number; correlationId: string; ok: true; item: CalendarItem }
  | { index: number; correlationId: string; ok: false; error: ToolFailure };

/**
 * Index-aligned outcome of a batch: one entry per request item
 */
export interface BatchResult {
  entries: BatchEntry[];
  succeeded: number;
  failed: number;
}
