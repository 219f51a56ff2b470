// src/models/results.ts
import { toToolFailure, type ToolFailure } from '../utils/errors.js';

/**
 * Outcome of a tool operation: the value, or a typed failure
 */
export type ToolResult<T> = { ok: true; value: T } | { ok: false; error: ToolFailure };

export function success<T>(value: T): ToolResult<T> {
  return { ok: true, value };
}

export function failure(error: unknown): { ok: false; error: ToolFailure } {
  return { ok: false, error: toToolFailure(error) };
}
