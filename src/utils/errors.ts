// src/utils/errors.ts

/**
 * Kinds of failure the calendar layer can report to its callers
 */
export type CalendarErrorKind =
  | 'InvalidTimeFormat'
  | 'MalformedCalendarObject'
  | 'RemoteConflict'
  | 'NotFound'
  | 'CalendarNotFound'
  | 'AmbiguousCalendarReference'
  | 'AuthenticationFailed'
  | 'TransportError';

/**
 * Base class for every typed calendar failure
 */
export class CalendarError extends Error {
  constructor(
    message: string,
    public readonly kind: CalendarErrorKind,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = kind;
  }

  /**
   * Only transport failures may be retried without changing input or configuration
   */
  get retryable(): boolean {
    return this.kind === 'TransportError';
  }
}

export class InvalidTimeFormatError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'InvalidTimeFormat', details);
  }
}

export class MalformedCalendarObjectError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MalformedCalendarObject', details);
  }
}

export class RemoteConflictError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RemoteConflict', details);
  }
}

export class NotFoundError extends CalendarError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 'NotFound', {
      resource,
      id,
    });
  }
}

export class CalendarNotFoundError extends CalendarError {
  constructor(reference: string, message = `Calendar '${reference}' not found`) {
    super(message, 'CalendarNotFound', { reference });
  }
}

export class AmbiguousCalendarReferenceError extends CalendarError {
  constructor(reference: string, candidates: string[]) {
    super(
      `Calendar name '${reference}' matches ${candidates.length} calendars; use one of the ids: ${candidates.join(', ')}`,
      'AmbiguousCalendarReference',
      { reference, candidates },
    );
  }
}

export class AuthenticationFailedError extends CalendarError {
  constructor(message = 'CalDAV server rejected the configured credentials') {
    super(message, 'AuthenticationFailed');
  }
}

export class TransportError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TransportError', details);
  }
}

/**
 * Structured failure handed back to tool callers
 */
export interface ToolFailure {
  kind: CalendarErrorKind;
  message: string;
}

/**
 * Converts any thrown value into a typed failure. Unknown errors are treated
 * as transport failures since they originate below the calendar layer.
 */
export function toToolFailure(error: unknown): ToolFailure {
  if (error instanceof CalendarError) {
    return { kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return { kind: 'TransportError', message };
}
