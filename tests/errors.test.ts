import { describe, it, expect } from 'vitest';
import {
  AuthenticationFailedError,
  CalendarNotFoundError,
  NotFoundError,
  toToolFailure,
  TransportError,
} from '../src/utils/errors.js';

describe('errors', () => {
  it('marks only transport failures as retryable', () => {
    expect(new TransportError('GET timed out').retryable).toBe(true);
    expect(new NotFoundError('Event', 'x').retryable).toBe(false);
    expect(new AuthenticationFailedError().retryable).toBe(false);
  });

  it('converts calendar errors to failures with their kind', () => {
    expect(toToolFailure(new CalendarNotFoundError('Holidays'))).toEqual({
      kind: 'CalendarNotFound',
      message: "Calendar 'Holidays' not found",
    });
  });

  it('treats anything else as a transport failure', () => {
    expect(toToolFailure(new Error('socket hang up'))).toEqual({ kind: 'TransportError', message: 'socket hang up' });
    expect(toToolFailure('nope')).toEqual({ kind: 'TransportError', message: 'Unknown error' });
  });
});
