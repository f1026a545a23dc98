/**
 * Base error types for the aggregation engine
 * All domain errors should follow these shapes
 */

/**
 * Base interface for all engine errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * State errors (a pipeline asked to move to a stage it cannot reach)
 */
export interface InvalidStateError extends AppError {
  readonly type: 'InvalidStateError';
  readonly current: string;
  readonly expected: string;
}

export const createInvalidStateError = (
  message: string,
  current: string,
  expected: string
): InvalidStateError => ({
  type: 'InvalidStateError',
  message,
  current,
  expected,
});

/**
 * Extracts a printable message from anything thrown by a library call.
 */
export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
