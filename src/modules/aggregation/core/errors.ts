/**
 * Aggregation Module - Domain Errors
 *
 * Fatal errors abort a run before anything is written. Group-level
 * conditions (insufficient data, undefined standard error) are recovered
 * locally and only counted.
 */

import type { InvalidStateError } from '@/common/types/errors.js';
import type { CrosswalkLoadError, UnmappedGeographyError } from '@/modules/geo/index.js';

/**
 * A group has no contributing responses. No row is emitted.
 */
export interface InsufficientDataError {
  readonly type: 'InsufficientDataError';
  readonly message: string;
}

/**
 * A group has fewer than two responses. The row is emitted with an
 * undefined standard error.
 */
export interface UndefinedStandardErrorWarning {
  readonly type: 'UndefinedStandardErrorWarning';
  readonly message: string;
  readonly sampleSize: number;
}

/**
 * Indicator definitions or run parameters are unusable.
 */
export interface ConfigurationError {
  readonly type: 'ConfigurationError';
  readonly message: string;
  readonly details: string[];
}

/**
 * The response table could not be read.
 */
export interface ResponseLoadError {
  readonly type: 'ResponseLoadError';
  readonly message: string;
  readonly details?: string[];
}

/**
 * Export files could not be written or moved into place.
 */
export interface OutputWriteError {
  readonly type: 'OutputWriteError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Everything that can fail a whole run.
 */
export type AggregationRunError =
  | ConfigurationError
  | CrosswalkLoadError
  | UnmappedGeographyError
  | ResponseLoadError
  | OutputWriteError
  | InvalidStateError;

export const createInsufficientDataError = (
  description = 'group has no contributing responses'
): InsufficientDataError => ({
  type: 'InsufficientDataError',
  message: description,
});

export const createUndefinedStandardErrorWarning = (
  sampleSize: number
): UndefinedStandardErrorWarning => ({
  type: 'UndefinedStandardErrorWarning',
  message: `Standard error undefined for sample size ${String(sampleSize)}`,
  sampleSize,
});

export const createConfigurationError = (
  message: string,
  details: string[] = []
): ConfigurationError => ({
  type: 'ConfigurationError',
  message,
  details,
});

export const createResponseLoadError = (
  message: string,
  details?: string[]
): ResponseLoadError => ({
  type: 'ResponseLoadError',
  message,
  ...(details !== undefined && { details }),
});

export const createOutputWriteError = (message: string, cause?: unknown): OutputWriteError => ({
  type: 'OutputWriteError',
  message,
  ...(cause !== undefined && { cause }),
});

