/**
 * Geo Module - Domain Errors
 */

import type { GeoLevel } from './types.js';

/**
 * A fine key has no crosswalk entry for the requested level.
 */
export interface UnmappedGeographyError {
  readonly type: 'UnmappedGeographyError';
  readonly message: string;
  readonly fineKey: string;
  readonly level: GeoLevel;
}

/**
 * A crosswalk table is missing, malformed or inconsistent.
 */
export interface CrosswalkLoadError {
  readonly type: 'CrosswalkLoadError';
  readonly message: string;
  readonly level: GeoLevel;
  readonly details?: string[];
}

export const createUnmappedGeographyError = (
  fineKey: string,
  level: GeoLevel
): UnmappedGeographyError => ({
  type: 'UnmappedGeographyError',
  message: `No ${level} crosswalk entry for key '${fineKey}'`,
  fineKey,
  level,
});

export const createCrosswalkLoadError = (
  level: GeoLevel,
  message: string,
  details?: string[]
): CrosswalkLoadError => ({
  type: 'CrosswalkLoadError',
  message,
  level,
  ...(details !== undefined && { details }),
});
