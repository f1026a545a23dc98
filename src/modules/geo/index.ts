/**
 * Geo Module Public API
 *
 * Crosswalks from fine geographic keys to coarser units.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  GeoLevel,
  CrosswalkEntry,
  Membership,
  CrosswalkTable,
  DistributedWeight,
} from './core/types.js';

export { GEO_LEVELS, isGeoLevel } from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type { UnmappedGeographyError, CrosswalkLoadError } from './core/errors.js';

export { createUnmappedGeographyError, createCrosswalkLoadError } from './core/errors.js';

// ============================================================================
// Crosswalk Resolver
// ============================================================================

export type { CrosswalkResolver } from './core/crosswalk.js';

export {
  createCrosswalkTable,
  createCrosswalkResolver,
  distributeWeight,
  countyStateCode,
  megacountyId,
} from './core/crosswalk.js';

// ============================================================================
// Repositories
// ============================================================================

export {
  loadCrosswalkTable,
  loadCrosswalks,
  crosswalkFileName,
} from './shell/repo/csv-crosswalk-repo.js';
