import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createCrosswalkLoadError,
  createUnmappedGeographyError,
  type CrosswalkLoadError,
  type UnmappedGeographyError,
} from './errors.js';

import type {
  CrosswalkEntry,
  CrosswalkTable,
  DistributedWeight,
  GeoLevel,
  Membership,
} from './types.js';

/**
 * Builds an indexed crosswalk for one level.
 *
 * Memberships for each fine key are sorted by geo id so that exploding a
 * response always yields contributions in the same order.
 */
export function createCrosswalkTable(
  level: GeoLevel,
  entries: readonly CrosswalkEntry[]
): Result<CrosswalkTable, CrosswalkLoadError> {
  const problems: string[] = [];
  const grouped = new Map<string, Membership[]>();

  entries.forEach((entry, index) => {
    const position = `entry ${String(index + 1)}`;

    if (entry.fineKey.trim() === '' || entry.geoId.trim() === '') {
      problems.push(`${position}: fine key and geo id must be non-empty`);
      return;
    }
    if (!Number.isFinite(entry.weight) || entry.weight <= 0 || entry.weight > 1) {
      problems.push(
        `${position}: weight ${String(entry.weight)} for '${entry.fineKey}' is outside (0, 1]`
      );
      return;
    }

    const memberships = grouped.get(entry.fineKey) ?? [];
    if (memberships.some((m) => m.geoId === entry.geoId)) {
      problems.push(`${position}: duplicate mapping '${entry.fineKey}' -> '${entry.geoId}'`);
      return;
    }
    memberships.push({ geoId: entry.geoId, weight: entry.weight });
    grouped.set(entry.fineKey, memberships);
  });

  if (problems.length > 0) {
    return err(createCrosswalkLoadError(level, `Invalid ${level} crosswalk`, problems));
  }

  const memberships = new Map<string, readonly Membership[]>();
  for (const [fineKey, list] of grouped) {
    memberships.set(
      fineKey,
      Object.freeze([...list].sort((a, b) => (a.geoId < b.geoId ? -1 : a.geoId > b.geoId ? 1 : 0)))
    );
  }

  return ok({ level, memberships });
}

/**
 * Resolves fine keys against any number of loaded levels.
 */
export interface CrosswalkResolver {
  /**
   * Coarse units (with membership weights) a fine key belongs to at `level`.
   */
  resolve(fineKey: string, level: GeoLevel): Result<readonly Membership[], UnmappedGeographyError>;

  /** Levels with a loaded table. */
  levels(): GeoLevel[];
}

export function createCrosswalkResolver(tables: readonly CrosswalkTable[]): CrosswalkResolver {
  const byLevel = new Map<GeoLevel, CrosswalkTable>();
  for (const table of tables) {
    byLevel.set(table.level, table);
  }

  return {
    resolve(fineKey, level) {
      const memberships = byLevel.get(level)?.memberships.get(fineKey);
      if (memberships === undefined || memberships.length === 0) {
        return err(createUnmappedGeographyError(fineKey, level));
      }
      return ok(memberships);
    },

    levels() {
      return [...byLevel.keys()];
    },
  };
}

/**
 * Splits a respondent weight across memberships.
 *
 * Each coarse unit receives `membership × weight` for the estimate and the
 * membership itself as its share of the sample size.
 */
export function distributeWeight(
  weight: number,
  memberships: readonly Membership[]
): DistributedWeight[] {
  const base = new Decimal(weight);
  return memberships.map((m) => ({
    geoId: m.geoId,
    weight: base.mul(m.weight).toNumber(),
    share: m.weight,
  }));
}

/**
 * State FIPS prefix of a county id (`42003` -> `42`).
 */
export function countyStateCode(countyId: string): string {
  return countyId.slice(0, 2);
}

/**
 * Id of the megacounty pseudo-region for a state (`42` -> `42000`).
 */
export function megacountyId(stateCode: string): string {
  return `${stateCode}000`;
}
