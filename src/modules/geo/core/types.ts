/**
 * Geographic levels the engine can aggregate to.
 *
 * Fine keys (postal-code-like units) are mapped to each level through a
 * crosswalk table. County ids are five-digit FIPS codes whose first two
 * digits are the state FIPS code.
 */
export const GEO_LEVELS = ['county', 'state', 'msa', 'hrr', 'hhs', 'nation'] as const;

export type GeoLevel = (typeof GEO_LEVELS)[number];

export const isGeoLevel = (value: string): value is GeoLevel =>
  (GEO_LEVELS as readonly string[]).includes(value);

/**
 * One row of a crosswalk table.
 */
export interface CrosswalkEntry {
  readonly fineKey: string;
  readonly geoId: string;
  /** Membership weight in (0, 1] */
  readonly weight: number;
}

/**
 * A coarse unit a fine key belongs to.
 */
export interface Membership {
  readonly geoId: string;
  readonly weight: number;
}

/**
 * Crosswalk for a single level, indexed by fine key.
 */
export interface CrosswalkTable {
  readonly level: GeoLevel;
  readonly memberships: ReadonlyMap<string, readonly Membership[]>;
}

/**
 * A respondent's weight after splitting it across coarse units.
 *
 * `weight` feeds the estimate, `share` feeds the sample size.
 */
export interface DistributedWeight {
  readonly geoId: string;
  readonly weight: number;
  readonly share: number;
}
