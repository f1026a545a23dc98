import type { InsufficientDataError } from './errors.js';
import type { IsoDay } from '@/common/types/day.js';
import type { GeoLevel } from '@/modules/geo/index.js';
import type { Result } from 'neverthrow';

export type { IsoDay } from '@/common/types/day.js';

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One respondent-day observation.
 *
 * `values` holds every numeric column of the row (signals and weights);
 * `null` marks a missing answer.
 */
export interface ResponseRow {
  readonly respondentId: string;
  readonly geoKey: string;
  readonly day: IsoDay;
  readonly values: Readonly<Record<string, number | null>>;
}

/**
 * The loaded response table. Never mutated by the engine.
 */
export interface ResponseTable {
  /** Numeric column names available in `values` */
  readonly columns: readonly string[];
  readonly rows: readonly ResponseRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Indicator definitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Closed set of statistics the engine knows how to compute.
 */
export type StatisticKind = 'mean' | 'binary_percentage' | 'multiselect_percentage';

/**
 * Post-processing applied after the megacounty merge.
 */
export type PostProcessingKind = 'none' | 'jeffreys';

export type GroupingDimension = 'day' | 'geo';

export interface MultiselectChoice {
  readonly label: string;
  readonly column: string;
}

interface IndicatorBase {
  readonly name: string;
  readonly weightColumn: string;
  readonly groupBy: readonly GroupingDimension[];
  readonly smoothingWindowDays: number;
  readonly post: PostProcessingKind;
}

export interface MeanIndicator extends IndicatorBase {
  readonly kind: 'mean';
  readonly signalColumn: string;
}

export interface BinaryIndicator extends IndicatorBase {
  readonly kind: 'binary_percentage';
  readonly signalColumn: string;
}

export interface MultiselectIndicator extends IndicatorBase {
  readonly kind: 'multiselect_percentage';
  readonly choices: readonly MultiselectChoice[];
  /** Also report the share of respondents selecting any choice */
  readonly compositeAny: boolean;
}

export type IndicatorDefinition = MeanIndicator | BinaryIndicator | MultiselectIndicator;

/**
 * One output series derived from an indicator.
 *
 * A multiselect indicator yields one signal per choice plus the optional
 * "any" composite; the other kinds yield exactly one.
 */
export interface SignalSpec {
  readonly name: string;
  readonly indicator: IndicatorDefinition;
  /** Statistic used per group (multiselect choices are binary) */
  readonly statistic: Exclude<StatisticKind, 'multiselect_percentage'>;
  readonly extract: (row: ResponseRow) => number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Run configuration
// ─────────────────────────────────────────────────────────────────────────────

export type UnmappedPolicy = 'drop' | 'abort';

/**
 * Frozen, run-wide configuration passed explicitly to every stage.
 */
export interface RunConfig {
  readonly startDate: IsoDay;
  readonly endDate: IsoDay;
  readonly backfillDays: number;
  readonly sampleSizeThreshold: number;
  readonly geographyLevels: readonly GeoLevel[];
  readonly weekdayAdjustment: boolean;
  readonly parallel: boolean;
  /** Maximum units in flight when `parallel` is set */
  readonly concurrency: number;
  readonly unmappedPolicy: UnmappedPolicy;
  readonly indicators: readonly IndicatorDefinition[];
}

/**
 * Paths the shell needs in addition to the engine configuration.
 */
export interface RunLocations {
  readonly exportDir: string;
  readonly inputFile: string;
  readonly crosswalkDir: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Statistics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Marker for a standard error that cannot be computed (fewer than two
 * responses). Kept distinct from every number so it is never read as 0.
 */
export const UNDEFINED_SE = 'undefined';

export type StandardError = number | typeof UNDEFINED_SE;

/**
 * A single contribution to a group after crosswalk explosion.
 */
export interface WeightedResponse {
  readonly value: number;
  /** Respondent weight already scaled by crosswalk membership */
  readonly weight: number;
  /** Crosswalk membership, counted toward the raw sample size */
  readonly share: number;
  readonly day: IsoDay;
}

export interface StatisticBundle {
  readonly estimate: number;
  readonly standardError: StandardError;
  readonly sampleSize: number;
  readonly effectiveSampleSize: number;
}

/**
 * Statistic function bound to one unit (kind and weekday variant).
 */
export type GroupComputer = (
  responses: readonly WeightedResponse[]
) => Result<StatisticBundle, InsufficientDataError>;

// ─────────────────────────────────────────────────────────────────────────────
// Groups and output rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Statistic for one (geo id, day) group, with the contributions that
 * produced it so the megacounty merger can pool them again.
 */
export interface GroupEstimate {
  readonly geoId: string;
  readonly day: IsoDay;
  readonly statistic: StatisticBundle;
  readonly responses: readonly WeightedResponse[];
}

export interface MegacountyEstimate extends GroupEstimate {
  readonly constituents: readonly string[];
}

/**
 * Result of merging one day's county groups.
 */
export interface MegacountyMerge {
  readonly retained: readonly GroupEstimate[];
  readonly megacounties: readonly MegacountyEstimate[];
}

export type Variant = 'raw' | 'adjusted';

/**
 * Missingness codes written beside each output value.
 */
export enum MissingCode {
  NOT_MISSING = 0,
  NOT_APPLICABLE = 1,
  REGION_EXCEPTION = 2,
  CENSORED = 3,
  DELETED = 4,
  OTHER = 5,
}

/**
 * One finished aggregate.
 */
export interface AggregateRow {
  readonly signal: string;
  readonly indicator: string;
  readonly geoLevel: GeoLevel;
  readonly geoId: string;
  readonly day: IsoDay;
  readonly value: number;
  readonly standardError: StandardError;
  readonly sampleSize: number;
  readonly effectiveSampleSize: number;
  /** Pooled counties when this is a megacounty row */
  readonly megacounty?: readonly string[];
  readonly missingValue: MissingCode;
  readonly missingStandardError: MissingCode;
  readonly missingSampleSize: MissingCode;
}

/**
 * Rows that make up one export file.
 */
export interface ExportFile {
  readonly day: IsoDay;
  readonly geoLevel: GeoLevel;
  readonly signal: string;
  readonly rows: readonly AggregateRow[];
}
