/**
 * Aggregate Unit Use Case
 *
 * A unit is one signal at one geography level in one variant (raw or
 * weekday-adjusted). Units share only read-only inputs and keep their own
 * accumulators, so they can run in any order or concurrently.
 *
 * Stages:
 * 1. compute - bucket contributions by (geo id, day) and evaluate each
 *    output day's smoothing window
 * 2. merge - megacounty pooling for counties, threshold suppression elsewhere
 * 3. postprocess - indicator post function and missingness codes
 */

import { distributeWeight, type GeoLevel } from '@/modules/geo/index.js';

import {
  createUndefinedStandardErrorWarning,
  type UndefinedStandardErrorWarning,
} from '../errors.js';
import { applyMegacounties } from '../megacounty.js';
import { missingCodesFor } from '../missingness.js';
import { postProcess } from '../post-processing.js';
import { inputDaySpan, isFullWindow, outputDayRange, windowDays } from '../smoothing.js';
import { computeStatistic } from '../statistics.js';
import {
  UNDEFINED_SE,
  type AggregateRow,
  type GroupComputer,
  type GroupEstimate,
  type IsoDay,
  type MegacountyEstimate,
  type RunConfig,
  type SignalSpec,
  type Variant,
  type WeightedResponse,
} from '../types.js';
import { adjustForWeekday } from '../weekday.js';

import type { ResolvedLevel } from './resolve-geographies.js';

/**
 * Suffix of weekday-adjusted signals.
 */
export const ADJUSTED_SUFFIX = '_adj';

export interface AggregationUnit {
  readonly key: string;
  readonly signal: SignalSpec;
  readonly level: GeoLevel;
  readonly variant: Variant;
  /** Signal name written to the output */
  readonly outputSignal: string;
}

/**
 * Per-unit data-completeness counters.
 */
export interface UnitDiagnostics {
  readonly unit: string;
  readonly signal: string;
  readonly indicator: string;
  readonly geoLevel: GeoLevel;
  readonly variant: Variant;
  /** Rows without a crosswalk entry at this level */
  readonly unmappedRows: number;
  readonly missingValues: number;
  readonly invalidValues: number;
  readonly invalidWeights: number;
  /** Output days skipped because their window starts before the data */
  readonly partialWindowDays: number;
  /** (geo id, day) groups with no contributing responses */
  readonly insufficientGroups: number;
  /** `insufficientGroups` split by output day; days without any are left out */
  readonly insufficientGroupsByDay: Readonly<Record<IsoDay, number>>;
  /** Non-county groups below the sample size threshold */
  readonly suppressedGroups: number;
  readonly megacountyRows: number;
  readonly undefinedStandardErrors: number;
  readonly undefinedStandardErrorsByDay: Readonly<Record<IsoDay, number>>;
  readonly rowsEmitted: number;
}

export interface UnitComputation {
  readonly unit: AggregationUnit;
  readonly compute: GroupComputer;
  readonly groups: readonly GroupEstimate[];
  readonly diagnostics: UnitDiagnostics;
}

export interface UnitMerge {
  readonly unit: AggregationUnit;
  readonly estimates: readonly (GroupEstimate | MegacountyEstimate)[];
  readonly diagnostics: UnitDiagnostics;
}

export interface UnitOutput {
  readonly unit: AggregationUnit;
  readonly rows: readonly AggregateRow[];
  /** One per emitted row whose standard error is undefined */
  readonly warnings: readonly UndefinedStandardErrorWarning[];
  readonly diagnostics: UnitDiagnostics;
}

/**
 * Units for every signal × level, plus the adjusted variant when weekday
 * adjustment is on. Order is fixed by the inputs.
 */
export function planUnits(
  signals: readonly SignalSpec[],
  levels: readonly GeoLevel[],
  weekdayAdjustment: boolean
): AggregationUnit[] {
  const variants: Variant[] = weekdayAdjustment ? ['raw', 'adjusted'] : ['raw'];
  const units: AggregationUnit[] = [];

  for (const signal of signals) {
    for (const variant of variants) {
      const outputSignal =
        variant === 'adjusted' ? `${signal.name}${ADJUSTED_SUFFIX}` : signal.name;
      for (const level of levels) {
        units.push({ key: `${outputSignal}:${level}`, signal, level, variant, outputSignal });
      }
    }
  }
  return units;
}

/**
 * The unit's statistic function. Adjusted units re-weight each group
 * (including pooled megacounty groups) before computing.
 */
export function groupComputerFor(unit: AggregationUnit): GroupComputer {
  const { statistic } = unit.signal;
  if (unit.variant === 'adjusted') {
    return (responses) => computeStatistic(statistic, adjustForWeekday(responses));
  }
  return (responses) => computeStatistic(statistic, responses);
}

const emptyDiagnostics = (unit: AggregationUnit, unmappedRows: number): UnitDiagnostics => ({
  unit: unit.key,
  signal: unit.outputSignal,
  indicator: unit.signal.indicator.name,
  geoLevel: unit.level,
  variant: unit.variant,
  unmappedRows,
  missingValues: 0,
  invalidValues: 0,
  invalidWeights: 0,
  partialWindowDays: 0,
  insufficientGroups: 0,
  insufficientGroupsByDay: {},
  suppressedGroups: 0,
  megacountyRows: 0,
  undefinedStandardErrors: 0,
  undefinedStandardErrorsByDay: {},
  rowsEmitted: 0,
});

const countByDay = (days: readonly IsoDay[]): Record<IsoDay, number> => {
  const counts: Record<IsoDay, number> = {};
  for (const day of days) {
    counts[day] = (counts[day] ?? 0) + 1;
  }
  return counts;
};

/**
 * Computes one statistic per (geo id, output day) from the responses in the
 * day's smoothing window.
 *
 * @param firstAvailableDay - Earliest day present in the response table
 */
export function computeUnit(
  unit: AggregationUnit,
  resolved: ResolvedLevel,
  config: RunConfig,
  firstAvailableDay: IsoDay | undefined
): UnitComputation {
  const { indicator, statistic, extract } = unit.signal;
  const windowLength = indicator.smoothingWindowDays;
  const span = inputDaySpan(config, windowLength);
  const compute = groupComputerFor(unit);

  let missingValues = 0;
  let invalidValues = 0;
  let invalidWeights = 0;
  let partialWindowDays = 0;
  const insufficientDays: IsoDay[] = [];

  // geo id -> day -> contributions, each list in table order
  const buckets = new Map<string, Map<IsoDay, WeightedResponse[]>>();

  for (const { row, memberships } of resolved.rows) {
    if (row.day < span.first || row.day > span.last) continue;

    const value = extract(row);
    if (value === null) {
      missingValues += 1;
      continue;
    }
    if (statistic === 'binary_percentage' && value !== 0 && value !== 1) {
      invalidValues += 1;
      continue;
    }

    const weight = row.values[indicator.weightColumn];
    if (weight === undefined || weight === null || !Number.isFinite(weight) || weight <= 0) {
      invalidWeights += 1;
      continue;
    }

    for (const part of distributeWeight(weight, memberships)) {
      const byDay = buckets.get(part.geoId) ?? new Map<IsoDay, WeightedResponse[]>();
      const responses = byDay.get(row.day) ?? [];
      responses.push({ value, weight: part.weight, share: part.share, day: row.day });
      byDay.set(row.day, responses);
      buckets.set(part.geoId, byDay);
    }
  }

  const geoIds = [...buckets.keys()].sort();
  const groups: GroupEstimate[] = [];

  if (firstAvailableDay !== undefined) {
    for (const day of outputDayRange(config)) {
      if (!isFullWindow(day, windowLength, firstAvailableDay)) {
        partialWindowDays += 1;
        continue;
      }
      const days = windowDays(day, windowLength);

      for (const geoId of geoIds) {
        const byDay = buckets.get(geoId);
        const responses = days.flatMap((d) => byDay?.get(d) ?? []);
        const result = compute(responses);
        if (result.isErr()) {
          insufficientDays.push(day);
          continue;
        }
        groups.push({ geoId, day, statistic: result.value, responses });
      }
    }
  }

  return {
    unit,
    compute,
    groups,
    diagnostics: {
      ...emptyDiagnostics(unit, resolved.unmappedRows),
      missingValues,
      invalidValues,
      invalidWeights,
      partialWindowDays,
      insufficientGroups: insufficientDays.length,
      insufficientGroupsByDay: countByDay(insufficientDays),
    },
  };
}

/**
 * Applies the sample size floor. County groups below the threshold are
 * pooled into per-state megacounties day by day; groups at other levels
 * below the threshold are suppressed.
 */
export function mergeUnit(computation: UnitComputation, config: RunConfig): UnitMerge {
  const { unit, groups, compute, diagnostics } = computation;
  const threshold = config.sampleSizeThreshold;

  if (unit.level === 'county') {
    const estimates: (GroupEstimate | MegacountyEstimate)[] = [];
    let megacountyRows = 0;

    for (const merge of applyMegacounties(groups, threshold, compute).values()) {
      estimates.push(...merge.retained, ...merge.megacounties);
      megacountyRows += merge.megacounties.length;
    }
    return { unit, estimates, diagnostics: { ...diagnostics, megacountyRows } };
  }

  const estimates = groups.filter((group) => group.statistic.sampleSize >= threshold);
  return {
    unit,
    estimates,
    diagnostics: { ...diagnostics, suppressedGroups: groups.length - estimates.length },
  };
}

const isMegacounty = (
  estimate: GroupEstimate | MegacountyEstimate
): estimate is MegacountyEstimate => 'constituents' in estimate;

/**
 * Runs the indicator's post-processing and shapes the output rows.
 */
export function postprocessUnit(merge: UnitMerge): UnitOutput {
  const { unit, estimates, diagnostics } = merge;
  const { indicator } = unit.signal;

  const rows = estimates.map((estimate): AggregateRow => {
    const statistic = postProcess(indicator.post, estimate.statistic);
    return {
      signal: unit.outputSignal,
      indicator: indicator.name,
      geoLevel: unit.level,
      geoId: estimate.geoId,
      day: estimate.day,
      value: statistic.estimate,
      standardError: statistic.standardError,
      sampleSize: statistic.sampleSize,
      effectiveSampleSize: statistic.effectiveSampleSize,
      ...(isMegacounty(estimate) && { megacounty: estimate.constituents }),
      ...missingCodesFor(statistic),
    };
  });

  const warnings = rows
    .filter((row) => row.standardError === UNDEFINED_SE)
    .map((row) => createUndefinedStandardErrorWarning(row.sampleSize));

  return {
    unit,
    rows,
    warnings,
    diagnostics: {
      ...diagnostics,
      undefinedStandardErrors: warnings.length,
      undefinedStandardErrorsByDay: countByDay(
        rows.filter((row) => row.standardError === UNDEFINED_SE).map((row) => row.day)
      ),
      rowsEmitted: rows.length,
    },
  };
}
