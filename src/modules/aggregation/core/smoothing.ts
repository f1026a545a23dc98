import { addDays, dayRange, type IsoDay } from '@/common/types/day.js';

import type { RunConfig } from './types.js';

/**
 * Range of days, both ends inclusive.
 */
export interface DaySpan {
  readonly first: IsoDay;
  readonly last: IsoDay;
}

/**
 * The `length` input days ending at (and including) `day`, oldest first.
 */
export function windowDays(day: IsoDay, length: number): IsoDay[] {
  return dayRange(addDays(day, -(length - 1)), day);
}

/**
 * Days the run reports: `[start_date − backfill_days, end_date]`.
 */
export function outputDaySpan(
  config: Pick<RunConfig, 'startDate' | 'endDate' | 'backfillDays'>
): DaySpan {
  return {
    first: addDays(config.startDate, -config.backfillDays),
    last: config.endDate,
  };
}

export function outputDayRange(
  config: Pick<RunConfig, 'startDate' | 'endDate' | 'backfillDays'>
): IsoDay[] {
  const span = outputDaySpan(config);
  return dayRange(span.first, span.last);
}

/**
 * Input days needed so that the earliest output day still has a full
 * window of `length` days.
 */
export function inputDaySpan(
  config: Pick<RunConfig, 'startDate' | 'endDate' | 'backfillDays'>,
  length: number
): DaySpan {
  const output = outputDaySpan(config);
  return { first: addDays(output.first, -(length - 1)), last: output.last };
}

/**
 * Input days any indicator of the run can read: the span of the longest
 * smoothing window.
 */
export function runInputSpan(
  config: Pick<RunConfig, 'startDate' | 'endDate' | 'backfillDays' | 'indicators'>
): DaySpan {
  const longest = Math.max(1, ...config.indicators.map((i) => i.smoothingWindowDays));
  return inputDaySpan(config, longest);
}

/**
 * A day is only reported when its whole window lies on or after the first
 * day with data. Partially covered windows are never averaged.
 */
export function isFullWindow(day: IsoDay, length: number, firstAvailableDay: IsoDay): boolean {
  return addDays(day, -(length - 1)) >= firstAvailableDay;
}
