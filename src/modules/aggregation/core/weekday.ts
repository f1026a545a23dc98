import { Decimal } from 'decimal.js';

import { isWeekend } from '@/common/types/day.js';

import type { WeightedResponse } from './types.js';

const WEEKDAY_SHARE = new Decimal(5).div(7);
const WEEKEND_SHARE = new Decimal(2).div(7);

/**
 * Re-weights a group so weekday responses carry 5/7 and weekend responses
 * 2/7 of its total weight.
 *
 * Groups whose window holds only weekdays or only weekend days are returned
 * as they are. Shares (and therefore sample sizes) never change.
 */
export function adjustForWeekday(
  responses: readonly WeightedResponse[]
): readonly WeightedResponse[] {
  let weekdayWeight = new Decimal(0);
  let weekendWeight = new Decimal(0);

  for (const response of responses) {
    if (isWeekend(response.day)) {
      weekendWeight = weekendWeight.plus(response.weight);
    } else {
      weekdayWeight = weekdayWeight.plus(response.weight);
    }
  }

  if (weekdayWeight.isZero() || weekendWeight.isZero()) {
    return responses;
  }

  const total = weekdayWeight.plus(weekendWeight);
  const weekdayScale = total.mul(WEEKDAY_SHARE).div(weekdayWeight);
  const weekendScale = total.mul(WEEKEND_SHARE).div(weekendWeight);

  return responses.map((response) => ({
    ...response,
    weight: new Decimal(response.weight)
      .mul(isWeekend(response.day) ? weekendScale : weekdayScale)
      .toNumber(),
  }));
}
