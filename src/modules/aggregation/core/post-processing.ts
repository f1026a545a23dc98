import { Decimal } from 'decimal.js';

import { UNDEFINED_SE, type PostProcessingKind, type StatisticBundle } from './types.js';

/**
 * Jeffreys adjustment for percentages: shrinks the estimate toward 50% by
 * half an observation and recomputes the binomial standard error around the
 * shrunk value, so 0% and 100% never report a zero standard error.
 *
 *   p' = (p·n + 50) / (n + 1),  se = √( p'(100 − p') / n )
 *
 * An undefined standard error stays undefined.
 */
export function applyJeffreys(statistic: StatisticBundle): StatisticBundle {
  const n = new Decimal(statistic.sampleSize);
  const adjusted = new Decimal(statistic.estimate).mul(n).plus(50).div(n.plus(1));

  const standardError =
    statistic.standardError === UNDEFINED_SE
      ? UNDEFINED_SE
      : adjusted.mul(new Decimal(100).minus(adjusted)).div(n).sqrt().toNumber();

  return { ...statistic, estimate: adjusted.toNumber(), standardError };
}

export function postProcess(kind: PostProcessingKind, statistic: StatisticBundle): StatisticBundle {
  switch (kind) {
    case 'none':
      return statistic;
    case 'jeffreys':
      return applyJeffreys(statistic);
  }
}
