import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createInsufficientDataError, type InsufficientDataError } from './errors.js';
import {
  UNDEFINED_SE,
  type StandardError,
  type StatisticBundle,
  type StatisticKind,
  type WeightedResponse,
} from './types.js';

/**
 * Below this sample size the standard error is not computable.
 */
export const MIN_SAMPLE_SIZE_FOR_SE = 2;

interface WeightedSums {
  count: number;
  totalWeight: Decimal;
  weightedValue: Decimal;
  squaredWeight: Decimal;
  sampleSize: Decimal;
}

/**
 * Sums in the order given. Decimal arithmetic keeps the totals independent
 * of floating-point accumulation.
 */
function sumResponses(responses: readonly WeightedResponse[]): WeightedSums {
  let totalWeight = new Decimal(0);
  let weightedValue = new Decimal(0);
  let squaredWeight = new Decimal(0);
  let sampleSize = new Decimal(0);

  for (const response of responses) {
    const weight = new Decimal(response.weight);
    totalWeight = totalWeight.plus(weight);
    weightedValue = weightedValue.plus(weight.mul(response.value));
    squaredWeight = squaredWeight.plus(weight.mul(weight));
    sampleSize = sampleSize.plus(response.share);
  }

  return { count: responses.length, totalWeight, weightedValue, squaredWeight, sampleSize };
}

function validateSums(
  responses: readonly WeightedResponse[]
): Result<WeightedSums, InsufficientDataError> {
  if (responses.length === 0) {
    return err(createInsufficientDataError());
  }
  const sums = sumResponses(responses);
  if (sums.totalWeight.lte(0)) {
    return err(createInsufficientDataError('group has no positive weight'));
  }
  return ok(sums);
}

/**
 * Kish effective sample size: (Σw)² / Σw².
 */
function effectiveSampleSize(sums: WeightedSums): Decimal {
  return sums.totalWeight.pow(2).div(sums.squaredWeight);
}

const hasComputableSe = (sums: WeightedSums): boolean =>
  sums.count >= MIN_SAMPLE_SIZE_FOR_SE && sums.sampleSize.gte(MIN_SAMPLE_SIZE_FOR_SE);

/**
 * Inverse-probability-weighted mean.
 *
 * The standard error is the sandwich estimate
 * √( n/(n−1) · Σ (wᵢ/Σw)² (xᵢ − x̄)² ), which reduces to s/√n when every
 * weight is equal.
 */
export function computeWeightedMean(
  responses: readonly WeightedResponse[]
): Result<StatisticBundle, InsufficientDataError> {
  const sumsResult = validateSums(responses);
  if (sumsResult.isErr()) {
    return err(sumsResult.error);
  }
  const sums = sumsResult.value;
  const mean = sums.weightedValue.div(sums.totalWeight);

  let standardError: StandardError = UNDEFINED_SE;
  if (hasComputableSe(sums)) {
    let spread = new Decimal(0);
    for (const response of responses) {
      const normalized = new Decimal(response.weight).div(sums.totalWeight);
      const deviation = new Decimal(response.value).minus(mean);
      spread = spread.plus(normalized.pow(2).mul(deviation.pow(2)));
    }
    const correction = new Decimal(sums.count).div(sums.count - 1);
    standardError = spread.mul(correction).sqrt().toNumber();
  }

  return ok({
    estimate: mean.toNumber(),
    standardError,
    sampleSize: sums.sampleSize.toNumber(),
    effectiveSampleSize: effectiveSampleSize(sums).toNumber(),
  });
}

/**
 * Weighted percentage of a 0/1 response.
 *
 * Standard error: 100 · √( p(1−p) / effective sample size ).
 */
export function computeBinaryPercentage(
  responses: readonly WeightedResponse[]
): Result<StatisticBundle, InsufficientDataError> {
  const sumsResult = validateSums(responses);
  if (sumsResult.isErr()) {
    return err(sumsResult.error);
  }
  const sums = sumsResult.value;
  const proportion = sums.weightedValue.div(sums.totalWeight);
  const effective = effectiveSampleSize(sums);

  const standardError: StandardError = hasComputableSe(sums)
    ? Decimal.max(0, proportion.mul(new Decimal(1).minus(proportion)))
        .div(effective)
        .sqrt()
        .mul(100)
        .toNumber()
    : UNDEFINED_SE;

  return ok({
    estimate: proportion.mul(100).toNumber(),
    standardError,
    sampleSize: sums.sampleSize.toNumber(),
    effectiveSampleSize: effective.toNumber(),
  });
}

/**
 * Dispatches on the closed set of statistic kinds. Multiselect choices are
 * percentages of a 0/1 indicator per choice.
 */
export function computeStatistic(
  kind: StatisticKind,
  responses: readonly WeightedResponse[]
): Result<StatisticBundle, InsufficientDataError> {
  switch (kind) {
    case 'mean':
      return computeWeightedMean(responses);
    case 'binary_percentage':
    case 'multiselect_percentage':
      return computeBinaryPercentage(responses);
  }
}
