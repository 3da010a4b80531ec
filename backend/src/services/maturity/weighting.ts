/**
 * Weighted Average
 * Shared by dimension aggregation, overall scoring and roadmap priority
 */

import { DIMENSIONS, type DimensionWeights } from '@maturity/shared';
import { ValidationError } from '../../lib/errors.js';

export interface WeightedValue {
  value: number;
  weight: number;
}

/**
 * `renormalize` divides by the weight sum; `none` expects weights that
 * already sum to 1.0 and returns the plain weighted sum.
 */
export type RenormalizationPolicy = 'renormalize' | 'none';

export const WEIGHT_SUM_TOLERANCE = 0.001;

/**
 * value × weight per category, after validating every entry.
 */
export function weightedContributions(
  entries: Readonly<Record<string, WeightedValue>>
): Record<string, number> {
  const contributions: Record<string, number> = {};

  for (const [category, { value, weight }] of Object.entries(entries)) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Value for '${category}' is not a finite number`, { category, value });
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ValidationError(`Weight for '${category}' must be a non-negative number`, { category, weight });
    }
    contributions[category] = value * weight;
  }

  return contributions;
}

export function weightedAverage(
  entries: Readonly<Record<string, WeightedValue>>,
  policy: RenormalizationPolicy = 'renormalize'
): number {
  const contributions = weightedContributions(entries);
  const categories = Object.keys(contributions);
  if (categories.length === 0) {
    throw new ValidationError('Cannot compute a weighted average of no values');
  }

  let weightSum = 0;
  let weightedSum = 0;
  for (const category of categories) {
    weightSum += entries[category]?.weight ?? 0;
    weightedSum += contributions[category] ?? 0;
  }

  if (weightSum <= 0) {
    throw new ValidationError('At least one weight must be positive');
  }

  if (policy === 'none') {
    assertWeightSum(weightSum);
    return weightedSum;
  }

  return weightedSum / weightSum;
}

/**
 * Validate a dimension weight table: every dimension present, non-negative,
 * summing to 1.0.
 */
export function validateDimensionWeights(weights: Readonly<Partial<DimensionWeights>>): DimensionWeights {
  const missing = DIMENSIONS.filter((dimension) => weights[dimension] === undefined);
  if (missing.length > 0) {
    throw new ValidationError(`Dimension weights missing for: ${missing.join(', ')}`, { missing });
  }

  const table: DimensionWeights = {
    data: weights.data ?? 0,
    process: weights.process ?? 0,
    people: weights.people ?? 0,
    technology: weights.technology ?? 0,
    governance: weights.governance ?? 0,
  };

  let sum = 0;
  for (const dimension of DIMENSIONS) {
    const weight = table[dimension];
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ValidationError(`Weight for '${dimension}' must be a non-negative number`, { dimension, weight });
    }
    sum += weight;
  }
  assertWeightSum(sum);

  return table;
}

function assertWeightSum(sum: number): void {
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ValidationError(`Weights must sum to 1.0, got ${sum.toFixed(3)}`, { weightSum: sum });
  }
}

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}
