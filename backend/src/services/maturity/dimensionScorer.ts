/**
 * Dimension Scorer
 * Aggregates per-question responses into five dimension scores and a
 * weighted overall score. Pure: persistence belongs to the caller.
 */

import {
  DIMENSIONS,
  type Dimension,
  type DimensionResponse,
  type DimensionScores,
  type DimensionWeights,
} from '@maturity/shared';
import { ValidationError } from '../../lib/errors.js';
import {
  roundScore,
  validateDimensionWeights,
  weightedAverage,
  type WeightedValue,
} from './weighting.js';

export interface DimensionScoringResult {
  dimensionScores: DimensionScores;
  overallScore: number;
}

type ScoredResponse = Pick<DimensionResponse, 'dimension' | 'questionId' | 'value' | 'weight'>;

/** Response as it arrives from outside: the dimension is not yet known to be valid. */
export type ScoringInput = Omit<ScoredResponse, 'dimension'> & { dimension: string };

function isDimension(value: string): value is Dimension {
  return DIMENSIONS.some((dimension) => dimension === value);
}

export function scoreDimensions(
  responses: readonly ScoringInput[],
  weights: DimensionWeights
): DimensionScoringResult {
  const weightTable = validateDimensionWeights(weights);

  const known: ScoredResponse[] = [];
  const unknown: ScoringInput[] = [];
  for (const response of responses) {
    const { dimension } = response;
    if (isDimension(dimension)) {
      known.push({ ...response, dimension });
    } else {
      unknown.push(response);
    }
  }
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown dimensions for questions: ${unknown.map((response) => response.questionId).join(', ')}`,
      {
        questions: unknown.map((response) => ({ questionId: response.questionId, dimension: response.dimension })),
      }
    );
  }

  const outOfRange = responses.filter(
    (response) => !Number.isFinite(response.value) || response.value < 0 || response.value > 100
  );
  if (outOfRange.length > 0) {
    throw new ValidationError('Response values must be within [0, 100]', {
      questions: outOfRange.map((response) => ({
        questionId: response.questionId,
        value: response.value,
      })),
    });
  }

  const byDimension = groupByDimension(known);
  const missing = DIMENSIONS.filter((dimension) => byDimension[dimension].length === 0);
  if (missing.length > 0) {
    throw new ValidationError(`Responses missing for dimensions: ${missing.join(', ')}`, { missing });
  }

  const rawScores: DimensionScores = {
    data: scoreDimension(byDimension.data),
    process: scoreDimension(byDimension.process),
    people: scoreDimension(byDimension.people),
    technology: scoreDimension(byDimension.technology),
    governance: scoreDimension(byDimension.governance),
  };

  const overallEntries: Record<string, WeightedValue> = {};
  for (const dimension of DIMENSIONS) {
    overallEntries[dimension] = { value: rawScores[dimension], weight: weightTable[dimension] };
  }
  const overallScore = roundScore(weightedAverage(overallEntries, 'none'));

  return {
    dimensionScores: {
      data: roundScore(rawScores.data),
      process: roundScore(rawScores.process),
      people: roundScore(rawScores.people),
      technology: roundScore(rawScores.technology),
      governance: roundScore(rawScores.governance),
    },
    overallScore,
  };
}

function groupByDimension(responses: readonly ScoredResponse[]): Record<Dimension, ScoredResponse[]> {
  const groups: Record<Dimension, ScoredResponse[]> = {
    data: [],
    process: [],
    people: [],
    technology: [],
    governance: [],
  };
  for (const response of responses) {
    groups[response.dimension].push(response);
  }
  return groups;
}

// Responses without an explicit weight count equally
function scoreDimension(responses: readonly ScoredResponse[]): number {
  const entries: Record<string, WeightedValue> = {};
  responses.forEach((response, index) => {
    entries[`${response.questionId}#${index}`] = {
      value: response.value,
      weight: response.weight ?? 1,
    };
  });
  return weightedAverage(entries, 'renormalize');
}

export default {
  scoreDimensions,
};
