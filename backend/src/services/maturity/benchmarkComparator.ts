/**
 * Benchmark Comparator
 * Percentile standing of a score within an industry peer distribution.
 *
 * percentile = (peers below + 0.5 * peers equal) / peer count * 100
 *
 * The midpoint term gives a stable answer when the subject ties existing
 * peer observations. Median (p50) and best-in-class (p90) use linear
 * interpolation between the closest ranks.
 */

import {
  AssessmentStatus,
  DIMENSIONS,
  GapSeverity,
  type Assessment,
  type Benchmark,
  type BenchmarkComparison,
  type BenchmarkScope,
  type Dimension,
  type DimensionGap,
  type Industry,
  type PercentileResult,
} from '@maturity/shared';
import { NotFoundError, StateError, ValidationError } from '../../lib/errors.js';
import { classifyMaturity } from './maturityClassifier.js';
import type { MaturityBand } from './ruleCatalog.js';
import { roundScore } from './weighting.js';

export interface ComparatorOptions {
  /** Below this many peers the result is flagged `lowConfidence`. */
  minPeerCount: number;
  /** Bands for gap levels; the default catalog's when omitted. */
  maturityBands?: readonly MaturityBand[];
}

export const MEDIAN_QUANTILE = 0.5;
export const BEST_IN_CLASS_QUANTILE = 0.9;

// Lower bounds of gap size, checked in order
const GAP_SEVERITY_THRESHOLDS: ReadonlyArray<readonly [number, GapSeverity]> = [
  [30, GapSeverity.CRITICAL],
  [20, GapSeverity.HIGH],
  [10, GapSeverity.MEDIUM],
];

export const DEFAULT_COMPARATOR_OPTIONS: ComparatorOptions = {
  minPeerCount: 5,
};

export function computePercentile(score: number, peerScores: readonly number[]): number {
  if (!Number.isFinite(score)) {
    throw new ValidationError(`Score must be a finite number, got ${score}`, { score });
  }
  if (peerScores.length === 0) {
    throw new ValidationError('Peer distribution is empty');
  }

  let below = 0;
  let equal = 0;
  for (const peer of peerScores) {
    if (peer < score) {
      below++;
    } else if (peer === score) {
      equal++;
    }
  }

  return ((below + 0.5 * equal) * 100) / peerScores.length;
}

export function peerQuantile(peerScores: readonly number[], quantile: number): number {
  if (peerScores.length === 0) {
    throw new ValidationError('Peer distribution is empty');
  }
  if (!(quantile >= 0 && quantile <= 1)) {
    throw new ValidationError(`Quantile must be within [0, 1], got ${quantile}`, { quantile });
  }

  const sorted = [...peerScores].sort((a, b) => a - b);
  const position = (sorted.length - 1) * quantile;
  const lowerIndex = Math.floor(position);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[Math.ceil(position)] ?? lower;
  return roundScore(lower + (upper - lower) * (position - lowerIndex));
}

export function gapSeverity(gapSize: number): GapSeverity {
  for (const [threshold, severity] of GAP_SEVERITY_THRESHOLDS) {
    if (gapSize >= threshold) return severity;
  }
  return GapSeverity.LOW;
}

/**
 * Gap from each dimension score to its best-in-class threshold, largest
 * first. Equal gaps keep dimension order.
 */
export function analyzeGaps(
  dimensions: Readonly<Record<Dimension, PercentileResult>>,
  bands?: readonly MaturityBand[]
): DimensionGap[] {
  const gaps = DIMENSIONS.map((dimension): DimensionGap => {
    const { score, bestInClass } = dimensions[dimension];
    const gapSize = roundScore(Math.max(0, bestInClass - score));
    return {
      dimension,
      currentScore: score,
      bestInClassScore: bestInClass,
      gapSize,
      gapPercent: bestInClass > 0 ? Math.round((gapSize / bestInClass) * 1000) / 10 : 0,
      severity: gapSeverity(gapSize),
      currentLevel: classifyMaturity(score, bands).level,
      targetLevel: classifyMaturity(bestInClass, bands).level,
    };
  });

  return gaps.sort((a, b) => b.gapSize - a.gapSize);
}

/**
 * Most recently refreshed benchmark for the industry/scope pair.
 */
export function findBenchmark(
  benchmarks: readonly Benchmark[],
  industry: Industry,
  scope: BenchmarkScope
): Benchmark {
  let match: Benchmark | undefined;
  for (const benchmark of benchmarks) {
    if (benchmark.industry !== industry || benchmark.scope !== scope) continue;
    if (!match || benchmark.updatedAt.getTime() > match.updatedAt.getTime()) {
      match = benchmark;
    }
  }

  if (!match) {
    throw new NotFoundError(`Benchmark for industry '${industry}' and scope '${scope}'`);
  }
  return match;
}

export function percentileAgainst(
  score: number,
  industry: Industry,
  scope: BenchmarkScope,
  benchmarks: readonly Benchmark[],
  options: ComparatorOptions = DEFAULT_COMPARATOR_OPTIONS
): PercentileResult {
  const benchmark = findBenchmark(benchmarks, industry, scope);
  const percentile = computePercentile(score, benchmark.peerScores);
  const peerCount = benchmark.peerScores.length;
  const median = peerQuantile(benchmark.peerScores, MEDIAN_QUANTILE);

  return {
    scope,
    score,
    percentile,
    peerCount,
    lowConfidence: peerCount < options.minPeerCount,
    benchmarkId: benchmark.id,
    period: benchmark.period,
    median,
    bestInClass: peerQuantile(benchmark.peerScores, BEST_IN_CLASS_QUANTILE),
    vsMedian: roundScore(score - median),
    aboveMedian: score >= median,
  };
}

/**
 * Compare one of a completed assessment's scores against its industry.
 */
export function compareScore(
  assessment: Assessment,
  scope: BenchmarkScope,
  benchmarks: readonly Benchmark[],
  options: ComparatorOptions = DEFAULT_COMPARATOR_OPTIONS
): PercentileResult {
  return percentileAgainst(
    scoreForScope(assessment, scope),
    assessment.industry,
    scope,
    benchmarks,
    options
  );
}

/**
 * Overall score plus all five dimensions.
 */
export function compareAssessment(
  assessment: Assessment,
  benchmarks: readonly Benchmark[],
  options: ComparatorOptions = DEFAULT_COMPARATOR_OPTIONS
): BenchmarkComparison {
  const compare = (scope: BenchmarkScope): PercentileResult =>
    compareScore(assessment, scope, benchmarks, options);

  const dimensions: Record<Dimension, PercentileResult> = {
    data: compare('data'),
    process: compare('process'),
    people: compare('people'),
    technology: compare('technology'),
    governance: compare('governance'),
  };

  return {
    assessmentId: assessment.id,
    industry: assessment.industry,
    overall: compare('overall'),
    dimensions,
    gaps: analyzeGaps(dimensions, options.maturityBands),
  };
}

function scoreForScope(assessment: Assessment, scope: BenchmarkScope): number {
  if (assessment.status !== AssessmentStatus.COMPLETED) {
    throw new StateError(
      `Assessment ${assessment.id} is not completed (status: ${assessment.status})`,
      { assessmentId: assessment.id, status: assessment.status }
    );
  }

  const score = scope === 'overall' ? assessment.overallScore : assessment.dimensionScores?.[scope];
  if (score === null || score === undefined) {
    throw new StateError(`Assessment ${assessment.id} has no ${scope} score`, {
      assessmentId: assessment.id,
      scope,
    });
  }
  return score;
}

export default {
  computePercentile,
  peerQuantile,
  gapSeverity,
  analyzeGaps,
  findBenchmark,
  percentileAgainst,
  compareScore,
  compareAssessment,
};
