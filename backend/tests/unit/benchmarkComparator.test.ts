import { describe, it, expect } from 'vitest';
import type { Benchmark, BenchmarkScope } from '@maturity/shared';
import { NotFoundError, StateError, ValidationError } from '../../src/lib/errors.js';
import {
  analyzeGaps,
  compareAssessment,
  computePercentile,
  findBenchmark,
  gapSeverity,
  peerQuantile,
  percentileAgainst,
} from '../../src/services/maturity/benchmarkComparator.js';
import { buildAssessment, buildCompletedAssessment, START } from '../utils/testHelpers.js';

const DECILES = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
const SCOPES: BenchmarkScope[] = ['overall', 'data', 'process', 'people', 'technology', 'governance'];

function benchmark(scope: BenchmarkScope, peerScores: number[], overrides: Partial<Benchmark> = {}): Benchmark {
  return {
    id: `bench-${scope}`,
    industry: 'manufacturing',
    scope,
    period: '2024-Q1',
    peerScores,
    updatedAt: START,
    ...overrides,
  };
}

describe('computePercentile', () => {
  it('counts ties at half weight', () => {
    expect(computePercentile(30, [10, 20, 30, 30, 40])).toBe(60);
  });

  it('covers the extremes', () => {
    expect(computePercentile(5, [10, 20])).toBe(0);
    expect(computePercentile(50, [10, 20])).toBe(100);
  });

  it('rejects an empty distribution', () => {
    expect(() => computePercentile(50, [])).toThrow('Peer distribution is empty');
  });
});

describe('peerQuantile', () => {
  it('interpolates between the closest ranks', () => {
    expect(peerQuantile(DECILES, 0.5)).toBe(55);
    expect(peerQuantile(DECILES, 0.9)).toBe(91);
  });

  it('sorts the distribution first', () => {
    expect(peerQuantile([30, 10, 20], 0.5)).toBe(20);
  });

  it('returns the only peer of a single-peer distribution', () => {
    expect(peerQuantile([42], 0.9)).toBe(42);
  });

  it('rejects an empty distribution', () => {
    expect(() => peerQuantile([], 0.5)).toThrow(ValidationError);
  });
});

describe('gapSeverity', () => {
  it.each([
    [45, 'critical'],
    [30, 'critical'],
    [29.99, 'high'],
    [20, 'high'],
    [10, 'medium'],
    [9.99, 'low'],
    [0, 'low'],
  ])('grades a gap of %s as %s', (gap, severity) => {
    expect(gapSeverity(gap)).toBe(severity);
  });
});

describe('findBenchmark', () => {
  it('prefers the most recently updated distribution', () => {
    const older = benchmark('overall', [10], { id: 'older', period: '2023-Q4' });
    const newer = benchmark('overall', [20], { id: 'newer', updatedAt: new Date('2024-04-01T00:00:00Z') });

    expect(findBenchmark([older, newer], 'manufacturing', 'overall').id).toBe('newer');
  });

  it('raises NotFoundError when the industry has no distribution', () => {
    expect(() => findBenchmark([benchmark('overall', DECILES)], 'retail', 'overall')).toThrow(
      new NotFoundError("Benchmark for industry 'retail' and scope 'overall'")
    );
  });
});

describe('percentileAgainst', () => {
  it('flags small peer groups as low confidence', () => {
    const result = percentileAgainst(25, 'manufacturing', 'data', [benchmark('data', [10, 20, 30, 40])]);

    expect(result).toEqual({
      scope: 'data',
      score: 25,
      percentile: 50,
      peerCount: 4,
      lowConfidence: true,
      benchmarkId: 'bench-data',
      period: '2024-Q1',
      median: 25,
      bestInClass: 37,
      vsMedian: 0,
      aboveMedian: true,
    });
  });
});

describe('compareAssessment', () => {
  const benchmarks = SCOPES.map((scope) => benchmark(scope, DECILES));

  it('ranks the overall score and every dimension', () => {
    const comparison = compareAssessment(buildCompletedAssessment(), benchmarks);

    expect(comparison.assessmentId).toBe('assessment-1');
    expect(comparison.overall.percentile).toBe(50);
    expect(comparison.dimensions.data.percentile).toBe(75);
    expect(comparison.dimensions.governance.percentile).toBe(15);
    expect(comparison.dimensions.people.lowConfidence).toBe(false);
  });

  it('places each score against the peer median', () => {
    const comparison = compareAssessment(buildCompletedAssessment(), benchmarks);

    expect(comparison.overall).toMatchObject({ median: 55, bestInClass: 91, vsMedian: 0, aboveMedian: true });
    expect(comparison.dimensions.data).toMatchObject({ vsMedian: 25, aboveMedian: true });
    expect(comparison.dimensions.governance).toMatchObject({ vsMedian: -35, aboveMedian: false });
  });

  it('ranks gaps to best-in-class, largest first', () => {
    const comparison = compareAssessment(buildCompletedAssessment(), benchmarks);

    const rows = comparison.gaps.map(({ dimension, gapSize, gapPercent, severity }) => [
      dimension,
      gapSize,
      gapPercent,
      severity,
    ]);

    expect(rows).toEqual([
      ['governance', 71, 78, 'critical'],
      ['people', 51, 56, 'critical'],
      ['process', 31, 34.1, 'critical'],
      ['technology', 31, 34.1, 'critical'],
      ['data', 11, 12.1, 'medium'],
    ]);
    expect(comparison.gaps[0]).toMatchObject({
      currentScore: 20,
      bestInClassScore: 91,
      currentLevel: 2,
      targetLevel: 5,
    });
  });

  it('returns the same result on repeated calls', () => {
    const assessment = buildCompletedAssessment();

    expect(compareAssessment(assessment, benchmarks)).toEqual(compareAssessment(assessment, benchmarks));
  });

  it('requires a completed assessment', () => {
    expect(() => compareAssessment(buildAssessment(), benchmarks)).toThrow(StateError);
  });

  it('reports no gap for scores at or above best-in-class', () => {
    const [row] = analyzeGaps({
      data: percentileAgainst(95, 'manufacturing', 'data', benchmarks),
      process: percentileAgainst(91, 'manufacturing', 'process', benchmarks),
      people: percentileAgainst(91, 'manufacturing', 'people', benchmarks),
      technology: percentileAgainst(91, 'manufacturing', 'technology', benchmarks),
      governance: percentileAgainst(91, 'manufacturing', 'governance', benchmarks),
    });

    expect(row).toEqual({
      dimension: 'data',
      currentScore: 95,
      bestInClassScore: 91,
      gapSize: 0,
      gapPercent: 0,
      severity: 'low',
      currentLevel: 5,
      targetLevel: 5,
    });
  });

  it('rejects non-finite scores', () => {
    expect(() => computePercentile(Number.NaN, DECILES)).toThrow(ValidationError);
  });
});
