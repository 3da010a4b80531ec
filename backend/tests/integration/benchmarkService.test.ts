import { describe, it, expect, beforeEach } from 'vitest';
import type { BenchmarkScope } from '@maturity/shared';
import { NotFoundError, ValidationError } from '../../src/lib/errors.js';
import { createServices, type MaturityServices } from '../../src/services/index.js';
import { buildCompletedAssessment, createTestContext, TENANT, type TestContext } from '../utils/testHelpers.js';

const DECILES = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
const SCOPES: BenchmarkScope[] = ['overall', 'data', 'process', 'people', 'technology', 'governance'];

async function seedDeciles(services: MaturityServices): Promise<void> {
  for (const scope of SCOPES) {
    await services.benchmarks.upsertBenchmark({
      industry: 'manufacturing',
      scope,
      period: '2024-Q1',
      peerScores: DECILES,
    });
  }
}

describe('BenchmarkService', () => {
  let ctx: TestContext;
  let services: MaturityServices;

  beforeEach(async () => {
    ctx = createTestContext();
    services = createServices(ctx.context);
    await ctx.repositories.assessments.insert(buildCompletedAssessment());
  });

  it('ranks a completed assessment against its industry', async () => {
    await seedDeciles(services);

    const comparison = await services.benchmarks.compareAssessment(TENANT, 'assessment-1');

    expect(comparison.industry).toBe('manufacturing');
    expect(comparison.overall).toMatchObject({ score: 55, percentile: 50, peerCount: 10, lowConfidence: false });
    expect(comparison.dimensions.data.percentile).toBe(75);
    expect(comparison.dimensions.governance.percentile).toBe(15);
  });

  it('marks low confidence below the configured peer count', async () => {
    ctx = createTestContext({ BENCHMARK_MIN_PEER_COUNT: '20' });
    services = createServices(ctx.context);
    await ctx.repositories.assessments.insert(buildCompletedAssessment());
    await seedDeciles(services);

    const comparison = await services.benchmarks.compareAssessment(TENANT, 'assessment-1');

    expect(comparison.overall.lowConfidence).toBe(true);
  });

  it('raises NotFoundError when a scope has no distribution', async () => {
    await services.benchmarks.upsertBenchmark({
      industry: 'manufacturing',
      scope: 'overall',
      period: '2024-Q1',
      peerScores: DECILES,
    });

    await expect(services.benchmarks.compareAssessment(TENANT, 'assessment-1')).rejects.toThrow(NotFoundError);
  });

  it('replaces the distribution for the same industry, scope and period', async () => {
    await services.benchmarks.upsertBenchmark({
      industry: 'retail',
      scope: 'overall',
      period: '2024-Q1',
      peerScores: [10, 20],
    });
    ctx.clock.advance(5_000);
    const replaced = await services.benchmarks.upsertBenchmark({
      industry: 'retail',
      scope: 'overall',
      period: '2024-Q1',
      peerScores: [30, 40, 50],
    });

    const listed = await services.benchmarks.listBenchmarks('retail');
    expect(listed).toHaveLength(1);
    expect(listed[0]?.peerScores).toEqual([30, 40, 50]);
    expect(replaced.peerScores).toEqual([30, 40, 50]);
  });

  it('rejects peer scores outside [0, 100] and empty distributions', async () => {
    await expect(
      services.benchmarks.upsertBenchmark({
        industry: 'retail',
        scope: 'overall',
        period: '2024-Q1',
        peerScores: [10, 120],
      })
    ).rejects.toThrow(ValidationError);
    await expect(
      services.benchmarks.upsertBenchmark({ industry: 'retail', scope: 'data', period: '2024-Q1', peerScores: [] })
    ).rejects.toThrow(ValidationError);
    expect(await services.benchmarks.listBenchmarks('retail')).toEqual([]);
  });
});
