// =============================================================================
// Benchmark Service
//
// Peer distributions per industry and scope, and percentile standing of a
// completed assessment against them
// =============================================================================

import { z } from 'zod';
import type { Benchmark, BenchmarkComparison, Industry } from '@maturity/shared';
import { createLogger } from '../../lib/logger.js';
import { dimensionSchema, industrySchema, parseInput, scoreSchema } from '../../lib/schemas.js';
import { compareAssessment } from '../maturity/benchmarkComparator.js';
import type { ServiceContext } from '../serviceContext.js';
import type { AssessmentService } from '../assessment/assessmentService.js';

const logger = createLogger('BenchmarkService');

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

const upsertBenchmarkSchema = z.object({
  industry: industrySchema,
  scope: z.union([dimensionSchema, z.literal('overall')]),
  period: z.string().trim().min(1),
  peerScores: z.array(scoreSchema).min(1),
});

export type UpsertBenchmarkInput = z.input<typeof upsertBenchmarkSchema>;

// -----------------------------------------------------------------------------
// Benchmark Service
// -----------------------------------------------------------------------------

export class BenchmarkService {
  constructor(
    private readonly context: ServiceContext,
    private readonly assessments: AssessmentService
  ) {}

  /**
   * Overall score and all five dimensions against the assessment's industry.
   */
  async compareAssessment(tenantId: string, assessmentId: string): Promise<BenchmarkComparison> {
    const assessment = await this.assessments.getAssessment(tenantId, assessmentId);
    const benchmarks = await this.context.repositories.benchmarks.listByIndustry(assessment.industry);

    const comparison = compareAssessment(assessment, benchmarks, {
      minPeerCount: this.context.config.benchmarkMinPeerCount,
      maturityBands: this.context.catalog.maturityBands,
    });

    logger.debug(
      { tenantId, assessmentId, industry: assessment.industry, overallPercentile: comparison.overall.percentile },
      'Assessment benchmarked'
    );
    return comparison;
  }

  async listBenchmarks(industry: Industry): Promise<Benchmark[]> {
    return this.context.repositories.benchmarks.listByIndustry(parseInput(industrySchema, industry));
  }

  /**
   * Refresh a peer distribution. Replaces any existing distribution for the
   * same industry, scope and period.
   */
  async upsertBenchmark(input: UpsertBenchmarkInput): Promise<Benchmark> {
    const data = parseInput(upsertBenchmarkSchema, input, 'Invalid benchmark input');
    const { clock, idFactory, repositories } = this.context;

    const stored = await repositories.benchmarks.upsert({
      id: idFactory(),
      industry: data.industry,
      scope: data.scope,
      period: data.period,
      peerScores: data.peerScores,
      updatedAt: clock.now(),
    });

    logger.info(
      { benchmarkId: stored.id, industry: stored.industry, scope: stored.scope, peerCount: stored.peerScores.length },
      'Benchmark upserted'
    );
    return stored;
  }
}
