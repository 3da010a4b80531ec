/**
 * Assessment Service
 * Assessment lifecycle: create, collect responses, score exactly once.
 *
 * Responsibilities:
 * - Validate input and custom weight tables
 * - Version-checked response submission
 * - Compare-and-set scoring (draft/in_progress -> completed)
 * - Publish lifecycle events after each committed write
 */

import { z } from 'zod';
import {
  AssessmentStatus,
  MaturityEventType,
  type Assessment,
  type DetailedScores,
  type Dimension,
  type DimensionResponse,
} from '@maturity/shared';
import { ConcurrencyError, NotFoundError, StateError, ValidationError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import {
  assessmentStatusSchema,
  dimensionRecord,
  dimensionSchema,
  industrySchema,
  organizationSizeSchema,
  parseInput,
  scoreSchema,
} from '../../lib/schemas.js';
import { buildEventPayload } from '../events/eventPublisher.js';
import { scoreDimensions } from '../maturity/dimensionScorer.js';
import { classifyMaturity } from '../maturity/maturityClassifier.js';
import { validateDimensionWeights } from '../maturity/weighting.js';
import type { ServiceContext } from '../serviceContext.js';

const logger = createLogger('AssessmentService');

const OPEN_STATUSES = [AssessmentStatus.DRAFT, AssessmentStatus.IN_PROGRESS] as const;

// -----------------------------------------------------------------------------
// Input Schemas
// -----------------------------------------------------------------------------

const createAssessmentSchema = z.object({
  tenantId: z.string().min(1),
  organizationName: z.string().trim().min(1),
  industry: industrySchema,
  organizationSize: organizationSizeSchema,
  dimensionWeights: dimensionRecord(z.number()).optional(),
});

const submitResponsesSchema = z.object({
  tenantId: z.string().min(1),
  assessmentId: z.string().min(1),
  expectedVersion: z.number().int().positive(),
  responses: z
    .array(
      z.object({
        dimension: dimensionSchema,
        questionId: z.string().min(1),
        value: scoreSchema,
        weight: z.number().positive().optional(),
      })
    )
    .min(1),
});

const scoreAssessmentSchema = z.object({
  tenantId: z.string().min(1),
  assessmentId: z.string().min(1),
  expectedVersion: z.number().int().positive().optional(),
});

export type CreateAssessmentInput = z.input<typeof createAssessmentSchema>;
export type SubmitResponsesInput = z.input<typeof submitResponsesSchema>;
export type ScoreAssessmentInput = z.input<typeof scoreAssessmentSchema>;

// -----------------------------------------------------------------------------
// Assessment Service
// -----------------------------------------------------------------------------

export class AssessmentService {
  constructor(private readonly context: ServiceContext) {}

  async createAssessment(input: CreateAssessmentInput): Promise<Assessment> {
    const data = parseInput(createAssessmentSchema, input, 'Invalid assessment input');
    const { clock, catalog, idFactory, repositories, publisher } = this.context;

    const dimensionWeights = validateDimensionWeights(data.dimensionWeights ?? catalog.dimensionWeights);
    const now = clock.now();

    const assessment: Assessment = {
      id: idFactory(),
      tenantId: data.tenantId,
      organizationName: data.organizationName,
      industry: data.industry,
      organizationSize: data.organizationSize,
      status: AssessmentStatus.DRAFT,
      dimensionWeights,
      dimensionScores: null,
      overallScore: null,
      maturityLevel: null,
      maturityLabel: null,
      version: 1,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };

    await repositories.assessments.insert(assessment);
    logger.info({ tenantId: assessment.tenantId, assessmentId: assessment.id }, 'Assessment created');

    await publisher.publish(
      MaturityEventType.ASSESSMENT_CREATED,
      buildEventPayload(
        assessment.id,
        assessment.tenantId,
        {
          organizationName: assessment.organizationName,
          industry: assessment.industry,
          organizationSize: assessment.organizationSize,
        },
        clock
      )
    );

    return assessment;
  }

  async getAssessment(tenantId: string, assessmentId: string): Promise<Assessment> {
    const assessment = await this.context.repositories.assessments.findById(tenantId, assessmentId);
    if (!assessment) {
      throw new NotFoundError('Assessment', assessmentId);
    }
    return assessment;
  }

  async listAssessments(tenantId: string, status?: AssessmentStatus): Promise<Assessment[]> {
    const filterStatus = status === undefined ? undefined : parseInput(assessmentStatusSchema, status);
    return this.context.repositories.assessments.listByTenant(tenantId, { status: filterStatus });
  }

  // ---------------------------------------------------------------------------
  // Responses
  // ---------------------------------------------------------------------------

  /**
   * Upserts responses by question id. The caller must present the version it
   * last read; the first submission moves a draft to in_progress.
   */
  async submitResponses(input: SubmitResponsesInput): Promise<Assessment> {
    const data = parseInput(submitResponsesSchema, input, 'Invalid response submission');
    const { clock, idFactory, repositories } = this.context;

    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const response of data.responses) {
      if (seen.has(response.questionId)) duplicates.add(response.questionId);
      seen.add(response.questionId);
    }
    if (duplicates.size > 0) {
      throw new ValidationError(`Duplicate responses for questions: ${[...duplicates].join(', ')}`, {
        questionIds: [...duplicates],
      });
    }

    const assessment = await this.getAssessment(data.tenantId, data.assessmentId);
    assertOpen(assessment, 'submit responses to');
    if (assessment.version !== data.expectedVersion) {
      throw staleVersion(assessment, data.expectedVersion);
    }

    const next: Assessment = {
      ...assessment,
      status: AssessmentStatus.IN_PROGRESS,
      version: assessment.version + 1,
      updatedAt: clock.now(),
    };
    const responses = data.responses.map(
      (response): DimensionResponse => ({
        id: idFactory(),
        assessmentId: assessment.id,
        dimension: response.dimension,
        questionId: response.questionId,
        value: response.value,
        ...(response.weight === undefined ? {} : { weight: response.weight }),
      })
    );

    const applied = await repositories.assessments.appendResponses(
      next,
      { version: data.expectedVersion, statuses: OPEN_STATUSES },
      responses
    );
    if (!applied) {
      throw await this.conflictFor(assessment, data.expectedVersion);
    }

    logger.info(
      { tenantId: next.tenantId, assessmentId: next.id, count: responses.length, version: next.version },
      'Responses submitted'
    );
    return next;
  }

  // ---------------------------------------------------------------------------
  // Scoring
  // ---------------------------------------------------------------------------

  /**
   * Scores and completes the assessment. Completion is a compare-and-set on
   * version and status, so of two concurrent calls exactly one wins and the
   * other raises StateError.
   */
  async scoreAssessment(input: ScoreAssessmentInput): Promise<Assessment> {
    const data = parseInput(scoreAssessmentSchema, input, 'Invalid scoring request');
    const { clock, catalog, repositories, publisher } = this.context;

    const assessment = await this.getAssessment(data.tenantId, data.assessmentId);
    assertOpen(assessment, 'score');
    if (data.expectedVersion !== undefined && assessment.version !== data.expectedVersion) {
      throw staleVersion(assessment, data.expectedVersion);
    }

    const responses = await repositories.assessments.listResponses(assessment.id);
    const { dimensionScores, overallScore } = scoreDimensions(responses, assessment.dimensionWeights);
    const { level, label } = classifyMaturity(overallScore, catalog.maturityBands);
    logger.debug(
      { assessmentId: assessment.id, responseCount: responses.length, overallScore, level },
      'Assessment scored'
    );

    const now = clock.now();
    const completed: Assessment = {
      ...assessment,
      status: AssessmentStatus.COMPLETED,
      dimensionScores,
      overallScore,
      maturityLevel: level,
      maturityLabel: label,
      version: assessment.version + 1,
      updatedAt: now,
      completedAt: now,
    };

    const applied = await repositories.assessments.compareAndSet(completed, {
      version: assessment.version,
      statuses: OPEN_STATUSES,
    });
    if (!applied) {
      throw await this.conflictFor(assessment, assessment.version);
    }

    logger.info(
      { tenantId: completed.tenantId, assessmentId: completed.id, overallScore, maturityLevel: level },
      'Assessment completed'
    );

    await publisher.publish(
      MaturityEventType.ASSESSMENT_COMPLETED,
      buildEventPayload(
        completed.id,
        completed.tenantId,
        { overallScore, maturityLevel: level, maturityLabel: label, dimensionScores },
        clock
      )
    );

    return completed;
  }

  async getDetailedScores(tenantId: string, assessmentId: string): Promise<DetailedScores> {
    const assessment = await this.getAssessment(tenantId, assessmentId);
    const { dimensionScores, overallScore, maturityLevel, maturityLabel } = assessment;
    if (
      assessment.status !== AssessmentStatus.COMPLETED ||
      dimensionScores === null ||
      overallScore === null ||
      maturityLevel === null ||
      maturityLabel === null
    ) {
      throw new StateError(`Assessment ${assessment.id} has not been scored yet`, {
        assessmentId: assessment.id,
        status: assessment.status,
      });
    }

    const responses = await this.context.repositories.assessments.listResponses(assessment.id);
    const responsesByDimension: Record<Dimension, DimensionResponse[]> = {
      data: [],
      process: [],
      people: [],
      technology: [],
      governance: [],
    };
    for (const response of responses) {
      responsesByDimension[response.dimension].push(response);
    }

    return {
      assessmentId: assessment.id,
      organizationName: assessment.organizationName,
      dimensionScores,
      dimensionWeights: assessment.dimensionWeights,
      overallScore,
      maturityLevel,
      maturityLabel,
      responsesByDimension,
      completedAt: assessment.completedAt,
    };
  }

  /**
   * A guarded write lost. Completed means another caller scored first.
   */
  private async conflictFor(assessment: Assessment, expectedVersion: number): Promise<Error> {
    const current = await this.context.repositories.assessments.findById(assessment.tenantId, assessment.id);
    if (!current) {
      return new NotFoundError('Assessment', assessment.id);
    }
    if (current.status === AssessmentStatus.COMPLETED) {
      return alreadyCompleted(current);
    }
    return staleVersion(current, expectedVersion);
  }
}

function assertOpen(assessment: Assessment, action: string): void {
  if (assessment.status === AssessmentStatus.COMPLETED) {
    throw alreadyCompleted(assessment, action);
  }
}

function alreadyCompleted(assessment: Assessment, action = 'score'): StateError {
  return new StateError(`Cannot ${action} assessment ${assessment.id}: it is already completed`, {
    assessmentId: assessment.id,
    status: assessment.status,
  });
}

function staleVersion(assessment: Assessment, expectedVersion: number): ConcurrencyError {
  return new ConcurrencyError(
    `Assessment ${assessment.id} was modified concurrently (expected version ${expectedVersion}, found ${assessment.version})`,
    { assessmentId: assessment.id, expectedVersion, actualVersion: assessment.version }
  );
}

