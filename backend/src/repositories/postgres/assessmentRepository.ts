/**
 * PostgreSQL Assessment Repository
 * assessments + dimension_responses tables
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { Assessment, DimensionResponse } from '@maturity/shared';
import { postgres, type SqlClient, type SqlExecutor } from '../../lib/postgres.js';
import {
  assessmentStatusSchema,
  dimensionRecord,
  dimensionSchema,
  industrySchema,
  maturityLevelSchema,
  organizationSizeSchema,
} from '../../lib/schemas.js';
import type { AssessmentExpectation, AssessmentListFilter, AssessmentRepository } from '../types.js';
import { decodeRow, jsonb } from './rows.js';

const assessmentRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  organization_name: z.string(),
  industry: industrySchema,
  organization_size: organizationSizeSchema,
  status: assessmentStatusSchema,
  dimension_weights: dimensionRecord(z.number()),
  dimension_scores: dimensionRecord(z.number()).nullable(),
  overall_score: z.number().nullable(),
  maturity_level: maturityLevelSchema.nullable(),
  maturity_label: z.string().nullable(),
  version: z.number().int(),
  created_at: z.date(),
  updated_at: z.date(),
  completed_at: z.date().nullable(),
});

const responseRowSchema = z.object({
  id: z.string(),
  assessment_id: z.string(),
  dimension: dimensionSchema,
  question_id: z.string(),
  value: z.number(),
  weight: z.number().nullable(),
});

const ASSESSMENT_COLUMNS = `id, tenant_id, organization_name, industry, organization_size, status,
  dimension_weights, dimension_scores, overall_score, maturity_level, maturity_label,
  version, created_at, updated_at, completed_at`;

const GUARDED_UPDATE = `UPDATE assessments
  SET status = $3, dimension_scores = $4, overall_score = $5, maturity_level = $6,
      maturity_label = $7, version = $8, updated_at = $9, completed_at = $10
  WHERE id = $1 AND tenant_id = $2 AND version = $11 AND status = ANY($12::text[])`;

export class PostgresAssessmentRepository implements AssessmentRepository {
  constructor(private readonly db: SqlExecutor = postgres) {}

  async insert(assessment: Assessment): Promise<void> {
    await this.db.query(
      `INSERT INTO assessments (${ASSESSMENT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
      [
        assessment.id,
        assessment.tenantId,
        assessment.organizationName,
        assessment.industry,
        assessment.organizationSize,
        assessment.status,
        jsonb(assessment.dimensionWeights),
        jsonb(assessment.dimensionScores),
        assessment.overallScore,
        assessment.maturityLevel,
        assessment.maturityLabel,
        assessment.version,
        assessment.createdAt,
        assessment.updatedAt,
        assessment.completedAt,
      ]
    );
  }

  async findById(tenantId: string, id: string): Promise<Assessment | null> {
    const result = await this.db.query(
      `SELECT ${ASSESSMENT_COLUMNS} FROM assessments WHERE id = $1 AND tenant_id = $2`,
      [id, tenantId]
    );
    const row = result.rows[0];
    return row ? toAssessment(row) : null;
  }

  async listByTenant(tenantId: string, filter: AssessmentListFilter = {}): Promise<Assessment[]> {
    const params: unknown[] = [tenantId];
    let sql = `SELECT ${ASSESSMENT_COLUMNS} FROM assessments WHERE tenant_id = $1`;
    if (filter.status) {
      params.push(filter.status);
      sql += ` AND status = $${params.length}`;
    }
    sql += ' ORDER BY created_at DESC';

    const result = await this.db.query(sql, params);
    return result.rows.map(toAssessment);
  }

  async listResponses(assessmentId: string): Promise<DimensionResponse[]> {
    const result = await this.db.query(
      `SELECT id, assessment_id, dimension, question_id, value, weight
       FROM dimension_responses WHERE assessment_id = $1 ORDER BY question_id`,
      [assessmentId]
    );
    return result.rows.map((row) => {
      const r = decodeRow(responseRowSchema, row, 'dimension_responses');
      const response: DimensionResponse = {
        id: r.id,
        assessmentId: r.assessment_id,
        dimension: r.dimension,
        questionId: r.question_id,
        value: r.value,
      };
      if (r.weight !== null) response.weight = r.weight;
      return response;
    });
  }

  async appendResponses(
    next: Assessment,
    expected: AssessmentExpectation,
    responses: readonly DimensionResponse[]
  ): Promise<boolean> {
    return this.db.transaction(async (client) => {
      const applied = await guardedUpdate(client, next, expected);
      if (!applied) return false;

      for (const response of responses) {
        await client.query(
          `INSERT INTO dimension_responses (id, assessment_id, dimension, question_id, value, weight)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (assessment_id, question_id)
           DO UPDATE SET dimension = EXCLUDED.dimension, value = EXCLUDED.value, weight = EXCLUDED.weight`,
          [
            response.id,
            response.assessmentId,
            response.dimension,
            response.questionId,
            response.value,
            response.weight ?? null,
          ]
        );
      }
      return true;
    });
  }

  async compareAndSet(next: Assessment, expected: AssessmentExpectation): Promise<boolean> {
    return guardedUpdate(this.db, next, expected);
  }
}

async function guardedUpdate(
  client: SqlClient,
  next: Assessment,
  expected: AssessmentExpectation
): Promise<boolean> {
  const result = await client.query(GUARDED_UPDATE, [
    next.id,
    next.tenantId,
    next.status,
    jsonb(next.dimensionScores),
    next.overallScore,
    next.maturityLevel,
    next.maturityLabel,
    next.version,
    next.updatedAt,
    next.completedAt,
    expected.version,
    [...expected.statuses],
  ]);
  return result.rowCount === 1;
}

function toAssessment(row: QueryResultRow): Assessment {
  const r = decodeRow(assessmentRowSchema, row, 'assessments');
  return {
    id: r.id,
    tenantId: r.tenant_id,
    organizationName: r.organization_name,
    industry: r.industry,
    organizationSize: r.organization_size,
    status: r.status,
    dimensionWeights: r.dimension_weights,
    dimensionScores: r.dimension_scores,
    overallScore: r.overall_score,
    maturityLevel: r.maturity_level,
    maturityLabel: r.maturity_label,
    version: r.version,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    completedAt: r.completed_at,
  };
}
