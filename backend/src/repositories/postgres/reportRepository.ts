/**
 * PostgreSQL Report Repository
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { Report } from '@maturity/shared';
import { postgres, type SqlExecutor } from '../../lib/postgres.js';
import { reportContentSchema } from '../../lib/schemas.js';
import type { ReportRepository } from '../types.js';
import { decodeRow, jsonb } from './rows.js';

const reportRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  assessment_id: z.string(),
  roadmap_id: z.string().nullable(),
  pilot_id: z.string().nullable(),
  generated_at: z.date(),
  content: reportContentSchema,
});

const REPORT_COLUMNS = 'id, tenant_id, assessment_id, roadmap_id, pilot_id, generated_at, content';

export class PostgresReportRepository implements ReportRepository {
  constructor(private readonly db: SqlExecutor = postgres) {}

  async insert(report: Report): Promise<void> {
    await this.db.query(
      `INSERT INTO reports (${REPORT_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        report.id,
        report.tenantId,
        report.assessmentId,
        report.roadmapId,
        report.pilotId,
        report.generatedAt,
        jsonb(report.content),
      ]
    );
  }

  async findById(tenantId: string, id: string): Promise<Report | null> {
    const result = await this.db.query(
      `SELECT ${REPORT_COLUMNS} FROM reports WHERE id = $1 AND tenant_id = $2`,
      [id, tenantId]
    );
    const row = result.rows[0];
    return row ? toReport(row) : null;
  }

  async listByAssessment(tenantId: string, assessmentId: string): Promise<Report[]> {
    const result = await this.db.query(
      `SELECT ${REPORT_COLUMNS} FROM reports
       WHERE tenant_id = $1 AND assessment_id = $2 ORDER BY generated_at DESC`,
      [tenantId, assessmentId]
    );
    return result.rows.map(toReport);
  }
}

function toReport(row: QueryResultRow): Report {
  const r = decodeRow(reportRowSchema, row, 'reports');
  return {
    id: r.id,
    tenantId: r.tenant_id,
    assessmentId: r.assessment_id,
    roadmapId: r.roadmap_id,
    pilotId: r.pilot_id,
    generatedAt: r.generated_at,
    content: r.content,
  };
}
