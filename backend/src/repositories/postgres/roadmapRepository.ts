/**
 * PostgreSQL Roadmap Repository
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { Roadmap, RoadmapStatus } from '@maturity/shared';
import { postgres, type SqlExecutor } from '../../lib/postgres.js';
import { initiativeSchema, roadmapStatusSchema } from '../../lib/schemas.js';
import type { RoadmapRepository } from '../types.js';
import { decodeRow, jsonb } from './rows.js';

const roadmapRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  assessment_id: z.string(),
  status: roadmapStatusSchema,
  catalog_version: z.string(),
  initiatives: z.array(initiativeSchema),
  created_at: z.date(),
  published_at: z.date().nullable(),
});

const ROADMAP_COLUMNS = 'id, tenant_id, assessment_id, status, catalog_version, initiatives, created_at, published_at';

export class PostgresRoadmapRepository implements RoadmapRepository {
  constructor(private readonly db: SqlExecutor = postgres) {}

  async insert(roadmap: Roadmap): Promise<void> {
    await this.db.query(
      `INSERT INTO roadmaps (${ROADMAP_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        roadmap.id,
        roadmap.tenantId,
        roadmap.assessmentId,
        roadmap.status,
        roadmap.catalogVersion,
        jsonb(roadmap.initiatives),
        roadmap.createdAt,
        roadmap.publishedAt,
      ]
    );
  }

  async findById(tenantId: string, id: string): Promise<Roadmap | null> {
    const result = await this.db.query(
      `SELECT ${ROADMAP_COLUMNS} FROM roadmaps WHERE id = $1 AND tenant_id = $2`,
      [id, tenantId]
    );
    const row = result.rows[0];
    return row ? toRoadmap(row) : null;
  }

  async listByAssessment(tenantId: string, assessmentId: string): Promise<Roadmap[]> {
    const result = await this.db.query(
      `SELECT ${ROADMAP_COLUMNS} FROM roadmaps
       WHERE tenant_id = $1 AND assessment_id = $2 ORDER BY created_at DESC`,
      [tenantId, assessmentId]
    );
    return result.rows.map(toRoadmap);
  }

  async compareAndSet(next: Roadmap, expectedStatus: RoadmapStatus): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE roadmaps SET status = $3, published_at = $4
       WHERE id = $1 AND tenant_id = $2 AND status = $5`,
      [next.id, next.tenantId, next.status, next.publishedAt, expectedStatus]
    );
    return result.rowCount === 1;
  }
}

function toRoadmap(row: QueryResultRow): Roadmap {
  const r = decodeRow(roadmapRowSchema, row, 'roadmaps');
  return {
    id: r.id,
    tenantId: r.tenant_id,
    assessmentId: r.assessment_id,
    status: r.status,
    catalogVersion: r.catalog_version,
    initiatives: r.initiatives,
    createdAt: r.created_at,
    publishedAt: r.published_at,
  };
}
