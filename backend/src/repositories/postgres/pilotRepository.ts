/**
 * PostgreSQL Pilot Repository
 * Design, lifecycle and the execution log (JSONB) live on one row, so a
 * version-checked UPDATE covers transitions and log appends alike.
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { Pilot } from '@maturity/shared';
import { postgres, type SqlExecutor } from '../../lib/postgres.js';
import {
  dimensionSchema,
  executionLogEntrySchema,
  failureModeSchema,
  pilotStatusSchema,
  riskSignalSchema,
  stakeholderMapSchema,
  successCriterionSchema,
} from '../../lib/schemas.js';
import type { PilotRepository } from '../types.js';
import { decodeRow, jsonb } from './rows.js';

const pilotRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  assessment_id: z.string(),
  roadmap_id: z.string(),
  title: z.string(),
  dimension: dimensionSchema,
  duration_weeks: z.number().int(),
  success_criteria: z.array(successCriterionSchema),
  failure_modes: z.array(failureModeSchema),
  stakeholders: stakeholderMapSchema,
  status: pilotStatusSchema,
  execution_log: z.array(executionLogEntrySchema),
  at_risk: z.boolean(),
  risk_signals: z.array(riskSignalSchema),
  version: z.number().int(),
  created_at: z.date(),
  updated_at: z.date(),
  started_at: z.date().nullable(),
  ended_at: z.date().nullable(),
});

const PILOT_COLUMNS = `id, tenant_id, assessment_id, roadmap_id, title, dimension, duration_weeks,
  success_criteria, failure_modes, stakeholders, status, execution_log, at_risk, risk_signals,
  version, created_at, updated_at, started_at, ended_at`;

export class PostgresPilotRepository implements PilotRepository {
  constructor(private readonly db: SqlExecutor = postgres) {}

  async insert(pilot: Pilot): Promise<void> {
    await this.db.query(
      `INSERT INTO pilots (${PILOT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)`,
      [
        pilot.id,
        pilot.tenantId,
        pilot.assessmentId,
        pilot.roadmapId,
        pilot.title,
        pilot.dimension,
        pilot.durationWeeks,
        jsonb(pilot.successCriteria),
        jsonb(pilot.failureModes),
        jsonb(pilot.stakeholders),
        pilot.status,
        jsonb(pilot.executionLog),
        pilot.atRisk,
        jsonb(pilot.riskSignals),
        pilot.version,
        pilot.createdAt,
        pilot.updatedAt,
        pilot.startedAt,
        pilot.endedAt,
      ]
    );
  }

  async findById(tenantId: string, id: string): Promise<Pilot | null> {
    const result = await this.db.query(
      `SELECT ${PILOT_COLUMNS} FROM pilots WHERE id = $1 AND tenant_id = $2`,
      [id, tenantId]
    );
    const row = result.rows[0];
    return row ? toPilot(row) : null;
  }

  async listByRoadmap(tenantId: string, roadmapId: string): Promise<Pilot[]> {
    const result = await this.db.query(
      `SELECT ${PILOT_COLUMNS} FROM pilots
       WHERE tenant_id = $1 AND roadmap_id = $2 ORDER BY created_at DESC`,
      [tenantId, roadmapId]
    );
    return result.rows.map(toPilot);
  }

  async compareAndSet(next: Pilot, expectedVersion: number): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE pilots
       SET status = $3, execution_log = $4, at_risk = $5, risk_signals = $6, version = $7,
           updated_at = $8, started_at = $9, ended_at = $10
       WHERE id = $1 AND tenant_id = $2 AND version = $11`,
      [
        next.id,
        next.tenantId,
        next.status,
        jsonb(next.executionLog),
        next.atRisk,
        jsonb(next.riskSignals),
        next.version,
        next.updatedAt,
        next.startedAt,
        next.endedAt,
        expectedVersion,
      ]
    );
    return result.rowCount === 1;
  }
}

function toPilot(row: QueryResultRow): Pilot {
  const r = decodeRow(pilotRowSchema, row, 'pilots');
  return {
    id: r.id,
    tenantId: r.tenant_id,
    assessmentId: r.assessment_id,
    roadmapId: r.roadmap_id,
    title: r.title,
    dimension: r.dimension,
    durationWeeks: r.duration_weeks,
    successCriteria: r.success_criteria,
    failureModes: r.failure_modes,
    stakeholders: r.stakeholders,
    status: r.status,
    executionLog: r.execution_log,
    atRisk: r.at_risk,
    riskSignals: r.risk_signals,
    version: r.version,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    startedAt: r.started_at,
    endedAt: r.ended_at,
  };
}
