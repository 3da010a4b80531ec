/**
 * Pilot Service
 * Pilot accelerator workflow: design from a roadmap, gate on approval,
 * move through the lifecycle and ingest weekly execution logs. Every write
 * is version-checked against the pilot row.
 */

import { z } from 'zod';
import {
  AssessmentStatus,
  MaturityEventType,
  PilotStatus,
  type ExecutionLogEntry,
  type Pilot,
  type PilotRiskSignal,
  type PilotValidationReport,
} from '@maturity/shared';
import { ConcurrencyError, NotFoundError, StateError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import {
  dimensionSchema,
  executionStatusSchema,
  failureModeSchema,
  parseInput,
  pilotStatusSchema,
  stakeholderMapSchema,
  successCriterionSchema,
} from '../../lib/schemas.js';
import type { AssessmentService } from '../assessment/assessmentService.js';
import { buildEventPayload } from '../events/eventPublisher.js';
import type { RoadmapService } from '../roadmap/roadmapService.js';
import type { ServiceContext } from '../serviceContext.js';
import { appendExecutionEntry, transitionPilot } from './pilotStateMachine.js';
import { evaluatePilotDesign } from './pilotValidator.js';

const logger = createLogger('PilotService');

const designPilotSchema = z.object({
  tenantId: z.string().min(1),
  roadmapId: z.string().min(1),
  title: z.string().trim().min(1),
  dimension: dimensionSchema,
  durationWeeks: z.number().int().positive().optional(),
  successCriteria: z.array(successCriterionSchema),
  failureModes: z.array(failureModeSchema),
  stakeholders: stakeholderMapSchema,
});

const transitionSchema = z.object({
  tenantId: z.string().min(1),
  pilotId: z.string().min(1),
  targetStatus: pilotStatusSchema,
  expectedVersion: z.number().int().positive().optional(),
});

const logExecutionSchema = z.object({
  tenantId: z.string().min(1),
  pilotId: z.string().min(1),
  expectedVersion: z.number().int().positive().optional(),
  week: z.number().optional(),
  status: executionStatusSchema,
  metrics: z.record(z.string(), z.number()).optional(),
  blockers: z.array(z.string()).optional(),
  notes: z.string().optional(),
});

export type DesignPilotInput = z.input<typeof designPilotSchema>;
export type TransitionPilotInput = z.input<typeof transitionSchema>;
export type LogExecutionInput = z.input<typeof logExecutionSchema>;

export interface LogExecutionResult {
  pilot: Pilot;
  entry: ExecutionLogEntry;
  atRisk: boolean;
  riskSignals: PilotRiskSignal[];
}

export class PilotService {
  constructor(
    private readonly context: ServiceContext,
    private readonly assessments: AssessmentService,
    private readonly roadmaps: RoadmapService
  ) {}

  /**
   * Stores a pilot in `designed`. The approval gate is not applied here, so
   * an incomplete design can be saved and refined.
   */
  async designPilot(input: DesignPilotInput): Promise<Pilot> {
    const data = parseInput(designPilotSchema, input, 'Invalid pilot design');
    const { clock, config, idFactory, repositories, publisher } = this.context;

    const roadmap = await this.roadmaps.getRoadmap(data.tenantId, data.roadmapId);
    const assessment = await this.assessments.getAssessment(data.tenantId, roadmap.assessmentId);
    if (assessment.status !== AssessmentStatus.COMPLETED) {
      throw new StateError(`Assessment ${assessment.id} is not completed (status: ${assessment.status})`, {
        assessmentId: assessment.id,
        status: assessment.status,
      });
    }

    const now = clock.now();
    const pilot: Pilot = {
      id: idFactory(),
      tenantId: data.tenantId,
      assessmentId: assessment.id,
      roadmapId: roadmap.id,
      title: data.title,
      dimension: data.dimension,
      durationWeeks: data.durationWeeks ?? config.pilotDefaultDurationWeeks,
      successCriteria: data.successCriteria,
      failureModes: data.failureModes,
      stakeholders: data.stakeholders,
      status: PilotStatus.DESIGNED,
      executionLog: [],
      atRisk: false,
      riskSignals: [],
      version: 1,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      endedAt: null,
    };

    await repositories.pilots.insert(pilot);
    const validation = evaluatePilotDesign(pilot);
    logger.info(
      { tenantId: pilot.tenantId, pilotId: pilot.id, roadmapId: roadmap.id, gatePassed: validation.valid },
      'Pilot designed'
    );

    await publisher.publish(
      MaturityEventType.PILOT_DESIGNED,
      buildEventPayload(
        pilot.id,
        pilot.tenantId,
        {
          roadmapId: pilot.roadmapId,
          assessmentId: pilot.assessmentId,
          title: pilot.title,
          dimension: pilot.dimension,
          gatePassed: validation.valid,
        },
        clock
      )
    );

    return pilot;
  }

  async getPilot(tenantId: string, pilotId: string): Promise<Pilot> {
    const pilot = await this.context.repositories.pilots.findById(tenantId, pilotId);
    if (!pilot) {
      throw new NotFoundError('Pilot', pilotId);
    }
    return pilot;
  }

  async listPilots(tenantId: string, roadmapId: string): Promise<Pilot[]> {
    return this.context.repositories.pilots.listByRoadmap(tenantId, roadmapId);
  }

  async validatePilot(tenantId: string, pilotId: string): Promise<PilotValidationReport> {
    return evaluatePilotDesign(await this.getPilot(tenantId, pilotId));
  }

  async transitionPilot(input: TransitionPilotInput): Promise<Pilot> {
    const data = parseInput(transitionSchema, input, 'Invalid pilot transition');
    const { clock, publisher } = this.context;

    const pilot = await this.loadForWrite(data.tenantId, data.pilotId, data.expectedVersion);
    const moved = transitionPilot(pilot, data.targetStatus, clock);
    const next = await this.save(pilot, moved);

    logger.info(
      { tenantId: next.tenantId, pilotId: next.id, from: pilot.status, to: next.status },
      'Pilot status changed'
    );

    await publisher.publish(
      MaturityEventType.PILOT_STATUS_CHANGED,
      buildEventPayload(
        next.id,
        next.tenantId,
        { from: pilot.status, to: next.status, roadmapId: next.roadmapId, atRisk: next.atRisk },
        clock
      )
    );

    return next;
  }

  async logExecution(input: LogExecutionInput): Promise<LogExecutionResult> {
    const data = parseInput(logExecutionSchema, input, 'Invalid execution log entry');

    const pilot = await this.loadForWrite(data.tenantId, data.pilotId, data.expectedVersion);
    const { pilot: appended, entry } = appendExecutionEntry(
      pilot,
      {
        week: data.week,
        status: data.status,
        metrics: data.metrics,
        blockers: data.blockers,
        notes: data.notes,
      },
      this.context.clock
    );
    const next = await this.save(pilot, appended);

    if (next.atRisk) {
      logger.warn(
        { tenantId: next.tenantId, pilotId: next.id, week: entry.week, signals: next.riskSignals.map((s) => s.type) },
        'Pilot flagged at risk'
      );
    } else {
      logger.info({ tenantId: next.tenantId, pilotId: next.id, week: entry.week }, 'Execution entry logged');
    }

    return { pilot: next, entry, atRisk: next.atRisk, riskSignals: next.riskSignals };
  }

  private async loadForWrite(tenantId: string, pilotId: string, expectedVersion?: number): Promise<Pilot> {
    const pilot = await this.getPilot(tenantId, pilotId);
    if (expectedVersion !== undefined && pilot.version !== expectedVersion) {
      throw staleVersion(pilot.id, expectedVersion, pilot.version);
    }
    return pilot;
  }

  private async save(current: Pilot, changed: Pilot): Promise<Pilot> {
    const next: Pilot = { ...changed, version: current.version + 1 };
    const applied = await this.context.repositories.pilots.compareAndSet(next, current.version);
    if (!applied) {
      const latest = await this.context.repositories.pilots.findById(current.tenantId, current.id);
      throw staleVersion(current.id, current.version, latest?.version ?? null);
    }
    return next;
  }
}

function staleVersion(pilotId: string, expectedVersion: number, actualVersion: number | null): ConcurrencyError {
  return new ConcurrencyError(
    `Pilot ${pilotId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion ?? 'none'})`,
    { pilotId, expectedVersion, actualVersion }
  );
}
