/**
 * Pilot Accelerator Types
 */

import type { Dimension } from './assessment.js';

export const PilotStatus = {
  DESIGNED: 'designed',
  APPROVED: 'approved',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type PilotStatus = (typeof PilotStatus)[keyof typeof PilotStatus];

export type MetricDirection = 'increase' | 'decrease';

export interface SuccessCriterion {
  metric: string;
  target: number;
  measurementMethod: string;
  direction: MetricDirection;
}

export interface FailureMode {
  description: string;
  mitigation: string;
}

/** Role name mapped to the person accountable for it. */
export type StakeholderMap = Record<string, string>;

export type ExecutionStatus = 'on_track' | 'at_risk' | 'blocked';

export interface ExecutionLogEntry {
  week: number;
  recordedAt: Date;
  status: ExecutionStatus;
  metrics: Record<string, number>;
  blockers: string[];
  notes: string;
}

export type PilotRiskSignal =
  | { type: 'consecutive_blockers'; weeks: number[] }
  | {
      type: 'declining_metric';
      metric: string;
      previousValue: number;
      currentValue: number;
      direction: MetricDirection;
    };

export interface PilotDesign {
  title: string;
  dimension: Dimension;
  durationWeeks: number;
  successCriteria: SuccessCriterion[];
  failureModes: FailureMode[];
  stakeholders: StakeholderMap;
}

export interface Pilot extends PilotDesign {
  id: string;
  tenantId: string;
  assessmentId: string;
  roadmapId: string;
  status: PilotStatus;
  executionLog: ExecutionLogEntry[];
  atRisk: boolean;
  riskSignals: PilotRiskSignal[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  endedAt: Date | null;
}

export interface PilotValidationReport {
  valid: boolean;
  violations: string[];
}
