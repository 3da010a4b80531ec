/**
 * Report Types
 */

import type { Dimension, DimensionScores, MaturityLevel } from './assessment.js';
import type { BenchmarkComparison } from './benchmark.js';
import type { Initiative } from './roadmap.js';
import type { PilotStatus } from './pilot.js';

export interface PilotSummary {
  pilotId: string;
  title: string;
  status: PilotStatus;
  atRisk: boolean;
  logEntryCount: number;
  latestWeek: number | null;
}

export interface ReportContent {
  organizationName: string;
  overallScore: number;
  maturityLevel: MaturityLevel;
  maturityLabel: string;
  dimensionScores: DimensionScores;
  strongestDimension: Dimension;
  weakestDimension: Dimension;
  benchmark: BenchmarkComparison | null;
  initiatives: Initiative[];
  pilot: PilotSummary | null;
}

export interface Report {
  id: string;
  tenantId: string;
  assessmentId: string;
  roadmapId: string | null;
  pilotId: string | null;
  generatedAt: Date;
  content: ReportContent;
}
