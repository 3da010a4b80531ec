/**
 * Report Assembler
 * Composes scores, benchmark standing, roadmap and pilot progress into one
 * report record. No I/O and no clock: the caller supplies id and generatedAt,
 * so the same inputs always produce the same report.
 */

import {
  AssessmentStatus,
  DIMENSIONS,
  type Assessment,
  type BenchmarkComparison,
  type Dimension,
  type DimensionScores,
  type Pilot,
  type PilotSummary,
  type Report,
  type Roadmap,
} from '@maturity/shared';
import { StateError, ValidationError } from '../../lib/errors.js';

export interface ReportInputs {
  id: string;
  generatedAt: Date;
  assessment: Assessment;
  benchmark?: BenchmarkComparison | null;
  roadmap?: Roadmap | null;
  pilot?: Pilot | null;
}

export function assembleReport(inputs: ReportInputs): Report {
  const { assessment } = inputs;
  const benchmark = inputs.benchmark ?? null;
  const roadmap = inputs.roadmap ?? null;
  const pilot = inputs.pilot ?? null;

  if (
    assessment.status !== AssessmentStatus.COMPLETED ||
    assessment.dimensionScores === null ||
    assessment.overallScore === null ||
    assessment.maturityLevel === null ||
    assessment.maturityLabel === null
  ) {
    throw new StateError(
      `Cannot assemble report - assessment ${assessment.id} is not completed (status: ${assessment.status})`,
      { assessmentId: assessment.id, status: assessment.status }
    );
  }

  assertBelongsTo(assessment.id, 'Benchmark comparison', benchmark?.assessmentId);
  assertBelongsTo(assessment.id, 'Roadmap', roadmap?.assessmentId);
  assertBelongsTo(assessment.id, 'Pilot', pilot?.assessmentId);
  if (pilot && roadmap && pilot.roadmapId !== roadmap.id) {
    throw new ValidationError(`Pilot ${pilot.id} was not designed from roadmap ${roadmap.id}`, {
      pilotId: pilot.id,
      roadmapId: roadmap.id,
    });
  }

  return {
    id: inputs.id,
    tenantId: assessment.tenantId,
    assessmentId: assessment.id,
    roadmapId: roadmap?.id ?? null,
    pilotId: pilot?.id ?? null,
    generatedAt: inputs.generatedAt,
    content: {
      organizationName: assessment.organizationName,
      overallScore: assessment.overallScore,
      maturityLevel: assessment.maturityLevel,
      maturityLabel: assessment.maturityLabel,
      dimensionScores: { ...assessment.dimensionScores },
      strongestDimension: strongestDimension(assessment.dimensionScores),
      weakestDimension: weakestDimension(assessment.dimensionScores),
      benchmark,
      initiatives: roadmap ? roadmap.initiatives.map((initiative) => ({ ...initiative })) : [],
      pilot: pilot ? summarizePilot(pilot) : null,
    },
  };
}

/** Highest-scoring dimension; ties go to the earlier dimension. */
export function strongestDimension(scores: DimensionScores): Dimension {
  return DIMENSIONS.reduce((best, dimension) => (scores[dimension] > scores[best] ? dimension : best));
}

/** Lowest-scoring dimension; ties go to the earlier dimension. */
export function weakestDimension(scores: DimensionScores): Dimension {
  return DIMENSIONS.reduce((worst, dimension) => (scores[dimension] < scores[worst] ? dimension : worst));
}

export function summarizePilot(pilot: Pilot): PilotSummary {
  const latest = pilot.executionLog[pilot.executionLog.length - 1];
  return {
    pilotId: pilot.id,
    title: pilot.title,
    status: pilot.status,
    atRisk: pilot.atRisk,
    logEntryCount: pilot.executionLog.length,
    latestWeek: latest ? latest.week : null,
  };
}

function assertBelongsTo(assessmentId: string, label: string, ownerId: string | undefined): void {
  if (ownerId !== undefined && ownerId !== assessmentId) {
    throw new ValidationError(`${label} belongs to assessment ${ownerId}, not ${assessmentId}`, {
      assessmentId,
      ownerId,
    });
  }
}

export default {
  assembleReport,
  strongestDimension,
  weakestDimension,
  summarizePilot,
};
