/**
 * Shared zod schemas
 * Building blocks for service input validation and for decoding rows and
 * JSONB documents read back from PostgreSQL.
 */

import { z } from 'zod';
import {
  AssessmentStatus,
  DIMENSIONS,
  EFFORT_TIERS,
  Industry,
  OrganizationSize,
  PilotStatus,
  RoadmapStatus,
} from '@maturity/shared';
import { fromZodError } from './errors.js';

export const dimensionSchema = z.enum(DIMENSIONS);
export const industrySchema = z.nativeEnum(Industry);
export const organizationSizeSchema = z.nativeEnum(OrganizationSize);
export const assessmentStatusSchema = z.nativeEnum(AssessmentStatus);
export const roadmapStatusSchema = z.nativeEnum(RoadmapStatus);
export const pilotStatusSchema = z.nativeEnum(PilotStatus);
export const effortTierSchema = z.enum(EFFORT_TIERS);
export const timeframeSchema = z.enum(['quick-win', 'mid-term', 'strategic']);
export const metricDirectionSchema = z.enum(['increase', 'decrease']);
export const executionStatusSchema = z.enum(['on_track', 'at_risk', 'blocked']);

export const maturityLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export const scoreSchema = z.number().min(0).max(100);

/** One value per dimension, all five required. */
export function dimensionRecord<T extends z.ZodTypeAny>(value: T) {
  return z.object({
    data: value,
    process: value,
    people: value,
    technology: value,
    governance: value,
  });
}

export const successCriterionSchema = z.object({
  metric: z.string(),
  target: z.number(),
  measurementMethod: z.string(),
  direction: metricDirectionSchema.default('increase'),
});

export const failureModeSchema = z.object({
  description: z.string(),
  mitigation: z.string(),
});

export const stakeholderMapSchema = z.record(z.string(), z.string());

export const executionLogEntrySchema = z.object({
  week: z.number().int().positive(),
  recordedAt: z.coerce.date(),
  status: executionStatusSchema,
  metrics: z.record(z.string(), z.number()),
  blockers: z.array(z.string()),
  notes: z.string(),
});

export const riskSignalSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('consecutive_blockers'), weeks: z.array(z.number()) }),
  z.object({
    type: z.literal('declining_metric'),
    metric: z.string(),
    previousValue: z.number(),
    currentValue: z.number(),
    direction: metricDirectionSchema,
  }),
]);

export const initiativeSchema = z.object({
  id: z.string(),
  templateId: z.string(),
  dimension: dimensionSchema,
  title: z.string(),
  description: z.string(),
  currentLevel: maturityLevelSchema,
  targetLevel: maturityLevelSchema,
  priorityScore: z.number(),
  priorityRank: z.number().int(),
  effort: effortTierSchema,
  timeframe: timeframeSchema,
});

export const percentileResultSchema = z.object({
  scope: z.union([dimensionSchema, z.literal('overall')]),
  score: z.number(),
  percentile: z.number(),
  peerCount: z.number().int(),
  lowConfidence: z.boolean(),
  benchmarkId: z.string(),
  period: z.string(),
  median: z.number(),
  bestInClass: z.number(),
  vsMedian: z.number(),
  aboveMedian: z.boolean(),
});

export const dimensionGapSchema = z.object({
  dimension: dimensionSchema,
  currentScore: z.number(),
  bestInClassScore: z.number(),
  gapSize: z.number(),
  gapPercent: z.number(),
  severity: z.enum(['critical', 'high', 'medium', 'low']),
  currentLevel: maturityLevelSchema,
  targetLevel: maturityLevelSchema,
});

export const benchmarkComparisonSchema = z.object({
  assessmentId: z.string(),
  industry: industrySchema,
  overall: percentileResultSchema,
  dimensions: dimensionRecord(percentileResultSchema),
  gaps: z.array(dimensionGapSchema),
});

export const pilotSummarySchema = z.object({
  pilotId: z.string(),
  title: z.string(),
  status: pilotStatusSchema,
  atRisk: z.boolean(),
  logEntryCount: z.number().int(),
  latestWeek: z.number().int().nullable(),
});

export const reportContentSchema = z.object({
  organizationName: z.string(),
  overallScore: z.number(),
  maturityLevel: maturityLevelSchema,
  maturityLabel: z.string(),
  dimensionScores: dimensionRecord(z.number()),
  strongestDimension: dimensionSchema,
  weakestDimension: dimensionSchema,
  benchmark: benchmarkComparisonSchema.nullable(),
  initiatives: z.array(initiativeSchema),
  pilot: pilotSummarySchema.nullable(),
});

/**
 * Parse service input, raising ValidationError with the zod issue list.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message?: string
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, message);
  }
  return parsed.data;
}
