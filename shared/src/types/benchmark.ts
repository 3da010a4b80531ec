/**
 * Benchmark Types
 */

import type { Dimension, Industry, MaturityLevel } from './assessment.js';

export type BenchmarkScope = Dimension | 'overall';

export interface Benchmark {
  id: string;
  industry: Industry;
  scope: BenchmarkScope;
  period: string;
  peerScores: number[];
  updatedAt: Date;
}

export interface PercentileResult {
  scope: BenchmarkScope;
  score: number;
  percentile: number;
  peerCount: number;
  lowConfidence: boolean;
  benchmarkId: string;
  period: string;
  /** Peer median (p50). */
  median: number;
  /** Best-in-class threshold (p90). */
  bestInClass: number;
  vsMedian: number;
  aboveMedian: boolean;
}

export const GapSeverity = {
  CRITICAL: 'critical',
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
} as const;

export type GapSeverity = (typeof GapSeverity)[keyof typeof GapSeverity];

export interface DimensionGap {
  dimension: Dimension;
  currentScore: number;
  bestInClassScore: number;
  gapSize: number;
  gapPercent: number;
  severity: GapSeverity;
  currentLevel: MaturityLevel;
  targetLevel: MaturityLevel;
}

export interface BenchmarkComparison {
  assessmentId: string;
  industry: Industry;
  overall: PercentileResult;
  dimensions: Record<Dimension, PercentileResult>;
  /** Largest gap to best-in-class first. */
  gaps: DimensionGap[];
}
