/**
 * Roadmap Types
 */

import type { Dimension, MaturityLevel } from './assessment.js';

export const RoadmapStatus = {
  DRAFT: 'draft',
  PUBLISHED: 'published',
} as const;

export type RoadmapStatus = (typeof RoadmapStatus)[keyof typeof RoadmapStatus];

export const EFFORT_TIERS = ['small', 'medium', 'large'] as const;

export type EffortTier = (typeof EFFORT_TIERS)[number];

export type Timeframe = 'quick-win' | 'mid-term' | 'strategic';

export interface Initiative {
  id: string;
  templateId: string;
  dimension: Dimension;
  title: string;
  description: string;
  currentLevel: MaturityLevel;
  targetLevel: MaturityLevel;
  priorityScore: number;
  priorityRank: number;
  effort: EffortTier;
  timeframe: Timeframe;
}

export interface Roadmap {
  id: string;
  tenantId: string;
  assessmentId: string;
  status: RoadmapStatus;
  catalogVersion: string;
  initiatives: Initiative[];
  createdAt: Date;
  publishedAt: Date | null;
}
