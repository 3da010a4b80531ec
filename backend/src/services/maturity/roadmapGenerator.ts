/**
 * Roadmap Generator
 * Derives a prioritized initiative list from dimension maturity gaps.
 *
 * Each dimension below level 5 gets the catalog templates for exactly the
 * next level up. priority = (5 - currentLevel) × dimensionWeight, highest
 * first; ties fall back to dimension declaration order, then catalog order.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AssessmentStatus,
  DIMENSIONS,
  type Assessment,
  type Dimension,
  type EffortTier,
  type Initiative,
  type MaturityLevel,
  type Timeframe,
} from '@maturity/shared';
import { StateError } from '../../lib/errors.js';
import { classifyMaturity, nextMaturityLevel } from './maturityClassifier.js';
import { getDefaultRuleCatalog, type InitiativeTemplate, type RuleCatalog } from './ruleCatalog.js';
import { weightedContributions, type WeightedValue } from './weighting.js';

const TOP_LEVEL = 5;

export const TIMEFRAME_BY_EFFORT: Record<EffortTier, Timeframe> = {
  small: 'quick-win', // < 3 months
  medium: 'mid-term', // 3-9 months
  large: 'strategic', // > 9 months
};

export interface RoadmapGenerationOptions {
  maxInitiatives: number;
  idFactory?: () => string;
}

export interface GeneratedRoadmap {
  catalogVersion: string;
  initiatives: Initiative[];
}

interface Candidate {
  template: InitiativeTemplate;
  dimension: Dimension;
  dimensionOrder: number;
  templateOrder: number;
  currentLevel: MaturityLevel;
  targetLevel: MaturityLevel;
  priorityScore: number;
}

export function generateRoadmap(
  assessment: Assessment,
  catalog: RuleCatalog = getDefaultRuleCatalog(),
  options: RoadmapGenerationOptions = { maxInitiatives: 20 }
): GeneratedRoadmap {
  if (assessment.status !== AssessmentStatus.COMPLETED || !assessment.dimensionScores) {
    throw new StateError(
      `Cannot generate roadmap - assessment ${assessment.id} is not completed (status: ${assessment.status})`,
      { assessmentId: assessment.id, status: assessment.status }
    );
  }

  const scores = assessment.dimensionScores;
  const levelOf = (dimension: Dimension): MaturityLevel =>
    classifyMaturity(scores[dimension], catalog.maturityBands).level;
  const currentLevels: Record<Dimension, MaturityLevel> = {
    data: levelOf('data'),
    process: levelOf('process'),
    people: levelOf('people'),
    technology: levelOf('technology'),
    governance: levelOf('governance'),
  };

  const gaps: Record<string, WeightedValue> = {};
  for (const dimension of DIMENSIONS) {
    gaps[dimension] = {
      value: TOP_LEVEL - currentLevels[dimension],
      weight: assessment.dimensionWeights[dimension],
    };
  }
  const priorities = weightedContributions(gaps);

  const candidates: Candidate[] = [];
  DIMENSIONS.forEach((dimension, dimensionOrder) => {
    const currentLevel = currentLevels[dimension];
    const targetLevel = nextMaturityLevel(currentLevel);
    if (targetLevel === null) return;

    catalog.initiativeTemplates.forEach((template, templateOrder) => {
      if (template.dimension !== dimension || template.targetLevel !== targetLevel) return;
      candidates.push({
        template,
        dimension,
        dimensionOrder,
        templateOrder,
        currentLevel,
        targetLevel,
        priorityScore: roundPriority(priorities[dimension] ?? 0),
      });
    });
  });

  candidates.sort(
    (a, b) =>
      b.priorityScore - a.priorityScore ||
      a.dimensionOrder - b.dimensionOrder ||
      a.templateOrder - b.templateOrder
  );

  const idFactory = options.idFactory ?? uuidv4;
  const initiatives = candidates.slice(0, options.maxInitiatives).map(
    (candidate, index): Initiative => ({
      id: idFactory(),
      templateId: candidate.template.id,
      dimension: candidate.dimension,
      title: candidate.template.title,
      description: candidate.template.description,
      currentLevel: candidate.currentLevel,
      targetLevel: candidate.targetLevel,
      priorityScore: candidate.priorityScore,
      priorityRank: index + 1,
      effort: candidate.template.effort,
      timeframe: TIMEFRAME_BY_EFFORT[candidate.template.effort],
    })
  );

  return { catalogVersion: catalog.version, initiatives };
}

// Four decimals keeps products like 3 × 0.15 from splitting genuine ties
function roundPriority(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export default {
  generateRoadmap,
};
