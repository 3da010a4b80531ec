/**
 * Assessment Types
 */

export const DIMENSIONS = ['data', 'process', 'people', 'technology', 'governance'] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export type DimensionWeights = Record<Dimension, number>;

export type DimensionScores = Record<Dimension, number>;

export type MaturityLevel = 1 | 2 | 3 | 4 | 5;

export const AssessmentStatus = {
  DRAFT: 'draft',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
} as const;

export type AssessmentStatus = (typeof AssessmentStatus)[keyof typeof AssessmentStatus];

export const Industry = {
  FINANCIAL_SERVICES: 'financial_services',
  HEALTHCARE: 'healthcare',
  MANUFACTURING: 'manufacturing',
  RETAIL: 'retail',
  TECHNOLOGY: 'technology',
  GOVERNMENT: 'government',
  OTHER: 'other',
} as const;

export type Industry = (typeof Industry)[keyof typeof Industry];

export const OrganizationSize = {
  STARTUP: 'startup',
  SMB: 'smb',
  MID_MARKET: 'mid_market',
  ENTERPRISE: 'enterprise',
  LARGE_ENTERPRISE: 'large_enterprise',
} as const;

export type OrganizationSize = (typeof OrganizationSize)[keyof typeof OrganizationSize];

export interface Assessment {
  id: string;
  tenantId: string;
  organizationName: string;
  industry: Industry;
  organizationSize: OrganizationSize;
  status: AssessmentStatus;
  dimensionWeights: DimensionWeights;
  dimensionScores: DimensionScores | null;
  overallScore: number | null;
  maturityLevel: MaturityLevel | null;
  maturityLabel: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

/**
 * A single answered question. `value` is already normalised to 0-100.
 */
export interface DimensionResponse {
  id: string;
  assessmentId: string;
  dimension: Dimension;
  questionId: string;
  value: number;
  weight?: number;
}

export interface AssessmentScoreResult {
  dimensionScores: DimensionScores;
  overallScore: number;
  maturityLevel: MaturityLevel;
  maturityLabel: string;
}

export interface DetailedScores extends AssessmentScoreResult {
  assessmentId: string;
  organizationName: string;
  dimensionWeights: DimensionWeights;
  responsesByDimension: Record<Dimension, DimensionResponse[]>;
  completedAt: Date | null;
}
