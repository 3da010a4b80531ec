/**
 * Maturity Engine Index
 * Exports scoring, classification, benchmarking, roadmap and report rules
 */

export {
  weightedAverage,
  weightedContributions,
  validateDimensionWeights,
  roundScore,
  WEIGHT_SUM_TOLERANCE,
  type WeightedValue,
  type RenormalizationPolicy,
} from './weighting.js';

export {
  DEFAULT_CATALOG_PATH,
  ruleCatalogSchema,
  parseRuleCatalog,
  loadRuleCatalog,
  getDefaultRuleCatalog,
  type RuleCatalog,
  type MaturityBand,
  type InitiativeTemplate,
} from './ruleCatalog.js';

export { scoreDimensions, type DimensionScoringResult, type ScoringInput } from './dimensionScorer.js';

export {
  classifyMaturity,
  nextMaturityLevel,
  type MaturityClassification,
} from './maturityClassifier.js';

export {
  computePercentile,
  peerQuantile,
  gapSeverity,
  analyzeGaps,
  MEDIAN_QUANTILE,
  BEST_IN_CLASS_QUANTILE,
  findBenchmark,
  percentileAgainst,
  compareScore,
  compareAssessment,
  DEFAULT_COMPARATOR_OPTIONS,
  type ComparatorOptions,
} from './benchmarkComparator.js';

export {
  generateRoadmap,
  TIMEFRAME_BY_EFFORT,
  type RoadmapGenerationOptions,
  type GeneratedRoadmap,
} from './roadmapGenerator.js';

export {
  assembleReport,
  strongestDimension,
  weakestDimension,
  summarizePilot,
  type ReportInputs,
} from './reportAssembler.js';
