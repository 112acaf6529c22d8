/**
 * Adoption Radar: Type Exports
 *
 * Re-exports all types from the types module.
 */

// Technologies
export type {
  TechnologyCategory,
  ListId,
  TechnologySpec,
  TechnologyList,
} from './technology';
export {
  TechnologyCategorySchema,
  ListIdSchema,
  TechnologySpecSchema,
  TechnologyListSchema,
  TechnologyCatalogSchema,
} from './technology';

// Metrics
export type {
  SourceName,
  SourceMetric,
  NormalizedRecord,
  ConfidenceLevel,
  HypeSignal,
  DownloadDivergenceSignal,
  VisibilityGapSignal,
  ScoredRecord,
  RunSnapshot,
} from './metrics';
export {
  SourceNameSchema,
  SOURCE_NAMES,
  PRODUCTION_SOURCES,
  SourceMetricSchema,
  ConfidenceLevelSchema,
  HypeSignalSchema,
  ScoredRecordSchema,
  RunSnapshotSchema,
} from './metrics';

// Velocity & Insights
export type {
  Momentum,
  InsufficientReason,
  InsufficientData,
  SourceVelocity,
  SourceVelocityResult,
  TechnologyVelocity,
  ConfidenceSummary,
  AdoptionLeader,
  HypeCandidate,
  CategoryTrend,
  MomentumEntry,
  ListInsights,
  VelocityComparison,
  CategoryPatterns,
  LeadingIndicator,
  MaturityComparison,
  OverallVerdict,
  ComparativeInsights,
} from './insight';
