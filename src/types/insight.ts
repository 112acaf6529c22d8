/**
 * Adoption Radar: Velocity & Insight Types
 *
 * Every result that depends on history carries an explicit
 * 'insufficient_data' state. Renderers turn these into prose.
 */

import type { ConfidenceLevel, SourceName } from './metrics';
import type { ListId, TechnologyCategory } from './technology';

// ============================================================
// VELOCITY
// ============================================================

export type Momentum =
  | 'emerging'
  | 'accelerating'
  | 'growing'
  | 'stable'
  | 'declining'
  | 'collapsing'
  | 'no_activity';

export type InsufficientReason =
  | 'too_few_snapshots'
  | 'insufficient_time_delta'
  | 'not_observed';

export interface InsufficientData {
  status: 'insufficient_data';
  reason: InsufficientReason;
}

export interface SourceVelocity {
  status: 'ok';
  source: SourceName;
  /** Monthly growth rate (fraction); null when the previous value was zero */
  growthRate: number | null;
  growthPercentage: number | null;
  absoluteChange: number;
  periodDays: number;
  momentum: Momentum;
  isAnomaly: boolean;
  previousValue: number;
  latestValue: number;
}

export type SourceVelocityResult = SourceVelocity | InsufficientData;

export interface TechnologyVelocity {
  technology: string;
  bySource: Partial<Record<SourceName, SourceVelocityResult>>;
  /** Weighted mean of per-source growth percentages, null without data */
  momentumScore: number | null;
  momentum: Momentum | null;
}

// ============================================================
// LIST INSIGHTS
// ============================================================

export interface ConfidenceSummary {
  high: number;
  medium: number;
  low: number;
  hypeDetected: number;
  total: number;
}

export interface AdoptionLeader {
  technology: string;
  category: TechnologyCategory;
  momentumScore: number;
  momentum: Momentum;
  confidenceLevel: ConfidenceLevel;
}

export interface HypeCandidate {
  technology: string;
  confidenceLevel: ConfidenceLevel;
  hypeReason: string;
  divergenceRatio: number | null;
}

export interface CategoryTrend {
  category: TechnologyCategory;
  technologyCount: number;
  averageMomentum: number;
  maxMomentum: number;
  minMomentum: number;
  technologies: Array<{ technology: string; momentumScore: number }>;
}

export interface MomentumEntry {
  technology: string;
  category: TechnologyCategory;
  momentum: Momentum;
  growthPercentage: number | null;
}

export interface ListInsights {
  listId: ListId;
  listName: string;
  status: 'ok' | 'insufficient_data';
  confidence: ConfidenceSummary;
  hypeCandidates: HypeCandidate[];
  adoptionLeaders: AdoptionLeader[];
  categoryTrends: CategoryTrend[];
  emerging: MomentumEntry[];
  declining: MomentumEntry[];
  /** LOW confidence technologies, listed for audit only */
  excluded: string[];
}

// ============================================================
// COMPARATIVE INSIGHTS
// ============================================================

export type VelocityComparison =
  | InsufficientData
  | {
      status: 'ok';
      averageMomentum: Record<ListId, number>;
      medianMomentum: Record<ListId, number>;
      difference: number;
      leader: ListId | 'tied';
    };

export interface CategoryPatterns {
  shared: TechnologyCategory[];
  uniqueTo: Record<ListId, TechnologyCategory[]>;
}

export interface LeadingIndicator {
  leadingList: ListId;
  leadingCategory: TechnologyCategory;
  followingList: ListId;
  followingCategory: TechnologyCategory;
  momentumGap: number;
}

export type MaturityComparison =
  | InsufficientData
  | {
      status: 'ok';
      maturityScore: Record<ListId, number>;
      emergingCount: Record<ListId, number>;
      gap: number;
      verdict: 'similar' | 'ahead';
      moreMature: ListId | null;
      magnitude: 'moderate' | 'significant' | null;
    };

/** Headline verdict; neutral (similar) whenever maturity cannot be measured */
export interface OverallVerdict {
  verdict: 'similar' | 'ahead';
  moreMature: ListId | null;
}

export interface ComparativeInsights {
  lists: [ListId, ListId];
  velocity: VelocityComparison;
  categories: CategoryPatterns;
  leadingIndicators: LeadingIndicator[];
  maturity: MaturityComparison;
  overall: OverallVerdict;
}
