/**
 * Adoption Radar: Comparative Analyzer
 *
 * Cross-list comparison (enterprise vs fintech).
 * Every numeric finding is derived from the momentum series of the two
 * lists. Without history the parts report 'insufficient_data' and the
 * maturity verdict stays neutral. No lag-in-months figure is produced:
 * quantifying lag needs a long time series per list.
 */

import type {
  CategoryPatterns,
  ComparativeInsights,
  LeadingIndicator,
  ListId,
  ListInsights,
  MaturityComparison,
  TechnologyCategory,
  TechnologyList,
  VelocityComparison,
} from '../types';
import { logger } from '../lib/logger';

/** Velocity difference (percentage points) below which lists are tied */
const VELOCITY_TIE_POINTS = 5;
/** Maturity gap below which markets are similar */
const MATURITY_SIMILAR_POINTS = 10;
const MATURITY_SIGNIFICANT_POINTS = 30;
/** Infrastructure must lead an application category by this much */
const LEADING_INDICATOR_GAP = 20;

const INFRASTRUCTURE_CATEGORIES: readonly TechnologyCategory[] = ['vector_db', 'ai_infrastructure', 'ml_platform'];
const APPLICATION_CATEGORIES: readonly TechnologyCategory[] = [
  'ai_platform',
  'fintech_infrastructure',
  'trading_platform',
];

export interface ListSide {
  list: TechnologyList;
  insights: ListInsights;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Key a pair of values by list. The two sides are always distinct lists.
 */
function perList<T>(a: ListSide, aValue: T, bValue: T): Record<ListId, T> {
  return a.list.id === 'enterprise'
    ? { enterprise: aValue, fintech: bValue }
    : { enterprise: bValue, fintech: aValue };
}

function momenta(insights: ListInsights): number[] {
  return insights.categoryTrends.flatMap(trend => trend.technologies.map(t => t.momentumScore));
}

// ============================================================
// VELOCITY
// ============================================================

export function compareVelocity(a: ListSide, b: ListSide): VelocityComparison {
  const aMomenta = momenta(a.insights);
  const bMomenta = momenta(b.insights);

  if (aMomenta.length === 0 || bMomenta.length === 0) {
    return { status: 'insufficient_data', reason: 'too_few_snapshots' };
  }

  const aAvg = mean(aMomenta);
  const bAvg = mean(bMomenta);
  const difference = aAvg - bAvg;

  let leader: ListId | 'tied';
  if (Math.abs(difference) < VELOCITY_TIE_POINTS) leader = 'tied';
  else leader = difference > 0 ? a.list.id : b.list.id;

  return {
    status: 'ok',
    averageMomentum: perList(a, aAvg, bAvg),
    medianMomentum: perList(a, median(aMomenta), median(bMomenta)),
    difference,
    leader,
  };
}

// ============================================================
// CATEGORIES
// ============================================================

function categoriesOf(list: TechnologyList): Set<TechnologyCategory> {
  return new Set(list.technologies.map(t => t.category));
}

export function compareCategories(a: ListSide, b: ListSide): CategoryPatterns {
  const aCats = categoriesOf(a.list);
  const bCats = categoriesOf(b.list);

  return {
    shared: [...aCats].filter(c => bCats.has(c)).sort(),
    uniqueTo: perList(
      a,
      [...aCats].filter(c => !bCats.has(c)).sort(),
      [...bCats].filter(c => !aCats.has(c)).sort()
    ),
  };
}

// ============================================================
// LEADING INDICATORS
// ============================================================

function categoryMomentum(insights: ListInsights): Map<TechnologyCategory, number> {
  return new Map(insights.categoryTrends.map(t => [t.category, t.averageMomentum]));
}

/**
 * Candidate pairs where infrastructure momentum in one list is well ahead
 * of application momentum in the other. Hypotheses, not proven correlation.
 */
export function detectLeadingIndicators(a: ListSide, b: ListSide): LeadingIndicator[] {
  const indicators: LeadingIndicator[] = [];

  for (const [leading, following] of [[a, b], [b, a]] as const) {
    const infra = categoryMomentum(leading.insights);
    const apps = categoryMomentum(following.insights);

    for (const infraCategory of INFRASTRUCTURE_CATEGORIES) {
      const infraMomentum = infra.get(infraCategory);
      if (infraMomentum === undefined) continue;

      for (const appCategory of APPLICATION_CATEGORIES) {
        const appMomentum = apps.get(appCategory);
        if (appMomentum === undefined) continue;

        const gap = infraMomentum - appMomentum;
        if (gap > LEADING_INDICATOR_GAP) {
          indicators.push({
            leadingList: leading.list.id,
            leadingCategory: infraCategory,
            followingList: following.list.id,
            followingCategory: appCategory,
            momentumGap: gap,
          });
        }
      }
    }
  }

  return indicators.sort((x, y) => y.momentumGap - x.momentumGap);
}

// ============================================================
// MATURITY
// ============================================================

/**
 * Mean leader momentum as a proxy for market maturity.
 */
export function compareMaturity(a: ListSide, b: ListSide): MaturityComparison {
  const aLeaders = a.insights.adoptionLeaders;
  const bLeaders = b.insights.adoptionLeaders;

  if (aLeaders.length === 0 || bLeaders.length === 0) {
    return { status: 'insufficient_data', reason: 'too_few_snapshots' };
  }

  const aScore = mean(aLeaders.map(l => l.momentumScore));
  const bScore = mean(bLeaders.map(l => l.momentumScore));
  const gap = aScore - bScore;
  const similar = Math.abs(gap) < MATURITY_SIMILAR_POINTS;

  return {
    status: 'ok',
    maturityScore: perList(a, aScore, bScore),
    emergingCount: perList(a, a.insights.emerging.length, b.insights.emerging.length),
    gap,
    verdict: similar ? 'similar' : 'ahead',
    moreMature: similar ? null : gap > 0 ? a.list.id : b.list.id,
    magnitude: similar ? null : Math.abs(gap) > MATURITY_SIGNIFICANT_POINTS ? 'significant' : 'moderate',
  };
}

// ============================================================
// FULL COMPARISON
// ============================================================

export function compareLists(a: ListSide, b: ListSide): ComparativeInsights {
  if (a.list.id === b.list.id) {
    throw new Error(`Cannot compare list ${a.list.id} with itself`);
  }

  const maturity = compareMaturity(a, b);
  const comparison: ComparativeInsights = {
    lists: [a.list.id, b.list.id],
    velocity: compareVelocity(a, b),
    categories: compareCategories(a, b),
    leadingIndicators: detectLeadingIndicators(a, b),
    maturity,
    overall:
      maturity.status === 'ok'
        ? { verdict: maturity.verdict, moreMature: maturity.moreMature }
        : { verdict: 'similar', moreMature: null },
  };

  logger.info('Comparative analysis completed', {
    lists: comparison.lists,
    velocity: comparison.velocity.status === 'ok' ? comparison.velocity.leader : comparison.velocity.status,
    sharedCategories: comparison.categories.shared.length,
    leadingIndicators: comparison.leadingIndicators.length,
    maturity: comparison.maturity.status,
    verdict: comparison.overall.verdict,
  });

  return comparison;
}
