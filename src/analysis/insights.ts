/**
 * Adoption Radar: List Insights
 *
 * Turns scored records + velocities into typed per-list findings.
 * No prose is produced here; the delivery layer renders it.
 *
 * Technologies with LOW confidence (nothing observed) are excluded
 * from every ranking and listed separately for audit.
 */

import type {
  AdoptionLeader,
  CategoryTrend,
  ConfidenceSummary,
  HypeCandidate,
  ListInsights,
  MomentumEntry,
  ScoredRecord,
  TechnologyCategory,
  TechnologyList,
  TechnologySpec,
  TechnologyVelocity,
} from '../types';
import { logger } from '../lib/logger';

interface RankedTechnology {
  spec: TechnologySpec;
  record: ScoredRecord;
  velocity: TechnologyVelocity;
  momentumScore: number;
}

export function summarizeConfidence(records: readonly ScoredRecord[]): ConfidenceSummary {
  return {
    high: records.filter(r => r.confidenceLevel === 'HIGH').length,
    medium: records.filter(r => r.confidenceLevel === 'MEDIUM').length,
    low: records.filter(r => r.confidenceLevel === 'LOW').length,
    hypeDetected: records.filter(r => r.hypeFlag).length,
    total: records.length,
  };
}

function isEmerging(velocity: TechnologyVelocity): boolean {
  return Object.values(velocity.bySource).some(
    v => v !== undefined && v.status === 'ok' && v.momentum === 'emerging'
  );
}

function toMomentumEntry(t: RankedTechnology): MomentumEntry {
  return {
    technology: t.spec.name,
    category: t.spec.category,
    momentum: isEmerging(t.velocity) ? 'emerging' : t.velocity.momentum ?? 'stable',
    growthPercentage: t.momentumScore,
  };
}

function categoryTrends(ranked: readonly RankedTechnology[]): CategoryTrend[] {
  const byCategory = new Map<TechnologyCategory, RankedTechnology[]>();
  for (const t of ranked) {
    const bucket = byCategory.get(t.spec.category) ?? [];
    bucket.push(t);
    byCategory.set(t.spec.category, bucket);
  }

  const trends: CategoryTrend[] = [];
  for (const [category, techs] of byCategory) {
    const momenta = techs.map(t => t.momentumScore);
    trends.push({
      category,
      technologyCount: techs.length,
      averageMomentum: momenta.reduce((sum, m) => sum + m, 0) / momenta.length,
      maxMomentum: Math.max(...momenta),
      minMomentum: Math.min(...momenta),
      technologies: techs
        .map(t => ({ technology: t.spec.name, momentumScore: t.momentumScore }))
        .sort((a, b) => b.momentumScore - a.momentumScore),
    });
  }

  return trends.sort((a, b) => b.averageMomentum - a.averageMomentum);
}

/**
 * Build insights for one strategic list.
 */
export function buildListInsights(
  list: TechnologyList,
  records: readonly ScoredRecord[],
  velocities: ReadonlyMap<string, TechnologyVelocity>,
  topN: number
): ListInsights {
  const byName = new Map(records.map(r => [r.technology, r]));
  const listRecords: ScoredRecord[] = [];
  const ranked: RankedTechnology[] = [];

  for (const spec of list.technologies) {
    const record = byName.get(spec.name);
    if (!record) continue;
    listRecords.push(record);

    const velocity = velocities.get(spec.name);
    if (record.rankable && velocity && velocity.momentumScore !== null) {
      ranked.push({ spec, record, velocity, momentumScore: velocity.momentumScore });
    }
  }

  const byMomentum = [...ranked].sort((a, b) => b.momentumScore - a.momentumScore);

  const adoptionLeaders: AdoptionLeader[] = byMomentum.slice(0, topN).map(t => ({
    technology: t.spec.name,
    category: t.spec.category,
    momentumScore: t.momentumScore,
    momentum: t.velocity.momentum ?? 'stable',
    confidenceLevel: t.record.confidenceLevel,
  }));

  const hypeCandidates: HypeCandidate[] = listRecords
    .filter(r => r.hypeFlag)
    .map(r => ({
      technology: r.technology,
      confidenceLevel: r.confidenceLevel,
      hypeReason: r.hypeReason ?? '',
      divergenceRatio: r.divergenceRatio,
    }));

  const entries = byMomentum.map(toMomentumEntry);

  const insights: ListInsights = {
    listId: list.id,
    listName: list.name,
    status: ranked.length > 0 ? 'ok' : 'insufficient_data',
    confidence: summarizeConfidence(listRecords),
    hypeCandidates,
    adoptionLeaders,
    categoryTrends: categoryTrends(ranked),
    emerging: entries.filter(e => e.momentum === 'emerging' || e.momentum === 'accelerating'),
    declining: entries.filter(e => e.momentum === 'declining' || e.momentum === 'collapsing'),
    excluded: listRecords.filter(r => !r.rankable).map(r => r.technology),
  };

  logger.info('List insights generated', {
    list: list.id,
    status: insights.status,
    leaders: adoptionLeaders.length,
    hype: hypeCandidates.length,
    excluded: insights.excluded.length,
  });

  return insights;
}
