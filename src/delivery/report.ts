/**
 * Adoption Radar: Report Model
 *
 * Builds format-neutral reports from typed insights. Markdown and PDF
 * renderers both consume the same sections, so every figure in a report
 * comes from the insight values and nothing else.
 */

import type {
  ComparativeInsights,
  ListId,
  ListInsights,
  Momentum,
  TechnologyCategory,
  TechnologyList,
} from '../types';

// ============================================================
// TYPES
// ============================================================

export interface ReportTable {
  headers: string[];
  rows: string[][];
}

export interface ReportSection {
  heading: string;
  paragraphs: string[];
  bullets?: string[];
  table?: ReportTable;
}

export interface Report {
  /** 'enterprise' | 'fintech' | 'comparative'; used in file names */
  key: string;
  title: string;
  runId: string;
  generatedAt: string;
  sections: ReportSection[];
}

export interface ReportContext {
  runId: string;
  generatedAt: string;
}

// ============================================================
// FORMATTING
// ============================================================

export function formatPercent(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}%`;
}

export function formatPoints(value: number): string {
  return `${Math.abs(value).toFixed(1)} points`;
}

export function formatCategory(category: TechnologyCategory): string {
  return category.replace(/_/g, ' ');
}

const MOMENTUM_LABELS: Record<Momentum, string> = {
  emerging: 'Emerging',
  accelerating: 'Accelerating',
  growing: 'Growing',
  stable: 'Stable',
  declining: 'Declining',
  collapsing: 'Collapsing',
  no_activity: 'No activity',
};

export function formatMomentum(momentum: Momentum): string {
  return MOMENTUM_LABELS[momentum];
}

function displayNames(list: TechnologyList): (name: string) => string {
  const names = new Map(list.technologies.map(t => [t.name, t.displayName]));
  return name => names.get(name) ?? name;
}

const SIMILAR_MATURITY = 'Both markets show similar maturity.';

export const INSUFFICIENT_HISTORY =
  'Insufficient data: momentum needs at least two snapshots at least one day apart. ' +
  'Rankings will appear once the pipeline has run again.';

// ============================================================
// LIST REPORT
// ============================================================

export function buildListReport(list: TechnologyList, insights: ListInsights, context: ReportContext): Report {
  const display = displayNames(list);
  const sections: ReportSection[] = [];
  const { confidence } = insights;

  // Executive summary
  const summary: string[] = [list.description, `Tracked technologies: ${confidence.total}.`];
  if (insights.status === 'insufficient_data') {
    summary.push(INSUFFICIENT_HISTORY);
  } else {
    const leader = insights.adoptionLeaders[0];
    summary.push(
      `Top adoption leader: ${display(leader.technology)} (${formatPercent(leader.momentumScore)} monthly momentum).`
    );
  }
  summary.push(`Hype candidates: ${insights.hypeCandidates.length}.`);
  sections.push({ heading: 'Executive Summary', paragraphs: summary });

  // Data quality
  sections.push({
    heading: 'Data Quality',
    paragraphs: [`${confidence.high + confidence.medium} of ${confidence.total} technologies have at least one source.`],
    table: {
      headers: ['Confidence', 'Technologies'],
      rows: [
        ['HIGH', String(confidence.high)],
        ['MEDIUM', String(confidence.medium)],
        ['LOW', String(confidence.low)],
      ],
    },
  });

  // Hype
  sections.push(
    insights.hypeCandidates.length === 0
      ? { heading: 'Hype Signals', paragraphs: ['No hype signals detected.'] }
      : {
          heading: 'Hype Signals',
          paragraphs: [],
          bullets: insights.hypeCandidates.map(
            h => `${display(h.technology)} (${h.confidenceLevel}): ${h.hypeReason}`
          ),
        }
  );

  // Leaders
  sections.push(
    insights.adoptionLeaders.length === 0
      ? { heading: 'Adoption Leaders', paragraphs: [INSUFFICIENT_HISTORY] }
      : {
          heading: 'Adoption Leaders',
          paragraphs: [],
          table: {
            headers: ['Rank', 'Technology', 'Category', 'Momentum', 'Score', 'Confidence'],
            rows: insights.adoptionLeaders.map((leader, i) => [
              String(i + 1),
              display(leader.technology),
              formatCategory(leader.category),
              formatMomentum(leader.momentum),
              formatPercent(leader.momentumScore),
              leader.confidenceLevel,
            ]),
          },
        }
  );

  // Categories
  sections.push(
    insights.categoryTrends.length === 0
      ? { heading: 'Category Trends', paragraphs: [INSUFFICIENT_HISTORY] }
      : {
          heading: 'Category Trends',
          paragraphs: [],
          table: {
            headers: ['Category', 'Technologies', 'Average', 'Range'],
            rows: insights.categoryTrends.map(trend => [
              formatCategory(trend.category),
              String(trend.technologyCount),
              formatPercent(trend.averageMomentum),
              `${formatPercent(trend.minMomentum)} to ${formatPercent(trend.maxMomentum)}`,
            ]),
          },
        }
  );

  // Movers
  const movers = (heading: string, entries: ListInsights['emerging']): ReportSection =>
    entries.length === 0
      ? { heading, paragraphs: ['None.'] }
      : {
          heading,
          paragraphs: [],
          bullets: entries.map(e =>
            e.growthPercentage === null
              ? `${display(e.technology)}: ${formatMomentum(e.momentum)}`
              : `${display(e.technology)}: ${formatMomentum(e.momentum)} (${formatPercent(e.growthPercentage)})`
          ),
        };
  sections.push(movers('Emerging', insights.emerging));
  sections.push(movers('Declining', insights.declining));

  // Audit
  sections.push(
    insights.excluded.length === 0
      ? { heading: 'Excluded From Ranking', paragraphs: ['None.'] }
      : {
          heading: 'Excluded From Ranking',
          paragraphs: ['No source could be read for these technologies in this run.'],
          bullets: insights.excluded.map(display),
        }
  );

  return {
    key: list.id,
    title: `${list.name} Adoption Report`,
    runId: context.runId,
    generatedAt: context.generatedAt,
    sections,
  };
}

// ============================================================
// COMPARATIVE REPORT
// ============================================================

export function buildComparativeReport(
  comparison: ComparativeInsights,
  lists: readonly TechnologyList[],
  context: ReportContext
): Report {
  const names = new Map(lists.map(l => [l.id, l.name]));
  const name = (id: ListId): string => names.get(id) ?? id;
  const [first, second] = comparison.lists;
  const sections: ReportSection[] = [];

  // Velocity
  const velocity = comparison.velocity;
  if (velocity.status === 'insufficient_data') {
    sections.push({ heading: 'Adoption Velocity', paragraphs: [INSUFFICIENT_HISTORY] });
  } else {
    sections.push({
      heading: 'Adoption Velocity',
      paragraphs: [
        velocity.leader === 'tied'
          ? 'Neither list leads on adoption velocity.'
          : `${name(velocity.leader)} leads on adoption velocity by ${formatPoints(velocity.difference)}.`,
      ],
      table: {
        headers: ['List', 'Average momentum', 'Median momentum'],
        rows: [first, second].map(id => [
          name(id),
          formatPercent(velocity.averageMomentum[id]),
          formatPercent(velocity.medianMomentum[id]),
        ]),
      },
    });
  }

  // Categories
  const { shared, uniqueTo } = comparison.categories;
  sections.push({
    heading: 'Category Patterns',
    paragraphs: [],
    bullets: [
      `Shared: ${shared.length > 0 ? shared.map(formatCategory).join(', ') : 'none'}`,
      ...[first, second].map(
        id => `Only in ${name(id)}: ${uniqueTo[id].length > 0 ? uniqueTo[id].map(formatCategory).join(', ') : 'none'}`
      ),
    ],
  });

  // Leading indicators
  sections.push(
    comparison.leadingIndicators.length === 0
      ? { heading: 'Leading Indicators', paragraphs: ['No leading indicators detected.'] }
      : {
          heading: 'Leading Indicators',
          paragraphs: ['Hypotheses for follow-up, not established correlations.'],
          bullets: comparison.leadingIndicators.map(
            ind =>
              `${name(ind.leadingList)} ${formatCategory(ind.leadingCategory)} leads ` +
              `${name(ind.followingList)} ${formatCategory(ind.followingCategory)} by ${formatPoints(ind.momentumGap)}`
          ),
        }
  );

  // Maturity
  const maturity = comparison.maturity;
  const { moreMature } = comparison.overall;
  if (maturity.status === 'insufficient_data') {
    sections.push({ heading: 'Market Maturity', paragraphs: [SIMILAR_MATURITY, INSUFFICIENT_HISTORY] });
  } else {
    sections.push({
      heading: 'Market Maturity',
      paragraphs: [
        moreMature === null
          ? SIMILAR_MATURITY
          : `${name(moreMature)} is more mature (${maturity.magnitude ?? 'moderate'} gap of ${formatPoints(maturity.gap)}).`,
      ],
      table: {
        headers: ['List', 'Leader momentum', 'Emerging technologies'],
        rows: [first, second].map(id => [
          name(id),
          formatPercent(maturity.maturityScore[id]),
          String(maturity.emergingCount[id]),
        ]),
      },
    });
  }

  return {
    key: 'comparative',
    title: `${name(first)} vs ${name(second)}`,
    runId: context.runId,
    generatedAt: context.generatedAt,
    sections,
  };
}
