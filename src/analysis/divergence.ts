/**
 * Adoption Radar: Divergence ("Hype") Detector
 *
 * Two checks, never mixing units:
 *
 * 1. Download divergence (npm vs pypi, same unit):
 *      ratio = max(a, b) / max(min(a, b), 1)
 *    hype when ratio >= hypeThreshold.
 *
 * 2. Visibility gap (github stars vs production downloads):
 *    stars and downloads are incommensurable, so each technology is
 *    ranked within the cohort that has both. Stars percentile in the
 *    top tier while downloads percentile is in the bottom tier is hype.
 *    Skipped when the cohort is smaller than minVisibilityCohort.
 */

import type {
  DownloadDivergenceSignal,
  HypeSignal,
  NormalizedRecord,
  SourceName,
  VisibilityGapSignal,
} from '../types';
import { PRODUCTION_SOURCES } from '../types';
import type { ScoringPolicy } from '../lib/config';

// ============================================================
// DOWNLOAD DIVERGENCE
// ============================================================

/**
 * Ratio between two magnitudes of the same unit.
 * The denominator is floored at 1 so a legitimate zero never divides by zero.
 */
export function divergenceRatio(a: number, b: number): number {
  return Math.max(a, b) / Math.max(Math.min(a, b), 1);
}

export interface DownloadDivergence {
  /** null when fewer than two comparable sources are present */
  ratio: number | null;
  signal?: DownloadDivergenceSignal;
}

export function detectDownloadDivergence(
  record: NormalizedRecord,
  policy: ScoringPolicy
): DownloadDivergence {
  const npm = record.sources.npm;
  const pypi = record.sources.pypi;

  if (!npm || !pypi) {
    return { ratio: null };
  }

  const ratio = divergenceRatio(npm.primaryCount, pypi.primaryCount);

  if (ratio >= policy.hypeThreshold) {
    return {
      ratio,
      signal: { kind: 'download_divergence', sources: ['npm', 'pypi'], ratio },
    };
  }

  return { ratio };
}

// ============================================================
// VISIBILITY GAP
// ============================================================

interface CohortEntry {
  technology: string;
  stars: number;
  downloads: number;
  productionSource: SourceName;
}

/**
 * Largest present download count; npm wins ties.
 */
function productionMagnitude(record: NormalizedRecord): { downloads: number; source: SourceName } | null {
  let best: { downloads: number; source: SourceName } | null = null;
  for (const source of PRODUCTION_SOURCES) {
    const metric = record.sources[source];
    if (metric && (!best || metric.primaryCount > best.downloads)) {
      best = { downloads: metric.primaryCount, source };
    }
  }
  return best;
}

/**
 * Percentile rank in [0, 1]. Ties share the mean of their ranks.
 */
export function percentileRank(value: number, values: readonly number[]): number {
  if (values.length < 2) return 0.5;
  let below = 0;
  let equal = 0;
  for (const v of values) {
    if (v < value) below++;
    else if (v === value) equal++;
  }
  const rank = below + (equal - 1) / 2;
  return rank / (values.length - 1);
}

/**
 * Compute visibility-gap signals for a cohort of records.
 * Returns a map keyed by technology; technologies without a signal are absent.
 */
export function detectVisibilityGaps(
  records: readonly NormalizedRecord[],
  policy: ScoringPolicy
): Map<string, VisibilityGapSignal> {
  const cohort: CohortEntry[] = [];

  for (const record of records) {
    const github = record.sources.github;
    const production = productionMagnitude(record);
    if (github && production) {
      cohort.push({
        technology: record.technology,
        stars: github.primaryCount,
        downloads: production.downloads,
        productionSource: production.source,
      });
    }
  }

  const signals = new Map<string, VisibilityGapSignal>();
  if (cohort.length < policy.minVisibilityCohort) {
    return signals;
  }

  const allStars = cohort.map(c => c.stars);
  const allDownloads = cohort.map(c => c.downloads);

  for (const entry of cohort) {
    const visibilityPercentile = percentileRank(entry.stars, allStars);
    const productionPercentile = percentileRank(entry.downloads, allDownloads);

    if (
      visibilityPercentile >= policy.visibilityTopPercentile &&
      productionPercentile <= policy.productionBottomPercentile
    ) {
      signals.set(entry.technology, {
        kind: 'visibility_gap',
        visibilitySource: 'github',
        productionSource: entry.productionSource,
        visibilityPercentile,
        productionPercentile,
      });
    }
  }

  return signals;
}

// ============================================================
// REASON
// ============================================================

function pct(p: number): string {
  return `p${Math.round(p * 100)}`;
}

/**
 * Short structured explanation used verbatim by the reports.
 */
export function describeHypeSignal(signal: HypeSignal): string {
  switch (signal.kind) {
    case 'download_divergence':
      return `${signal.sources[0]} vs ${signal.sources[1]} downloads diverge ${signal.ratio.toFixed(1)}x`;
    case 'visibility_gap':
      return (
        `${signal.visibilitySource} stars top tier (${pct(signal.visibilityPercentile)}) ` +
        `vs ${signal.productionSource} downloads bottom tier (${pct(signal.productionPercentile)})`
      );
  }
}
