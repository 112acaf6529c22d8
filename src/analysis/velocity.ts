/**
 * Adoption Radar: Velocity Calculator
 *
 * Growth rates come from persisted run snapshots, never from a single run.
 * Compares the oldest and the latest successful observation inside the
 * lookback window (measured back from the newest snapshot) and
 * normalizes the change to a 30-day month.
 *
 * Fewer than two observations, or less than a day between them, is an
 * explicit 'insufficient_data' result, never a growth rate of 0.
 */

import type {
  Momentum,
  RunSnapshot,
  SourceName,
  SourceVelocity,
  SourceVelocityResult,
  TechnologyVelocity,
} from '../types';
import { SOURCE_NAMES } from '../types';
import type { VelocityPolicy } from '../lib/config';
import { DEFAULT_VELOCITY_POLICY } from '../lib/config';

const DAY_MS = 24 * 60 * 60 * 1000;
const MONTH_DAYS = 30;

/** A brand-new series this large on first sight is an anomaly */
const EMERGENCE_ANOMALY_FLOOR = 10_000;

/** Weights for the technology momentum score */
const SOURCE_WEIGHTS: Record<SourceName, number> = {
  github: 0.5,
  npm: 0.25,
  pypi: 0.25,
};

/** Emerging series have no finite growth; they count as +100% */
const EMERGING_GROWTH_PERCENTAGE = 100;

export interface Observation {
  timestamp: string;
  value: number;
}

// ============================================================
// CLASSIFICATION
// ============================================================

/**
 * Classify a monthly growth percentage.
 */
export function classifyGrowth(monthlyPercentage: number): Momentum {
  if (monthlyPercentage > 50) return 'accelerating';
  if (monthlyPercentage > 10) return 'growing';
  if (monthlyPercentage > -10) return 'stable';
  if (monthlyPercentage > -50) return 'declining';
  return 'collapsing';
}

// ============================================================
// SIMPLE VELOCITY
// ============================================================

export function computeSimpleVelocity(
  source: SourceName,
  latestValue: number,
  previousValue: number,
  periodDays: number,
  policy: VelocityPolicy = DEFAULT_VELOCITY_POLICY
): SourceVelocity {
  const absoluteChange = latestValue - previousValue;
  const base = { status: 'ok' as const, source, absoluteChange, periodDays, previousValue, latestValue };

  if (previousValue === 0) {
    if (latestValue > 0) {
      return {
        ...base,
        growthRate: null,
        growthPercentage: null,
        momentum: 'emerging',
        isAnomaly: latestValue > EMERGENCE_ANOMALY_FLOOR,
      };
    }
    return { ...base, growthRate: 0, growthPercentage: 0, momentum: 'no_activity', isAnomaly: false };
  }

  const growthRate = (absoluteChange / previousValue) * (MONTH_DAYS / periodDays);
  const growthPercentage = growthRate * 100;

  return {
    ...base,
    growthRate,
    growthPercentage,
    momentum: classifyGrowth(growthPercentage),
    isAnomaly: Math.abs(growthRate) > policy.spikeThreshold,
  };
}

// ============================================================
// SERIES
// ============================================================

/**
 * Snapshots inside the lookback window, measured back from the newest one.
 */
export function snapshotsInWindow(
  snapshots: readonly RunSnapshot[],
  policy: VelocityPolicy = DEFAULT_VELOCITY_POLICY
): RunSnapshot[] {
  if (snapshots.length === 0) return [];
  const newest = Math.max(...snapshots.map(s => Date.parse(s.collectedAt)));
  const cutoff = newest - policy.lookbackDays * DAY_MS;
  return snapshots
    .filter(s => Date.parse(s.collectedAt) >= cutoff)
    .sort((a, b) => Date.parse(a.collectedAt) - Date.parse(b.collectedAt));
}

/**
 * Successful observations of one technology+source, oldest first.
 */
export function observationSeries(
  snapshots: readonly RunSnapshot[],
  technology: string,
  source: SourceName
): Observation[] {
  const series: Observation[] = [];
  for (const snapshot of snapshots) {
    for (const metric of snapshot.metrics) {
      if (metric.technology === technology && metric.source === source && metric.fetchSucceeded) {
        series.push({ timestamp: metric.timestamp, value: metric.primaryCount });
      }
    }
  }
  return series.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

export function computeSourceVelocity(
  source: SourceName,
  series: readonly Observation[],
  policy: VelocityPolicy = DEFAULT_VELOCITY_POLICY
): SourceVelocityResult {
  if (series.length === 0) {
    return { status: 'insufficient_data', reason: 'not_observed' };
  }
  if (series.length < 2) {
    return { status: 'insufficient_data', reason: 'too_few_snapshots' };
  }

  const oldest = series[0];
  const latest = series[series.length - 1];
  const periodDays = (Date.parse(latest.timestamp) - Date.parse(oldest.timestamp)) / DAY_MS;

  if (periodDays < 1) {
    return { status: 'insufficient_data', reason: 'insufficient_time_delta' };
  }

  return computeSimpleVelocity(source, latest.value, oldest.value, periodDays, policy);
}

// ============================================================
// TECHNOLOGY VELOCITY
// ============================================================

/**
 * Weighted mean of the per-source growth percentages that exist.
 */
export function momentumScore(bySource: Partial<Record<SourceName, SourceVelocityResult>>): number | null {
  let weighted = 0;
  let totalWeight = 0;

  for (const source of SOURCE_NAMES) {
    const result = bySource[source];
    if (!result || result.status !== 'ok') continue;

    const growth = result.growthPercentage ?? EMERGING_GROWTH_PERCENTAGE;
    weighted += growth * SOURCE_WEIGHTS[source];
    totalWeight += SOURCE_WEIGHTS[source];
  }

  return totalWeight > 0 ? weighted / totalWeight : null;
}

export function computeTechnologyVelocity(
  technology: string,
  sources: readonly SourceName[],
  snapshots: readonly RunSnapshot[],
  policy: VelocityPolicy = DEFAULT_VELOCITY_POLICY
): TechnologyVelocity {
  const windowed = snapshotsInWindow(snapshots, policy);
  const bySource: Partial<Record<SourceName, SourceVelocityResult>> = {};

  for (const source of sources) {
    bySource[source] =
      windowed.length < 2
        ? { status: 'insufficient_data', reason: 'too_few_snapshots' }
        : computeSourceVelocity(source, observationSeries(windowed, technology, source), policy);
  }

  const score = momentumScore(bySource);

  return {
    technology,
    bySource,
    momentumScore: score,
    momentum: score === null ? null : classifyGrowth(score),
  };
}
