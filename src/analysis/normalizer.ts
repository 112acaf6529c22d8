/**
 * Adoption Radar: Normalizer
 *
 * Reshapes the metrics of a run into one NormalizedRecord per technology.
 *
 * RULES:
 * - absent != zero. A source is absent when it is not configured for the
 *   technology, produced no metric, or its fetch failed. A successful
 *   fetch of 0 downloads is present.
 * - Missing sources are the normal state, never an error.
 * - Several metrics for the same technology+source: the latest wins,
 *   ties keep the first one seen.
 */

import { SOURCE_NAMES } from '../types';
import type { NormalizedRecord, SourceMetric, SourceName, TechnologySpec } from '../types';

export interface CollectionWindow {
  start: string;
  end: string;
}

const IDENTIFIER_FIELD: Record<SourceName, 'githubRepo' | 'npmPackage' | 'pypiPackage'> = {
  github: 'githubRepo',
  npm: 'npmPackage',
  pypi: 'pypiPackage',
};

export function isSourceConfigured(tech: TechnologySpec, source: SourceName): boolean {
  return tech[IDENTIFIER_FIELD[source]] !== undefined;
}

function inWindow(metric: SourceMetric, window?: CollectionWindow): boolean {
  if (!window) return true;
  const t = Date.parse(metric.timestamp);
  return t >= Date.parse(window.start) && t <= Date.parse(window.end);
}

function latest(metrics: SourceMetric[]): SourceMetric | undefined {
  let best: SourceMetric | undefined;
  for (const metric of metrics) {
    if (!best || Date.parse(metric.timestamp) > Date.parse(best.timestamp)) {
      best = metric;
    }
  }
  return best;
}

/**
 * Build the NormalizedRecord for one technology.
 */
export function normalizeTechnology(
  tech: TechnologySpec,
  metrics: readonly SourceMetric[],
  window?: CollectionWindow
): NormalizedRecord {
  const own = metrics.filter(m => m.technology === tech.name && inWindow(m, window));

  const sources: Record<SourceName, SourceMetric | null> = { github: null, npm: null, pypi: null };
  const failedSources: SourceName[] = [];

  for (const source of SOURCE_NAMES) {
    if (!isSourceConfigured(tech, source)) continue;

    const metric = latest(own.filter(m => m.source === source));
    if (metric?.fetchSucceeded) {
      sources[source] = metric;
    } else {
      failedSources.push(source);
    }
  }

  return {
    technology: tech.name,
    sources,
    sourcesPresent: SOURCE_NAMES.filter(s => sources[s] !== null).length,
    failedSources,
  };
}

/**
 * Normalize every technology. Output order follows the input technologies.
 */
export function normalizeAll(
  technologies: readonly TechnologySpec[],
  metrics: readonly SourceMetric[],
  window?: CollectionWindow
): NormalizedRecord[] {
  return technologies.map(tech => normalizeTechnology(tech, metrics, window));
}
