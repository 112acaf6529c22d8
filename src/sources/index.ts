/**
 * Adoption Radar: Sources
 *
 * Collect all three sources for a set of technologies.
 * Sources run concurrently; each bounds its own request concurrency.
 */

import type { SourceMetric, TechnologySpec } from '../types';
import type { CollectorSettings } from '../lib/config';
import type { CollectContext, MetricSource } from './base';
import { GitHubSource } from './github';
import type { GitHubRepoClient } from './github';
import { NpmSource } from './npm';
import { PypiSource } from './pypi';

export { MetricSource } from './base';
export type { CollectContext, SourceCounts } from './base';
export { GitHubSource, createOctokitClient } from './github';
export type { GitHubRepoClient, RepoStats } from './github';
export { NpmSource } from './npm';
export { PypiSource } from './pypi';

export function createSources(
  settings: CollectorSettings,
  options: { githubClient?: GitHubRepoClient } = {}
): MetricSource[] {
  return [
    new GitHubSource(settings, options.githubClient),
    new NpmSource(settings),
    new PypiSource(settings),
  ];
}

/**
 * Run every source over the technologies and return all metrics,
 * failed observations included.
 */
export async function collectMetrics(
  sources: readonly MetricSource[],
  technologies: readonly TechnologySpec[],
  context: CollectContext
): Promise<SourceMetric[]> {
  const perSource = await Promise.all(
    sources.map(source => source.collectAll(technologies, context))
  );
  return perSource.flat();
}
