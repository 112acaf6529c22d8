/**
 * Shared test fixtures
 */

import type {
  NormalizedRecord,
  RunSnapshot,
  SourceMetric,
  SourceName,
  TechnologyList,
  TechnologySpec,
} from '../../src/types';
import type { CollectorSettings, Settings } from '../../src/lib/config';
import { DEFAULT_SCORING_POLICY, DEFAULT_VELOCITY_POLICY } from '../../src/lib/config';

export const T0 = '2026-03-01T00:00:00.000Z';

export function daysAfter(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * 24 * 60 * 60 * 1000).toISOString();
}

export function createTech(overrides: Partial<TechnologySpec> = {}): TechnologySpec {
  return {
    name: 'example',
    displayName: 'Example',
    category: 'ai_platform',
    listMembership: 'enterprise',
    ...overrides,
  };
}

export function createMetric(
  source: SourceName,
  technology: string,
  primaryCount: number,
  overrides: Partial<SourceMetric> = {}
): SourceMetric {
  return {
    source,
    technology,
    timestamp: T0,
    primaryCount,
    fetchSucceeded: true,
    ...overrides,
  };
}

export function createFailedMetric(source: SourceName, technology: string, timestamp = T0): SourceMetric {
  return {
    source,
    technology,
    timestamp,
    primaryCount: 0,
    fetchSucceeded: false,
    error: 'HTTP 503',
  };
}

/**
 * A record with the given successful counts; other sources absent.
 */
export function createRecord(
  technology: string,
  counts: Partial<Record<SourceName, number>>
): NormalizedRecord {
  const sources: Record<SourceName, SourceMetric | null> = { github: null, npm: null, pypi: null };
  for (const source of ['github', 'npm', 'pypi'] as const) {
    const count = counts[source];
    if (count !== undefined) {
      sources[source] = createMetric(source, technology, count);
    }
  }
  return {
    technology,
    sources,
    sourcesPresent: Object.values(sources).filter(m => m !== null).length,
    failedSources: [],
  };
}

export function createSnapshot(
  runId: string,
  collectedAt: string,
  metrics: Array<{ source: SourceName; technology: string; count: number; ok?: boolean }>
): RunSnapshot {
  return {
    runId,
    collectedAt,
    metrics: metrics.map(m =>
      m.ok === false
        ? createFailedMetric(m.source, m.technology, collectedAt)
        : createMetric(m.source, m.technology, m.count, { timestamp: collectedAt })
    ),
    records: [],
  };
}

export function createCollectorSettings(overrides: Partial<CollectorSettings> = {}): CollectorSettings {
  return {
    requestTimeoutMs: 1000,
    concurrency: { github: 2, npm: 2, pypi: 2 },
    githubRateLimitReserve: 50,
    pypiMaxRetries: 2,
    ...overrides,
  };
}

export function createSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    collectors: createCollectorSettings(),
    scoring: { ...DEFAULT_SCORING_POLICY },
    velocity: { ...DEFAULT_VELOCITY_POLICY },
    topN: 5,
    dataDir: 'data',
    reportsDir: 'reports',
    snapshotStore: 'file',
    ...overrides,
  };
}

export function createList(id: 'enterprise' | 'fintech', technologies: TechnologySpec[]): TechnologyList {
  return {
    id,
    name: id === 'enterprise' ? 'Enterprise AI' : 'Fintech',
    description: `${id} technologies`,
    focus: 'test',
    technologies: technologies.map(t => ({ ...t, listMembership: id })),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
