/**
 * Adoption Radar: Pipeline
 *
 * collect → normalize → score → persist snapshot → load history
 *   → velocity → list insights → comparison → reports
 *
 * Everything the run needs arrives through PipelineConfig and
 * PipelineDeps. Partial collection is a valid outcome; only
 * RunAbortError escapes.
 */

import { nanoid } from 'nanoid';
import type {
  ComparativeInsights,
  ListInsights,
  NormalizedRecord,
  RunSnapshot,
  ScoredRecord,
  SourceMetric,
  TechnologyList,
  TechnologyVelocity,
} from './types';
import { SOURCE_NAMES } from './types';
import type { PipelineConfig } from './lib/config';
import { allTechnologies } from './lib/config';
import { RunAbortError, errorMessage } from './lib/errors';
import { createLogger, timeOperation } from './lib/logger';
import { collectMetrics, createSources } from './sources';
import type { MetricSource } from './sources';
import type { SnapshotStore } from './db/snapshots';
import { isSourceConfigured, normalizeAll } from './analysis/normalizer';
import { scoreRecords } from './analysis/confidence';
import { computeTechnologyVelocity } from './analysis/velocity';
import { buildListInsights } from './analysis/insights';
import { compareLists } from './analysis/comparative';
import { buildComparativeReport, buildListReport } from './delivery/report';
import type { Report } from './delivery/report';

const log = createLogger({ component: 'pipeline' });

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================
// TYPES
// ============================================================

export interface PipelineDeps {
  store: SnapshotStore;
  /** Defaults to the GitHub, npm and PyPI collectors */
  sources?: readonly MetricSource[];
  now?: () => Date;
  runId?: string;
  signal?: AbortSignal;
}

export interface PipelineOptions {
  /** Do not persist the snapshot */
  dryRun?: boolean;
  skipReports?: boolean;
}

export interface PipelineResult {
  runId: string;
  collectedAt: string;
  metrics: SourceMetric[];
  normalized: NormalizedRecord[];
  records: ScoredRecord[];
  snapshot: RunSnapshot;
  persisted: boolean;
  historySize: number;
  velocities: Map<string, TechnologyVelocity>;
  listInsights: ListInsights[];
  comparison: ComparativeInsights | null;
  reports: Report[];
}

// ============================================================
// STAGES
// ============================================================

function selectLists(config: PipelineConfig): TechnologyList[] {
  if (!config.onlyList) return config.lists;

  const selected = config.lists.filter(list => list.id === config.onlyList);
  if (selected.length === 0) {
    throw new RunAbortError(`list "${config.onlyList}" is not in the technology catalog`);
  }
  return selected;
}

async function persistSnapshot(store: SnapshotStore, snapshot: RunSnapshot): Promise<boolean> {
  try {
    await store.save(snapshot);
    return true;
  } catch (error) {
    log.error('Snapshot could not be saved', { runId: snapshot.runId, error: errorMessage(error) });
    return false;
  }
}

/**
 * History inside the lookback window. The current snapshot is always
 * part of it, stored or not.
 */
async function loadHistory(
  store: SnapshotStore,
  current: RunSnapshot,
  lookbackDays: number
): Promise<RunSnapshot[]> {
  const since = new Date(Date.parse(current.collectedAt) - lookbackDays * DAY_MS).toISOString();

  let stored: RunSnapshot[];
  try {
    stored = await store.list({ since });
  } catch (error) {
    log.warn('Snapshot history unavailable', { error: errorMessage(error) });
    stored = [];
  }

  return [...stored.filter(s => s.runId !== current.runId), current];
}

// ============================================================
// RUN
// ============================================================

export async function runPipeline(
  config: PipelineConfig,
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { settings } = config;
  const lists = selectLists(config);
  const technologies = allTechnologies(lists);

  const runId = deps.runId ?? nanoid();
  const collectedAt = (deps.now ?? (() => new Date()))().toISOString();
  const sources = deps.sources ?? createSources(settings.collectors);

  log.info('Run started', {
    runId,
    lists: lists.map(l => l.id),
    technologies: technologies.length,
    dryRun: options.dryRun ?? false,
  });

  // Collect
  const metrics = await timeOperation('collection', () =>
    collectMetrics(sources, technologies, { timestamp: collectedAt, signal: deps.signal })
  );

  // Normalize + score
  const normalized = normalizeAll(technologies, metrics);
  const records = scoreRecords(normalized, settings.scoring);

  // Persist
  const snapshot: RunSnapshot = { runId, collectedAt, metrics, records };
  let persisted = false;
  if (options.dryRun) {
    log.info('Dry run: snapshot not saved', { runId });
  } else {
    persisted = await persistSnapshot(deps.store, snapshot);
  }

  // Velocity
  const history = await loadHistory(deps.store, snapshot, settings.velocity.lookbackDays);
  const velocities = new Map<string, TechnologyVelocity>();
  for (const tech of technologies) {
    const configured = SOURCE_NAMES.filter(source => isSourceConfigured(tech, source));
    velocities.set(tech.name, computeTechnologyVelocity(tech.name, configured, history, settings.velocity));
  }

  // Insights
  const listInsights = lists.map(list => buildListInsights(list, records, velocities, settings.topN));

  let comparison: ComparativeInsights | null = null;
  if (lists.length === 2) {
    comparison = compareLists(
      { list: lists[0], insights: listInsights[0] },
      { list: lists[1], insights: listInsights[1] }
    );
  }

  // Reports
  const reports: Report[] = [];
  if (!options.skipReports) {
    const context = { runId, generatedAt: collectedAt };
    lists.forEach((list, i) => reports.push(buildListReport(list, listInsights[i], context)));
    if (comparison) {
      reports.push(buildComparativeReport(comparison, lists, context));
    }
  }

  log.info('Run completed', {
    runId,
    metrics: metrics.length,
    failed: metrics.filter(m => !m.fetchSucceeded).length,
    persisted,
    historySize: history.length,
    reports: reports.length,
  });

  return {
    runId,
    collectedAt,
    metrics,
    normalized,
    records,
    snapshot,
    persisted,
    historySize: history.length,
    velocities,
    listInsights,
    comparison,
    reports,
  };
}
