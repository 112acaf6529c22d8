/**
 * Adoption Radar: Configuration
 *
 * Two inputs:
 * - environment settings (timeouts, concurrency, thresholds, storage)
 * - the technology catalog (config/technologies.json)
 *
 * Both are validated with zod and combined into a PipelineConfig value
 * that is passed explicitly into the pipeline.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TechnologyCatalogSchema } from '../types';
import type { ListId, TechnologyList, TechnologySpec } from '../types';
import { RunAbortError, errorMessage } from './errors';
import { logger } from './logger';

// ============================================================
// ENVIRONMENT SETTINGS
// ============================================================

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().min(1).optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GITHUB_CONCURRENCY: z.coerce.number().int().positive().default(4),
  NPM_CONCURRENCY: z.coerce.number().int().positive().default(8),
  PYPI_CONCURRENCY: z.coerce.number().int().positive().default(2),
  GITHUB_RATE_LIMIT_RESERVE: z.coerce.number().int().min(0).default(50),
  PYPI_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  HYPE_THRESHOLD: z.coerce.number().positive().default(10),
  MINOR_DIVERGENCE_THRESHOLD: z.coerce.number().positive().default(2),
  VELOCITY_LOOKBACK_DAYS: z.coerce.number().positive().default(30),
  TOP_N_INSIGHTS: z.coerce.number().int().positive().default(5),
  DATA_DIR: z.string().min(1).default('data'),
  REPORTS_DIR: z.string().min(1).default('reports'),
  SNAPSHOT_STORE: z.enum(['file', 'supabase']).default('file'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
});

export interface ScoringPolicy {
  /** Download ratio at or above which a technology is flagged as hype */
  hypeThreshold: number;
  /** Download ratio at or above which HIGH confidence drops to MEDIUM */
  minorThreshold: number;
  /** Stars percentile that counts as top tier */
  visibilityTopPercentile: number;
  /** Downloads percentile that counts as bottom tier */
  productionBottomPercentile: number;
  /** Minimum cohort size before rank-based checks run */
  minVisibilityCohort: number;
}

export interface VelocityPolicy {
  lookbackDays: number;
  /** |monthly growth rate| above this is an anomaly */
  spikeThreshold: number;
}

export interface CollectorSettings {
  githubToken?: string;
  requestTimeoutMs: number;
  concurrency: { github: number; npm: number; pypi: number };
  githubRateLimitReserve: number;
  pypiMaxRetries: number;
}

export interface Settings {
  collectors: CollectorSettings;
  scoring: ScoringPolicy;
  velocity: VelocityPolicy;
  topN: number;
  dataDir: string;
  reportsDir: string;
  snapshotStore: 'file' | 'supabase';
  supabase?: { url: string; serviceRoleKey: string };
}

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  hypeThreshold: 10,
  minorThreshold: 2,
  visibilityTopPercentile: 0.75,
  productionBottomPercentile: 0.25,
  minVisibilityCohort: 4,
};

export const DEFAULT_VELOCITY_POLICY: VelocityPolicy = {
  lookbackDays: 30,
  spikeThreshold: 5.0,
};

/**
 * Parse settings from an environment map.
 * Throws RunAbortError when a value is present but invalid.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new RunAbortError(`invalid environment settings (${issues})`);
  }

  const e = parsed.data;

  if (e.MINOR_DIVERGENCE_THRESHOLD > e.HYPE_THRESHOLD) {
    throw new RunAbortError('MINOR_DIVERGENCE_THRESHOLD must not exceed HYPE_THRESHOLD');
  }

  if (e.SNAPSHOT_STORE === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new RunAbortError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase snapshot store');
  }

  return {
    collectors: {
      githubToken: e.GITHUB_TOKEN,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
      concurrency: {
        github: e.GITHUB_CONCURRENCY,
        npm: e.NPM_CONCURRENCY,
        pypi: e.PYPI_CONCURRENCY,
      },
      githubRateLimitReserve: e.GITHUB_RATE_LIMIT_RESERVE,
      pypiMaxRetries: e.PYPI_MAX_RETRIES,
    },
    scoring: {
      ...DEFAULT_SCORING_POLICY,
      hypeThreshold: e.HYPE_THRESHOLD,
      minorThreshold: e.MINOR_DIVERGENCE_THRESHOLD,
    },
    velocity: {
      ...DEFAULT_VELOCITY_POLICY,
      lookbackDays: e.VELOCITY_LOOKBACK_DAYS,
    },
    topN: e.TOP_N_INSIGHTS,
    dataDir: e.DATA_DIR,
    reportsDir: e.REPORTS_DIR,
    snapshotStore: e.SNAPSHOT_STORE,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
  };
}

// ============================================================
// TECHNOLOGY CATALOG
// ============================================================

/**
 * Validate a parsed catalog document and attach list membership
 * to every technology.
 */
export function parseCatalog(raw: unknown): TechnologyList[] {
  const parsed = TechnologyCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RunAbortError(`invalid technology catalog (${issues})`);
  }

  return parsed.data.lists.map(list => ({
    id: list.id,
    name: list.name,
    description: list.description,
    focus: list.focus,
    technologies: list.technologies.map(tech => Object.freeze({ ...tech, listMembership: list.id })),
  }));
}

/**
 * Load the technology catalog from disk.
 * Any failure is fatal for the run.
 */
export async function loadCatalog(path: string): Promise<TechnologyList[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new RunAbortError(`cannot read technology catalog at ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new RunAbortError(`technology catalog at ${path} is not valid JSON`, { cause: error });
  }

  const lists = parseCatalog(raw);
  logger.info('Technology catalog loaded', {
    path,
    lists: lists.map(l => `${l.id}:${l.technologies.length}`),
  });
  return lists;
}

// ============================================================
// PIPELINE CONFIG
// ============================================================

export interface PipelineConfig {
  settings: Settings;
  lists: TechnologyList[];
  /** Restrict the run to a single list */
  onlyList?: ListId;
}

export function allTechnologies(lists: readonly TechnologyList[]): TechnologySpec[] {
  return lists.flatMap(list => list.technologies);
}
