/**
 * Adoption Radar: GitHub Repository Source
 *
 * Reads repository visibility metrics through octokit.
 *   primaryCount   stargazers
 *   secondaryCount forks
 *
 * RATE LIMIT:
 * The authenticated quota is 5000 requests/hour. The remaining quota is
 * read from every response; once it drops to the configured reserve the
 * remaining calls of the run are deferred (recorded as failed) instead
 * of being issued. Completed observations are never discarded.
 */

import { Octokit } from 'octokit';
import { MetricSource } from './base';
import type { SourceCounts } from './base';
import type { SourceName, TechnologySpec } from '../types';
import type { CollectorSettings } from '../lib/config';
import { SourceUnavailableError } from '../lib/errors';

// ============================================================
// CLIENT
// ============================================================

export interface RepoStats {
  stars: number;
  forks: number;
  /** x-ratelimit-remaining, when the response carried it */
  rateLimitRemaining?: number;
}

/**
 * The slice of the GitHub API this source needs.
 */
export interface GitHubRepoClient {
  getRepo(owner: string, repo: string, signal: AbortSignal): Promise<RepoStats>;
}

function parseRemaining(header: string | number | undefined): number | undefined {
  if (header === undefined) return undefined;
  const value = typeof header === 'number' ? header : parseInt(header, 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Octokit-backed client. Octokit's own rate-limit retries are disabled:
 * deferral is decided by the source, not by waiting inside a request.
 */
export function createOctokitClient(token?: string): GitHubRepoClient {
  const octokit = new Octokit({
    auth: token,
    userAgent: 'AdoptionRadar/1.0',
    throttle: {
      onRateLimit: () => false,
      onSecondaryRateLimit: () => false,
    },
    retry: { enabled: false },
  });

  return {
    async getRepo(owner, repo, signal) {
      const response = await octokit.rest.repos.get({ owner, repo, request: { signal } });
      return {
        stars: response.data.stargazers_count,
        forks: response.data.forks_count,
        rateLimitRemaining: parseRemaining(response.headers['x-ratelimit-remaining']),
      };
    },
  };
}

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function responseHeader(error: unknown, name: string): string | undefined {
  if (!error || typeof error !== 'object' || !('response' in error)) return undefined;
  const response = error.response;
  if (!response || typeof response !== 'object' || !('headers' in response)) return undefined;
  const headers = response.headers;
  if (!headers || typeof headers !== 'object') return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

/**
 * 429, or a 403 that carries an exhausted quota or a retry-after.
 * Any other 403 (blocked repository, missing scope) is specific to one repo.
 */
export function isQuotaExhausted(status: number | undefined, error: unknown): boolean {
  if (status === 429) return true;
  if (status !== 403) return false;
  return parseRemaining(responseHeader(error, 'x-ratelimit-remaining')) === 0
    || responseHeader(error, 'retry-after') !== undefined;
}

// ============================================================
// SOURCE
// ============================================================

export class GitHubSource extends MetricSource {
  readonly name: SourceName = 'github';

  private readonly client: GitHubRepoClient;
  private rateLimitRemaining: number | null = null;

  constructor(settings: CollectorSettings, client?: GitHubRepoClient) {
    super(settings);
    if (!settings.githubToken) {
      this.logger.warn('No GITHUB_TOKEN provided; unauthenticated quota is 60 requests/hour');
    }
    this.client = client ?? createOctokitClient(settings.githubToken);
  }

  identifierFor(tech: TechnologySpec): string | undefined {
    return tech.githubRepo;
  }

  protected concurrency(): number {
    return this.settings.concurrency.github;
  }

  /** True once the remaining quota has reached the reserve */
  isDeferring(): boolean {
    return this.rateLimitRemaining !== null && this.rateLimitRemaining <= this.settings.githubRateLimitReserve;
  }

  protected async fetchCounts(repoPath: string, tech: TechnologySpec, signal: AbortSignal): Promise<SourceCounts> {
    if (this.isDeferring()) {
      throw new SourceUnavailableError(
        this.name,
        tech.name,
        `deferred: rate limit reserve reached (${this.rateLimitRemaining} remaining)`
      );
    }

    const [owner, repo] = repoPath.split('/');

    try {
      const stats = await this.client.getRepo(owner, repo, signal);
      if (stats.rateLimitRemaining !== undefined) {
        this.rateLimitRemaining = stats.rateLimitRemaining;
        this.logger.debug('GitHub rate limit remaining', { remaining: stats.rateLimitRemaining });
      }
      return { primaryCount: stats.stars, secondaryCount: stats.forks };
    } catch (error) {
      const status = statusOf(error);
      if (isQuotaExhausted(status, error)) {
        this.rateLimitRemaining = 0;
      }
      if (status !== undefined) {
        throw new SourceUnavailableError(this.name, tech.name, `HTTP ${status}`, status);
      }
      throw error;
    }
  }
}
