/**
 * Tests for the GitHub Repository Source
 */

import { describe, it, expect, vi } from 'vitest';
import { GitHubSource, isQuotaExhausted } from '../../src/sources/github';
import type { GitHubRepoClient, RepoStats } from '../../src/sources/github';
import { T0, createCollectorSettings, createTech } from '../helpers/fixtures';

const techA = createTech({ name: 'a', githubRepo: 'acme/a' });
const techB = createTech({ name: 'b', githubRepo: 'acme/b' });

function fakeClient(impl: (owner: string, repo: string) => Promise<RepoStats>) {
  const getRepo = vi.fn(async (owner: string, repo: string, _signal: AbortSignal) => impl(owner, repo));
  const client: GitHubRepoClient = { getRepo };
  return { client, getRepo };
}

const sequential = createCollectorSettings({
  githubToken: 'test-token',
  concurrency: { github: 1, npm: 1, pypi: 1 },
});

describe('GitHubSource', () => {
  it('should record stars as primary and forks as secondary', async () => {
    const { client, getRepo } = fakeClient(async () => ({ stars: 90000, forks: 15000, rateLimitRemaining: 4999 }));

    const metric = await new GitHubSource(sequential, client).collect(techA, { timestamp: T0 });

    expect(metric).toEqual({
      source: 'github',
      technology: 'a',
      timestamp: T0,
      primaryCount: 90000,
      secondaryCount: 15000,
      fetchSucceeded: true,
    });
    expect(getRepo).toHaveBeenCalledWith('acme', 'a', expect.any(AbortSignal));
  });

  it('should defer remaining calls once the reserve is reached', async () => {
    const { client, getRepo } = fakeClient(async () => ({ stars: 10, forks: 1, rateLimitRemaining: 50 }));
    const source = new GitHubSource(sequential, client);

    const metrics = await source.collectAll([techA, techB], { timestamp: T0 });

    expect(getRepo).toHaveBeenCalledTimes(1);
    expect(source.isDeferring()).toBe(true);
    expect(metrics.map(m => m.fetchSucceeded)).toEqual([true, false]);
    expect(metrics[1].error).toBe('github unavailable for b: deferred: rate limit reserve reached (50 remaining)');
  });

  it('should stop calling once a 403 reports the quota exhausted', async () => {
    const { client, getRepo } = fakeClient(async () => {
      throw Object.assign(new Error('API rate limit exceeded'), {
        status: 403,
        response: { headers: { 'x-ratelimit-remaining': '0' } },
      });
    });
    const source = new GitHubSource(sequential, client);

    const metrics = await source.collectAll([techA, techB], { timestamp: T0 });

    expect(getRepo).toHaveBeenCalledTimes(1);
    expect(metrics[0].error).toBe('github unavailable for a: HTTP 403');
    expect(metrics[1].error).toBe('github unavailable for b: deferred: rate limit reserve reached (0 remaining)');
  });

  it('should stop calling after a 429', async () => {
    const { client, getRepo } = fakeClient(async () => {
      throw Object.assign(new Error('Too Many Requests'), { status: 429 });
    });
    const source = new GitHubSource(sequential, client);

    await source.collectAll([techA, techB], { timestamp: T0 });

    expect(getRepo).toHaveBeenCalledTimes(1);
    expect(source.isDeferring()).toBe(true);
  });

  it('should fail only the blocked repository on an unrelated 403', async () => {
    const techC = createTech({ name: 'c', githubRepo: 'acme/c' });
    const { client, getRepo } = fakeClient(async (_owner, repo) => {
      if (repo === 'a') {
        throw Object.assign(new Error('Repository access blocked'), {
          status: 403,
          response: { headers: { 'x-ratelimit-remaining': '4000' } },
        });
      }
      return { stars: 12, forks: 3, rateLimitRemaining: 3999 };
    });
    const source = new GitHubSource(sequential, client);

    const metrics = await source.collectAll([techA, techB, techC], { timestamp: T0 });

    expect(getRepo).toHaveBeenCalledTimes(3);
    expect(source.isDeferring()).toBe(false);
    expect(metrics.map(m => [m.technology, m.fetchSucceeded])).toEqual([
      ['a', false],
      ['b', true],
      ['c', true],
    ]);
    expect(metrics[0].error).toBe('github unavailable for a: HTTP 403');
  });

  describe('isQuotaExhausted', () => {
    it('should read the quota from the error response', () => {
      expect(isQuotaExhausted(403, { response: { headers: { 'x-ratelimit-remaining': '0' } } })).toBe(true);
      expect(isQuotaExhausted(403, { response: { headers: { 'retry-after': '60' } } })).toBe(true);
      expect(isQuotaExhausted(403, { response: { headers: {} } })).toBe(false);
      expect(isQuotaExhausted(403, new Error('Forbidden'))).toBe(false);
      expect(isQuotaExhausted(429, undefined)).toBe(true);
      expect(isQuotaExhausted(404, undefined)).toBe(false);
    });
  });

  it('should keep going after a 404', async () => {
    const { client } = fakeClient(async (_owner, repo) => {
      if (repo === 'a') throw Object.assign(new Error('Not Found'), { status: 404 });
      return { stars: 7, forks: 0 };
    });

    const metrics = await new GitHubSource(sequential, client).collectAll([techA, techB], { timestamp: T0 });

    expect(metrics.map(m => [m.technology, m.fetchSucceeded, m.primaryCount])).toEqual([
      ['a', false, 0],
      ['b', true, 7],
    ]);
  });
});
