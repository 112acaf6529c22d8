/**
 * Adoption Radar: PyPI Downloads Source
 *
 * Reads recent download counts from pypistats.org.
 *   primaryCount   downloads in the last month
 *   secondaryCount downloads in the last week
 *
 * pypistats rate limits aggressively; HTTP 429 is retried with
 * exponential backoff (1s, 2s, 4s ...). Any other error fails at once.
 * Every attempt gets its own request timeout; backoff sleeps only
 * listen to the run abort.
 */

import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { MetricSource } from './base';
import type { SourceCounts } from './base';
import { fetchJson, HttpStatusError } from './http';
import type { SourceName, TechnologySpec } from '../types';
import type { CollectorSettings } from '../lib/config';

const PYPISTATS_API = 'https://pypistats.org/api';

const PypiRecentSchema = z.object({
  data: z.object({
    last_day: z.number().int().nonnegative(),
    last_week: z.number().int().nonnegative(),
    last_month: z.number().int().nonnegative(),
  }),
  package: z.string(),
  type: z.string(),
});

export class PypiSource extends MetricSource {
  readonly name: SourceName = 'pypi';

  private readonly retryBaseDelayMs: number;

  constructor(settings: CollectorSettings, options: { retryBaseDelayMs?: number } = {}) {
    super(settings);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  identifierFor(tech: TechnologySpec): string | undefined {
    return tech.pypiPackage;
  }

  protected concurrency(): number {
    return this.settings.concurrency.pypi;
  }

  protected async fetchCounts(
    packageName: string,
    tech: TechnologySpec,
    signal: AbortSignal,
    runSignal?: AbortSignal
  ): Promise<SourceCounts> {
    const url = `${PYPISTATS_API}/packages/${packageName.toLowerCase()}/recent`;
    const maxRetries = this.settings.pypiMaxRetries;

    for (let attempt = 0; ; attempt++) {
      const attemptSignal = attempt === 0 ? signal : this.requestSignal(runSignal);
      try {
        const { data } = await fetchJson(url, PypiRecentSchema, attemptSignal);
        return { primaryCount: data.last_month, secondaryCount: data.last_week };
      } catch (error) {
        const rateLimited = error instanceof HttpStatusError && error.status === 429;
        if (!rateLimited || attempt >= maxRetries) throw error;

        const waitMs = this.retryBaseDelayMs * 2 ** attempt;
        this.logger.warn('Rate limited, backing off', {
          technology: tech.name,
          attempt: attempt + 1,
          waitMs,
        });
        await sleep(waitMs, undefined, { signal: runSignal });
      }
    }
  }
}
