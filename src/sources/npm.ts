/**
 * Adoption Radar: npm Downloads Source
 *
 * Reads download counts from the npm downloads API.
 *   primaryCount   downloads in the last month
 *   secondaryCount downloads in the last week
 */

import { z } from 'zod';
import { MetricSource } from './base';
import type { SourceCounts } from './base';
import { fetchJson } from './http';
import type { SourceName, TechnologySpec } from '../types';
import { errorMessage } from '../lib/errors';

const NPM_DOWNLOADS = 'https://api.npmjs.org/downloads';

const NpmPointSchema = z.object({
  downloads: z.number().int().nonnegative(),
  start: z.string(),
  end: z.string(),
  package: z.string(),
});

type NpmPeriod = 'last-week' | 'last-month';

export class NpmSource extends MetricSource {
  readonly name: SourceName = 'npm';

  identifierFor(tech: TechnologySpec): string | undefined {
    return tech.npmPackage;
  }

  protected concurrency(): number {
    return this.settings.concurrency.npm;
  }

  protected async fetchCounts(packageName: string, tech: TechnologySpec, signal: AbortSignal): Promise<SourceCounts> {
    const monthly = await this.fetchPoint(packageName, 'last-month', signal);

    // Weekly is supplementary: losing it does not fail the observation
    let weekly: number | undefined;
    try {
      weekly = await this.fetchPoint(packageName, 'last-week', signal);
    } catch (error) {
      this.logger.warn('Weekly downloads unavailable', {
        technology: tech.name,
        error: errorMessage(error),
      });
    }

    return { primaryCount: monthly, secondaryCount: weekly };
  }

  private async fetchPoint(packageName: string, period: NpmPeriod, signal: AbortSignal): Promise<number> {
    const url = `${NPM_DOWNLOADS}/point/${period}/${packageName}`;
    const data = await fetchJson(url, NpmPointSchema, signal);
    return data.downloads;
  }
}
