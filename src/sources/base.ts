/**
 * Adoption Radar: Metric Source Base
 *
 * Abstract base class for the three collectors.
 * Each source implements fetchCounts(); the base class turns every
 * outcome into exactly one SourceMetric. A collector never throws:
 * failures become fetchSucceeded = false.
 */

import pLimit from 'p-limit';
import type { SourceMetric, SourceName, TechnologySpec } from '../types';
import type { CollectorSettings } from '../lib/config';
import { logger as rootLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';

export interface SourceCounts {
  primaryCount: number;
  secondaryCount?: number;
}

export interface CollectContext {
  /** Timestamp shared by every metric of the run */
  timestamp: string;
  /** Run-level abort flag */
  signal?: AbortSignal;
}

/**
 * Abstract base class for metric sources.
 */
export abstract class MetricSource {
  abstract readonly name: SourceName;

  protected readonly logger: Logger;

  constructor(protected readonly settings: CollectorSettings) {
    this.logger = rootLogger.child({ source: this.constructor.name });
  }

  /**
   * The identifier this source needs, or undefined when the
   * technology is not published on this source.
   */
  abstract identifierFor(tech: TechnologySpec): string | undefined;

  /**
   * Fetch raw counts for one identifier.
   * Must throw on any failure.
   *
   * `signal` carries the request timeout and the run abort. A source
   * that issues further requests (retries) takes a fresh one per
   * request from requestSignal(runSignal).
   */
  protected abstract fetchCounts(
    identifier: string,
    tech: TechnologySpec,
    signal: AbortSignal,
    runSignal?: AbortSignal
  ): Promise<SourceCounts>;

  protected abstract concurrency(): number;

  isConfigured(tech: TechnologySpec): boolean {
    return this.identifierFor(tech) !== undefined;
  }

  /**
   * Per-request signal: request timeout combined with the run-level abort.
   */
  protected requestSignal(runSignal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.settings.requestTimeoutMs);
    return runSignal ? AbortSignal.any([runSignal, timeout]) : timeout;
  }

  /**
   * Collect one metric with error handling and logging.
   * Returns null when the technology has no identifier for this source.
   */
  async collect(tech: TechnologySpec, context: CollectContext): Promise<SourceMetric | null> {
    const identifier = this.identifierFor(tech);
    if (identifier === undefined) return null;

    if (context.signal?.aborted) {
      return this.failed(tech, context, 'run aborted');
    }

    const startTime = Date.now();

    try {
      const counts = await this.fetchCounts(identifier, tech, this.requestSignal(context.signal), context.signal);

      this.logger.debug('Fetch completed', {
        technology: tech.name,
        identifier,
        primaryCount: counts.primaryCount,
        durationMs: Date.now() - startTime,
      });

      return {
        source: this.name,
        technology: tech.name,
        timestamp: context.timestamp,
        primaryCount: counts.primaryCount,
        secondaryCount: counts.secondaryCount,
        fetchSucceeded: true,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Fetch failed', { technology: tech.name, identifier, error: message });
      return this.failed(tech, context, message);
    }
  }

  /**
   * Collect metrics for every configured technology, bounded by this
   * source's concurrency limit.
   */
  async collectAll(
    technologies: readonly TechnologySpec[],
    context: CollectContext
  ): Promise<SourceMetric[]> {
    const limit = pLimit(this.concurrency());
    const configured = technologies.filter(tech => this.isConfigured(tech));

    this.logger.info('Starting collection', {
      configured: configured.length,
      skipped: technologies.length - configured.length,
    });

    const results = await Promise.all(
      configured.map(tech => limit(() => this.collect(tech, context)))
    );

    const metrics = results.filter((m): m is SourceMetric => m !== null);
    const succeeded = metrics.filter(m => m.fetchSucceeded).length;

    this.logger.info('Collection completed', {
      succeeded,
      failed: metrics.length - succeeded,
    });

    return metrics;
  }

  private failed(tech: TechnologySpec, context: CollectContext, error: string): SourceMetric {
    return {
      source: this.name,
      technology: tech.name,
      timestamp: context.timestamp,
      primaryCount: 0,
      fetchSucceeded: false,
      error,
    };
  }
}
