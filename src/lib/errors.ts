/**
 * Adoption Radar: Error Classes
 *
 * Only RunAbortError is allowed to escape a pipeline run.
 * SourceUnavailableError is raised inside collectors and converted
 * into a failed SourceMetric by the collector base class.
 */

import type { SourceName } from '../types';

/**
 * A single source could not be read for a single technology
 * (HTTP error, timeout, abort, rate-limit deferral).
 */
export class SourceUnavailableError extends Error {
  public readonly source: SourceName;
  public readonly technology: string;
  public readonly status?: number;

  constructor(source: SourceName, technology: string, reason: string, status?: number) {
    super(`${source} unavailable for ${technology}: ${reason}`);
    this.name = 'SourceUnavailableError';
    this.source = source;
    this.technology = technology;
    this.status = status;
  }
}

/**
 * Catastrophic failure. The run cannot proceed at all
 * (e.g. the technology catalog cannot be loaded).
 */
export class RunAbortError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Run aborted: ${message}`, options);
    this.name = 'RunAbortError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
