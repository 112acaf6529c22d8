/**
 * Adoption Radar: HTTP helpers for the registry sources
 */

import type { z } from 'zod';

export class HttpStatusError extends Error {
  constructor(public readonly status: number, url: string) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * GET a JSON document and validate it against a schema.
 */
export async function fetchJson<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  signal: AbortSignal
): Promise<z.infer<T>> {
  const res = await fetch(url, {
    headers: {
      Accept: 'application/json',
      'User-Agent': 'AdoptionRadar/1.0',
    },
    signal,
  });

  if (!res.ok) {
    throw new HttpStatusError(res.status, url);
  }

  const body: unknown = await res.json();
  return schema.parse(body);
}
