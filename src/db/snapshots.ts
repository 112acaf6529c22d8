/**
 * Adoption Radar: Snapshot Store
 *
 * Run snapshots are the only history the velocity layer sees.
 * Snapshots are append-only. Saving the same snapshot again overwrites
 * its own entry and never merges into another run.
 *
 * Backends:
 * - FileSnapshotStore      one JSON file per run under DATA_DIR/snapshots
 * - SupabaseSnapshotStore  run_snapshots table
 * - MemorySnapshotStore    in-process, for tests and dry runs
 */

import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { RunSnapshotSchema } from '../types';
import type { RunSnapshot } from '../types';
import type { Settings } from '../lib/config';
import { RunAbortError, errorMessage } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { createAdminClient, handleSupabaseError } from './client';
import type { RunSnapshotRow } from './client';

const log = createLogger({ component: 'snapshots' });

export interface ListSnapshotsOptions {
  /** Only snapshots collected at or after this ISO timestamp */
  since?: string;
}

export interface SnapshotStore {
  save(snapshot: RunSnapshot): Promise<void>;
  /** Stored snapshots ordered by collectedAt, oldest first */
  list(options?: ListSnapshotsOptions): Promise<RunSnapshot[]>;
}

function byCollectedAt(a: RunSnapshot, b: RunSnapshot): number {
  return Date.parse(a.collectedAt) - Date.parse(b.collectedAt);
}

function isSince(snapshot: RunSnapshot, since?: string): boolean {
  return since === undefined || Date.parse(snapshot.collectedAt) >= Date.parse(since);
}

// ============================================================
// MEMORY
// ============================================================

export class MemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, RunSnapshot>();

  constructor(initial: readonly RunSnapshot[] = []) {
    for (const snapshot of initial) {
      this.snapshots.set(snapshot.runId, snapshot);
    }
  }

  async save(snapshot: RunSnapshot): Promise<void> {
    this.snapshots.set(snapshot.runId, snapshot);
  }

  async list(options: ListSnapshotsOptions = {}): Promise<RunSnapshot[]> {
    return [...this.snapshots.values()].filter(s => isSince(s, options.since)).sort(byCollectedAt);
  }
}

// ============================================================
// FILE
// ============================================================

/**
 * File name for a snapshot. Sorts chronologically.
 */
export function snapshotFileName(snapshot: RunSnapshot): string {
  const stamp = snapshot.collectedAt.replace(/[:.]/g, '-');
  return `${stamp}_${snapshot.runId}.json`;
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly directory: string) {}

  async save(snapshot: RunSnapshot): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, snapshotFileName(snapshot));
    await writeFile(path, JSON.stringify(snapshot, null, 2), 'utf-8');
    log.info('Snapshot saved', { runId: snapshot.runId, path });
  }

  async list(options: ListSnapshotsOptions = {}): Promise<RunSnapshot[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingDirectory(error)) return [];
      throw error;
    }

    const snapshots: RunSnapshot[] = [];
    for (const entry of entries.filter(e => e.endsWith('.json')).sort()) {
      const snapshot = await this.readSnapshot(join(this.directory, entry));
      if (snapshot && isSince(snapshot, options.since)) {
        snapshots.push(snapshot);
      }
    }

    return snapshots.sort(byCollectedAt);
  }

  private async readSnapshot(path: string): Promise<RunSnapshot | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      log.warn('Skipping unreadable snapshot', { path, error: errorMessage(error) });
      return null;
    }

    const parsed = RunSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Skipping invalid snapshot', { path, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================
// SUPABASE
// ============================================================

const SNAPSHOT_TABLE = 'run_snapshots';

const RunSnapshotRowSchema = z.object({
  run_id: z.string(),
  collected_at: z.string(),
  metrics: z.unknown(),
  records: z.unknown(),
});

export function snapshotToRow(snapshot: RunSnapshot): RunSnapshotRow {
  return {
    run_id: snapshot.runId,
    collected_at: snapshot.collectedAt,
    metrics: snapshot.metrics,
    records: snapshot.records,
  };
}

export function rowToSnapshot(row: unknown): RunSnapshot | null {
  const parsedRow = RunSnapshotRowSchema.safeParse(row);
  if (!parsedRow.success) return null;

  const parsed = RunSnapshotSchema.safeParse({
    runId: parsedRow.data.run_id,
    collectedAt: parsedRow.data.collected_at,
    metrics: parsedRow.data.metrics,
    records: parsedRow.data.records,
  });
  return parsed.success ? parsed.data : null;
}

export class SupabaseSnapshotStore implements SnapshotStore {
  constructor(private readonly client: SupabaseClient) {}

  async save(snapshot: RunSnapshot): Promise<void> {
    const { error } = await this.client
      .from(SNAPSHOT_TABLE)
      .upsert(snapshotToRow(snapshot), { onConflict: 'run_id' });

    if (error) throw handleSupabaseError(error);
    log.info('Snapshot saved', { runId: snapshot.runId, table: SNAPSHOT_TABLE });
  }

  async list(options: ListSnapshotsOptions = {}): Promise<RunSnapshot[]> {
    let query = this.client
      .from(SNAPSHOT_TABLE)
      .select('run_id, collected_at, metrics, records')
      .order('collected_at', { ascending: true });

    if (options.since) {
      query = query.gte('collected_at', options.since);
    }

    const { data, error } = await query;
    if (error) throw handleSupabaseError(error);

    const rows: unknown[] = data ?? [];
    const snapshots: RunSnapshot[] = [];

    for (const row of rows) {
      const snapshot = rowToSnapshot(row);
      if (snapshot) {
        snapshots.push(snapshot);
      } else {
        log.warn('Skipping invalid snapshot row');
      }
    }

    return snapshots.sort(byCollectedAt);
  }
}

// ============================================================
// FACTORY
// ============================================================

export function createSnapshotStore(settings: Settings): SnapshotStore {
  if (settings.snapshotStore === 'supabase') {
    if (!settings.supabase) {
      throw new RunAbortError('supabase snapshot store selected without credentials');
    }
    return new SupabaseSnapshotStore(createAdminClient(settings.supabase));
  }
  return new FileSnapshotStore(join(settings.dataDir, 'snapshots'));
}
