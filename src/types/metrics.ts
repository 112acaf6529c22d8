/**
 * Adoption Radar: Metric Types
 *
 * SourceMetric       one observation from one source (immutable, append-only)
 * NormalizedRecord   one technology's merged view for a run
 * ScoredRecord       confidence + hype verdict for a run
 * RunSnapshot        persisted artifact of a run
 *
 * Schemas exist for everything that is read back from storage.
 */

import { z } from 'zod';

// ============================================================
// SOURCES
// ============================================================

export const SourceNameSchema = z.enum(['github', 'npm', 'pypi']);
export type SourceName = z.infer<typeof SourceNameSchema>;

export const SOURCE_NAMES: readonly SourceName[] = SourceNameSchema.options;

/** Sources whose primaryCount is a download count and can be compared raw */
export const PRODUCTION_SOURCES: readonly SourceName[] = ['npm', 'pypi'];

// ============================================================
// SOURCE METRIC
// ============================================================

export const SourceMetricSchema = z.object({
  source: SourceNameSchema,
  technology: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  primaryCount: z.number().nonnegative(),
  secondaryCount: z.number().nonnegative().optional(),
  fetchSucceeded: z.boolean(),
  error: z.string().optional(),
});
export type SourceMetric = Readonly<z.infer<typeof SourceMetricSchema>>;

// ============================================================
// NORMALIZED RECORD
// ============================================================

export interface NormalizedRecord {
  technology: string;
  sources: Record<SourceName, SourceMetric | null>;
  /** Count of sources with fetchSucceeded = true (0-3) */
  sourcesPresent: number;
  /** Configured sources whose fetch failed or produced no metric */
  failedSources: SourceName[];
}

// ============================================================
// SCORED RECORD
// ============================================================

export const ConfidenceLevelSchema = z.enum(['HIGH', 'MEDIUM', 'LOW']);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

export const DownloadDivergenceSignalSchema = z.object({
  kind: z.literal('download_divergence'),
  sources: z.tuple([SourceNameSchema, SourceNameSchema]),
  ratio: z.number(),
});

export const VisibilityGapSignalSchema = z.object({
  kind: z.literal('visibility_gap'),
  visibilitySource: SourceNameSchema,
  productionSource: SourceNameSchema,
  visibilityPercentile: z.number().min(0).max(1),
  productionPercentile: z.number().min(0).max(1),
});

export const HypeSignalSchema = z.discriminatedUnion('kind', [
  DownloadDivergenceSignalSchema,
  VisibilityGapSignalSchema,
]);
export type HypeSignal = z.infer<typeof HypeSignalSchema>;
export type DownloadDivergenceSignal = z.infer<typeof DownloadDivergenceSignalSchema>;
export type VisibilityGapSignal = z.infer<typeof VisibilityGapSignalSchema>;

export const ScoredRecordSchema = z.object({
  technology: z.string().min(1),
  confidenceLevel: ConfidenceLevelSchema,
  hypeFlag: z.boolean(),
  hypeReason: z.string().optional(),
  divergenceRatio: z.number().nullable(),
  sourcesPresent: z.number().int().min(0).max(3),
  hypeSignals: z.array(HypeSignalSchema),
  /** False when nothing was observed; kept for audit, excluded from ranking */
  rankable: z.boolean(),
});
export type ScoredRecord = z.infer<typeof ScoredRecordSchema>;

// ============================================================
// RUN SNAPSHOT
// ============================================================

export const RunSnapshotSchema = z.object({
  runId: z.string().min(1),
  collectedAt: z.string().datetime({ offset: true }),
  metrics: z.array(SourceMetricSchema),
  records: z.array(ScoredRecordSchema),
});
export type RunSnapshot = z.infer<typeof RunSnapshotSchema>;
