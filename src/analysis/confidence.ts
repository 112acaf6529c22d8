/**
 * Adoption Radar: Confidence Scorer
 *
 * Confidence levels:
 *   0 sources                                   LOW (not rankable)
 *   1 source                                    MEDIUM (unconfirmed)
 *   2+ sources, any hype signal                 MEDIUM
 *   2+ sources, download ratio >= minor         MEDIUM
 *   2+ sources, otherwise                       HIGH
 *
 * github + one download source counts as two sources: stars are
 * always comparable (by rank) against a production source.
 *
 * Scoring is a pure function of the normalized records and the policy.
 */

import type { ConfidenceLevel, HypeSignal, NormalizedRecord, ScoredRecord, VisibilityGapSignal } from '../types';
import type { ScoringPolicy } from '../lib/config';
import { DEFAULT_SCORING_POLICY } from '../lib/config';
import { logger } from '../lib/logger';
import { describeHypeSignal, detectDownloadDivergence, detectVisibilityGaps } from './divergence';

function levelFor(
  sourcesPresent: number,
  hypeFlag: boolean,
  ratio: number | null,
  policy: ScoringPolicy
): ConfidenceLevel {
  if (sourcesPresent === 0) return 'LOW';
  if (sourcesPresent === 1) return 'MEDIUM';
  if (hypeFlag) return 'MEDIUM';
  if (ratio !== null && ratio >= policy.minorThreshold) return 'MEDIUM';
  return 'HIGH';
}

/**
 * Score one record. The visibility signal comes from the cohort
 * (see scoreRecords) because it depends on the other technologies.
 */
export function scoreRecord(
  record: NormalizedRecord,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
  visibilityGap?: VisibilityGapSignal
): ScoredRecord {
  const download = detectDownloadDivergence(record, policy);

  const hypeSignals: HypeSignal[] = [];
  if (download.signal) hypeSignals.push(download.signal);
  if (visibilityGap) hypeSignals.push(visibilityGap);

  const hypeFlag = hypeSignals.length > 0;

  const scored: ScoredRecord = {
    technology: record.technology,
    confidenceLevel: levelFor(record.sourcesPresent, hypeFlag, download.ratio, policy),
    hypeFlag,
    divergenceRatio: download.ratio,
    sourcesPresent: record.sourcesPresent,
    hypeSignals,
    rankable: record.sourcesPresent > 0,
  };

  if (hypeFlag) {
    scored.hypeReason = hypeSignals.map(describeHypeSignal).join('; ');
  }

  return scored;
}

/**
 * Score every record of a run. Output order follows the input.
 */
export function scoreRecords(
  records: readonly NormalizedRecord[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): ScoredRecord[] {
  const visibilityGaps = detectVisibilityGaps(records, policy);
  const scored = records.map(record => scoreRecord(record, policy, visibilityGaps.get(record.technology)));

  logger.info('Records scored', {
    total: scored.length,
    high: scored.filter(r => r.confidenceLevel === 'HIGH').length,
    medium: scored.filter(r => r.confidenceLevel === 'MEDIUM').length,
    low: scored.filter(r => r.confidenceLevel === 'LOW').length,
    hype: scored.filter(r => r.hypeFlag).length,
  });

  for (const record of scored.filter(r => r.hypeFlag)) {
    logger.warn('Hype detected', { technology: record.technology, reason: record.hypeReason });
  }

  return scored;
}
