/**
 * Tests for the Divergence ("Hype") Detector
 */

import { describe, it, expect } from 'vitest';
import {
  describeHypeSignal,
  detectDownloadDivergence,
  detectVisibilityGaps,
  divergenceRatio,
  percentileRank,
} from '../../src/analysis/divergence';
import { DEFAULT_SCORING_POLICY } from '../../src/lib/config';
import { createRecord } from '../helpers/fixtures';

describe('Divergence Detector', () => {
  describe('divergenceRatio', () => {
    it('should divide the larger value by the smaller one', () => {
      expect(divergenceRatio(12000, 769)).toBeCloseTo(15.6047, 3);
      expect(divergenceRatio(769, 12000)).toBeCloseTo(15.6047, 3);
    });

    it('should floor the denominator at 1', () => {
      expect(divergenceRatio(250, 0)).toBe(250);
      expect(divergenceRatio(0, 0)).toBe(0);
    });

    it('should be 1 for equal values', () => {
      expect(divergenceRatio(4800, 4800)).toBe(1);
    });

    it('should never decrease when the larger value grows', () => {
      const base = divergenceRatio(12000, 769);
      expect(divergenceRatio(13000, 769)).toBeGreaterThan(base);
      expect(divergenceRatio(12000, 700)).toBeGreaterThan(base);
    });
  });

  describe('detectDownloadDivergence', () => {
    it('should flag a ratio at or above the hype threshold', () => {
      const result = detectDownloadDivergence(createRecord('x', { npm: 12000, pypi: 769 }), DEFAULT_SCORING_POLICY);

      expect(result.ratio).toBeCloseTo(15.6, 1);
      expect(result.signal?.kind).toBe('download_divergence');
      expect(result.signal?.sources).toEqual(['npm', 'pypi']);
    });

    it('should flag exactly the threshold', () => {
      const result = detectDownloadDivergence(createRecord('x', { npm: 1000, pypi: 100 }), DEFAULT_SCORING_POLICY);
      expect(result.ratio).toBe(10);
      expect(result.signal).toBeDefined();
    });

    it('should not flag below the threshold', () => {
      const result = detectDownloadDivergence(createRecord('x', { npm: 999, pypi: 100 }), DEFAULT_SCORING_POLICY);
      expect(result.ratio).toBeCloseTo(9.99, 2);
      expect(result.signal).toBeUndefined();
    });

    it('should return a null ratio when a download source is absent', () => {
      const result = detectDownloadDivergence(createRecord('x', { github: 5000, npm: 10 }), DEFAULT_SCORING_POLICY);
      expect(result).toEqual({ ratio: null });
    });
  });

  describe('percentileRank', () => {
    it('should rank the smallest value at 0 and the largest at 1', () => {
      expect(percentileRank(1, [1, 2, 3, 4])).toBe(0);
      expect(percentileRank(4, [1, 2, 3, 4])).toBe(1);
    });

    it('should share ranks between ties', () => {
      expect(percentileRank(2, [1, 2, 2, 3])).toBe(0.5);
    });

    it('should return the midpoint for a single value', () => {
      expect(percentileRank(5, [5])).toBe(0.5);
    });
  });

  describe('detectVisibilityGaps', () => {
    const cohort = [
      createRecord('starry', { github: 100000, npm: 10 }),
      createRecord('b', { github: 500, npm: 5000 }),
      createRecord('c', { github: 400, npm: 6000 }),
      createRecord('d', { github: 300, pypi: 7000 }),
    ];

    it('should flag top-tier stars with bottom-tier downloads', () => {
      const gaps = detectVisibilityGaps(cohort, DEFAULT_SCORING_POLICY);

      expect([...gaps.keys()]).toEqual(['starry']);
      expect(gaps.get('starry')).toEqual({
        kind: 'visibility_gap',
        visibilitySource: 'github',
        productionSource: 'npm',
        visibilityPercentile: 1,
        productionPercentile: 0,
      });
    });

    it('should skip cohorts below the minimum size', () => {
      const gaps = detectVisibilityGaps(cohort.slice(0, 3), DEFAULT_SCORING_POLICY);
      expect(gaps.size).toBe(0);
    });

    it('should leave records without github or downloads out of the cohort', () => {
      const gaps = detectVisibilityGaps(
        [...cohort.slice(0, 3), createRecord('d', { github: 300 })],
        DEFAULT_SCORING_POLICY
      );
      expect(gaps.size).toBe(0);
    });
  });

  describe('describeHypeSignal', () => {
    it('should describe a download divergence', () => {
      expect(
        describeHypeSignal({ kind: 'download_divergence', sources: ['npm', 'pypi'], ratio: 15.6047 })
      ).toBe('npm vs pypi downloads diverge 15.6x');
    });

    it('should describe a visibility gap', () => {
      expect(
        describeHypeSignal({
          kind: 'visibility_gap',
          visibilitySource: 'github',
          productionSource: 'pypi',
          visibilityPercentile: 0.92,
          productionPercentile: 0.08,
        })
      ).toBe('github stars top tier (p92) vs pypi downloads bottom tier (p8)');
    });
  });
});
