/**
 * Tests for the Comparative Analyzer
 */

import { describe, it, expect } from 'vitest';
import {
  compareCategories,
  compareLists,
  compareMaturity,
  compareVelocity,
  detectLeadingIndicators,
  median,
} from '../../src/analysis/comparative';
import type { ListSide } from '../../src/analysis/comparative';
import { buildListInsights } from '../../src/analysis/insights';
import { scoreRecord } from '../../src/analysis/confidence';
import { classifyGrowth } from '../../src/analysis/velocity';
import type { TechnologyCategory, TechnologyVelocity } from '../../src/types';
import { createList, createRecord, createTech } from '../helpers/fixtures';

function side(
  id: 'enterprise' | 'fintech',
  techs: Array<{ name: string; category: TechnologyCategory; score: number | null }>
): ListSide {
  const list = createList(
    id,
    techs.map(t => createTech({ name: t.name, displayName: t.name.toUpperCase(), category: t.category }))
  );
  const records = techs.map(t => scoreRecord(createRecord(t.name, { github: 1000 })));
  const velocities = new Map<string, TechnologyVelocity>(
    techs.map(t => [
      t.name,
      {
        technology: t.name,
        bySource: {},
        momentumScore: t.score,
        momentum: t.score === null ? null : classifyGrowth(t.score),
      },
    ])
  );
  return { list, insights: buildListInsights(list, records, velocities, 5) };
}

const enterprise = side('enterprise', [
  { name: 'e1', category: 'vector_db', score: 80 },
  { name: 'e2', category: 'ai_platform', score: 40 },
]);

const fintech = side('fintech', [
  { name: 'f1', category: 'trading_platform', score: 50 },
  { name: 'f2', category: 'fintech_infrastructure', score: 10 },
]);

const noHistory = side('fintech', [{ name: 'f9', category: 'quant_tools', score: null }]);

describe('Comparative Analyzer', () => {
  describe('median', () => {
    it('should handle odd and even lengths', () => {
      expect(median([3, 1, 2])).toBe(2);
      expect(median([4, 1, 2, 3])).toBe(2.5);
    });
  });

  describe('compareVelocity', () => {
    it('should report averages, medians and the leader', () => {
      expect(compareVelocity(enterprise, fintech)).toEqual({
        status: 'ok',
        averageMomentum: { enterprise: 60, fintech: 30 },
        medianMomentum: { enterprise: 60, fintech: 30 },
        difference: 30,
        leader: 'enterprise',
      });
    });

    it('should key results by list regardless of argument order', () => {
      const result = compareVelocity(fintech, enterprise);
      expect(result.status === 'ok' && result.averageMomentum.enterprise).toBe(60);
      expect(result.status === 'ok' && result.leader).toBe('enterprise');
    });

    it('should call a small difference a tie', () => {
      const close = side('fintech', [{ name: 'f1', category: 'trading_platform', score: 57 }]);
      const result = compareVelocity(enterprise, close);
      expect(result.status === 'ok' && result.leader).toBe('tied');
    });

    it('should report insufficient data when a list has no momentum', () => {
      expect(compareVelocity(enterprise, noHistory)).toEqual({
        status: 'insufficient_data',
        reason: 'too_few_snapshots',
      });
    });
  });

  describe('compareCategories', () => {
    it('should split shared and unique categories from the list definitions', () => {
      expect(compareCategories(enterprise, fintech)).toEqual({
        shared: [],
        uniqueTo: {
          enterprise: ['ai_platform', 'vector_db'],
          fintech: ['fintech_infrastructure', 'trading_platform'],
        },
      });
    });

    it('should not depend on history', () => {
      expect(compareCategories(enterprise, noHistory).uniqueTo.fintech).toEqual(['quant_tools']);
    });
  });

  describe('detectLeadingIndicators', () => {
    it('should pair infrastructure momentum with lagging application categories', () => {
      expect(detectLeadingIndicators(enterprise, fintech)).toEqual([
        {
          leadingList: 'enterprise',
          leadingCategory: 'vector_db',
          followingList: 'fintech',
          followingCategory: 'fintech_infrastructure',
          momentumGap: 70,
        },
        {
          leadingList: 'enterprise',
          leadingCategory: 'vector_db',
          followingList: 'fintech',
          followingCategory: 'trading_platform',
          momentumGap: 30,
        },
      ]);
    });

    it('should find nothing without history', () => {
      expect(detectLeadingIndicators(enterprise, noHistory)).toEqual([]);
    });
  });

  describe('compareMaturity', () => {
    it('should name the more mature market and the magnitude', () => {
      expect(compareMaturity(enterprise, fintech)).toEqual({
        status: 'ok',
        maturityScore: { enterprise: 60, fintech: 30 },
        emergingCount: { enterprise: 1, fintech: 0 },
        gap: 30,
        verdict: 'ahead',
        moreMature: 'enterprise',
        magnitude: 'moderate',
      });
    });

    it('should stay neutral when the gap is small', () => {
      const similar = side('fintech', [{ name: 'f1', category: 'trading_platform', score: 55 }]);
      const result = compareMaturity(enterprise, similar);

      expect(result.status === 'ok' && result.verdict).toBe('similar');
      expect(result.status === 'ok' && result.moreMature).toBeNull();
      expect(result.status === 'ok' && result.magnitude).toBeNull();
    });

    it('should report insufficient data without leaders', () => {
      expect(compareMaturity(noHistory, enterprise).status).toBe('insufficient_data');
    });
  });

  describe('compareLists', () => {
    it('should combine every comparison', () => {
      const result = compareLists(enterprise, fintech);

      expect(result.lists).toEqual(['enterprise', 'fintech']);
      expect(result.velocity.status).toBe('ok');
      expect(result.leadingIndicators).toHaveLength(2);
      expect(result.maturity.status).toBe('ok');
      expect(result.overall).toEqual({ verdict: 'ahead', moreMature: 'enterprise' });
    });

    it('should fall back to a neutral verdict without history', () => {
      const result = compareLists(enterprise, noHistory);

      expect(result.maturity.status).toBe('insufficient_data');
      expect(result.overall).toEqual({ verdict: 'similar', moreMature: null });
    });

    it('should refuse to compare a list with itself', () => {
      expect(() => compareLists(enterprise, enterprise)).toThrow('Cannot compare list enterprise with itself');
    });
  });
});
