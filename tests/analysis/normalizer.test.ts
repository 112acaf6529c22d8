/**
 * Tests for the Normalizer
 */

import { describe, it, expect } from 'vitest';
import { isSourceConfigured, normalizeAll, normalizeTechnology } from '../../src/analysis/normalizer';
import { T0, createFailedMetric, createMetric, createTech, daysAfter } from '../helpers/fixtures';

const langchain = createTech({
  name: 'langchain',
  githubRepo: 'langchain-ai/langchain',
  npmPackage: 'langchain',
  pypiPackage: 'langchain',
});

describe('Normalizer', () => {
  describe('isSourceConfigured', () => {
    it('should follow the identifiers present on the technology', () => {
      const githubOnly = createTech({ githubRepo: 'acme/widget' });
      expect(isSourceConfigured(githubOnly, 'github')).toBe(true);
      expect(isSourceConfigured(githubOnly, 'npm')).toBe(false);
      expect(isSourceConfigured(githubOnly, 'pypi')).toBe(false);
    });
  });

  describe('normalizeTechnology', () => {
    it('should place each successful metric under its source', () => {
      const record = normalizeTechnology(langchain, [
        createMetric('github', 'langchain', 90000),
        createMetric('npm', 'langchain', 12000),
        createMetric('pypi', 'langchain', 769),
      ]);

      expect(record.technology).toBe('langchain');
      expect(record.sourcesPresent).toBe(3);
      expect(record.sources.npm?.primaryCount).toBe(12000);
      expect(record.sources.pypi?.primaryCount).toBe(769);
      expect(record.failedSources).toEqual([]);
    });

    it('should keep a successful zero as present', () => {
      const record = normalizeTechnology(langchain, [
        createMetric('npm', 'langchain', 0),
        createMetric('pypi', 'langchain', 500),
      ]);

      expect(record.sources.npm?.primaryCount).toBe(0);
      expect(record.sourcesPresent).toBe(2);
    });

    it('should treat a failed fetch as absent and report it', () => {
      const record = normalizeTechnology(langchain, [
        createMetric('github', 'langchain', 90000),
        createFailedMetric('npm', 'langchain'),
      ]);

      expect(record.sources.npm).toBeNull();
      expect(record.sourcesPresent).toBe(1);
      expect(record.failedSources).toEqual(['npm', 'pypi']);
    });

    it('should not report unconfigured sources as failed', () => {
      const pypiOnly = createTech({ name: 'vectorbt', pypiPackage: 'vectorbt' });
      const record = normalizeTechnology(pypiOnly, [createMetric('pypi', 'vectorbt', 4000)]);

      expect(record.sourcesPresent).toBe(1);
      expect(record.failedSources).toEqual([]);
      expect(record.sources.github).toBeNull();
    });

    it('should ignore metrics of other technologies', () => {
      const record = normalizeTechnology(langchain, [createMetric('npm', 'openai', 5)]);
      expect(record.sources.npm).toBeNull();
    });

    it('should let the latest metric win for the same source', () => {
      const record = normalizeTechnology(langchain, [
        createMetric('npm', 'langchain', 100, { timestamp: T0 }),
        createMetric('npm', 'langchain', 300, { timestamp: daysAfter(T0, 1) }),
        createMetric('npm', 'langchain', 200, { timestamp: daysAfter(T0, -1) }),
      ]);

      expect(record.sources.npm?.primaryCount).toBe(300);
    });

    it('should treat a later failure as absent even after an earlier success', () => {
      const record = normalizeTechnology(langchain, [
        createMetric('npm', 'langchain', 100, { timestamp: T0 }),
        createFailedMetric('npm', 'langchain', daysAfter(T0, 1)),
      ]);

      expect(record.sources.npm).toBeNull();
      expect(record.failedSources).toContain('npm');
    });

    it('should drop metrics outside the collection window', () => {
      const record = normalizeTechnology(
        langchain,
        [createMetric('npm', 'langchain', 100, { timestamp: daysAfter(T0, -10) })],
        { start: T0, end: daysAfter(T0, 1) }
      );

      expect(record.sources.npm).toBeNull();
    });

    it('should be deterministic for the same input', () => {
      const metrics = [createMetric('github', 'langchain', 10), createMetric('npm', 'langchain', 20)];
      expect(normalizeTechnology(langchain, metrics)).toEqual(normalizeTechnology(langchain, metrics));
    });
  });

  describe('normalizeAll', () => {
    it('should produce one record per technology in input order', () => {
      const openai = createTech({ name: 'openai', npmPackage: 'openai' });
      const records = normalizeAll([openai, langchain], [createMetric('npm', 'openai', 1)]);

      expect(records.map(r => r.technology)).toEqual(['openai', 'langchain']);
      expect(records[1].sourcesPresent).toBe(0);
    });
  });
});
