/**
 * Tests for Export Module (PDF, Markdown files)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { exportReportPdf, reportFileName, writeReports } from '../../src/delivery/export';
import { renderReportMarkdown } from '../../src/delivery/markdown';
import type { Report } from '../../src/delivery/report';

const createReport = (): Report => ({
  key: 'enterprise',
  title: 'Enterprise AI Adoption Report',
  runId: 'run-1',
  generatedAt: '2026-03-01T06:00:00.000Z',
  sections: [
    { heading: 'Executive Summary', paragraphs: ['Tracked technologies: 2.'] },
    { heading: 'Hype Signals', paragraphs: [], bullets: ['LangChain (MEDIUM): npm vs pypi downloads diverge 15.6x'] },
    {
      heading: 'Data Quality',
      paragraphs: [],
      table: { headers: ['Confidence', 'Technologies'], rows: [['HIGH', '1'], ['MEDIUM', '1'], ['LOW', '0']] },
    },
  ],
});

describe('Export Module', () => {
  describe('exportReportPdf', () => {
    it('should produce a PDF document', async () => {
      const pdf = await exportReportPdf(createReport());

      expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      expect(pdf.length).toBeGreaterThan(500);
    });

    it('should paginate long reports', async () => {
      const report = createReport();
      report.sections.push({
        heading: 'Long',
        paragraphs: [],
        bullets: Array.from({ length: 120 }, (_, i) => `item ${i}`),
      });

      const pdf = await exportReportPdf(report);
      expect(pdf.toString('latin1')).toMatch(/\/Count [2-9]/);
    });
  });

  describe('reportFileName', () => {
    it('should stamp the run date', () => {
      expect(reportFileName(createReport(), 'markdown')).toBe('2026-03-01_enterprise.md');
      expect(reportFileName(createReport(), 'pdf')).toBe('2026-03-01_enterprise.pdf');
    });
  });

  describe('writeReports', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'radar-reports-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write markdown and PDF files', async () => {
      const report = createReport();
      const results = await writeReports([report], join(dir, 'out'));

      expect(results.map(r => r.format)).toEqual(['markdown', 'pdf']);
      expect((await readdir(join(dir, 'out'))).sort()).toEqual(['2026-03-01_enterprise.md', '2026-03-01_enterprise.pdf']);
      expect(await readFile(join(dir, 'out', '2026-03-01_enterprise.md'), 'utf-8')).toBe(renderReportMarkdown(report));
    });

    it('should honor the requested formats', async () => {
      const results = await writeReports([createReport()], dir, { formats: ['markdown'] });

      expect(results).toHaveLength(1);
      expect(results[0].path).toBe(join(dir, '2026-03-01_enterprise.md'));
    });
  });
});
