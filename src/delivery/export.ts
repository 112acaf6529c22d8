/**
 * Adoption Radar: Export Module
 *
 * Writes reports to the reports directory as Markdown and PDF.
 * File names carry the run date: <yyyy-mm-dd>_<key>.md / .pdf
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import PDFDocument from 'pdfkit';
import { logger } from '../lib/logger';
import { renderReportMarkdown } from './markdown';
import type { Report, ReportSection, ReportTable } from './report';

// ============================================================
// TYPES
// ============================================================

export type ExportFormat = 'markdown' | 'pdf';

export interface ExportOptions {
  formats?: ExportFormat[];
}

export interface ExportResult {
  key: string;
  format: ExportFormat;
  path: string;
  size: number;
}

// ============================================================
// PDF EXPORT (using pdfkit)
// ============================================================

const PDF_COLORS = {
  primary: '#1a1a2e',
  accent: '#0f3460',
  text: '#1f2937',
  muted: '#6b7280',
  border: '#e5e7eb',
};

const PAGE_BREAK_Y = 700;

/**
 * Generate PDF buffer for a report.
 */
export async function exportReportPdf(report: Report): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'A4',
        margins: { top: 50, bottom: 50, left: 50, right: 50 },
        bufferPages: true,
        info: {
          Title: report.title,
          Author: 'Adoption Radar',
          Subject: 'Technology Adoption Report',
          CreationDate: new Date(report.generatedAt),
        },
      });

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      renderPdfHeader(doc, report);

      for (const section of report.sections) {
        if (doc.y > PAGE_BREAK_Y) {
          doc.addPage();
        }
        renderPdfSection(doc, section);
      }

      renderPdfFooter(doc, report.runId);

      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

function renderPdfHeader(doc: PDFKit.PDFDocument, report: Report): void {
  doc.fontSize(18).fillColor(PDF_COLORS.primary).text(report.title, { align: 'center' });
  doc.moveDown(0.3);
  doc.fontSize(10).fillColor(PDF_COLORS.muted).text(`Generated: ${report.generatedAt}`, { align: 'center' });
  doc.moveDown(0.5);

  // Horizontal line
  doc.strokeColor(PDF_COLORS.border).lineWidth(1)
    .moveTo(50, doc.y)
    .lineTo(545, doc.y)
    .stroke();
  doc.moveDown(1);
}

function renderPdfSection(doc: PDFKit.PDFDocument, section: ReportSection): void {
  doc.fontSize(14).fillColor(PDF_COLORS.accent).text(section.heading, { underline: true });
  doc.moveDown(0.5);
  doc.fontSize(10).fillColor(PDF_COLORS.text);

  for (const paragraph of section.paragraphs) {
    doc.text(paragraph);
    doc.moveDown(0.3);
  }

  for (const bullet of section.bullets ?? []) {
    doc.text(`  • ${bullet}`);
  }

  if (section.table) {
    renderPdfTable(doc, section.table);
  }

  doc.moveDown(1);
}

/**
 * Tables are rendered as aligned text rows.
 */
function renderPdfTable(doc: PDFKit.PDFDocument, table: ReportTable): void {
  doc.moveDown(0.3);
  doc.fontSize(9).fillColor(PDF_COLORS.muted).text(table.headers.join('  |  '));
  doc.fillColor(PDF_COLORS.text);
  for (const row of table.rows) {
    if (doc.y > PAGE_BREAK_Y) {
      doc.addPage();
    }
    doc.text(row.join('  |  '));
  }
  doc.fontSize(10);
}

function renderPdfFooter(doc: PDFKit.PDFDocument, runId: string): void {
  const range = doc.bufferedPageRange();

  for (let i = range.start; i < range.start + range.count; i++) {
    doc.switchToPage(i);

    doc.strokeColor(PDF_COLORS.border).lineWidth(1)
      .moveTo(50, 780)
      .lineTo(545, 780)
      .stroke();

    // Below the bottom margin: lineBreak false keeps pdfkit from adding a page
    const pageLabel = `Page ${i + 1} of ${range.count}`;
    doc.fontSize(8).fillColor(PDF_COLORS.muted);
    doc.text(`Run ID: ${runId}`, 50, 790, { lineBreak: false });
    doc.text(pageLabel, 545 - doc.widthOfString(pageLabel), 790, { lineBreak: false });
  }
}

// ============================================================
// FILES
// ============================================================

export function reportFileName(report: Report, format: ExportFormat): string {
  const date = report.generatedAt.slice(0, 10);
  return `${date}_${report.key}.${format === 'markdown' ? 'md' : 'pdf'}`;
}

/**
 * Write every report in every requested format.
 */
export async function writeReports(
  reports: readonly Report[],
  directory: string,
  options: ExportOptions = {}
): Promise<ExportResult[]> {
  const formats = options.formats ?? ['markdown', 'pdf'];
  await mkdir(directory, { recursive: true });

  const results: ExportResult[] = [];
  for (const report of reports) {
    for (const format of formats) {
      const content = format === 'markdown' ? renderReportMarkdown(report) : await exportReportPdf(report);
      const path = join(directory, reportFileName(report, format));
      await writeFile(path, content);
      results.push({ key: report.key, format, path, size: Buffer.byteLength(content) });
    }
  }

  logger.info('Reports written', { directory, files: results.length });
  return results;
}
