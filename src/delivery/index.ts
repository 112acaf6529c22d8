/**
 * Adoption Radar: Delivery
 *
 * Report building, Markdown rendering and file export.
 */

export type { Report, ReportContext, ReportSection, ReportTable } from './report';
export {
  INSUFFICIENT_HISTORY,
  buildComparativeReport,
  buildListReport,
  formatCategory,
  formatMomentum,
  formatPercent,
  formatPoints,
} from './report';

export { renderReportMarkdown } from './markdown';

export type { ExportFormat, ExportOptions, ExportResult } from './export';
export { exportReportPdf, reportFileName, writeReports } from './export';
