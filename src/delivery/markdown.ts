/**
 * Adoption Radar: Markdown Renderer
 */

import type { Report, ReportSection, ReportTable } from './report';

function renderTable(table: ReportTable): string[] {
  const lines: string[] = [];
  lines.push(`| ${table.headers.join(' | ')} |`);
  lines.push(`|${table.headers.map(() => '---').join('|')}|`);
  for (const row of table.rows) {
    lines.push(`| ${row.join(' | ')} |`);
  }
  return lines;
}

function renderSection(section: ReportSection): string[] {
  const lines: string[] = [`## ${section.heading}`, ''];

  for (const paragraph of section.paragraphs) {
    lines.push(paragraph);
    lines.push('');
  }

  if (section.bullets && section.bullets.length > 0) {
    for (const bullet of section.bullets) {
      lines.push(`- ${bullet}`);
    }
    lines.push('');
  }

  if (section.table) {
    lines.push(...renderTable(section.table));
    lines.push('');
  }

  return lines;
}

export function renderReportMarkdown(report: Report): string {
  const lines: string[] = [];

  lines.push(`# ${report.title}`);
  lines.push('');
  lines.push(`**Run:** ${report.runId}`);
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push('');

  for (const section of report.sections) {
    lines.push(...renderSection(section));
  }

  return lines.join('\n');
}
