/**
 * Markdown renderers for compliance reports.
 *
 * Presentation only: renderers format what the builders computed and must stay
 * deterministic for a given document.
 */

import { formatPercent } from './scores.js';
import type {
  AccreditationPlanReport,
  AuditPackReport,
  ComplianceReport,
  GapAnalysisReport,
  OrganisationField,
} from './report-documents.js';

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

export function formatHumanDate(isoTimestamp: string | undefined, short = false): string {
  if (!isoTimestamp) return 'Not specified';
  const date = new Date(isoTimestamp);
  if (Number.isNaN(date.getTime())) return 'Not specified';
  const month = MONTHS[date.getUTCMonth()];
  return `${date.getUTCDate()} ${short ? month.slice(0, 3) : month} ${date.getUTCFullYear()}`;
}

export function formatFileSize(sizeBytes: number): string {
  if (!sizeBytes) return 'Unknown';
  let size = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) return `${size.toFixed(1)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

/** Line breaks would end a Markdown line early. */
function inline(value: string): string {
  return value.replace(/\s*(?:\r\n|\r|\n)\s*/g, ' ');
}

/** Pipes would split a table cell. */
function cell(value: string): string {
  return inline(value).replace(/\|/g, '\\|');
}

function pushOrganisation(lines: string[], heading: string, fields: OrganisationField[], preparedAt: string): void {
  lines.push(`## ${heading}`);
  lines.push('');
  lines.push('| Field | Entry |');
  lines.push('|-------|-------|');
  for (const field of fields) {
    lines.push(`| ${cell(field.label)} | ${cell(field.value)} |`);
  }
  lines.push(`| Export Date | ${formatHumanDate(preparedAt)} |`);
  lines.push('');
}

function renderGapAnalysis(report: GapAnalysisReport): string[] {
  const lines: string[] = [];
  pushOrganisation(lines, 'Organisation Information', report.organisation, report.preparedAt);

  lines.push('## 1. Executive Summary');
  lines.push('');
  lines.push(
    'This gap analysis report identifies compliance gaps and provides recommendations for achieving full accreditation readiness.'
  );
  lines.push('');
  const reviewed = report.executiveSummary.frameworksReviewed;
  lines.push(`- Frameworks Reviewed: ${reviewed.length > 0 ? inline(reviewed.join(', ')) : 'N/A'}`);
  lines.push(`- Overall Readiness Score: ${formatPercent(report.overallScorePercent)}`);
  lines.push('');
  lines.push('| Metric | Count |');
  lines.push('|--------|-------|');
  lines.push(`| Total Requirements | ${report.statistics.total} |`);
  lines.push(`| Requirements Met | ${report.statistics.complete} |`);
  lines.push(`| Pending Review | ${report.statistics.needsReview} |`);
  lines.push(`| Gaps Identified | ${report.statistics.missing} |`);
  lines.push(`| Status Unknown | ${report.statistics.unknown} |`);
  lines.push('');

  lines.push('## 2. Assessment Methodology');
  lines.push('');
  lines.push('| Rating | Description |');
  lines.push('|--------|-------------|');
  for (const entry of report.ratingScale) {
    lines.push(`| ${entry.rating} | ${entry.description} |`);
  }
  lines.push('');

  lines.push('## 3. Detailed Gap Analysis');
  lines.push('');
  for (const section of report.sections) {
    lines.push(`### ${section.label}`);
    lines.push('');
    if (section.frameworks.length === 0) {
      lines.push('None.');
    } else {
      lines.push('| Framework | Status | Score | Evidence |');
      lines.push('|-----------|--------|-------|----------|');
      const evidenceByName = new Map(report.gaps.map((gap) => [gap.framework, gap.evidence]));
      for (const framework of section.frameworks) {
        const evidence = evidenceByName.get(framework.name) ?? 'N/A';
        lines.push(
          `| ${cell(framework.name)} | ${framework.status} | ${formatPercent(framework.scorePercent)} | ${cell(evidence)} |`
        );
      }
    }
    lines.push('');
  }

  lines.push('## 4. Recommendations');
  lines.push('');
  if (report.recommendations.length === 0) {
    lines.push('All requirements are met. No immediate actions required.');
  } else {
    lines.push('| Area | Priority | Recommended Action |');
    lines.push('|------|----------|--------------------|');
    for (const recommendation of report.recommendations) {
      lines.push(
        `| ${cell(recommendation.area)} | ${recommendation.priority} | ${cell(recommendation.action)} |`
      );
    }
  }
  return lines;
}

function renderAccreditationPlan(report: AccreditationPlanReport): string[] {
  const lines: string[] = [];
  lines.push('## 1. Provider & Accreditation Summary');
  lines.push('');
  lines.push('| Field | Entry |');
  lines.push('|-------|-------|');
  for (const field of report.provider) {
    lines.push(`| ${cell(field.label)} | ${cell(field.value)} |`);
  }
  lines.push(`| Date Prepared | ${formatHumanDate(report.preparedAt)} |`);
  lines.push(`| Readiness Score | ${formatPercent(report.overallScorePercent)} |`);
  lines.push('');

  lines.push('## 2. Readiness Overview');
  lines.push('');
  lines.push('| Category | % Complete | Key Gaps | Priority |');
  lines.push('|----------|------------|----------|----------|');
  for (const row of report.readinessOverview) {
    lines.push(
      `| ${cell(row.category)} | ${formatPercent(row.scorePercent)} | ${cell(row.keyGaps)} | ${row.priority} |`
    );
  }
  lines.push('');

  lines.push('## 3. Action Plan');
  lines.push('');
  if (report.actions.length === 0) {
    lines.push('No actions required. All requirements are met.');
  } else {
    lines.push('| Task | Framework | Owner | Due Date | Status |');
    lines.push('|------|-----------|-------|----------|--------|');
    for (const action of report.actions) {
      lines.push(
        `| ${cell(action.task)} | ${cell(action.framework)} | ${action.owner} | ${formatHumanDate(action.dueDate)} | ${action.status} |`
      );
    }
  }
  return lines;
}

function renderAuditPack(report: AuditPackReport): string[] {
  const lines: string[] = [];
  pushOrganisation(lines, 'Organisation Information', report.organisation, report.preparedAt);

  lines.push('## Readiness Summary');
  lines.push('');
  lines.push(`Overall Readiness: ${formatPercent(report.overallScorePercent)}`);
  lines.push('');
  if (report.frameworks.length === 0) {
    lines.push('No framework results available.');
  } else {
    lines.push('| Framework | Readiness % | Compliant | Gaps |');
    lines.push('|-----------|-------------|-----------|------|');
    for (const row of report.frameworks) {
      lines.push(
        `| ${cell(row.framework)} | ${formatPercent(row.scorePercent)} | ${row.compliant} | ${row.gaps} |`
      );
    }
  }
  lines.push('');

  lines.push('## Evidence Repository');
  lines.push('');
  if (report.evidence.length === 0) {
    lines.push('No documents in evidence repository.');
  } else {
    lines.push('| Document Name | Size | Upload Date |');
    lines.push('|---------------|------|-------------|');
    for (const document of report.evidence) {
      lines.push(
        `| ${cell(document.fileName)} | ${formatFileSize(document.sizeBytes)} | ${formatHumanDate(document.uploadedAt, true)} |`
      );
    }
    if (report.totalDocuments > report.evidence.length) {
      lines.push('');
      lines.push(`Showing ${report.evidence.length} of ${report.totalDocuments} documents.`);
    }
  }
  return lines;
}

export function renderReportMarkdown(report: ComplianceReport): string {
  const lines: string[] = [`# ${report.title}`, ''];

  switch (report.reportType) {
    case 'gap-analysis':
      lines.push(...renderGapAnalysis(report));
      break;
    case 'accreditation-plan':
      lines.push(...renderAccreditationPlan(report));
      break;
    case 'audit-pack':
      lines.push(...renderAuditPack(report));
      break;
  }

  lines.push('');
  lines.push(`Source: ${inline(report.sourceIdentifier)}`);
  lines.push('');
  return lines.join('\n');
}
