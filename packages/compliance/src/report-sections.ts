import type { ComplianceFramework, ComplianceStatus, ComplianceSummary } from './types.js';

export interface ReportSection {
  status: ComplianceStatus;
  label: string;
  frameworks: readonly ComplianceFramework[];
}

/** Gaps first. Empty buckets are kept so renderers can print an explicit "none" line. */
export const REPORT_SECTION_ORDER: readonly ComplianceStatus[] = [
  'Missing',
  'Needs Review',
  'Unknown',
  'Complete',
];

export const REPORT_SECTION_LABELS: Record<ComplianceStatus, string> = {
  Missing: 'Missing Evidence',
  'Needs Review': 'Needs Review',
  Unknown: 'Status Unknown',
  Complete: 'Complete',
};

export function toReportSections(summary: ComplianceSummary): ReportSection[] {
  return REPORT_SECTION_ORDER.map((status) => ({
    status,
    label: REPORT_SECTION_LABELS[status],
    frameworks: summary.frameworks.filter((framework) => framework.status === status),
  }));
}
