/**
 * Compliance report documents.
 *
 * Pure, deterministic builders: the same summary and context always produce the same
 * document. Builders re-present normalized scores and never recompute them. Rendering to
 * Markdown (and from there to PDF) happens in report-renderers.ts.
 */

import { evidenceLabelFor, toGapAnalysisView, type GapAnalysisCounters } from './gap-analysis.js';
import { toReportSections, type ReportSection } from './report-sections.js';
import type { ComplianceStatus, ComplianceSummary, ISOTimestamp } from './types.js';

export const REPORT_TYPES = ['gap-analysis', 'accreditation-plan', 'audit-pack'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export const MAX_AUDIT_PACK_DOCUMENTS = 20;
export const READINESS_OVERVIEW_FRAMEWORKS = 5;
export const ACTION_OWNER = 'Compliance Manager';

export type Priority = 'High' | 'Medium' | 'Low';

export interface OrganisationDetails {
  name: string;
  abn?: string;
  address?: string;
  contactName?: string;
  email?: string;
  /** Accreditation framework the organisation is working towards. */
  framework?: string;
  auditType?: string;
}

export interface EvidenceDocumentSummary {
  fileName: string;
  sizeBytes: number;
  uploadedAt: ISOTimestamp;
}

export interface ReportContext {
  organisation: OrganisationDetails;
  preparedAt: ISOTimestamp;
  documents: readonly EvidenceDocumentSummary[];
}

export interface OrganisationField {
  label: string;
  value: string;
}

interface ReportBase {
  reportType: ReportType;
  title: string;
  preparedAt: ISOTimestamp;
  sourceIdentifier: string;
  overallScorePercent?: number;
}

export interface RatingScaleEntry {
  rating: ComplianceStatus;
  description: string;
}

export interface GapDetailRow {
  framework: string;
  status: ComplianceStatus;
  scorePercent: number;
  evidence: string;
}

export interface Recommendation {
  area: string;
  priority: Priority;
  action: string;
}

export interface GapAnalysisReport extends ReportBase {
  reportType: 'gap-analysis';
  organisation: OrganisationField[];
  executiveSummary: {
    frameworksReviewed: string[];
  };
  statistics: GapAnalysisCounters;
  ratingScale: RatingScaleEntry[];
  sections: ReportSection[];
  gaps: GapDetailRow[];
  recommendations: Recommendation[];
}

export interface ReadinessOverviewRow {
  category: string;
  scorePercent?: number;
  keyGaps: string;
  priority: Priority;
}

export interface ActionPlanTask {
  task: string;
  framework: string;
  owner: string;
  dueDate: ISOTimestamp;
  status: 'Not Started';
}

export interface AccreditationPlanReport extends ReportBase {
  reportType: 'accreditation-plan';
  provider: OrganisationField[];
  readinessOverview: ReadinessOverviewRow[];
  actions: ActionPlanTask[];
}

export interface AuditFrameworkRow {
  framework: string;
  scorePercent: number;
  compliant: number;
  gaps: number;
}

export interface AuditPackReport extends ReportBase {
  reportType: 'audit-pack';
  organisation: OrganisationField[];
  frameworks: AuditFrameworkRow[];
  evidence: EvidenceDocumentSummary[];
  totalDocuments: number;
}

export type ComplianceReport = GapAnalysisReport | AccreditationPlanReport | AuditPackReport;

export const RATING_SCALE: readonly RatingScaleEntry[] = [
  { rating: 'Complete', description: 'Requirements met consistently with documented evidence' },
  { rating: 'Needs Review', description: 'Partial or inconsistent implementation' },
  { rating: 'Missing', description: 'No evidence found or requirement not addressed' },
];

const NOT_PROVIDED = 'N/A';

export function isReportType(value: string): value is ReportType {
  return REPORT_TYPES.some((type) => type === value);
}

export function priorityForStatus(status: ComplianceStatus): Priority {
  if (status === 'Missing') return 'High';
  if (status === 'Needs Review') return 'Medium';
  return 'Low';
}

function isGap(status: ComplianceStatus): boolean {
  return status === 'Missing' || status === 'Needs Review';
}

function organisationFields(organisation: OrganisationDetails): OrganisationField[] {
  return [
    { label: 'Organisation', value: organisation.name },
    { label: 'ABN', value: organisation.abn ?? NOT_PROVIDED },
    { label: 'Address', value: organisation.address ?? NOT_PROVIDED },
    { label: 'Primary Contact', value: organisation.contactName ?? NOT_PROVIDED },
    { label: 'Email', value: organisation.email ?? NOT_PROVIDED },
    { label: 'Accreditation Framework', value: organisation.framework ?? NOT_PROVIDED },
  ];
}

function baseFields(summary: ComplianceSummary, context: ReportContext) {
  return {
    preparedAt: context.preparedAt,
    sourceIdentifier: summary.sourceIdentifier,
    overallScorePercent: summary.overallScorePercent,
  };
}

export function buildGapAnalysisReport(
  summary: ComplianceSummary,
  context: ReportContext
): GapAnalysisReport {
  const view = toGapAnalysisView(summary);
  const evidence = evidenceLabelFor(summary.sourceIdentifier);

  return {
    reportType: 'gap-analysis',
    title: 'Gap Analysis Report',
    ...baseFields(summary, context),
    organisation: organisationFields(context.organisation),
    executiveSummary: {
      frameworksReviewed: summary.frameworks.map((framework) => framework.name),
    },
    statistics: view.counters,
    ratingScale: [...RATING_SCALE],
    sections: toReportSections(summary),
    gaps: summary.frameworks.map((framework) => ({
      framework: framework.name,
      status: framework.status,
      scorePercent: framework.scorePercent,
      evidence,
    })),
    recommendations: summary.frameworks
      .filter((framework) => isGap(framework.status))
      .map((framework) => ({
        area: framework.name,
        priority: priorityForStatus(framework.status),
        action: `Address ${framework.status.toLowerCase()} status for ${framework.name}`,
      })),
  };
}

export function buildAccreditationPlan(
  summary: ComplianceSummary,
  context: ReportContext
): AccreditationPlanReport {
  const missingCount = summary.frameworks.filter((framework) => framework.status === 'Missing').length;

  const overallRow: ReadinessOverviewRow = {
    category: 'Overall Compliance',
    scorePercent: summary.overallScorePercent,
    keyGaps: String(missingCount),
    priority: missingCount > 0 ? 'High' : 'Low',
  };

  const frameworkRows = summary.frameworks
    .slice(0, READINESS_OVERVIEW_FRAMEWORKS)
    .map((framework): ReadinessOverviewRow => ({
      category: framework.name,
      scorePercent: framework.scorePercent,
      keyGaps: framework.status,
      priority: priorityForStatus(framework.status),
    }));

  return {
    reportType: 'accreditation-plan',
    title: 'Accreditation Plan',
    ...baseFields(summary, context),
    provider: [
      { label: 'Organisation', value: context.organisation.name },
      { label: 'Accreditation Type', value: context.organisation.framework ?? NOT_PROVIDED },
      { label: 'Audit Type', value: context.organisation.auditType ?? 'Initial' },
    ],
    readinessOverview: [overallRow, ...frameworkRows],
    actions: summary.frameworks
      .filter((framework) => isGap(framework.status))
      .map((framework) => ({
        task: `Address ${framework.name}`,
        framework: framework.name,
        owner: ACTION_OWNER,
        dueDate: context.preparedAt,
        status: 'Not Started',
      })),
  };
}

export function buildAuditPack(summary: ComplianceSummary, context: ReportContext): AuditPackReport {
  return {
    reportType: 'audit-pack',
    title: 'Audit Pack Export',
    ...baseFields(summary, context),
    organisation: organisationFields(context.organisation),
    frameworks: summary.frameworks.map((framework) => {
      const compliant = framework.status === 'Complete' ? 1 : 0;
      return {
        framework: framework.name,
        scorePercent: framework.scorePercent,
        compliant,
        gaps: 1 - compliant,
      };
    }),
    evidence: context.documents.slice(0, MAX_AUDIT_PACK_DOCUMENTS).map((document) => ({ ...document })),
    totalDocuments: context.documents.length,
  };
}

export function buildComplianceReport(
  reportType: ReportType,
  summary: ComplianceSummary,
  context: ReportContext
): ComplianceReport {
  switch (reportType) {
    case 'gap-analysis':
      return buildGapAnalysisReport(summary, context);
    case 'accreditation-plan':
      return buildAccreditationPlan(summary, context);
    case 'audit-pack':
      return buildAuditPack(summary, context);
  }
}
