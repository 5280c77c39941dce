/**
 * Gap-analysis view: one row per framework plus status counters.
 */

import { meanScorePercent } from './scores.js';
import { fileNameOf } from './summary-path.js';
import type { ComplianceStatus, ComplianceSummary, ISOTimestamp } from './types.js';

export interface GapAnalysisRow {
  name: string;
  status: ComplianceStatus;
  scorePercent: number;
  evidenceLabel: string;
  lastUpdated: ISOTimestamp;
}

export interface GapAnalysisCounters {
  total: number;
  complete: number;
  needsReview: number;
  missing: number;
  unknown: number;
}

export interface GapAnalysisView {
  rows: GapAnalysisRow[];
  counters: GapAnalysisCounters;
  /** Mean of framework scores to one decimal place; absent when there are no frameworks. */
  meanScorePercent?: number;
}

const COUNTER_BY_STATUS: Record<ComplianceStatus, keyof Omit<GapAnalysisCounters, 'total'>> = {
  Complete: 'complete',
  'Needs Review': 'needsReview',
  Missing: 'missing',
  Unknown: 'unknown',
};

export function evidenceLabelFor(sourceIdentifier: string): string {
  return `Evidence: ${fileNameOf(sourceIdentifier)}`;
}

export function toGapAnalysisView(summary: ComplianceSummary): GapAnalysisView {
  const evidenceLabel = evidenceLabelFor(summary.sourceIdentifier);
  const counters: GapAnalysisCounters = {
    total: summary.frameworks.length,
    complete: 0,
    needsReview: 0,
    missing: 0,
    unknown: 0,
  };

  const rows = summary.frameworks.map((framework): GapAnalysisRow => {
    counters[COUNTER_BY_STATUS[framework.status]] += 1;
    return {
      name: framework.name,
      status: framework.status,
      scorePercent: framework.scorePercent,
      evidenceLabel,
      lastUpdated: summary.fetchedAt,
    };
  });

  return {
    rows,
    counters,
    meanScorePercent: meanScorePercent(summary.frameworks.map((framework) => framework.scorePercent)),
  };
}
