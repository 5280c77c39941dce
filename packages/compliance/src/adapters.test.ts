import { describe, it, expect } from 'vitest';
import { parseCsv } from './csv-parser.js';
import { createEmptyComplianceSummary, normalizeComplianceSummary } from './normalizer.js';
import { toDashboardTile } from './dashboard-tile.js';
import { toGapAnalysisView } from './gap-analysis.js';
import { toReportSections } from './report-sections.js';

const SOURCE = 'compliance-results/2026/10/user_42/compliance_summary.csv';
const FETCHED_AT = '2026-10-18T09:00:00.000Z';

function summaryFrom(csv: string) {
  return normalizeComplianceSummary(parseCsv(csv), { sourceIdentifier: SOURCE, fetchedAt: FETCHED_AT });
}

const MIXED = summaryFrom(
  [
    'Framework,Compliance_Score,Status',
    'Aged Care,53.5,Missing',
    'NDIS,30.5,Needs Review',
    'Home Care,90,Complete',
    'Disability,70,Partially Done',
    'Overall,41.5,',
  ].join('\n')
);

const EMPTY = createEmptyComplianceSummary({ sourceIdentifier: SOURCE, fetchedAt: FETCHED_AT });

describe('presentation adapters', () => {
  describe('toDashboardTile', () => {
    it('shows the overall score and framework count', () => {
      expect(toDashboardTile(MIXED)).toEqual({
        overallScorePercent: 41.5,
        frameworkCount: 4,
        hasData: true,
        displayScore: '41.5%',
      });
    });

    it('shows an explicit no-data indicator instead of 0%', () => {
      expect(toDashboardTile(EMPTY)).toEqual({
        overallScorePercent: undefined,
        frameworkCount: 0,
        hasData: false,
        displayScore: 'No data',
      });
    });

    it('shows a genuine zero score as 0%', () => {
      const tile = toDashboardTile(summaryFrom('Framework,Compliance_Score,Status\nOverall,0,\n'));

      expect(tile.displayScore).toBe('0%');
      expect(tile.hasData).toBe(true);
    });
  });

  describe('toGapAnalysisView', () => {
    it('builds one row per framework with evidence and timestamp', () => {
      const view = toGapAnalysisView(MIXED);

      expect(view.rows[0]).toEqual({
        name: 'Aged Care',
        status: 'Missing',
        scorePercent: 53.5,
        evidenceLabel: 'Evidence: compliance_summary.csv',
        lastUpdated: FETCHED_AT,
      });
      expect(view.rows.map((row) => row.name)).toEqual(['Aged Care', 'NDIS', 'Home Care', 'Disability']);
    });

    it('counts frameworks by status and averages their scores', () => {
      const view = toGapAnalysisView(MIXED);

      expect(view.counters).toEqual({ total: 4, complete: 1, needsReview: 1, missing: 1, unknown: 1 });
      expect(view.meanScorePercent).toBe(61);
    });

    it('renders an empty state for a summary without frameworks', () => {
      expect(toGapAnalysisView(EMPTY)).toEqual({
        rows: [],
        counters: { total: 0, complete: 0, needsReview: 0, missing: 0, unknown: 0 },
        meanScorePercent: undefined,
      });
    });
  });

  describe('toReportSections', () => {
    it('groups frameworks into buckets with gaps first', () => {
      const sections = toReportSections(MIXED);

      expect(sections.map((section) => section.label)).toEqual([
        'Missing Evidence',
        'Needs Review',
        'Status Unknown',
        'Complete',
      ]);
      expect(sections.map((section) => section.frameworks.map((f) => f.name))).toEqual([
        ['Aged Care'],
        ['NDIS'],
        ['Disability'],
        ['Home Care'],
      ]);
    });

    it('keeps empty buckets and never recomputes scores', () => {
      const sections = toReportSections(summaryFrom('Framework,Compliance_Score,Status\nNDIS,33.3,Complete\n'));

      expect(sections.map((section) => section.frameworks.length)).toEqual([0, 0, 0, 1]);
      expect(sections[3].frameworks[0].scorePercent).toBe(33.3);
    });
  });
});
