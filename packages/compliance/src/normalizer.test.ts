import { describe, it, expect } from 'vitest';
import { parseCsv } from './csv-parser.js';
import { SchemaMismatchError } from './errors.js';
import {
  createEmptyComplianceSummary,
  mapComplianceStatus,
  normalizeComplianceSummary,
} from './normalizer.js';

const OPTIONS = {
  sourceIdentifier: 'compliance-results/2026/10/user_42/compliance_summary.csv',
  fetchedAt: '2026-10-18T09:00:00.000Z',
};

function normalize(csv: string) {
  return normalizeComplianceSummary(parseCsv(csv), OPTIONS);
}

describe('compliance summary normalizer', () => {
  it('uses an explicit Overall row instead of the mean', () => {
    const summary = normalize(
      'Framework,Compliance_Score,Status\nAged Care,5.35,Missing\nNDIS,3.03,Missing\nOverall,3.93,\n'
    );

    expect(summary.frameworks).toEqual([
      { name: 'Aged Care', scorePercent: 5.35, status: 'Missing' },
      { name: 'NDIS', scorePercent: 3.03, status: 'Missing' },
    ]);
    expect(summary.overallScorePercent).toBe(3.93);
    expect(summary.overallScoreSource).toBe('OVERALL_ROW');
  });

  it('passes scores through without rescaling', () => {
    const summary = normalize('Framework,Compliance_Score,Status\nAged Care,53.5,Missing\n');

    expect(summary.frameworks[0].scorePercent).toBe(53.5);
  });

  it('falls back to the mean rounded to one decimal place', () => {
    const summary = normalize(
      'Framework,Compliance_Score,Status\nA,10,Complete\nB,20,Complete\nC,25,Complete\n'
    );

    expect(summary.overallScorePercent).toBe(18.3);
    expect(summary.overallScoreSource).toBe('MEAN');
  });

  it('computes the mean of two frameworks', () => {
    const summary = normalize('Framework,Compliance_Score,Status\nA,40,Missing\nB,43.8,Missing\n');

    expect(summary.overallScorePercent).toBe(41.9);
  });

  it('drops rows whose score does not coerce without affecting the others', () => {
    const summary = normalize(
      [
        'Framework,Compliance_Score,Status',
        'Empty,,Complete',
        'NotApplicable,N/A,Complete',
        'Percent,53%,Complete',
        'Exponent,1e2,Complete',
        'TooHigh,120,Complete',
        'Negative,-5,Complete',
        'Padded, 53.5 ,Complete',
        'Short',
      ].join('\n')
    );

    expect(summary.frameworks).toEqual([{ name: 'Padded', scorePercent: 53.5, status: 'Complete' }]);
  });

  it('maps unrecognized statuses to Unknown without dropping the row', () => {
    const summary = normalize(
      'Framework,Compliance_Score,Status\nA,10,Partially Done\nB,20,complete\nC,30, Needs Review \nD,40,\n'
    );

    expect(summary.frameworks.map((f) => f.status)).toEqual([
      'Unknown',
      'Unknown',
      'Needs Review',
      'Unknown',
    ]);
  });

  it('keeps the last duplicate value at the first position', () => {
    const summary = normalize(
      'Framework,Compliance_Score,Status\nNDIS,10,Missing\nAged Care,50,Complete\nNDIS,20,Needs Review\n'
    );

    expect(summary.frameworks).toEqual([
      { name: 'NDIS', scorePercent: 20, status: 'Needs Review' },
      { name: 'Aged Care', scorePercent: 50, status: 'Complete' },
    ]);
  });

  it('honours the first Overall row with a usable score', () => {
    const summary = normalize(
      'Framework,Compliance_Score,Status\nOverall,n/a,\nA,10,Complete\nOverall,50,\nOverall,60,\n'
    );

    expect(summary.overallScorePercent).toBe(50);
    expect(summary.frameworks).toHaveLength(1);
  });

  it('treats only the exact token Overall as the overall row', () => {
    const summary = normalize('Framework,Compliance_Score,Status\noverall,70,Complete\n Overall ,80,\n');

    expect(summary.frameworks).toEqual([{ name: 'overall', scorePercent: 70, status: 'Complete' }]);
    expect(summary.overallScorePercent).toBe(80);
  });

  it('drops rows with an empty name', () => {
    const summary = normalize('Framework,Compliance_Score,Status\n  ,10,Complete\n');

    expect(summary.frameworks).toEqual([]);
  });

  it('returns an empty summary for a header-only file', () => {
    const summary = normalize('Framework,Compliance_Score,Status\n');

    expect(summary.frameworks).toEqual([]);
    expect(summary.overallScorePercent).toBeUndefined();
    expect(summary.overallScoreSource).toBe('NONE');
  });

  it('fails with SchemaMismatch when a required column is absent', () => {
    let caught: unknown;
    try {
      normalize('Framework,Status\nNDIS,Missing\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaMismatchError);
    expect(caught).toMatchObject({
      code: 'SCHEMA_MISMATCH',
      missingColumns: ['Compliance_Score'],
      message: 'Compliance file is missing required columns: Compliance_Score',
    });
  });

  it('ignores extra columns and records where the summary came from', () => {
    const summary = normalize('Model,Framework,Status,Compliance_Score\nv2,NDIS,Complete,90\n');

    expect(summary.frameworks).toEqual([{ name: 'NDIS', scorePercent: 90, status: 'Complete' }]);
    expect(summary.sourceIdentifier).toBe(OPTIONS.sourceIdentifier);
    expect(summary.fetchedAt).toBe(OPTIONS.fetchedAt);
  });

  it('produces a frozen summary', () => {
    const summary = normalize('Framework,Compliance_Score,Status\nNDIS,90,Complete\n');

    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.frameworks)).toBe(true);
    expect(Object.isFrozen(summary.frameworks[0])).toBe(true);
  });

  it('maps statuses exactly', () => {
    expect(mapComplianceStatus('Missing')).toBe('Missing');
    expect(mapComplianceStatus(undefined)).toBe('Unknown');
  });

  it('creates an empty summary for absent data', () => {
    const summary = createEmptyComplianceSummary(OPTIONS);

    expect(summary).toEqual({
      frameworks: [],
      overallScorePercent: undefined,
      overallScoreSource: 'NONE',
      sourceIdentifier: OPTIONS.sourceIdentifier,
      fetchedAt: OPTIONS.fetchedAt,
    });
  });
});
