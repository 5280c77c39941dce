/**
 * Compliance summary model.
 *
 * A summary is a read-through projection of the CSV an external scoring pipeline writes
 * to the results container. It is built fresh for every request and never mutated.
 */

export type ISOTimestamp = string;

/** Column headers the scoring pipeline writes. */
export const COMPLIANCE_COLUMNS = {
  FRAMEWORK: 'Framework',
  SCORE: 'Compliance_Score',
  STATUS: 'Status',
} as const;

/** Name of the distinguished aggregate row. Matched case-sensitively after trimming. */
export const OVERALL_ROW_NAME = 'Overall';

export type ComplianceStatus = 'Complete' | 'Needs Review' | 'Missing' | 'Unknown';

/** One CSV data line keyed by header. Absent trailing fields are undefined. */
export type RawComplianceRow = Readonly<Record<string, string | undefined>>;

export interface ParsedTable {
  headers: readonly string[];
  rows: readonly RawComplianceRow[];
}

export interface ComplianceFramework {
  readonly name: string;
  /** Already a percentage in [0, 100]; never rescaled. */
  readonly scorePercent: number;
  readonly status: ComplianceStatus;
}

export type OverallScoreSource = 'OVERALL_ROW' | 'MEAN' | 'NONE';

export interface ComplianceSummary {
  readonly frameworks: readonly ComplianceFramework[];
  readonly overallScorePercent?: number;
  readonly overallScoreSource: OverallScoreSource;
  /** Storage key the summary was read from. */
  readonly sourceIdentifier: string;
  readonly fetchedAt: ISOTimestamp;
}

/** Identity used to address a user's summary in storage. */
export interface ComplianceScope {
  userId: string;
  organizationId?: string;
}
