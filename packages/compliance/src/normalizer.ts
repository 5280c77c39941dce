/**
 * Compliance summary normalizer.
 *
 * Turns parsed CSV rows into a ComplianceSummary. Structural problems (missing columns)
 * fail the whole file; row problems only affect that row.
 *
 * Rules, applied in order:
 * 1. `Framework`, `Compliance_Score` and `Status` headers must all be present.
 * 2. A row named exactly `Overall` (after trimming) supplies the overall score. The first
 *    such row with a usable score wins; it never becomes a framework entry.
 * 3. Scores are plain decimal percentages used as-is. Unusable scores drop the row.
 * 4. Status maps exactly onto Complete / Needs Review / Missing; anything else is Unknown.
 * 5. A repeated framework name replaces the earlier entry in place (last value, first position).
 * 6. Without an overall row, the overall score is the mean of framework scores to one
 *    decimal place, or undefined when there are no frameworks.
 */

import { SchemaMismatchError } from './errors.js';
import { coerceScorePercent, meanScorePercent } from './scores.js';
import {
  COMPLIANCE_COLUMNS,
  OVERALL_ROW_NAME,
  type ComplianceFramework,
  type ComplianceStatus,
  type ComplianceSummary,
  type ISOTimestamp,
  type OverallScoreSource,
  type ParsedTable,
} from './types.js';

const REQUIRED_COLUMNS: readonly string[] = [
  COMPLIANCE_COLUMNS.FRAMEWORK,
  COMPLIANCE_COLUMNS.SCORE,
  COMPLIANCE_COLUMNS.STATUS,
];

const RECOGNIZED_STATUSES: ReadonlySet<string> = new Set<ComplianceStatus>([
  'Complete',
  'Needs Review',
  'Missing',
]);

export interface NormalizeOptions {
  sourceIdentifier: string;
  fetchedAt: ISOTimestamp;
}

function isRecognizedStatus(value: string): value is Exclude<ComplianceStatus, 'Unknown'> {
  return RECOGNIZED_STATUSES.has(value);
}

export function mapComplianceStatus(raw: string | undefined): ComplianceStatus {
  const trimmed = (raw ?? '').trim();
  return isRecognizedStatus(trimmed) ? trimmed : 'Unknown';
}

/**
 * @throws {SchemaMismatchError} when a required header is absent
 */
export function assertRequiredColumns(headers: readonly string[]): void {
  const present = new Set(headers);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new SchemaMismatchError(missing);
  }
}

/**
 * Builds an immutable summary from a parsed table.
 *
 * @throws {SchemaMismatchError} when a required column is absent; no partial summary is returned
 */
export function normalizeComplianceSummary(
  table: ParsedTable,
  options: NormalizeOptions
): ComplianceSummary {
  assertRequiredColumns(table.headers);

  const frameworks: ComplianceFramework[] = [];
  const positionByName = new Map<string, number>();
  let overallRowScore: number | undefined;

  for (const row of table.rows) {
    const name = (row[COMPLIANCE_COLUMNS.FRAMEWORK] ?? '').trim();
    const score = coerceScorePercent(row[COMPLIANCE_COLUMNS.SCORE]);

    if (name === OVERALL_ROW_NAME) {
      if (overallRowScore === undefined && score !== null) {
        overallRowScore = score;
      }
      continue;
    }

    if (!name || score === null) {
      continue;
    }

    const framework: ComplianceFramework = Object.freeze({
      name,
      scorePercent: score,
      status: mapComplianceStatus(row[COMPLIANCE_COLUMNS.STATUS]),
    });

    const existing = positionByName.get(name);
    if (existing !== undefined) {
      frameworks[existing] = framework;
    } else {
      positionByName.set(name, frameworks.length);
      frameworks.push(framework);
    }
  }

  let overallScorePercent: number | undefined;
  let overallScoreSource: OverallScoreSource;
  if (overallRowScore !== undefined) {
    overallScorePercent = overallRowScore;
    overallScoreSource = 'OVERALL_ROW';
  } else {
    overallScorePercent = meanScorePercent(frameworks.map((framework) => framework.scorePercent));
    overallScoreSource = overallScorePercent === undefined ? 'NONE' : 'MEAN';
  }

  return Object.freeze({
    frameworks: Object.freeze(frameworks),
    overallScorePercent,
    overallScoreSource,
    sourceIdentifier: options.sourceIdentifier,
    fetchedAt: options.fetchedAt,
  });
}

/**
 * Summary for a user with no file yet: no frameworks, no overall score.
 */
export function createEmptyComplianceSummary(options: NormalizeOptions): ComplianceSummary {
  return Object.freeze({
    frameworks: Object.freeze([]),
    overallScorePercent: undefined,
    overallScoreSource: 'NONE',
    sourceIdentifier: options.sourceIdentifier,
    fetchedAt: options.fetchedAt,
  });
}
