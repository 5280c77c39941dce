/**
 * Storage addressing for compliance summaries.
 *
 * The scoring pipeline writes one directory per calendar month:
 *   {basePath}/{yyyy}/{mm}/user_{userId}/{fileName}
 * Organisation-aware deployments also write under org_{orgId}/ or organizations/{orgId}/.
 */

import { assertSafePathSegment } from '@carecomply/security';
import type { ComplianceScope } from './types.js';

export interface SummaryLocation {
  basePath: string;
  fileName: string;
}

export const DEFAULT_SUMMARY_LOCATION: SummaryLocation = Object.freeze({
  basePath: 'compliance-results',
  fileName: 'compliance_summary.csv',
});

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/** `{base}/{yyyy}/{mm}` for the UTC month containing `date`. */
export function buildMonthDirectory(location: SummaryLocation, date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const base = trimSlashes(location.basePath);
  return base ? `${base}/${year}/${month}` : `${year}/${month}`;
}

/**
 * Directories that may hold the scope's files for the month, most specific first.
 * Org-scoped layouts are only tried when the organisation is known.
 */
export function buildScopeDirectories(
  location: SummaryLocation,
  scope: ComplianceScope,
  date: Date
): string[] {
  const month = buildMonthDirectory(location, date);
  const userId = assertSafePathSegment('userId', scope.userId);
  const directories: string[] = [];

  if (scope.organizationId !== undefined) {
    const organizationId = assertSafePathSegment('organizationId', scope.organizationId);
    directories.push(`${month}/org_${organizationId}/user_${userId}`);
    directories.push(`${month}/organizations/${organizationId}/user_${userId}`);
  }
  directories.push(`${month}/user_${userId}`);

  return directories;
}

export function buildSummaryPath(
  location: SummaryLocation,
  scope: ComplianceScope,
  date: Date
): string {
  const month = buildMonthDirectory(location, date);
  const userId = assertSafePathSegment('userId', scope.userId);
  return `${month}/user_${userId}/${location.fileName}`;
}

export function buildSummaryCandidatePaths(
  location: SummaryLocation,
  scope: ComplianceScope,
  date: Date
): string[] {
  return buildScopeDirectories(location, scope, date).map(
    (directory) => `${directory}/${location.fileName}`
  );
}

/** Last path segment of a storage key. */
export function fileNameOf(path: string): string {
  const trimmed = trimSlashes(path);
  const index = trimmed.lastIndexOf('/');
  return index === -1 ? trimmed : trimmed.slice(index + 1);
}
