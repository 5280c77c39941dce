import { formatPercent } from './scores.js';
import type { ComplianceSummary } from './types.js';

export const NO_DATA_LABEL = 'No data';

export interface DashboardTile {
  overallScorePercent?: number;
  frameworkCount: number;
  hasData: boolean;
  /** "41.5%", or "No data" when there is no overall score. Never "0%" for an absent score. */
  displayScore: string;
}

export function toDashboardTile(summary: ComplianceSummary): DashboardTile {
  return {
    overallScorePercent: summary.overallScorePercent,
    frameworkCount: summary.frameworks.length,
    hasData: summary.overallScorePercent !== undefined,
    displayScore: formatPercent(summary.overallScorePercent, NO_DATA_LABEL),
  };
}
