/**
 * Percentage helpers shared by the normalizer and the presentation adapters.
 */

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export const MIN_SCORE_PERCENT = 0;
export const MAX_SCORE_PERCENT = 100;

/**
 * Parses a plain decimal percentage. The value is returned as written: the producer
 * already emits percentages, so `53.5` stays `53.5`.
 * Returns null for blanks, non-decimal text and values outside [0, 100].
 */
export function coerceScorePercent(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < MIN_SCORE_PERCENT || value > MAX_SCORE_PERCENT) {
    return null;
  }
  // -0 from inputs like "-0.0"
  return value === 0 ? 0 : value;
}

export function roundToOneDecimal(value: number): number {
  return Math.round((value + Number.EPSILON) * 10) / 10;
}

/**
 * Unweighted mean rounded to one decimal place; undefined for an empty list.
 */
export function meanScorePercent(scores: readonly number[]): number | undefined {
  if (scores.length === 0) return undefined;
  const total = scores.reduce((sum, score) => sum + score, 0);
  return roundToOneDecimal(total / scores.length);
}

export function formatPercent(value: number | undefined, emptyLabel = 'No data'): string {
  return value === undefined ? emptyLabel : `${value}%`;
}
