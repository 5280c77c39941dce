import type { ComplianceSummaryResult } from '@carecomply/compliance';

/** `NONE` marks responses that did not read a compliance summary. */
export type DataState = ComplianceSummaryResult['state'] | 'NONE';

export interface DataSource {
  sourceIdentifier: string;
  fetchedAt: string;
}

export interface ResponseMetadata {
  apiVersion: string;
  generatedAt: string;
  dataState: DataState;
  source: DataSource | null;
}

export function buildResponseMetadata(
  overrides: Partial<ResponseMetadata> & Pick<ResponseMetadata, 'apiVersion'>
): ResponseMetadata {
  return {
    apiVersion: overrides.apiVersion,
    generatedAt: overrides.generatedAt ?? new Date().toISOString(),
    dataState: overrides.dataState ?? 'NONE',
    source: overrides.source ?? null,
  };
}

/**
 * Metadata describing where a summary-backed response came from.
 */
export function summaryMetadata(result: ComplianceSummaryResult): Pick<ResponseMetadata, 'dataState' | 'source'> {
  if (result.state === 'FORMAT_UNRECOGNIZED') {
    return {
      dataState: result.state,
      source: { sourceIdentifier: result.sourceIdentifier, fetchedAt: result.fetchedAt },
    };
  }
  return {
    dataState: result.state,
    source: {
      sourceIdentifier: result.summary.sourceIdentifier,
      fetchedAt: result.summary.fetchedAt,
    },
  };
}
