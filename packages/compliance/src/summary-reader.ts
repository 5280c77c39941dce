/**
 * Read path for compliance summaries: fetch, parse, normalize.
 *
 * Every call goes back to storage. Nothing is cached between calls, and nothing is
 * substituted when the file is absent: callers render an explicit no-data state instead.
 */

import {
  StorageNotFoundError,
  type StorageProvider,
  type StoredObjectMetadata,
} from '@carecomply/storage';
import { parseCsv } from './csv-parser.js';
import { ComplianceDataError, type ComplianceDataErrorCode } from './errors.js';
import { createEmptyComplianceSummary, normalizeComplianceSummary } from './normalizer.js';
import {
  buildScopeDirectories,
  buildSummaryCandidatePaths,
  buildSummaryPath,
  fileNameOf,
  type SummaryLocation,
} from './summary-path.js';
import type { ComplianceScope, ComplianceSummary, ISOTimestamp } from './types.js';

export type NoDataReason = 'NOT_FOUND' | 'FETCH_FAILED';

export type ComplianceSummaryResult =
  | {
      state: 'READY';
      summary: ComplianceSummary;
    }
  | {
      state: 'NO_DATA';
      reason: NoDataReason;
      summary: ComplianceSummary;
    }
  | {
      state: 'FORMAT_UNRECOGNIZED';
      errorCode: ComplianceDataErrorCode;
      message: string;
      sourceIdentifier: string;
      fetchedAt: ISOTimestamp;
    };

export interface ReadSummaryOptions {
  now: Date;
}

type FetchOutcome =
  | { kind: 'found'; path: string; content: Buffer }
  | { kind: 'missing' }
  | { kind: 'failed'; path: string; error: unknown };

async function fetchFirstExisting(
  storage: StorageProvider,
  paths: readonly string[]
): Promise<FetchOutcome> {
  for (const path of paths) {
    try {
      const content = await storage.get(path);
      return { kind: 'found', path, content };
    } catch (error) {
      if (error instanceof StorageNotFoundError) {
        continue;
      }
      return { kind: 'failed', path, error };
    }
  }
  return { kind: 'missing' };
}

/**
 * Reads the scope's summary for the month containing `options.now`.
 *
 * Absent files and storage failures resolve to NO_DATA; structural problems with the file
 * resolve to FORMAT_UNRECOGNIZED. Only unexpected programming errors reject.
 */
export async function readComplianceSummary(
  storage: StorageProvider,
  location: SummaryLocation,
  scope: ComplianceScope,
  options: ReadSummaryOptions
): Promise<ComplianceSummaryResult> {
  const fetchedAt = options.now.toISOString();
  const candidates = buildSummaryCandidatePaths(location, scope, options.now);
  const outcome = await fetchFirstExisting(storage, candidates);

  if (outcome.kind === 'missing') {
    const sourceIdentifier = buildSummaryPath(location, scope, options.now);
    console.log(`[SUMMARY] No summary for user ${scope.userId} (searched ${candidates.length} paths)`);
    return {
      state: 'NO_DATA',
      reason: 'NOT_FOUND',
      summary: createEmptyComplianceSummary({ sourceIdentifier, fetchedAt }),
    };
  }

  if (outcome.kind === 'failed') {
    console.error(`[SUMMARY] Failed to fetch ${outcome.path}:`, outcome.error);
    return {
      state: 'NO_DATA',
      reason: 'FETCH_FAILED',
      summary: createEmptyComplianceSummary({ sourceIdentifier: outcome.path, fetchedAt }),
    };
  }

  try {
    const table = parseCsv(outcome.content);
    const summary = normalizeComplianceSummary(table, {
      sourceIdentifier: outcome.path,
      fetchedAt,
    });
    console.log(
      `[SUMMARY] Loaded ${summary.frameworks.length} frameworks from ${outcome.path}`
    );
    return { state: 'READY', summary };
  } catch (error) {
    if (error instanceof ComplianceDataError) {
      console.warn(`[SUMMARY] Unrecognized format in ${outcome.path}: ${error.message}`);
      return {
        state: 'FORMAT_UNRECOGNIZED',
        errorCode: error.code,
        message: error.message,
        sourceIdentifier: outcome.path,
        fetchedAt,
      };
    }
    throw error;
  }
}

export type ComplianceFileLabel = 'Compliance Summary' | 'Multiple Frameworks';

export interface ComplianceFileInfo {
  fileName: string;
  path: string;
  label: ComplianceFileLabel;
  sizeBytes: number;
  lastModified: ISOTimestamp;
}

function labelFor(fileName: string): ComplianceFileLabel {
  return fileName.toLowerCase().includes('summary') ? 'Compliance Summary' : 'Multiple Frameworks';
}

export interface ComplianceFileListing {
  files: ComplianceFileInfo[];
  /** Set when the listing is empty: nothing stored, or storage could not be listed. */
  reason?: NoDataReason;
}

function toFileInfo(object: StoredObjectMetadata): ComplianceFileInfo {
  const fileName = fileNameOf(object.key);
  return {
    fileName,
    path: object.key,
    label: labelFor(fileName),
    sizeBytes: object.sizeBytes,
    lastModified: object.lastModified,
  };
}

/**
 * Lists CSV results for the scope's current month, newest first.
 * Directories are searched most specific first; the first one holding files wins.
 * Storage failures resolve to an empty listing with `reason: 'FETCH_FAILED'`.
 */
export async function listComplianceFiles(
  storage: StorageProvider,
  location: SummaryLocation,
  scope: ComplianceScope,
  now: Date
): Promise<ComplianceFileListing> {
  for (const directory of buildScopeDirectories(location, scope, now)) {
    let objects: StoredObjectMetadata[];
    try {
      objects = await storage.list(directory);
    } catch (error) {
      if (error instanceof StorageNotFoundError) {
        continue;
      }
      console.error(`[SUMMARY] Failed to list ${directory}:`, error);
      return { files: [], reason: 'FETCH_FAILED' };
    }

    const files = objects
      .filter((object) => object.key.toLowerCase().endsWith('.csv'))
      .map(toFileInfo);

    if (files.length > 0) {
      return {
        files: files.sort(
          (a, b) => b.lastModified.localeCompare(a.lastModified) || a.path.localeCompare(b.path)
        ),
      };
    }
  }
  return { files: [], reason: 'NOT_FOUND' };
}
