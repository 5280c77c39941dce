export type ComplianceDataErrorCode = 'MALFORMED_INPUT' | 'SCHEMA_MISMATCH';

/**
 * Whole-file failures. Row-level defects never raise; they are dropped or mapped to Unknown.
 */
export abstract class ComplianceDataError extends Error {
  abstract readonly code: ComplianceDataErrorCode;
}

export class MalformedInputError extends ComplianceDataError {
  readonly code = 'MALFORMED_INPUT';

  constructor(reason: string) {
    super(`Malformed compliance file: ${reason}`);
    this.name = 'MalformedInputError';
  }
}

export class SchemaMismatchError extends ComplianceDataError {
  readonly code = 'SCHEMA_MISMATCH';
  readonly missingColumns: readonly string[];

  constructor(missingColumns: readonly string[]) {
    super(`Compliance file is missing required columns: ${missingColumns.join(', ')}`);
    this.name = 'SchemaMismatchError';
    this.missingColumns = missingColumns;
  }
}
