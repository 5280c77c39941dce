/**
 * CSV reader for scoring-pipeline output.
 *
 * UTF-8, comma separated, first non-blank line is the header. Quoting follows RFC 4180.
 * Rows are keyed by header name; a short row leaves its trailing columns undefined and
 * surplus fields are ignored, because the producer is outside our control.
 */

import { TextDecoder } from 'node:util';
import { MalformedInputError } from './errors.js';
import type { ParsedTable, RawComplianceRow } from './types.js';

const BYTE_ORDER_MARK = '\uFEFF';

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new MalformedInputError(
      `content is not valid UTF-8 (${error instanceof Error ? error.message : String(error)})`
    );
  }
}

/**
 * Splits text into records of raw field values.
 * @throws {MalformedInputError} when a quoted field is never closed
 */
export function splitCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endRecord = () => {
    record.push(field);
    records.push(record);
    record = [];
    field = '';
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i += 1;
        continue;
      }
      field += ch;
      i += 1;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
      i += 1;
      continue;
    }
    if (ch === ',') {
      record.push(field);
      field = '';
      i += 1;
      continue;
    }
    if (ch === '\r' && text[i + 1] === '\n') {
      endRecord();
      i += 2;
      continue;
    }
    if (ch === '\n' || ch === '\r') {
      endRecord();
      i += 1;
      continue;
    }

    field += ch;
    i += 1;
  }

  if (inQuotes) {
    throw new MalformedInputError('unterminated quoted field');
  }
  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

function isBlankRecord(record: string[]): boolean {
  return record.length === 1 && record[0].trim() === '';
}

export function parseCsv(input: Uint8Array | string): ParsedTable {
  const decoded = typeof input === 'string' ? input : decodeUtf8(input);
  const text = decoded.startsWith(BYTE_ORDER_MARK) ? decoded.slice(1) : decoded;

  const records = splitCsvRecords(text).filter((record) => !isBlankRecord(record));
  if (records.length === 0) {
    throw new MalformedInputError('no header line');
  }

  const [headerRecord, ...dataRecords] = records;
  const headers = headerRecord.map((header) => header.trim());

  const rows: RawComplianceRow[] = dataRecords.map((fields) => {
    const row: Record<string, string | undefined> = {};
    headers.forEach((header, index) => {
      // First occurrence of a repeated header wins.
      if (header && !Object.prototype.hasOwnProperty.call(row, header)) {
        row[header] = fields[index];
      }
    });
    return Object.freeze(row);
  });

  return { headers, rows };
}
