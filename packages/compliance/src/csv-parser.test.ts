import { describe, it, expect } from 'vitest';
import { parseCsv, splitCsvRecords } from './csv-parser.js';
import { MalformedInputError } from './errors.js';

const encode = (text: string) => new TextEncoder().encode(text);

describe('csv-parser', () => {
  it('maps data lines to rows keyed by header', () => {
    const table = parseCsv(encode('Framework,Compliance_Score,Status\nAged Care,53.5,Missing\n'));

    expect(table.headers).toEqual(['Framework', 'Compliance_Score', 'Status']);
    expect(table.rows).toEqual([
      { Framework: 'Aged Care', Compliance_Score: '53.5', Status: 'Missing' },
    ]);
  });

  it('strips a byte-order mark and accepts CRLF line endings', () => {
    const table = parseCsv(encode('\uFEFFFramework,Status\r\nNDIS,Complete\r\n'));

    expect(table.headers).toEqual(['Framework', 'Status']);
    expect(table.rows).toEqual([{ Framework: 'NDIS', Status: 'Complete' }]);
  });

  it('keeps commas, quotes and line breaks inside quoted fields', () => {
    const records = splitCsvRecords('a,b\n"Care, Aged","say ""hi""\nthere"\n');

    expect(records).toEqual([
      ['a', 'b'],
      ['Care, Aged', 'say "hi"\nthere'],
    ]);
  });

  it('leaves absent trailing fields undefined and ignores surplus fields', () => {
    const table = parseCsv('Framework,Compliance_Score,Status\nNDIS,30.3\nAged Care,53.5,Missing,extra\n');

    expect(table.rows[0]).toEqual({ Framework: 'NDIS', Compliance_Score: '30.3', Status: undefined });
    expect(table.rows[1]).toEqual({ Framework: 'Aged Care', Compliance_Score: '53.5', Status: 'Missing' });
  });

  it('trims header names and skips blank lines', () => {
    const table = parseCsv(' Framework , Status \n\nNDIS,Missing\n\n');

    expect(table.headers).toEqual(['Framework', 'Status']);
    expect(table.rows).toHaveLength(1);
  });

  it('returns no rows for a header-only file', () => {
    const table = parseCsv('Framework,Compliance_Score,Status\n');

    expect(table.rows).toEqual([]);
  });

  it('rejects input without a header line', () => {
    expect(() => parseCsv('')).toThrow(MalformedInputError);
    expect(() => parseCsv('  \n\n')).toThrow('Malformed compliance file: no header line');
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(() => parseCsv(new Uint8Array([0x46, 0xff, 0xfe, 0x0a]))).toThrow(MalformedInputError);
  });

  it('rejects an unterminated quoted field', () => {
    expect(() => parseCsv('Framework,Status\n"NDIS,Missing\n')).toThrow(
      'Malformed compliance file: unterminated quoted field'
    );
  });
});
