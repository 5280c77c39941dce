import { describe, it, expect } from 'vitest';
import { UnsafePathSegmentError } from '@carecomply/security';
import {
  buildDocumentStorageKey,
  extensionOf,
  sanitizeFileName,
  validateEvidenceFile,
} from './file-validation';

const PDF = Buffer.from('%PDF-1.7\nbody');
const DOCX = Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.from('word/document.xml')]);

describe('file-validation', () => {
  describe('extensionOf', () => {
    it('lower-cases the extension', () => {
      expect(extensionOf('Policy.PDF')).toBe('.pdf');
      expect(extensionOf('folder/archive.tar.docx')).toBe('.docx');
    });

    it('treats dotfiles and bare names as having no extension', () => {
      expect(extensionOf('.pdf')).toBe('');
      expect(extensionOf('README')).toBe('');
    });
  });

  describe('sanitizeFileName', () => {
    it('replaces whitespace and drops unsafe characters', () => {
      expect(sanitizeFileName('My Report (final).pdf')).toBe('My_Report_final.pdf');
    });

    it('flattens path traversal', () => {
      expect(sanitizeFileName('../../etc/passwd.pdf')).toBe('etc_passwd.pdf');
    });

    it('strips accents', () => {
      expect(sanitizeFileName('Café menu.docx')).toBe('Cafe_menu.docx');
    });

    it('falls back when nothing safe remains', () => {
      expect(sanitizeFileName('***')).toBe('unnamed_file');
    });

    it('keeps the extension when truncating', () => {
      const safe = sanitizeFileName(`${'a'.repeat(300)}.pdf`);
      expect(safe).toHaveLength(255);
      expect(safe.endsWith('a.pdf')).toBe(true);
    });
  });

  describe('validateEvidenceFile', () => {
    it('accepts a PDF', () => {
      expect(validateEvidenceFile(' Policy Manual.pdf ', PDF, 1024)).toEqual({
        success: true,
        originalFileName: 'Policy Manual.pdf',
        safeFileName: 'Policy_Manual.pdf',
        contentType: 'application/pdf',
        sizeBytes: PDF.length,
      });
    });

    it('accepts a DOCX', () => {
      const result = validateEvidenceFile('training.docx', DOCX, 1024);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.contentType).toBe(
          'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
        );
      }
    });

    it('rejects a missing name', () => {
      expect(validateEvidenceFile('  ', PDF, 1024)).toEqual({
        success: false,
        errorCode: 'NO_FILE_SELECTED',
        error: 'No file selected',
      });
    });

    it('rejects other extensions', () => {
      expect(validateEvidenceFile('notes.txt', Buffer.from('hello'), 1024)).toEqual({
        success: false,
        errorCode: 'UNSUPPORTED_TYPE',
        error: 'File type not allowed. Supported formats: .pdf, .docx',
      });
    });

    it('rejects empty content', () => {
      const result = validateEvidenceFile('empty.pdf', Buffer.alloc(0), 1024);
      expect(result).toEqual({ success: false, errorCode: 'EMPTY_FILE', error: 'File is empty' });
    });

    it('rejects content over the limit', () => {
      expect(validateEvidenceFile('big.pdf', Buffer.from('%PDF-0123'), 8)).toEqual({
        success: false,
        errorCode: 'FILE_TOO_LARGE',
        error: 'File size (9.0 B) exceeds maximum allowed size (8.0 B)',
      });
    });

    it('checks the content signature', () => {
      expect(validateEvidenceFile('fake.pdf', DOCX, 1024)).toMatchObject({ errorCode: 'INVALID_PDF' });
      expect(validateEvidenceFile('fake.docx', PDF, 1024)).toMatchObject({ errorCode: 'INVALID_DOCX' });
    });
  });

  describe('buildDocumentStorageKey', () => {
    it('prefixes tenant and user and stamps the UTC time', () => {
      const key = buildDocumentStorageKey(
        'tenant-a',
        'user_1',
        'Policy.pdf',
        new Date('2026-03-05T07:08:09Z'),
        'abcd1234'
      );
      expect(key).toBe('tenant-a/user_1/20260305_070809_abcd1234_Policy.pdf');
    });

    it('generates a short id by default', () => {
      const key = buildDocumentStorageKey('tenant-a', 'user_1', 'a.pdf', new Date('2026-03-05T07:08:09Z'));
      expect(key).toMatch(/^tenant-a\/user_1\/20260305_070809_[0-9a-f]{8}_a\.pdf$/);
    });

    it('rejects ids that are not path segments', () => {
      expect(() => buildDocumentStorageKey('tenant:a', 'user', 'a.pdf', new Date())).toThrow(
        UnsafePathSegmentError
      );
      expect(() => buildDocumentStorageKey('tenant', '../user', 'a.pdf', new Date())).toThrow(
        'userId "../user" is not a safe storage path segment'
      );
    });
  });
});
