/**
 * Evidence upload validation: extension allow-list, size limit, content signature,
 * and a storage-safe file name.
 */

import { randomUUID } from 'node:crypto';
import { formatFileSize } from '@carecomply/compliance';
import { assertSafePathSegment } from '@carecomply/security';

export const ALLOWED_EXTENSIONS = {
  '.pdf': 'application/pdf',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
} as const;

export type AllowedExtension = keyof typeof ALLOWED_EXTENSIONS;

export type FileValidationErrorCode =
  | 'NO_FILE_SELECTED'
  | 'UNSUPPORTED_TYPE'
  | 'EMPTY_FILE'
  | 'FILE_TOO_LARGE'
  | 'INVALID_PDF'
  | 'INVALID_DOCX';

export type FileValidationResult =
  | {
      success: true;
      originalFileName: string;
      safeFileName: string;
      contentType: string;
      sizeBytes: number;
    }
  | {
      success: false;
      errorCode: FileValidationErrorCode;
      error: string;
    };

const PDF_SIGNATURE = Buffer.from('%PDF');
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const MAX_FILE_NAME_LENGTH = 255;

function isAllowedExtension(value: string): value is AllowedExtension {
  return Object.prototype.hasOwnProperty.call(ALLOWED_EXTENSIONS, value);
}

/** Lower-cased extension including the dot; dotfiles have none. */
export function extensionOf(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? '';
  const index = base.lastIndexOf('.');
  return index > 0 ? base.slice(index).toLowerCase() : '';
}

export function sanitizeFileName(fileName: string): string {
  let safe = fileName
    .normalize('NFKD')
    .split(/[\\/\s]+/)
    .filter(Boolean)
    .join('_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');

  if (!safe) {
    safe = `unnamed_file${extensionOf(fileName)}`;
  }

  if (safe.length > MAX_FILE_NAME_LENGTH) {
    const extension = extensionOf(safe);
    safe = safe.slice(0, MAX_FILE_NAME_LENGTH - extension.length) + extension;
  }
  return safe;
}

export function validateEvidenceFile(
  fileName: string,
  content: Buffer,
  maxBytes: number
): FileValidationResult {
  const trimmedName = fileName.trim();
  if (!trimmedName) {
    return { success: false, errorCode: 'NO_FILE_SELECTED', error: 'No file selected' };
  }

  const extension = extensionOf(trimmedName);
  if (!isAllowedExtension(extension)) {
    return {
      success: false,
      errorCode: 'UNSUPPORTED_TYPE',
      error: `File type not allowed. Supported formats: ${Object.keys(ALLOWED_EXTENSIONS).join(', ')}`,
    };
  }

  if (content.length === 0) {
    return { success: false, errorCode: 'EMPTY_FILE', error: 'File is empty' };
  }

  if (content.length > maxBytes) {
    return {
      success: false,
      errorCode: 'FILE_TOO_LARGE',
      error: `File size (${formatFileSize(content.length)}) exceeds maximum allowed size (${formatFileSize(maxBytes)})`,
    };
  }

  if (extension === '.pdf' && !content.subarray(0, PDF_SIGNATURE.length).equals(PDF_SIGNATURE)) {
    return { success: false, errorCode: 'INVALID_PDF', error: 'File does not appear to be a valid PDF' };
  }
  if (extension === '.docx' && !content.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE)) {
    return {
      success: false,
      errorCode: 'INVALID_DOCX',
      error: 'File does not appear to be a valid DOCX document',
    };
  }

  return {
    success: true,
    originalFileName: trimmedName,
    safeFileName: sanitizeFileName(trimmedName),
    contentType: ALLOWED_EXTENSIONS[extension],
    sizeBytes: content.length,
  };
}

function formatKeyTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * `{tenant}/{user}/{yyyyMMdd_HHmmss}_{id}_{safeFileName}`
 *
 * @throws {UnsafePathSegmentError} when the tenant or user id cannot be a path segment
 */
export function buildDocumentStorageKey(
  tenantId: string,
  userId: string,
  safeFileName: string,
  now: Date,
  uniqueId: string = randomUUID().slice(0, 8)
): string {
  const tenant = assertSafePathSegment('tenantId', tenantId);
  const user = assertSafePathSegment('userId', userId);
  return `${tenant}/${user}/${formatKeyTimestamp(now)}_${uniqueId}_${safeFileName}`;
}
