import { StorageKeyError } from './errors';

/**
 * Normalizes an object key to `a/b/c` form.
 * Rejects empty keys and any `.` or `..` segment so a key can never leave its container.
 */
export function normalizeKey(key: string): string {
  const trimmed = key.trim().replace(/\\/g, '/');
  if (trimmed.startsWith('/')) {
    throw new StorageKeyError(key, 'absolute keys are not allowed');
  }

  const segments = trimmed.split('/').filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new StorageKeyError(key, 'key is empty');
  }
  if (segments.some((segment) => segment === '.' || segment === '..')) {
    throw new StorageKeyError(key, 'relative segments are not allowed');
  }

  return segments.join('/');
}

/**
 * Normalizes a listing prefix. An empty prefix lists the whole container.
 */
export function normalizePrefix(prefix?: string): string {
  if (!prefix) return '';
  const stripped = prefix.replace(/^\/+|\/+$/g, '');
  if (!stripped) return '';
  return normalizeKey(stripped);
}

export function joinKey(...parts: string[]): string {
  return normalizeKey(parts.filter(Boolean).join('/'));
}
