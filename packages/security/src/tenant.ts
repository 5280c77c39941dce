/**
 * Tenant scoping.
 *
 * Records are keyed as `<tenantId>:<key>` so one tenant can never address another
 * tenant's data, and storage path segments derived from identities are restricted to
 * a safe character set so they cannot climb out of their directory.
 */

export interface TenantContext {
  tenantId: string;
}

const SAFE_SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

export class TenantBoundaryViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TenantBoundaryViolationError';
  }
}

export class UnsafePathSegmentError extends Error {
  constructor(label: string, value: string) {
    super(`${label} "${value}" is not a safe storage path segment`);
    this.name = 'UnsafePathSegmentError';
  }
}

export function scopeKey(ctx: TenantContext, key: string): string {
  if (!ctx.tenantId) {
    throw new Error('TenantContext.tenantId is required');
  }
  if (!key) {
    throw new Error('Key is required');
  }
  return `${ctx.tenantId}:${key}`;
}

export function extractTenantId(scopedKey: string): string | null {
  const colonIndex = scopedKey.indexOf(':');
  if (colonIndex <= 0) {
    return null;
  }
  return scopedKey.slice(0, colonIndex);
}

export function unscopeKey(ctx: TenantContext, scopedKey: string): string {
  if (!validateKeyBelongsToTenant(ctx, scopedKey)) {
    throw new TenantBoundaryViolationError(
      `Key ${scopedKey} does not belong to tenant ${ctx.tenantId}`
    );
  }
  return scopedKey.slice(ctx.tenantId.length + 1);
}

export function validateKeyBelongsToTenant(ctx: TenantContext, scopedKey: string): boolean {
  return extractTenantId(scopedKey) === ctx.tenantId;
}

/**
 * Returns the value unchanged when it is usable as a single storage path segment.
 */
export function assertSafePathSegment(label: string, value: string): string {
  if (!SAFE_SEGMENT_PATTERN.test(value)) {
    throw new UnsafePathSegmentError(label, value);
  }
  return value;
}

/**
 * In-memory map partitioned by tenant. Lookups from the wrong tenant behave as misses;
 * raw scoped keys from another tenant are refused outright.
 */
export class TenantIsolatedStore<T> {
  private data = new Map<string, T>();

  write(ctx: TenantContext, key: string, value: T): void {
    this.data.set(scopeKey(ctx, key), value);
  }

  read(ctx: TenantContext, key: string): T | undefined {
    return this.data.get(scopeKey(ctx, key));
  }

  readByKey(ctx: TenantContext, scopedKey: string): T | undefined {
    if (!validateKeyBelongsToTenant(ctx, scopedKey)) {
      throw new TenantBoundaryViolationError(
        `Cross-tenant access denied: key ${scopedKey} does not belong to tenant ${ctx.tenantId}`
      );
    }
    return this.data.get(scopedKey);
  }

  delete(ctx: TenantContext, key: string): boolean {
    return this.data.delete(scopeKey(ctx, key));
  }

  /** Values for one tenant, in insertion order. */
  list(ctx: TenantContext): T[] {
    const prefix = `${ctx.tenantId}:`;
    const values: T[] = [];
    for (const [key, value] of this.data) {
      if (key.startsWith(prefix)) {
        values.push(value);
      }
    }
    return values;
  }
}
