import {
  TenantBoundaryViolationError,
  TenantIsolatedStore,
  scopeKey,
  unscopeKey,
  validateKeyBelongsToTenant,
} from '@carecomply/security';

export interface TenantContext {
  tenantId: string;
  actorId: string;
}

export interface DocumentRecord {
  /** Tenant-scoped id: `<tenantId>:document-<n>`. */
  documentId: string;
  tenantId: string;
  storageKey: string;
  originalFileName: string;
  fileName: string;
  contentType: string;
  sizeBytes: number;
  contentHash: string;
  uploadedAt: string;
  uploadedBy: string;
}

export interface CreateDocumentInput {
  storageKey: string;
  originalFileName: string;
  fileName: string;
  contentType: string;
  sizeBytes: number;
  contentHash: string;
  uploadedAt: string;
}

/**
 * Evidence document metadata. Content lives in object storage under `storageKey`.
 * Ids from another tenant behave as unknown ids.
 */
export interface DocumentStore {
  createDocument(ctx: TenantContext, input: CreateDocumentInput): Promise<DocumentRecord>;
  /** Newest first. */
  listDocuments(ctx: TenantContext): Promise<DocumentRecord[]>;
  getDocument(ctx: TenantContext, documentId: string): Promise<DocumentRecord | undefined>;
  deleteDocument(ctx: TenantContext, documentId: string): Promise<boolean>;
}

export class InMemoryDocumentStore implements DocumentStore {
  private documents = new TenantIsolatedStore<DocumentRecord>();
  private counters = new Map<string, number>();

  private nextSequence(ctx: TenantContext): number {
    const nextValue = (this.counters.get(ctx.tenantId) ?? 0) + 1;
    this.counters.set(ctx.tenantId, nextValue);
    return nextValue;
  }

  async createDocument(ctx: TenantContext, input: CreateDocumentInput): Promise<DocumentRecord> {
    const id = `document-${this.nextSequence(ctx)}`;
    const record: DocumentRecord = {
      documentId: scopeKey(ctx, id),
      tenantId: ctx.tenantId,
      ...input,
      uploadedBy: ctx.actorId,
    };
    this.documents.write(ctx, id, record);
    return record;
  }

  async listDocuments(ctx: TenantContext): Promise<DocumentRecord[]> {
    return this.documents.list(ctx).reverse();
  }

  async getDocument(ctx: TenantContext, documentId: string): Promise<DocumentRecord | undefined> {
    if (!validateKeyBelongsToTenant(ctx, documentId)) {
      return undefined;
    }
    return this.documents.readByKey(ctx, documentId);
  }

  async deleteDocument(ctx: TenantContext, documentId: string): Promise<boolean> {
    try {
      return this.documents.delete(ctx, unscopeKey(ctx, documentId));
    } catch (error) {
      if (error instanceof TenantBoundaryViolationError) {
        return false;
      }
      throw error;
    }
  }
}
