import { createHash } from 'node:crypto';
import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { z, type ZodError } from 'zod';
import {
  REPORT_TYPES,
  buildComplianceReport,
  createEmptyComplianceSummary,
  listComplianceFiles,
  readComplianceSummary,
  renderReportMarkdown,
  toDashboardTile,
  toGapAnalysisView,
  formatFileSize,
  type ComplianceScope,
  type ComplianceSummary,
  type ComplianceSummaryResult,
  type ReportContext,
} from '@carecomply/compliance';
import { UnsafePathSegmentError } from '@carecomply/security';
import {
  StorageNotFoundError,
  isStorageConfigured,
  type StorageProvider,
} from '@carecomply/storage';
import { createAuthMiddleware, createAuthResolver, type AuthResolver } from './auth';
import { validateApiConfig, type ApiConfig } from './config';
import {
  ALLOWED_EXTENSIONS,
  buildDocumentStorageKey,
  validateEvidenceFile,
} from './file-validation';
import { buildResponseMetadata, summaryMetadata, type ResponseMetadata } from './metadata';
import {
  InMemoryDocumentStore,
  type DocumentRecord,
  type DocumentStore,
  type TenantContext,
} from './store';

export interface AppDependencies {
  config: ApiConfig;
  documentsStorage: StorageProvider;
  resultsStorage: StorageProvider;
  store?: DocumentStore;
  /** Replaces Clerk and test-token resolution. */
  authResolver?: AuthResolver;
  now?: () => Date;
}

export interface CreatedApp {
  app: express.Express;
  store: DocumentStore;
}

const RECENT_DOCUMENTS_LIMIT = 5;

const zId = z.string().trim().min(1);

const zQueryString = z.preprocess(
  (value) => (Array.isArray(value) ? value[0] : value),
  z.string().trim().min(1).max(200)
);
const zOptionalQueryString = zQueryString.optional();

const zBase64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'Invalid base64 content');

const zReportType = z.enum(REPORT_TYPES);

const zReportQuery = z
  .object({
    organisationName: zOptionalQueryString,
    framework: zOptionalQueryString,
  })
  .strip();

const zDocumentBody = z
  .object({
    fileName: z.string().max(1024),
    contentBase64: zBase64,
  })
  .strip();

type ValidationIssue = {
  path: string;
  message: string;
  code: string;
};

function formatZodIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

function getContext(req: express.Request): TenantContext {
  return { tenantId: req.auth.tenantId, actorId: req.auth.actorId };
}

function getScope(req: express.Request): ComplianceScope {
  return { userId: req.auth.userId, organizationId: req.auth.organizationId };
}

function mapDocumentRecord(record: DocumentRecord) {
  return {
    documentId: record.documentId,
    fileName: record.fileName,
    originalFileName: record.originalFileName,
    contentType: record.contentType,
    sizeBytes: record.sizeBytes,
    contentHash: record.contentHash,
    uploadedAt: record.uploadedAt,
    uploadedBy: record.uploadedBy,
  };
}

/** The summary to present; an empty one when the file could not be interpreted. */
function presentableSummary(result: ComplianceSummaryResult): ComplianceSummary {
  if (result.state === 'FORMAT_UNRECOGNIZED') {
    return createEmptyComplianceSummary({
      sourceIdentifier: result.sourceIdentifier,
      fetchedAt: result.fetchedAt,
    });
  }
  return result.summary;
}

function formatError(result: ComplianceSummaryResult) {
  return result.state === 'FORMAT_UNRECOGNIZED'
    ? { errorCode: result.errorCode, message: result.message }
    : undefined;
}

function isPayloadTooLarge(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.too.large'
  );
}

export function createApp(deps: AppDependencies): CreatedApp {
  const { config, documentsStorage, resultsStorage } = deps;
  const store = deps.store ?? new InMemoryDocumentStore();
  const now = deps.now ?? (() => new Date());
  const authResolver = deps.authResolver ?? createAuthResolver(config.auth);
  const app = express();

  function sendWithMetadata(
    res: express.Response,
    payload: object,
    metadataOverrides?: Partial<ResponseMetadata>
  ): void {
    res.json({
      ...buildResponseMetadata({ ...metadataOverrides, apiVersion: config.apiVersion }),
      ...payload,
    });
  }

  function sendError(
    res: express.Response,
    status: number,
    message: string,
    extra: Record<string, unknown> = {}
  ): void {
    res.status(status).json({
      ...buildResponseMetadata({ apiVersion: config.apiVersion }),
      error: message,
      ...extra,
    });
  }

  function validateRequest<T>(
    req: express.Request,
    res: express.Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T | null {
    const result = schema.safeParse({
      params: req.params ?? {},
      query: req.query ?? {},
      body: req.body ?? {},
    });
    if (!result.success) {
      res.status(400).json({
        ...buildResponseMetadata({ apiVersion: config.apiVersion }),
        error: 'VALIDATION_ERROR',
        message: 'Invalid request',
        issues: formatZodIssues(result.error),
      });
      return null;
    }
    return result.data;
  }

  function readSummary(req: express.Request): Promise<ComplianceSummaryResult> {
    return readComplianceSummary(resultsStorage, config.summaryLocation, getScope(req), {
      now: now(),
    });
  }

  /** Shared failure path for summary-backed routes. */
  function handleSummaryFailure(res: express.Response, tag: string, error: unknown): void {
    if (error instanceof UnsafePathSegmentError) {
      sendError(res, 400, 'Invalid user or organisation identifier');
      return;
    }
    console.error(`[${tag}] Failed:`, error);
    sendError(res, 500, 'Failed to load compliance data');
  }

  async function buildReportContext(
    req: express.Request,
    query: z.infer<typeof zReportQuery>
  ): Promise<ReportContext> {
    const documents = await store.listDocuments(getContext(req));
    return {
      organisation: {
        name: query.organisationName ?? config.reports.organisationName ?? req.auth.tenantId,
        framework: query.framework ?? config.reports.framework,
      },
      preparedAt: now().toISOString(),
      documents: documents.map((document) => ({
        fileName: document.originalFileName,
        sizeBytes: document.sizeBytes,
        uploadedAt: document.uploadedAt,
      })),
    };
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an Origin header (curl, server-to-server) are allowed
        if (!origin || config.allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Tenant-Id'],
    })
  );

  if (config.rateLimit.enabled) {
    app.use(
      rateLimit({
        windowMs: config.rateLimit.windowMs,
        max: config.rateLimit.max,
        standardHeaders: true,
        legacyHeaders: false,
        message: 'Too many requests from this IP, please try again later.',
      })
    );
  }

  app.get('/health', (_req, res) => {
    const { warnings, errors } = validateApiConfig(config);
    const codes: string[] = [];
    if (config.auth.testAuth) codes.push('demo_tokens_active');
    if (!config.auth.clerkSecretKey) codes.push('no_clerk_secret');
    if (store instanceof InMemoryDocumentStore) codes.push('in_memory_store');

    res.status(200).json({
      status: errors.length > 0 ? 'degraded' : 'ok',
      config: {
        auth: config.auth.clerkSecretKey ? 'clerk' : config.auth.testAuth ? 'test_tokens' : 'none',
        documentsStorage: documentsStorage.describe(),
        resultsStorage: resultsStorage.describe(),
        nodeEnv: config.nodeEnv,
      },
      warnings: codes.length > 0 ? codes : undefined,
      messages: warnings.length + errors.length > 0 ? [...errors, ...warnings] : undefined,
    });
  });

  // Base64 inflates content by 4/3
  const jsonLimit = Math.ceil((config.maxUploadBytes * 4) / 3) + 64 * 1024;
  app.use(express.json({ limit: jsonLimit }));

  app.use('/v1', createAuthMiddleware(authResolver, config.apiVersion));

  /**
   * GET /v1/compliance/summary
   *
   * Normalized summary for the caller's current month. Absent and unreadable files are
   * 200 responses with an explicit dataState.
   */
  app.get('/v1/compliance/summary', async (req, res) => {
    try {
      const result = await readSummary(req);
      sendWithMetadata(res, result, summaryMetadata(result));
    } catch (error) {
      handleSummaryFailure(res, 'SUMMARY', error);
    }
  });

  app.get('/v1/compliance/files', async (req, res) => {
    try {
      const { files, reason } = await listComplianceFiles(
        resultsStorage,
        config.summaryLocation,
        getScope(req),
        now()
      );
      sendWithMetadata(
        res,
        { files, totalCount: files.length, reason },
        { dataState: files.length > 0 ? 'READY' : 'NO_DATA' }
      );
    } catch (error) {
      handleSummaryFailure(res, 'SUMMARY', error);
    }
  });

  app.get('/v1/dashboard', async (req, res) => {
    try {
      const result = await readSummary(req);
      const documents = await store.listDocuments(getContext(req));
      sendWithMetadata(
        res,
        {
          tile: toDashboardTile(presentableSummary(result)),
          formatError: formatError(result),
          recentDocuments: documents.slice(0, RECENT_DOCUMENTS_LIMIT).map(mapDocumentRecord),
          totalDocuments: documents.length,
        },
        summaryMetadata(result)
      );
    } catch (error) {
      handleSummaryFailure(res, 'DASHBOARD', error);
    }
  });

  app.get('/v1/gap-analysis', async (req, res) => {
    try {
      const result = await readSummary(req);
      sendWithMetadata(
        res,
        { ...toGapAnalysisView(presentableSummary(result)), formatError: formatError(result) },
        summaryMetadata(result)
      );
    } catch (error) {
      handleSummaryFailure(res, 'GAP_ANALYSIS', error);
    }
  });

  /**
   * GET /v1/reports/:reportType.md
   *
   * Markdown rendition consumed by the PDF renderer. Registered before the JSON route,
   * which would otherwise capture the extension.
   */
  app.get('/v1/reports/:reportType.md', async (req, res) => {
    const parsed = validateRequest(
      req,
      res,
      z.object({ params: z.object({ reportType: zReportType }), query: zReportQuery })
    );
    if (!parsed) return;

    try {
      const result = await readSummary(req);
      const context = await buildReportContext(req, parsed.query);
      const report = buildComplianceReport(parsed.params.reportType, presentableSummary(result), context);
      console.log(`[REPORTS] Rendered ${report.reportType} for tenant ${req.auth.tenantId}`);

      res.setHeader('Content-Type', 'text/markdown; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${report.reportType}.md"`);
      res.setHeader('X-Data-State', result.state);
      res.send(renderReportMarkdown(report));
    } catch (error) {
      handleSummaryFailure(res, 'REPORTS', error);
    }
  });

  app.get('/v1/reports/:reportType', async (req, res) => {
    const parsed = validateRequest(
      req,
      res,
      z.object({ params: z.object({ reportType: zReportType }), query: zReportQuery })
    );
    if (!parsed) return;

    try {
      const result = await readSummary(req);
      const context = await buildReportContext(req, parsed.query);
      const report = buildComplianceReport(parsed.params.reportType, presentableSummary(result), context);
      sendWithMetadata(res, { report, formatError: formatError(result) }, summaryMetadata(result));
    } catch (error) {
      handleSummaryFailure(res, 'REPORTS', error);
    }
  });

  app.get('/v1/documents/upload-info', (_req, res) => {
    sendWithMetadata(res, {
      maxFileSizeBytes: config.maxUploadBytes,
      maxFileSizeFormatted: formatFileSize(config.maxUploadBytes),
      allowedExtensions: Object.keys(ALLOWED_EXTENSIONS),
      storageConfigured: isStorageConfigured(config.storage.documents),
    });
  });

  /**
   * POST /v1/documents/validate
   *
   * Client-side pre-check. Validation failures are reported in the body, not as errors.
   */
  app.post('/v1/documents/validate', (req, res) => {
    const parsed = validateRequest(req, res, z.object({ body: zDocumentBody }));
    if (!parsed) return;

    const content = Buffer.from(parsed.body.contentBase64, 'base64');
    const validation = validateEvidenceFile(parsed.body.fileName, content, config.maxUploadBytes);
    if (!validation.success) {
      sendWithMetadata(res, validation);
      return;
    }
    sendWithMetadata(res, {
      ...validation,
      sizeFormatted: formatFileSize(validation.sizeBytes),
    });
  });

  app.post('/v1/documents', async (req, res) => {
    const ctx = getContext(req);
    const parsed = validateRequest(req, res, z.object({ body: zDocumentBody }));
    if (!parsed) return;

    const content = Buffer.from(parsed.body.contentBase64, 'base64');
    const validation = validateEvidenceFile(parsed.body.fileName, content, config.maxUploadBytes);
    if (!validation.success) {
      sendError(res, 400, validation.error, { errorCode: validation.errorCode });
      return;
    }

    const uploadedAt = now();
    let storageKey: string;
    try {
      storageKey = buildDocumentStorageKey(
        req.auth.tenantId,
        req.auth.userId,
        validation.safeFileName,
        uploadedAt
      );
    } catch (error) {
      if (error instanceof UnsafePathSegmentError) {
        sendError(res, 400, 'Invalid tenant or user identifier');
        return;
      }
      console.error('[DOCUMENTS] Failed to build storage key:', error);
      sendError(res, 500, 'Failed to store document');
      return;
    }

    try {
      await documentsStorage.put(storageKey, content, validation.contentType);
    } catch (error) {
      console.error('[DOCUMENTS] Upload failed:', error);
      sendError(res, 500, 'Failed to store document');
      return;
    }

    try {
      const record = await store.createDocument(ctx, {
        storageKey,
        originalFileName: validation.originalFileName,
        fileName: validation.safeFileName,
        contentType: validation.contentType,
        sizeBytes: validation.sizeBytes,
        contentHash: `sha256:${createHash('sha256').update(content).digest('hex')}`,
        uploadedAt: uploadedAt.toISOString(),
      });
      console.log(`[DOCUMENTS] Uploaded ${storageKey} by ${ctx.actorId}`);
      sendWithMetadata(res, { document: mapDocumentRecord(record) });
    } catch (error) {
      console.error('[DOCUMENTS] Failed to record upload, removing stored object:', error);
      await documentsStorage.delete(storageKey).catch((cleanupError: unknown) => {
        console.error(`[DOCUMENTS] Cleanup of ${storageKey} failed:`, cleanupError);
      });
      sendError(res, 500, 'Failed to record document');
    }
  });

  app.get('/v1/documents', async (req, res) => {
    try {
      const documents = await store.listDocuments(getContext(req));
      sendWithMetadata(res, {
        documents: documents.map(mapDocumentRecord),
        totalCount: documents.length,
      });
    } catch (error) {
      console.error('[DOCUMENTS] List failed:', error);
      sendError(res, 500, 'Failed to list documents');
    }
  });

  /**
   * GET /v1/documents/:documentId
   *
   * Download. Another tenant's id is indistinguishable from an unknown one.
   */
  app.get('/v1/documents/:documentId', async (req, res) => {
    const parsed = validateRequest(req, res, z.object({ params: z.object({ documentId: zId }) }));
    if (!parsed) return;

    try {
      const record = await store.getDocument(getContext(req), parsed.params.documentId);
      if (!record) {
        sendError(res, 404, 'Document not found');
        return;
      }

      const content = await documentsStorage.get(record.storageKey);
      res.setHeader('Content-Type', record.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${record.fileName}"`);
      res.send(content);
    } catch (error) {
      if (error instanceof StorageNotFoundError) {
        console.warn(`[DOCUMENTS] Content missing for ${parsed.params.documentId}`);
        sendError(res, 404, 'Document content not found');
        return;
      }
      console.error('[DOCUMENTS] Download failed:', error);
      sendError(res, 500, 'Failed to download document');
    }
  });

  app.delete('/v1/documents/:documentId', async (req, res) => {
    const ctx = getContext(req);
    const parsed = validateRequest(req, res, z.object({ params: z.object({ documentId: zId }) }));
    if (!parsed) return;

    try {
      const record = await store.getDocument(ctx, parsed.params.documentId);
      if (!record) {
        sendError(res, 404, 'Document not found');
        return;
      }

      await documentsStorage.delete(record.storageKey);
      await store.deleteDocument(ctx, record.documentId);
      console.log(`[DOCUMENTS] Deleted ${record.storageKey} by ${ctx.actorId}`);
      sendWithMetadata(res, { deleted: true, documentId: record.documentId });
    } catch (error) {
      console.error('[DOCUMENTS] Delete failed:', error);
      sendError(res, 500, 'Failed to delete document');
    }
  });

  app.use(
    (error: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (isPayloadTooLarge(error)) {
        sendError(res, 413, 'Request body too large', { errorCode: 'FILE_TOO_LARGE' });
        return;
      }
      console.error('[API] Unhandled error:', error);
      sendError(res, 500, 'Internal server error');
    }
  );

  return { app, store };
}
