/**
 * API configuration.
 *
 * Environment is read once, here, into an explicit ApiConfig that createApp() receives.
 * Request handling never consults process.env.
 */

import {
  describeStorageConfig,
  isStorageConfigured,
  loadStorageConfigFromEnv,
  type StorageConfig,
} from '@carecomply/storage';
import { DEFAULT_SUMMARY_LOCATION, type SummaryLocation } from '@carecomply/compliance';

export type AuthRole = 'ADMIN' | 'PROVIDER';

export const AUTH_ROLES: readonly AuthRole[] = ['ADMIN', 'PROVIDER'];

export function isAuthRole(value: unknown): value is AuthRole {
  return typeof value === 'string' && AUTH_ROLES.some((role) => role === value);
}

export interface TestAuthConfig {
  token: string;
  tenantId: string;
  userId: string;
  organizationId?: string;
  role: AuthRole;
}

export interface AuthConfig {
  clerkSecretKey?: string;
  /** Present only when test tokens may be accepted. */
  testAuth?: TestAuthConfig;
  /** A test token was configured but refused by the environment guard. */
  testAuthBlocked: boolean;
}

export interface RateLimitConfig {
  enabled: boolean;
  windowMs: number;
  max: number;
}

export interface ReportDefaults {
  organisationName?: string;
  framework?: string;
}

export interface ApiConfig {
  nodeEnv: string;
  port: number;
  apiVersion: string;
  isTestMode: boolean;
  auth: AuthConfig;
  allowedOrigins: string[];
  rateLimit: RateLimitConfig;
  storage: {
    documents: StorageConfig;
    results: StorageConfig;
  };
  summaryLocation: SummaryLocation;
  maxUploadBytes: number;
  reports: ReportDefaults;
}

export const API_VERSION = 'v1';
export const DEFAULT_PORT = 3001;
export const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;
export const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:3000', 'http://localhost:3001'];

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Test tokens are accepted only in explicit test environments, or in development when
 * Clerk is not configured. Production never accepts them.
 */
function isTestAuthAllowed(env: NodeJS.ProcessEnv): boolean {
  if (env.NODE_ENV === 'test' || env.E2E_TEST_MODE === 'true') {
    return true;
  }
  if (env.NODE_ENV === 'production') {
    return false;
  }
  return !(env.CLERK_SECRET_KEY && env.CLERK_TEST_TOKEN);
}

function loadAuthConfig(env: NodeJS.ProcessEnv): AuthConfig {
  const clerkSecretKey = readOptional(env.CLERK_SECRET_KEY);
  const token = readOptional(env.CLERK_TEST_TOKEN);

  if (!token) {
    return { clerkSecretKey, testAuthBlocked: false };
  }
  if (!isTestAuthAllowed(env)) {
    return { clerkSecretKey, testAuthBlocked: true };
  }

  return {
    clerkSecretKey,
    testAuthBlocked: false,
    testAuth: {
      token,
      tenantId: readOptional(env.CLERK_TEST_TENANT_ID) ?? 'test-tenant',
      userId: readOptional(env.CLERK_TEST_USER_ID) ?? 'test-user',
      organizationId: readOptional(env.CLERK_TEST_ORGANIZATION_ID),
      role: isAuthRole(env.CLERK_TEST_ROLE) ? env.CLERK_TEST_ROLE : 'PROVIDER',
    },
  };
}

function loadAllowedOrigins(env: NodeJS.ProcessEnv): string[] {
  if (!env.ALLOWED_ORIGINS) {
    return [...DEFAULT_ALLOWED_ORIGINS];
  }
  const origins = env.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return [...new Set(origins)];
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  const isTestMode = nodeEnv === 'test' || env.E2E_TEST_MODE === 'true';

  return {
    nodeEnv,
    port: readPositiveInt(env.PORT, DEFAULT_PORT),
    apiVersion: API_VERSION,
    isTestMode,
    auth: loadAuthConfig(env),
    allowedOrigins: loadAllowedOrigins(env),
    rateLimit: {
      enabled: env.DISABLE_RATE_LIMIT !== 'true',
      windowMs: 15 * 60 * 1000,
      max: readPositiveInt(env.RATE_LIMIT_MAX, isTestMode ? 10000 : 100),
    },
    storage: {
      documents: loadStorageConfigFromEnv(env, 'documents'),
      results: loadStorageConfigFromEnv(env, 'results'),
    },
    summaryLocation: {
      basePath: readOptional(env.COMPLIANCE_RESULTS_PATH) ?? DEFAULT_SUMMARY_LOCATION.basePath,
      fileName: readOptional(env.COMPLIANCE_SUMMARY_FILE) ?? DEFAULT_SUMMARY_LOCATION.fileName,
    },
    maxUploadBytes: readPositiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    reports: {
      organisationName: readOptional(env.REPORT_ORGANISATION_NAME),
      framework: readOptional(env.REPORT_FRAMEWORK),
    },
  };
}

export interface ConfigValidation {
  warnings: string[];
  errors: string[];
}

/**
 * Startup checks. Warnings describe degraded modes; errors are misconfigurations that
 * should not reach production.
 */
export function validateApiConfig(config: ApiConfig): ConfigValidation {
  const warnings: string[] = [];
  const errors: string[] = [];
  const isProduction = config.nodeEnv === 'production';

  if (config.auth.testAuth) {
    warnings.push('CLERK_TEST_TOKEN is set and accepted. Remove it in production.');
  }
  if (config.auth.testAuthBlocked) {
    warnings.push(
      'CLERK_TEST_TOKEN is set but refused in this environment.'
    );
  }
  if (!config.auth.clerkSecretKey) {
    if (isProduction) {
      errors.push('CLERK_SECRET_KEY is not set. No request can authenticate.');
    } else {
      warnings.push('CLERK_SECRET_KEY is not set. Only test tokens can authenticate.');
    }
  }

  for (const storage of [config.storage.documents, config.storage.results]) {
    if (!isStorageConfigured(storage)) {
      errors.push(`Storage for ${storage.container} is not configured (${describeStorageConfig(storage)}).`);
    } else if (storage.driver === 'filesystem' && storage.filesystem?.basePath.startsWith('/tmp')) {
      warnings.push(`${storage.container} storage is under /tmp and will be lost on restart.`);
    }
  }

  if (!config.rateLimit.enabled && isProduction) {
    warnings.push('Rate limiting is disabled (DISABLE_RATE_LIMIT=true).');
  }

  return { warnings, errors };
}
