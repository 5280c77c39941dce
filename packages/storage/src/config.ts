import { join } from 'node:path';
import type { StorageConfig, StorageContainer, StorageDriver, S3StorageConfig } from './types';

export const DEFAULT_STORAGE_ROOT = '/var/carecomply/storage';

const CONTAINER_DEFAULTS: Record<StorageContainer, { envPrefix: string; name: string }> = {
  documents: { envPrefix: 'DOCUMENTS', name: 'compliance-documents' },
  results: { envPrefix: 'RESULTS', name: 'results' },
};

function parseDriver(value?: string): StorageDriver {
  const driver = (value || 'filesystem').toLowerCase();
  if (driver === 's3' || driver === 'minio' || driver === 'filesystem') {
    return driver;
  }
  return 'filesystem';
}

function parseBool(value?: string): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true';
}

function joinPrefix(...parts: Array<string | undefined>): string | undefined {
  const joined = parts
    .map((part) => (part ?? '').replace(/^\/+|\/+$/g, ''))
    .filter(Boolean)
    .join('/');
  return joined || undefined;
}

/**
 * Name of the logical container, e.g. `results` or `compliance-documents`.
 * `RESULTS_CONTAINER` / `DOCUMENTS_CONTAINER` override the defaults.
 */
export function resolveContainerName(
  container: StorageContainer,
  env: NodeJS.ProcessEnv = process.env
): string {
  const { envPrefix, name } = CONTAINER_DEFAULTS[container];
  return env[`${envPrefix}_CONTAINER`] || name;
}

function buildS3Config(env: NodeJS.ProcessEnv, container: StorageContainer): S3StorageConfig {
  const { envPrefix } = CONTAINER_DEFAULTS[container];
  return {
    bucket: env[`${envPrefix}_S3_BUCKET`] || env.S3_BUCKET || '',
    region: env.S3_REGION || 'us-east-1',
    endpoint: env.S3_ENDPOINT,
    accessKeyId: env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    forcePathStyle: parseBool(env.S3_FORCE_PATH_STYLE),
    prefix: joinPrefix(env.S3_PREFIX, resolveContainerName(container, env)),
  };
}

function buildMinioConfig(env: NodeJS.ProcessEnv, container: StorageContainer): S3StorageConfig {
  const { envPrefix } = CONTAINER_DEFAULTS[container];
  return {
    bucket: env[`${envPrefix}_MINIO_BUCKET`] || env.MINIO_BUCKET || env.S3_BUCKET || '',
    region: env.MINIO_REGION || env.S3_REGION || 'us-east-1',
    endpoint: env.MINIO_ENDPOINT || env.S3_ENDPOINT,
    accessKeyId: env.MINIO_ACCESS_KEY || env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.MINIO_SECRET_KEY || env.S3_SECRET_ACCESS_KEY,
    forcePathStyle: parseBool(env.MINIO_FORCE_PATH_STYLE) ?? true,
    prefix: joinPrefix(env.MINIO_PREFIX || env.S3_PREFIX, resolveContainerName(container, env)),
  };
}

export function loadStorageConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  container: StorageContainer = 'documents'
): StorageConfig {
  const driver = parseDriver(env.STORAGE_DRIVER);

  if (driver === 'filesystem') {
    return {
      driver,
      container,
      filesystem: {
        basePath: join(env.BLOB_STORAGE_PATH || DEFAULT_STORAGE_ROOT, resolveContainerName(container, env)),
      },
    };
  }

  if (driver === 'minio') {
    return {
      driver,
      container,
      minio: buildMinioConfig(env, container),
    };
  }

  return {
    driver,
    container,
    s3: buildS3Config(env, container),
  };
}

export function describeStorageConfig(config: StorageConfig): string {
  if (config.driver === 'filesystem') {
    return `${config.container} -> filesystem:${config.filesystem?.basePath ?? ''}`;
  }
  const s3 = config.driver === 'minio' ? config.minio : config.s3;
  const location = s3 ? `${s3.bucket}${s3.prefix ? `/${s3.prefix}` : ''}` : '';
  return `${config.container} -> ${config.driver}:${location}`;
}

/**
 * Whether a config points at a usable location. A bucket-less S3 config is not.
 */
export function isStorageConfigured(config: StorageConfig): boolean {
  if (config.driver === 'filesystem') {
    return Boolean(config.filesystem?.basePath);
  }
  const s3 = config.driver === 'minio' ? config.minio : config.s3;
  return Boolean(s3?.bucket);
}
