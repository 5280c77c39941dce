import type { StorageConfig, StorageProvider } from './types';
import { join } from 'node:path';
import { DEFAULT_STORAGE_ROOT, resolveContainerName } from './config';
import { FilesystemObjectStorage } from './filesystem';
import { S3StorageProvider } from './s3';

export function createStorageProvider(config: StorageConfig): StorageProvider {
  if (config.driver === 'filesystem') {
    const basePath = config.filesystem?.basePath || join(DEFAULT_STORAGE_ROOT, resolveContainerName(config.container));
    return new FilesystemObjectStorage(basePath);
  }

  if (config.driver === 'minio') {
    if (!config.minio) {
      throw new Error('MinIO configuration missing');
    }
    return new S3StorageProvider({
      ...config.minio,
      forcePathStyle: config.minio.forcePathStyle ?? true,
    });
  }

  if (!config.s3) {
    throw new Error('S3 configuration missing');
  }

  return new S3StorageProvider(config.s3);
}
