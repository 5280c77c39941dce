export interface StoredObjectMetadata {
  key: string;
  contentType?: string;
  sizeBytes: number;
  lastModified: string;
  storagePath: string;
}

export interface StorageProvider {
  put(key: string, content: Buffer, contentType: string): Promise<StoredObjectMetadata>;
  get(key: string): Promise<Buffer>;
  exists(key: string): Promise<boolean>;
  delete(key: string): Promise<void>;
  /**
   * Lists objects whose key starts with the given directory-style prefix.
   * Missing prefixes yield an empty list.
   */
  list(prefix: string): Promise<StoredObjectMetadata[]>;
  describe(): string;
}

export type StorageDriver = 'filesystem' | 's3' | 'minio';

/** Logical containers the application reads from and writes to. */
export type StorageContainer = 'documents' | 'results';

export interface FilesystemStorageConfig {
  basePath: string;
}

export interface S3StorageConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle?: boolean;
  prefix?: string;
}

export interface StorageConfig {
  driver: StorageDriver;
  container: StorageContainer;
  filesystem?: FilesystemStorageConfig;
  s3?: S3StorageConfig;
  minio?: S3StorageConfig;
}
