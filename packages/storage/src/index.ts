export * from './types';
export * from './errors';
export * from './keys';
export * from './config';
export * from './factory';
export { FilesystemObjectStorage } from './filesystem';
export { S3StorageProvider } from './s3';
