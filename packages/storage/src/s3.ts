import { Readable } from 'node:stream';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type HeadObjectCommandOutput,
} from '@aws-sdk/client-s3';
import type { S3StorageConfig, StorageProvider, StoredObjectMetadata } from './types';
import { StorageNotFoundError } from './errors';
import { joinKey, normalizeKey, normalizePrefix } from './keys';

function storagePath(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}

function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const err = error as { name?: string; $metadata?: { httpStatusCode?: number } };
  return err.name === 'NotFound' || err.name === 'NoSuchKey' || err.$metadata?.httpStatusCode === 404;
}

async function bodyToBuffer(body: unknown): Promise<Buffer> {
  if (!body) {
    return Buffer.from('');
  }
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  if (typeof body === 'string') {
    return Buffer.from(body);
  }
  if (body instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
  const maybeStream = body as { transformToByteArray?: () => Promise<Uint8Array> };
  if (typeof maybeStream.transformToByteArray === 'function') {
    const bytes = await maybeStream.transformToByteArray();
    return Buffer.from(bytes);
  }
  throw new Error('Unsupported S3 body type');
}

/**
 * S3-compatible object store (AWS S3 or MinIO). A logical container is a key prefix
 * inside the bucket, so `documents` and `results` can share one bucket.
 */
export class S3StorageProvider implements StorageProvider {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3StorageConfig, client?: S3Client) {
    if (!config.bucket) {
      throw new Error('S3 bucket is required');
    }

    this.bucket = config.bucket;
    this.prefix = normalizePrefix(config.prefix);

    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle,
        credentials:
          config.accessKeyId && config.secretAccessKey
            ? {
                accessKeyId: config.accessKeyId,
                secretAccessKey: config.secretAccessKey,
              }
            : undefined,
      });
  }

  async put(key: string, content: Buffer, contentType: string): Promise<StoredObjectMetadata> {
    const objectKey = this.toObjectKey(key);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: objectKey,
        Body: content,
        ContentType: contentType,
      })
    );

    return {
      key: normalizeKey(key),
      contentType,
      sizeBytes: content.length,
      lastModified: new Date().toISOString(),
      storagePath: storagePath(this.bucket, objectKey),
    };
  }

  async get(key: string): Promise<Buffer> {
    const objectKey = this.toObjectKey(key);
    try {
      const result = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: objectKey,
        })
      );
      return await bodyToBuffer(result.Body);
    } catch (error) {
      if (isNotFound(error)) {
        throw new StorageNotFoundError(normalizeKey(key));
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.headObject(this.toObjectKey(key))) !== null;
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.toObjectKey(key),
        })
      );
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<StoredObjectMetadata[]> {
    const normalized = normalizePrefix(prefix);
    const scoped = [this.prefix, normalized].filter(Boolean).join('/');
    const listPrefix = scoped ? `${scoped}/` : undefined;
    const objects: StoredObjectMetadata[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: listPrefix,
          ContinuationToken: continuationToken,
        })
      );

      for (const item of page.Contents ?? []) {
        if (!item.Key || item.Key.endsWith('/')) continue;
        objects.push({
          key: this.fromObjectKey(item.Key),
          sizeBytes: item.Size ?? 0,
          lastModified: item.LastModified ? item.LastModified.toISOString() : new Date(0).toISOString(),
          storagePath: storagePath(this.bucket, item.Key),
        });
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  describe(): string {
    return `s3:${this.bucket}${this.prefix ? `/${this.prefix}` : ''}`;
  }

  private toObjectKey(key: string): string {
    return this.prefix ? joinKey(this.prefix, key) : normalizeKey(key);
  }

  private fromObjectKey(objectKey: string): string {
    return this.prefix && objectKey.startsWith(`${this.prefix}/`)
      ? objectKey.slice(this.prefix.length + 1)
      : objectKey;
  }

  private async headObject(objectKey: string): Promise<HeadObjectCommandOutput | null> {
    try {
      return await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: objectKey,
        })
      );
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }
}
