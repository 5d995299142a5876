/**
 * S3ObjectStore
 *
 * S3-compatible implementation of ObjectStore (AWS S3, MinIO, LocalStack, ...).
 * Credentials are resolved by the SDK's default provider chain
 * (environment, shared config, instance role); they never pass through here.
 */

import {
  S3Client,
  S3ServiceException,
  GetObjectCommand,
  CopyObjectCommand,
  DeleteObjectCommand,
  paginateListObjectsV2,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import type { ObjectStore, RawObject } from './ObjectStore.js';
import { archiveKeyFor } from './objectKeys.js';
import { ArchiveFailureError, ObjectNotFoundError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration for object storage backend
 */
export interface S3ObjectStoreConfig {
  /** Bucket name */
  bucket: string;
  /** AWS region (e.g., us-east-1) */
  region?: string;
  /** S3-compatible endpoint URL (e.g., https://minio.example.com:9000) */
  endpoint?: string;
  /** Force path-style addressing (required for MinIO and some S3-compatible services) */
  forcePathStyle?: boolean;
  /** SDK retry attempts per request (default: 5) */
  maxAttempts?: number;
  /** Prefix whose relative paths are preserved by move() */
  rootPrefix: string;
  /** Keys per listing page (default: 1000) */
  pageSize?: number;
}

/**
 * Whether an SDK error means the object does not exist
 */
export function isMissingObjectError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'NoSuchKey' || error.name === 'NotFound') return true;
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

/**
 * CopySource header value: bucket and URL-encoded key, slashes kept
 */
export function copySourceFor(bucket: string, key: string): string {
  return `${bucket}/${key.split('/').map(encodeURIComponent).join('/')}`;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly rootPrefix: string;
  private readonly pageSize: number;

  /**
   * @param config - Object storage configuration
   * @param client - Pre-built client; when omitted one is created from config
   */
  constructor(config: S3ObjectStoreConfig, client?: S3Client) {
    if (!config.bucket) {
      throw new Error('S3ObjectStore requires bucket configuration');
    }

    this.bucket = config.bucket;
    this.rootPrefix = config.rootPrefix;
    this.pageSize = config.pageSize ?? 1000;
    this.client = client ?? new S3Client(S3ObjectStore.clientConfig(config));
  }

  private static clientConfig(config: S3ObjectStoreConfig): S3ClientConfig {
    const clientConfig: S3ClientConfig = {
      region: config.region || 'us-east-1',
      maxAttempts: config.maxAttempts ?? 5,
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
      clientConfig.forcePathStyle = config.forcePathStyle ?? true;
    } else if (config.forcePathStyle !== undefined) {
      clientConfig.forcePathStyle = config.forcePathStyle;
    }

    return clientConfig;
  }

  async *list(prefix: string): AsyncGenerator<string> {
    const pages = paginateListObjectsV2(
      { client: this.client, pageSize: this.pageSize },
      { Bucket: this.bucket, Prefix: prefix }
    );

    for await (const page of pages) {
      for (const object of page.Contents ?? []) {
        if (object.Key) {
          yield object.Key;
        }
      }
    }
  }

  async fetch(key: string): Promise<RawObject> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      const bytes = response.Body ? Buffer.from(await response.Body.transformToByteArray()) : Buffer.alloc(0);
      return { key, bytes, fetchedAt: new Date() };
    } catch (error) {
      if (isMissingObjectError(error)) {
        throw new ObjectNotFoundError(key, { cause: error });
      }
      throw error;
    }
  }

  async move(sourceKey: string, destPrefix: string): Promise<string> {
    const destinationKey = archiveKeyFor(sourceKey, this.rootPrefix, destPrefix);

    try {
      await this.client.send(new CopyObjectCommand({
        Bucket: this.bucket,
        CopySource: copySourceFor(this.bucket, sourceKey),
        Key: destinationKey,
      }));
    } catch (error) {
      throw new ArchiveFailureError(sourceKey, destinationKey, 'copy', { cause: error });
    }

    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: sourceKey }));
    } catch (error) {
      throw new ArchiveFailureError(sourceKey, destinationKey, 'delete', { cause: error });
    }

    logger.debug({ bucket: this.bucket, sourceKey, destinationKey }, 'Moved object');
    return destinationKey;
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (error) {
      throw new ArchiveFailureError(key, null, 'delete', { cause: error });
    }
    logger.debug({ bucket: this.bucket, key }, 'Deleted object');
  }
}
