import {
  S3Client,
  CreateBucketCommand,
  BucketLocationConstraint,
  DeleteObjectsCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  PutPublicAccessBlockCommand
} from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { directoryDigest, listFilesRecursively, toPosixRelative } from '../lib/digest';
import { logger as rootLogger, Logger } from '../lib/logger';
import { describeAwsError } from '../engine/error-classifier';
import { AssetPublisher, PublishOptions, PublishResult } from './types';

export interface UploadResult {
  key: string;
  etag: string;
}

export interface UploadOptions {
  contentType?: string;
  cacheControl?: string;
}

const CONTENT_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  htm: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  mjs: 'application/javascript; charset=utf-8',
  map: 'application/json; charset=utf-8',
  json: 'application/json; charset=utf-8',
  webmanifest: 'application/manifest+json',
  xml: 'application/xml',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  avif: 'image/avif',
  svg: 'image/svg+xml',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',
  otf: 'font/otf',
  wasm: 'application/wasm',
  pdf: 'application/pdf',
  mp4: 'video/mp4',
  webm: 'video/webm'
};

/** Documents that must be revalidated so a new release shows up at once */
const NO_CACHE_EXTENSIONS = new Set(['html', 'htm', 'json', 'webmanifest', 'xml', 'txt']);

export const NO_CACHE = 'public, max-age=0, must-revalidate';
export const LONG_CACHE = 'public, max-age=31536000, immutable';

export function getContentType(filePath: string): string {
  const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
  return CONTENT_TYPES[ext] ?? 'application/octet-stream';
}

export function getCacheControl(filePath: string): string {
  const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
  return NO_CACHE_EXTENSIONS.has(ext) ? NO_CACHE : LONG_CACHE;
}

export class S3Manager implements AssetPublisher {
  private client: S3Client;
  private region: string;
  private readonly log: Logger;

  constructor(session: AwsSession, log: Logger = rootLogger) {
    this.region = session.region;
    this.client = new S3Client(clientConfig(session));
    this.log = log.child({ component: 's3' });
  }

  /**
   * Create a private bucket unless it exists already
   * @returns true when the bucket was created
   */
  async ensureBucket(bucketName: string): Promise<boolean> {
    if (await this.bucketExists(bucketName)) {
      return false;
    }

    await this.client.send(new CreateBucketCommand({
      Bucket: bucketName,
      CreateBucketConfiguration: this.region !== 'us-east-1'
        ? { LocationConstraint: this.locationConstraint() }
        : undefined
    }));

    await this.client.send(new PutPublicAccessBlockCommand({
      Bucket: bucketName,
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        IgnorePublicAcls: true,
        BlockPublicPolicy: true,
        RestrictPublicBuckets: true
      }
    }));

    this.log.info({ bucketName, region: this.region }, 'Created bucket');
    return true;
  }

  async bucketExists(bucketName: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return true;
    } catch (error) {
      if (this.isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async objectExists(bucketName: string, key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: bucketName, Key: key }));
      return true;
    } catch (error) {
      if (this.isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async uploadFile(bucketName: string, key: string, filePath: string, options: UploadOptions = {}): Promise<UploadResult> {
    const body = await readFile(filePath);

    const result = await this.client.send(new PutObjectCommand({
      Bucket: bucketName,
      Key: key,
      Body: body,
      ContentType: options.contentType ?? getContentType(filePath),
      CacheControl: options.cacheControl
    }));

    return { key, etag: result.ETag ?? '' };
  }

  /**
   * Upload every file under a directory with its content type and cache
   * headers. With prune, objects that are no longer part of the directory are
   * deleted afterwards.
   */
  async publishDirectory(bucketName: string, localPath: string, options: PublishOptions = {}): Promise<PublishResult> {
    const digest = directoryDigest(localPath);
    const files = listFilesRecursively(localPath);
    const keys: string[] = [];

    for (const filePath of files) {
      const relativePath = toPosixRelative(localPath, filePath);
      const key = options.prefix ? `${options.prefix}/${relativePath}` : relativePath;

      await this.uploadFile(bucketName, key, filePath, {
        contentType: getContentType(filePath),
        cacheControl: getCacheControl(filePath)
      });
      keys.push(key);
    }

    let deleted = 0;
    if (options.prune) {
      const keep = new Set(keys);
      const stale = (await this.listKeys(bucketName, options.prefix)).filter(key => !keep.has(key));
      deleted = await this.deleteKeys(bucketName, stale);
    }

    this.log.info({ bucketName, uploaded: keys.length, deleted }, 'Published assets');
    return { digest, uploaded: keys.length, deleted, keys };
  }

  /**
   * Delete every object so the bucket can be removed with its stack
   * @returns number of deleted objects
   */
  async emptyBucket(bucketName: string): Promise<number> {
    if (!(await this.bucketExists(bucketName))) {
      return 0;
    }
    const deleted = await this.deleteKeys(bucketName, await this.listKeys(bucketName));
    this.log.info({ bucketName, deleted }, 'Emptied bucket');
    return deleted;
  }

  private async listKeys(bucketName: string, prefix?: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(new ListObjectsV2Command({
        Bucket: bucketName,
        Prefix: prefix ? `${prefix}/` : undefined,
        ContinuationToken: continuationToken
      }));
      for (const object of page.Contents ?? []) {
        if (object.Key) {
          keys.push(object.Key);
        }
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  private async deleteKeys(bucketName: string, keys: string[]): Promise<number> {
    // DeleteObjects takes at most 1000 keys
    for (let start = 0; start < keys.length; start += 1000) {
      const batch = keys.slice(start, start + 1000);
      const result = await this.client.send(new DeleteObjectsCommand({
        Bucket: bucketName,
        Delete: { Objects: batch.map(Key => ({ Key })), Quiet: true }
      }));
      const failure = result.Errors?.[0];
      if (failure) {
        throw new Error(`Failed to delete ${failure.Key} from ${bucketName}: ${failure.Code} ${failure.Message}`);
      }
    }
    return keys.length;
  }

  private locationConstraint(): BucketLocationConstraint | undefined {
    return Object.values(BucketLocationConstraint).find(value => value === this.region);
  }

  private isNotFound(error: unknown): boolean {
    const { code, httpStatus } = describeAwsError(error);
    return code === 'NotFound' || code === 'NoSuchKey' || code === 'NoSuchBucket' || httpStatus === 404;
  }
}
