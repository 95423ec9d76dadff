import { HeadObjectCommand, PutObjectCommand, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { CONFIG } from '../config';

/**
 * Key/value blob store holding normalized listing images
 */
export interface ObjectStore {
  exists(key: string): Promise<boolean>;
  put(key: string, body: Buffer): Promise<string>;
  locationOf(key: string): string;
}

export interface S3ObjectStoreOptions {
  bucket: string;
  publicUrl: string;
}

export function objectLocation(publicUrl: string, bucket: string, key: string): string {
  return `${publicUrl.replace(/\/+$/, '')}/${bucket}/${key}`;
}

export function isNotFoundError(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return error.name === 'NotFound' || error.$metadata.httpStatusCode === 404;
  }
  return false;
}

/**
 * S3ObjectStore
 * Talks to any S3-compatible endpoint (Cloud Storage interoperability, R2, S3)
 */
export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly options: S3ObjectStoreOptions = {
      bucket: CONFIG.storage.bucket,
      publicUrl: CONFIG.storage.publicUrl,
    }
  ) {}

  static fromConfig(): S3ObjectStore {
    const client = new S3Client({
      region: CONFIG.storage.region,
      endpoint: CONFIG.storage.endpoint,
      credentials: {
        accessKeyId: CONFIG.storage.accessKeyId,
        secretAccessKey: CONFIG.storage.secretAccessKey,
      },
    });
    return new S3ObjectStore(client);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.options.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  async put(key: string, body: Buffer): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: body,
        ContentType: 'image/jpeg',
      })
    );
    return this.locationOf(key);
  }

  locationOf(key: string): string {
    return objectLocation(this.options.publicUrl, this.options.bucket, key);
  }
}
