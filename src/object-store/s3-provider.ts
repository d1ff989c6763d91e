/**
 * S3 implementation of the object storage provider.
 */

import { GetObjectCommand, PutObjectCommand, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { ObjectStorageProvider, ProviderLocation, PutOptions } from './object-storage';

export interface S3ProviderOptions {
  bucket: string;
  region: string;
  /** Custom endpoint (MinIO, LocalStack). Implies path-style addressing. */
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
}

export function createS3Client(options: S3ProviderOptions): S3Client {
  const config: S3ClientConfig = {
    region: options.region,
    endpoint: options.endpoint,
    forcePathStyle: options.forcePathStyle || Boolean(options.endpoint),
  };
  if (options.accessKeyId && options.secretAccessKey) {
    config.credentials = {
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
      sessionToken: options.sessionToken,
    };
  }
  return new S3Client(config);
}

export class S3ObjectStorageProvider implements ObjectStorageProvider {
  readonly bucket: string;
  private readonly client: S3Client;

  constructor(options: S3ProviderOptions, client?: S3Client) {
    this.bucket = options.bucket;
    this.client = client ?? createS3Client(options);
  }

  async put(key: string, bytes: Uint8Array, options: PutOptions = {}): Promise<ProviderLocation> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: options.contentType ?? 'application/zip',
        ContentLength: bytes.byteLength,
      }),
      { abortSignal: options.signal },
    );
    return { bucket: this.bucket, key };
  }

  presign(location: ProviderLocation, ttlSeconds: number): Promise<string> {
    const command = new GetObjectCommand({ Bucket: location.bucket, Key: location.key });
    return getSignedUrl(this.client, command, { expiresIn: ttlSeconds });
  }
}
