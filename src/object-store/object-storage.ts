/**
 * Object storage provider contract.
 *
 * The gateway owns timeouts, location handling and error sanitization;
 * providers only move bytes and sign URLs.
 */

/** Where a provider put an object. */
export interface ProviderLocation {
  bucket: string;
  key: string;
}

export interface PutOptions {
  signal?: AbortSignal;
  contentType?: string;
}

export interface ObjectStorageProvider {
  put(key: string, bytes: Uint8Array, options?: PutOptions): Promise<ProviderLocation>;
  presign(location: ProviderLocation, ttlSeconds: number): Promise<string>;
}
