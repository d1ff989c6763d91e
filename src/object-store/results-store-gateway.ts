/**
 * Results store gateway.
 *
 * Wraps an object storage provider with the rules results publishing
 * depends on: deterministic keys, a deadline on every call, canonical
 * locations and credential-free errors. Nothing a provider says reaches a
 * log line or an exception message without passing redactCredentials()
 * first.
 */

import { StorageLocation, createStorageLocation } from '../domain/artifact';
import { redactCredentials } from '../domain/credential-redaction';
import { StorageError, ValidationError } from '../domain/errors';
import { TimeoutError, withTimeout } from '../engine/retry';
import { Logger, logger as rootLogger } from '../logger';
import { normalizeLocation } from './location-format';
import { ObjectStorageProvider } from './object-storage';

/** SigV4 presigned URLs cannot outlive seven days. */
export const MAX_PRESIGN_TTL_SECONDS = 604_800;

export interface ResultsStoreGatewayOptions {
  /** Prepended to every results key, e.g. "results/". */
  keyPrefix?: string;
  uploadTimeoutMs?: number;
  presignTimeoutMs?: number;
  /** Secret values to scrub from provider messages in addition to the built-in patterns. */
  knownSecrets?: readonly string[];
  logger?: Logger;
}

export interface UploadOptions {
  signal?: AbortSignal;
}

function describeProviderFailure(err: unknown): string {
  if (err instanceof TimeoutError) return err.message;
  if (err instanceof Error) return err.name && err.name !== 'Error' ? `${err.name}: ${err.message}` : err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? 'Unknown provider error';
  } catch {
    return 'Unknown provider error';
  }
}

export class ResultsStoreGateway {
  private readonly keyPrefix: string;
  private readonly uploadTimeoutMs: number;
  private readonly presignTimeoutMs: number;
  private readonly knownSecrets: readonly string[];
  private readonly log: Logger;

  constructor(private readonly provider: ObjectStorageProvider, options: ResultsStoreGatewayOptions = {}) {
    this.keyPrefix = options.keyPrefix ?? '';
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? 120_000;
    this.presignTimeoutMs = options.presignTimeoutMs ?? 10_000;
    this.knownSecrets = (options.knownSecrets ?? []).filter((secret) => secret.length > 0);
    this.log = (options.logger ?? rootLogger).child({ module: 'results-store-gateway' });
  }

  /** Object key for a run's results archive. Same inputs, same key. */
  resultsKey(jobId: string, runId: string): string {
    return `${this.keyPrefix}jobs/${jobId}/run_${runId}_results.zip`;
  }

  /**
   * Store `bytes` under `key`.
   *
   * @throws StorageError on any provider failure or timeout, with a sanitized message.
   */
  async upload(key: string, bytes: Uint8Array, options: UploadOptions = {}): Promise<StorageLocation> {
    try {
      const stored = await withTimeout(
        (signal) => this.provider.put(key, bytes, { signal, contentType: 'application/zip' }),
        this.uploadTimeoutMs,
        'Results upload',
        options.signal,
      );
      const location = createStorageLocation(stored.bucket, stored.key);
      this.log.info('Uploaded results', { handle: location.handle, sizeBytes: bytes.byteLength });
      return location;
    } catch (err) {
      throw this.failure('upload', `Results upload to ${key} failed`, err, { key });
    }
  }

  /**
   * Time-limited retrieval URL for a stored artifact. Accepts a canonical
   * location or any recognized location encoding.
   *
   * @throws UnrecognizedLocationFormatError for unknown encodings.
   * @throws ValidationError for a TTL outside 1..604800 seconds.
   * @throws StorageError when signing fails.
   */
  async retrievableUrl(location: StorageLocation | string, ttlSeconds: number): Promise<string> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1 || ttlSeconds > MAX_PRESIGN_TTL_SECONDS) {
      throw new ValidationError(`ttlSeconds must be an integer between 1 and ${MAX_PRESIGN_TTL_SECONDS}`, {
        ttlSeconds,
      });
    }
    const canonical = typeof location === 'string' ? normalizeLocation(location) : location;

    try {
      return await withTimeout(
        () => this.provider.presign({ bucket: canonical.bucket, key: canonical.key }, ttlSeconds),
        this.presignTimeoutMs,
        'Presign',
      );
    } catch (err) {
      throw this.failure('presign', `Presigning ${canonical.handle} failed`, err, { handle: canonical.handle });
    }
  }

  private failure(
    operation: 'upload' | 'presign',
    summary: string,
    err: unknown,
    details: Record<string, unknown>,
  ): StorageError {
    const reason = redactCredentials(describeProviderFailure(err), this.knownSecrets);
    this.log.error('Object store call failed', { operation, reason, ...details });
    return new StorageError(`${summary}: ${reason}`, { operation, ...details });
  }
}
