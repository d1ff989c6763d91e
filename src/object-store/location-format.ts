/**
 * Storage location encodings.
 *
 * Results locations have been persisted in several shapes over time. All
 * of them normalize to one canonical `StorageLocation`:
 *
 *   s3://bucket/key
 *   https://bucket.s3.amazonaws.com/key                (virtual-hosted)
 *   https://bucket.s3.us-east-1.amazonaws.com/key
 *   https://s3.amazonaws.com/bucket/key                (path-style)
 *   https://s3.eu-west-1.amazonaws.com/bucket/key
 *
 * Query strings (presign parameters) and fragments are dropped.
 */

import { StorageLocation, createStorageLocation } from '../domain/artifact';
import { UnrecognizedLocationFormatError } from '../domain/errors';

const S3_URI = /^s3:\/\/([^/?#]+)\/([^?#]+)(?:[?#].*)?$/;

const PATH_STYLE = /^https?:\/\/s3(?:[.-][a-z0-9-]+)*\.amazonaws\.com(?:\.cn)?\/([^/?#]+)\/([^?#]+)(?:[?#].*)?$/i;

const VIRTUAL_HOSTED = /^https?:\/\/([^./]+)\.s3(?:[.-][a-z0-9-]+)*\.amazonaws\.com(?:\.cn)?\/([^?#]+)(?:[?#].*)?$/i;

const BUCKET_NAME = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

function decodeKey(rawKey: string, input: string): string {
  try {
    return rawKey.split('/').map((segment) => decodeURIComponent(segment)).join('/');
  } catch {
    throw new UnrecognizedLocationFormatError(input);
  }
}

function build(bucket: string, key: string, input: string): StorageLocation {
  if (!BUCKET_NAME.test(bucket) || key.length === 0 || key.endsWith('/')) {
    throw new UnrecognizedLocationFormatError(input);
  }
  return createStorageLocation(bucket, key);
}

/**
 * Parse any accepted encoding into the canonical location.
 *
 * @throws UnrecognizedLocationFormatError when no encoding matches.
 */
export function normalizeLocation(input: string): StorageLocation {
  const trimmed = input.trim();

  const s3Uri = S3_URI.exec(trimmed);
  if (s3Uri) return build(s3Uri[1], s3Uri[2], input);

  const pathStyle = PATH_STYLE.exec(trimmed);
  if (pathStyle) return build(pathStyle[1], decodeKey(pathStyle[2], input), input);

  const virtualHosted = VIRTUAL_HOSTED.exec(trimmed);
  if (virtualHosted) return build(virtualHosted[1].toLowerCase(), decodeKey(virtualHosted[2], input), input);

  throw new UnrecognizedLocationFormatError(input);
}
