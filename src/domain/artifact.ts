/**
 * Artifact domain model.
 *
 * Packaged run output, the storage pointer it ends up behind, and the
 * compensation record written when a stored artifact has no committed
 * metadata.
 */

/** Packaged results ready for storage. Immutable once created. */
export interface PackagedArtifact {
  readonly bytes: Uint8Array;
  readonly fileCount: number;
  /** Sum of the packaged files' sizes. */
  readonly totalSizeBytes: number;
  readonly archiveSizeBytes: number;
  /** `sha256:<hex>` over the archive bytes. */
  readonly checksum: string;
  /** Archive paths, in archive order. */
  readonly entries: readonly string[];
  /** Name of the packaged results directory (e.g. "RUN4"). */
  readonly directoryName: string;
}

/**
 * Stable pointer to a stored object. `handle` is the canonical
 * `s3://bucket/key` form; two locations are equal when all fields match.
 */
export interface StorageLocation {
  readonly handle: string;
  readonly bucket: string;
  readonly key: string;
}

export function createStorageLocation(bucket: string, key: string): StorageLocation {
  return Object.freeze({ handle: `s3://${bucket}/${key}`, bucket, key });
}

export function storageLocationsEqual(a: StorageLocation, b: StorageLocation): boolean {
  return a.handle === b.handle && a.bucket === b.bucket && a.key === b.key;
}

/**
 * Written when an upload succeeded but the metadata commit did not.
 * Consumed only by an out-of-band cleanup process.
 */
export interface OrphanRecord {
  readonly id: string;
  readonly location: StorageLocation;
  readonly jobId: string;
  readonly runId: string;
  readonly createdAt: string;
  /** Sanitized description of the commit failure. */
  readonly reason: string;
}
