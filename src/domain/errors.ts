/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure this core raises is one of a small closed set of error
 * classes. Each carries a `TypedError` payload so callers (and the layer
 * that serializes errors for clients) can branch on `code` and
 * `retryable` without string matching.
 */

import { RunStatus } from './run';
import { StorageLocation } from './artifact';

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'RUN'
  | 'PACKAGING'
  | 'STORAGE'
  | 'COMPUTE'
  | 'STORE'
  | 'CONFIG';

/** Typed suggested fix that operators or agents can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "RUN.INVALID_TRANSITION"). */
  code: string;
  /** Human-readable error message. Never contains provider credentials. */
  message: string;
  jobId?: string;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  jobId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    jobId: params.jobId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for every error raised by this package. */
export abstract class RunControlError extends Error {
  abstract readonly kind: string;
  readonly typedError: TypedError;

  constructor(typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.typedError = typedError;
    this.name = new.target.name;
  }

  get code(): string {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

// --- Validation ---

export class ValidationError extends RunControlError {
  readonly kind: string = 'validation';

  constructor(message: string, details?: Record<string, unknown>, code = 'VALIDATION.INVALID_INPUT') {
    super(createTypedError({ code, message, retryable: false, details }));
  }
}

export class InvalidResultsDirectoryError extends ValidationError {
  constructor(message: string, directory: string) {
    super(message, { directory }, 'VALIDATION.RESULTS_DIRECTORY');
  }
}

export class JobNotFoundError extends ValidationError {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`, { jobId }, 'VALIDATION.JOB_NOT_FOUND');
  }
}

export class RunNotFoundError extends ValidationError {
  constructor(readonly runId: string, readonly jobId?: string) {
    super(`Run not found: ${runId}`, { runId, jobId }, 'RUN.NOT_FOUND');
  }
}

export class RunOwnershipMismatchError extends ValidationError {
  constructor(readonly runId: string, readonly expectedJobId: string, readonly actualJobId: string) {
    super(
      `Run ${runId} does not belong to job ${expectedJobId}`,
      { runId, expectedJobId, actualJobId },
      'RUN.OWNERSHIP_MISMATCH',
    );
  }
}

export class UnrecognizedLocationFormatError extends ValidationError {
  constructor(readonly input: string) {
    super(
      `Unrecognized storage location format: ${input}. Expected s3://bucket/key, ` +
        'https://bucket.s3[.region].amazonaws.com/key or https://s3[.region].amazonaws.com/bucket/key',
      { input },
      'STORAGE.UNRECOGNIZED_LOCATION',
    );
  }
}

// --- Packaging ---

export class PackagingFailureError extends RunControlError {
  readonly kind = 'packaging';

  constructor(message: string, directory: string, cause?: unknown) {
    super(
      createTypedError({
        code: 'PACKAGING.FAILED',
        message,
        retryable: false,
        details: { directory },
      }),
      { cause },
    );
  }
}

// --- Storage ---

/** Object-store failure. The message is always sanitized before construction. */
export class StorageError extends RunControlError {
  readonly kind = 'storage';
  readonly sanitized = true;

  constructor(sanitizedMessage: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'STORAGE.PROVIDER',
        message: sanitizedMessage,
        retryable: false,
        details,
        suggestedFixes: [
          { type: 'RETRY_PUBLISH', params: {}, description: 'Publishing is not retried automatically; re-invoke once the store is reachable.' },
        ],
      }),
    );
  }
}

// --- Compute service ---

/** Network or provider hiccup; the same call may succeed later. */
export class TransientExternalError extends RunControlError {
  readonly kind = 'transient-external';

  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'COMPUTE.TRANSIENT', message, retryable: true, details }));
  }
}

/** The external job is permanently gone or failed. */
export class TerminalExternalError extends RunControlError {
  readonly kind = 'terminal-external';

  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'COMPUTE.TERMINAL', message, retryable: false, details }));
  }
}

/**
 * The compute service refused the call for a reason that is not about the
 * job itself, such as rejected credentials or a misconfigured client. The
 * run is left as it is.
 */
export class ComputeServiceError extends RunControlError {
  readonly kind = 'compute-service';

  constructor(message: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'COMPUTE.SERVICE',
        message,
        retryable: false,
        details,
        suggestedFixes: [
          { type: 'CHECK_COMPUTE_ACCESS', params: {}, description: 'Check the compute credentials, region and queue settings.' },
        ],
      }),
    );
  }
}

// --- Run lifecycle ---

export class InvalidTransitionError extends RunControlError {
  readonly kind = 'invalid-transition';

  constructor(readonly from: RunStatus, readonly to: RunStatus, runId?: string, reason?: string) {
    super(
      createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: reason
          ? `Invalid run state transition: ${from} -> ${to} (${reason})`
          : `Invalid run state transition: ${from} -> ${to}`,
        runId,
        retryable: false,
        details: { from, to },
      }),
    );
  }
}

/**
 * Results reached the object store but the metadata commit failed.
 * `orphanedLocation` points at the stored artifact.
 */
export class PublishMetadataError extends RunControlError {
  readonly kind = 'publish-metadata';

  constructor(
    readonly orphanedLocation: StorageLocation,
    readonly orphanRecorded: boolean,
    ids: { jobId: string; runId: string },
    cause?: unknown,
  ) {
    super(
      createTypedError({
        code: 'RUN.PUBLISH_METADATA',
        message: `Results uploaded to ${orphanedLocation.handle} but the run metadata commit failed`,
        jobId: ids.jobId,
        runId: ids.runId,
        retryable: false,
        details: { orphanedLocation: orphanedLocation.handle, orphanRecorded },
        suggestedFixes: [
          { type: 'RECONCILE_ORPHAN', params: { handle: orphanedLocation.handle }, description: 'Delete the orphaned object or re-attach it to the run.' },
        ],
      }),
      { cause },
    );
  }
}

export class PublishCancelledError extends RunControlError {
  readonly kind = 'publish-cancelled';

  constructor(ids: { jobId?: string; runId?: string }) {
    super(
      createTypedError({
        code: 'RUN.PUBLISH_CANCELLED',
        message: 'Results publishing was cancelled before upload',
        jobId: ids.jobId,
        runId: ids.runId,
        retryable: true,
      }),
    );
  }
}

// --- Persistence ---

export class ConcurrentModificationError extends RunControlError {
  readonly kind = 'concurrent-modification';

  constructor(runId: string, expectedVersion: number) {
    super(
      createTypedError({
        code: 'STORE.CONCURRENT_MODIFICATION',
        message: `Run ${runId} was modified concurrently (expected version ${expectedVersion})`,
        runId,
        retryable: true,
        details: { expectedVersion },
      }),
    );
  }
}

export class PersistenceError extends RunControlError {
  readonly kind = 'persistence';

  constructor(message: string, cause?: unknown) {
    super(createTypedError({ code: 'STORE.WRITE_FAILED', message, retryable: true }), { cause });
  }
}

/** Whether an error is one this package marks as retryable. */
export function isRetryableError(err: unknown): boolean {
  return err instanceof RunControlError && err.retryable;
}

/** Best-effort message extraction for logging. Callers sanitize provider text. */
export function errorMessage(err: unknown): string {
  if (typeof err === 'string') return err;
  if (typeof err === 'object' && err !== null && 'message' in err) {
    const message = Reflect.get(err, 'message');
    if (typeof message === 'string') return message;
  }
  return 'Unknown error';
}
