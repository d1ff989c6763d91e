/**
 * Run domain model.
 *
 * A single simulation execution belonging to exactly one job, tracked
 * through a status state machine and reconciled against the batch-compute
 * service that actually executes it.
 */

import { StorageLocation } from './artifact';

/** Run lifecycle states. */
export enum RunStatus {
  Created = 'CREATED',
  Registered = 'REGISTERED',
  Submitted = 'SUBMITTED',
  Queued = 'QUEUED',
  Running = 'RUNNING',
  Done = 'DONE',
  Failed = 'FAILED',
  Cancelled = 'CANCELLED',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  [RunStatus.Created]: [RunStatus.Registered, RunStatus.Cancelled],
  [RunStatus.Registered]: [RunStatus.Submitted, RunStatus.Cancelled],
  [RunStatus.Submitted]: [RunStatus.Queued, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Queued]: [RunStatus.Running, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Running]: [RunStatus.Done, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Done]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Cancelled]: [],
};

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set([
  RunStatus.Done,
  RunStatus.Failed,
  RunStatus.Cancelled,
]);

const RUN_STATUS_VALUES = new Set<string>(Object.values(RunStatus));

/** Narrow an arbitrary string (e.g. a database column) to a RunStatus. */
export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUS_VALUES.has(value);
}

/**
 * A run record. Treated as an immutable value: every status change goes
 * through `transitionRun()`, which returns a new record.
 */
export interface Run {
  readonly id: string;
  readonly jobId: string;
  readonly status: RunStatus;
  /** Set only once results are published; non-null implies status DONE. */
  readonly resultsLocation: StorageLocation | null;
  readonly resultsPublishedAt: string | null;
  /** Opaque handle returned by the compute service on submission. */
  readonly externalJobHandle: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
  /** Optimistic-concurrency counter, owned by the store. */
  readonly version: number;
}

/** Input for creating a new run. */
export interface CreateRunInput {
  jobId: string;
  /** Optional caller-supplied id; generated when omitted. */
  id?: string;
}
