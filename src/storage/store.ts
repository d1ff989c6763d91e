/**
 * Storage layer interfaces.
 *
 * Defines the contract for job, run and orphan persistence with pluggable
 * backends. Run writes are optimistic: `save` only succeeds against the
 * version the caller read.
 */

import { OrphanRecord } from '../domain/artifact';
import { Job } from '../domain/job';
import { Run, RunStatus } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for jobs. Jobs are immutable once created. */
export interface JobStore {
  create(job: Job): Promise<Job>;
  getById(id: string): Promise<Job | null>;
}

/** Filter for `RunStore.find`. Omitted fields match everything. */
export interface RunQuery extends ListOptions {
  jobId?: string;
  statuses?: readonly RunStatus[];
}

/** Store interface for runs. */
export interface RunStore {
  /** Insert a new run. Fails with JobNotFoundError when the job does not exist. */
  create(run: Run): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  find(query: RunQuery): Promise<Run[]>;
  /**
   * Persist `run` if the stored version still equals `run.version`.
   * Returns the stored record with its version incremented.
   *
   * @throws ConcurrentModificationError when another writer got there first.
   * @throws RunNotFoundError when the run does not exist.
   */
  save(run: Run): Promise<Run>;
  listByJob(jobId: string, options?: ListOptions): Promise<Run[]>;
}

/** Compensation records for uploads whose metadata commit failed. */
export interface OrphanStore {
  record(orphan: OrphanRecord): Promise<OrphanRecord>;
  list(options?: ListOptions): Promise<OrphanRecord[]>;
}

/** Composite store interface. */
export interface Store {
  jobs: JobStore;
  runs: RunStore;
  orphans: OrphanStore;
}

export const DEFAULT_LIST_LIMIT = 100;

/** Stable ordering for run listings: creation time, then id. */
export function compareRuns(a: Run, b: Run): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
