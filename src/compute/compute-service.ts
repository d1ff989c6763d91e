/**
 * Batch compute service contract and status vocabulary.
 *
 * The compute service speaks its own phase names. Only the table below
 * translates them into run statuses; nothing else in the package
 * interprets a phase string.
 */

import { RunStatus } from '../domain/run';

/** What to run. Queue and definition fall back to the adapter's defaults. */
export interface ComputeJobSpec {
  jobName: string;
  jobQueue?: string;
  jobDefinition?: string;
  command?: string[];
  environment?: Record<string, string>;
}

export interface ComputeJobDetail {
  statusReason?: string;
  exitCode?: number;
  startedAt?: string;
  stoppedAt?: string;
}

export interface ComputeJobDescription {
  /** Provider phase name, e.g. "RUNNABLE". */
  phase: string;
  detail: ComputeJobDetail;
}

export interface ComputeCallOptions {
  signal?: AbortSignal;
}

/**
 * Asynchronous batch compute service.
 *
 * `submit` and `describe` throw TransientExternalError for failures worth
 * retrying, TerminalExternalError when the job no longer exists, and
 * ComputeServiceError when the service refuses the call for other reasons.
 */
export interface BatchComputeService {
  submit(spec: ComputeJobSpec, options?: ComputeCallOptions): Promise<string>;
  describe(handle: string, options?: ComputeCallOptions): Promise<ComputeJobDescription>;
  cancel(handle: string, reason: string): Promise<void>;
}

/**
 * Provider phase → run status. SUCCEEDED maps to RUNNING: a run is only
 * DONE once its results are published.
 */
export const EXTERNAL_PHASE_TO_RUN_STATUS: Readonly<Record<string, RunStatus>> = {
  SUBMITTED: RunStatus.Submitted,
  PENDING: RunStatus.Queued,
  RUNNABLE: RunStatus.Queued,
  STARTING: RunStatus.Running,
  RUNNING: RunStatus.Running,
  SUCCEEDED: RunStatus.Running,
  FAILED: RunStatus.Failed,
};

/** Mapped status, or undefined for a phase outside the table. */
export function mapExternalPhase(phase: string): RunStatus | undefined {
  const key = phase.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(EXTERNAL_PHASE_TO_RUN_STATUS, key)
    ? EXTERNAL_PHASE_TO_RUN_STATUS[key]
    : undefined;
}
