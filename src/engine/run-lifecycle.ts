/**
 * Run lifecycle service.
 *
 * Job and run creation plus the user-driven transitions: register,
 * submit to compute, cancel. Also lists result links and the runs a
 * refresh should look at.
 */

import { v4 as uuid } from 'uuid';
import { BatchComputeService, ComputeJobSpec } from '../compute/compute-service';
import { redactCredentials } from '../domain/credential-redaction';
import {
  InvalidTransitionError,
  JobNotFoundError,
  TransientExternalError,
  ValidationError,
  errorMessage,
} from '../domain/errors';
import { ObservabilitySink, createTransitionEvent } from '../domain/events';
import { CreateJobInput, Job, normalizeTags } from '../domain/job';
import { CreateRunInput, Run, RunStatus, TERMINAL_RUN_STATUSES } from '../domain/run';
import { emitSafely } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { ResultsStoreGateway } from '../object-store/results-store-gateway';
import { ListOptions, Store } from '../storage/store';
import { TimeoutError, mapWithConcurrency, withTimeout } from './retry';
import { assertIdentifier, loadOwnedRun } from './run-access';
import { canTransition, transitionRun } from './state-machine';

export interface RunLifecycleDeps {
  store: Store;
  compute: BatchComputeService;
  gateway: ResultsStoreGateway;
  sink: ObservabilitySink;
}

export interface RunLifecycleOptions {
  submitTimeoutMs?: number;
  cancelTimeoutMs?: number;
  /** Presign calls made in parallel by `listRunResults`. */
  presignConcurrency?: number;
  /** Link lifetime used by `listRunResults` when the caller gives none. Default 3600. */
  defaultResultsTtlSeconds?: number;
  knownSecrets?: readonly string[];
  now?: () => Date;
  logger?: Logger;
}

/** Retrieval link for one published run. */
export interface RunResultLink {
  runId: string;
  handle: string;
  url: string;
  publishedAt: string | null;
  expiresAt: string;
}

const ACTIVE_RUN_STATUSES: readonly RunStatus[] = Object.values(RunStatus).filter(
  (status) => !TERMINAL_RUN_STATUSES.has(status),
);

const COMPUTE_JOB_NAME_MAX = 128;

/** Compute job names allow letters, digits, hyphens and underscores. */
export function computeJobName(jobId: string, runId: string): string {
  return `run-${jobId}-${runId}`.replace(/[^A-Za-z0-9_-]/g, '-').slice(0, COMPUTE_JOB_NAME_MAX);
}

export class RunLifecycleService {
  private readonly submitTimeoutMs: number;
  private readonly cancelTimeoutMs: number;
  private readonly presignConcurrency: number;
  private readonly defaultResultsTtlSeconds: number;
  private readonly knownSecrets: readonly string[];
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: RunLifecycleDeps, options: RunLifecycleOptions = {}) {
    this.submitTimeoutMs = options.submitTimeoutMs ?? 30_000;
    this.cancelTimeoutMs = options.cancelTimeoutMs ?? 10_000;
    this.presignConcurrency = options.presignConcurrency ?? 8;
    this.defaultResultsTtlSeconds = options.defaultResultsTtlSeconds ?? 3600;
    this.knownSecrets = options.knownSecrets ?? [];
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ module: 'run-lifecycle' });
  }

  async createJob(input: CreateJobInput): Promise<Job> {
    assertIdentifier('ownerId', input.ownerId);
    if (input.id !== undefined) assertIdentifier('id', input.id);

    const job = await this.deps.store.jobs.create({
      id: input.id ?? `job_${uuid()}`,
      ownerId: input.ownerId.trim(),
      tags: normalizeTags(input.tags),
      createdAt: this.now().toISOString(),
    });
    this.log.info('Job created', { jobId: job.id, ownerId: job.ownerId });
    return job;
  }

  async createRun(input: CreateRunInput): Promise<Run> {
    assertIdentifier('jobId', input.jobId);
    if (input.id !== undefined) assertIdentifier('id', input.id);

    const job = await this.deps.store.jobs.getById(input.jobId);
    if (!job) throw new JobNotFoundError(input.jobId);

    const timestamp = this.now().toISOString();
    const run = await this.deps.store.runs.create({
      id: input.id ?? `run_${uuid()}`,
      jobId: job.id,
      status: RunStatus.Created,
      resultsLocation: null,
      resultsPublishedAt: null,
      externalJobHandle: null,
      createdAt: timestamp,
      updatedAt: timestamp,
      version: 0,
    });
    this.log.info('Run created', { jobId: run.jobId, runId: run.id });
    return run;
  }

  /** CREATED → REGISTERED. */
  async registerRun(jobId: string, runId: string): Promise<Run> {
    assertIdentifier('jobId', jobId);
    assertIdentifier('runId', runId);
    const run = await loadOwnedRun(this.deps.store.runs, jobId, runId);
    return this.commit(run, RunStatus.Registered);
  }

  /**
   * Hand the run to the compute service, then REGISTERED → SUBMITTED with
   * the returned handle. If the handle cannot be saved, the external job
   * is cancelled so it does not run unowned.
   */
  async submitRun(jobId: string, runId: string, spec: Partial<ComputeJobSpec> = {}): Promise<Run> {
    assertIdentifier('jobId', jobId);
    assertIdentifier('runId', runId);
    const run = await loadOwnedRun(this.deps.store.runs, jobId, runId);
    if (!canTransition(run.status, RunStatus.Submitted)) {
      throw new InvalidTransitionError(run.status, RunStatus.Submitted, run.id);
    }

    const jobSpec: ComputeJobSpec = {
      ...spec,
      jobName: spec.jobName ?? computeJobName(jobId, runId),
      environment: { ...spec.environment, SIMRUN_JOB_ID: jobId, SIMRUN_RUN_ID: runId },
    };
    const handle = await withTimeout(
      (signal) => this.deps.compute.submit(jobSpec, { signal }),
      this.submitTimeoutMs,
      'Compute submit',
    ).catch((err: unknown): never => {
      if (err instanceof TimeoutError) throw new TransientExternalError(err.message, { runId });
      throw err;
    });

    try {
      return await this.commit(run, RunStatus.Submitted, handle);
    } catch (err) {
      this.log.error('Submitted job could not be recorded; cancelling it', {
        runId,
        handle,
        error: errorMessage(err),
      });
      await this.cancelExternal(handle, 'Run submission could not be recorded');
      throw err;
    }
  }

  /** Move a non-terminal run to CANCELLED and stop its external job, if any. */
  async cancelRun(jobId: string, runId: string, reason = 'Cancelled by user'): Promise<Run> {
    assertIdentifier('jobId', jobId);
    assertIdentifier('runId', runId);
    const run = await loadOwnedRun(this.deps.store.runs, jobId, runId);
    const cancelled = await this.commit(run, RunStatus.Cancelled);
    if (run.externalJobHandle) {
      await this.cancelExternal(run.externalJobHandle, reason);
    }
    return cancelled;
  }

  /** Presigned links for every published run of the job. */
  async listRunResults(jobId: string, ttlSeconds = this.defaultResultsTtlSeconds): Promise<RunResultLink[]> {
    assertIdentifier('jobId', jobId);
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1) {
      throw new ValidationError('ttlSeconds must be a positive integer', { ttlSeconds });
    }
    const job = await this.deps.store.jobs.getById(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const done = await this.deps.store.runs.find({ jobId, statuses: [RunStatus.Done] });
    const published = done.flatMap((run) => (run.resultsLocation ? [{ run, location: run.resultsLocation }] : []));
    const expiresAt = new Date(this.now().getTime() + ttlSeconds * 1000).toISOString();

    return mapWithConcurrency(published, this.presignConcurrency, async ({ run, location }) => ({
      runId: run.id,
      handle: location.handle,
      url: await this.deps.gateway.retrievableUrl(location, ttlSeconds),
      publishedAt: run.resultsPublishedAt,
      expiresAt,
    }));
  }

  /** Runs not yet terminal, oldest first. */
  async listActiveRuns(jobId: string, options?: ListOptions): Promise<Run[]> {
    assertIdentifier('jobId', jobId);
    return this.deps.store.runs.find({ ...options, jobId, statuses: ACTIVE_RUN_STATUSES });
  }

  private async commit(run: Run, target: RunStatus, externalJobHandle?: string): Promise<Run> {
    const now = this.now();
    const next = transitionRun(run, target, externalJobHandle !== undefined ? { externalJobHandle } : {}, now);
    const saved = await this.deps.store.runs.save(next);
    emitSafely(this.deps.sink, createTransitionEvent(saved, run.status, target, 'lifecycle', now), this.log);
    this.log.info('Run transitioned', { jobId: run.jobId, runId: run.id, from: run.status, to: target });
    return saved;
  }

  /** Best effort: failures are logged, never raised. */
  private async cancelExternal(handle: string, reason: string): Promise<void> {
    try {
      await withTimeout(() => this.deps.compute.cancel(handle, reason), this.cancelTimeoutMs, 'Compute cancel');
    } catch (err) {
      this.log.warn('External job cancel failed', {
        handle,
        error: redactCredentials(errorMessage(err), this.knownSecrets),
      });
    }
  }
}
