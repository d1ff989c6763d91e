/**
 * Run status synchronizer.
 *
 * Reconciles runs with the batch compute service. Each non-terminal run
 * with an external handle is described (with timeout and backoff),
 * the provider phase is mapped to a run status, and the stored run is
 * walked forward to it one allowed edge at a time. A run is never moved
 * backward and is written at most once per refresh.
 *
 * Failures degrade per run: the run is left as it was, an event is
 * emitted, and the rest of the batch carries on.
 */

import { BatchComputeService, ComputeJobDescription, mapExternalPhase } from '../compute/compute-service';
import { redactCredentials } from '../domain/credential-redaction';
import {
  ConcurrentModificationError,
  InvalidTransitionError,
  TerminalExternalError,
  TransientExternalError,
  errorMessage,
} from '../domain/errors';
import { ObservabilitySink, createRetryExhaustedEvent, createTransitionEvent } from '../domain/events';
import { Run, RunStatus } from '../domain/run';
import { emitSafely } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { RunStore } from '../storage/store';
import {
  DEFAULT_RETRY_POLICY,
  RetryPolicy,
  TimeoutError,
  mapWithConcurrency,
  retryWithBackoff,
  withTimeout,
} from './retry';
import { isTerminalRunStatus, planForwardPath, transitionRun } from './state-machine';

export interface StatusSynchronizerOptions {
  describeTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Runs described in parallel. */
  concurrency?: number;
  knownSecrets?: readonly string[];
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
  logger?: Logger;
}

export class RunStatusSynchronizer {
  private readonly describeTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly concurrency: number;
  private readonly knownSecrets: readonly string[];
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly compute: BatchComputeService,
    private readonly runs: RunStore,
    private readonly sink: ObservabilitySink,
    private readonly options: StatusSynchronizerOptions = {},
  ) {
    this.describeTimeoutMs = options.describeTimeoutMs ?? 10_000;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.concurrency = options.concurrency ?? 8;
    this.knownSecrets = options.knownSecrets ?? [];
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ module: 'status-synchronizer' });
  }

  /** Refresh every run; the result keeps the input order. */
  async refresh(runs: readonly Run[]): Promise<Run[]> {
    return mapWithConcurrency(runs, this.concurrency, (run) => this.refreshOne(run));
  }

  private async refreshOne(run: Run): Promise<Run> {
    if (isTerminalRunStatus(run.status) || !run.externalJobHandle) return run;
    const handle = run.externalJobHandle;

    const outcome = await retryWithBackoff(
      () => this.describe(handle),
      this.retryPolicy,
      {
        isRetryable: (err) => err instanceof TransientExternalError,
        onRetry: (err, attempt, delayMs) =>
          this.log.debug('Retrying compute describe', {
            runId: run.id,
            attempt,
            delayMs,
            error: redactCredentials(errorMessage(err), this.knownSecrets),
          }),
        sleep: this.options.sleep,
        random: this.options.random,
      },
    );

    if (outcome.ok) {
      const target = mapExternalPhase(outcome.value.phase);
      if (target === undefined) {
        this.log.debug('Ignoring unknown compute phase', { runId: run.id, phase: outcome.value.phase });
        return run;
      }
      return this.advance(run, target);
    }

    if (outcome.error instanceof TerminalExternalError) {
      this.log.warn('Compute job unreachable; failing run', {
        runId: run.id,
        error: redactCredentials(outcome.error.message, this.knownSecrets),
      });
      return this.advance(run, RunStatus.Failed);
    }

    const reason = redactCredentials(errorMessage(outcome.error), this.knownSecrets);
    this.log.warn('Compute describe failed; leaving run unchanged', {
      runId: run.id,
      attempts: outcome.attempts,
      exhausted: outcome.exhausted,
      reason,
    });
    emitSafely(this.sink, createRetryExhaustedEvent(run, outcome.attempts, reason, this.now()), this.log);
    return run;
  }

  private async describe(handle: string): Promise<ComputeJobDescription> {
    try {
      return await withTimeout(
        (signal) => this.compute.describe(handle, { signal }),
        this.describeTimeoutMs,
        'Compute describe',
      );
    } catch (err) {
      if (err instanceof TimeoutError) throw new TransientExternalError(err.message, { handle });
      throw err;
    }
  }

  /** Move the stored run forward to `target`, if that is a forward move. */
  private async advance(run: Run, target: RunStatus): Promise<Run> {
    let stored: Run | null;
    try {
      stored = await this.runs.getById(run.id);
    } catch (err) {
      this.log.error('Could not reload run', { runId: run.id, error: errorMessage(err) });
      return run;
    }
    if (!stored) {
      this.log.warn('Run disappeared during refresh', { runId: run.id });
      return run;
    }

    const path = planForwardPath(stored.status, target);
    if (path.length === 0) {
      if (stored.status !== target) {
        this.log.debug('Skipping non-forward status signal', { runId: run.id, current: stored.status, signalled: target });
      }
      return stored;
    }

    const now = this.now();
    let next = stored;
    try {
      for (const status of path) {
        next = transitionRun(next, status, {}, now);
      }
    } catch (err) {
      if (!(err instanceof InvalidTransitionError)) throw err;
      this.log.debug('Skipping status signal', { runId: run.id, current: stored.status, signalled: target, reason: err.message });
      return stored;
    }

    let saved: Run;
    try {
      saved = await this.runs.save(next);
    } catch (err) {
      if (err instanceof ConcurrentModificationError) {
        this.log.info('Run changed during refresh; leaving for the next pass', { runId: run.id });
      } else {
        this.log.error('Could not save refreshed run', { runId: run.id, error: errorMessage(err) });
      }
      return stored;
    }

    let from = stored.status;
    for (const status of path) {
      emitSafely(this.sink, createTransitionEvent(saved, from, status, 'sync', now), this.log);
      from = status;
    }
    this.log.info('Run status refreshed', { runId: run.id, from: stored.status, to: saved.status });
    return saved;
  }
}
