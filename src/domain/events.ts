/**
 * Observability events emitted by the publisher and the synchronizer.
 */

import { RunStatus } from './run';

/** Which component drove a status change. */
export type TransitionSource = 'sync' | 'publish' | 'lifecycle';

export interface RunTransitionEvent {
  type: 'run.transition';
  timestamp: string;
  jobId: string;
  runId: string;
  from: RunStatus;
  to: RunStatus;
  source: TransitionSource;
}

export interface RetryExhaustedEvent {
  type: 'run.sync.retry_exhausted';
  timestamp: string;
  jobId: string;
  runId: string;
  /** Status left in place. */
  status: RunStatus;
  attempts: number;
  /** Sanitized failure reason. */
  reason: string;
}

export type RunObservabilityEvent = RunTransitionEvent | RetryExhaustedEvent;

export type RunObservabilityEventType = RunObservabilityEvent['type'];

/**
 * Receives observability events. Delivery is fire-and-forget: an
 * implementation may return a promise, but callers never await it and
 * failures never propagate.
 */
export interface ObservabilitySink {
  emit(event: RunObservabilityEvent): void | Promise<void>;
}

/** Subscription to a subset of events. */
export interface EventSubscription {
  id: string;
  eventTypes?: RunObservabilityEventType[];
  jobId?: string;
  callback: (event: RunObservabilityEvent) => void | Promise<void>;
}

export function createTransitionEvent(
  run: { id: string; jobId: string },
  from: RunStatus,
  to: RunStatus,
  source: TransitionSource,
  now: Date = new Date(),
): RunTransitionEvent {
  return { type: 'run.transition', timestamp: now.toISOString(), jobId: run.jobId, runId: run.id, from, to, source };
}

export function createRetryExhaustedEvent(
  run: { id: string; jobId: string; status: RunStatus },
  attempts: number,
  reason: string,
  now: Date = new Date(),
): RetryExhaustedEvent {
  return {
    type: 'run.sync.retry_exhausted',
    timestamp: now.toISOString(),
    jobId: run.jobId,
    runId: run.id,
    status: run.status,
    attempts,
    reason,
  };
}
