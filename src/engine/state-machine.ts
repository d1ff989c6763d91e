/**
 * Run state machine.
 *
 * The single gate through which every run status mutation passes,
 * including those driven by status synchronization and results
 * publishing. Runs are values: a transition returns a new record and
 * never touches its input.
 */

import { Run, RunStatus, TERMINAL_RUN_STATUSES, VALID_RUN_TRANSITIONS } from '../domain/run';
import { StorageLocation } from '../domain/artifact';
import { TypedError, InvalidTransitionError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Field changes that may only accompany specific transitions. */
export interface TransitionPatch {
  /** Required with, and only allowed for, DONE. */
  resultsLocation?: StorageLocation;
  resultsPublishedAt?: string;
  /** Required with, and only allowed for, SUBMITTED. */
  externalJobHandle?: string;
}

/** Attempt a run state transition without throwing. */
export function tryTransitionRunStatus(
  current: RunStatus,
  target: RunStatus,
): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function canTransition(current: RunStatus, target: RunStatus): boolean {
  return VALID_RUN_TRANSITIONS[current].includes(target);
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.has(status);
}

/**
 * Apply a transition to a run.
 *
 * @throws InvalidTransitionError when the edge is not in the table or the
 *   patch does not fit the target status. The input run is never modified.
 */
export function transitionRun(
  run: Run,
  target: RunStatus,
  patch: TransitionPatch = {},
  now: Date = new Date(),
): Run {
  if (!canTransition(run.status, target)) {
    throw new InvalidTransitionError(run.status, target, run.id);
  }

  const hasResults = patch.resultsLocation !== undefined || patch.resultsPublishedAt !== undefined;
  if (target === RunStatus.Done) {
    if (!patch.resultsLocation || !patch.resultsPublishedAt) {
      throw new InvalidTransitionError(run.status, target, run.id, 'results location and publish time are required');
    }
  } else if (hasResults) {
    throw new InvalidTransitionError(run.status, target, run.id, 'results may only be attached when completing a run');
  }

  if (target === RunStatus.Submitted) {
    if (!patch.externalJobHandle) {
      throw new InvalidTransitionError(run.status, target, run.id, 'an external job handle is required');
    }
  } else if (patch.externalJobHandle !== undefined) {
    throw new InvalidTransitionError(run.status, target, run.id, 'an external job handle may only be set on submission');
  }

  return {
    ...run,
    status: target,
    resultsLocation: patch.resultsLocation ?? run.resultsLocation,
    resultsPublishedAt: patch.resultsPublishedAt ?? run.resultsPublishedAt,
    externalJobHandle: patch.externalJobHandle ?? run.externalJobHandle,
    updatedAt: now.toISOString(),
  };
}

/**
 * Shortest chain of allowed edges from `current` to `target`, excluding
 * `current` itself. Empty when the target is unreachable or equal to the
 * current status. The table has no backward edges, so every returned
 * path moves the run forward.
 */
export function planForwardPath(current: RunStatus, target: RunStatus): RunStatus[] {
  if (current === target) return [];

  const previous = new Map<RunStatus, RunStatus>();
  const queue: RunStatus[] = [current];
  const visited = new Set<RunStatus>([current]);

  while (queue.length > 0) {
    const status = queue.shift();
    if (status === undefined) break;
    for (const next of VALID_RUN_TRANSITIONS[status]) {
      if (visited.has(next)) continue;
      visited.add(next);
      previous.set(next, status);
      if (next === target) {
        const path: RunStatus[] = [next];
        let cursor = status;
        while (cursor !== current) {
          path.unshift(cursor);
          const before = previous.get(cursor);
          if (before === undefined) break;
          cursor = before;
        }
        return path;
      }
      queue.push(next);
    }
  }

  return [];
}
