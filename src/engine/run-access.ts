/**
 * Identifier validation and ownership-checked run loading shared by the
 * engine services.
 */

import { RunNotFoundError, RunOwnershipMismatchError, ValidationError } from '../domain/errors';
import { Run } from '../domain/run';
import { RunStore } from '../storage/store';

export function assertIdentifier(name: string, value: unknown): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${name} must be a non-empty string`, { field: name });
  }
}

/** Load a run and verify it belongs to `jobId`. */
export async function loadOwnedRun(runs: RunStore, jobId: string, runId: string): Promise<Run> {
  const run = await runs.getById(runId);
  if (!run) throw new RunNotFoundError(runId, jobId);
  if (run.jobId !== jobId) throw new RunOwnershipMismatchError(runId, jobId, run.jobId);
  return run;
}
