import {
  canTransition,
  isTerminalRunStatus,
  planForwardPath,
  transitionRun,
  tryTransitionRunStatus,
} from '../../src/engine/state-machine';
import { RunStatus } from '../../src/domain/run';
import { createStorageLocation } from '../../src/domain/artifact';
import { InvalidTransitionError } from '../../src/domain/errors';
import { FIXED_NOW, catchError, makeRun } from '../helpers/fakes';

const ALLOWED: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Registered, RunStatus.Cancelled],
  [RunStatus.Registered]: [RunStatus.Submitted, RunStatus.Cancelled],
  [RunStatus.Submitted]: [RunStatus.Queued, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Queued]: [RunStatus.Running, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Running]: [RunStatus.Done, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Done]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Cancelled]: [],
};

const ALL_STATUSES = Object.values(RunStatus);
const LOCATION = createStorageLocation('test-results', 'jobs/job-1/run_run-1_results.zip');

function patchFor(target: RunStatus) {
  if (target === RunStatus.Done) return { resultsLocation: LOCATION, resultsPublishedAt: FIXED_NOW.toISOString() };
  if (target === RunStatus.Submitted) return { externalJobHandle: 'batch-1' };
  return {};
}

describe('Run state machine transition table', () => {
  for (const from of ALL_STATUSES) {
    for (const to of ALL_STATUSES) {
      const allowed = ALLOWED[from].includes(to);

      test(`${from} -> ${to} is ${allowed ? 'allowed' : 'rejected'}`, () => {
        expect(canTransition(from, to)).toBe(allowed);

        const result = tryTransitionRunStatus(from, to);
        expect(result.success).toBe(allowed);
        if (!allowed) expect(result.error!.code).toBe('RUN.INVALID_TRANSITION');

        const run = makeRun({ status: from });
        if (allowed) {
          expect(transitionRun(run, to, patchFor(to), FIXED_NOW).status).toBe(to);
        } else {
          expect(() => transitionRun(run, to, patchFor(to), FIXED_NOW)).toThrow(
            `Invalid run state transition: ${from} -> ${to}`,
          );
        }
      });
    }
  }

  test('terminal status detection', () => {
    expect(ALL_STATUSES.filter(isTerminalRunStatus)).toEqual([RunStatus.Done, RunStatus.Failed, RunStatus.Cancelled]);
  });
});

describe('transitionRun', () => {
  test('returns a new record and leaves the input unchanged', () => {
    const run = makeRun({ status: RunStatus.Queued });
    const next = transitionRun(run, RunStatus.Running, {}, FIXED_NOW);

    expect(next).not.toBe(run);
    expect(run.status).toBe(RunStatus.Queued);
    expect(run.updatedAt).toBe('2024-05-01T00:00:00.000Z');
    expect(next.updatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(next.version).toBe(run.version);
  });

  test('rejected transition names the pair and carries a typed error', () => {
    const run = makeRun({ id: 'run-9', status: RunStatus.Done });
    const error = catchError(() => transitionRun(run, RunStatus.Running));

    expect(error).toBeInstanceOf(InvalidTransitionError);
    if (!(error instanceof InvalidTransitionError)) return;
    expect(error.from).toBe(RunStatus.Done);
    expect(error.to).toBe(RunStatus.Running);
    expect(error.typedError.runId).toBe('run-9');
  });

  test('DONE requires both results fields', () => {
    const run = makeRun({ status: RunStatus.Running });
    expect(() => transitionRun(run, RunStatus.Done, { resultsLocation: LOCATION })).toThrow(
      'Invalid run state transition: RUNNING -> DONE (results location and publish time are required)',
    );
  });

  test('DONE attaches results', () => {
    const run = makeRun({ status: RunStatus.Running });
    const done = transitionRun(run, RunStatus.Done, patchFor(RunStatus.Done), FIXED_NOW);
    expect(done.resultsLocation).toEqual(LOCATION);
    expect(done.resultsPublishedAt).toBe('2024-05-01T12:00:00.000Z');
  });

  test('results cannot accompany any other target', () => {
    const run = makeRun({ status: RunStatus.Running });
    expect(() => transitionRun(run, RunStatus.Failed, { resultsLocation: LOCATION })).toThrow(
      'Invalid run state transition: RUNNING -> FAILED (results may only be attached when completing a run)',
    );
  });

  test('SUBMITTED requires an external handle', () => {
    const run = makeRun({ status: RunStatus.Registered });
    expect(() => transitionRun(run, RunStatus.Submitted)).toThrow(
      'Invalid run state transition: REGISTERED -> SUBMITTED (an external job handle is required)',
    );
    expect(transitionRun(run, RunStatus.Submitted, { externalJobHandle: 'batch-7' }).externalJobHandle).toBe('batch-7');
  });

  test('an external handle is rejected on other targets', () => {
    const run = makeRun({ status: RunStatus.Submitted, externalJobHandle: 'batch-1' });
    expect(() => transitionRun(run, RunStatus.Queued, { externalJobHandle: 'batch-2' })).toThrow(
      'Invalid run state transition: SUBMITTED -> QUEUED (an external job handle may only be set on submission)',
    );
  });
});

describe('planForwardPath', () => {
  test('walks intermediate states', () => {
    expect(planForwardPath(RunStatus.Submitted, RunStatus.Running)).toEqual([RunStatus.Queued, RunStatus.Running]);
  });

  test('single edge', () => {
    expect(planForwardPath(RunStatus.Queued, RunStatus.Failed)).toEqual([RunStatus.Failed]);
  });

  test('no path backward or to the same status', () => {
    expect(planForwardPath(RunStatus.Running, RunStatus.Queued)).toEqual([]);
    expect(planForwardPath(RunStatus.Running, RunStatus.Running)).toEqual([]);
    expect(planForwardPath(RunStatus.Failed, RunStatus.Running)).toEqual([]);
  });
});
