import { EXTERNAL_PHASE_TO_RUN_STATUS, mapExternalPhase } from '../../src/compute/compute-service';
import { RunStatus } from '../../src/domain/run';

describe('mapExternalPhase', () => {
  test.each([
    ['SUBMITTED', RunStatus.Submitted],
    ['PENDING', RunStatus.Queued],
    ['RUNNABLE', RunStatus.Queued],
    ['STARTING', RunStatus.Running],
    ['RUNNING', RunStatus.Running],
    ['SUCCEEDED', RunStatus.Running],
    ['FAILED', RunStatus.Failed],
  ])('%s -> %s', (phase, status) => {
    expect(mapExternalPhase(phase)).toBe(status);
  });

  test('a successful compute job never maps to DONE', () => {
    expect(Object.values(EXTERNAL_PHASE_TO_RUN_STATUS)).not.toContain(RunStatus.Done);
  });

  test('phase names are case-insensitive', () => {
    expect(mapExternalPhase(' runnable ')).toBe(RunStatus.Queued);
  });

  test('unknown phases map to nothing', () => {
    expect(mapExternalPhase('HIBERNATING')).toBeUndefined();
    expect(mapExternalPhase('toString')).toBeUndefined();
  });
});
