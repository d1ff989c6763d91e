import { createMemoryStore } from '../../src/storage/memory-store';
import { createStorageLocation } from '../../src/domain/artifact';
import { ConcurrentModificationError, JobNotFoundError, RunNotFoundError, ValidationError } from '../../src/domain/errors';
import { RunStatus } from '../../src/domain/run';
import { makeRun } from '../helpers/fakes';

const JOB = { id: 'job-1', ownerId: 'owner-1', tags: ['a'], createdAt: '2024-05-01T00:00:00.000Z' };

async function seeded() {
  const store = createMemoryStore();
  await store.jobs.create(JOB);
  return store;
}

describe('MemoryStore jobs', () => {
  test('create and fetch', async () => {
    const store = await seeded();
    await expect(store.jobs.getById('job-1')).resolves.toEqual(JOB);
    await expect(store.jobs.getById('job-2')).resolves.toBeNull();
  });

  test('duplicate ids are rejected', async () => {
    const store = await seeded();
    await expect(store.jobs.create(JOB)).rejects.toThrow(ValidationError);
  });
});

describe('MemoryStore runs', () => {
  test('runs must reference an existing job', async () => {
    const store = createMemoryStore();
    await expect(store.runs.create(makeRun())).rejects.toThrow(JobNotFoundError);
  });

  test('returned records are copies', async () => {
    const store = await seeded();
    await store.runs.create(makeRun());

    const fetched = await store.runs.getById('run-1');
    expect(fetched).not.toBeNull();
    Object.assign(fetched ?? {}, { status: RunStatus.Failed });

    const again = await store.runs.getById('run-1');
    expect(again?.status).toBe(RunStatus.Created);
  });

  test('save increments the version', async () => {
    const store = await seeded();
    const created = await store.runs.create(makeRun());

    const saved = await store.runs.save({ ...created, status: RunStatus.Registered });
    expect(saved.version).toBe(1);
    expect(saved.status).toBe(RunStatus.Registered);
    await expect(store.runs.getById('run-1')).resolves.toEqual(saved);
  });

  test('save with a stale version conflicts and leaves the record alone', async () => {
    const store = await seeded();
    const created = await store.runs.create(makeRun());
    await store.runs.save({ ...created, status: RunStatus.Registered });

    await expect(store.runs.save({ ...created, status: RunStatus.Cancelled })).rejects.toThrow(
      ConcurrentModificationError,
    );
    const stored = await store.runs.getById('run-1');
    expect(stored?.status).toBe(RunStatus.Registered);
    expect(stored?.version).toBe(1);
  });

  test('save of an unknown run', async () => {
    const store = await seeded();
    await expect(store.runs.save(makeRun({ id: 'run-x' }))).rejects.toThrow(RunNotFoundError);
  });

  test('find filters by job and status in creation order', async () => {
    const store = await seeded();
    await store.jobs.create({ ...JOB, id: 'job-2' });
    await store.runs.create(makeRun({ id: 'run-b', createdAt: '2024-05-01T00:00:02.000Z', status: RunStatus.Running }));
    await store.runs.create(makeRun({ id: 'run-a', createdAt: '2024-05-01T00:00:01.000Z', status: RunStatus.Queued }));
    await store.runs.create(makeRun({ id: 'run-c', createdAt: '2024-05-01T00:00:03.000Z', status: RunStatus.Done }));
    await store.runs.create(makeRun({ id: 'run-d', jobId: 'job-2', status: RunStatus.Running }));

    const active = await store.runs.find({ jobId: 'job-1', statuses: [RunStatus.Queued, RunStatus.Running] });
    expect(active.map((r) => r.id)).toEqual(['run-a', 'run-b']);

    const all = await store.runs.listByJob('job-1', { limit: 2, offset: 1 });
    expect(all.map((r) => r.id)).toEqual(['run-b', 'run-c']);
  });
});

describe('MemoryStore orphans', () => {
  test('records and lists', async () => {
    const store = createMemoryStore();
    const orphan = {
      id: 'orphan-1',
      location: createStorageLocation('test-results', 'jobs/job-1/run_run-1_results.zip'),
      jobId: 'job-1',
      runId: 'run-1',
      createdAt: '2024-05-01T12:00:00.000Z',
      reason: 'connection lost',
    };
    await store.orphans.record(orphan);
    await expect(store.orphans.list()).resolves.toEqual([orphan]);
  });
});
