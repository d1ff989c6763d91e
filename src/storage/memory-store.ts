/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Mirrors the
 * PostgreSQL store's guarantees: runs must reference an existing job and
 * run saves are compare-and-set on `version`.
 */

import { OrphanRecord } from '../domain/artifact';
import { ConcurrentModificationError, JobNotFoundError, RunNotFoundError, ValidationError } from '../domain/errors';
import { Job } from '../domain/job';
import { Run } from '../domain/run';
import {
  DEFAULT_LIST_LIMIT,
  JobStore,
  ListOptions,
  OrphanStore,
  RunQuery,
  RunStore,
  Store,
  compareRuns,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? DEFAULT_LIST_LIMIT;
  return items.slice(offset, offset + limit);
}

/**
 * Callers must never hold references into the store's own records, so
 * everything crossing the boundary is cloned.
 */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryJobStore implements JobStore {
  readonly data = new Map<string, Job>();

  async create(job: Job): Promise<Job> {
    if (this.data.has(job.id)) {
      throw new ValidationError(`Job already exists: ${job.id}`, { jobId: job.id }, 'VALIDATION.DUPLICATE_ID');
    }
    this.data.set(job.id, deepCopy(job));
    return deepCopy(job);
  }

  async getById(id: string): Promise<Job | null> {
    const job = this.data.get(id);
    return job ? deepCopy(job) : null;
  }
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, Run>();

  constructor(private readonly jobs: MemoryJobStore) {}

  async create(run: Run): Promise<Run> {
    if (!this.jobs.data.has(run.jobId)) throw new JobNotFoundError(run.jobId);
    if (this.data.has(run.id)) {
      throw new ValidationError(`Run already exists: ${run.id}`, { runId: run.id }, 'VALIDATION.DUPLICATE_ID');
    }
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<Run | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async find(query: RunQuery): Promise<Run[]> {
    const statuses = query.statuses ? new Set(query.statuses) : undefined;
    const items = [...this.data.values()]
      .filter((r) => query.jobId === undefined || r.jobId === query.jobId)
      .filter((r) => statuses === undefined || statuses.has(r.status))
      .sort(compareRuns);
    return applyListOptions(items, query).map(deepCopy);
  }

  async save(run: Run): Promise<Run> {
    const existing = this.data.get(run.id);
    if (!existing) throw new RunNotFoundError(run.id, run.jobId);
    if (existing.version !== run.version) throw new ConcurrentModificationError(run.id, run.version);

    const stored: Run = { ...deepCopy(run), version: run.version + 1 };
    this.data.set(run.id, stored);
    return deepCopy(stored);
  }

  async listByJob(jobId: string, options?: ListOptions): Promise<Run[]> {
    return this.find({ ...options, jobId });
  }
}

class MemoryOrphanStore implements OrphanStore {
  private data: OrphanRecord[] = [];

  async record(orphan: OrphanRecord): Promise<OrphanRecord> {
    this.data.push(deepCopy(orphan));
    return deepCopy(orphan);
  }

  async list(options?: ListOptions): Promise<OrphanRecord[]> {
    return applyListOptions(this.data, options).map(deepCopy);
  }
}

/** Create an in-memory store instance. */
export function createMemoryStore(): Store {
  const jobs = new MemoryJobStore();
  return {
    jobs,
    runs: new MemoryRunStore(jobs),
    orphans: new MemoryOrphanStore(),
  };
}
