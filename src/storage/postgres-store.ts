/**
 * PostgreSQL storage implementation.
 *
 * Queries go through a minimal `SqlExecutor` so the store can run against
 * a `pg` pool in production and an in-process fake in tests. Run saves use
 * `UPDATE ... WHERE id = $1 AND version = $2` as the compare-and-set.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { Pool, type PoolConfig } from 'pg';
import { z } from 'zod';
import { OrphanRecord, createStorageLocation } from '../domain/artifact';
import {
  ConcurrentModificationError,
  JobNotFoundError,
  PersistenceError,
  RunControlError,
  RunNotFoundError,
  ValidationError,
} from '../domain/errors';
import { Job } from '../domain/job';
import { Run, isRunStatus } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { DEFAULT_LIST_LIMIT, JobStore, ListOptions, OrphanStore, RunQuery, RunStore, Store } from './store';

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

/** The one capability the store needs from a database client. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_UNIQUE_VIOLATION = '23505';

const RUN_COLUMNS =
  'id, job_id, status, results_bucket, results_key, results_published_at, external_job_handle, created_at, updated_at, version';

export const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

const timestamp = z.union([z.date(), z.string()]).transform((value) => new Date(value).toISOString());

const jobRow = z.object({
  id: z.string(),
  owner_id: z.string(),
  tags: z.array(z.string()).nullable(),
  created_at: timestamp,
});

const runRow = z.object({
  id: z.string(),
  job_id: z.string(),
  status: z.string(),
  results_bucket: z.string().nullable(),
  results_key: z.string().nullable(),
  results_published_at: timestamp.nullable(),
  external_job_handle: z.string().nullable(),
  created_at: timestamp,
  updated_at: timestamp,
  version: z.coerce.number().int(),
});

const orphanRow = z.object({
  id: z.string(),
  job_id: z.string(),
  run_id: z.string(),
  bucket: z.string(),
  object_key: z.string(),
  reason: z.string(),
  created_at: timestamp,
});

function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : undefined;
}

function toJob(raw: unknown): Job {
  const row = jobRow.parse(raw);
  return {
    id: row.id,
    ownerId: row.owner_id,
    tags: row.tags ?? [],
    createdAt: row.created_at,
  };
}

function toRun(raw: unknown): Run {
  const row = runRow.parse(raw);
  const status = row.status;
  if (!isRunStatus(status)) {
    throw new PersistenceError(`Run ${row.id} has unknown status ${status}`);
  }
  return {
    id: row.id,
    jobId: row.job_id,
    status,
    resultsLocation:
      row.results_bucket !== null && row.results_key !== null
        ? createStorageLocation(row.results_bucket, row.results_key)
        : null,
    resultsPublishedAt: row.results_published_at,
    externalJobHandle: row.external_job_handle,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: row.version,
  };
}

function toOrphan(raw: unknown): OrphanRecord {
  const row = orphanRow.parse(raw);
  return {
    id: row.id,
    location: createStorageLocation(row.bucket, row.object_key),
    jobId: row.job_id,
    runId: row.run_id,
    createdAt: row.created_at,
    reason: row.reason,
  };
}

class PostgresJobStore implements JobStore {
  constructor(private readonly db: SqlExecutor, private readonly guard: Guard) {}

  create(job: Job): Promise<Job> {
    return this.guard(`create job ${job.id}`, async () => {
      const result = await this.db
        .query(
          'INSERT INTO jobs (id, owner_id, tags, created_at) VALUES ($1, $2, $3, $4) RETURNING id, owner_id, tags, created_at',
          [job.id, job.ownerId, [...job.tags], job.createdAt],
        )
        .catch((err: unknown): never => {
          if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) {
            throw new ValidationError(`Job already exists: ${job.id}`, { jobId: job.id }, 'VALIDATION.DUPLICATE_ID');
          }
          throw err;
        });
      return toJob(result.rows[0]);
    });
  }

  getById(id: string): Promise<Job | null> {
    return this.guard(`load job ${id}`, async () => {
      const result = await this.db.query('SELECT id, owner_id, tags, created_at FROM jobs WHERE id = $1', [id]);
      return result.rows.length > 0 ? toJob(result.rows[0]) : null;
    });
  }
}

class PostgresRunStore implements RunStore {
  constructor(private readonly db: SqlExecutor, private readonly guard: Guard) {}

  create(run: Run): Promise<Run> {
    return this.guard(`create run ${run.id}`, async () => {
      const result = await this.db
        .query(
          `INSERT INTO runs (${RUN_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10) RETURNING ${RUN_COLUMNS}`,
          [
            run.id,
            run.jobId,
            run.status,
            run.resultsLocation?.bucket ?? null,
            run.resultsLocation?.key ?? null,
            run.resultsPublishedAt,
            run.externalJobHandle,
            run.createdAt,
            run.updatedAt,
            run.version,
          ],
        )
        .catch((err: unknown): never => {
          const code = pgErrorCode(err);
          if (code === PG_FOREIGN_KEY_VIOLATION) throw new JobNotFoundError(run.jobId);
          if (code === PG_UNIQUE_VIOLATION) {
            throw new ValidationError(`Run already exists: ${run.id}`, { runId: run.id }, 'VALIDATION.DUPLICATE_ID');
          }
          throw err;
        });
      return toRun(result.rows[0]);
    });
  }

  getById(id: string): Promise<Run | null> {
    return this.guard(`load run ${id}`, async () => {
      const result = await this.db.query(`SELECT ${RUN_COLUMNS} FROM runs WHERE id = $1`, [id]);
      return result.rows.length > 0 ? toRun(result.rows[0]) : null;
    });
  }

  find(query: RunQuery): Promise<Run[]> {
    return this.guard('find runs', async () => {
      const conditions: string[] = [];
      const values: unknown[] = [];
      if (query.jobId !== undefined) {
        values.push(query.jobId);
        conditions.push(`job_id = $${values.length}`);
      }
      if (query.statuses !== undefined) {
        values.push([...query.statuses]);
        conditions.push(`status = ANY($${values.length})`);
      }
      values.push(query.limit ?? DEFAULT_LIST_LIMIT);
      const limitParam = values.length;
      values.push(query.offset ?? 0);
      const offsetParam = values.length;

      const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
      const result = await this.db.query(
        `SELECT ${RUN_COLUMNS} FROM runs${where} ORDER BY created_at, id LIMIT $${limitParam} OFFSET $${offsetParam}`,
        values,
      );
      return result.rows.map(toRun);
    });
  }

  save(run: Run): Promise<Run> {
    return this.guard(`save run ${run.id}`, async () => {
      const result = await this.db.query(
        `UPDATE runs
            SET status = $3,
                results_bucket = $4,
                results_key = $5,
                results_published_at = $6,
                external_job_handle = $7,
                updated_at = $8,
                version = version + 1
          WHERE id = $1 AND version = $2
          RETURNING ${RUN_COLUMNS}`,
        [
          run.id,
          run.version,
          run.status,
          run.resultsLocation?.bucket ?? null,
          run.resultsLocation?.key ?? null,
          run.resultsPublishedAt,
          run.externalJobHandle,
          run.updatedAt,
        ],
      );
      if (result.rows.length > 0) return toRun(result.rows[0]);

      const exists = await this.db.query('SELECT id FROM runs WHERE id = $1', [run.id]);
      if (exists.rows.length === 0) throw new RunNotFoundError(run.id, run.jobId);
      throw new ConcurrentModificationError(run.id, run.version);
    });
  }

  listByJob(jobId: string, options?: ListOptions): Promise<Run[]> {
    return this.find({ ...options, jobId });
  }
}

class PostgresOrphanStore implements OrphanStore {
  constructor(private readonly db: SqlExecutor, private readonly guard: Guard) {}

  record(orphan: OrphanRecord): Promise<OrphanRecord> {
    return this.guard(`record orphan ${orphan.location.handle}`, async () => {
      const result = await this.db.query(
        `INSERT INTO results_orphans (id, job_id, run_id, bucket, object_key, reason, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING id, job_id, run_id, bucket, object_key, reason, created_at`,
        [
          orphan.id,
          orphan.jobId,
          orphan.runId,
          orphan.location.bucket,
          orphan.location.key,
          orphan.reason,
          orphan.createdAt,
        ],
      );
      return toOrphan(result.rows[0]);
    });
  }

  list(options?: ListOptions): Promise<OrphanRecord[]> {
    return this.guard('list orphans', async () => {
      const result = await this.db.query(
        'SELECT id, job_id, run_id, bucket, object_key, reason, created_at FROM results_orphans ORDER BY created_at, id LIMIT $1 OFFSET $2',
        [options?.limit ?? DEFAULT_LIST_LIMIT, options?.offset ?? 0],
      );
      return result.rows.map(toOrphan);
    });
  }
}

type Guard = <T>(operation: string, fn: () => Promise<T>) => Promise<T>;

/** Wrap driver failures in PersistenceError; errors this package raised pass through. */
function createGuard(log: Logger): Guard {
  return async (operation, fn) => {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RunControlError) throw err;
      log.error('Database operation failed', {
        operation,
        code: pgErrorCode(err),
        error: err instanceof Error ? err.message : String(err),
      });
      throw new PersistenceError(`Failed to ${operation}`, err);
    }
  };
}

export interface PostgresStoreOptions {
  logger?: Logger;
}

/** Create a store backed by PostgreSQL. */
export function createPostgresStore(db: SqlExecutor, options: PostgresStoreOptions = {}): Store {
  const guard = createGuard((options.logger ?? rootLogger).child({ module: 'postgres-store' }));
  return {
    jobs: new PostgresJobStore(db, guard),
    runs: new PostgresRunStore(db, guard),
    orphans: new PostgresOrphanStore(db, guard),
  };
}

/** Adapt a `pg` pool to the executor interface. */
export function createPgExecutor(pool: Pool): SqlExecutor {
  return {
    async query(text: string, values?: unknown[]): Promise<SqlResult> {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

export function createPgPool(config: PoolConfig, logger: Logger = rootLogger): Pool {
  const pool = new Pool(config);
  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle database client', { error: err.message });
  });
  return pool;
}

/** Apply the bundled schema. Statements are idempotent. */
export async function migrate(db: SqlExecutor, schemaSql: string = readFileSync(SCHEMA_PATH, 'utf8')): Promise<void> {
  await db.query(schemaSql);
}
