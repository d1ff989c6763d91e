/**
 * Run control configuration.
 *
 * Typed defaults, per-section merging, and loading from environment
 * variables validated with zod.
 */

import { z } from 'zod';
import { maskSecret } from './domain/credential-redaction';
import { RunControlError, createTypedError } from './domain/errors';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from './engine/retry';
import { LogLevel } from './logger';

export interface StorageConfig {
  bucket: string;
  region: string;
  /** Custom S3 endpoint (MinIO, LocalStack). */
  endpoint?: string;
  forcePathStyle: boolean;
  keyPrefix: string;
  uploadTimeoutMs: number;
  presignTimeoutMs: number;
  /** Default lifetime of result links. */
  presignTtlSeconds: number;
}

export interface ComputeConfig {
  region: string;
  jobQueue: string;
  jobDefinition: string;
  endpoint?: string;
  submitTimeoutMs: number;
  describeTimeoutMs: number;
  cancelTimeoutMs: number;
}

export interface CredentialsConfig {
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
}

export interface DatabaseConfig {
  connectionString?: string;
  maxConnections: number;
}

export interface SyncConfig {
  concurrency: number;
  retry: RetryPolicy;
}

export interface RunControlConfig {
  storage: StorageConfig;
  compute: ComputeConfig;
  credentials: CredentialsConfig;
  database: DatabaseConfig;
  sync: SyncConfig;
  logging: { level: LogLevel };
}

export interface RunControlConfigOverrides {
  storage?: Partial<StorageConfig>;
  compute?: Partial<ComputeConfig>;
  credentials?: Partial<CredentialsConfig>;
  database?: Partial<DatabaseConfig>;
  sync?: Partial<Omit<SyncConfig, 'retry'>> & { retry?: Partial<RetryPolicy> };
  logging?: { level?: LogLevel };
}

export const DEFAULT_RUN_CONTROL_CONFIG: Readonly<RunControlConfig> = {
  storage: {
    bucket: '',
    region: 'us-east-1',
    forcePathStyle: false,
    keyPrefix: 'results/',
    uploadTimeoutMs: 120_000,
    presignTimeoutMs: 10_000,
    presignTtlSeconds: 3600,
  },
  compute: {
    region: 'us-east-1',
    jobQueue: '',
    jobDefinition: '',
    submitTimeoutMs: 30_000,
    describeTimeoutMs: 10_000,
    cancelTimeoutMs: 10_000,
  },
  credentials: {},
  database: {
    maxConnections: 10,
  },
  sync: {
    concurrency: 8,
    retry: { ...DEFAULT_RETRY_POLICY },
  },
  logging: { level: LogLevel.Info },
};

/** Overlay `overrides` on `base`, section by section. */
export function mergeRunControlConfig(
  overrides: RunControlConfigOverrides = {},
  base: Readonly<RunControlConfig> = DEFAULT_RUN_CONTROL_CONFIG,
): RunControlConfig {
  return {
    storage: { ...base.storage, ...overrides.storage },
    compute: { ...base.compute, ...overrides.compute },
    credentials: { ...base.credentials, ...overrides.credentials },
    database: { ...base.database, ...overrides.database },
    sync: {
      ...base.sync,
      ...overrides.sync,
      retry: { ...base.sync.retry, ...overrides.sync?.retry },
    },
    logging: { ...base.logging, ...overrides.logging },
  };
}

export class ConfigError extends RunControlError {
  readonly kind = 'config';

  constructor(readonly issues: string[]) {
    super(
      createTypedError({
        code: 'CONFIG.INVALID',
        message: `Invalid environment configuration\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
        retryable: false,
        details: { issues },
      }),
    );
  }
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'] as const;
const FALSE_VALUES = ['0', 'false', 'no', 'off'] as const;
const TRUTHY: ReadonlySet<string> = new Set(TRUE_VALUES);

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function normalized(value: unknown): unknown {
  const v = blankToUndefined(value);
  return typeof v === 'string' ? v.trim().toLowerCase() : v;
}

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const requiredString = z.preprocess(
  blankToUndefined,
  z.string({ required_error: 'is required' }).trim(),
);
const integer = (min: number, max?: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int('must be an integer')
      .min(min, `must be at least ${min}`)
      .max(max ?? Number.MAX_SAFE_INTEGER, `must be at most ${max ?? Number.MAX_SAFE_INTEGER}`)
      .optional(),
  );
const ratio = z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).optional());
const boolean = z.preprocess(
  normalized,
  z
    .enum([...TRUE_VALUES, ...FALSE_VALUES], {
      errorMap: () => ({ message: `must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}` }),
    })
    .transform((value) => TRUTHY.has(value))
    .optional(),
);
const logLevel = z.preprocess(normalized, z.nativeEnum(LogLevel).optional());

const envSchema = z.object({
  SIMRUN_RESULTS_BUCKET: requiredString,
  SIMRUN_RESULTS_KEY_PREFIX: z.string().optional(),
  SIMRUN_S3_ENDPOINT: optionalString,
  SIMRUN_S3_FORCE_PATH_STYLE: boolean,
  SIMRUN_UPLOAD_TIMEOUT_MS: integer(1),
  SIMRUN_PRESIGN_TIMEOUT_MS: integer(1),
  SIMRUN_PRESIGN_TTL_SECONDS: integer(1, 604_800),
  AWS_REGION: optionalString,
  SIMRUN_BATCH_JOB_QUEUE: requiredString,
  SIMRUN_BATCH_JOB_DEFINITION: requiredString,
  SIMRUN_BATCH_ENDPOINT: optionalString,
  SIMRUN_SUBMIT_TIMEOUT_MS: integer(1),
  SIMRUN_DESCRIBE_TIMEOUT_MS: integer(1),
  SIMRUN_CANCEL_TIMEOUT_MS: integer(1),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_SESSION_TOKEN: optionalString,
  DATABASE_URL: optionalString,
  SIMRUN_DB_MAX_CONNECTIONS: integer(1, 1000),
  SIMRUN_SYNC_CONCURRENCY: integer(1, 256),
  SIMRUN_SYNC_MAX_ATTEMPTS: integer(1, 20),
  SIMRUN_SYNC_BASE_DELAY_MS: integer(0),
  SIMRUN_SYNC_MAX_DELAY_MS: integer(0),
  SIMRUN_SYNC_JITTER_RATIO: ratio,
  SIMRUN_LOG_LEVEL: logLevel,
});

export type EnvSource = Record<string, string | undefined>;

/**
 * Build the configuration from environment variables over the defaults.
 *
 * @throws ConfigError listing every invalid or missing variable.
 */
export function loadRunControlConfig(env: EnvSource = process.env): RunControlConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`),
    );
  }
  const e = result.data;

  return mergeRunControlConfig({
    storage: dropUndefined({
      bucket: e.SIMRUN_RESULTS_BUCKET,
      region: e.AWS_REGION,
      endpoint: e.SIMRUN_S3_ENDPOINT,
      forcePathStyle: e.SIMRUN_S3_FORCE_PATH_STYLE,
      keyPrefix: e.SIMRUN_RESULTS_KEY_PREFIX,
      uploadTimeoutMs: e.SIMRUN_UPLOAD_TIMEOUT_MS,
      presignTimeoutMs: e.SIMRUN_PRESIGN_TIMEOUT_MS,
      presignTtlSeconds: e.SIMRUN_PRESIGN_TTL_SECONDS,
    }),
    compute: dropUndefined({
      region: e.AWS_REGION,
      jobQueue: e.SIMRUN_BATCH_JOB_QUEUE,
      jobDefinition: e.SIMRUN_BATCH_JOB_DEFINITION,
      endpoint: e.SIMRUN_BATCH_ENDPOINT,
      submitTimeoutMs: e.SIMRUN_SUBMIT_TIMEOUT_MS,
      describeTimeoutMs: e.SIMRUN_DESCRIBE_TIMEOUT_MS,
      cancelTimeoutMs: e.SIMRUN_CANCEL_TIMEOUT_MS,
    }),
    credentials: dropUndefined({
      accessKeyId: e.AWS_ACCESS_KEY_ID,
      secretAccessKey: e.AWS_SECRET_ACCESS_KEY,
      sessionToken: e.AWS_SESSION_TOKEN,
    }),
    database: dropUndefined({
      connectionString: e.DATABASE_URL,
      maxConnections: e.SIMRUN_DB_MAX_CONNECTIONS,
    }),
    sync: {
      ...dropUndefined({ concurrency: e.SIMRUN_SYNC_CONCURRENCY }),
      retry: dropUndefined({
        maxAttempts: e.SIMRUN_SYNC_MAX_ATTEMPTS,
        baseDelayMs: e.SIMRUN_SYNC_BASE_DELAY_MS,
        maxDelayMs: e.SIMRUN_SYNC_MAX_DELAY_MS,
        jitterRatio: e.SIMRUN_SYNC_JITTER_RATIO,
      }),
    },
    logging: dropUndefined({ level: e.SIMRUN_LOG_LEVEL }),
  });
}

/** Copy of `obj` without keys whose value is undefined, so they don't shadow defaults. */
function dropUndefined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function maskConnectionString(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    if (url.password) url.password = '****';
    return url.toString();
  } catch {
    return maskSecret(connectionString);
  }
}

/** Configuration safe to log: credentials and database passwords masked. */
export function describeConfig(config: RunControlConfig): Record<string, unknown> {
  return {
    ...config,
    credentials: {
      accessKeyId: config.credentials.accessKeyId ? maskSecret(config.credentials.accessKeyId) : undefined,
      secretAccessKey: config.credentials.secretAccessKey ? maskSecret(config.credentials.secretAccessKey) : undefined,
      sessionToken: config.credentials.sessionToken ? maskSecret(config.credentials.sessionToken) : undefined,
    },
    database: {
      ...config.database,
      connectionString: config.database.connectionString
        ? maskConnectionString(config.database.connectionString)
        : undefined,
    },
  };
}

/** Secret values to scrub from provider messages. */
export function knownSecrets(config: RunControlConfig): string[] {
  return [config.credentials.secretAccessKey, config.credentials.sessionToken].filter(
    (secret): secret is string => typeof secret === 'string' && secret.length > 0,
  );
}
