/**
 * Wiring.
 *
 * Builds every collaborator from a configuration. Any of them can be
 * replaced through `overrides`; tests pass the memory store and fakes.
 */

import { AwsBatchComputeService } from './compute/aws-batch-service';
import { BatchComputeService } from './compute/compute-service';
import { RunControlConfig, describeConfig, knownSecrets } from './config';
import { RunEventPublisher } from './data-plane/publisher';
import { ObservabilitySink } from './domain/events';
import { ValidationError } from './domain/errors';
import { ResultsPublisher } from './engine/results-publisher';
import { RunLifecycleService } from './engine/run-lifecycle';
import { RunStatusSynchronizer } from './engine/status-synchronizer';
import { Logger, logger as rootLogger, setLogLevel } from './logger';
import { ObjectStorageProvider } from './object-store/object-storage';
import { ResultsStoreGateway } from './object-store/results-store-gateway';
import { S3ObjectStorageProvider } from './object-store/s3-provider';
import { ResultsPackager, ZipResultsPackager } from './packaging/results-packager';
import { createPgExecutor, createPgPool, createPostgresStore } from './storage/postgres-store';
import { Store } from './storage/store';

export interface RunControlOverrides {
  store?: Store;
  storageProvider?: ObjectStorageProvider;
  compute?: BatchComputeService;
  packager?: ResultsPackager;
  /** Replaces the built-in event publisher as the events destination. */
  sink?: ObservabilitySink;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

export interface RunControl {
  config: RunControlConfig;
  store: Store;
  events: RunEventPublisher;
  gateway: ResultsStoreGateway;
  packager: ResultsPackager;
  lifecycle: RunLifecycleService;
  publisher: ResultsPublisher;
  synchronizer: RunStatusSynchronizer;
  /** Release pooled resources (database connections). */
  close(): Promise<void>;
}

export function createRunControl(config: RunControlConfig, overrides: RunControlOverrides = {}): RunControl {
  const log = overrides.logger ?? rootLogger;
  setLogLevel(config.logging.level);
  log.info('Starting run control', { config: describeConfig(config) });

  const secrets = knownSecrets(config);
  const closers: (() => Promise<void>)[] = [];

  let store = overrides.store;
  if (!store) {
    if (!config.database.connectionString) {
      throw new ValidationError('database.connectionString is required when no store is supplied', {
        field: 'database.connectionString',
      });
    }
    const pool = createPgPool(
      { connectionString: config.database.connectionString, max: config.database.maxConnections },
      log,
    );
    closers.push(() => pool.end());
    store = createPostgresStore(createPgExecutor(pool), { logger: log });
  }

  const storageProvider =
    overrides.storageProvider ??
    new S3ObjectStorageProvider({
      bucket: config.storage.bucket,
      region: config.storage.region,
      endpoint: config.storage.endpoint,
      forcePathStyle: config.storage.forcePathStyle,
      ...config.credentials,
    });

  const compute =
    overrides.compute ??
    new AwsBatchComputeService({
      region: config.compute.region,
      jobQueue: config.compute.jobQueue,
      jobDefinition: config.compute.jobDefinition,
      endpoint: config.compute.endpoint,
      ...config.credentials,
      logger: log,
    });

  const events = new RunEventPublisher({ logger: log });
  const sink = overrides.sink ?? events;
  const packager = overrides.packager ?? new ZipResultsPackager({ logger: log });
  const gateway = new ResultsStoreGateway(storageProvider, {
    keyPrefix: config.storage.keyPrefix,
    uploadTimeoutMs: config.storage.uploadTimeoutMs,
    presignTimeoutMs: config.storage.presignTimeoutMs,
    knownSecrets: secrets,
    logger: log,
  });

  return {
    config,
    store,
    events,
    gateway,
    packager,
    lifecycle: new RunLifecycleService(
      { store, compute, gateway, sink },
      {
        submitTimeoutMs: config.compute.submitTimeoutMs,
        cancelTimeoutMs: config.compute.cancelTimeoutMs,
        defaultResultsTtlSeconds: config.storage.presignTtlSeconds,
        knownSecrets: secrets,
        now: overrides.now,
        logger: log,
      },
    ),
    publisher: new ResultsPublisher(
      { store, packager, gateway, sink },
      { knownSecrets: secrets, now: overrides.now, logger: log },
    ),
    synchronizer: new RunStatusSynchronizer(compute, store.runs, sink, {
      describeTimeoutMs: config.compute.describeTimeoutMs,
      retryPolicy: config.sync.retry,
      concurrency: config.sync.concurrency,
      knownSecrets: secrets,
      sleep: overrides.sleep,
      now: overrides.now,
      logger: log,
    }),
    async close() {
      for (const close of closers) await close();
    },
  };
}
