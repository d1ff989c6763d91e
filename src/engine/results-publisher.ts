/**
 * Results publisher.
 *
 * Publishing is a saga over three systems: the local results directory,
 * the object store and the run store. Ordering:
 *
 *   1. validate and load the run (ownership checked)
 *   2. return early if results are already published
 *   3. verify the run may complete, before touching anything external
 *   4. package
 *   5. upload
 *   6. commit the DONE transition in one save
 *
 * If the commit loses a version race to a concurrent publish that attached
 * the same location, the object is live and the call succeeds. Any other
 * commit failure after a successful upload records the stored object
 * as an orphan and PublishMetadataError carries its location.
 * The run keeps its pre-publish status. Nothing is retried here.
 */

import { v4 as uuid } from 'uuid';
import { OrphanRecord, StorageLocation, storageLocationsEqual } from '../domain/artifact';
import { redactCredentials } from '../domain/credential-redaction';
import {
  ConcurrentModificationError,
  InvalidTransitionError,
  PublishCancelledError,
  PublishMetadataError,
  errorMessage,
} from '../domain/errors';
import { ObservabilitySink, createTransitionEvent } from '../domain/events';
import { Run, RunStatus } from '../domain/run';
import { emitSafely } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { ResultsStoreGateway } from '../object-store/results-store-gateway';
import { ResultsPackager } from '../packaging/results-packager';
import { Store } from '../storage/store';
import { assertIdentifier, loadOwnedRun } from './run-access';
import { canTransition, transitionRun } from './state-machine';

export interface ResultsPublisherDeps {
  store: Store;
  packager: ResultsPackager;
  gateway: ResultsStoreGateway;
  sink: ObservabilitySink;
}

export interface ResultsPublisherOptions {
  knownSecrets?: readonly string[];
  now?: () => Date;
  logger?: Logger;
}

export interface PublishOptions {
  signal?: AbortSignal;
}

export class ResultsPublisher {
  private readonly knownSecrets: readonly string[];
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: ResultsPublisherDeps, options: ResultsPublisherOptions = {}) {
    this.knownSecrets = options.knownSecrets ?? [];
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ module: 'results-publisher' });
  }

  /**
   * Package, store and attach a run's results.
   *
   * Returns the stored location. Calling again for a run already DONE
   * returns the recorded location without packaging or uploading.
   */
  async publishResults(
    jobId: string,
    runId: string,
    resultsDirectory: string,
    options: PublishOptions = {},
  ): Promise<StorageLocation> {
    assertIdentifier('jobId', jobId);
    assertIdentifier('runId', runId);
    assertIdentifier('resultsDirectory', resultsDirectory);
    const ids = { jobId, runId };
    const log = this.log.child(ids);

    const run = await loadOwnedRun(this.deps.store.runs, jobId, runId);

    if (run.status === RunStatus.Done && run.resultsLocation) {
      log.info('Results already published', { handle: run.resultsLocation.handle });
      return run.resultsLocation;
    }

    if (!canTransition(run.status, RunStatus.Done)) {
      throw new InvalidTransitionError(run.status, RunStatus.Done, run.id, 'only a RUNNING run can publish results');
    }
    const key = this.deps.gateway.resultsKey(jobId, runId);

    this.throwIfCancelled(options.signal, ids);
    const artifact = await this.deps.packager.package(resultsDirectory, { signal: options.signal }).catch(
      (err: unknown): never => {
        if (err instanceof PublishCancelledError) throw new PublishCancelledError(ids);
        throw err;
      },
    );
    this.throwIfCancelled(options.signal, ids);

    const location = await this.deps.gateway.upload(key, artifact.bytes, { signal: options.signal });

    const publishedAt = this.now();
    let saved: Run;
    try {
      const completed = transitionRun(
        run,
        RunStatus.Done,
        { resultsLocation: location, resultsPublishedAt: publishedAt.toISOString() },
        publishedAt,
      );
      saved = await this.deps.store.runs.save(completed);
    } catch (err) {
      if (err instanceof ConcurrentModificationError && (await this.publishedElsewhere(run, location, log))) {
        return location;
      }
      throw await this.compensate(run, location, err);
    }

    emitSafely(this.deps.sink, createTransitionEvent(saved, run.status, RunStatus.Done, 'publish', publishedAt), log);
    log.info('Results published', {
      handle: location.handle,
      fileCount: artifact.fileCount,
      totalSizeBytes: artifact.totalSizeBytes,
      checksum: artifact.checksum,
    });
    return location;
  }

  private throwIfCancelled(signal: AbortSignal | undefined, ids: { jobId: string; runId: string }): void {
    if (signal?.aborted) throw new PublishCancelledError(ids);
  }

  /** Whether a concurrent writer already completed the run with this location. */
  private async publishedElsewhere(run: Run, location: StorageLocation, log: Logger): Promise<boolean> {
    let current: Run | null;
    try {
      current = await this.deps.store.runs.getById(run.id);
    } catch (err) {
      log.warn('Could not re-read run after a commit conflict', {
        error: redactCredentials(errorMessage(err), this.knownSecrets),
      });
      return false;
    }
    if (
      current?.status === RunStatus.Done &&
      current.resultsLocation !== null &&
      storageLocationsEqual(current.resultsLocation, location)
    ) {
      log.info('Results published by a concurrent call', { handle: location.handle });
      return true;
    }
    return false;
  }

  /** Record the uploaded object as an orphan and build the error to raise. */
  private async compensate(run: Run, location: StorageLocation, cause: unknown): Promise<PublishMetadataError> {
    const reason = redactCredentials(errorMessage(cause), this.knownSecrets);
    const orphan: OrphanRecord = {
      id: `orphan_${uuid()}`,
      location,
      jobId: run.jobId,
      runId: run.id,
      createdAt: this.now().toISOString(),
      reason,
    };

    let recorded = false;
    try {
      await this.deps.store.orphans.record(orphan);
      recorded = true;
      this.log.error('Metadata commit failed; orphan recorded', { runId: run.id, handle: location.handle, reason });
    } catch (recordErr) {
      this.log.error('Metadata commit failed and orphan could not be recorded', {
        runId: run.id,
        jobId: run.jobId,
        handle: location.handle,
        reason,
        recordError: redactCredentials(errorMessage(recordErr), this.knownSecrets),
      });
    }

    return new PublishMetadataError(location, recorded, { jobId: run.jobId, runId: run.id }, cause);
  }
}
