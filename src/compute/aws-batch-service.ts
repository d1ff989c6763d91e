/**
 * AWS Batch adapter.
 */

import {
  BatchClient,
  DescribeJobsCommand,
  SubmitJobCommand,
  TerminateJobCommand,
  type BatchClientConfig,
} from '@aws-sdk/client-batch';
import { redactCredentials } from '../domain/credential-redaction';
import {
  ComputeServiceError,
  RunControlError,
  TerminalExternalError,
  TransientExternalError,
} from '../domain/errors';
import { TimeoutError } from '../engine/retry';
import { Logger, logger as rootLogger } from '../logger';
import {
  BatchComputeService,
  ComputeCallOptions,
  ComputeJobDescription,
  ComputeJobSpec,
} from './compute-service';

export interface AwsBatchServiceOptions {
  region: string;
  jobQueue: string;
  jobDefinition: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  logger?: Logger;
}

const THROTTLING_ERROR_NAMES = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'ServiceUnavailable',
  'ServerException',
]);

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

function readProperty(value: unknown, name: string): unknown {
  if (typeof value !== 'object' || value === null || !(name in value)) return undefined;
  return Reflect.get(value, name);
}

function httpStatusOf(err: unknown): number | undefined {
  const status = readProperty(readProperty(err, '$metadata'), 'httpStatusCode');
  return typeof status === 'number' ? status : undefined;
}

const MISSING_JOB_PATTERN = /\bjob\b.*\b(?:not found|does not exist)/i;

function stringProperty(value: unknown, name: string): string | undefined {
  const found = readProperty(value, name);
  return typeof found === 'string' ? found : undefined;
}

/**
 * Sort an SDK failure. Server faults, throttling, timeouts and socket
 * errors are transient. A client fault naming a missing job is terminal.
 * Anything else, including access denied and unknown errors, is a
 * `ComputeServiceError` that leaves the run alone.
 */
export function classifyBatchError(err: unknown, operation: string, knownSecrets: readonly string[] = []): RunControlError {
  if (err instanceof RunControlError) return err;

  const name = stringProperty(err, 'name') ?? 'UnknownError';
  const rawMessage = stringProperty(err, 'message') ?? String(err);
  const message = redactCredentials(`${operation} failed: ${name}: ${rawMessage}`, knownSecrets);
  const status = httpStatusOf(err);
  const code = readProperty(err, 'code');
  const details = { operation, errorName: name, httpStatus: status };

  const transient =
    err instanceof TimeoutError ||
    name === 'TimeoutError' ||
    readProperty(err, '$fault') === 'server' ||
    readProperty(err, '$retryable') !== undefined ||
    THROTTLING_ERROR_NAMES.has(name) ||
    (status !== undefined && (status >= 500 || status === 429)) ||
    (typeof code === 'string' && NETWORK_ERROR_CODES.has(code));
  if (transient) return new TransientExternalError(message, details);

  if (name === 'ClientException' && MISSING_JOB_PATTERN.test(rawMessage)) {
    return new TerminalExternalError(message, details);
  }
  return new ComputeServiceError(message, details);
}

export class AwsBatchComputeService implements BatchComputeService {
  private readonly client: BatchClient;
  private readonly jobQueue: string;
  private readonly jobDefinition: string;
  private readonly knownSecrets: string[];
  private readonly log: Logger;

  constructor(options: AwsBatchServiceOptions, client?: BatchClient) {
    this.jobQueue = options.jobQueue;
    this.jobDefinition = options.jobDefinition;
    this.knownSecrets = [options.secretAccessKey, options.sessionToken].filter(
      (secret): secret is string => typeof secret === 'string' && secret.length > 0,
    );
    this.log = (options.logger ?? rootLogger).child({ module: 'aws-batch' });

    if (client) {
      this.client = client;
    } else {
      const config: BatchClientConfig = { region: options.region, endpoint: options.endpoint };
      if (options.accessKeyId && options.secretAccessKey) {
        config.credentials = {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey,
          sessionToken: options.sessionToken,
        };
      }
      this.client = new BatchClient(config);
    }
  }

  async submit(spec: ComputeJobSpec, options: ComputeCallOptions = {}): Promise<string> {
    try {
      const response = await this.client.send(
        new SubmitJobCommand({
          jobName: spec.jobName,
          jobQueue: spec.jobQueue ?? this.jobQueue,
          jobDefinition: spec.jobDefinition ?? this.jobDefinition,
          containerOverrides: {
            command: spec.command,
            environment: spec.environment
              ? Object.entries(spec.environment).map(([name, value]) => ({ name, value }))
              : undefined,
          },
        }),
        { abortSignal: options.signal },
      );
      if (!response.jobId) {
        throw new TerminalExternalError('SubmitJob returned no job id', { jobName: spec.jobName });
      }
      this.log.info('Submitted compute job', { jobName: spec.jobName, handle: response.jobId });
      return response.jobId;
    } catch (err) {
      throw classifyBatchError(err, 'SubmitJob', this.knownSecrets);
    }
  }

  async describe(handle: string, options: ComputeCallOptions = {}): Promise<ComputeJobDescription> {
    try {
      const response = await this.client.send(new DescribeJobsCommand({ jobs: [handle] }), {
        abortSignal: options.signal,
      });
      const job = response.jobs?.find((candidate) => candidate.jobId === handle);
      if (!job || !job.status) {
        throw new TerminalExternalError(`Compute job not found: ${handle}`, { handle });
      }
      return {
        phase: job.status,
        detail: {
          statusReason: job.statusReason,
          exitCode: job.container?.exitCode,
          startedAt: job.startedAt !== undefined ? new Date(job.startedAt).toISOString() : undefined,
          stoppedAt: job.stoppedAt !== undefined ? new Date(job.stoppedAt).toISOString() : undefined,
        },
      };
    } catch (err) {
      throw classifyBatchError(err, 'DescribeJobs', this.knownSecrets);
    }
  }

  async cancel(handle: string, reason: string): Promise<void> {
    try {
      await this.client.send(new TerminateJobCommand({ jobId: handle, reason }));
      this.log.info('Terminated compute job', { handle });
    } catch (err) {
      throw classifyBatchError(err, 'TerminateJob', this.knownSecrets);
    }
  }
}
