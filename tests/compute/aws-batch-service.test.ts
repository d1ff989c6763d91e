import { BatchClient, DescribeJobsCommand, SubmitJobCommand, TerminateJobCommand } from '@aws-sdk/client-batch';
import { AwsBatchComputeService, classifyBatchError } from '../../src/compute/aws-batch-service';
import { ComputeServiceError, TerminalExternalError, TransientExternalError } from '../../src/domain/errors';
import { RunStatus } from '../../src/domain/run';
import { RunStatusSynchronizer } from '../../src/engine/status-synchronizer';
import { TimeoutError } from '../../src/engine/retry';
import { createMemoryStore } from '../../src/storage/memory-store';
import { CollectingSink, FIXED_NOW, catchAsync, makeRun } from '../helpers/fakes';

function createService() {
  const client = new BatchClient({
    region: 'eu-west-1',
    credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
  });
  const service = new AwsBatchComputeService(
    { region: 'eu-west-1', jobQueue: 'sim-queue', jobDefinition: 'sim-def:3', secretAccessKey: 'test-secret' },
    client,
  );
  return { client, service };
}

function sdkError(name: string, message: string, extra: Record<string, unknown> = {}): Error {
  const err = new Error(message);
  err.name = name;
  Object.assign(err, extra);
  return err;
}

describe('AwsBatchComputeService', () => {
  test('submit uses default queue and definition', async () => {
    const { client, service } = createService();
    const send = jest
      .spyOn(client, 'send')
      .mockImplementation(async () => ({ jobId: 'batch-42', jobName: 'run-a', $metadata: {} }));

    const handle = await service.submit({ jobName: 'run-a', environment: { SIMRUN_RUN_ID: 'r1' } });

    expect(handle).toBe('batch-42');
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(SubmitJobCommand);
    expect(command.input).toEqual({
      jobName: 'run-a',
      jobQueue: 'sim-queue',
      jobDefinition: 'sim-def:3',
      containerOverrides: { command: undefined, environment: [{ name: 'SIMRUN_RUN_ID', value: 'r1' }] },
    });
  });

  test('describe returns the phase and detail', async () => {
    const { client, service } = createService();
    const send = jest.spyOn(client, 'send').mockImplementation(async () => ({
      jobs: [
        {
          jobId: 'batch-42',
          jobName: 'run-a',
          jobQueue: 'sim-queue',
          jobDefinition: 'sim-def:3',
          status: 'RUNNABLE',
          statusReason: 'waiting for capacity',
          startedAt: Date.UTC(2024, 4, 1, 12, 0, 0),
        },
      ],
      $metadata: {},
    }));

    await expect(service.describe('batch-42')).resolves.toEqual({
      phase: 'RUNNABLE',
      detail: {
        statusReason: 'waiting for capacity',
        exitCode: undefined,
        startedAt: '2024-05-01T12:00:00.000Z',
        stoppedAt: undefined,
      },
    });
    expect(send.mock.calls[0][0]).toBeInstanceOf(DescribeJobsCommand);
  });

  test('describe of an unknown job is terminal', async () => {
    const { client, service } = createService();
    jest.spyOn(client, 'send').mockImplementation(async () => ({ jobs: [], $metadata: {} }));

    const err = await catchAsync(service.describe('batch-missing'));
    expect(err).toBeInstanceOf(TerminalExternalError);
    expect(err).toHaveProperty('message', 'Compute job not found: batch-missing');
  });

  test('cancel terminates the job', async () => {
    const { client, service } = createService();
    const send = jest.spyOn(client, 'send').mockImplementation(async () => ({ $metadata: {} }));

    await service.cancel('batch-42', 'Cancelled by user');

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(TerminateJobCommand);
    expect(command.input).toEqual({ jobId: 'batch-42', reason: 'Cancelled by user' });
  });

  test('SDK errors are classified and sanitized', async () => {
    const { client, service } = createService();
    jest
      .spyOn(client, 'send')
      .mockImplementation(async () => {
        throw sdkError('ThrottlingException', 'Rate exceeded for test-secret', { $metadata: { httpStatusCode: 429 } });
      });

    const err = await catchAsync(service.describe('batch-42'));
    expect(err).toBeInstanceOf(TransientExternalError);
    expect(err).toHaveProperty('message', 'DescribeJobs failed: ThrottlingException: Rate exceeded for [REDACTED]');
  });
});

describe('classifyBatchError', () => {
  test.each([
    ['server fault', sdkError('ServerException', 'oops', { $fault: 'server' }), TransientExternalError],
    ['5xx', sdkError('InternalFailure', 'oops', { $metadata: { httpStatusCode: 503 } }), TransientExternalError],
    ['socket reset', sdkError('Error', 'socket hang up', { code: 'ECONNRESET' }), TransientExternalError],
    ['timeout', new TimeoutError(100, 'Compute describe'), TransientExternalError],
    ['missing job', sdkError('ClientException', 'Job batch-42 not found', { $fault: 'client', $metadata: { httpStatusCode: 400 } }), TerminalExternalError],
    ['other client error', sdkError('ClientException', 'bad job definition', { $fault: 'client', $metadata: { httpStatusCode: 400 } }), ComputeServiceError],
    ['access denied', sdkError('AccessDeniedException', 'not authorized', { $fault: 'client', $metadata: { httpStatusCode: 403 } }), ComputeServiceError],
    ['rejected credentials', sdkError('UnrecognizedClientException', 'The security token included in the request is invalid'), ComputeServiceError],
    ['unknown', new Error('who knows'), ComputeServiceError],
    ['not an error', 'plain text', ComputeServiceError],
  ])('%s', (_label, err, expected) => {
    expect(classifyBatchError(err, 'DescribeJobs')).toBeInstanceOf(expected);
  });

  test('reads name and message from errors made in another realm', () => {
    const foreign = { name: 'ThrottlingException', message: 'slow down', $metadata: { httpStatusCode: 400 } };

    const err = classifyBatchError(foreign, 'DescribeJobs');

    expect(err).toBeInstanceOf(TransientExternalError);
    expect(err.message).toBe('DescribeJobs failed: ThrottlingException: slow down');
  });

  test('service errors are not retryable and carry the operation', () => {
    const err = classifyBatchError(sdkError('AccessDeniedException', 'not authorized'), 'DescribeJobs');

    expect(err).toMatchObject({
      code: 'COMPUTE.SERVICE',
      retryable: false,
      message: 'DescribeJobs failed: AccessDeniedException: not authorized',
      typedError: { details: { operation: 'DescribeJobs', errorName: 'AccessDeniedException' } },
    });
  });

  test('passes through errors already classified', () => {
    const err = new TerminalExternalError('gone');
    expect(classifyBatchError(err, 'DescribeJobs')).toBe(err);
  });
});

describe('AwsBatchComputeService with the status synchronizer', () => {
  async function refreshWith(failure: Error) {
    const { client, service } = createService();
    jest.spyOn(client, 'send').mockImplementation(async () => {
      throw failure;
    });
    const store = createMemoryStore();
    const seeded = await store.runs.create(makeRun({ status: RunStatus.Running, externalJobHandle: 'batch-42' }));
    const sink = new CollectingSink();
    const synchronizer = new RunStatusSynchronizer(service, store.runs, sink, {
      retryPolicy: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterRatio: 0 },
      sleep: async () => undefined,
      now: () => FIXED_NOW,
    });
    const [refreshed] = await synchronizer.refresh([seeded]);
    return { seeded, refreshed, sink, store };
  }

  test('access denied leaves the run unchanged and reports exhaustion', async () => {
    const { seeded, refreshed, sink, store } = await refreshWith(
      sdkError('AccessDeniedException', 'not authorized for test-secret', { $fault: 'client', $metadata: { httpStatusCode: 403 } }),
    );

    expect(refreshed).toEqual(seeded);
    expect((await store.runs.getById('run-1'))?.status).toBe(RunStatus.Running);
    expect(sink.events).toEqual([
      {
        type: 'run.sync.retry_exhausted',
        timestamp: '2024-05-01T12:00:00.000Z',
        jobId: 'job-1',
        runId: 'run-1',
        status: RunStatus.Running,
        attempts: 1,
        reason: 'DescribeJobs failed: AccessDeniedException: not authorized for [REDACTED]',
      },
    ]);
  });

  test('a missing job fails the run', async () => {
    const { refreshed, sink } = await refreshWith(
      sdkError('ClientException', 'Job batch-42 does not exist', { $fault: 'client', $metadata: { httpStatusCode: 400 } }),
    );

    expect(refreshed.status).toBe(RunStatus.Failed);
    expect(sink.events).toMatchObject([{ type: 'run.transition', from: RunStatus.Running, to: RunStatus.Failed }]);
  });
});
