import {
  RetryPolicy,
  TimeoutError,
  computeBackoff,
  mapWithConcurrency,
  retryWithBackoff,
  withTimeout,
} from '../../src/engine/retry';

const POLICY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 250, jitterRatio: 0 };

describe('computeBackoff', () => {
  test('doubles per attempt and caps', () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoff(POLICY, attempt))).toEqual([100, 200, 250, 250]);
  });

  test('jitter stays within the ratio', () => {
    const policy = { ...POLICY, jitterRatio: 0.2 };
    expect(computeBackoff(policy, 1, () => 0)).toBe(80);
    expect(computeBackoff(policy, 1, () => 0.5)).toBe(100);
    expect(computeBackoff(policy, 1, () => 1)).toBe(120);
  });
});

describe('retryWithBackoff', () => {
  test('retries retryable failures until success', async () => {
    const delays: number[] = [];
    const operation = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');

    const outcome = await retryWithBackoff(operation, POLICY, {
      isRetryable: () => true,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 3 });
    expect(delays).toEqual([100, 200]);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  test('stops at the attempt limit', async () => {
    const error = new Error('down');
    const outcome = await retryWithBackoff(() => Promise.reject(error), POLICY, {
      isRetryable: () => true,
      sleep: async () => undefined,
    });
    expect(outcome).toEqual({ ok: false, error, attempts: 4, exhausted: true });
  });

  test('non-retryable errors end the loop at once', async () => {
    const error = new Error('fatal');
    const onRetry = jest.fn();
    const outcome = await retryWithBackoff(() => Promise.reject(error), POLICY, {
      isRetryable: () => false,
      onRetry,
      sleep: async () => undefined,
    });
    expect(outcome).toEqual({ ok: false, error, attempts: 1, exhausted: false });
    expect(onRetry).not.toHaveBeenCalled();
  });
});

describe('withTimeout', () => {
  test('resolves when the call finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 1000, 'Fast call')).resolves.toBe('done');
  });

  test('rejects with TimeoutError and aborts the signal', async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      },
      20,
      'Slow call',
    );

    await expect(pending).rejects.toThrow(new TimeoutError(20, 'Slow call'));
    await expect(pending).rejects.toThrow('Slow call timed out after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  test('parent abort propagates to the call signal', async () => {
    const parent = new AbortController();
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        });
      },
      1000,
      'Cancellable call',
      parent.signal,
    );
    parent.abort();

    await expect(pending).rejects.toThrow('aborted');
    expect(seen?.aborted).toBe(true);
  });
});

describe('mapWithConcurrency', () => {
  test('keeps order and respects the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });
});
