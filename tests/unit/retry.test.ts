import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpError } from '../../src/http/client.js';
import { isTransientFailure, retryWithBackoff, withTimeout } from '../../src/publish/retry.js';
import {
  MediaNotReadyError,
  PermanentProviderError,
  RetryExhaustedError,
  TimeoutError,
  TransientProviderError,
} from '../../src/shared/errors.js';
import { catchAsyncError } from '../helpers/fixtures.js';

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => { delays.push(ms); } };
}

const notReady = () => new MediaNotReadyError('Media is not ready', 'instagram', 400, 9007);

describe('retryWithBackoff', () => {
  it('waits 2s, 3s, 4.5s between not-ready attempts', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const result = await retryWithBackoff('publish_container', async () => {
      calls++;
      if (calls <= 3) throw notReady();
      return 'media-1';
    }, { shouldRetry: e => e instanceof MediaNotReadyError, sleep });

    expect(result).toBe('media-1');
    expect(calls).toBe(4);
    expect(delays).toEqual([2000, 3000, 4500]);
  });

  it('gives up after five attempts with the last cause', async () => {
    const { delays, sleep } = recordingSleep();

    const error = await catchAsyncError(retryWithBackoff('publish_container', async () => {
      throw notReady();
    }, { shouldRetry: () => true, sleep }));

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({
      operation: 'publish_container',
      attempts: 5,
      message: 'publish_container failed after 5 attempts: Media is not ready',
    });
    expect(delays).toEqual([2000, 3000, 4500, 6750]);
  });

  it('rethrows a non-retryable error at once', async () => {
    const { delays, sleep } = recordingSleep();
    const permanent = new PermanentProviderError('Invalid parameter', 'instagram', 400, 100);

    const error = await catchAsyncError(retryWithBackoff('post', async () => {
      throw permanent;
    }, { shouldRetry: isTransientFailure, sleep }));

    expect(error).toBe(permanent);
    expect(delays).toEqual([]);
  });

  it('passes the attempt number', async () => {
    const { sleep } = recordingSleep();
    const seen: number[] = [];
    await retryWithBackoff('op', async attempt => {
      seen.push(attempt);
      if (attempt < 2) throw new Error('please retry');
    }, { policy: { maxAttempts: 3, initialDelayMs: 10, multiplier: 2 }, shouldRetry: () => true, sleep });
    expect(seen).toEqual([1, 2]);
  });

  it('starts no further attempt once its signal is aborted', async () => {
    const controller = new AbortController();
    const deadline = new TimeoutError('post', 50);
    const seen: number[] = [];

    const error = await catchAsyncError(retryWithBackoff('post', async attempt => {
      seen.push(attempt);
      throw new Error('please retry');
    }, {
      shouldRetry: () => true,
      sleep: async () => { controller.abort(deadline); },
      signal: controller.signal,
    }));

    expect(error).toBe(deadline);
    expect(seen).toEqual([1]);
  });

  it('does not retry a failure that arrives after the abort', async () => {
    const controller = new AbortController();
    const { delays, sleep } = recordingSleep();

    const error = await catchAsyncError(retryWithBackoff('post', async () => {
      controller.abort(new TimeoutError('post', 50));
      throw new Error('please retry');
    }, { shouldRetry: () => true, sleep, signal: controller.signal }));

    expect(error).toBeInstanceOf(TimeoutError);
    expect(delays).toEqual([]);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects with TimeoutError and aborts the work when it is too slow', async () => {
    vi.useFakeTimers();
    let workSignal: AbortSignal | undefined;
    const pending = withTimeout(signal => {
      workSignal = signal;
      return new Promise<string>(() => {});
    }, 1000, 'upload');
    const assertion = expect(pending).rejects.toThrow('upload timed out after 1000ms');
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;

    expect(workSignal?.aborted).toBe(true);
    expect(workSignal?.reason).toBeInstanceOf(TimeoutError);
  });

  it('passes through a value that arrives in time', async () => {
    let workSignal: AbortSignal | undefined;
    await expect(withTimeout(async signal => {
      workSignal = signal;
      return 'ok';
    }, 1000, 'upload')).resolves.toBe('ok');
    expect(workSignal?.aborted).toBe(false);
  });
});

describe('isTransientFailure', () => {
  it.each([
    ['a transient provider error', new TransientProviderError('rate limited', 'instagram', 429, 4), true],
    ['a not-ready error', notReady(), true],
    ['a permanent provider error', new PermanentProviderError('bad token', 'instagram', 400, 190), false],
    ['an exhausted retry', new RetryExhaustedError('publish_container', 5, notReady()), false],
    ['a timeout', new TimeoutError('post', 180000), false],
    ['a network failure', new HttpError('Request failed', 0, '', {}), true],
    ['HTTP 503', new HttpError('HTTP 503: Service Unavailable', 503, '', {}), true],
    ['HTTP 429', new HttpError('HTTP 429: Too Many Requests', 429, '', {}), true],
    ['HTTP 400', new HttpError('HTTP 400: Bad Request', 400, '', {}), false],
    ['fetch failed', new TypeError('fetch failed'), true],
    ['a known transient message', new Error('Service temporarily unavailable'), true],
    ['an unknown error', new Error('disk full'), false],
    ['a non-error value', 'boom', false],
  ])('%s -> %s', (_label, error, expected) => {
    expect(isTransientFailure(error)).toBe(expected);
  });
});
