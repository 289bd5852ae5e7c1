import { APICallError } from 'ai';
import { describe, expect, it, vi } from 'vitest';
import { EmbeddingShapeError, HttpStatusError } from './errors.js';
import {
  RetryError,
  type RetryPolicy,
  RetryPolicySchema,
  classifyFailure,
  computeBackoffDelay,
  defaultRetryPolicy,
  sleep,
  withRetry,
} from './retry.js';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: false };

describe('classifyFailure', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [400, 'request'],
    [404, 'request'],
    [408, 'transient'],
    [429, 'transient'],
    [500, 'transient'],
    [503, 'transient'],
  ])('should classify HTTP %d as %s', (status, kind) => {
    expect(classifyFailure(new HttpStatusError(status, `HTTP ${status}`))).toBe(kind);
  });

  it('should classify AI SDK call errors by status code', () => {
    const error = new APICallError({
      message: 'Unauthorized',
      url: 'https://example.invalid/v1/chat/completions',
      requestBodyValues: {},
      statusCode: 401,
    });
    expect(classifyFailure(error)).toBe('auth');
  });

  it('should treat network failures as transient', () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(classifyFailure(reset)).toBe('transient');
    expect(classifyFailure(new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } }))).toBe('transient');
    expect(classifyFailure(new DOMException('The operation timed out.', 'TimeoutError'))).toBe('transient');
  });

  it('should treat malformed responses as shape failures', () => {
    expect(classifyFailure(new EmbeddingShapeError('bad'))).toBe('shape');
  });

  it('should not retry unknown errors', () => {
    expect(classifyFailure(new Error('unexpected'))).toBe('request');
    expect(classifyFailure('plain string')).toBe('request');
  });
});

describe('computeBackoffDelay', () => {
  const noJitter: RetryPolicy = { ...defaultRetryPolicy, jitter: false };

  it('should double the delay per retry up to the cap', () => {
    expect(computeBackoffDelay(noJitter, 0)).toBe(1000);
    expect(computeBackoffDelay(noJitter, 1)).toBe(2000);
    expect(computeBackoffDelay(noJitter, 4)).toBe(16_000);
    expect(computeBackoffDelay(noJitter, 5)).toBe(30_000);
  });

  it('should spread jittered delays over the upper half', () => {
    expect(computeBackoffDelay(defaultRetryPolicy, 1, () => 0)).toBe(1000);
    expect(computeBackoffDelay(defaultRetryPolicy, 1, () => 1)).toBe(2000);
    expect(computeBackoffDelay(defaultRetryPolicy, 1, () => 0.5)).toBe(1500);
  });
});

describe('RetryPolicySchema', () => {
  it('should apply defaults', () => {
    expect(RetryPolicySchema.parse({})).toEqual({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000, jitter: true });
  });

  it('should reject a base delay above the cap', () => {
    expect(RetryPolicySchema.safeParse({ baseDelayMs: 5000, maxDelayMs: 100 }).success).toBe(false);
  });
});

describe('withRetry', () => {
  it('should return the first success without sleeping', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const operation = vi.fn(async () => 'ok');
    await expect(withRetry(operation, { policy, sleep: wait })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('should retry transient failures with growing delays', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new HttpStatusError(503, 'unavailable'))
      .mockRejectedValueOnce(new HttpStatusError(429, 'slow down'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, { policy, sleep: wait, onRetry })).resolves.toBe('ok');
    expect(operation.mock.calls).toEqual([[1], [2], [3]]);
    expect(wait.mock.calls.map((call) => call[0])).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, delayMs: 100 });
  });

  it('should give up after maxAttempts with the last error', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const last = new HttpStatusError(502, 'bad gateway');
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new HttpStatusError(503, 'unavailable'))
      .mockRejectedValueOnce(new HttpStatusError(503, 'unavailable'))
      .mockRejectedValueOnce(last);

    const error = await withRetry(operation, { policy, sleep: wait }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) {
      expect(error.kind).toBe('transient');
      expect(error.attempts).toBe(3);
      expect(error.lastError).toBe(last);
      expect(error.message).toBe('Gave up after 3 attempt(s): bad gateway');
    }
    expect(operation).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('should stop immediately on an auth failure', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const operation = vi.fn(async () => {
      throw new HttpStatusError(401, 'invalid key');
    });

    const error = await withRetry(operation, { policy, sleep: wait }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) {
      expect(error.kind).toBe('auth');
      expect(error.attempts).toBe(1);
    }
    expect(operation).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('should make a single attempt when maxAttempts is 1', async () => {
    const operation = vi.fn(async () => {
      throw new HttpStatusError(503, 'unavailable');
    });
    await expect(withRetry(operation, { policy: { ...policy, maxAttempts: 1 } })).rejects.toMatchObject({
      kind: 'transient',
      attempts: 1,
    });
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped'));
    const operation = vi.fn(async () => 'ok');
    await expect(withRetry(operation, { signal: controller.signal })).rejects.toThrow('stopped');
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('should reject when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error('cancelled'));
    await expect(pending).rejects.toThrow('cancelled');
  });

  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    try {
      const pending = sleep(500);
      await vi.advanceTimersByTimeAsync(500);
      await expect(pending).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
