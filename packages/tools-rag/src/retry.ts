import { APICallError } from 'ai';
import { z } from 'zod';
import { EmbeddingShapeError, HttpStatusError, errorMessage } from './errors.js';

export const RetryPolicySchema = z
  .object({
    /** Total attempts per call, the first one included. */
    maxAttempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(30_000),
    /** Spread each delay over [delay / 2, delay]. */
    jitter: z.boolean().default(true),
  })
  .refine((policy) => policy.baseDelayMs <= policy.maxDelayMs, {
    message: 'baseDelayMs must not exceed maxDelayMs',
    path: ['baseDelayMs'],
  });

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const defaultRetryPolicy: RetryPolicy = RetryPolicySchema.parse({});

export type FailureKind = 'transient' | 'auth' | 'request' | 'shape';

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function stringProperty(value: unknown, key: string): string | undefined {
  if (typeof value === 'object' && value !== null && key in value) {
    const property: unknown = Reflect.get(value, key);
    return typeof property === 'string' ? property : undefined;
  }
  return undefined;
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof HttpStatusError) return error.status;
  if (APICallError.isInstance(error)) return error.statusCode;
  return undefined;
}

function isNetworkFailure(error: unknown): boolean {
  let current: unknown = error;
  // Walk the cause chain: fetch wraps socket errors in `TypeError: fetch failed`.
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
    const code = stringProperty(current, 'code');
    if (code && NETWORK_ERROR_CODES.has(code)) return true;
    const name = stringProperty(current, 'name');
    if (name === 'TimeoutError') return true;
    if (current instanceof TypeError && current.message === 'fetch failed') return true;
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

/**
 * Splits failures into those worth retrying and those that need a human.
 * 401/403 are auth failures; 408, 425, 429 and 5xx are transient; other 4xx are bad requests.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof EmbeddingShapeError) return 'shape';
  const status = statusOf(error);
  if (status !== undefined) {
    if (status === 401 || status === 403) return 'auth';
    if (status === 408 || status === 425 || status === 429 || status >= 500) return 'transient';
    return 'request';
  }
  if (APICallError.isInstance(error) && error.isRetryable) return 'transient';
  if (isNetworkFailure(error)) return 'transient';
  return 'request';
}

/** Delay before retry number `retry` (0 for the first retry). */
export function computeBackoffDelay(policy: RetryPolicy, retry: number, random: () => number = Math.random): number {
  const delay = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** retry);
  if (!policy.jitter) return delay;
  return Math.round(delay / 2 + random() * (delay / 2));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Final failure of {@link withRetry}. `lastError` is the failure of the last attempt. */
export class RetryError extends Error {
  constructor(
    public readonly kind: FailureKind,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      kind === 'transient'
        ? `Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`
        : errorMessage(lastError),
      { cause: lastError },
    );
    this.name = 'RetryError';
  }
}

export interface RetryAttemptInfo {
  /** The attempt that just failed, starting at 1. */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  policy?: RetryPolicy;
  classify?: (error: unknown) => FailureKind;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Runs `operation` until it succeeds, fails with a non-transient error, or the policy runs out
 * of attempts. Failures surface as {@link RetryError}; an abort surfaces as the signal's reason.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? defaultRetryPolicy;
  const classify = options.classify ?? classifyFailure;
  const wait = options.sleep ?? sleep;
  const { signal } = options;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      signal?.throwIfAborted();
      const kind = classify(error);
      if (kind !== 'transient' || attempt >= policy.maxAttempts) {
        throw new RetryError(kind, attempt, error);
      }
      const delayMs = computeBackoffDelay(policy, attempt - 1, options.random);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs, signal);
    }
  }
}
