import { createHash } from 'node:crypto';
import { createLogger } from '@paperqa/tools-core';
import { embedMany } from 'ai';
import { fetch } from 'node-fetch-native';
import { createOllama } from 'ollama-ai-provider';
import { z } from 'zod';
import {
  EmbeddingAuthError,
  EmbeddingRequestError,
  EmbeddingShapeError,
  EmbeddingUnavailableError,
  HttpStatusError,
  InvalidConfigError,
  type RagErrorDetails,
  errorMessage,
} from './errors.js';
import { RetryError, type RetryPolicy, defaultRetryPolicy, withRetry } from './retry.js';
import type { EmbeddingVector } from './types.js';

const log = createLogger('embedding');

export const DEFAULT_EMBEDDING_DIMENSION = 1024;
export const DEFAULT_COMPATIBLE_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';

export interface GenerateOptions {
  signal?: AbortSignal;
}

/** A single remote embedding call. No batching, no retry. */
export interface IEmbeddingFunction {
  generate(texts: string[], options?: GenerateOptions): Promise<number[][]>;
}

export enum EmbeddingModelProvider {
  Mock = 'mock',
  Ollama = 'ollama',
  Http = 'http',
}

const MockConfigSchema = z.object({
  provider: z.literal(EmbeddingModelProvider.Mock),
  dimension: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSION),
});

const OllamaConfigSchema = z.object({
  provider: z.literal(EmbeddingModelProvider.Ollama),
  modelName: z.string().default('nomic-embed-text'),
  baseURL: z.string().url().optional(),
  dimension: z.number().int().positive().default(768),
});

// OpenAI-compatible /embeddings endpoint
const HttpConfigSchema = z.object({
  provider: z.literal(EmbeddingModelProvider.Http),
  baseURL: z.string().url().default(DEFAULT_COMPATIBLE_BASE_URL),
  apiKey: z.string().min(1, 'An API key is required for the HTTP embedding provider'),
  model: z.string().default('text-embedding-v4'),
  dimension: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSION),
  headers: z.record(z.string()).optional(),
  requestTimeoutMs: z.number().int().positive().default(60_000),
});

export const EmbeddingModelConfigSchema = z.discriminatedUnion('provider', [
  MockConfigSchema,
  OllamaConfigSchema,
  HttpConfigSchema,
]);

export type EmbeddingModelConfig = z.infer<typeof EmbeddingModelConfigSchema>;

export const defaultEmbeddingConfig: EmbeddingModelConfig = {
  provider: EmbeddingModelProvider.Mock,
  dimension: DEFAULT_EMBEDDING_DIMENSION,
};

// --- Embedding Function Implementations ---

/**
 * Offline embeddings. Each word is hashed into a signed bucket, so texts that share
 * words score higher under cosine similarity. Fully deterministic.
 */
export class MockEmbeddingFunction implements IEmbeddingFunction {
  constructor(private readonly dimension = DEFAULT_EMBEDDING_DIMENSION) {}

  public async generate(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
    for (const word of words) {
      const digest = createHash('sha256').update(word).digest();
      const bucket = digest.readUInt32BE(0) % this.dimension;
      vector[bucket] += digest[4] & 1 ? 1 : -1;
    }
    return vector;
  }
}

export class OllamaEmbeddingFunction implements IEmbeddingFunction {
  private ollamaInstance: ReturnType<typeof createOllama>;
  private modelId: string;

  constructor(modelName: string, baseURL?: string) {
    this.ollamaInstance = createOllama({ baseURL });
    this.modelId = modelName;
  }

  public async generate(texts: string[], options: GenerateOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];
    // Retries belong to EmbeddingClient.
    const { embeddings } = await embedMany({
      model: this.ollamaInstance.embedding(this.modelId),
      values: texts,
      maxRetries: 0,
      abortSignal: options.signal,
    });
    return embeddings;
  }
}

const EmbeddingResponseSchema = z.union([
  z.object({
    data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int().optional() })),
  }),
  z.object({ embeddings: z.array(z.array(z.number())) }),
]);

export interface HttpEmbeddingOptions {
  baseURL: string;
  apiKey?: string;
  model: string;
  dimension?: number;
  headers?: Record<string, string>;
  requestTimeoutMs?: number;
}

/** Calls an OpenAI-compatible `POST {baseURL}/embeddings` endpoint. */
export class HttpEmbeddingFunction implements IEmbeddingFunction {
  private readonly url: string;

  constructor(private readonly options: HttpEmbeddingOptions) {
    this.url = `${options.baseURL.replace(/\/+$/, '')}/embeddings`;
  }

  public async generate(texts: string[], options: GenerateOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.options.headers,
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs ?? 60_000);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const response = await fetch(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: this.options.model,
        input: texts,
        dimensions: this.options.dimension,
        encoding_format: 'float',
      }),
      signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new HttpStatusError(
        response.status,
        `HTTP error ${response.status}: ${response.statusText}. Body: ${errorBody}`,
        errorBody,
      );
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingShapeError('Invalid response format from HTTP embedding API.');
    }
    if ('embeddings' in parsed.data) {
      return parsed.data.embeddings;
    }
    // Items carry their input position; order by it when present.
    const items = [...parsed.data.data];
    if (items.every((item) => item.index !== undefined)) {
      items.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    }
    return items.map((item) => item.embedding);
  }
}

export function createEmbeddingFunction(config: EmbeddingModelConfig): IEmbeddingFunction {
  switch (config.provider) {
    case EmbeddingModelProvider.Mock:
      return new MockEmbeddingFunction(config.dimension);
    case EmbeddingModelProvider.Ollama:
      return new OllamaEmbeddingFunction(config.modelName, config.baseURL);
    case EmbeddingModelProvider.Http:
      return new HttpEmbeddingFunction(config);
    default: {
      const exhaustiveCheck: never = config;
      throw new Error(`Unhandled embedding provider: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// --- Batching client ---

export interface EmbedOptions {
  /** Overrides the client's batch size for this call. */
  batchSize?: number;
  signal?: AbortSignal;
  /** Attached to errors and log lines. */
  fingerprint?: string;
}

/** The one capability the pipeline needs from an embedding backend. */
export interface Embedder {
  embedBatch(texts: readonly string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;
}

export interface EmbeddingClientOptions {
  /** Every returned vector must have exactly this many components. */
  dimension: number;
  batchSize?: number;
  /** Batches in flight at once. Results are reassembled in input order. */
  concurrency?: number;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Runs `task` over `count` indexes with at most `concurrency` in flight. The first failure
 * aborts `controller` so that the other workers stop, and is what every worker rejects with.
 */
async function runPool(
  count: number,
  concurrency: number,
  controller: AbortController,
  task: (index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  let failed = false;
  let firstError: unknown;
  const worker = async () => {
    while (!failed && next < count) {
      const index = next++;
      try {
        await task(index);
      } catch (error: unknown) {
        if (!failed) {
          failed = true;
          firstError = error;
          controller.abort(error);
        }
        throw firstError;
      }
    }
  };
  await Promise.all(Array.from({ length: Math.min(concurrency, count) }, () => worker()));
}

/**
 * Splits texts into batches, sends each through the embedding function with retries,
 * and checks every response against the expected count and dimension.
 */
export class EmbeddingClient implements Embedder {
  private readonly dimension: number;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly embeddingFunction: IEmbeddingFunction,
    private readonly options: EmbeddingClientOptions,
  ) {
    this.dimension = options.dimension;
    this.batchSize = options.batchSize ?? 4;
    this.concurrency = options.concurrency ?? 1;
    this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
    assertPositiveInteger('dimension', this.dimension);
    assertPositiveInteger('batchSize', this.batchSize);
    assertPositiveInteger('concurrency', this.concurrency);
  }

  public async embedBatch(texts: readonly string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    const batchSize = options.batchSize ?? this.batchSize;
    assertPositiveInteger('batchSize', batchSize);
    if (texts.length === 0) return [];

    const batches = partition(texts, batchSize);
    const results = new Array<EmbeddingVector[]>(batches.length);
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    try {
      await runPool(batches.length, this.concurrency, controller, async (batchIndex) => {
        results[batchIndex] = await this.embedOne(batches[batchIndex] ?? [], batchIndex, options, controller.signal);
      });
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
    return results.flat();
  }

  private async embedOne(
    batch: string[],
    batchIndex: number,
    options: EmbedOptions,
    signal: AbortSignal,
  ): Promise<EmbeddingVector[]> {
    const details: RagErrorDetails = { fingerprint: options.fingerprint, batchIndex };
    try {
      return await withRetry(
        async () => {
          const vectors = await this.embeddingFunction.generate(batch, { signal });
          this.validate(vectors, batch.length, details);
          return vectors;
        },
        {
          policy: this.retryPolicy,
          sleep: this.options.sleep,
          random: this.options.random,
          signal,
          onRetry: ({ attempt, delayMs, error }) =>
            log.warn(
              `Batch ${batchIndex} attempt ${attempt}/${this.retryPolicy.maxAttempts} failed, retrying in ${delayMs}ms`,
              { fingerprint: options.fingerprint, error: errorMessage(error) },
            ),
        },
      );
    } catch (error: unknown) {
      if (error instanceof RetryError) throw this.toEmbeddingError(error, details);
      throw error;
    }
  }

  private validate(vectors: number[][], expected: number, details: RagErrorDetails): void {
    if (vectors.length !== expected) {
      throw new EmbeddingShapeError(
        `Embedding count mismatch: expected ${expected}, got ${vectors.length}`,
        details,
      );
    }
    vectors.forEach((vector, position) => {
      if (vector.length !== this.dimension) {
        throw new EmbeddingShapeError(
          `Embedding dimension mismatch at position ${position}: expected ${this.dimension}, got ${vector.length}`,
          details,
        );
      }
      if (!vector.every(Number.isFinite)) {
        throw new EmbeddingShapeError(`Embedding at position ${position} contains non-finite values`, details);
      }
    });
  }

  private toEmbeddingError(error: RetryError, details: RagErrorDetails): Error {
    const context = { ...details, attempts: error.attempts };
    const cause = { cause: error.lastError };
    const message = errorMessage(error.lastError);
    switch (error.kind) {
      case 'shape':
        return error.lastError instanceof EmbeddingShapeError
          ? error.lastError
          : new EmbeddingShapeError(message, context);
      case 'auth':
        return new EmbeddingAuthError(`Embedding API rejected the credentials: ${message}`, context, cause);
      case 'request':
        return new EmbeddingRequestError(`Embedding request failed: ${message}`, context, cause);
      case 'transient':
        return new EmbeddingUnavailableError(
          `Embedding batch ${details.batchIndex} failed after ${error.attempts} attempt(s): ${message}`,
          context,
          cause,
        );
    }
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigError(`${name} must be a positive integer, got ${value}.`);
  }
}
