import { createLogger } from '@paperqa/tools-core';
import type { CacheStore } from './cacheStore.js';
import { type ChatModel, RetryingChatModel, buildQaPrompt, createChatModel } from './chat.js';
import { chunkText, validateChunkingOptions } from './chunking.js';
import type { RagConfig } from './config.js';
import { type Embedder, EmbeddingClient, createEmbeddingFunction } from './embedding.js';
import {
  BuildTimeoutError,
  DocumentReadError,
  EmbeddingShapeError,
  InvalidConfigError,
  InvalidDocumentError,
  InvalidQuestionError,
  RagError,
  errorMessage,
} from './errors.js';
import { fingerprint as computeFingerprint } from './fingerprint.js';
import type { Fingerprint, SourceDocument } from './types.js';
import { type SearchHit, VectorIndex } from './vectorIndex.js';

const log = createLogger('pipeline');

export interface RagPipelineOptions {
  embedder: Embedder;
  cacheStore: CacheStore;
  chatModel?: ChatModel;
  chunkSize?: number;
  chunkOverlap?: number;
  batchSize?: number;
  retrievalK?: number;
  /** Cached indexes of another dimension are rebuilt. */
  dimension?: number;
  buildTimeoutMs?: number;
}

export interface BuildOptions {
  /** Overrides the pipeline's build timeout for this call. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface IndexBuildResult {
  index: VectorIndex;
  fingerprint: Fingerprint;
  fromCache: boolean;
  /** Pages read from the document; 0 when the index came from the cache. */
  pageCount: number;
  segmentCount: number;
  durationMs: number;
}

export interface QueryOptions {
  k?: number;
  signal?: AbortSignal;
}

export interface AnswerResult {
  answer: string;
  hits: SearchHit[];
}

/** Settles with `promise`, or rejects with the signal's reason as soon as it aborts. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** One build per fingerprint, shared by every caller waiting on it. */
interface SharedBuild {
  promise: Promise<IndexBuildResult>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

/**
 * Turns documents into queryable indexes, embedding each distinct document at most once.
 *
 * fingerprint -> cache lookup -> (hit) ready
 *                             -> (miss) chunk -> embed -> build index -> persist -> ready
 */
export class RagPipeline {
  private readonly embedder: Embedder;
  private readonly cacheStore: CacheStore;
  private readonly chatModel?: ChatModel;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly batchSize: number;
  private readonly retrievalK: number;
  private readonly dimension?: number;
  private readonly buildTimeoutMs?: number;
  private readonly inFlight = new Map<Fingerprint, SharedBuild>();

  constructor(options: RagPipelineOptions) {
    this.embedder = options.embedder;
    this.cacheStore = options.cacheStore;
    this.chatModel = options.chatModel;
    this.chunkSize = options.chunkSize ?? 1000;
    this.chunkOverlap = options.chunkOverlap ?? 200;
    this.batchSize = options.batchSize ?? 4;
    this.retrievalK = options.retrievalK ?? 5;
    this.dimension = options.dimension;
    this.buildTimeoutMs = options.buildTimeoutMs;
    validateChunkingOptions(this.chunkSize, this.chunkOverlap);
  }

  /** Wires the configured embedding and chat providers around a cache store. */
  public static fromConfig(config: RagConfig, cacheStore: CacheStore): RagPipeline {
    const embedder = new EmbeddingClient(createEmbeddingFunction(config.embedding), {
      dimension: config.embedding.dimension,
      batchSize: config.batchSize,
      concurrency: config.embeddingConcurrency,
      retryPolicy: config.retry,
    });
    return new RagPipeline({
      embedder,
      cacheStore,
      chatModel: new RetryingChatModel(createChatModel(config.chat), { policy: config.retry }),
      chunkSize: config.chunking.size,
      chunkOverlap: config.chunking.overlap,
      batchSize: config.batchSize,
      retrievalK: config.retrievalK,
      dimension: config.embedding.dimension,
      buildTimeoutMs: config.buildTimeoutMs,
    });
  }

  public get defaultK(): number {
    return this.retrievalK;
  }

  /**
   * Returns a ready index for the document, from the cache when possible.
   * Concurrent calls for the same content share one build. Each call's own timeout and signal
   * bound only that call's wait; the build itself stops when every caller has gone or the
   * pipeline's `buildTimeoutMs` expires.
   */
  public buildOrLoadIndex(document: SourceDocument, options: BuildOptions = {}): Promise<IndexBuildResult> {
    const fingerprint = computeFingerprint(document.bytes);
    let shared = this.inFlight.get(fingerprint);
    if (shared) {
      log.debug(`Joining in-flight build for ${fingerprint}`);
    } else {
      shared = this.startBuild(document, fingerprint);
      this.inFlight.set(fingerprint, shared);
    }
    return this.waitFor(shared, document, fingerprint, options);
  }

  /** Ranks the index's segments against the question, best first. */
  public async query(index: VectorIndex, question: string, options: QueryOptions = {}): Promise<SearchHit[]> {
    if (question.trim().length === 0) {
      throw new InvalidQuestionError('Question must not be empty.');
    }
    const [vector] = await this.embedder.embedBatch([question], { batchSize: 1, signal: options.signal });
    if (!vector) {
      throw new EmbeddingShapeError('Embedding backend returned no vector for the question.');
    }
    return index.query(vector, options.k ?? this.retrievalK);
  }

  public async answer(question: string, index: VectorIndex, options: QueryOptions = {}): Promise<string> {
    const { answer } = await this.answerWithSources(question, index, options);
    return answer;
  }

  /** Answers from the top-k segments and returns them alongside the answer. */
  public async answerWithSources(question: string, index: VectorIndex, options: QueryOptions = {}): Promise<AnswerResult> {
    if (!this.chatModel) {
      throw new InvalidConfigError('No chat model is configured.');
    }
    const hits = await this.query(index, question, options);
    const answer = await this.chatModel.complete(buildQaPrompt(question, hits), { signal: options.signal });
    return { answer, hits };
  }

  private startBuild(document: SourceDocument, fingerprint: Fingerprint): SharedBuild {
    const controller = new AbortController();
    const timeoutMs = this.buildTimeoutMs;
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(
            () =>
              controller.abort(
                new BuildTimeoutError(`Index build for '${document.id}' exceeded ${timeoutMs}ms`, {
                  fingerprint,
                  timeoutMs,
                }),
              ),
            timeoutMs,
          );
    const shared: SharedBuild = {
      promise: abortable(this.buildStages(document, fingerprint, controller.signal), controller.signal),
      controller,
      waiters: 0,
      settled: false,
    };
    const release = () => {
      clearTimeout(timer);
      shared.settled = true;
      if (this.inFlight.get(fingerprint) === shared) {
        this.inFlight.delete(fingerprint);
      }
    };
    void shared.promise.then(release, release);
    return shared;
  }

  /** Waits on a shared build under the caller's own timeout and signal. */
  private async waitFor(
    shared: SharedBuild,
    document: SourceDocument,
    fingerprint: Fingerprint,
    options: BuildOptions,
  ): Promise<IndexBuildResult> {
    const caller = new AbortController();
    const onCallerAbort = () =>
      caller.abort(new BuildTimeoutError(`Index build for '${document.id}' was cancelled`, { fingerprint }));
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    const { timeoutMs } = options;
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(
            () =>
              caller.abort(
                new BuildTimeoutError(`Index build for '${document.id}' exceeded ${timeoutMs}ms`, {
                  fingerprint,
                  timeoutMs,
                }),
              ),
            timeoutMs,
          );
    shared.waiters += 1;
    try {
      return await abortable(shared.promise, caller.signal);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
      shared.waiters -= 1;
      if (shared.waiters === 0 && !shared.settled) {
        log.debug(`Every caller left the build for ${fingerprint}; cancelling it`);
        shared.controller.abort(
          new BuildTimeoutError(`Index build for '${document.id}' was cancelled`, { fingerprint }),
        );
        if (this.inFlight.get(fingerprint) === shared) {
          this.inFlight.delete(fingerprint);
        }
      }
    }
  }

  private async buildStages(
    document: SourceDocument,
    fingerprint: Fingerprint,
    signal: AbortSignal,
  ): Promise<IndexBuildResult> {
    const startedAt = Date.now();
    const tag = fingerprint.slice(0, 12);

    log.info(`[${tag}] lookup ${document.id}`);
    const cached = await this.loadCached(fingerprint);
    signal.throwIfAborted();
    if (cached) {
      log.info(`[${tag}] ready from cache (${cached.size} segments)`);
      return {
        index: cached,
        fingerprint,
        fromCache: true,
        pageCount: 0,
        segmentCount: cached.size,
        durationMs: Date.now() - startedAt,
      };
    }

    log.info(`[${tag}] chunking`);
    const { text, pageCount } = await this.extract(document, fingerprint);
    signal.throwIfAborted();
    if (text.trim().length === 0) {
      throw new InvalidDocumentError(`Document '${document.id}' contains no extractable text.`, { fingerprint });
    }
    const segments = chunkText(text, this.chunkSize, this.chunkOverlap);

    log.info(`[${tag}] embedding ${segments.length} segments`);
    const vectors = await this.embedder.embedBatch(
      segments.map((segment) => segment.text),
      { batchSize: this.batchSize, signal, fingerprint },
    );
    signal.throwIfAborted();
    if (vectors.length !== segments.length) {
      throw new EmbeddingShapeError(`Expected ${segments.length} vectors, got ${vectors.length}`, { fingerprint });
    }

    log.info(`[${tag}] building index`);
    const index = VectorIndex.build(segments, vectors);
    signal.throwIfAborted();

    log.info(`[${tag}] persisting`);
    try {
      await this.cacheStore.save(
        {
          fingerprint,
          segments,
          vectors,
          indexState: index.toState(),
          createdAt: new Date().toISOString(),
          source: document.id,
        },
        { signal },
      );
    } catch (e: unknown) {
      log.warn(`[${tag}] continuing without cache: ${errorMessage(e)}`);
    }

    log.info(`[${tag}] ready (${segments.length} segments)`);
    return {
      index,
      fingerprint,
      fromCache: false,
      pageCount,
      segmentCount: segments.length,
      durationMs: Date.now() - startedAt,
    };
  }

  /** Any cache fault, including an entry that no longer fits the embedding model, counts as a miss. */
  private async loadCached(fingerprint: Fingerprint): Promise<VectorIndex | null> {
    try {
      const entry = await this.cacheStore.lookup(fingerprint);
      if (!entry) return null;
      const index = VectorIndex.fromCacheEntry(entry);
      if (this.dimension !== undefined && index.size > 0 && index.dimension !== this.dimension) {
        log.warn(`Cached index for ${fingerprint} has dimension ${index.dimension}, expected ${this.dimension}; rebuilding`);
        // Entries are immutable, so the stale one has to go before the rebuild can be saved.
        await this.cacheStore.invalidate(fingerprint);
        return null;
      }
      return index;
    } catch (e: unknown) {
      log.warn(`Cache lookup for ${fingerprint} failed, rebuilding: ${errorMessage(e)}`);
      return null;
    }
  }

  private async extract(document: SourceDocument, fingerprint: Fingerprint) {
    try {
      return await document.extractText();
    } catch (e: unknown) {
      if (e instanceof RagError) throw e;
      throw new DocumentReadError(
        `Cannot extract text from '${document.id}': ${errorMessage(e)}`,
        { fingerprint, path: document.id },
        { cause: e },
      );
    }
  }
}
