import path from 'node:path';
import { createLogger } from '@paperqa/tools-core';
import type { CacheStore } from './cacheStore.js';
import { InvalidQuestionError, NoDocumentError } from './errors.js';
import { openPdfDocument } from './loader.js';
import type { BuildOptions, RagPipeline } from './pipeline.js';
import type { Fingerprint, SourceDocument } from './types.js';
import type { SearchHit, VectorIndex } from './vectorIndex.js';

const log = createLogger('session');

export const SUMMARY_QUESTION =
  'Briefly summarise the main content, core arguments and key information of this document.';

export interface DocumentInfo {
  fileName: string;
  filePath: string;
  fingerprint: Fingerprint;
  /** 0 when the index was loaded from the cache. */
  pageCount: number;
  segmentCount: number;
  fromCache: boolean;
  processingTimeMs: number;
  /** ISO timestamp. */
  processedAt: string;
}

export interface SourceSnippet {
  segmentIndex: number;
  score: number;
  text: string;
}

export interface QuestionAnswer {
  question: string;
  answer: string;
  sources: SourceSnippet[];
  processingTimeMs: number;
}

export interface PaperQaSessionOptions {
  pipeline: RagPipeline;
  cacheStore: CacheStore;
  /** Defaults to reading a PDF from disk. */
  openDocument?: (filePath: string) => Promise<SourceDocument>;
  now?: () => Date;
}

function toSnippets(hits: readonly SearchHit[]): SourceSnippet[] {
  return hits.map((hit) => ({ segmentIndex: hit.segment.index, score: hit.score, text: hit.segment.text }));
}

/**
 * Question answering over one document at a time. Processing a new document replaces the current one.
 */
export class PaperQaSession {
  private readonly pipeline: RagPipeline;
  private readonly cacheStore: CacheStore;
  private readonly openDocument: (filePath: string) => Promise<SourceDocument>;
  private readonly now: () => Date;
  private current: { info: DocumentInfo; index: VectorIndex } | null = null;

  constructor(options: PaperQaSessionOptions) {
    this.pipeline = options.pipeline;
    this.cacheStore = options.cacheStore;
    this.openDocument = options.openDocument ?? openPdfDocument;
    this.now = options.now ?? (() => new Date());
  }

  public async processDocument(filePath: string, options?: BuildOptions): Promise<DocumentInfo> {
    const startedAt = Date.now();
    const document = await this.openDocument(filePath);
    const result = await this.pipeline.buildOrLoadIndex(document, options);
    const info: DocumentInfo = {
      fileName: path.basename(filePath),
      filePath,
      fingerprint: result.fingerprint,
      pageCount: result.pageCount,
      segmentCount: result.segmentCount,
      fromCache: result.fromCache,
      processingTimeMs: Date.now() - startedAt,
      processedAt: this.now().toISOString(),
    };
    this.current = { info, index: result.index };
    log.info(`Processed ${info.fileName} (${info.segmentCount} segments, fromCache=${info.fromCache})`);
    return info;
  }

  public async askQuestion(question: string): Promise<QuestionAnswer> {
    const trimmed = this.checkQuestion(question);
    const { index } = this.requireDocument();
    const startedAt = Date.now();
    const { answer, hits } = await this.pipeline.answerWithSources(trimmed, index);
    return { question: trimmed, answer, sources: toSnippets(hits), processingTimeMs: Date.now() - startedAt };
  }

  /** Ranked segments for the question, without calling the chat model. */
  public async retrieve(question: string, k?: number): Promise<SourceSnippet[]> {
    const trimmed = this.checkQuestion(question);
    const { index } = this.requireDocument();
    return toSnippets(await this.pipeline.query(index, trimmed, { k }));
  }

  public summarize(): Promise<QuestionAnswer> {
    return this.askQuestion(SUMMARY_QUESTION);
  }

  public getDocumentInfo(): DocumentInfo | null {
    return this.current ? { ...this.current.info } : null;
  }

  /**
   * Removes the cache entry for a fingerprint, or for the current document when none is given.
   * The in-memory index of the current document stays usable.
   */
  public async invalidateCache(fingerprint?: Fingerprint): Promise<Fingerprint> {
    const target = fingerprint ?? this.requireDocument().info.fingerprint;
    await this.cacheStore.invalidate(target);
    log.info(`Invalidated cache entry ${target}`);
    return target;
  }

  public listCachedFingerprints(): Promise<Fingerprint[]> {
    return this.cacheStore.list();
  }

  public reset(): void {
    this.current = null;
  }

  private checkQuestion(question: string): string {
    const trimmed = question.trim();
    if (trimmed.length === 0) {
      throw new InvalidQuestionError('Question must not be empty.');
    }
    return trimmed;
  }

  private requireDocument(): { info: DocumentInfo; index: VectorIndex } {
    if (!this.current) {
      throw new NoDocumentError('No document has been processed yet. Index a PDF first.');
    }
    return this.current;
  }
}
