// Main export for @paperqa/tools-rag

// Types
export type { CacheEntry, EmbeddingVector, ExtractedText, Fingerprint, IndexState, Segment, SourceDocument } from './types.js';
export { IndexStateSchema, SegmentSchema, textDocument } from './types.js';
export type { ChunkingOptions } from './chunking.js';
export type {
  EmbedOptions,
  Embedder,
  EmbeddingClientOptions,
  EmbeddingModelConfig,
  GenerateOptions,
  HttpEmbeddingOptions,
  IEmbeddingFunction,
} from './embedding.js';
export type { ChatModel, ChatModelConfig, CompleteOptions, OpenAIChatModelOptions } from './chat.js';
export type { CacheStore, SaveOptions } from './cacheStore.js';
export type { SearchHit } from './vectorIndex.js';
export type { AnswerResult, BuildOptions, IndexBuildResult, QueryOptions, RagPipelineOptions } from './pipeline.js';
export type { DocumentInfo, PaperQaSessionOptions, QuestionAnswer, SourceSnippet } from './session.js';
export type { RagConfig, RagConfigInput } from './config.js';
export type { FailureKind, RetryAttemptInfo, RetryOptions, RetryPolicy } from './retry.js';
export type { RagErrorCode, RagErrorDetails } from './errors.js';

// Errors
export * from './errors.js';

// Functions and classes
export { chunkText, mergeSegments, validateChunkingOptions } from './chunking.js';
export { fingerprint, fingerprintFile, isFingerprint } from './fingerprint.js';
export {
  RetryError,
  RetryPolicySchema,
  classifyFailure,
  computeBackoffDelay,
  defaultRetryPolicy,
  sleep,
  withRetry,
} from './retry.js';
export {
  DEFAULT_COMPATIBLE_BASE_URL,
  DEFAULT_EMBEDDING_DIMENSION,
  EmbeddingClient,
  EmbeddingModelConfigSchema,
  EmbeddingModelProvider,
  HttpEmbeddingFunction,
  MockEmbeddingFunction,
  OllamaEmbeddingFunction,
  createEmbeddingFunction,
  defaultEmbeddingConfig,
  partition,
} from './embedding.js';
export {
  ChatModelConfigSchema,
  ChatModelProvider,
  MockChatModel,
  OpenAIChatModel,
  QA_PROMPT_TEMPLATE,
  RetryingChatModel,
  buildQaPrompt,
  createChatModel,
} from './chat.js';
export { CACHE_FORMAT_VERSION, FsCacheStore, InMemoryCacheStore, STAGING_PREFIX } from './cacheStore.js';
export { VectorIndex } from './vectorIndex.js';
export { RagPipeline } from './pipeline.js';
export { extractPdfText, openPdfDocument, validatePdfPath } from './loader.js';
export { PaperQaSession, SUMMARY_QUESTION } from './session.js';
export { ChunkingConfigSchema, DEFAULT_CACHE_DIR, RagConfigSchema, parseRagConfig } from './config.js';

// Tools
export { RagContextSchema, type RagContext } from './tools/context.js';
export { indexDocumentTool } from './tools/indexDocumentTool.js';
export { askQuestionTool } from './tools/askQuestionTool.js';
export { queryIndexTool } from './tools/queryIndexTool.js';
export { summarizeDocumentTool } from './tools/summarizeDocumentTool.js';
export { indexStatusTool } from './tools/indexStatusTool.js';
export { invalidateCacheTool } from './tools/invalidateCacheTool.js';

import { askQuestionTool } from './tools/askQuestionTool.js';
import { indexDocumentTool } from './tools/indexDocumentTool.js';
import { indexStatusTool } from './tools/indexStatusTool.js';
import { invalidateCacheTool } from './tools/invalidateCacheTool.js';
import { queryIndexTool } from './tools/queryIndexTool.js';
import { summarizeDocumentTool } from './tools/summarizeDocumentTool.js';

/** Every tool this package provides, in registration order. */
export const ragTools = [
  indexDocumentTool,
  askQuestionTool,
  queryIndexTool,
  summarizeDocumentTool,
  indexStatusTool,
  invalidateCacheTool,
] as const;
