import { formatFieldErrors } from '@paperqa/tools-core';
import { z } from 'zod';
import { ChatModelConfigSchema, ChatModelProvider } from './chat.js';
import { EmbeddingModelConfigSchema, defaultEmbeddingConfig } from './embedding.js';
import { InvalidConfigError } from './errors.js';
import { RetryPolicySchema } from './retry.js';

export const DEFAULT_CACHE_DIR = 'pdf_embeddings_cache';

export const ChunkingConfigSchema = z
  .object({
    size: z.number().int().positive().default(1000),
    overlap: z.number().int().nonnegative().default(200),
  })
  .refine((chunking) => chunking.overlap < chunking.size, {
    message: 'overlap must be smaller than size',
    path: ['overlap'],
  });

export const RagConfigSchema = z.object({
  chunking: ChunkingConfigSchema.default({}),
  embedding: EmbeddingModelConfigSchema.default(defaultEmbeddingConfig),
  chat: ChatModelConfigSchema.default({ provider: ChatModelProvider.Mock }),
  /** Segments per embedding request. */
  batchSize: z.number().int().positive().default(4),
  /** Embedding requests in flight at once. */
  embeddingConcurrency: z.number().int().positive().default(1),
  /** Segments retrieved per question. */
  retrievalK: z.number().int().positive().default(5),
  retry: RetryPolicySchema.default({}),
  cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
  /** Upper bound on one index build, in milliseconds. */
  buildTimeoutMs: z.number().int().positive().optional(),
});

export type RagConfig = z.infer<typeof RagConfigSchema>;
export type RagConfigInput = z.input<typeof RagConfigSchema>;

/** Validates raw configuration and applies defaults. */
export function parseRagConfig(input: unknown): RagConfig {
  const parsed = RagConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid RAG configuration: ${formatFieldErrors(parsed.error)}`);
  }
  return parsed.data;
}
