import { BaseContextSchema } from '@paperqa/tools-core';
import { z } from 'zod';
import { isRagError, errorMessage } from '../errors.js';
import { PaperQaSession } from '../session.js';

/** Context of the RAG tools: the base tool context plus the session they operate on. */
export const RagContextSchema = BaseContextSchema.extend({
  session: z.instanceof(PaperQaSession, { message: 'session must be an instance of PaperQaSession' }),
});
export type RagContext = z.infer<typeof RagContextSchema>;

export const DocumentInfoSchema = z.object({
  fileName: z.string(),
  filePath: z.string(),
  fingerprint: z.string(),
  pageCount: z.number().int().nonnegative(),
  segmentCount: z.number().int().nonnegative(),
  fromCache: z.boolean(),
  processingTimeMs: z.number().nonnegative(),
  processedAt: z.string(),
});

export const SourceSnippetSchema = z.object({
  segmentIndex: z.number().int().nonnegative(),
  score: z.number(),
  text: z.string(),
});

export interface ToolFailure {
  error: string;
  suggestion: string;
}

/** Error message plus a hint for the caller, keyed on the failure's code. */
export function describeFailure(e: unknown): ToolFailure {
  const error = errorMessage(e);
  if (!isRagError(e)) {
    return { error, suggestion: 'An unexpected error occurred; check the server logs.' };
  }
  switch (e.code) {
    case 'NO_DOCUMENT':
      return { error, suggestion: 'Run index-document on a PDF before asking questions.' };
    case 'INVALID_QUESTION':
      return { error, suggestion: 'Provide a non-empty question.' };
    case 'INVALID_DOCUMENT':
      return { error, suggestion: 'Ensure the file is a readable PDF that contains text.' };
    case 'DOCUMENT_READ':
      return { error, suggestion: 'Check that the file exists and is readable.' };
    case 'EMBEDDING_AUTH':
    case 'COMPLETION_AUTH':
      return { error, suggestion: 'Check the API key (DASHSCOPE_API_KEY).' };
    case 'EMBEDDING_UNAVAILABLE':
    case 'COMPLETION_UNAVAILABLE':
      return { error, suggestion: 'The remote service kept failing; try again later.' };
    case 'EMBEDDING_SHAPE':
      return { error, suggestion: 'Check that the configured embedding dimension matches the model.' };
    case 'BUILD_TIMEOUT':
      return { error, suggestion: 'Increase the build timeout or retry; nothing was cached.' };
    default:
      return { error, suggestion: 'Check the configuration and request parameters.' };
  }
}
