import { defineTool, formatFieldErrors, jsonPart } from '@paperqa/tools-core';
import type { Part } from '@paperqa/tools-core';
import { z } from 'zod';
import type { SourceSnippet } from '../session.js';
import { RagContextSchema, SourceSnippetSchema, describeFailure } from './context.js';

// --- Input Schema ---
export const QueryIndexInputSchema = z.object({
  queryText: z.string().min(1, 'queryText cannot be empty'),
  /** Defaults to the configured retrieval k. */
  topK: z.number().int().positive().optional(),
});

export type QueryIndexInput = z.infer<typeof QueryIndexInputSchema>;

// --- Output Types ---
export interface QueryIndexResult {
  /** Whether the query operation was successful. */
  success: boolean;
  /** The original query text. */
  query: string;
  /** Segments ranked by similarity, best first. */
  results: SourceSnippet[];
  error?: string;
  suggestion?: string;
}

const QueryIndexResultSchema = z.object({
  success: z.boolean(),
  query: z.string(),
  results: z.array(SourceSnippetSchema),
  error: z.string().optional(),
  suggestion: z.string().optional(),
});

const QueryIndexOutputSchema = z.array(QueryIndexResultSchema);

export const queryIndexTool = defineTool({
  name: 'query-index',
  description: 'Embeds a query text and returns the most similar passages of the current document, without generating an answer.',
  inputSchema: QueryIndexInputSchema,
  contextSchema: RagContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = QueryIndexInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(`Input validation failed: ${formatFieldErrors(parsed.error)}`);
    }
    const { queryText, topK } = parsed.data;

    let result: QueryIndexResult;
    try {
      const results = await context.session.retrieve(queryText, topK);
      result = { success: true, query: queryText, results };
    } catch (e: unknown) {
      result = { success: false, query: queryText, results: [], ...describeFailure(e) };
    }

    return [jsonPart([result], QueryIndexOutputSchema)];
  },
});
