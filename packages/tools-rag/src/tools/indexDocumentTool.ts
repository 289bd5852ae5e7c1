import { defineTool, formatFieldErrors, jsonPart, validateAndResolvePath } from '@paperqa/tools-core';
import type { Part } from '@paperqa/tools-core';
import { z } from 'zod';
import type { DocumentInfo } from '../session.js';
import { DocumentInfoSchema, RagContextSchema, describeFailure } from './context.js';

// --- Input Schema ---
const IndexDocumentItemSchema = z.object({
  id: z.string().optional(),
  path: z.string().min(1, 'path cannot be empty'),
});

export const IndexDocumentInputSchema = z.object({
  items: z.array(IndexDocumentItemSchema).min(1, 'At least one document is required'),
  /** Per-document build timeout in milliseconds. */
  timeoutMs: z.number().int().positive().optional(),
});

export type IndexDocumentInput = z.infer<typeof IndexDocumentInputSchema>;

// --- Output Types ---
export interface IndexDocumentResultItem {
  id?: string;
  path: string;
  success: boolean;
  document?: DocumentInfo;
  error?: string;
  suggestion?: string;
}

const IndexDocumentResultItemSchema = z.object({
  id: z.string().optional(),
  path: z.string(),
  success: z.boolean(),
  document: DocumentInfoSchema.optional(),
  error: z.string().optional(),
  suggestion: z.string().optional(),
});

const IndexDocumentOutputSchema = z.array(IndexDocumentResultItemSchema);

export const indexDocumentTool = defineTool({
  name: 'index-document',
  description:
    'Loads PDF documents, embeds them (reusing the cache for unchanged files) and makes the last one the current document.',
  inputSchema: IndexDocumentInputSchema,
  contextSchema: RagContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = IndexDocumentInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(`Input validation failed: ${formatFieldErrors(parsed.error)}`);
    }
    const { items, timeoutMs } = parsed.data;
    const results: IndexDocumentResultItem[] = [];

    // Sequential: the session holds one current document.
    for (const item of items) {
      const resolved = validateAndResolvePath(item.path, context.workspaceRoot, context.allowOutsideWorkspace);
      if (typeof resolved !== 'string') {
        results.push({ id: item.id, path: item.path, success: false, ...resolved });
        continue;
      }
      try {
        const document = await context.session.processDocument(resolved, { timeoutMs });
        results.push({ id: item.id, path: item.path, success: true, document });
      } catch (e: unknown) {
        results.push({ id: item.id, path: item.path, success: false, ...describeFailure(e) });
      }
    }

    return [jsonPart(results, IndexDocumentOutputSchema)];
  },
});
