import { defineTool, jsonPart } from '@paperqa/tools-core';
import type { Part } from '@paperqa/tools-core';
import { z } from 'zod';
import type { DocumentInfo } from '../session.js';
import { DocumentInfoSchema, RagContextSchema, describeFailure } from './context.js';

const IndexStatusInputSchema = z.object({});

export interface IndexStatusResult {
  success: boolean;
  /** The current document, or null before any document was processed. */
  document?: DocumentInfo | null;
  /** Fingerprints with a published cache entry. */
  cachedFingerprints?: string[];
  error?: string;
  suggestion?: string;
}

const IndexStatusResultSchema = z.object({
  success: z.boolean(),
  document: DocumentInfoSchema.nullable().optional(),
  cachedFingerprints: z.array(z.string()).optional(),
  error: z.string().optional(),
  suggestion: z.string().optional(),
});

const IndexStatusOutputSchema = z.array(IndexStatusResultSchema);

export const indexStatusTool = defineTool({
  name: 'index-status',
  description: 'Reports the current document and the fingerprints held in the embedding cache.',
  inputSchema: IndexStatusInputSchema,
  contextSchema: RagContextSchema,

  execute: async ({ context }): Promise<Part[]> => {
    let result: IndexStatusResult;
    try {
      result = {
        success: true,
        document: context.session.getDocumentInfo(),
        cachedFingerprints: await context.session.listCachedFingerprints(),
      };
    } catch (e: unknown) {
      result = { success: false, ...describeFailure(e) };
    }
    return [jsonPart([result], IndexStatusOutputSchema)];
  },
});
