import { defineTool, formatFieldErrors, jsonPart, validateAndResolvePath } from '@paperqa/tools-core';
import type { Part } from '@paperqa/tools-core';
import { z } from 'zod';
import { fingerprintFile } from '../fingerprint.js';
import { RagContextSchema, describeFailure } from './context.js';

export const InvalidateCacheInputSchema = z.object({
  fingerprint: z
    .string()
    .regex(/^[0-9a-f]{64}$/, 'fingerprint must be a lowercase hex SHA-256')
    .optional(),
  /** Fingerprints this PDF instead. */
  path: z.string().min(1).optional(),
});

export interface InvalidateCacheResult {
  success: boolean;
  fingerprint?: string;
  error?: string;
  suggestion?: string;
}

const InvalidateCacheResultSchema = z.object({
  success: z.boolean(),
  fingerprint: z.string().optional(),
  error: z.string().optional(),
  suggestion: z.string().optional(),
});

const InvalidateCacheOutputSchema = z.array(InvalidateCacheResultSchema);

export const invalidateCacheTool = defineTool({
  name: 'invalidate-cache',
  description:
    'Deletes a cached embedding entry, selected by fingerprint, by PDF path, or the current document when neither is given.',
  inputSchema: InvalidateCacheInputSchema,
  contextSchema: RagContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = InvalidateCacheInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(`Input validation failed: ${formatFieldErrors(parsed.error)}`);
    }
    const { fingerprint, path } = parsed.data;
    if (fingerprint && path) {
      throw new Error('Input validation failed: provide either fingerprint or path, not both');
    }

    let result: InvalidateCacheResult;
    try {
      let target = fingerprint;
      if (path) {
        const resolved = validateAndResolvePath(path, context.workspaceRoot, context.allowOutsideWorkspace);
        if (typeof resolved !== 'string') {
          return [jsonPart([{ success: false, ...resolved }], InvalidateCacheOutputSchema)];
        }
        target = await fingerprintFile(resolved);
      }
      result = { success: true, fingerprint: await context.session.invalidateCache(target) };
    } catch (e: unknown) {
      result = { success: false, fingerprint, ...describeFailure(e) };
    }
    return [jsonPart([result], InvalidateCacheOutputSchema)];
  },
});
