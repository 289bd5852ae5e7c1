import { defineTool, jsonPart } from '@paperqa/tools-core';
import type { Part } from '@paperqa/tools-core';
import { z } from 'zod';
import { SUMMARY_QUESTION } from '../session.js';
import { type AskQuestionResult, AskQuestionOutputSchema } from './askQuestionTool.js';
import { RagContextSchema, describeFailure } from './context.js';

export const SummarizeDocumentInputSchema = z.object({});

export const summarizeDocumentTool = defineTool({
  name: 'summarize-document',
  description: 'Summarises the main content, arguments and key information of the current document.',
  inputSchema: SummarizeDocumentInputSchema,
  contextSchema: RagContextSchema,

  execute: async ({ context }): Promise<Part[]> => {
    let result: AskQuestionResult;
    try {
      result = { success: true, ...(await context.session.summarize()) };
    } catch (e: unknown) {
      result = { success: false, question: SUMMARY_QUESTION, ...describeFailure(e) };
    }
    return [jsonPart([result], AskQuestionOutputSchema)];
  },
});
