import { defineTool, formatFieldErrors, jsonPart } from '@paperqa/tools-core';
import type { Part } from '@paperqa/tools-core';
import { z } from 'zod';
import type { QuestionAnswer } from '../session.js';
import { RagContextSchema, SourceSnippetSchema, describeFailure } from './context.js';

export const AskQuestionInputSchema = z.object({
  question: z.string().min(1, 'question cannot be empty'),
});

export type AskQuestionInput = z.infer<typeof AskQuestionInputSchema>;

export interface AskQuestionResult extends Partial<Omit<QuestionAnswer, 'question'>> {
  success: boolean;
  question: string;
  error?: string;
  suggestion?: string;
}

export const AskQuestionResultSchema = z.object({
  success: z.boolean(),
  question: z.string(),
  answer: z.string().optional(),
  sources: z.array(SourceSnippetSchema).optional(),
  processingTimeMs: z.number().nonnegative().optional(),
  error: z.string().optional(),
  suggestion: z.string().optional(),
});

export const AskQuestionOutputSchema = z.array(AskQuestionResultSchema);

export const askQuestionTool = defineTool({
  name: 'ask-question',
  description: 'Answers a question about the current document from its most relevant passages.',
  inputSchema: AskQuestionInputSchema,
  contextSchema: RagContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = AskQuestionInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(`Input validation failed: ${formatFieldErrors(parsed.error)}`);
    }
    const { question } = parsed.data;

    let result: AskQuestionResult;
    try {
      result = { success: true, ...(await context.session.askQuestion(question)) };
    } catch (e: unknown) {
      result = { success: false, question, ...describeFailure(e) };
    }
    return [jsonPart([result], AskQuestionOutputSchema)];
  },
});
