import type { ZodTypeAny, z } from 'zod';
import type { BaseContextSchema, Part } from './index.js';

/**
 * Defines the structure required to define a tool using the defineTool helper.
 * The context type is inferred from the provided contextSchema.
 * @template TInputSchema Zod schema for input validation.
 * @template TContextSchema Zod schema for context validation. Defaults to BaseContextSchema.
 */
export interface ToolDefinition<
  TInputSchema extends ZodTypeAny = z.ZodUndefined,
  TContextSchema extends ZodTypeAny = typeof BaseContextSchema,
> {
  /** Unique name of the tool. */
  name: string;
  /** Description of what the tool does. */
  description: string;
  /** Zod schema used by the MCP server to validate input arguments. */
  inputSchema: TInputSchema;
  /** Zod schema used to validate the context object. */
  contextSchema: TContextSchema;
  /**
   * The core execution logic for the tool.
   * Receives validated arguments and a context object validated against contextSchema.
   */
  execute: (params: {
    context: z.infer<TContextSchema>;
    args: z.infer<TInputSchema>;
  }) => Promise<Part[]>;
}

/**
 * A helper function to define a Tool.
 * Errors thrown by execute propagate; the adaptor layer reports them.
 */
export function defineTool<
  TInputSchema extends ZodTypeAny = z.ZodUndefined,
  TContextSchema extends ZodTypeAny = typeof BaseContextSchema,
>(
  definition: ToolDefinition<TInputSchema, TContextSchema>,
): ToolDefinition<TInputSchema, TContextSchema> {
  return definition;
}
