import path from 'node:path';
// src/index.ts for @paperqa/tools-core
import { type ZodTypeAny, z } from 'zod';

export const TextPartSchema = z.object({ type: z.literal('text'), value: z.string() });
export type TextPart = z.infer<typeof TextPartSchema>;

// The schema travels with the value so adaptors can describe or re-validate it.
export const JsonPartSchema = z.object({
  type: z.literal('json'),
  value: z.unknown(),
  schema: z.custom<ZodTypeAny>((val) => val instanceof z.ZodType, {
    message: 'Schema must be a Zod schema instance',
  }),
});
export type JsonPart<T extends ZodTypeAny = ZodTypeAny> = {
  type: 'json';
  value: z.infer<T>;
  schema: T;
};

export const PartSchema = z.union([TextPartSchema, JsonPartSchema]);
export type Part = TextPart | JsonPart;

/** Context every tool receives from the server. */
export const BaseContextSchema = z.object({
  /** The absolute path to the workspace root directory. */
  workspaceRoot: z.string(),
  /** If true, allows the tool to access paths outside the workspace root. Defaults to false. */
  allowOutsideWorkspace: z.boolean().optional(),
});
export type ToolExecuteOptions = z.infer<typeof BaseContextSchema>;

// --- Path Validation Utility ---

export interface PathValidationError {
  error: string;
  suggestion: string;
}

/**
 * Resolves a relative path against the workspace root and validates it.
 * By default, prevents resolving paths outside the workspace root.
 *
 * @returns The resolved absolute path, or a PathValidationError describing why it was rejected.
 */
export function validateAndResolvePath(
  relativePathInput: string,
  workspaceRoot: string,
  allowOutsideRoot = false,
): string | PathValidationError {
  if (!relativePathInput || relativePathInput.trim() === '') {
    return {
      error: 'Path validation failed: Input path cannot be empty.',
      suggestion: 'Provide a valid relative path.',
    };
  }

  if (!allowOutsideRoot && path.isAbsolute(relativePathInput)) {
    return {
      error: `Path validation failed: Absolute paths are not allowed. Path: '${relativePathInput}'`,
      suggestion: 'Provide a path relative to the workspace root.',
    };
  }

  const resolvedPath = path.resolve(workspaceRoot, relativePathInput);
  const relativeToRoot = path.relative(workspaceRoot, resolvedPath);

  if (!allowOutsideRoot && (relativeToRoot.startsWith('..') || path.isAbsolute(relativeToRoot))) {
    return {
      error: `Path validation failed: Path must resolve within the workspace root ('${workspaceRoot}'). Relative Path: '${relativeToRoot}'`,
      suggestion: `Ensure the path '${relativePathInput}' is relative to the workspace root and does not attempt to go outside it.`,
    };
  }

  return resolvedPath;
}

/**
 * Formats zod field errors as `field: message, message; field: message`.
 */
export function formatFieldErrors(error: z.ZodError): string {
  const { formErrors, fieldErrors } = error.flatten();
  const entries = Object.entries(fieldErrors).map(
    ([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`,
  );
  return [...formErrors, ...entries].join('; ');
}

// --- Part Helper Functions ---

export function textPart(value: string): TextPart {
  return { type: 'text', value };
}

export function jsonPart<T extends ZodTypeAny>(value: z.infer<T>, schema: T): JsonPart<T> {
  return { type: 'json', value, schema };
}

export * from './defineTool.js';
export * from './typeGuards.js';
export * from './logger.js';
