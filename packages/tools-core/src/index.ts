import path from 'node:path';
// src/index.ts for @pagecut/tools-core
import { type ZodTypeAny, z } from 'zod';

export const TextPartSchema = z.object({ type: z.literal('text'), value: z.string() });
export type TextPart = z.infer<typeof TextPartSchema>;

// The schema field holds a Zod schema instance, which Zod cannot describe structurally
export const JsonPartSchema = z.object({
  type: z.literal('json'),
  value: z.unknown(),
  schema: z
    .custom<ZodTypeAny>((val) => val instanceof z.ZodType, {
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

/** Context every tool receives from the server it is registered with. */
export const BaseContextSchema = z.object({
  /** The absolute path to the workspace root directory. */
  workspaceRoot: z.string().min(1, 'workspaceRoot cannot be empty.'),
  /** If true, allows the tool to access paths outside the workspace root. Defaults to false. */
  allowOutsideWorkspace: z.boolean().optional(),
});

/** Options passed internally to the tool's execute function by the server */
export interface ToolExecuteOptions {
  allowOutsideWorkspace?: boolean;
  workspaceRoot: string;
}

// --- Path Validation Utility ---

export interface PathValidationError {
  error: string;
  suggestion: string;
}

/**
 * Resolves a path against the workspace root and validates it.
 * By default, prevents resolving paths outside the workspace root.
 *
 * @param relativePathInput The path input by the user/tool.
 * @param workspaceRoot The absolute path to the workspace root.
 * @param allowOutsideRoot If true, allows absolute paths and paths outside the workspace root.
 * @returns The resolved absolute path if valid, or a PathValidationError if invalid.
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

// --- Part Helper Functions ---

export function textPart(value: string): TextPart {
  return { type: 'text', value };
}

export function jsonPart<T extends ZodTypeAny>(value: z.infer<T>, schema: T): JsonPart<T> {
  return { type: 'json', value, schema };
}

export * from './defineTool.js';
export * from './typeGuards.js';
