/**
 * Tool Responses
 *
 * Every tool answers with a single text block: pretty-printed JSON for
 * structured results, the raw string for Markdown.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';

export type ToolResponse = CallToolResult;

/**
 * Tool arguments failed validation
 */
export class ToolArgumentError extends Error {
  constructor(
    public readonly tool: string,
    public readonly issues: string[]
  ) {
    super(`Invalid arguments for ${tool}: ${issues.join('; ')}`);
    this.name = 'ToolArgumentError';
  }
}

export function jsonResponse(value: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

export function textResponse(text: string): ToolResponse {
  return {
    content: [{ type: 'text', text }],
  };
}

export function errorResponse(error: unknown): ToolResponse {
  return {
    content: [{
      type: 'text',
      text: `Error: ${error instanceof Error ? error.message : String(error)}`,
    }],
    isError: true,
  };
}

/**
 * Validate raw tool arguments against a zod schema.
 *
 * @throws ToolArgumentError listing each offending field
 */
export function parseArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ToolArgumentError(tool, issues);
  }
  return parsed.data;
}
