/**
 * Bridges the MCP SDK's untyped `Record<string, unknown>` tool arguments to
 * typed tool logic by parsing them with the tool's zod schema first.
 */

import * as z from 'zod';
import type { ToolResponse } from '../types/common.ts';
import { createErrorResponse } from './responses/index.ts';

export function createTypedToolWithContext<TParams, TContext>(
  schema: z.ZodType<TParams, unknown>,
  logicFunction: (params: TParams, context: TContext) => Promise<ToolResponse>,
  getContext: () => TContext,
): (args: Record<string, unknown>) => Promise<ToolResponse> {
  return async (args: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const validatedParams = schema.parse(args);
      return await logicFunction(validatedParams, getContext());
    } catch (error) {
      if (error instanceof z.ZodError) {
        const details = `Invalid parameters:\n${formatZodIssues(error)}`;
        return createErrorResponse('Parameter validation failed', details);
      }

      // Unexpected errors surface through the MCP framework.
      throw error;
    }
  };
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('\n');
}
