import type { ToolResponse } from '../../types/common.ts';

/**
 * Creates a plain text tool response.
 */
export function createTextResponse(text: string, isError = false): ToolResponse {
  return {
    content: [{ type: 'text', text }],
    isError,
  };
}

/**
 * Creates an error tool response with a title line and optional details.
 */
export function createErrorResponse(message: string, details?: string): ToolResponse {
  const detailText = details ? `\nDetails: ${details}` : '';
  return {
    content: [{ type: 'text', text: `Error: ${message}${detailText}` }],
    isError: true,
  };
}
