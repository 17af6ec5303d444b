import * as z from 'zod';
import type { ToolResponse } from '../../../types/common.ts';
import { createErrorResponse, createTextResponse } from '../../../utils/responses/index.ts';
import { nullifyEmptyStrings } from '../../../utils/schema-helpers.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  getDefaultDebuggerToolContext,
  type DebuggerToolContext,
} from '../../../utils/debugger/index.ts';
import { enumerationOptionsShape } from './enumeration-options.ts';

const baseSchemaObject = z.object({
  debugSessionId: z
    .string()
    .optional()
    .describe('Debug session ID to target (defaults to current session)'),
  ...enumerationOptionsShape,
});

const stackListThreadsSchema = z.preprocess(nullifyEmptyStrings, baseSchemaObject);

export type StackListThreadsParams = z.infer<typeof stackListThreadsSchema>;

export async function stack_list_threadsLogic(
  params: StackListThreadsParams,
  ctx: DebuggerToolContext,
): Promise<ToolResponse> {
  try {
    const { debugSessionId, ...overrides } = params;
    const threadIds = await ctx.debugger.listThreads(debugSessionId, overrides);

    if (threadIds.length === 0) {
      return createTextResponse('No active threads found.');
    }
    return createTextResponse(`Found ${threadIds.length} thread(s):\n${threadIds.join('\n')}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createErrorResponse('Failed to list threads', message);
  }
}

export default {
  name: 'stack_list_threads',
  description:
    'List active CPU and GPU thread ids of the debug session, optionally per SIMD lane or filtered by an expression.',
  schema: baseSchemaObject.shape,
  handler: createTypedToolWithContext<StackListThreadsParams, DebuggerToolContext>(
    stackListThreadsSchema,
    stack_list_threadsLogic,
    getDefaultDebuggerToolContext,
  ),
};
