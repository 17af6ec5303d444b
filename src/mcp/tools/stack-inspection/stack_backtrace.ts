import * as z from 'zod';
import type { ToolResponse } from '../../../types/common.ts';
import { createErrorResponse, createTextResponse } from '../../../utils/responses/index.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  gdbOneApiDialect,
  getDefaultDebuggerToolContext,
  type DebuggerToolContext,
} from '../../../utils/debugger/index.ts';

const stackBacktraceSchema = z.object({
  debugSessionId: z
    .string()
    .optional()
    .describe('Debug session ID to target (defaults to current session)'),
  threadId: z
    .string()
    .trim()
    .regex(gdbOneApiDialect.threadIdPattern, 'Expected a thread id such as 1, 3.2 or 3.2:0')
    .describe('Thread id as reported by stack_list_threads'),
});

export type StackBacktraceParams = z.infer<typeof stackBacktraceSchema>;

export async function stack_backtraceLogic(
  params: StackBacktraceParams,
  ctx: DebuggerToolContext,
): Promise<ToolResponse> {
  try {
    const frames = await ctx.debugger.getBacktrace(params.debugSessionId, params.threadId);
    if (frames.length === 0) {
      return createTextResponse(`No backtrace frames for thread ${params.threadId}.`);
    }
    return createTextResponse(JSON.stringify(frames, null, 2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createErrorResponse('Failed to get backtrace', message);
  }
}

export default {
  name: 'stack_backtrace',
  description: 'Return the parsed backtrace frames of one thread as JSON.',
  schema: stackBacktraceSchema.shape,
  handler: createTypedToolWithContext<StackBacktraceParams, DebuggerToolContext>(
    stackBacktraceSchema,
    stack_backtraceLogic,
    getDefaultDebuggerToolContext,
  ),
};
