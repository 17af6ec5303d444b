import * as z from 'zod';
import type { ToolResponse } from '../../../types/common.ts';
import { createErrorResponse, createTextResponse } from '../../../utils/responses/index.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  getDefaultDebuggerToolContext,
  type DebuggerToolContext,
} from '../../../utils/debugger/index.ts';

const stackDetachSchema = z.object({
  debugSessionId: z
    .string()
    .optional()
    .describe('Debug session ID to detach (defaults to current session)'),
});

export type StackDetachParams = z.infer<typeof stackDetachSchema>;

export async function stack_detachLogic(
  params: StackDetachParams,
  ctx: DebuggerToolContext,
): Promise<ToolResponse> {
  try {
    const targetId = params.debugSessionId ?? ctx.debugger.getCurrentSessionId();
    await ctx.debugger.detachSession(params.debugSessionId);

    return createTextResponse(`✅ Detached debugger session${targetId ? ` ${targetId}` : ''}.`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createErrorResponse('Failed to detach debugger', message);
  }
}

export default {
  name: 'stack_detach',
  description: 'Detach the current debugger session or a specific debugSessionId.',
  schema: stackDetachSchema.shape,
  handler: createTypedToolWithContext<StackDetachParams, DebuggerToolContext>(
    stackDetachSchema,
    stack_detachLogic,
    getDefaultDebuggerToolContext,
  ),
};
