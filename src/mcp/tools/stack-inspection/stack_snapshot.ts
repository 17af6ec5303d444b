import * as z from 'zod';
import type { ToolResponse } from '../../../types/common.ts';
import { createErrorResponse, createTextResponse } from '../../../utils/responses/index.ts';
import { nullifyEmptyStrings } from '../../../utils/schema-helpers.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  getDefaultDebuggerToolContext,
  type DebuggerToolContext,
  type ThreadBacktrace,
} from '../../../utils/debugger/index.ts';
import { enumerationOptionsShape } from './enumeration-options.ts';

const baseSchemaObject = z.object({
  debugSessionId: z
    .string()
    .optional()
    .describe('Debug session ID to target (defaults to current session)'),
  ...enumerationOptionsShape,
});

const stackSnapshotSchema = z.preprocess(nullifyEmptyStrings, baseSchemaObject);

export type StackSnapshotParams = z.infer<typeof stackSnapshotSchema>;

export function renderSnapshot(snapshot: ThreadBacktrace[]): string {
  return snapshot
    .map(({ threadId, frames }) =>
      [
        `Thread ${threadId}`,
        ...frames.map((frame, index) => `${index}) ${frame.source}:${frame.linenum}`),
      ].join('\n'),
    )
    .join('\n\n');
}

export async function stack_snapshotLogic(
  params: StackSnapshotParams,
  ctx: DebuggerToolContext,
): Promise<ToolResponse> {
  try {
    const { debugSessionId, ...overrides } = params;
    const snapshot = await ctx.debugger.collectSnapshot(debugSessionId, overrides);

    if (snapshot.length === 0) {
      return createTextResponse('No active threads found.');
    }
    return createTextResponse(renderSnapshot(snapshot));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createErrorResponse('Failed to collect stack snapshot', message);
  }
}

export default {
  name: 'stack_snapshot',
  description:
    'Collect the backtrace of every active thread (optionally per SIMD lane) and render it as source:line listings.',
  schema: baseSchemaObject.shape,
  handler: createTypedToolWithContext<StackSnapshotParams, DebuggerToolContext>(
    stackSnapshotSchema,
    stack_snapshotLogic,
    getDefaultDebuggerToolContext,
  ),
};
