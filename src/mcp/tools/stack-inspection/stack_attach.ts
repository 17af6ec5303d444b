import * as z from 'zod';
import type { ToolResponse } from '../../../types/common.ts';
import { log } from '../../../utils/logging/index.ts';
import { createErrorResponse, createTextResponse } from '../../../utils/responses/index.ts';
import { nullifyEmptyStrings } from '../../../utils/schema-helpers.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  getDefaultDebuggerToolContext,
  type DebugTarget,
  type DebuggerToolContext,
} from '../../../utils/debugger/index.ts';

const baseSchemaObject = z.object({
  pid: z.number().int().positive().optional().describe('Process ID to attach to'),
  corePath: z
    .string()
    .optional()
    .describe('Core dump to open instead of a live process. Provide EITHER this OR pid'),
  executablePath: z
    .string()
    .optional()
    .describe('Executable that produced the core dump (only with corePath)'),
  makeCurrent: z
    .boolean()
    .optional()
    .default(true)
    .describe('Set this debug session as the current session (default: true)'),
});

const stackAttachSchema = z.preprocess(
  nullifyEmptyStrings,
  baseSchemaObject
    .refine((val) => (val.pid === undefined) !== (val.corePath === undefined), {
      message: 'Provide exactly one of pid or corePath',
    })
    .refine((val) => val.executablePath === undefined || val.corePath !== undefined, {
      message: 'executablePath is only used together with corePath',
      path: ['executablePath'],
    }),
);

export type StackAttachParams = z.infer<typeof stackAttachSchema>;

function resolveTarget(params: StackAttachParams): DebugTarget | null {
  if (params.pid !== undefined) {
    return { kind: 'process', pid: params.pid };
  }
  if (params.corePath !== undefined) {
    return { kind: 'core', corePath: params.corePath, executablePath: params.executablePath };
  }
  return null;
}

function describeTarget(target: DebugTarget): string {
  return target.kind === 'process' ? `process ${target.pid}` : `core dump ${target.corePath}`;
}

export async function stack_attachLogic(
  params: StackAttachParams,
  ctx: DebuggerToolContext,
): Promise<ToolResponse> {
  const target = resolveTarget(params);
  if (!target) {
    return createErrorResponse('Missing target', 'Provide exactly one of pid or corePath');
  }

  try {
    const session = await ctx.debugger.createSession({ target });

    const isCurrent = params.makeCurrent ?? true;
    if (isCurrent) {
      ctx.debugger.setCurrentSession(session.id);
    }

    const currentText = isCurrent
      ? 'This session is now the current debug session.'
      : 'This session is not set as the current session.';

    return createTextResponse(
      `✅ Attached gdb to ${describeTarget(target)}.\n\n` +
        `Debug session ID: ${session.id}\n` +
        `${currentText}\n\n` +
        `Next steps:\n` +
        `1. stack_list_threads({ debugSessionId: "${session.id}" })\n` +
        `2. stack_snapshot({ debugSessionId: "${session.id}", collectLanes: true })`,
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log('error', `Failed to attach gdb: ${message}`);
    return createErrorResponse('Failed to attach debugger', message);
  }
}

export default {
  name: 'stack_attach',
  description:
    'Start gdb and attach it to a running process (pid) or open a core dump (corePath).',
  schema: baseSchemaObject.shape,
  handler: createTypedToolWithContext<StackAttachParams, DebuggerToolContext>(
    stackAttachSchema,
    stack_attachLogic,
    getDefaultDebuggerToolContext,
  ),
};
