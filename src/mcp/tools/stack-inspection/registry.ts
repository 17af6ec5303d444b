import type { ToolResponse } from '../../../types/common.ts';
import type * as z from 'zod';
import stackAttach from './stack_attach.ts';
import stackBacktrace from './stack_backtrace.ts';
import stackDetach from './stack_detach.ts';
import stackListThreads from './stack_list_threads.ts';
import stackSnapshot from './stack_snapshot.ts';

export interface ToolDefinition {
  name: string;
  description: string;
  schema: Record<string, z.ZodType>;
  handler: (args: Record<string, unknown>) => Promise<ToolResponse>;
}

export const stackInspectionTools: ToolDefinition[] = [
  stackAttach,
  stackListThreads,
  stackBacktrace,
  stackSnapshot,
  stackDetach,
];
