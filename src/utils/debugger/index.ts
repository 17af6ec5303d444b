import { DebuggerManager } from './debugger-manager.ts';

let defaultDebuggerManager: DebuggerManager | null = null;

export function getDefaultDebuggerManager(): DebuggerManager {
  defaultDebuggerManager ??= new DebuggerManager();
  return defaultDebuggerManager;
}

export { DebuggerManager } from './debugger-manager.ts';
export type { DebuggerBackendFactory, EnumerationOverrides } from './debugger-manager.ts';
export { getDefaultDebuggerToolContext } from './tool-context.ts';
export { collapseSignature, parseBacktraceFrame, parseBacktraceOutput } from './backtrace.ts';
export { expandSimdLanes, parseExecutionMask } from './simd-lanes.ts';
export { ThreadEnumerator, collectThreadIds, parseMaxThreads } from './thread-enumerator.ts';
export { validateFilterExpression } from './expression-filter.ts';
export { gdbOneApiDialect } from './dialect.ts';
export type { DebuggerDialect, ValidatedFilterExpression } from './dialect.ts';
export type {
  CommandChannel,
  DebugSessionInfo,
  DebugTarget,
  DebuggerBackendKind,
  EnumerationConfig,
  Frame,
  ThreadBacktrace,
  ThreadId,
} from './types.ts';
export type { DebuggerToolContext } from './tool-context.ts';
