import type { CommandChannel, DebuggerBackendKind, Frame, ThreadId } from '../types.ts';

export interface DebuggerBackend extends CommandChannel {
  readonly kind: DebuggerBackendKind;

  attach(opts: { pid: number }): Promise<void>;
  loadCore(opts: { corePath: string; executablePath?: string }): Promise<void>;
  detach(): Promise<void>;

  runCommand(command: string, opts?: { timeoutMs?: number }): Promise<string>;

  getBacktrace(threadId: ThreadId): Promise<Frame[]>;

  dispose(): Promise<void>;
}
