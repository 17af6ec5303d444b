export type DebuggerBackendKind = 'gdb-cli';

export type DebugTarget =
  | { kind: 'process'; pid: number }
  | { kind: 'core'; corePath: string; executablePath?: string };

export interface DebugSessionInfo {
  id: string;
  backend: DebuggerBackendKind;
  target: DebugTarget;
  createdAt: number;
  lastUsedAt: number;
}

export type ThreadState = 'stopped' | 'running' | 'unavailable';

/** One entry of an MI `-thread-info` payload, after decoding. */
export interface ThreadRecord {
  id: number;
  targetId: string;
  name: string;
  state: ThreadState;
  simdWidth?: number;
  executionMask?: string;
}

/** `"<process>.<thread>"`, a plain numeric id, or `"<process>.<thread>:<lane>"`. */
export type ThreadId = string;

export interface Frame {
  function: string;
  source: string;
  linenum: number;
  error: boolean;
}

export type ThreadEnumerationMode = 'mi' | 'console';

export interface EnumerationConfig {
  filterExpression?: string;
  /** Raw value; anything that is not a positive integer is ignored with a warning. */
  maxThreads?: string | number;
  collectLanes: boolean;
  mode?: ThreadEnumerationMode;
}

export interface ThreadBacktrace {
  threadId: ThreadId;
  frames: Frame[];
}

/** Sends one line to the debugger and resolves with the response lines. */
export interface CommandChannel {
  send(command: string): Promise<string[]>;
}
