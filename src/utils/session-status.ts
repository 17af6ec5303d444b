import { getDefaultDebuggerManager, type DebuggerManager } from './debugger/index.ts';
import type { DebugSessionInfo } from './debugger/types.ts';

export type SessionRuntimeStatusSnapshot = {
  debug: {
    currentSessionId: string | null;
    sessions: DebugSessionInfo[];
  };
};

export function getSessionRuntimeStatusSnapshot(
  debuggerManager: DebuggerManager = getDefaultDebuggerManager(),
): SessionRuntimeStatusSnapshot {
  const sessions = debuggerManager.listSessions().sort((a, b) => a.id.localeCompare(b.id));

  return {
    debug: {
      currentSessionId: debuggerManager.getCurrentSessionId(),
      sessions,
    },
  };
}
