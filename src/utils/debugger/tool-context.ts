import type { DebuggerManager } from './debugger-manager.ts';
import { getDefaultDebuggerManager } from './index.ts';

export type DebuggerToolContext = {
  debugger: DebuggerManager;
};

export function getDefaultDebuggerToolContext(): DebuggerToolContext {
  return {
    debugger: getDefaultDebuggerManager(),
  };
}
