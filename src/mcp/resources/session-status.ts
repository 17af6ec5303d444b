/**
 * Session Status Resource
 *
 * Read-only view of the open debug sessions.
 */

import { log } from '../../utils/logging/index.ts';
import { getSessionRuntimeStatusSnapshot } from '../../utils/session-status.ts';
import type { DebuggerManager } from '../../utils/debugger/index.ts';

export type ResourceContents = { contents: Array<{ text: string }> };

export async function sessionStatusResourceLogic(
  debuggerManager?: DebuggerManager,
): Promise<ResourceContents> {
  try {
    log('info', 'Processing session status resource request');
    const status = getSessionRuntimeStatusSnapshot(debuggerManager);

    return {
      contents: [
        {
          text: JSON.stringify(status, null, 2),
        },
      ],
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    log('error', `Error in session status resource handler: ${errorMessage}`);

    return {
      contents: [
        {
          text: `Error retrieving session status: ${errorMessage}`,
        },
      ],
    };
  }
}

export default {
  uri: 'lanetrace://session-status',
  name: 'session-status',
  description: 'Open debug sessions and their targets',
  mimeType: 'application/json',
  async handler(): Promise<ResourceContents> {
    return sessionStatusResourceLogic();
  },
};
