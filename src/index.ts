#!/usr/bin/env node

/**
 * LaneTrace MCP - entry point.
 *
 * Starts the stdio MCP server and makes sure every gdb child is detached and
 * disposed when the host stops us.
 */

import process from 'node:process';
import { createServer, startServer } from './server/server.ts';
import { getDefaultDebuggerManager } from './utils/debugger/index.ts';
import { log } from './utils/logging/index.ts';
import { version } from './version.ts';

async function main(): Promise<void> {
  try {
    const server = createServer();
    await startServer(server);

    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      log('info', `Received ${signal}, detaching debug sessions`);
      await getDefaultDebuggerManager().disposeAll();
      await server.close();
      process.exit(0);
    };

    process.on('SIGTERM', (signal) => {
      void shutdown(signal);
    });
    process.on('SIGINT', (signal) => {
      void shutdown(signal);
    });

    log('info', `LaneTrace MCP server (version ${version}) started successfully`);
  } catch (error) {
    console.error('Fatal error in main():', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unhandled exception:', error);
  process.exit(1);
});
