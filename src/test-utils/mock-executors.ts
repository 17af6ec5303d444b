/**
 * Test doubles for the debugger process boundary.
 *
 * Nothing in here spawns a real process. `createMockInteractiveSpawner` gives
 * full control over the fake child's streams; `createMockGdbSpawner` builds on
 * it to answer each command line with canned output followed by the sentinel
 * the CLI backend waits for. `createScriptedChannel` skips the process layer
 * entirely for code that only needs a CommandChannel.
 */

import type { ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { InteractiveProcess, InteractiveSpawner } from '../utils/execution/index.ts';
import type { CommandChannel } from '../utils/debugger/types.ts';

const GDB_PROMPT = '(lanetrace-gdb) ';
const SENTINEL = '__LANETRACE_DONE__';

export type MockInteractiveSession = {
  stdout: PassThrough;
  stderr: PassThrough;
  stdin: PassThrough;
  emitExit: (code?: number | null, signal?: NodeJS.Signals | null) => void;
  emitError: (error: Error) => void;
};

export type MockInteractiveSpawnerScript = {
  onSpawn?: (session: MockInteractiveSession, command: string[]) => void;
  onWrite?: (data: string, session: MockInteractiveSession) => void;
  onKill?: (signal: NodeJS.Signals | undefined, session: MockInteractiveSession) => void;
  onDispose?: (session: MockInteractiveSession) => void;
};

export function createMockInteractiveSpawner(
  script: MockInteractiveSpawnerScript = {},
): InteractiveSpawner {
  return (command: string[]): InteractiveProcess => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const stdin = new PassThrough();
    const emitter = new EventEmitter();
    const mockProcess = emitter as unknown as ChildProcess;
    const mutableProcess = mockProcess as unknown as {
      stdout: PassThrough | null;
      stderr: PassThrough | null;
      stdin: PassThrough | null;
      killed: boolean;
      exitCode: number | null;
      signalCode: NodeJS.Signals | null;
      spawnargs: string[];
      spawnfile: string;
      pid: number;
    };

    mutableProcess.stdout = stdout;
    mutableProcess.stderr = stderr;
    mutableProcess.stdin = stdin;
    mutableProcess.killed = false;
    mutableProcess.exitCode = null;
    mutableProcess.signalCode = null;
    mutableProcess.spawnargs = command;
    mutableProcess.spawnfile = command[0] ?? 'mock';
    mutableProcess.pid = 12345;

    const session: MockInteractiveSession = {
      stdout,
      stderr,
      stdin,
      emitExit: (code = 0, signal = null) => {
        emitter.emit('exit', code, signal);
      },
      emitError: (error) => {
        emitter.emit('error', error);
      },
    };

    script.onSpawn?.(session, command);

    let disposed = false;

    return {
      process: mockProcess,
      write(data: string): void {
        if (disposed) {
          throw new Error('Mock interactive process disposed');
        }
        script.onWrite?.(data, session);
      },
      kill(signal?: NodeJS.Signals): void {
        if (disposed) return;
        mutableProcess.killed = true;
        script.onKill?.(signal, session);
        emitter.emit('exit', 0, signal ?? null);
      },
      dispose(): void {
        if (disposed) return;
        disposed = true;
        script.onDispose?.(session);
        stdout.end();
        stderr.end();
        stdin.end();
        emitter.removeAllListeners();
      },
    };
  };
}

export type MockGdbResponder = (command: string) => string | undefined;

export type MockGdb = {
  spawner: InteractiveSpawner;
  /** Command lines written to the fake gdb, sentinel echoes excluded. */
  commands: string[];
  /** argv of every spawn. */
  spawned: string[][];
  disposed: () => number;
};

/**
 * Fake gdb that prints `responses[command]` (or the responder's answer, or
 * nothing) for each command, then the prompt and sentinel line.
 */
export function createMockGdbSpawner(
  responses: Record<string, string> | MockGdbResponder = {},
): MockGdb {
  const commands: string[] = [];
  const spawned: string[][] = [];
  let disposeCount = 0;
  let pending = '';

  const respond: MockGdbResponder =
    typeof responses === 'function' ? responses : (command) => responses[command];

  const spawner = createMockInteractiveSpawner({
    onSpawn: (_session, command) => {
      spawned.push(command);
    },
    onWrite: (data, session) => {
      if (data.startsWith('echo ') && data.includes(SENTINEL)) {
        session.stdout.write(`${pending}${GDB_PROMPT}\n${SENTINEL}\n`);
        pending = '';
        return;
      }
      const command = data.replace(/\n$/, '');
      commands.push(command);
      const output = respond(command);
      pending = output ? `${GDB_PROMPT}${output}\n` : GDB_PROMPT;
    },
    onDispose: () => {
      disposeCount += 1;
    },
  });

  return { spawner, commands, spawned, disposed: () => disposeCount };
}

export type ScriptedChannel = {
  channel: CommandChannel;
  sent: string[];
};

/**
 * CommandChannel answering from a fixed table. Unknown commands reject, so a
 * test fails loudly when code sends something it did not expect.
 */
export function createScriptedChannel(
  responses: Record<string, string[] | Error>,
): ScriptedChannel {
  const sent: string[] = [];
  const channel: CommandChannel = {
    async send(command: string): Promise<string[]> {
      sent.push(command);
      const response = responses[command];
      if (response === undefined) {
        throw new Error(`Unexpected debugger command: ${command}`);
      }
      if (response instanceof Error) {
        throw response;
      }
      return [...response];
    },
  };
  return { channel, sent };
}
