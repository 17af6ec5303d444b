import { describe, expect, it } from 'vitest';

import type { DebuggerBackend } from '../backends/DebuggerBackend.ts';
import { DebuggerManager } from '../debugger-manager.ts';
import { gdbOneApiDialect } from '../dialect.ts';
import type { EnumerationConfig, Frame } from '../types.ts';

function createBackend(overrides: Partial<DebuggerBackend> = {}): DebuggerBackend {
  const base: DebuggerBackend = {
    kind: 'gdb-cli',
    attach: async () => {},
    loadCore: async () => {},
    detach: async () => {},
    runCommand: async () => '',
    send: async () => [],
    getBacktrace: async () => [],
    dispose: async () => {},
  };

  return { ...base, ...overrides };
}

const consoleConfig = (): EnumerationConfig => ({ collectLanes: false, mode: 'console' });
const UNFILTERED = gdbOneApiDialect.buildEnumerationCommand();

describe('DebuggerManager', () => {
  it('attaches to a process and records the session', async () => {
    const attached: number[] = [];
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          attach: async ({ pid }) => {
            attached.push(pid);
          },
        }),
    });

    const info = await manager.createSession({ target: { kind: 'process', pid: 4242 } });

    expect(attached).toEqual([4242]);
    expect(info.backend).toBe('gdb-cli');
    expect(info.target).toEqual({ kind: 'process', pid: 4242 });
    expect(info.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(manager.listSessions().map((session) => session.id)).toEqual([info.id]);
    expect(manager.getCurrentSessionId()).toBeNull();
  });

  it('opens core dumps through loadCore', async () => {
    const loaded: Array<{ corePath: string; executablePath?: string }> = [];
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          attach: async () => {
            throw new Error('attach should not be used for core dumps');
          },
          loadCore: async (opts) => {
            loaded.push(opts);
          },
        }),
    });

    await manager.createSession({
      target: { kind: 'core', corePath: '/tmp/core.7', executablePath: '/opt/demo' },
    });

    expect(loaded).toEqual([{ corePath: '/tmp/core.7', executablePath: '/opt/demo' }]);
  });

  it('disposes the backend when attach fails without masking the error', async () => {
    let disposeCalled = false;
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          attach: async () => {
            throw new Error('attach failed');
          },
          dispose: async () => {
            disposeCalled = true;
            throw new Error('dispose failed');
          },
        }),
    });

    await expect(
      manager.createSession({ target: { kind: 'process', pid: 2000 } }),
    ).rejects.toThrow('attach failed');
    expect(disposeCalled).toBe(true);
    expect(manager.listSessions()).toEqual([]);
  });

  it('requires a session for thread and backtrace operations', async () => {
    const manager = new DebuggerManager({ backendFactory: async () => createBackend() });

    await expect(manager.listThreads(undefined)).rejects.toThrow(
      'No active debug session. Provide debugSessionId or attach first.',
    );
    await expect(manager.getBacktrace('missing', '1')).rejects.toThrow(
      'No active debug session. Provide debugSessionId or attach first.',
    );
    expect(() => manager.setCurrentSession('missing')).toThrow(
      'Debug session not found: missing',
    );
  });

  it('merges per-call overrides over the configured defaults', () => {
    const manager = new DebuggerManager({
      backendFactory: async () => createBackend(),
      configProvider: () => ({ collectLanes: true, maxThreads: '8', mode: 'mi' }),
    });

    expect(manager.resolveEnumerationConfig()).toEqual({
      collectLanes: true,
      maxThreads: '8',
      mode: 'mi',
    });
    expect(
      manager.resolveEnumerationConfig({
        collectLanes: false,
        mode: 'console',
        filterExpression: undefined,
      }),
    ).toEqual({ collectLanes: false, maxThreads: '8', mode: 'console' });
  });

  it('lists threads of the current session', async () => {
    const sent: string[] = [];
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          send: async (command) => {
            sent.push(command);
            return ['1.1', '1.2', '1.3'];
          },
        }),
      configProvider: consoleConfig,
    });

    const info = await manager.createSession({ target: { kind: 'process', pid: 10 } });
    manager.setCurrentSession(info.id);

    expect(await manager.listThreads(undefined, { maxThreads: 2 })).toEqual(['1.1', '1.2']);
    expect(sent).toEqual([UNFILTERED]);
  });

  it('collects a snapshot in natural thread order', async () => {
    const requested: string[] = [];
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          send: async () => ['1.10', '1.2', '1.1'],
          getBacktrace: async (threadId): Promise<Frame[]> => {
            requested.push(threadId);
            return [
              { function: `fn_${threadId}`, source: '/src/app.cpp', linenum: 5, error: false },
            ];
          },
        }),
      configProvider: consoleConfig,
    });

    const info = await manager.createSession({ target: { kind: 'process', pid: 11 } });
    const snapshot = await manager.collectSnapshot(info.id);

    expect(snapshot.map((entry) => entry.threadId)).toEqual(['1.1', '1.2', '1.10']);
    expect(requested).toEqual(['1.1', '1.2', '1.10']);
    expect(snapshot[2]?.frames).toEqual([
      { function: 'fn_1.10', source: '/src/app.cpp', linenum: 5, error: false },
    ]);
  });

  it('detaches live processes but not core dumps', async () => {
    const events: string[] = [];
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          detach: async () => {
            events.push('detach');
          },
          dispose: async () => {
            events.push('dispose');
          },
        }),
    });

    const live = await manager.createSession({ target: { kind: 'process', pid: 12 } });
    const core = await manager.createSession({ target: { kind: 'core', corePath: '/tmp/c' } });
    manager.setCurrentSession(live.id);

    await manager.detachSession();
    expect(events).toEqual(['detach', 'dispose']);
    expect(manager.getCurrentSessionId()).toBeNull();

    await manager.detachSession(core.id);
    expect(events).toEqual(['detach', 'dispose', 'dispose']);
    expect(manager.listSessions()).toEqual([]);
  });

  it('disposes every session even when a detach fails', async () => {
    let disposed = 0;
    const manager = new DebuggerManager({
      backendFactory: async () =>
        createBackend({
          detach: async () => {
            throw new Error('not attached');
          },
          dispose: async () => {
            disposed += 1;
          },
        }),
    });

    await manager.createSession({ target: { kind: 'process', pid: 20 } });
    await manager.createSession({ target: { kind: 'process', pid: 21 } });

    await manager.disposeAll();

    expect(disposed).toBe(2);
    expect(manager.listSessions()).toEqual([]);
  });
});
