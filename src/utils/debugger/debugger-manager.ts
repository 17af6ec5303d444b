import { v4 as uuidv4 } from 'uuid';
import { getEnumerationConfigFromEnv, getGdbCommand } from '../environment.ts';
import { log } from '../logging/index.ts';
import type { DebuggerBackend } from './backends/DebuggerBackend.ts';
import { createGdbCliBackend } from './backends/gdb-cli-backend.ts';
import { gdbOneApiDialect, type DebuggerDialect } from './dialect.ts';
import { ThreadEnumerator } from './thread-enumerator.ts';
import type {
  DebugSessionInfo,
  DebugTarget,
  DebuggerBackendKind,
  EnumerationConfig,
  Frame,
  ThreadBacktrace,
  ThreadId,
} from './types.ts';

export type DebuggerBackendFactory = (kind: DebuggerBackendKind) => Promise<DebuggerBackend>;

export type EnumerationOverrides = Partial<EnumerationConfig>;

type Session = { info: DebugSessionInfo; backend: DebuggerBackend; enumerator: ThreadEnumerator };

export class DebuggerManager {
  private readonly backendFactory: DebuggerBackendFactory;
  private readonly dialect: DebuggerDialect;
  private readonly configProvider: () => EnumerationConfig;
  private readonly sessions = new Map<string, Session>();
  private currentSessionId: string | null = null;

  constructor(
    options: {
      backendFactory?: DebuggerBackendFactory;
      dialect?: DebuggerDialect;
      configProvider?: () => EnumerationConfig;
    } = {},
  ) {
    this.dialect = options.dialect ?? gdbOneApiDialect;
    this.backendFactory =
      options.backendFactory ??
      (async () => createGdbCliBackend(undefined, { command: getGdbCommand(), dialect: this.dialect }));
    this.configProvider = options.configProvider ?? (() => getEnumerationConfigFromEnv());
  }

  async createSession(opts: { target: DebugTarget }): Promise<DebugSessionInfo> {
    const backendKind: DebuggerBackendKind = 'gdb-cli';
    const backend = await this.backendFactory(backendKind);

    try {
      if (opts.target.kind === 'process') {
        await backend.attach({ pid: opts.target.pid });
      } else {
        await backend.loadCore({
          corePath: opts.target.corePath,
          executablePath: opts.target.executablePath,
        });
      }
    } catch (error) {
      try {
        await backend.dispose();
      } catch (disposeError) {
        log('debug', `Dispose after failed session start also failed: ${String(disposeError)}`);
      }
      throw error;
    }

    const now = Date.now();
    const info: DebugSessionInfo = {
      id: uuidv4(),
      backend: backendKind,
      target: opts.target,
      createdAt: now,
      lastUsedAt: now,
    };

    const enumerator = new ThreadEnumerator(backend, { dialect: this.dialect });
    this.sessions.set(info.id, { info, backend, enumerator });
    return info;
  }

  getSession(id?: string): Session | null {
    const resolvedId = id ?? this.currentSessionId;
    if (!resolvedId) return null;
    return this.sessions.get(resolvedId) ?? null;
  }

  setCurrentSession(id: string): void {
    if (!this.sessions.has(id)) {
      throw new Error(`Debug session not found: ${id}`);
    }
    this.currentSessionId = id;
  }

  getCurrentSessionId(): string | null {
    return this.currentSessionId;
  }

  listSessions(): DebugSessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => ({ ...session.info }));
  }

  async detachSession(id?: string): Promise<void> {
    const session = this.requireSession(id);
    try {
      if (session.info.target.kind === 'process') {
        await session.backend.detach();
      }
    } finally {
      await session.backend.dispose();
      this.sessions.delete(session.info.id);
      if (this.currentSessionId === session.info.id) {
        this.currentSessionId = null;
      }
    }
  }

  async disposeAll(): Promise<void> {
    await Promise.allSettled(
      Array.from(this.sessions.values()).map(async (session) => {
        try {
          if (session.info.target.kind === 'process') {
            await session.backend.detach();
          }
        } catch (error) {
          log('debug', `Detach during shutdown failed for ${session.info.id}: ${String(error)}`);
        } finally {
          await session.backend.dispose();
        }
      }),
    );
    this.sessions.clear();
    this.currentSessionId = null;
  }

  /** Environment config, with any defined override taking precedence. */
  resolveEnumerationConfig(overrides: EnumerationOverrides = {}): EnumerationConfig {
    const config: EnumerationConfig = { ...this.configProvider() };
    if (overrides.collectLanes !== undefined) config.collectLanes = overrides.collectLanes;
    if (overrides.filterExpression !== undefined) {
      config.filterExpression = overrides.filterExpression;
    }
    if (overrides.maxThreads !== undefined) config.maxThreads = overrides.maxThreads;
    if (overrides.mode !== undefined) config.mode = overrides.mode;
    return config;
  }

  async listThreads(id: string | undefined, overrides?: EnumerationOverrides): Promise<ThreadId[]> {
    const session = this.requireSession(id);
    const result = await session.enumerator.discover(this.resolveEnumerationConfig(overrides));
    this.touch(session.info.id);
    return result;
  }

  async getBacktrace(id: string | undefined, threadId: ThreadId): Promise<Frame[]> {
    const session = this.requireSession(id);
    const result = await session.backend.getBacktrace(threadId);
    this.touch(session.info.id);
    return result;
  }

  /** Every thread's backtrace, threads in natural id order. */
  async collectSnapshot(
    id: string | undefined,
    overrides?: EnumerationOverrides,
  ): Promise<ThreadBacktrace[]> {
    const threadIds = await this.listThreads(id, overrides);
    const sorted = [...threadIds].sort((a, b) => a.localeCompare(b, 'en', { numeric: true }));

    const snapshot: ThreadBacktrace[] = [];
    for (const threadId of sorted) {
      snapshot.push({ threadId, frames: await this.getBacktrace(id, threadId) });
    }
    return snapshot;
  }

  private requireSession(id?: string): Session {
    const session = this.getSession(id);
    if (!session) {
      throw new Error('No active debug session. Provide debugSessionId or attach first.');
    }
    return session;
  }

  private touch(id: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.info.lastUsedAt = Date.now();
  }
}
