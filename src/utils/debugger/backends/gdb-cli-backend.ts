import type { InteractiveProcess, InteractiveSpawner } from '../../execution/index.ts';
import { getDefaultInteractiveSpawner } from '../../execution/index.ts';
import { log } from '../../logging/index.ts';
import { parseBacktraceOutput } from '../backtrace.ts';
import { gdbOneApiDialect, type DebuggerDialect } from '../dialect.ts';
import type { Frame, ThreadId } from '../types.ts';
import type { DebuggerBackend } from './DebuggerBackend.ts';

const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
const GDB_PROMPT = '(lanetrace-gdb) ';
const COMMAND_SENTINEL = '__LANETRACE_DONE__';
const COMMAND_SENTINEL_REGEX = new RegExp(`(^|\\r?\\n)${COMMAND_SENTINEL}(\\r?\\n)`);
const DEVICE_SERVER_FAILURE = /^intelgt:\s*(\S*)\s*failed to start\./;
const ATTACH_FAILURE = /^ptrace:|No such process|^Can't attach/;
const GDB_ERROR_LINE = /^(?:error:|.*No such file or directory|.*is not a core dump)/i;
// gdb prints its prompt before the echo output, so the sentinel opens with a newline.
const SENTINEL_COMMAND = `echo \\n${COMMAND_SENTINEL}\\n\n`;

export interface GdbCliBackendOptions {
  command?: string;
  dialect?: DebuggerDialect;
}

class GdbCliBackend implements DebuggerBackend {
  readonly kind = 'gdb-cli' as const;

  private readonly spawner: InteractiveSpawner;
  private readonly dialect: DebuggerDialect;
  private readonly prompt = GDB_PROMPT;
  private readonly process: InteractiveProcess;
  private buffer = '';
  private pending: {
    resolve: (output: string) => void;
    reject: (error: Error) => void;
    timeout: NodeJS.Timeout;
  } | null = null;
  // Sentinels of timed-out commands; their late output is discarded.
  private abandonedSentinels = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private ready: Promise<void>;
  private disposed = false;

  constructor(spawner: InteractiveSpawner, opts: GdbCliBackendOptions = {}) {
    this.spawner = spawner;
    this.dialect = opts.dialect ?? gdbOneApiDialect;
    const gdbCommand = [
      opts.command ?? 'gdb-oneapi',
      '-q',
      '-nx',
      '-ex',
      `set prompt ${this.prompt}`,
      '-ex',
      'set pagination off',
      '-ex',
      'set width 0',
      '-ex',
      'set confirm off',
    ];

    this.process = this.spawner(gdbCommand);

    this.process.process.stdout?.on('data', (data: Buffer) => this.handleData(data));
    this.process.process.stderr?.on('data', (data: Buffer) => this.handleData(data));
    this.process.process.on('error', (error: Error) => {
      this.failPending(new Error(`Failed to start gdb: ${error.message}`));
    });
    this.process.process.on('exit', (code, signal) => {
      const detail = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
      this.failPending(new Error(`gdb process exited (${detail})`));
    });

    this.ready = this.initialize();
  }

  private async initialize(): Promise<void> {
    this.process.write(SENTINEL_COMMAND);
    await this.waitForSentinel(DEFAULT_STARTUP_TIMEOUT_MS);
  }

  async waitUntilReady(): Promise<void> {
    await this.ready;
  }

  async attach(opts: { pid: number }): Promise<void> {
    log('info', `gdb attach to PID ${opts.pid}`);
    const lines = await this.send(`attach ${opts.pid}`);

    for (const line of lines) {
      const match = DEVICE_SERVER_FAILURE.exec(line);
      if (match) {
        log(
          'error',
          `${match[1]} initialization failed for process ${opts.pid}. ` +
            'Device backtraces will not be available.',
        );
      }
    }

    const failure = lines.find((line) => ATTACH_FAILURE.test(line));
    if (failure) {
      throw new Error(`gdb attach failed: ${failure.trim()}`);
    }
  }

  async loadCore(opts: { corePath: string; executablePath?: string }): Promise<void> {
    if (opts.executablePath) {
      const output = await this.runCommand(`file ${opts.executablePath}`);
      assertNoGdbError('file', output);
    }
    log('info', `gdb open core ${opts.corePath}`);
    const output = await this.runCommand(`target core ${opts.corePath}`);
    assertNoGdbError('target core', output);
  }

  async detach(): Promise<void> {
    const output = await this.runCommand('detach');
    assertNoGdbError('detach', output);
  }

  async runCommand(command: string, opts?: { timeoutMs?: number }): Promise<string> {
    return this.enqueue(async () => {
      if (this.disposed) {
        throw new Error('gdb backend disposed');
      }
      await this.ready;
      this.process.write(`${command}\n`);
      this.process.write(SENTINEL_COMMAND);
      const output = await this.waitForSentinel(opts?.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS);
      return sanitizeOutput(output, this.prompt).trimEnd();
    });
  }

  async send(command: string): Promise<string[]> {
    const output = await this.runCommand(command);
    return output ? output.split('\n') : [];
  }

  async getBacktrace(threadId: ThreadId): Promise<Frame[]> {
    log('info', `gdb thread bt ID ${threadId}`);
    const lines = await this.send(this.dialect.buildBacktraceCommand(threadId));
    return parseBacktraceOutput(lines);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.failPending(new Error('gdb backend disposed'));
    this.process.dispose();
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const next = this.queue.then(work, work);
    this.queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private handleData(data: Buffer): void {
    this.buffer += data.toString('utf8');
    this.checkPending();
  }

  private waitForSentinel(timeoutMs: number): Promise<string> {
    if (this.pending) {
      return Promise.reject(new Error('gdb command already pending'));
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending = null;
        this.abandonedSentinels += 1;
        reject(new Error(`gdb command timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending = { resolve, reject, timeout };
      this.checkPending();
    });
  }

  private checkPending(): void {
    for (;;) {
      if (!this.pending && this.abandonedSentinels === 0) return;
      const sentinelMatch = this.buffer.match(COMMAND_SENTINEL_REGEX);
      const sentinelIndex = sentinelMatch?.index;
      const sentinelLength = sentinelMatch?.[0].length;
      if (sentinelIndex == null || sentinelLength == null) return;

      const output = this.buffer.slice(0, sentinelIndex);
      this.buffer = this.buffer.slice(sentinelIndex + sentinelLength);

      if (this.abandonedSentinels > 0) {
        this.abandonedSentinels -= 1;
        log('debug', `Discarding late gdb output: ${sanitizeOutput(output, this.prompt)}`);
        continue;
      }

      if (!this.pending) return;
      const { resolve, timeout } = this.pending;
      this.pending = null;
      clearTimeout(timeout);
      resolve(output);
      return;
    }
  }

  private failPending(error: Error): void {
    if (!this.pending) return;
    const { reject, timeout } = this.pending;
    this.pending = null;
    clearTimeout(timeout);
    reject(error);
  }
}

function assertNoGdbError(context: string, output: string): void {
  const failure = output.split('\n').find((line) => GDB_ERROR_LINE.test(line));
  if (failure) {
    throw new Error(`gdb ${context} failed: ${failure.trim()}`);
  }
}

function sanitizeOutput(output: string, prompt: string): string {
  const promptText = prompt.trimEnd();
  const lines = output.split(/\r?\n/).map((line) => {
    let stripped = line;
    while (stripped.startsWith(promptText)) {
      stripped = stripped.slice(promptText.length).trimStart();
    }
    return stripped;
  });
  return lines.filter((line) => line && !line.includes(COMMAND_SENTINEL)).join('\n');
}

export async function createGdbCliBackend(
  spawner: InteractiveSpawner = getDefaultInteractiveSpawner(),
  opts: GdbCliBackendOptions = {},
): Promise<DebuggerBackend> {
  const backend = new GdbCliBackend(spawner, opts);
  try {
    await backend.waitUntilReady();
  } catch (error) {
    try {
      await backend.dispose();
    } catch (disposeError) {
      log('debug', `gdb backend cleanup after failed startup: ${String(disposeError)}`);
    }
    throw error;
  }
  return backend;
}
