import { spawn, type ChildProcess } from 'node:child_process';

export interface InteractiveProcess {
  readonly process: ChildProcess;
  write(data: string): void;
  kill(signal?: NodeJS.Signals): void;
  dispose(): void;
}

export interface SpawnInteractiveOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export type InteractiveSpawner = (
  command: string[],
  opts?: SpawnInteractiveOptions,
) => InteractiveProcess;

class DefaultInteractiveProcess implements InteractiveProcess {
  readonly process: ChildProcess;
  private disposed = false;

  constructor(process: ChildProcess) {
    this.process = process;
  }

  write(data: string): void {
    if (this.disposed) {
      throw new Error('Interactive process is disposed');
    }
    if (!this.process.stdin || this.process.stdin.destroyed) {
      throw new Error('Interactive process stdin is not available');
    }
    this.process.stdin.write(data);
  }

  kill(signal?: NodeJS.Signals): void {
    if (this.disposed) return;
    this.process.kill(signal);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.process.stdin?.end();
    this.process.stdout?.removeAllListeners();
    this.process.stderr?.removeAllListeners();
    this.process.removeAllListeners();
    if (this.process.exitCode === null && !this.process.killed) {
      this.process.kill();
    }
  }
}

function createInteractiveProcess(
  command: string[],
  opts?: SpawnInteractiveOptions,
): InteractiveProcess {
  const [executable, ...args] = command;
  if (!executable) {
    throw new Error('Cannot spawn an empty command');
  }

  const childProcess = spawn(executable, args, {
    stdio: ['pipe', 'pipe', 'pipe'],
    env: { ...process.env, ...(opts?.env ?? {}) },
    cwd: opts?.cwd,
  });

  return new DefaultInteractiveProcess(childProcess);
}

export function getDefaultInteractiveSpawner(): InteractiveSpawner {
  if (process.env.VITEST === 'true' || process.env.NODE_ENV === 'test') {
    throw new Error(
      'Refusing to spawn a real debugger process under test.\n' +
        'Inject a mock InteractiveSpawner (see test-utils/mock-executors.ts).',
    );
  }

  return createInteractiveProcess;
}
