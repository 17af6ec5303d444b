import { describe, expect, it, vi } from 'vitest';

vi.mock('../../../logging/index.ts', () => ({ log: vi.fn() }));

import { log } from '../../../logging/index.ts';
import {
  createMockGdbSpawner,
  createMockInteractiveSpawner,
} from '../../../../test-utils/mock-executors.ts';
import { createGdbCliBackend } from '../gdb-cli-backend.ts';

describe('gdb CLI backend', () => {
  it('starts gdb with a fixed prompt and no paging', async () => {
    const gdb = createMockGdbSpawner();
    const backend = await createGdbCliBackend(gdb.spawner, { command: 'gdb-test' });

    expect(gdb.spawned).toEqual([
      [
        'gdb-test',
        '-q',
        '-nx',
        '-ex',
        'set prompt (lanetrace-gdb) ',
        '-ex',
        'set pagination off',
        '-ex',
        'set width 0',
        '-ex',
        'set confirm off',
      ],
    ]);
    expect(gdb.commands).toEqual([]);

    await backend.dispose();
  });

  it('returns command output without prompts or the sentinel', async () => {
    const gdb = createMockGdbSpawner({ 'info inferiors': '  Num  Description\n* 1    process 4242' });
    const backend = await createGdbCliBackend(gdb.spawner);

    expect(await backend.runCommand('info inferiors')).toBe(
      'Num  Description\n* 1    process 4242',
    );
    expect(await backend.send('info inferiors')).toEqual([
      'Num  Description',
      '* 1    process 4242',
    ]);
    expect(await backend.send('echo')).toEqual([]);

    await backend.dispose();
  });

  it('serializes concurrent commands', async () => {
    const gdb = createMockGdbSpawner((command) => `out:${command}`);
    const backend = await createGdbCliBackend(gdb.spawner);

    const results = await Promise.all([
      backend.runCommand('first'),
      backend.runCommand('second'),
      backend.runCommand('third'),
    ]);

    expect(results).toEqual(['out:first', 'out:second', 'out:third']);
    expect(gdb.commands).toEqual(['first', 'second', 'third']);

    await backend.dispose();
  });

  it('attaches to a process', async () => {
    const gdb = createMockGdbSpawner({
      'attach 4242': 'Attaching to process 4242\nReading symbols from /opt/app/bin/demo...',
    });
    const backend = await createGdbCliBackend(gdb.spawner);

    await backend.attach({ pid: 4242 });

    expect(gdb.commands).toEqual(['attach 4242']);
    await backend.dispose();
  });

  it('fails attach on a ptrace error', async () => {
    const gdb = createMockGdbSpawner({
      'attach 4242': 'Attaching to process 4242\nptrace: Operation not permitted.',
    });
    const backend = await createGdbCliBackend(gdb.spawner);

    await expect(backend.attach({ pid: 4242 })).rejects.toThrow(
      'gdb attach failed: ptrace: Operation not permitted.',
    );
    await backend.dispose();
  });

  it('logs a device debug server that failed to start', async () => {
    const gdb = createMockGdbSpawner({
      'attach 77': 'Attaching to process 77\nintelgt: gdbserver-ze failed to start.',
    });
    const backend = await createGdbCliBackend(gdb.spawner);

    await backend.attach({ pid: 77 });

    expect(log).toHaveBeenCalledWith(
      'error',
      'gdbserver-ze initialization failed for process 77. Device backtraces will not be available.',
    );
    await backend.dispose();
  });

  it('loads a core dump with its executable', async () => {
    const gdb = createMockGdbSpawner({
      'file /opt/app/bin/demo': 'Reading symbols from /opt/app/bin/demo...',
      'target core /tmp/core.4242': 'Core was generated by `/opt/app/bin/demo\'.',
    });
    const backend = await createGdbCliBackend(gdb.spawner);

    await backend.loadCore({ corePath: '/tmp/core.4242', executablePath: '/opt/app/bin/demo' });

    expect(gdb.commands).toEqual(['file /opt/app/bin/demo', 'target core /tmp/core.4242']);
    await backend.dispose();
  });

  it('fails loadCore when gdb cannot read the core', async () => {
    const gdb = createMockGdbSpawner({
      'target core /tmp/missing.core': '/tmp/missing.core: No such file or directory.',
    });
    const backend = await createGdbCliBackend(gdb.spawner);

    await expect(backend.loadCore({ corePath: '/tmp/missing.core' })).rejects.toThrow(
      'gdb target core failed: /tmp/missing.core: No such file or directory.',
    );
    expect(gdb.commands).toEqual(['target core /tmp/missing.core']);
    await backend.dispose();
  });

  it('parses a thread backtrace', async () => {
    const gdb = createMockGdbSpawner({
      'thread apply 3.2:0 bt -frame-arguments none': [
        '',
        'Thread 3.2:0 (ZE 0.0.0.1 lane 0):',
        '#0  compute_kernel (i=...) at /src/kernel.cpp:17',
        '#1  0x00007ffff7a1b2c3 in launch () from /usr/lib/libze_loader.so.1',
      ].join('\n'),
    });
    const backend = await createGdbCliBackend(gdb.spawner);

    expect(await backend.getBacktrace('3.2:0')).toEqual([
      { function: 'compute_kernel', source: '/src/kernel.cpp', linenum: 17, error: false },
      { function: 'launch', source: '/usr/lib/libze_loader.so.1', linenum: 0, error: false },
    ]);
    await backend.dispose();
  });

  it('keeps replies aligned after a command times out', async () => {
    let current = '';
    let held = '';
    const spawner = createMockInteractiveSpawner({
      onWrite: (data, session) => {
        if (!data.startsWith('echo ')) {
          current = data.replace(/\n$/, '');
          return;
        }
        const output = current ? `(lanetrace-gdb) out:${current}\n` : '';
        const reply = `${output}(lanetrace-gdb) \n__LANETRACE_DONE__\n`;
        if (current === 'slow') {
          held = reply;
          return;
        }
        session.stdout.write(`${held}${reply}`);
        held = '';
      },
    });
    const backend = await createGdbCliBackend(spawner);

    await expect(backend.runCommand('slow', { timeoutMs: 20 })).rejects.toThrow(
      'gdb command timed out after 20ms',
    );
    expect(await backend.runCommand('fast')).toBe('out:fast');
    expect(await backend.runCommand('next')).toBe('out:next');
    expect(log).toHaveBeenCalledWith('debug', 'Discarding late gdb output: out:slow');

    await backend.dispose();
  });

  it('rejects commands after dispose', async () => {
    const gdb = createMockGdbSpawner();
    const backend = await createGdbCliBackend(gdb.spawner);

    await backend.dispose();
    await backend.dispose();

    expect(gdb.disposed()).toBe(1);
    await expect(backend.runCommand('info threads')).rejects.toThrow('gdb backend disposed');
  });

  it('disposes the process when gdb fails to start', async () => {
    let disposed = false;
    const spawner = createMockInteractiveSpawner({
      onWrite: (_data, session) => {
        setImmediate(() => session.emitError(new Error('spawn gdb-missing ENOENT')));
      },
      onDispose: () => {
        disposed = true;
      },
    });

    await expect(createGdbCliBackend(spawner, { command: 'gdb-missing' })).rejects.toThrow(
      'Failed to start gdb: spawn gdb-missing ENOENT',
    );
    expect(disposed).toBe(true);
  });

  it('fails a pending command when gdb exits', async () => {
    let exited = false;
    const spawner = createMockInteractiveSpawner({
      onWrite: (data, session) => {
        if (data === 'kill\n') {
          exited = true;
          setImmediate(() => session.emitExit(1));
          return;
        }
        if (!exited) {
          session.stdout.write('(lanetrace-gdb) \n__LANETRACE_DONE__\n');
        }
      },
    });
    const backend = await createGdbCliBackend(spawner);

    await expect(backend.runCommand('kill')).rejects.toThrow('gdb process exited (code 1)');
    await backend.dispose();
  });
});
