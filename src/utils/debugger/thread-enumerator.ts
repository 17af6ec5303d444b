import * as z from 'zod';
import { log } from '../logging/index.ts';
import {
  gdbOneApiDialect,
  type DebuggerDialect,
  type ValidatedFilterExpression,
} from './dialect.ts';
import { validateFilterExpression } from './expression-filter.ts';
import { findMiResultRecord } from './mi-parser.ts';
import { expandSimdLanes, parseExecutionMask } from './simd-lanes.ts';
import type { CommandChannel, EnumerationConfig, ThreadId, ThreadRecord } from './types.ts';

const LOG_PREFIX = '[Thread Enumerator]';

// Upstream MI decoders sometimes leave the C-string quotes on values.
function unquote(value: unknown): unknown {
  return typeof value === 'string' ? value.replace(/"/g, '').trim() : value;
}

const miString = z.preprocess(unquote, z.string());
const miCount = z.preprocess(unquote, z.coerce.number<string | number>().int().nonnegative());
const miState = z.preprocess((value) => {
  const text = unquote(value);
  return typeof text === 'string' ? text.toLowerCase() : text;
}, z.enum(['stopped', 'running', 'unavailable']));

const threadRecordSchema = z
  .object({
    id: miCount,
    'target-id': miString.default(''),
    name: miString.default(''),
    state: miState,
    'simd-width': miCount.optional(),
    'execution-mask': miString.optional(),
  })
  .transform(
    (raw): ThreadRecord => ({
      id: raw.id,
      targetId: raw['target-id'],
      name: raw.name,
      state: raw.state,
      simdWidth: raw['simd-width'],
      executionMask: raw['execution-mask'],
    }),
  );

const threadInfoPayloadSchema = z.object({
  threads: z.array(z.unknown()),
});

const maxThreadsSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/)])
  .pipe(z.coerce.number<string | number>().int().positive());

/** Decodes the `threads` list of an MI `-thread-info` payload; undecodable entries are skipped. */
export function decodeThreadRecords(payload: unknown): ThreadRecord[] {
  const parsed = threadInfoPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    log('info', `${LOG_PREFIX} MI response does not carry any thread info`);
    return [];
  }

  const records: ThreadRecord[] = [];
  parsed.data.threads.forEach((entry, index) => {
    const record = threadRecordSchema.safeParse(entry);
    if (record.success) {
      records.push(record.data);
    } else {
      log('debug', `${LOG_PREFIX} skipping thread entry ${index}: ${record.error.message}`);
    }
  });
  return records;
}

/** A GPU thread is named `"<inferior>.<thread> (ZE ...)"`; its id is the leading token. */
function gpuThreadId(name: string): ThreadId {
  return name.trim().split(/\s+/)[0]?.replace(/"/g, '') ?? '';
}

function expandThreadLanes(threadId: ThreadId, record: ThreadRecord): ThreadId[] {
  const width = record.simdWidth ?? 0;
  const mask =
    record.executionMask === undefined ? 0n : parseExecutionMask(record.executionMask);

  if (mask === null) {
    log(
      'debug',
      `${LOG_PREFIX} unreadable execution mask for ${threadId}: ${record.executionMask}`,
    );
    return [threadId];
  }
  if (width === 0 || mask === 0n) {
    return [threadId];
  }

  const lanes = expandSimdLanes(width, mask);
  if (lanes.length === 0) {
    return [threadId];
  }
  return lanes.map((lane) => `${threadId}:${lane}`);
}

/**
 * Thread ids from a decoded `-thread-info` payload: CPU threads first (by
 * numeric id), then GPU threads (by the `<inferior>.<thread>` label in their
 * name). Unavailable threads are dropped.
 *
 * With `collectLanes`, GPU threads that report a SIMD width and execution
 * mask become one `"<id>:<lane>"` entry per active lane. When no thread in the
 * payload reports SIMD info at all, the bare ids are returned unchanged.
 */
export function collectThreadIds(
  payload: unknown,
  opts: { collectLanes: boolean; dialect?: DebuggerDialect },
): ThreadId[] {
  const dialect = opts.dialect ?? gdbOneApiDialect;
  const live = decodeThreadRecords(payload).filter((record) => record.state !== 'unavailable');

  const isGpu = (record: ThreadRecord): boolean => dialect.deviceTagPattern.test(record.name);
  const cpu = live.filter(
    (record) => !isGpu(record) && dialect.cpuThreadLabelPattern.test(record.targetId),
  );
  const gpu = live.filter(isGpu);

  const entries = [
    ...cpu.map((record) => ({ threadId: String(record.id), record })),
    ...gpu.map((record) => ({ threadId: gpuThreadId(record.name), record })),
  ];

  const threadIds = entries.map((entry) => entry.threadId);
  if (!opts.collectLanes) {
    return threadIds;
  }

  const hasSimdInfo = entries.some(
    ({ record }) => record.simdWidth !== undefined && record.executionMask !== undefined,
  );
  if (!hasSimdInfo) {
    return threadIds;
  }

  return entries.flatMap(({ threadId, record }) => expandThreadLanes(threadId, record));
}

/** Positive integer or undefined; anything else is reported and ignored. */
export function parseMaxThreads(raw: string | number | undefined): number | undefined {
  if (raw === undefined) return undefined;

  const parsed = maxThreadsSchema.safeParse(raw);
  if (!parsed.success) {
    log('warn', `${LOG_PREFIX} ignoring maxThreads "${raw}": expected a positive integer`);
    return undefined;
  }
  return parsed.data;
}

export interface ThreadEnumeratorOptions {
  dialect?: DebuggerDialect;
}

export class ThreadEnumerator {
  private readonly channel: CommandChannel;
  private readonly dialect: DebuggerDialect;

  constructor(channel: CommandChannel, options: ThreadEnumeratorOptions = {}) {
    this.channel = channel;
    this.dialect = options.dialect ?? gdbOneApiDialect;
  }

  /**
   * Lists the active threads of the debugged target. Channel failures are
   * logged and yield an empty list; they are not retried.
   */
  async discover(config: EnumerationConfig): Promise<ThreadId[]> {
    const maxThreads = parseMaxThreads(config.maxThreads);

    let threadIds: ThreadId[];
    try {
      threadIds =
        config.mode === 'console'
          ? await this.discoverFromConsole(config)
          : await this.discoverFromThreadInfo(config);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log('error', `${LOG_PREFIX} thread enumeration failed: ${message}`);
      return [];
    }

    return maxThreads === undefined ? threadIds : threadIds.slice(0, maxThreads);
  }

  private async discoverFromThreadInfo(config: EnumerationConfig): Promise<ThreadId[]> {
    if (config.filterExpression !== undefined) {
      log('warn', `${LOG_PREFIX} filter expressions need console mode; ignoring the filter`);
    }

    const command = this.dialect.threadInfoCommand;
    log('info', `${LOG_PREFIX} ${this.dialect.name}: ${command}`);
    const lines = await this.channel.send(command);
    log('debug', `${LOG_PREFIX} ${JSON.stringify(lines)}`);

    if (lines.length === 0) {
      log('warn', `${LOG_PREFIX} no response to: ${command}`);
      return [];
    }

    const record = findMiResultRecord(lines);
    if (!record) {
      log('error', `${LOG_PREFIX} no MI result record in response to: ${command}`);
      return [];
    }
    if (record.class === 'error') {
      const detail = typeof record.payload.msg === 'string' ? `: ${record.payload.msg}` : '';
      log('error', `${LOG_PREFIX} failed to execute the command "${command}"${detail}`);
      return [];
    }

    return collectThreadIds(record.payload, {
      collectLanes: config.collectLanes,
      dialect: this.dialect,
    });
  }

  private async discoverFromConsole(config: EnumerationConfig): Promise<ThreadId[]> {
    if (config.collectLanes) {
      log('warn', `${LOG_PREFIX} SIMD lane expansion needs MI mode; listing bare thread ids`);
    }

    let filter: ValidatedFilterExpression | undefined;
    if (config.filterExpression !== undefined) {
      const verdict = await validateFilterExpression(
        config.filterExpression,
        this.channel,
        this.dialect,
      );
      if (verdict.valid) {
        filter = verdict;
      } else {
        log('warn', `${LOG_PREFIX} enumerating all threads without a filter: ${verdict.reason}`);
      }
    }

    const lines = await this.channel.send(this.dialect.buildEnumerationCommand(filter));

    const threadIds: ThreadId[] = [];
    for (const line of lines) {
      const candidate = line.trim();
      if (!candidate) continue;
      if (!this.dialect.threadIdPattern.test(candidate)) {
        log('debug', `${LOG_PREFIX} skipping unexpected enumeration line: ${candidate}`);
        continue;
      }
      threadIds.push(candidate);
    }

    if (filter && threadIds.length === 0) {
      log('info', `${LOG_PREFIX} no threads matched filter "${filter.expression}"`);
    }
    return threadIds;
  }
}
