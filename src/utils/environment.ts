/**
 * Environment-derived configuration.
 *
 * Everything is read once per call from the env object passed in (process.env
 * by default) and returned as plain values, so callers and tests never depend
 * on process-wide state.
 */

import { log } from './logging/index.ts';
import type { EnumerationConfig, ThreadEnumerationMode } from './debugger/types.ts';

const DEFAULT_GDB_COMMAND = 'gdb-oneapi';

function readNonEmpty(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw;
}

export function isTruthyEnvValue(raw: string | undefined): boolean {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

/** Debugger executable to spawn for new sessions. */
export function getGdbCommand(env: NodeJS.ProcessEnv = process.env): string {
  return readNonEmpty(env, 'LANETRACE_GDB_COMMAND')?.trim() ?? DEFAULT_GDB_COMMAND;
}

export function getThreadEnumerationMode(
  env: NodeJS.ProcessEnv = process.env,
): ThreadEnumerationMode {
  const raw = readNonEmpty(env, 'LANETRACE_THREAD_MODE');
  if (!raw) return 'mi';

  const normalized = raw.trim().toLowerCase();
  if (normalized === 'mi' || normalized === 'console') return normalized;

  log('warn', `Unsupported LANETRACE_THREAD_MODE "${raw}", using "mi"`);
  return 'mi';
}

/**
 * Builds the thread enumeration config:
 *  LANETRACE_COLLECT_SIMD_BT=1     -> collectLanes
 *  LANETRACE_THREAD_FILTER=<expr>  -> filterExpression (validated later, not here)
 *  LANETRACE_MAX_THREADS=<n>       -> maxThreads (validated later, not here)
 *  LANETRACE_THREAD_MODE=mi|console
 */
export function getEnumerationConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): EnumerationConfig {
  return {
    collectLanes: isTruthyEnvValue(env.LANETRACE_COLLECT_SIMD_BT),
    filterExpression: readNonEmpty(env, 'LANETRACE_THREAD_FILTER'),
    maxThreads: readNonEmpty(env, 'LANETRACE_MAX_THREADS'),
    mode: getThreadEnumerationMode(env),
  };
}
