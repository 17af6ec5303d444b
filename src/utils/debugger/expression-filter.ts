import { log } from '../logging/index.ts';
import {
  gdbOneApiDialect,
  type DebuggerDialect,
  type ValidatedFilterExpression,
} from './dialect.ts';
import type { CommandChannel } from './types.ts';

export type FilterValidation =
  | ValidatedFilterExpression & { readonly reason: string }
  | { readonly valid: false; readonly expression: string; readonly reason: string };

const LOG_PREFIX = '[Thread Filter]';

function reject(expression: string, reason: string): FilterValidation {
  return { valid: false, expression, reason };
}

/** Stage 1: structural checks that need no debugger round trip. */
export function screenFilterExpression(
  raw: string,
  dialect: DebuggerDialect = gdbOneApiDialect,
): FilterValidation | null {
  const expression = raw.trim();
  if (!expression) {
    return reject(expression, 'Filter expression is empty');
  }

  if (/[\r\n]/.test(expression)) {
    return reject(expression, 'Filter expression must be a single line');
  }

  const lowered = expression.toLowerCase();
  const denied = dialect.deniedTokens.find((token) => lowered.includes(token.toLowerCase()));
  if (denied) {
    return reject(expression, `Filter expression contains disallowed token "${denied}"`);
  }

  const sideEffect = dialect.sideEffectPatterns.find((pattern) => pattern.test(expression));
  if (sideEffect) {
    return reject(
      expression,
      'Filter expression must not assign, increment or call functions in the target',
    );
  }

  return null;
}

/** Stage 2: classify the response to the dialect's probe command. */
export function classifyProbeResponse(
  lines: readonly string[],
  dialect: DebuggerDialect = gdbOneApiDialect,
): { valid: boolean; reason: string } {
  const trimmed = lines.map((line) => line.trim()).filter(Boolean);

  if (trimmed.some((line) => dialect.evaluationSuccessPattern.test(line))) {
    return { valid: true, reason: 'Expression evaluated successfully' };
  }

  const benign = trimmed.find((line) =>
    dialect.benignErrorPatterns.some((pattern) => pattern.test(line)),
  );
  if (benign) {
    return { valid: true, reason: `Expression is well-formed (${benign})` };
  }

  if (trimmed.length === 0) {
    return { valid: false, reason: 'Debugger returned no output for the probe' };
  }

  return { valid: false, reason: `Debugger rejected the expression: ${trimmed.join(' ')}` };
}

/**
 * Decides whether a user-supplied filter expression may be embedded in the
 * thread enumeration command. Never throws: channel failures classify the
 * expression as invalid.
 */
export async function validateFilterExpression(
  raw: string,
  channel: CommandChannel,
  dialect: DebuggerDialect = gdbOneApiDialect,
): Promise<FilterValidation> {
  const screened = screenFilterExpression(raw, dialect);
  if (screened) {
    log('warn', `${LOG_PREFIX} ${screened.reason}`);
    return screened;
  }

  const expression = raw.trim();
  let lines: string[];
  try {
    lines = await channel.send(dialect.buildProbeCommand(expression));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log('warn', `${LOG_PREFIX} probe failed: ${message}`);
    return reject(expression, `Probe failed: ${message}`);
  }

  const verdict = classifyProbeResponse(lines, dialect);
  if (!verdict.valid) {
    log('warn', `${LOG_PREFIX} ${verdict.reason}`);
    return reject(expression, verdict.reason);
  }

  log('debug', `${LOG_PREFIX} accepted "${expression}": ${verdict.reason}`);
  return { valid: true, expression, reason: verdict.reason };
}
