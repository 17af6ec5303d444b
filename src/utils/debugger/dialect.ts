import type { ThreadId } from './types.ts';

/** A filter expression that passed both validation stages. */
export interface ValidatedFilterExpression {
  readonly valid: true;
  readonly expression: string;
}

/**
 * Everything that ties the parsers and the validator to one debugger's text
 * conventions. Deny lists and output markers drift between debugger releases,
 * so they are data here rather than constants scattered through the parsers.
 */
export interface DebuggerDialect {
  readonly name: string;
  /** Console command that returns a single MI result record with `threads`. */
  readonly threadInfoCommand: string;
  /** Matched against a thread's `name`; a hit classifies the thread as GPU. */
  readonly deviceTagPattern: RegExp;
  /** Matched against a thread's `target-id` to classify CPU threads. */
  readonly cpuThreadLabelPattern: RegExp;
  /** Shape of one console-mode enumeration line. */
  readonly threadIdPattern: RegExp;
  /** Case-insensitive substrings that reject a filter expression outright. */
  readonly deniedTokens: readonly string[];
  /** Operators or forms that would mutate state when the probe evaluates them. */
  readonly sideEffectPatterns: readonly RegExp[];
  readonly evaluationSuccessPattern: RegExp;
  /** Well-formed expressions that cannot be evaluated in the probing frame. */
  readonly benignErrorPatterns: readonly RegExp[];
  buildEnumerationCommand(filter?: ValidatedFilterExpression): string;
  buildProbeCommand(expression: string): string;
  buildBacktraceCommand(threadId: ThreadId): string;
}

// Escapes text for the string literal handed to gdb's `eval`, whose contents
// are also a printf template.
function escapeEvalTemplate(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/%/g, '%%');
}

export const gdbOneApiDialect: DebuggerDialect = {
  name: 'gdb-oneapi',
  threadInfoCommand: 'interpreter-exec mi "-thread-info --stopped"',
  deviceTagPattern: /\bZE\b/,
  cpuThreadLabelPattern: /\b(?:LWP|Thread)\b/,
  threadIdPattern: /^\d+(?:\.\d+)?(?::\d+)?$/,
  deniedTokens: [
    'shell',
    'pipe',
    'call',
    'python',
    'guile',
    'compile',
    'source',
    'define',
    'eval',
    'dump',
    'restore',
    'exec',
    'system',
  ],
  sideEffectPatterns: [
    // assignment, compound assignment
    /(?:^|[^=!<>])=(?!=)/,
    /<<=|>>=/,
    /\+\+|--/,
    // inferior function calls; sizeof-like operators and $_convenience functions are fine
    /(?<![\w$])(?!(?:sizeof|alignof|_Alignof|typeof|decltype)\b)[A-Za-z_]\w*\s*\(/,
  ],
  evaluationSuccessPattern: /^\$\d+\s*=/,
  benignErrorPatterns: [/^No symbol ".*" in current context\.?$/, /cannot subscript/i],

  buildEnumerationCommand(filter) {
    if (!filter) {
      return 'thread apply all -q printf "%d.%d\\n", $_inferior, $_thread';
    }
    const guarded = escapeEvalTemplate(filter.expression);
    return (
      'thread apply all -q -s eval ' +
      `"printf \\"%%s\\\\n\\", (${guarded}) ? \\"%d.%d\\" : \\"\\"", $_inferior, $_thread`
    );
  },

  buildProbeCommand(expression) {
    return `print (${expression})`;
  },

  buildBacktraceCommand(threadId) {
    return `thread apply ${threadId} bt -frame-arguments none`;
  },
};
