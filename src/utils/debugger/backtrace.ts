import type { Frame } from './types.ts';

/**
 * One line of `bt` output:
 *
 *   #<index>  [0x<address> in ]<designator> (<args>) at <source>:<line>
 *   #<index>  [0x<address> in ]<designator> (<args>) from <source>
 *
 * `designator` is greedy, so it runs up to the last ` (` whose remainder still
 * fits the argument list and location. Template arguments and call signatures
 * inside the designator may themselves contain parentheses.
 */
const FRAME_LINE_PATTERN =
  /^#(?<index>\d+)\s+(?:(?<address>0x[0-9a-fA-F]+)\s+)?(?:in\s+)?(?<designator>.*)\s\(.*\)\s(?:at|from)\s(?<source>[^:]+)(?::(?<line>\d+))?$/;

const TEMPLATE_PLACEHOLDER = '<...>';
const SIGNATURE_PLACEHOLDER = '(...)';

export const UNKNOWN_FRAME: Readonly<Frame> = Object.freeze({
  function: 'Unknown',
  source: '??',
  linenum: 0,
  error: true,
});

type Span = { start: number; end: number };

/** Top-level balanced `<...>` spans, in encounter order. `end` is exclusive. */
function findTemplateSpans(designator: string): Span[] {
  const spans: Span[] = [];
  let depth = 0;
  let start = 0;

  for (let idx = 0; idx < designator.length; idx++) {
    const char = designator[idx];
    if (char === '<') {
      if (depth === 0) start = idx;
      depth++;
    } else if (char === '>' && depth > 0) {
      depth--;
      if (depth === 0) spans.push({ start, end: idx + 1 });
    }
  }

  return spans;
}

function replaceSpans(text: string, spans: Span[], placeholder: string): string {
  let result = '';
  let cursor = 0;
  for (const span of spans) {
    result += text.slice(cursor, span.start) + placeholder;
    cursor = span.end;
  }
  return result + text.slice(cursor);
}

/** The last top-level `(...)` group, or null when any parenthesis follows it. */
function findTrailingParenGroup(text: string): Span | null {
  let depth = 0;
  let start = 0;
  let last: Span | null = null;

  for (let idx = 0; idx < text.length; idx++) {
    const char = text[idx];
    if (char === '(') {
      if (depth === 0) start = idx;
      depth++;
    } else if (char === ')') {
      if (depth === 0) {
        last = null;
        continue;
      }
      depth--;
      if (depth === 0) last = { start, end: idx + 1 };
    }
  }

  return depth === 0 ? last : null;
}

/**
 * Shortens a C++ function designator for display and grouping:
 * every top-level template argument list becomes `<...>`, then the trailing
 * call signature becomes `(...)`.
 *
 * `operator()` keeps its empty parentheses; an empty trailing group is left as is.
 */
export function collapseSignature(designator: string): string {
  const collapsed = replaceSpans(
    designator,
    findTemplateSpans(designator),
    TEMPLATE_PLACEHOLDER,
  );

  const signature = findTrailingParenGroup(collapsed);
  if (!signature || signature.end - signature.start <= 2) {
    return collapsed;
  }

  return replaceSpans(collapsed, [signature], SIGNATURE_PLACEHOLDER);
}

export function parseBacktraceFrame(line: string): Frame {
  const groups = FRAME_LINE_PATTERN.exec(line)?.groups;
  if (!groups) {
    return { ...UNKNOWN_FRAME };
  }

  const { designator = '', source = '??', line: lineText } = groups;
  return {
    function: collapseSignature(designator),
    source,
    linenum: lineText === undefined ? 0 : Number.parseInt(lineText, 10),
    error: false,
  };
}

/** Frames from a `bt` response; banner and blank lines are skipped. */
export function parseBacktraceOutput(lines: readonly string[]): Frame[] {
  return lines
    .map((line) => line.trimEnd())
    .filter((line) => line.startsWith('#'))
    .map(parseBacktraceFrame);
}
