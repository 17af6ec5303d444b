/**
 * GDB/MI output record parser.
 *
 * Handles result and async records (`^done,...`, `*stopped,...`, `=thread-created,...`)
 * and stream records (`~"..."`, `@"..."`, `&"..."`). Lists of `name=value`
 * results collapse to a list of their values, e.g. `stack=[frame={...},frame={...}]`
 * becomes an array of frame tuples.
 */

export type MiValue = string | MiTuple | MiValue[];

export interface MiTuple {
  [key: string]: MiValue;
}

export type MiRecordKind = 'result' | 'exec' | 'status' | 'notify';

export type MiOutputRecord =
  | { type: MiRecordKind; token?: number; class: string; payload: MiTuple }
  | { type: 'console' | 'target' | 'log'; payload: string };

const RECORD_KINDS: Record<string, MiRecordKind> = {
  '^': 'result',
  '*': 'exec',
  '+': 'status',
  '=': 'notify',
};

const STREAM_KINDS: Record<string, 'console' | 'target' | 'log'> = {
  '~': 'console',
  '@': 'target',
  '&': 'log',
};

const C_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  e: '\x1b',
};

class MiSyntaxError extends Error {
  constructor(message: string, position: number) {
    super(`${message} at offset ${position}`);
    this.name = 'MiSyntaxError';
  }
}

class MiCursor {
  private pos = 0;

  constructor(private readonly text: string) {}

  get offset(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  expect(char: string): void {
    if (this.text.charAt(this.pos) !== char) {
      throw new MiSyntaxError(`Expected '${char}'`, this.pos);
    }
    this.pos++;
  }

  consume(char: string): boolean {
    if (this.text.charAt(this.pos) !== char) return false;
    this.pos++;
    return true;
  }

  readWhile(pattern: RegExp): string {
    const start = this.pos;
    while (this.pos < this.text.length && pattern.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  readCString(): string {
    this.expect('"');
    let out = '';
    while (!this.atEnd()) {
      const char = this.text.charAt(this.pos++);
      if (char === '"') return out;
      if (char !== '\\') {
        out += char;
        continue;
      }

      const next = this.text.charAt(this.pos++);
      const octal = /^[0-7]{1,3}/.exec(this.text.slice(this.pos - 1, this.pos + 2));
      if (octal) {
        out += String.fromCharCode(Number.parseInt(octal[0], 8));
        this.pos += octal[0].length - 1;
      } else {
        out += C_ESCAPES[next] ?? next;
      }
    }
    throw new MiSyntaxError('Unterminated string', this.pos);
  }
}

function parseValue(cursor: MiCursor): MiValue {
  const char = cursor.peek();
  if (char === '"') return cursor.readCString();
  if (char === '{') return parseTuple(cursor);
  if (char === '[') return parseList(cursor);
  throw new MiSyntaxError(`Unexpected '${char}'`, cursor.offset);
}

function parseResult(cursor: MiCursor): [string, MiValue] {
  const name = cursor.readWhile(/[A-Za-z0-9_-]/);
  if (!name) throw new MiSyntaxError('Expected variable name', cursor.offset);
  cursor.expect('=');
  return [name, parseValue(cursor)];
}

function parseTuple(cursor: MiCursor): MiTuple {
  cursor.expect('{');
  const tuple: MiTuple = {};
  if (cursor.consume('}')) return tuple;
  do {
    const [name, value] = parseResult(cursor);
    tuple[name] = value;
  } while (cursor.consume(','));
  cursor.expect('}');
  return tuple;
}

function parseList(cursor: MiCursor): MiValue[] {
  cursor.expect('[');
  const items: MiValue[] = [];
  if (cursor.consume(']')) return items;
  do {
    const char = cursor.peek();
    if (char === '"' || char === '{' || char === '[') {
      items.push(parseValue(cursor));
    } else {
      items.push(parseResult(cursor)[1]);
    }
  } while (cursor.consume(','));
  cursor.expect(']');
  return items;
}

function parseRecord(line: string): MiOutputRecord {
  const cursor = new MiCursor(line);
  const tokenText = cursor.readWhile(/[0-9]/);
  const marker = cursor.peek();

  const streamKind = STREAM_KINDS[marker];
  if (streamKind && !tokenText) {
    cursor.expect(marker);
    return { type: streamKind, payload: cursor.readCString() };
  }

  const kind = RECORD_KINDS[marker];
  if (!kind) throw new MiSyntaxError(`Unknown record marker '${marker}'`, cursor.offset);
  cursor.expect(marker);

  const recordClass = cursor.readWhile(/[A-Za-z0-9_-]/);
  if (!recordClass) throw new MiSyntaxError('Missing record class', cursor.offset);

  const payload: MiTuple = {};
  while (cursor.consume(',')) {
    const [name, value] = parseResult(cursor);
    payload[name] = value;
  }
  if (!cursor.atEnd()) {
    throw new MiSyntaxError('Trailing characters', cursor.offset);
  }

  return {
    type: kind,
    token: tokenText ? Number(tokenText) : undefined,
    class: recordClass,
    payload,
  };
}

/** Parses one MI output line; returns null when the line is not a well-formed record. */
export function parseMiRecord(line: string): MiOutputRecord | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed === '(gdb)') return null;
  try {
    return parseRecord(trimmed);
  } catch (error) {
    if (error instanceof MiSyntaxError) return null;
    throw error;
  }
}

/** First `^<class>` result record in a response, skipping console noise. */
export function findMiResultRecord(
  lines: readonly string[],
): Extract<MiOutputRecord, { type: MiRecordKind }> | null {
  for (const line of lines) {
    if (!/^\d*\^/.test(line.trim())) continue;
    const record = parseMiRecord(line);
    if (record && record.type === 'result') return record;
  }
  return null;
}
