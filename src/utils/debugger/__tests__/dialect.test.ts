import { describe, expect, it } from 'vitest';
import { gdbOneApiDialect } from '../dialect.ts';

describe('gdbOneApiDialect commands', () => {
  it('prints every thread id when no filter is given', () => {
    expect(gdbOneApiDialect.buildEnumerationCommand()).toBe(
      'thread apply all -q printf "%d.%d\\n", $_inferior, $_thread',
    );
  });

  it('guards the printf with a validated filter expression', () => {
    expect(
      gdbOneApiDialect.buildEnumerationCommand({ valid: true, expression: '$_thread > 1' }),
    ).toBe(
      String.raw`thread apply all -q -s eval "printf \"%%s\\n\", ($_thread > 1) ? \"%d.%d\" : \"\"", $_inferior, $_thread`,
    );
  });

  it('escapes quotes and percent signs inside the filter', () => {
    expect(
      gdbOneApiDialect.buildEnumerationCommand({ valid: true, expression: 'name == "a%b"' }),
    ).toBe(
      String.raw`thread apply all -q -s eval "printf \"%%s\\n\", (name == \"a%%b\") ? \"%d.%d\" : \"\"", $_inferior, $_thread`,
    );
  });

  it('builds probe and backtrace commands', () => {
    expect(gdbOneApiDialect.buildProbeCommand('$_thread > 1')).toBe('print ($_thread > 1)');
    expect(gdbOneApiDialect.buildBacktraceCommand('3.2:0')).toBe(
      'thread apply 3.2:0 bt -frame-arguments none',
    );
  });

  it('accepts the thread id shapes it emits', () => {
    const pattern = gdbOneApiDialect.threadIdPattern;
    expect(['1', '3.2', '3.2:15'].every((id) => pattern.test(id))).toBe(true);
    expect(['', '3.', 'all', '1; shell ls', '3.2:'].some((id) => pattern.test(id))).toBe(false);
  });
});
