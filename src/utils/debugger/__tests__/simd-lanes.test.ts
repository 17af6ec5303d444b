import { describe, expect, it } from 'vitest';
import { expandSimdLanes, parseExecutionMask } from '../simd-lanes.ts';

describe('expandSimdLanes', () => {
  it('lists every set bit below the width, lowest first', () => {
    expect(expandSimdLanes(4, 0xf)).toEqual([0, 1, 2, 3]);
    expect(expandSimdLanes(8, 0b1010_0101)).toEqual([0, 2, 5, 7]);
    expect(expandSimdLanes(16, 0x8001)).toEqual([0, 15]);
  });

  it('ignores mask bits at or above the width', () => {
    expect(expandSimdLanes(4, 0x31)).toEqual([0]);
  });

  it('returns no lanes for a zero width or zero mask', () => {
    expect(expandSimdLanes(0, 0)).toEqual([]);
    expect(expandSimdLanes(32, 0)).toEqual([]);
    expect(expandSimdLanes(0, 0xff)).toEqual([]);
  });

  it('handles 32-lane masks with the top bit set', () => {
    expect(expandSimdLanes(32, 0x8000_0000n)).toEqual([31]);
    expect(expandSimdLanes(32, 0xffff_ffffn)).toHaveLength(32);
  });
});

describe('parseExecutionMask', () => {
  it('reads 0x-prefixed and bare hex', () => {
    expect(parseExecutionMask('0xf')).toBe(15n);
    expect(parseExecutionMask(' 0X1A ')).toBe(26n);
    expect(parseExecutionMask('ff')).toBe(255n);
  });

  it('rejects anything that is not hex', () => {
    expect(parseExecutionMask('')).toBeNull();
    expect(parseExecutionMask('0x')).toBeNull();
    expect(parseExecutionMask('lanes')).toBeNull();
    expect(parseExecutionMask('-0x1')).toBeNull();
  });
});
