/**
 * Expands a SIMD width and execution mask into the indices of the active lanes,
 * lowest lane first. Mask bits at or above `width` are ignored.
 *
 * `expandSimdLanes(0, 0)` is empty; callers treat that as "no lane expansion"
 * and report the bare thread id.
 */
export function expandSimdLanes(width: number, mask: number | bigint): number[] {
  const bits = BigInt(mask);
  const lanes: number[] = [];

  for (let lane = 0; lane < width; lane++) {
    if (((bits >> BigInt(lane)) & 1n) === 1n) {
      lanes.push(lane);
    }
  }

  return lanes;
}

/**
 * Parses an MI `execution-mask` value. gdb reports it as `0x`-prefixed hex;
 * plain hex digits are accepted too. Returns null for anything else.
 */
export function parseExecutionMask(raw: string): bigint | null {
  const trimmed = raw.trim();
  const match = trimmed.match(/^(?:0x)?([0-9a-f]+)$/i);
  if (!match) return null;
  return BigInt(`0x${match[1]}`);
}
