/**
 * Turns empty or whitespace-only strings into undefined so optional fields
 * behave as "not provided" before zod sees them.
 */
export function nullifyEmptyStrings(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' && entry.trim() === '') {
      copy[key] = undefined;
      continue;
    }
    copy[key] = entry;
  }
  return copy;
}
