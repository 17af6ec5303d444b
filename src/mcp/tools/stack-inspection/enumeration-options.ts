import * as z from 'zod';

/** Per-call overrides for the environment's thread enumeration settings. */
export const enumerationOptionsShape = {
  collectLanes: z
    .boolean()
    .optional()
    .describe('Expand GPU threads into one entry per active SIMD lane'),
  filterExpression: z
    .string()
    .optional()
    .describe('Only list threads for which this expression is true (console mode only)'),
  maxThreads: z.number().int().positive().optional().describe('Keep at most this many threads'),
  mode: z
    .enum(['mi', 'console'])
    .optional()
    .describe('Enumerate through MI -thread-info or the console thread apply command'),
};
