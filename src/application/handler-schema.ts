import { z } from 'zod';

/** Tier key: non-negative integer, lower runs first. */
export const prioritySchema = z.number().int().min(0);

/**
 * Options accepted by `get()`.
 *
 * - `maxTries`: how many events may be inspected before giving up;
 *   `0` or absent means no bound.
 * - `timeoutMs`: deadline measured from the call; absent means none.
 */
export const getOptionsSchema = z.object({
  maxTries: z.number().int().min(0).optional(),
  timeoutMs: z.number().finite().min(0).optional(),
});

export type GetOptions = z.input<typeof getOptionsSchema>;
