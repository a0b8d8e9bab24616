import { z } from 'zod';
import type { Snapshot } from '@inputtally/types';

const count = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

// z.record drops a "__proto__" key without an issue; refuse it instead
const identifier = z
  .string()
  .min(1)
  .refine((key) => key !== '__proto__', { message: 'Reserved identifier' });

/** Wire and spool shape of a Snapshot. */
export const snapshotSchema = z.object({
  total_keys: count,
  total_clicks: count,
  total_wheels: count,
  events: z.record(identifier, count),
});

export function parseSnapshot(input: unknown): Snapshot {
  return freezeSnapshot(snapshotSchema.parse(input));
}

export function freezeSnapshot(snapshot: Snapshot): Snapshot {
  Object.freeze(snapshot.events);
  return Object.freeze(snapshot);
}
