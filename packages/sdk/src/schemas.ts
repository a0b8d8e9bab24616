import { z } from 'zod';

const category = z.enum(['KEY', 'CLICK', 'WHEEL', 'OTHER']);

export const ingestResponseSchema = z.object({
  success: z.literal(true),
  message: z.string(),
  events_processed: z.number().int().nonnegative(),
});

export const statsResponseSchema = z.object({
  total_keys: z.number(),
  total_clicks: z.number(),
  total_wheels: z.number(),
  last_sync: z.string().nullable(),
  first_sync: z.string().nullable(),
  events: z.array(z.object({ name: z.string(), type: category, count: z.number() })),
});

export const healthResponseSchema = z.object({
  status: z.literal('ok'),
  service: z.string(),
});
