import { z } from 'zod';

export const configSchema = z.object({
  auth: z.object({
    apiSecret: z.string().min(1),
  }),
  mongodb: z.object({
    uri: z.string().min(1),
    eventsCollection: z.string().default('events'),
    metadataCollection: z.string().default('metadata'),
  }),
  http: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().positive().default(3000),
    corsAllowOrigin: z.string().default('*'),
    maxBodyBytes: z.number().int().positive().default(1024 * 1024),
  }).default({}),
  service: z.object({
    name: z.string().default('inputtally-server'),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
