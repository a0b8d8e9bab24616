import { z } from 'zod';
import { DEFAULT_SPOOL_PATH } from '@inputtally/core';

export const configSchema = z.object({
  api: z.object({
    url: z.string().url().default('http://localhost:3000'),
    secret: z.string().min(1),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  delivery: z.object({
    flushIntervalMs: z.number().int().positive().default(10_000),
  }).default({}),
  spool: z.object({
    path: z.string().min(1).default(DEFAULT_SPOOL_PATH),
  }).default({}),
  input: z.object({
    devices: z.array(z.string().min(1)).min(1).default(['/dev/input/event0']),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
  health: z.object({
    enabled: z.boolean().default(false),
    port: z.number().int().positive().default(9091),
  }).default({}),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
