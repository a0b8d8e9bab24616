import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';

export type RawConfig = Record<string, unknown>;

/** Writes one environment variable's value into the raw config tree. */
export type EnvSetter = (config: RawConfig, value: string) => void;

export interface LayeredConfigOptions<S extends z.ZodTypeAny> {
  schema: S;
  /** YAML file; skipped when absent. */
  filePath: string;
  /** Environment variable name to setter. */
  env: Record<string, EnvSetter>;
}

export const toInt = (v: string): number => parseInt(v, 10);
export const toBool = (v: string): boolean => v === 'true';
export const toList = (v: string): string[] =>
  v.split(',').map((s) => s.trim()).filter((s) => s.length > 0);

/**
 * Setter for a dotted path such as "http.port", creating intermediate
 * sections as needed.
 */
export function envPath(path: string, convert: (v: string) => unknown = (v) => v): EnvSetter {
  const keys = path.split('.');
  const leaf = keys.pop() ?? path;
  return (config, value) => {
    let target = config;
    for (const key of keys) {
      target = section(target, key);
    }
    target[leaf] = convert(value);
  };
}

/**
 * YAML file, overlaid with environment variables, validated and defaulted
 * by `schema`. Throws a ZodError when the result is invalid.
 */
export function loadLayeredConfig<S extends z.ZodTypeAny>(options: LayeredConfigOptions<S>): z.output<S> {
  let raw: RawConfig = {};

  if (fs.existsSync(options.filePath)) {
    const content = fs.readFileSync(options.filePath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    if (isRecord(parsed)) raw = parsed;
  }

  // Apply environment variable overrides
  for (const [envKey, setter] of Object.entries(options.env)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      setter(raw, value);
    }
  }

  return options.schema.parse(raw);
}

function section(config: RawConfig, name: string): RawConfig {
  const existing = config[name];
  if (isRecord(existing)) return existing;
  const created: RawConfig = {};
  config[name] = created;
  return created;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
