import { loadLayeredConfig, envPath, toBool, toInt, toList } from '@inputtally/core';
import type { EnvSetter } from '@inputtally/core';
import { configSchema } from './schema';
import type { ValidatedConfig } from './schema';

const ENV_PREFIX = 'INPUTTALLY_';

const ENV_MAP: Record<string, EnvSetter> = {
  [`${ENV_PREFIX}API_URL`]: envPath('api.url'),
  [`${ENV_PREFIX}API_SECRET`]: envPath('api.secret'),
  [`${ENV_PREFIX}API_TIMEOUT_MS`]: envPath('api.timeoutMs', toInt),
  [`${ENV_PREFIX}FLUSH_INTERVAL_MS`]: envPath('delivery.flushIntervalMs', toInt),
  [`${ENV_PREFIX}SPOOL_PATH`]: envPath('spool.path'),
  [`${ENV_PREFIX}INPUT_DEVICES`]: envPath('input.devices', toList),
  [`${ENV_PREFIX}LOG_LEVEL`]: envPath('logging.level'),
  [`${ENV_PREFIX}HEALTH_ENABLED`]: envPath('health.enabled', toBool),
  [`${ENV_PREFIX}HEALTH_PORT`]: envPath('health.port', toInt),
};

export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.CONFIG_PATH ?? '/etc/inputtally/agent.yaml';
  return loadLayeredConfig({ schema: configSchema, filePath, env: ENV_MAP });
}
