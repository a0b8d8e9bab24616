import { loadLayeredConfig, envPath, toInt } from '@inputtally/core';
import type { EnvSetter } from '@inputtally/core';
import { configSchema } from './schema';
import type { ValidatedConfig } from './schema';

const ENV_PREFIX = 'INPUTTALLY_';

const ENV_MAP: Record<string, EnvSetter> = {
  [`${ENV_PREFIX}API_SECRET`]: envPath('auth.apiSecret'),
  [`${ENV_PREFIX}MONGODB_URI`]: envPath('mongodb.uri'),
  [`${ENV_PREFIX}MONGODB_EVENTS_COLLECTION`]: envPath('mongodb.eventsCollection'),
  [`${ENV_PREFIX}MONGODB_METADATA_COLLECTION`]: envPath('mongodb.metadataCollection'),
  [`${ENV_PREFIX}HOST`]: envPath('http.host'),
  [`${ENV_PREFIX}PORT`]: envPath('http.port', toInt),
  [`${ENV_PREFIX}CORS_ALLOW_ORIGIN`]: envPath('http.corsAllowOrigin'),
  [`${ENV_PREFIX}SERVICE_NAME`]: envPath('service.name'),
  [`${ENV_PREFIX}LOG_LEVEL`]: envPath('logging.level'),
};

export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.CONFIG_PATH ?? '/etc/inputtally/server.yaml';
  return loadLayeredConfig({ schema: configSchema, filePath, env: ENV_MAP });
}
