import type { LoggingConfig } from '../lib/types.js';
import {
  type EnvSource,
  normalizeEnvValue,
  parseBooleanEnv,
} from '../lib/validators.js';
import { LogLevelSchema } from '../schemas/inputs.js';

export const LOG_ENABLED_ENV = 'DISPATCHER_LOG_ENABLED';
export const LOG_LEVEL_ENV = 'DISPATCHER_LOG_LEVEL';

export const DEFAULT_LOGGING_CONFIG = {
  enabled: true,
  level: 'warn',
} as const satisfies LoggingConfig;

export function resolveLoggingConfig(
  env: EnvSource = process.env
): LoggingConfig {
  const rawLevel = env[LOG_LEVEL_ENV];
  const parsedLevel =
    rawLevel === undefined
      ? undefined
      : LogLevelSchema.safeParse(normalizeEnvValue(rawLevel));

  return {
    enabled: parseBooleanEnv(
      LOG_ENABLED_ENV,
      DEFAULT_LOGGING_CONFIG.enabled,
      env
    ),
    level: parsedLevel?.success
      ? parsedLevel.data
      : DEFAULT_LOGGING_CONFIG.level,
  };
}
