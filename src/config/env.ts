/**
 * Environment variable configuration loading
 * @module renterd-client/config/env
 */

import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';
import { normalizeConfig, type ClientConfig, type NormalizedClientConfig } from './schema.js';

/**
 * Environment variable names for client configuration.
 */
export const ENV_VARS = {
  API_URL: 'RENTERD_API_URL',
  API_PASSWORD: 'RENTERD_API_PASSWORD',
  TIMEOUT_MS: 'RENTERD_TIMEOUT_MS',
  CONNECT_TIMEOUT_MS: 'RENTERD_CONNECT_TIMEOUT_MS',
  ACCEPT_INVALID_CERTS: 'RENTERD_ACCEPT_INVALID_CERTS',
  LOG_LEVEL: 'RENTERD_LOG_LEVEL',
  STREAM_HIGH_WATER_MARK: 'RENTERD_STREAM_HIGH_WATER_MARK',
  RANGE_FALLBACK: 'RENTERD_RANGE_FALLBACK',
} as const;

type Env = Record<string, string | undefined>;

function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw ConfigError.invalidConfig(name, `${name} must be a valid integer, got: ${value}`);
  }

  return parsed;
}

function parseBoolEnv(value: string | undefined, name: string): boolean | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw ConfigError.invalidConfig(name, `${name} must be a boolean, got: ${value}`);
  }
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw ConfigError.invalidConfig(ENV_VARS.LOG_LEVEL, `${ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function parseRangeFallback(value: string | undefined): 'discard' | 'fail' | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized !== 'discard' && normalized !== 'fail') {
    throw ConfigError.invalidConfig(ENV_VARS.RANGE_FALLBACK, `${ENV_VARS.RANGE_FALLBACK} must be discard or fail`);
  }
  return normalized;
}

/**
 * Creates client configuration from environment variables.
 *
 * - RENTERD_API_URL (required): api endpoint, e.g. `http://localhost:9980/api`
 * - RENTERD_API_PASSWORD (required): api password
 * - RENTERD_TIMEOUT_MS, RENTERD_CONNECT_TIMEOUT_MS (optional)
 * - RENTERD_ACCEPT_INVALID_CERTS (optional): `true` / `false`
 * - RENTERD_LOG_LEVEL (optional): error, warn, info, debug or trace
 * - RENTERD_STREAM_HIGH_WATER_MARK (optional): bytes buffered per stream
 * - RENTERD_RANGE_FALLBACK (optional): discard or fail
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(env: Env = process.env): NormalizedClientConfig {
  const config: ClientConfig = {
    apiEndpointUrl: env[ENV_VARS.API_URL] ?? '',
    apiPassword: env[ENV_VARS.API_PASSWORD] ?? '',
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    connectTimeout: parseIntEnv(env[ENV_VARS.CONNECT_TIMEOUT_MS], ENV_VARS.CONNECT_TIMEOUT_MS),
    acceptInvalidCerts: parseBoolEnv(env[ENV_VARS.ACCEPT_INVALID_CERTS], ENV_VARS.ACCEPT_INVALID_CERTS),
    logLevel: parseLogLevel(env[ENV_VARS.LOG_LEVEL]),
    stream: {
      highWaterMark: parseIntEnv(env[ENV_VARS.STREAM_HIGH_WATER_MARK], ENV_VARS.STREAM_HIGH_WATER_MARK),
      rangeFallback: parseRangeFallback(env[ENV_VARS.RANGE_FALLBACK]),
    },
  };

  return normalizeConfig(config);
}
