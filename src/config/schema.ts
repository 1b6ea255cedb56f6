/**
 * Configuration schema and validation for the renterd client
 * @module renterd-client/config/schema
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS } from '../observability/index.js';
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_HIGH_WATER_MARK,
  DEFAULT_KEEP_ALIVE_TIMEOUT,
  DEFAULT_POOL_CONNECTIONS,
  DEFAULT_TIMEOUT,
} from './defaults.js';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

const endpointSchema = z
  .string()
  .min(1)
  .refine(isHttpUrl, { message: 'must be an http or https url with a host' });

/**
 * How a stream reacts when the server answers a range request with the full body.
 *
 * - `discard`: read and drop bytes until the requested position
 * - `fail`: reject with a `RANGE_NOT_SUPPORTED` protocol error
 */
export const rangeFallbackSchema = z.enum(['discard', 'fail']);

export const streamConfigSchema = z.object({
  highWaterMark: z.number().int().positive().default(DEFAULT_HIGH_WATER_MARK),
  rangeFallback: rangeFallbackSchema.default('discard'),
});

export const poolConfigSchema = z.object({
  connections: z.number().int().positive().default(DEFAULT_POOL_CONNECTIONS),
  keepAliveTimeout: z.number().int().positive().default(DEFAULT_KEEP_ALIVE_TIMEOUT),
});

export const clientConfigSchema = z.object({
  apiEndpointUrl: endpointSchema,
  apiPassword: z.string().min(1),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  connectTimeout: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT),
  acceptInvalidCerts: z.boolean().default(false),
  pool: poolConfigSchema.default({}),
  stream: streamConfigSchema.default({}),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

/**
 * Configuration accepted by the client; omitted fields take their defaults.
 */
export type ClientConfig = z.input<typeof clientConfigSchema>;

/**
 * Configuration with every default applied.
 */
export type NormalizedClientConfig = z.output<typeof clientConfigSchema>;

export type StreamConfig = z.output<typeof streamConfigSchema>;

export type RangeFallback = z.output<typeof rangeFallbackSchema>;

/**
 * Validates a configuration and applies defaults.
 *
 * @throws {ConfigError} If the configuration is invalid
 */
export function normalizeConfig(config: ClientConfig): NormalizedClientConfig {
  const result = clientConfigSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const paramName = issue ? issue.path.join('.') : 'config';

  if (paramName === 'apiEndpointUrl') {
    throw config.apiEndpointUrl
      ? ConfigError.invalidEndpoint(config.apiEndpointUrl)
      : ConfigError.missingEndpoint();
  }
  if (paramName === 'apiPassword') {
    throw ConfigError.missingPassword();
  }

  throw ConfigError.invalidConfig(paramName, `${paramName}: ${issue?.message ?? 'invalid value'}`);
}
