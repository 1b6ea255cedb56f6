/**
 * Factory functions for creating clients
 * @module renterd-client/client/factory
 */

import {
  createConfigFromEnv,
  normalizeConfig,
  type ClientConfig,
  type NormalizedClientConfig,
} from '../config/index.js';
import type { RateLimitPolicy } from '../executor/index.js';
import { createLogger, type Logger } from '../observability/index.js';
import { createUndiciTransport, type HttpTransport } from '../transport/index.js';
import { Client } from './client.js';

/**
 * Collaborators that replace the defaults built from configuration
 */
export interface ClientOverrides {
  /** Transport to use instead of an undici pool */
  transport?: HttpTransport;
  /** Logger to use instead of one built from `logLevel` */
  logger?: Logger;
  rateLimit?: RateLimitPolicy;
}

function buildClient(config: NormalizedClientConfig, overrides: ClientOverrides): Client {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const transport =
    overrides.transport ??
    createUndiciTransport({
      timeout: config.timeout,
      connectTimeout: config.connectTimeout,
      connections: config.pool.connections,
      keepAliveTimeout: config.pool.keepAliveTimeout,
      acceptInvalidCerts: config.acceptInvalidCerts,
      logger: logger.child({ component: 'transport' }),
    });

  if (config.acceptInvalidCerts) {
    logger.warn('tls certificate verification is disabled', { endpoint: config.apiEndpointUrl });
  }

  return new Client(config, transport, { logger, rateLimit: overrides.rateLimit });
}

/**
 * Creates a client from a configuration object
 *
 * @throws {ConfigError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   apiEndpointUrl: 'http://localhost:9980/api',
 *   apiPassword: 'test-secret',
 * });
 *
 * try {
 *   console.log(await client.bus.state());
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: ClientConfig, overrides: ClientOverrides = {}): Client {
  return buildClient(normalizeConfig(config), overrides);
}

/**
 * Creates a client from `RENTERD_*` environment variables
 *
 * @throws {ConfigError} If a variable is missing or invalid
 */
export function createClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: ClientOverrides = {}
): Client {
  return buildClient(createConfigFromEnv(env), overrides);
}
