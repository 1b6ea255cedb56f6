/**
 * Configuration module
 * @module renterd-client/config
 */

export {
  clientConfigSchema,
  normalizeConfig,
  type ClientConfig,
  type NormalizedClientConfig,
  type StreamConfig,
  type RangeFallback,
} from './schema.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';

export * from './defaults.js';
