/**
 * Fluent builder for client construction
 * @module renterd-client/client/builder
 */

import type { ClientConfig, RangeFallback } from '../config/index.js';
import type { RateLimitPolicy } from '../executor/index.js';
import type { Logger } from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { Client } from './client.js';
import { createClient, type ClientOverrides } from './factory.js';

/**
 * Chainable client configuration.
 *
 * The endpoint and the password are required; `build()` validates both.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder()
 *   .apiEndpointUrl('http://localhost:9980/api')
 *   .apiPassword('test-secret')
 *   .verboseLogging(true)
 *   .build();
 * ```
 */
export class ClientBuilder {
  private config: Partial<ClientConfig> = {};
  private overrides: ClientOverrides = {};

  apiEndpointUrl(url: string): this {
    this.config.apiEndpointUrl = url;
    return this;
  }

  apiPassword(password: string): this {
    this.config.apiPassword = password;
    return this;
  }

  /**
   * Accepts any TLS certificate presented by the endpoint
   */
  dangerAcceptInvalidCerts(accept: boolean): this {
    this.config.acceptInvalidCerts = accept;
    return this;
  }

  /**
   * Logs every request at debug level to the console
   */
  verboseLogging(verbose: boolean): this {
    this.config.logLevel = verbose ? 'debug' : undefined;
    return this;
  }

  /**
   * Sets the header and idle-body timeout in milliseconds
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  connectTimeout(ms: number): this {
    this.config.connectTimeout = ms;
    return this;
  }

  /**
   * Sets the bytes a seekable stream buffers before pausing its connection
   */
  streamHighWaterMark(bytes: number): this {
    this.config.stream = { ...this.config.stream, highWaterMark: bytes };
    return this;
  }

  rangeFallback(fallback: RangeFallback): this {
    this.config.stream = { ...this.config.stream, rangeFallback: fallback };
    return this;
  }

  transport(transport: HttpTransport): this {
    this.overrides.transport = transport;
    return this;
  }

  logger(logger: Logger): this {
    this.overrides.logger = logger;
    return this;
  }

  rateLimit(policy: RateLimitPolicy): this {
    this.overrides.rateLimit = policy;
    return this;
  }

  /**
   * @throws {ConfigError} MISSING_API_ENDPOINT, INVALID_API_ENDPOINT or MISSING_API_PASSWORD
   */
  build(): Client {
    return createClient(
      {
        ...this.config,
        apiEndpointUrl: this.config.apiEndpointUrl ?? '',
        apiPassword: this.config.apiPassword ?? '',
      },
      this.overrides
    );
  }
}
