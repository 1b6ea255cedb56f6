/**
 * Client for the renterd api
 * @module renterd-client/client/client
 */

import { Autopilot } from '../autopilot/index.js';
import { Bus } from '../bus/index.js';
import type { NormalizedClientConfig } from '../config/index.js';
import { ApiRequestExecutor, type RateLimitPolicy, type RequestExecutor } from '../executor/index.js';
import type { Logger } from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';
import { Worker } from '../worker/index.js';

export interface ClientDependencies {
  logger: Logger;
  rateLimit?: RateLimitPolicy;
}

/**
 * Entry point to the bus, worker and autopilot endpoints.
 *
 * All three share one executor, so they share its transport pool, credential
 * and rate limit policy.
 */
export class Client {
  readonly bus: Bus;
  readonly worker: Worker;
  readonly autopilot: Autopilot;
  readonly config: NormalizedClientConfig;
  readonly executor: RequestExecutor;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private closed = false;

  constructor(config: NormalizedClientConfig, transport: HttpTransport, dependencies: ClientDependencies) {
    this.config = config;
    this.transport = transport;
    this.logger = dependencies.logger;
    this.executor = new ApiRequestExecutor(config, transport, {
      logger: this.logger.child({ component: 'executor' }),
      rateLimit: dependencies.rateLimit,
    });

    this.bus = new Bus(this.executor);
    this.autopilot = new Autopilot(this.executor);
    this.worker = new Worker(this.executor, {
      highWaterMark: config.stream.highWaterMark,
      rangeFallback: config.stream.rangeFallback,
      logger: this.logger.child({ component: 'stream' }),
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Closes the transport. Open streams fail on their next request.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.logger.debug('closing client');
    await this.transport.close();
  }
}
