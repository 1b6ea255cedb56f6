/**
 * Request execution against the api endpoint
 * @module renterd-client/executor/request-executor
 */

import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';
import type { ApiRequest } from './api-request.js';

/**
 * Per-call execution options
 */
export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Body buffer size handed to the transport */
  highWaterMark?: number;
}

/**
 * Admission hook run before every request. The api has no rate limits of its
 * own; callers that need one plug it in here.
 */
export interface RateLimitPolicy {
  acquire(request: ApiRequest, signal?: AbortSignal): Promise<void>;
}

/**
 * Issues one api request.
 *
 * Resolves with the status, headers and an incremental body for every HTTP
 * status; rejects only on transport failure or cancellation.
 */
export interface RequestExecutor {
  /** Present when the executor admits requests through a rate limit policy */
  readonly rateLimit?: RateLimitPolicy;
  execute(request: ApiRequest, options?: ExecuteOptions): Promise<HttpResponse>;
}

/**
 * Connection settings the executor needs
 */
export interface ExecutorConfig {
  apiEndpointUrl: string;
  apiPassword: string;
}

export interface ApiRequestExecutorOptions {
  logger?: Logger;
  rateLimit?: RateLimitPolicy;
}

/**
 * RequestExecutor that resolves paths against the endpoint and attaches the
 * api credential to each request
 */
export class ApiRequestExecutor implements RequestExecutor {
  readonly rateLimit?: RateLimitPolicy;
  private readonly baseUrl: URL;
  private readonly authorization: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: ExecutorConfig, transport: HttpTransport, options: ApiRequestExecutorOptions = {}) {
    const base = config.apiEndpointUrl.endsWith('/') ? config.apiEndpointUrl : `${config.apiEndpointUrl}/`;
    this.baseUrl = new URL(base);
    this.authorization = `Basic ${Buffer.from(`api:${config.apiPassword}`).toString('base64')}`;
    this.transport = transport;
    this.rateLimit = options.rateLimit;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Resolves the absolute URL of a request, including its query string
   */
  resolveUrl(request: ApiRequest): URL {
    const url = new URL(`./${request.path}`, this.baseUrl);
    for (const [key, value] of request.params ?? []) {
      url.searchParams.append(key, value);
    }
    return url;
  }

  async execute(request: ApiRequest, options: ExecuteOptions = {}): Promise<HttpResponse> {
    if (this.rateLimit) {
      await this.rateLimit.acquire(request, options.signal);
    }

    const httpRequest = this.toHttpRequest(request, options);
    const started = Date.now();
    this.logger.debug('sending request', {
      method: request.method,
      path: request.path,
      range: request.headers?.['range'],
    });

    try {
      const response = await this.transport.send(httpRequest);
      this.logger.debug('received response', {
        method: request.method,
        path: request.path,
        status: response.status,
        durationMs: Date.now() - started,
      });
      return response;
    } catch (error) {
      this.logger.debug('request failed', {
        method: request.method,
        path: request.path,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private toHttpRequest(request: ApiRequest, options: ExecuteOptions): HttpRequest {
    const headers: Record<string, string> = { ...request.headers, authorization: this.authorization };
    let body: HttpRequest['body'];

    if (request.content?.kind === 'json') {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(request.content.value);
    } else if (request.content?.kind === 'stream') {
      if (request.content.contentType) {
        headers['content-type'] = request.content.contentType;
      }
      body = request.content.body;
    }

    return {
      method: request.method,
      url: this.resolveUrl(request).toString(),
      headers,
      body,
      signal: options.signal,
      highWaterMark: options.highWaterMark,
    };
  }
}
