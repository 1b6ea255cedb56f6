/**
 * Connection-pooled HTTP transport built on undici.
 *
 * One undici `Pool` is kept per origin, so consecutive range requests for the
 * same object reuse keep-alive connections. A response body holds its
 * connection until the returned ByteSource is drained or cancelled.
 */

import { Readable } from 'node:stream';
import { Pool, errors } from 'undici';
import { CancelledError, RenterdError, TransportError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { readableByteSource } from './byte-source.js';
import type { HttpRequest, HttpResponse, HttpTransport, RequestBody } from './types.js';

/**
 * Undici transport options
 */
export interface UndiciTransportOptions {
  /** Timeout for response headers and between body chunks, in milliseconds */
  timeout: number;
  /** Socket connect timeout in milliseconds */
  connectTimeout: number;
  /** Maximum connections per origin */
  connections: number;
  /** Idle keep-alive timeout in milliseconds */
  keepAliveTimeout: number;
  /** Skip TLS certificate verification */
  acceptInvalidCerts?: boolean;
  logger?: Logger;
}

function toUndiciBody(body: RequestBody | undefined): string | Uint8Array | Readable | undefined {
  if (body === undefined || typeof body === 'string' || body instanceof Uint8Array) {
    return body;
  }
  return Readable.from(body);
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code: unknown = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * HTTP transport backed by undici connection pools
 */
export class UndiciTransport implements HttpTransport {
  private readonly options: UndiciTransportOptions;
  private readonly pools = new Map<string, Pool>();
  private readonly logger: Logger;
  private closed = false;

  constructor(options: UndiciTransportOptions) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw TransportError.connectionFailed('transport is closed');
    }

    const url = new URL(request.url);
    const pool = this.getPool(url.origin);
    const signal = request.signal;

    try {
      signal?.throwIfAborted();
      const response = await pool.request({
        method: request.method,
        path: `${url.pathname}${url.search}`,
        headers: request.headers,
        body: toUndiciBody(request.body),
        signal,
        highWaterMark: request.highWaterMark,
      });

      const body = readableByteSource(response.body, (error) => this.mapError(error, url, undefined));
      if (signal?.aborted) {
        body.cancel();
        throw CancelledError.fromSignal(signal);
      }

      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.mapError(error, url, signal);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    const pools = [...this.pools.values()];
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.close()));
  }

  private getPool(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      this.logger.debug('opening connection pool', { origin });
      pool = new Pool(origin, {
        connections: this.options.connections,
        keepAliveTimeout: this.options.keepAliveTimeout,
        headersTimeout: this.options.timeout,
        bodyTimeout: this.options.timeout,
        connect: {
          timeout: this.options.connectTimeout,
          rejectUnauthorized: !this.options.acceptInvalidCerts,
        },
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  /**
   * Maps undici and socket errors to client errors
   */
  private mapError(error: unknown, url: URL, signal: AbortSignal | undefined): Error {
    if (error instanceof RenterdError) {
      return error;
    }

    if (signal?.aborted) {
      return CancelledError.fromSignal(signal);
    }

    if (error instanceof errors.HeadersTimeoutError || error instanceof errors.BodyTimeoutError) {
      return TransportError.timeout(this.options.timeout, error);
    }

    if (error instanceof errors.ConnectTimeoutError) {
      return TransportError.timeout(this.options.connectTimeout, error);
    }

    const code = errorCode(error) ?? errorCode(error instanceof Error ? error.cause : undefined);
    if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
      return TransportError.dnsError(url.hostname, error);
    }

    const message = error instanceof Error ? error.message : String(error);
    return TransportError.connectionFailed(code ? `${code}: ${message}` : message, error);
  }
}

/**
 * Creates an undici transport
 */
export function createUndiciTransport(options: UndiciTransportOptions): HttpTransport {
  return new UndiciTransport(options);
}
