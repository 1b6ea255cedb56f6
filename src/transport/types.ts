/**
 * HTTP transport type definitions
 */

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE';

/**
 * Request body accepted by transports
 */
export type RequestBody = Uint8Array | string | AsyncIterable<Uint8Array>;

/**
 * Incremental source of response body bytes.
 *
 * A source owns a transport resource (a pooled connection) until it is either
 * drained or cancelled.
 */
export interface ByteSource {
  /**
   * Resolves with the next chunk, or `null` once the body is exhausted.
   * Aborting `signal` cancels the source and rejects with a CancelledError.
   */
  next(signal?: AbortSignal): Promise<Uint8Array | null>;

  /**
   * Releases the underlying transport resource. Safe to call more than once.
   */
  cancel(): void;
}

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL including query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  body?: RequestBody;
  /** Aborts the request while waiting for response headers */
  signal?: AbortSignal;
  /** Bytes the transport may buffer from the body before pausing the socket */
  highWaterMark?: number;
}

/**
 * HTTP response with an incremental body
 */
export interface HttpResponse {
  status: number;
  /** Response headers, keys lower-cased */
  headers: Record<string, string>;
  body: ByteSource;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends a request and resolves once the response headers arrive.
   * Error statuses resolve normally; only transport failures reject.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases pooled connections
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parses a non-negative integer header value; `undefined` when absent or malformed
 */
export function parseLengthHeader(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
