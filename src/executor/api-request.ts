/**
 * Typed request description and builder for api endpoints
 * @module renterd-client/executor/api-request
 */

import type { HttpMethod, RequestBody } from '../transport/index.js';

/**
 * Body attached to an api request
 */
export type RequestContent =
  | { readonly kind: 'json'; readonly value: unknown }
  | { readonly kind: 'stream'; readonly body: RequestBody; readonly contentType?: string };

/**
 * A request against the api, relative to the configured endpoint
 */
export interface ApiRequest {
  readonly method: HttpMethod;
  /** Endpoint-relative path, e.g. `worker/objects/foo/bar` */
  readonly path: string;
  readonly params?: ReadonlyArray<readonly [string, string]>;
  readonly headers?: Readonly<Record<string, string>>;
  readonly content?: RequestContent;
}

/**
 * Fluent builder for ApiRequest
 *
 * @example
 * ```typescript
 * const request = ApiRequestBuilder.get('worker/objects/foo.bin')
 *   .params([['bucket', 'default']])
 *   .header('range', 'bytes=0-')
 *   .build();
 * ```
 */
export class ApiRequestBuilder {
  private readonly method: HttpMethod;
  private readonly path: string;
  private requestParams?: Array<readonly [string, string]>;
  private requestHeaders?: Record<string, string>;
  private requestContent?: RequestContent;

  private constructor(method: HttpMethod, path: string) {
    this.method = method;
    this.path = path;
  }

  static get(path: string): ApiRequestBuilder {
    return new ApiRequestBuilder('GET', path);
  }

  static post(path: string): ApiRequestBuilder {
    return new ApiRequestBuilder('POST', path);
  }

  static put(path: string): ApiRequestBuilder {
    return new ApiRequestBuilder('PUT', path);
  }

  static delete(path: string): ApiRequestBuilder {
    return new ApiRequestBuilder('DELETE', path);
  }

  static head(path: string): ApiRequestBuilder {
    return new ApiRequestBuilder('HEAD', path);
  }

  /**
   * Replaces the query parameters; `undefined` clears them
   */
  params(params: ReadonlyArray<readonly [string, string]> | undefined): this {
    this.requestParams = params ? [...params] : undefined;
    return this;
  }

  header(name: string, value: string): this {
    this.requestHeaders = { ...this.requestHeaders, [name.toLowerCase()]: value };
    return this;
  }

  json(value: unknown): this {
    this.requestContent = { kind: 'json', value };
    return this;
  }

  stream(body: RequestBody, contentType?: string): this {
    this.requestContent = { kind: 'stream', body, contentType };
    return this;
  }

  build(): ApiRequest {
    return {
      method: this.method,
      path: this.path,
      params: this.requestParams,
      headers: this.requestHeaders,
      content: this.requestContent,
    };
  }
}

/**
 * Joins an object path onto an endpoint prefix.
 *
 * Leading slashes are dropped and every segment is URI-encoded.
 *
 * @example
 * ```typescript
 * encodeObjectPath('/foo/bar baz.txt', 'worker/objects'); // 'worker/objects/foo/bar%20baz.txt'
 * ```
 */
export function encodeObjectPath(path: string, prefix: string): string {
  const segments = path.replace(/^\/+/, '').split('/').map(encodeURIComponent);
  return `${prefix}/${segments.join('/')}`;
}

/**
 * Builds `[['bucket', name]]` when a bucket is given
 */
export function bucketParams(bucket: string | undefined): Array<readonly [string, string]> | undefined {
  return bucket === undefined ? undefined : [['bucket', bucket]];
}
