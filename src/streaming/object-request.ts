/**
 * Requests addressing worker objects
 */

import { ApiRequestBuilder, bucketParams, encodeObjectPath, type ApiRequest } from '../executor/index.js';

export const WORKER_OBJECTS_PREFIX = 'worker/objects';

/**
 * Identifies a downloadable object. Immutable once obtained.
 */
export interface RemoteObjectHandle {
  /** Object path inside its bucket */
  readonly path: string;
  readonly bucket?: string;
  /** Total length, when the server declared one */
  readonly length?: number;
  readonly contentType?: string;
}

/**
 * GET request for an object, optionally carrying a `Range` header value
 */
export function objectGetRequest(handle: Pick<RemoteObjectHandle, 'path' | 'bucket'>, range?: string): ApiRequest {
  const builder = ApiRequestBuilder.get(encodeObjectPath(handle.path, WORKER_OBJECTS_PREFIX)).params(
    bucketParams(handle.bucket)
  );
  if (range !== undefined) {
    builder.header('range', range);
  }
  return builder.build();
}
