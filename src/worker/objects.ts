/**
 * Worker object endpoints
 * @module renterd-client/worker/objects
 */

import { ProtocolError } from '../errors/index.js';
import {
  ApiRequestBuilder,
  bucketParams,
  encodeObjectPath,
  sendOptionalRequest,
  sendRequest,
  type ApiRequest,
  type RequestExecutor,
} from '../executor/index.js';
import { WORKER_OBJECTS_PREFIX, type SeekableStreamOptions } from '../streaming/index.js';
import { getHeader, parseLengthHeader, type RequestBody } from '../transport/index.js';
import { DownloadableObject, type ObjectMetadata } from './downloadable-object.js';

export interface DownloadOptions {
  bucket?: string;
  signal?: AbortSignal;
}

export interface UploadOptions {
  bucket?: string;
  contentType?: string;
  signal?: AbortSignal;
}

export interface DeleteOptions {
  bucket?: string;
  /** Delete every object under `path` */
  batch?: boolean;
  signal?: AbortSignal;
}

export function downloadHeadRequest(path: string, bucket?: string): ApiRequest {
  return ApiRequestBuilder.head(encodeObjectPath(path, WORKER_OBJECTS_PREFIX)).params(bucketParams(bucket)).build();
}

export function uploadRequest(path: string, data: RequestBody, options: UploadOptions = {}): ApiRequest {
  return ApiRequestBuilder.put(encodeObjectPath(path, WORKER_OBJECTS_PREFIX))
    .params(bucketParams(options.bucket))
    .stream(data, options.contentType)
    .build();
}

export function deleteRequest(path: string, options: DeleteOptions = {}): ApiRequest {
  const params: Array<readonly [string, string]> = bucketParams(options.bucket) ?? [];
  params.push(['batch', String(options.batch ?? false)]);
  return ApiRequestBuilder.delete(encodeObjectPath(path, WORKER_OBJECTS_PREFIX)).params(params).build();
}

/**
 * Reads object metadata from HEAD response headers
 *
 * @throws {ProtocolError} INVALID_CONTENT_LENGTH or INVALID_LAST_MODIFIED
 */
export function parseObjectMetadata(
  path: string,
  bucket: string | undefined,
  headers: Record<string, string>
): ObjectMetadata {
  const acceptRanges = getHeader(headers, 'accept-ranges')?.startsWith('bytes') ?? false;

  const contentLengthHeader = getHeader(headers, 'content-length');
  let length: number | undefined;
  if (contentLengthHeader !== undefined) {
    length = parseLengthHeader(contentLengthHeader);
    if (length === undefined) {
      throw ProtocolError.invalidContentLength(contentLengthHeader);
    }
  }

  const lastModifiedHeader = getHeader(headers, 'last-modified');
  let lastModified: Date | undefined;
  if (lastModifiedHeader !== undefined) {
    lastModified = new Date(lastModifiedHeader);
    if (Number.isNaN(lastModified.getTime())) {
      throw ProtocolError.invalidLastModified(lastModifiedHeader);
    }
  }

  return {
    path,
    bucket,
    length,
    contentType: nonEmpty(getHeader(headers, 'content-type')),
    seekable: acceptRanges && length !== undefined && length > 0,
    etag: nonEmpty(getHeader(headers, 'etag')),
    lastModified,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Object download, upload and deletion through the worker
 */
export class WorkerObjects {
  private readonly executor: RequestExecutor;
  private readonly streamOptions: SeekableStreamOptions;

  constructor(executor: RequestExecutor, streamOptions: SeekableStreamOptions = {}) {
    this.executor = executor;
    this.streamOptions = streamOptions;
  }

  /**
   * Looks up an object with a HEAD request.
   *
   * @returns The object, or `null` if it does not exist
   */
  async download(path: string, options: DownloadOptions = {}): Promise<DownloadableObject | null> {
    const response = await sendOptionalRequest(this.executor, downloadHeadRequest(path, options.bucket), {
      signal: options.signal,
    });
    if (response === null) {
      return null;
    }
    response.body.cancel();

    const metadata = parseObjectMetadata(path, options.bucket, response.headers);
    return new DownloadableObject(this.executor, metadata, this.streamOptions);
  }

  /**
   * Uploads `data` to `path`, replacing any existing object
   */
  async upload(path: string, data: RequestBody, options: UploadOptions = {}): Promise<void> {
    const response = await sendRequest(this.executor, uploadRequest(path, data, options), {
      signal: options.signal,
    });
    response.body.cancel();
  }

  async delete(path: string, options: DeleteOptions = {}): Promise<void> {
    const response = await sendRequest(this.executor, deleteRequest(path, options), { signal: options.signal });
    response.body.cancel();
  }
}
