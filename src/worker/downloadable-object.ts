/**
 * Handle to an object that can be downloaded from the worker
 * @module renterd-client/worker/downloadable-object
 */

import { Readable } from 'node:stream';
import { NotSeekableError } from '../errors/index.js';
import { sendRequest, type RequestExecutor } from '../executor/index.js';
import {
  SeekableObjectStream,
  objectGetRequest,
  type RemoteObjectHandle,
  type SeekableStreamOptions,
} from '../streaming/index.js';
import { iterateByteSource } from '../transport/index.js';

/**
 * Metadata announced by the worker for an object
 */
export interface ObjectMetadata extends RemoteObjectHandle {
  /** Byte ranges are accepted and the object is not empty */
  readonly seekable: boolean;
  readonly etag?: string;
  readonly lastModified?: Date;
}

/**
 * An object found by `worker.objects.download()`.
 *
 * @example
 * ```typescript
 * const object = await client.worker.objects.download('/backups/db.tar', { bucket: 'default' });
 * if (object) {
 *   await pipeline(await object.openStream(), createWriteStream('db.tar'));
 * }
 * ```
 */
export class DownloadableObject implements ObjectMetadata {
  readonly path: string;
  readonly bucket?: string;
  readonly length?: number;
  readonly contentType?: string;
  readonly seekable: boolean;
  readonly etag?: string;
  readonly lastModified?: Date;
  private readonly executor: RequestExecutor;
  private readonly streamOptions: SeekableStreamOptions;

  constructor(executor: RequestExecutor, metadata: ObjectMetadata, streamOptions: SeekableStreamOptions = {}) {
    this.executor = executor;
    this.streamOptions = streamOptions;
    this.path = metadata.path;
    this.bucket = metadata.bucket;
    this.length = metadata.length;
    this.contentType = metadata.contentType;
    this.seekable = metadata.seekable;
    this.etag = metadata.etag;
    this.lastModified = metadata.lastModified;
  }

  /**
   * Opens a sequential stream over the whole object with a plain GET
   *
   * @throws {NotFoundError} If the object disappeared since the HEAD request
   */
  async openStream(options: { signal?: AbortSignal } = {}): Promise<Readable> {
    const response = await sendRequest(this.executor, objectGetRequest(this), {
      signal: options.signal,
      highWaterMark: this.streamOptions.highWaterMark,
    });
    return Readable.from(iterateByteSource(response.body), { objectMode: false });
  }

  /**
   * Opens a random-access stream positioned at `initialOffset`.
   *
   * No request is sent until the first read.
   *
   * @throws {NotSeekableError} If the worker does not accept byte ranges for this object
   */
  async openSeekableStream(initialOffset = 0): Promise<SeekableObjectStream> {
    if (!this.seekable) {
      throw NotSeekableError.forPath(this.path);
    }

    const stream = new SeekableObjectStream(this.executor, this, this.streamOptions);
    if (initialOffset !== 0) {
      await stream.seek(initialOffset);
    }
    return stream;
  }
}
