/**
 * Random-access reader over a remote object.
 *
 * The object is fetched with open-ended `Range: bytes=N-` requests. Sequential
 * reads keep consuming the open body; a read at a position the buffered window
 * cannot serve replaces the body with a new range request. Seeking only moves
 * the position, so any number of seeks without reads costs no request.
 *
 * @example
 * ```typescript
 * const object = await client.worker.objects.download('videos/intro.mp4');
 * const stream = await object.openSeekableStream();
 * const header = await stream.read(1024);
 * await stream.seek(-128, 'end');
 * const trailer = await stream.read(128);
 * await stream.close();
 * ```
 */

import { Readable } from 'node:stream';
import type { RangeFallback } from '../config/index.js';
import { DEFAULT_HIGH_WATER_MARK } from '../config/index.js';
import {
  CancelledError,
  RangeNotSatisfiableError,
  StreamStateError,
  TransportError,
  ValidationError,
  mapHttpStatusToError,
} from '../errors/index.js';
import { readText, type RequestExecutor } from '../executor/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { concatBytes, type ByteSource, type HttpResponse } from '../transport/index.js';
import { formatRangeHeader, type ByteRange } from './byte-range.js';
import { BufferedWindow, type WindowSnapshot } from './buffered-window.js';
import { objectGetRequest, type RemoteObjectHandle } from './object-request.js';
import { RangeNegotiator, type RangeOutcome, type WindowView } from './range-negotiator.js';

export type SeekOrigin = 'start' | 'current' | 'end';

/**
 * Lifecycle of a stream.
 *
 * `failed` and `idle` both have no open body and accept new calls; `closed`
 * is terminal. Cancellations and timeouts leave the stream `idle`.
 */
export type StreamState = 'idle' | 'fetching' | 'streaming' | 'exhausted' | 'failed' | 'closed';

export interface ReadOptions {
  signal?: AbortSignal;
  /** Request only the bytes of this read instead of an open-ended range */
  bounded?: boolean;
}

export interface SeekOptions {
  signal?: AbortSignal;
}

/**
 * Bytes of one read; `done` marks end-of-object
 */
export interface ReadResult {
  bytes: Uint8Array;
  done: boolean;
}

export interface SeekableStreamOptions {
  /** Bytes buffered from the body before the socket is paused */
  highWaterMark?: number;
  /** Reaction to a server that answers range requests with the full body */
  rangeFallback?: RangeFallback;
  logger?: Logger;
}

interface OpenBody {
  readonly source: ByteSource;
  readonly range: ByteRange;
  /** Offset the body stops at, when known */
  readonly end?: number;
  /** Leading bytes still to drop before the body reaches `range.start` */
  skip: number;
  /** The server answered with the whole object */
  readonly whole: boolean;
}

const EMPTY = new Uint8Array(0);

/**
 * Seekable, incrementally readable view of a remote object
 */
export class SeekableObjectStream implements AsyncIterable<Uint8Array> {
  private readonly executor: RequestExecutor;
  private readonly handle: RemoteObjectHandle;
  private readonly negotiator: RangeNegotiator;
  private readonly window: BufferedWindow;
  private readonly logger: Logger;
  private pos = 0;
  private totalLength?: number;
  private body?: OpenBody;
  private current: StreamState = 'idle';
  private busy = false;

  constructor(executor: RequestExecutor, handle: RemoteObjectHandle, options: SeekableStreamOptions = {}) {
    const highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    if (!Number.isSafeInteger(highWaterMark) || highWaterMark <= 0) {
      throw ValidationError.invalidArgument('highWaterMark', 'must be a positive integer');
    }

    this.executor = executor;
    this.handle = handle;
    this.totalLength = handle.length;
    this.negotiator = new RangeNegotiator(handle.path, options.rangeFallback ?? 'discard');
    this.window = new BufferedWindow(highWaterMark);
    this.logger = (options.logger ?? new NoopLogger()).child({ object: handle.path });
  }

  /** Caller-visible offset */
  get position(): number {
    return this.pos;
  }

  get state(): StreamState {
    return this.current;
  }

  /**
   * Total object length, once a response or the handle declared it
   */
  length(): number | undefined {
    return this.totalLength;
  }

  /**
   * Reads up to `maxLen` bytes at the current position.
   *
   * Fewer bytes come back only at end-of-object; an empty result there is not
   * an error.
   */
  async read(maxLen: number, options: ReadOptions = {}): Promise<Uint8Array> {
    const result = await this.readResult(maxLen, options);
    return result.bytes;
  }

  /**
   * Like {@link read}, with an explicit end-of-object marker.
   *
   * A failed or cancelled read leaves the position and the buffered window as
   * they were before the call and releases the open body.
   */
  async readResult(maxLen: number, options: ReadOptions = {}): Promise<ReadResult> {
    if (!Number.isSafeInteger(maxLen) || maxLen < 0) {
      throw ValidationError.invalidArgument('maxLen', 'must be a non-negative integer');
    }

    this.enter(options.signal);
    try {
      if (maxLen === 0) {
        return { bytes: EMPTY, done: this.atKnownEnd() };
      }
      return await this.readUndoable(maxLen, options);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Moves the position; the target is clamped to `[0, length]`.
   *
   * Nothing is fetched here. Seeking from the end of an object whose length
   * is unknown issues a one-byte probe request first.
   *
   * @throws {UnknownLengthError} When `origin` is `end` and the server cannot
   * report the length
   */
  async seek(offset: number, origin: SeekOrigin = 'start', options: SeekOptions = {}): Promise<number> {
    if (!Number.isSafeInteger(offset)) {
      throw ValidationError.invalidArgument('offset', 'must be an integer');
    }

    this.enter(options.signal);
    try {
      let base = 0;
      switch (origin) {
        case 'start':
          break;
        case 'current':
          base = this.pos;
          break;
        case 'end':
          base = this.totalLength ?? (await this.probeLength(options.signal));
          break;
      }

      let target = Math.max(0, base + offset);
      if (this.totalLength !== undefined) {
        target = Math.min(target, this.totalLength);
      }
      this.pos = target;
      return target;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Releases the open body and buffered bytes. The stream cannot be used afterwards.
   */
  async close(): Promise<void> {
    this.shutdown();
  }

  /**
   * Yields chunks of at most the high-water mark until end-of-object.
   *
   * Leaving the loop early releases the open body; the position stays after
   * the last yielded chunk.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      for (;;) {
        const { bytes, done } = await this.readResult(this.window.highWaterMark);
        if (bytes.byteLength > 0) {
          yield bytes;
        }
        if (done || bytes.byteLength === 0) {
          return;
        }
      }
    } finally {
      this.abandon();
    }
  }

  /**
   * Node readable over the remaining bytes, for `pipeline` and friends.
   *
   * The readable owns the stream: it is closed when the readable closes, also
   * when it is destroyed before the end.
   */
  toReadable(): Readable {
    const readable = Readable.from(this[Symbol.asyncIterator](), { objectMode: false });
    readable.once('close', () => {
      this.shutdown();
    });
    return readable;
  }

  private shutdown(): void {
    if (this.current === 'closed') {
      return;
    }
    this.releaseBody();
    this.window.discard();
    this.current = 'closed';
    this.logger.debug('stream closed', { position: this.pos });
  }

  /**
   * Drops the body an iterator left open
   */
  private abandon(): void {
    if (this.busy || this.isClosed()) {
      return;
    }
    if (this.releaseBody() && this.current === 'streaming') {
      this.current = 'idle';
    }
  }

  private enter(signal: AbortSignal | undefined): void {
    if (this.current === 'closed') {
      throw StreamStateError.closed();
    }
    if (this.busy) {
      throw StreamStateError.busy();
    }
    if (signal?.aborted) {
      throw CancelledError.fromSignal(signal);
    }
    this.busy = true;
  }

  private isClosed(): boolean {
    return this.current === 'closed';
  }

  private assertOpen(): void {
    if (this.isClosed()) {
      throw StreamStateError.closed();
    }
  }

  private atKnownEnd(): boolean {
    return this.totalLength !== undefined && this.pos >= this.totalLength;
  }

  private view(): WindowView {
    return {
      start: this.window.start,
      end: this.window.end,
      live: this.body !== undefined,
    };
  }

  private async readUndoable(maxLen: number, options: ReadOptions): Promise<ReadResult> {
    const startPosition = this.pos;
    const snapshot = this.window.snapshot();
    const parts: Uint8Array[] = [];
    let remaining = maxLen;
    let ended = false;

    try {
      while (remaining > 0 && !ended) {
        this.window.dropBefore(this.pos);
        const plan = this.negotiator.plan(this.pos, remaining, this.view(), this.totalLength, options.bounded);

        switch (plan.kind) {
          case 'end':
            ended = true;
            break;
          case 'serve': {
            const bytes = this.window.take(plan.available);
            parts.push(bytes);
            this.pos += bytes.byteLength;
            remaining -= bytes.byteLength;
            break;
          }
          case 'pull':
            await this.pull(options.signal);
            break;
          case 'fetch':
            ended = !(await this.fetch(plan.range, options.signal));
            break;
        }
      }
    } catch (error) {
      throw this.undo(error, startPosition, snapshot);
    }

    if (ended) {
      if (this.totalLength !== undefined && this.pos > this.totalLength) {
        // a full response ended before the seek target
        this.pos = this.totalLength;
      }
      this.current = 'exhausted';
    } else if (this.body) {
      this.current = 'streaming';
    }

    const bytes = concatBytes(parts);
    return { bytes, done: ended || this.atKnownEnd() };
  }

  /**
   * Restores the state a read started from and picks the error to surface
   */
  private undo(error: unknown, position: number, snapshot: WindowSnapshot): unknown {
    this.releaseBody();
    if (this.isClosed()) {
      return StreamStateError.closed();
    }

    this.window.restore(snapshot);
    this.pos = position;
    if (error instanceof RangeNotSatisfiableError && this.atKnownEnd()) {
      // the server just revealed the length; keep the position inside it
      this.pos = this.totalLength ?? position;
    }

    if (error instanceof CancelledError) {
      this.current = 'idle';
      this.logger.debug('read cancelled', { position });
    } else {
      this.current = error instanceof TransportError && error.code === 'TIMEOUT' ? 'idle' : 'failed';
      this.logger.warn('read failed', {
        position,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return error;
  }

  /**
   * Pulls one chunk from the open body into the window
   */
  private async pull(signal: AbortSignal | undefined): Promise<void> {
    const body = this.body;
    if (!body) {
      return;
    }

    const chunk = await body.source.next(signal);
    this.assertOpen();
    if (chunk === null) {
      this.body = undefined;
      this.bodyEnded(body);
      return;
    }

    let bytes = chunk;
    if (body.skip > 0) {
      const dropped = Math.min(body.skip, bytes.byteLength);
      body.skip -= dropped;
      bytes = bytes.subarray(dropped);
    }
    this.window.push(bytes);
  }

  private bodyEnded(body: OpenBody): void {
    const reached = this.window.end;
    if (body.end !== undefined && reached < body.end) {
      throw TransportError.prematureEnd(body.end - body.range.start, reached - body.range.start);
    }

    if (body.skip > 0) {
      // the whole object is shorter than the requested offset
      const total = body.range.start - body.skip;
      if (this.totalLength !== undefined && total !== this.totalLength) {
        throw TransportError.prematureEnd(this.totalLength, total);
      }
      this.totalLength = total;
    } else if (body.end === undefined && this.totalLength !== undefined && reached < this.totalLength) {
      throw TransportError.prematureEnd(this.totalLength - body.range.start, reached - body.range.start);
    } else if ((body.range.end === undefined || body.whole) && this.totalLength === undefined) {
      // an open-ended body that runs out marks the end of the object
      this.totalLength = reached;
    }
    this.current = 'exhausted';
  }

  /**
   * Opens a ranged body at `range.start`, superseding the current one.
   *
   * @returns `false` when the range starts exactly at the end of the object
   */
  private async fetch(range: ByteRange, signal: AbortSignal | undefined): Promise<boolean> {
    this.releaseBody();
    this.window.reset(range.start);
    this.current = 'fetching';

    const header = formatRangeHeader(range);
    this.logger.debug('fetching range', { range: header });

    const response = await this.executor.execute(objectGetRequest(this.handle, header), {
      signal,
      highWaterMark: this.window.highWaterMark,
    });
    if (this.isClosed()) {
      response.body.cancel();
      throw StreamStateError.closed();
    }
    await this.rejectErrorStatus(response, signal);

    let outcome: RangeOutcome;
    try {
      outcome = this.negotiator.interpretRangeResponse(range, response.status, response.headers, this.totalLength);
    } catch (error) {
      response.body.cancel();
      throw error;
    }

    if (outcome.total !== undefined) {
      this.totalLength = outcome.total;
    }

    switch (outcome.kind) {
      case 'end':
        response.body.cancel();
        return false;
      case 'unsatisfiable':
        response.body.cancel();
        throw RangeNotSatisfiableError.beyondEnd(range.start, outcome.total);
      case 'body':
        if (outcome.skip > 0) {
          this.logger.warn('server ignored range request, discarding bytes up to position', {
            range: header,
            discard: outcome.skip,
          });
        }
        this.body = {
          source: response.body,
          range,
          end: outcome.end,
          skip: outcome.skip,
          whole: response.status === 200,
        };
        this.current = 'streaming';
        return true;
    }
  }

  /**
   * Resolves the object length with a `bytes=0-0` request
   */
  private async probeLength(signal: AbortSignal | undefined): Promise<number> {
    // keep a single live connection per stream
    if (this.releaseBody()) {
      this.current = 'idle';
    }

    this.logger.debug('probing object length');
    const response = await this.executor.execute(objectGetRequest(this.handle, formatRangeHeader({ start: 0, end: 1 })), {
      signal,
    });
    if (this.isClosed()) {
      response.body.cancel();
      throw StreamStateError.closed();
    }
    await this.rejectErrorStatus(response, signal);

    try {
      const length = this.negotiator.interpretProbeResponse(response.status, response.headers);
      this.totalLength = length;
      return length;
    } finally {
      response.body.cancel();
    }
  }

  /**
   * Throws the mapped error for any status other than 200, 206 and 416
   */
  private async rejectErrorStatus(response: HttpResponse, signal: AbortSignal | undefined): Promise<void> {
    if (response.status === 200 || response.status === 206 || response.status === 416) {
      return;
    }
    const text = (await readText(response, signal)).trim();
    throw mapHttpStatusToError(response.status, text, this.handle.path);
  }

  /**
   * @returns whether a body was open
   */
  private releaseBody(): boolean {
    const body = this.body;
    if (!body) {
      return false;
    }
    this.body = undefined;
    body.source.cancel();
    return true;
  }
}
