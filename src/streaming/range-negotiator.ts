/**
 * Decides how each read is satisfied and interprets range responses
 */

import type { RangeFallback } from '../config/index.js';
import { ProtocolError, UnknownLengthError } from '../errors/index.js';
import { getHeader, parseLengthHeader } from '../transport/index.js';
import { parseContentRange, type ByteRange } from './byte-range.js';

/**
 * What the negotiator needs to know about the buffered window
 */
export interface WindowView {
  readonly start: number;
  readonly end: number;
  /** A body is open and still delivering bytes at `end` */
  readonly live: boolean;
}

/**
 * Outcome of planning one step of a read
 *
 * - `serve`: `available` bytes at the position are buffered
 * - `pull`: the position is the window's tail and the open body continues it
 * - `fetch`: a new ranged request is required
 * - `end`: the position is at the end of the object
 */
export type RangePlan =
  | { readonly kind: 'serve'; readonly available: number }
  | { readonly kind: 'pull' }
  | { readonly kind: 'fetch'; readonly range: ByteRange }
  | { readonly kind: 'end' };

/**
 * How a range response is to be consumed
 *
 * - `body`: read the body; drop its first `skip` bytes. `end` is the offset the
 *   body stops at, when the server said so
 * - `end`: the requested start is exactly the object length
 * - `unsatisfiable`: the requested start lies beyond the object
 */
export type RangeOutcome =
  | { readonly kind: 'body'; readonly skip: number; readonly total?: number; readonly end?: number }
  | { readonly kind: 'end'; readonly total: number }
  | { readonly kind: 'unsatisfiable'; readonly total?: number };

/**
 * Range planning for one object
 */
export class RangeNegotiator {
  private readonly path: string;
  private readonly fallback: RangeFallback;

  constructor(path: string, fallback: RangeFallback) {
    this.path = path;
    this.fallback = fallback;
  }

  /**
   * Plans the next step of a read at `position`.
   *
   * Buffered bytes are always preferred, even a single one. A position behind
   * the window, or past its tail, needs a fetch.
   *
   * @param bounded - Fetch only `requestedLen` bytes instead of an open-ended range
   */
  plan(position: number, requestedLen: number, window: WindowView, length?: number, bounded = false): RangePlan {
    if (requestedLen === 0) {
      return { kind: 'serve', available: 0 };
    }

    if (length !== undefined && position >= length) {
      return { kind: 'end' };
    }

    if (window.start <= position && position < window.end) {
      return { kind: 'serve', available: Math.min(window.end - position, requestedLen) };
    }

    if (position === window.end && window.live) {
      return { kind: 'pull' };
    }

    if (!bounded) {
      return { kind: 'fetch', range: { start: position } };
    }

    const end = position + requestedLen;
    return { kind: 'fetch', range: { start: position, end: length === undefined ? end : Math.min(end, length) } };
  }

  /**
   * Interprets the response to a ranged GET (status 200, 206 or 416).
   *
   * @throws {ProtocolError} On missing or inconsistent range headers, or when
   * the server ignores the range and the fallback is `fail`
   */
  interpretRangeResponse(
    range: ByteRange,
    status: number,
    headers: Record<string, string>,
    knownLength: number | undefined
  ): RangeOutcome {
    switch (status) {
      case 206:
        return this.interpretPartial(range, headers, knownLength);
      case 200:
        return this.interpretFull(range, headers, knownLength);
      case 416:
        return this.interpretUnsatisfiable(range, headers, knownLength);
      default:
        throw ProtocolError.unexpectedResponse(`status ${status} for a range request`);
    }
  }

  /**
   * Interprets the response to a `bytes=0-0` length probe.
   *
   * @throws {UnknownLengthError} When the response carries no total length
   */
  interpretProbeResponse(status: number, headers: Record<string, string>): number {
    const contentRange = parseContentRange(getHeader(headers, 'content-range'));

    if (status === 206 && contentRange?.kind === 'satisfied' && contentRange.total !== undefined) {
      return contentRange.total;
    }
    if (status === 416 && contentRange?.kind === 'unsatisfied') {
      return contentRange.total;
    }
    if (status === 200) {
      const length = parseLengthHeader(getHeader(headers, 'content-length'));
      if (length !== undefined) {
        return length;
      }
    }

    throw UnknownLengthError.forPath(this.path);
  }

  private interpretPartial(
    range: ByteRange,
    headers: Record<string, string>,
    knownLength: number | undefined
  ): RangeOutcome {
    const header = getHeader(headers, 'content-range');
    const contentRange = parseContentRange(header);
    if (contentRange?.kind !== 'satisfied') {
      throw ProtocolError.invalidContentRange(header);
    }
    if (contentRange.first !== range.start) {
      throw ProtocolError.rangeMismatch(range.start, contentRange.first);
    }

    const end = contentRange.last + 1;
    let total = contentRange.total;
    // a bounded range cut short by the server ends at the object's end
    if (total === undefined && range.end !== undefined && end < range.end) {
      total = end;
    }
    checkLength(knownLength, total);

    return { kind: 'body', skip: 0, total, end };
  }

  private interpretFull(
    range: ByteRange,
    headers: Record<string, string>,
    knownLength: number | undefined
  ): RangeOutcome {
    const total = parseLengthHeader(getHeader(headers, 'content-length'));
    checkLength(knownLength, total);

    const exact = range.start === 0 && range.end === undefined;
    if (!exact && this.fallback === 'fail') {
      throw ProtocolError.rangeNotSupported(this.path);
    }

    if (total !== undefined && range.start >= total) {
      return range.start === total ? { kind: 'end', total } : { kind: 'unsatisfiable', total };
    }

    return { kind: 'body', skip: range.start, total, end: total };
  }

  private interpretUnsatisfiable(
    range: ByteRange,
    headers: Record<string, string>,
    knownLength: number | undefined
  ): RangeOutcome {
    const contentRange = parseContentRange(getHeader(headers, 'content-range'));
    const reported = contentRange?.kind === 'unsatisfied' ? contentRange.total : undefined;
    checkLength(knownLength, reported);

    const total = reported ?? knownLength;
    if (total === undefined) {
      return { kind: 'unsatisfiable' };
    }
    if (range.start < total) {
      throw ProtocolError.unexpectedResponse(
        `range starting at ${range.start} rejected for an object of ${total} bytes`
      );
    }
    return range.start === total ? { kind: 'end', total } : { kind: 'unsatisfiable', total };
  }
}

function checkLength(knownLength: number | undefined, reported: number | undefined): void {
  if (knownLength !== undefined && reported !== undefined && knownLength !== reported) {
    throw ProtocolError.lengthMismatch(knownLength, reported);
  }
}
