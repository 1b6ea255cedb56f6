/**
 * Buffer of bytes pulled from the current body and not yet consumed
 */

import { concatBytes } from '../transport/index.js';

/**
 * Saved window contents, used to undo a failed or cancelled read
 */
export interface WindowSnapshot {
  readonly start: number;
  readonly chunks: readonly Uint8Array[];
  readonly size: number;
}

/**
 * Contiguous run of object bytes `[start, end)`.
 *
 * Chunks are held as received and sliced without copying; bytes leave the
 * window only from the head, through `take` or `dropBefore`. The stream pushes
 * only once the window has drained to its tail, so it holds at most one body
 * chunk, and the transport caps chunks at the high-water mark.
 */
export class BufferedWindow {
  readonly highWaterMark: number;
  private chunks: Uint8Array[] = [];
  private startOffset = 0;
  private size = 0;

  constructor(highWaterMark: number) {
    this.highWaterMark = highWaterMark;
  }

  /** Logical offset of the first buffered byte */
  get start(): number {
    return this.startOffset;
  }

  /** Logical offset one past the last buffered byte */
  get end(): number {
    return this.startOffset + this.size;
  }

  get buffered(): number {
    return this.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Empties the window and anchors it at `start`
   */
  reset(start: number): void {
    this.chunks = [];
    this.size = 0;
    this.startOffset = start;
  }

  /**
   * Appends bytes at the tail
   */
  push(bytes: Uint8Array): void {
    if (bytes.byteLength > 0) {
      this.chunks.push(bytes);
      this.size += bytes.byteLength;
    }
  }

  /**
   * Removes and returns up to `n` bytes from the head
   */
  take(n: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let remaining = Math.min(n, this.size);

    while (remaining > 0) {
      const head = this.chunks[0];
      if (!head) {
        break;
      }
      if (head.byteLength <= remaining) {
        this.chunks.shift();
        parts.push(head);
        remaining -= head.byteLength;
        this.consumed(head.byteLength);
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        this.consumed(remaining);
        remaining = 0;
      }
    }

    return parts.length === 0 ? new Uint8Array(0) : concatBytes(parts);
  }

  /**
   * Drops buffered bytes that lie before `position`
   */
  dropBefore(position: number): void {
    const count = Math.min(position, this.end) - this.startOffset;
    if (count > 0) {
      this.take(count);
    }
  }

  /**
   * Releases every buffered byte; the window becomes empty at its current end
   */
  discard(): void {
    this.reset(this.end);
  }

  snapshot(): WindowSnapshot {
    return { start: this.startOffset, chunks: [...this.chunks], size: this.size };
  }

  restore(snapshot: WindowSnapshot): void {
    this.chunks = [...snapshot.chunks];
    this.startOffset = snapshot.start;
    this.size = snapshot.size;
  }

  private consumed(count: number): void {
    this.size -= count;
    this.startOffset += count;
  }
}
