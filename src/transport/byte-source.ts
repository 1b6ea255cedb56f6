/**
 * ByteSource adapters and helpers
 */

import type { Readable } from 'node:stream';
import { CancelledError } from '../errors/index.js';
import type { ByteSource } from './types.js';

/**
 * Races `promise` against `signal`. On abort `onAbort` runs and the returned
 * promise rejects with a CancelledError; the losing promise stays handled.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: () => void
): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const abort = (): void => {
      onAbort();
      reject(CancelledError.fromSignal(signal));
    };

    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener('abort', abort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', abort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abort);
        reject(error);
      }
    );
  });
}

/**
 * Adapts a Node readable (such as an undici response body) into a ByteSource.
 *
 * @param readable - Body stream
 * @param mapError - Converts stream errors into client errors
 */
export function readableByteSource(
  readable: Readable,
  mapError: (error: unknown) => Error
): ByteSource {
  const iterator: AsyncIterator<unknown> = readable[Symbol.asyncIterator]();
  let finished = false;

  const cancel = (): void => {
    if (!finished) {
      finished = true;
      readable.destroy();
    }
  };

  const pull = async (): Promise<Uint8Array | null> => {
    try {
      const result = await iterator.next();
      if (result.done) {
        finished = true;
        return null;
      }
      const chunk: unknown = result.value;
      if (chunk instanceof Uint8Array) {
        return chunk;
      }
      return new TextEncoder().encode(String(chunk));
    } catch (error) {
      cancel();
      throw mapError(error);
    }
  };

  return {
    async next(signal?: AbortSignal): Promise<Uint8Array | null> {
      if (finished) {
        return null;
      }
      return raceAbort(pull(), signal, cancel);
    },
    cancel,
  };
}

/**
 * Concatenates byte chunks
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  if (chunks.length === 1 && chunks[0]) {
    return chunks[0];
  }
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Drains a source into a single buffer. The source is cancelled on failure.
 */
export async function collectBytes(source: ByteSource, signal?: AbortSignal): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  try {
    for (;;) {
      const chunk = await source.next(signal);
      if (chunk === null) {
        return concatBytes(chunks);
      }
      chunks.push(chunk);
    }
  } finally {
    source.cancel();
  }
}

/**
 * Yields every chunk of a source, cancelling it when the consumer stops early.
 */
export async function* iterateByteSource(source: ByteSource): AsyncGenerator<Uint8Array, void, undefined> {
  try {
    for (;;) {
      const chunk = await source.next();
      if (chunk === null) {
        return;
      }
      yield chunk;
    }
  } finally {
    source.cancel();
  }
}
