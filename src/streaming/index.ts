/**
 * Seekable streaming over remote objects
 */

export { formatRangeHeader, parseContentRange, type ByteRange, type ContentRange } from './byte-range.js';
export { BufferedWindow, type WindowSnapshot } from './buffered-window.js';
export {
  RangeNegotiator,
  type RangePlan,
  type RangeOutcome,
  type WindowView,
} from './range-negotiator.js';
export { WORKER_OBJECTS_PREFIX, objectGetRequest, type RemoteObjectHandle } from './object-request.js';
export {
  SeekableObjectStream,
  type SeekOrigin,
  type StreamState,
  type ReadOptions,
  type SeekOptions,
  type ReadResult,
  type SeekableStreamOptions,
} from './seekable-object-stream.js';
