/**
 * HTTP transport layer
 */

export type { HttpMethod, RequestBody, ByteSource, HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { getHeader, parseLengthHeader } from './types.js';

export {
  raceAbort,
  readableByteSource,
  concatBytes,
  collectBytes,
  iterateByteSource,
} from './byte-source.js';

export { UndiciTransport, createUndiciTransport, type UndiciTransportOptions } from './undici-transport.js';
