/**
 * Error system for the renterd client
 * @module renterd-client/errors
 */

export { RenterdError, type RenterdErrorParams } from './error.js';

export {
  AuthError,
  CancelledError,
  ConfigError,
  HttpResponseError,
  NotFoundError,
  NotSeekableError,
  ProtocolError,
  RangeNotSatisfiableError,
  StreamStateError,
  TransportError,
  UnknownLengthError,
  ValidationError,
} from './categories.js';

export { mapHttpStatusToError, isRenterdError, isRetryableError, wrapError } from './mapping.js';
