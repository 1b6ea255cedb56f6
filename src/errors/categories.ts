/**
 * Specific error categories for the renterd client
 * @module renterd-client/errors/categories
 */

import { RenterdError, type RenterdErrorParams } from './error.js';

type CategoryParams = Omit<RenterdErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Configuration and initialization errors
 */
export class ConfigError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'config_error', isRetryable: params.isRetryable ?? false });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static missingEndpoint(): ConfigError {
    return new ConfigError({
      message: 'api endpoint is missing, a valid url must be set before building the client',
      code: 'MISSING_API_ENDPOINT',
    });
  }

  static invalidEndpoint(endpoint: string): ConfigError {
    return new ConfigError({
      message: `api endpoint \`${endpoint}\` is not valid`,
      code: 'INVALID_API_ENDPOINT',
      details: { endpoint },
    });
  }

  static missingPassword(): ConfigError {
    return new ConfigError({
      message: 'api password is missing, a password must be set before building the client',
      code: 'MISSING_API_PASSWORD',
    });
  }

  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

/**
 * Authentication errors (incorrect api password)
 */
export class AuthError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'auth_error', isRetryable: params.isRetryable ?? false });
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }

  static incorrectPassword(): AuthError {
    return new AuthError({
      message: 'incorrect api password',
      code: 'Unauthorized',
      status: 401,
    });
  }
}

/**
 * The remote resource does not exist
 */
export class NotFoundError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'not_found', isRetryable: params.isRetryable ?? false });
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  static resource(path?: string): NotFoundError {
    return new NotFoundError({
      message: path ? `server sent 404 not found for \`${path}\`` : 'server sent 404 not found',
      code: 'NotFound',
      status: 404,
      details: path ? { path } : undefined,
    });
  }
}

/**
 * Error status returned by the api that has no more specific category
 */
export class HttpResponseError extends RenterdError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'http_response_error',
      isRetryable: params.isRetryable ?? (params.status !== undefined && params.status >= 500),
    });
    this.name = 'HttpResponseError';
    Object.setPrototypeOf(this, HttpResponseError.prototype);
  }

  static fromResponse(status: number, text: string): HttpResponseError {
    return new HttpResponseError({
      message: `http response error, status code: \`${status}\`, text: \`${text}\``,
      code: 'HttpResponse',
      status,
      details: { text },
    });
  }
}

/**
 * Connection, DNS and timeout failures
 */
export class TransportError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'transport_error', isRetryable: params.isRetryable ?? true });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  static timeout(timeoutMs: number, cause?: unknown): TransportError {
    return new TransportError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
      cause,
    });
  }

  static connectionFailed(message: string, cause?: unknown): TransportError {
    return new TransportError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }

  static dnsError(host: string, cause?: unknown): TransportError {
    return new TransportError({
      message: `DNS resolution failed for ${host}`,
      code: 'DNS_ERROR',
      details: { host },
      cause,
    });
  }

  static prematureEnd(expected: number, received: number): TransportError {
    return new TransportError({
      message: `Body ended after ${received} bytes, expected ${expected}`,
      code: 'PREMATURE_END',
      details: { expected, received },
    });
  }
}

/**
 * Malformed or inconsistent data sent by the server
 */
export class ProtocolError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'protocol_error', isRetryable: params.isRetryable ?? false });
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }

  static invalidData(message: string, cause?: unknown): ProtocolError {
    return new ProtocolError({ message: `invalid data: ${message}`, code: 'INVALID_DATA', cause });
  }

  static invalidContentLength(value: string): ProtocolError {
    return new ProtocolError({
      message: 'invalid content length header',
      code: 'INVALID_CONTENT_LENGTH',
      details: { value },
    });
  }

  static invalidLastModified(value: string): ProtocolError {
    return new ProtocolError({
      message: 'invalid last modified date header',
      code: 'INVALID_LAST_MODIFIED',
      details: { value },
    });
  }

  static invalidContentRange(value: string | undefined): ProtocolError {
    return new ProtocolError({
      message: value === undefined ? 'missing content range header' : `invalid content range header \`${value}\``,
      code: 'INVALID_CONTENT_RANGE',
      details: { value },
    });
  }

  static rangeMismatch(requestedStart: number, receivedStart: number): ProtocolError {
    return new ProtocolError({
      message: `server answered range starting at ${receivedStart}, requested ${requestedStart}`,
      code: 'RANGE_MISMATCH',
      details: { requestedStart, receivedStart },
    });
  }

  static lengthMismatch(knownLength: number, reportedLength: number): ProtocolError {
    return new ProtocolError({
      message: `server reported object length ${reportedLength}, previously ${knownLength}`,
      code: 'LENGTH_MISMATCH',
      details: { knownLength, reportedLength },
    });
  }

  static rangeNotSupported(path: string): ProtocolError {
    return new ProtocolError({
      message: `server ignored the range request for \`${path}\``,
      code: 'RANGE_NOT_SUPPORTED',
      details: { path },
    });
  }

  static unexpectedResponse(message: string): ProtocolError {
    return new ProtocolError({
      message: `server sent an unexpected response, details: \`${message}\``,
      code: 'UNEXPECTED_RESPONSE',
    });
  }
}

/**
 * The requested position lies beyond the end of the object
 */
export class RangeNotSatisfiableError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'range_not_satisfiable', isRetryable: params.isRetryable ?? false });
    this.name = 'RangeNotSatisfiableError';
    Object.setPrototypeOf(this, RangeNotSatisfiableError.prototype);
  }

  static beyondEnd(position: number, length?: number): RangeNotSatisfiableError {
    return new RangeNotSatisfiableError({
      message:
        length === undefined
          ? `position ${position} is not satisfiable`
          : `position ${position} lies beyond the object length ${length}`,
      code: 'InvalidRange',
      status: 416,
      details: { position, length },
    });
  }
}

/**
 * The object length is required but the server cannot report it
 */
export class UnknownLengthError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'unknown_length', isRetryable: params.isRetryable ?? false });
    this.name = 'UnknownLengthError';
    Object.setPrototypeOf(this, UnknownLengthError.prototype);
  }

  static forPath(path: string): UnknownLengthError {
    return new UnknownLengthError({
      message: `the length of \`${path}\` cannot be determined`,
      code: 'UNKNOWN_LENGTH',
      details: { path },
    });
  }
}

/**
 * The object does not support random access
 */
export class NotSeekableError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'not_seekable', isRetryable: params.isRetryable ?? false });
    this.name = 'NotSeekableError';
    Object.setPrototypeOf(this, NotSeekableError.prototype);
  }

  static forPath(path: string): NotSeekableError {
    return new NotSeekableError({
      message: `the object at \`${path}\` is not seekable`,
      code: 'NOT_SEEKABLE',
      details: { path },
    });
  }
}

/**
 * A stream was used after close, or by two callers at once
 */
export class StreamStateError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'stream_state_error', isRetryable: params.isRetryable ?? false });
    this.name = 'StreamStateError';
    Object.setPrototypeOf(this, StreamStateError.prototype);
  }

  static closed(): StreamStateError {
    return new StreamStateError({ message: 'stream is closed', code: 'STREAM_CLOSED' });
  }

  static busy(): StreamStateError {
    return new StreamStateError({
      message: 'another operation is pending on this stream',
      code: 'STREAM_BUSY',
    });
  }
}

/**
 * The caller aborted the operation
 */
export class CancelledError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'cancelled', isRetryable: params.isRetryable ?? true });
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, CancelledError.prototype);
  }

  static fromSignal(signal: AbortSignal): CancelledError {
    return new CancelledError({
      message: 'operation was cancelled',
      code: 'CANCELLED',
      cause: signal.reason,
    });
  }
}

/**
 * Invalid arguments passed by the caller
 */
export class ValidationError extends RenterdError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'validation_error', isRetryable: params.isRetryable ?? false });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static invalidArgument(name: string, message: string): ValidationError {
    return new ValidationError({
      message: `${name} ${message}`,
      code: 'INVALID_ARGUMENT',
      details: { name },
    });
  }
}
