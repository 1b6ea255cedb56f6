/**
 * Tests for error categories and status mapping
 */

import { describe, it, expect } from 'vitest';
import {
  AuthError,
  HttpResponseError,
  NotFoundError,
  ProtocolError,
  RangeNotSatisfiableError,
  RenterdError,
  TransportError,
  isRenterdError,
  isRetryableError,
  mapHttpStatusToError,
  wrapError,
} from '../index.js';

describe('mapHttpStatusToError', () => {
  it('should map 401 to an incorrect password error', () => {
    const error = mapHttpStatusToError(401, 'Unauthorized');
    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe('incorrect api password');
    expect(error.status).toBe(401);
  });

  it('should map 404 to NotFoundError naming the path', () => {
    const error = mapHttpStatusToError(404, '', 'worker/objects/a.bin');
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('server sent 404 not found for `worker/objects/a.bin`');
  });

  it('should map 416 to RangeNotSatisfiableError', () => {
    expect(mapHttpStatusToError(416, '')).toBeInstanceOf(RangeNotSatisfiableError);
  });

  it('should keep the response text of other statuses', () => {
    const error = mapHttpStatusToError(500, 'database is locked');
    expect(error).toBeInstanceOf(HttpResponseError);
    expect(error.message).toBe('http response error, status code: `500`, text: `database is locked`');
    expect(error.isRetryable).toBe(true);
    expect(mapHttpStatusToError(400, 'bad request').isRetryable).toBe(false);
  });
});

describe('RenterdError', () => {
  it('should keep instanceof checks through the hierarchy', () => {
    const error = ProtocolError.invalidContentLength('abc');
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toBeInstanceOf(RenterdError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ProtocolError');
  });

  it('should serialise to JSON', () => {
    const error = NotFoundError.resource('bus/state');
    expect(error.toJSON()).toEqual({
      name: 'NotFoundError',
      type: 'not_found',
      message: 'server sent 404 not found for `bus/state`',
      status: 404,
      code: 'NotFound',
      isRetryable: false,
      details: { path: 'bus/state' },
    });
  });

  it('should format a readable string', () => {
    expect(AuthError.incorrectPassword().toString()).toBe(
      'AuthError auth_error [Unauthorized] (401) - incorrect api password'
    );
  });
});

describe('error helpers', () => {
  it('should recognise client errors', () => {
    expect(isRenterdError(TransportError.timeout(1000))).toBe(true);
    expect(isRenterdError(new Error('plain'))).toBe(false);
  });

  it('should report retryability', () => {
    expect(isRetryableError(TransportError.connectionFailed('reset'))).toBe(true);
    expect(isRetryableError(ProtocolError.invalidData('bad'))).toBe(false);
    expect(isRetryableError('nope')).toBe(false);
  });

  it('should wrap foreign errors as transport errors', () => {
    const original = new Error('socket hang up');
    const wrapped = wrapError(original);
    expect(wrapped).toBeInstanceOf(TransportError);
    expect(wrapped.message).toBe('Connection failed: socket hang up');
    expect(wrapped.cause).toBe(original);
    expect(wrapError(wrapped)).toBe(wrapped);
  });
});
