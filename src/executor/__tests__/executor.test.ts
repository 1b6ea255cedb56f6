/**
 * Tests for ApiRequestExecutor and the dispatch helpers
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { AuthError, HttpResponseError, NotFoundError, ProtocolError } from '../../errors/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { MOCK_ENDPOINT, MockHttpTransport, TEST_PASSWORD } from '../../testing/index.js';
import {
  ApiRequestBuilder,
  ApiRequestExecutor,
  encodeObjectPath,
  getJson,
  parseJson,
  readText,
  sendOptionalRequest,
  sendRequest,
  type RateLimitPolicy,
} from '../index.js';

describe('ApiRequestExecutor', () => {
  let transport: MockHttpTransport;
  let executor: ApiRequestExecutor;

  beforeEach(() => {
    transport = new MockHttpTransport({ password: TEST_PASSWORD });
    executor = new ApiRequestExecutor({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: TEST_PASSWORD }, transport);
  });

  it('should resolve paths and params against the endpoint', () => {
    const request = ApiRequestBuilder.get('worker/objects/a%20b.bin').params([['bucket', 'default']]).build();
    expect(executor.resolveUrl(request).toString()).toBe(
      'http://localhost:9980/api/worker/objects/a%20b.bin?bucket=default'
    );
  });

  it('should keep the endpoint path when it ends with a slash', () => {
    const withSlash = new ApiRequestExecutor({ apiEndpointUrl: `${MOCK_ENDPOINT}/`, apiPassword: 'x' }, transport);
    expect(withSlash.resolveUrl(ApiRequestBuilder.get('bus/state').build()).toString()).toBe(
      'http://localhost:9980/api/bus/state'
    );
  });

  it('should send basic auth for the api user', async () => {
    transport.json('worker/id', 'worker');

    await executor.execute(ApiRequestBuilder.get('worker/id').build());

    expect(transport.requests[0]?.headers['authorization']).toBe('Basic YXBpOnRlc3Qtc2VjcmV0');
  });

  it('should encode json content', async () => {
    transport.route('POST', 'bus/echo', (request) => ({ status: 200, body: request.body }));

    const response = await executor.execute(ApiRequestBuilder.post('bus/echo').json({ a: 1 }).build());

    expect(transport.requests[0]?.headers['content-type']).toBe('application/json');
    expect(await readText(response)).toBe('{"a":1}');
  });

  it('should admit every request through the rate limit policy', async () => {
    const acquire = vi.fn(async () => undefined);
    const rateLimit: RateLimitPolicy = { acquire };
    const limited = new ApiRequestExecutor({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: TEST_PASSWORD }, transport, {
      rateLimit,
    });
    const request = ApiRequestBuilder.get('worker/id').build();

    const response = await limited.execute(request);
    response.body.cancel();

    expect(limited.rateLimit).toBe(rateLimit);
    expect(acquire).toHaveBeenCalledTimes(1);
    expect(acquire).toHaveBeenCalledWith(request, undefined);
  });

  it('should log requests without credentials', async () => {
    const logger = new InMemoryLogger();
    const logged = new ApiRequestExecutor({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: TEST_PASSWORD }, transport, {
      logger,
    });
    transport.json('worker/id', 'worker');

    const response = await logged.execute(ApiRequestBuilder.get('worker/id').header('Range', 'bytes=0-').build());
    response.body.cancel();

    const messages = logger.getLogs('debug').map((entry) => entry.message);
    expect(messages).toEqual(['sending request', 'received response']);
    expect(logger.getLogs()[0]?.context).toEqual({ method: 'GET', path: 'worker/id', range: 'bytes=0-' });
    expect(JSON.stringify(logger.getLogs())).not.toContain(TEST_PASSWORD);
  });
});

describe('dispatch', () => {
  let transport: MockHttpTransport;
  let executor: ApiRequestExecutor;

  beforeEach(() => {
    transport = new MockHttpTransport({ password: TEST_PASSWORD });
    executor = new ApiRequestExecutor({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: TEST_PASSWORD }, transport);
  });

  it('should return null for 404 and release the body', async () => {
    const response = await sendOptionalRequest(executor, ApiRequestBuilder.get('bus/missing').build());
    expect(response).toBeNull();
    expect(transport.liveBodies).toBe(0);
  });

  it('should throw NotFoundError from sendRequest', async () => {
    await expect(sendRequest(executor, ApiRequestBuilder.get('bus/missing').build())).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('should map error statuses with the trimmed body text', async () => {
    transport.failNext({ status: 500, body: '  failed to fetch object\n' });

    const error = await sendRequest(executor, ApiRequestBuilder.get('bus/state').build()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpResponseError);
    expect(error).toMatchObject({ status: 500, details: { text: 'failed to fetch object' } });
  });

  it('should map a wrong password to AuthError', async () => {
    const wrong = new ApiRequestExecutor({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: 'wrong' }, transport);
    transport.json('worker/id', 'worker');

    await expect(getJson(wrong, 'worker/id', z.string())).rejects.toBeInstanceOf(AuthError);
  });

  it('should decode json against a schema', async () => {
    transport.json('worker/id', 'worker-1');
    expect(await getJson(executor, 'worker/id', z.string())).toBe('worker-1');
  });

  it('should report invalid json as INVALID_DATA', () => {
    expect(() => parseJson('{', z.string())).toThrow(ProtocolError);
    expect(() => parseJson('{"a":"x"}', z.object({ a: z.number() }))).toThrow(
      expect.objectContaining({ code: 'INVALID_DATA' })
    );
  });
});

describe('encodeObjectPath', () => {
  it('should strip leading slashes and encode each segment', () => {
    expect(encodeObjectPath('/foo/bar', 'worker/objects')).toBe('worker/objects/foo/bar');
    expect(encodeObjectPath('dir/a b#1.txt', 'worker/objects')).toBe('worker/objects/dir/a%20b%231.txt');
  });
});
