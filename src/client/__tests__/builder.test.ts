/**
 * Tests for client construction
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { MOCK_ENDPOINT, MockHttpTransport, TEST_PASSWORD } from '../../testing/index.js';
import { ClientBuilder, createClient, createClientFromEnv } from '../index.js';

describe('ClientBuilder', () => {
  it('should require an endpoint', () => {
    expect(() => new ClientBuilder().apiPassword(TEST_PASSWORD).build()).toThrow(
      expect.objectContaining({ code: 'MISSING_API_ENDPOINT' })
    );
  });

  it('should reject an invalid endpoint', () => {
    expect(() => new ClientBuilder().apiEndpointUrl('localhost').apiPassword(TEST_PASSWORD).build()).toThrow(
      ConfigError
    );
  });

  it('should require a password', () => {
    expect(() => new ClientBuilder().apiEndpointUrl(MOCK_ENDPOINT).build()).toThrow(
      'api password is missing, a password must be set before building the client'
    );
  });

  it('should apply every option', () => {
    const client = new ClientBuilder()
      .apiEndpointUrl(MOCK_ENDPOINT)
      .apiPassword(TEST_PASSWORD)
      .dangerAcceptInvalidCerts(true)
      .verboseLogging(true)
      .timeout(5000)
      .connectTimeout(1000)
      .streamHighWaterMark(4096)
      .rangeFallback('fail')
      .transport(new MockHttpTransport())
      .build();

    expect(client.config).toMatchObject({
      acceptInvalidCerts: true,
      logLevel: 'debug',
      timeout: 5000,
      connectTimeout: 1000,
      stream: { highWaterMark: 4096, rangeFallback: 'fail' },
    });
  });

  it('should warn when certificate verification is disabled', () => {
    const logger = new InMemoryLogger();
    new ClientBuilder()
      .apiEndpointUrl('https://renterd.example.com/api')
      .apiPassword(TEST_PASSWORD)
      .dangerAcceptInvalidCerts(true)
      .transport(new MockHttpTransport())
      .logger(logger)
      .build();

    expect(logger.getLogs('warn')).toEqual([
      {
        level: 'warn',
        message: 'tls certificate verification is disabled',
        context: { endpoint: 'https://renterd.example.com/api' },
      },
    ]);
  });

  it('should route requests through the rate limit policy', async () => {
    const transport = new MockHttpTransport();
    transport.json('worker/id', 'worker');
    const acquire = vi.fn(async () => undefined);
    const client = new ClientBuilder()
      .apiEndpointUrl(MOCK_ENDPOINT)
      .apiPassword(TEST_PASSWORD)
      .transport(transport)
      .rateLimit({ acquire })
      .build();

    await client.worker.id();

    expect(acquire).toHaveBeenCalledTimes(1);
  });
});

describe('createClient', () => {
  it('should close the transport once', async () => {
    const transport = new MockHttpTransport();
    const close = vi.spyOn(transport, 'close');
    const client = createClient({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: TEST_PASSWORD }, { transport });

    await client.close();
    await client.close();

    expect(client.isClosed).toBe(true);
    expect(transport.isClosed).toBe(true);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should fail requests after close', async () => {
    const transport = new MockHttpTransport();
    const client = createClient({ apiEndpointUrl: MOCK_ENDPOINT, apiPassword: TEST_PASSWORD }, { transport });

    await client.close();

    await expect(client.bus.state()).rejects.toMatchObject({ code: 'CONNECTION_FAILED' });
  });

  it('should build a client from the environment', async () => {
    const transport = new MockHttpTransport({ password: TEST_PASSWORD });
    transport.json('worker/id', 'worker-env');

    const client = createClientFromEnv(
      { RENTERD_API_URL: MOCK_ENDPOINT, RENTERD_API_PASSWORD: TEST_PASSWORD },
      { transport }
    );

    expect(await client.worker.id()).toBe('worker-env');
  });
});
