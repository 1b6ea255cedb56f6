/**
 * Tests for the bus state endpoint
 */

import { describe, it, expect } from 'vitest';
import { MockHttpTransport, createTestClient } from '../../testing/index.js';

describe('Bus', () => {
  it('should decode the bus state', async () => {
    const transport = new MockHttpTransport();
    const client = createTestClient(transport);
    transport.json('bus/state', {
      startTime: '2024-03-01T10:15:30Z',
      network: 'Mainnet',
      version: 'v1.0.0',
      commit: 'abc1234',
      os: 'linux',
      buildTime: '2024-02-28T09:00:00+02:00',
    });

    const state = await client.bus.state();

    expect(state).toEqual({
      startTime: new Date('2024-03-01T10:15:30Z'),
      network: 'Mainnet',
      version: 'v1.0.0',
      commit: 'abc1234',
      os: 'linux',
      buildTime: new Date('2024-02-28T07:00:00Z'),
    });
    expect(transport.requests[0]?.path).toBe('bus/state');
  });

  it('should reject timestamps that are not RFC 3339', async () => {
    const transport = new MockHttpTransport();
    const client = createTestClient(transport);
    transport.json('bus/state', {
      startTime: 'yesterday',
      network: 'Mainnet',
      version: 'v1.0.0',
      commit: 'abc1234',
      os: 'linux',
      buildTime: '2024-02-28T09:00:00Z',
    });

    await expect(client.bus.state()).rejects.toMatchObject({ code: 'INVALID_DATA' });
  });
});
