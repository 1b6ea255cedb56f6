/**
 * Tests for the autopilot state endpoint
 */

import { describe, it, expect } from 'vitest';
import { MockHttpTransport, createTestClient } from '../../testing/index.js';

describe('Autopilot', () => {
  it('should decode the autopilot state', async () => {
    const transport = new MockHttpTransport();
    const client = createTestClient(transport);
    transport.json('autopilot/state', {
      configured: true,
      migrating: true,
      migratingLastStart: '2024-03-01T11:00:00Z',
      pruning: false,
      pruningLastStart: '2024-02-29T08:30:00Z',
      scanning: false,
      scanningLastStart: '2024-03-01T12:00:00Z',
      uptimeMs: 3600000,
      startTime: '2024-03-01T10:15:30Z',
      network: 'Mainnet',
      version: 'v1.0.0',
      commit: 'abc1234',
      os: 'linux',
      buildTime: '2024-02-28T09:00:00Z',
    });

    const state = await client.autopilot.state();

    expect(state.configured).toBe(true);
    expect(state.migrating).toBe(true);
    expect(state.migratingLastStart).toEqual(new Date('2024-03-01T11:00:00Z'));
    expect(state.pruning).toBe(false);
    expect(state.scanningLastStart).toEqual(new Date('2024-03-01T12:00:00Z'));
    expect(state.uptimeMs).toBe(3600000);
    expect(state.version).toBe('v1.0.0');
  });

  it('should require the autopilot fields', async () => {
    const transport = new MockHttpTransport();
    const client = createTestClient(transport);
    transport.json('autopilot/state', {
      startTime: '2024-03-01T10:15:30Z',
      network: 'Mainnet',
      version: 'v1.0.0',
      commit: 'abc1234',
      os: 'linux',
      buildTime: '2024-02-28T09:00:00Z',
    });

    await expect(client.autopilot.state()).rejects.toMatchObject({ code: 'INVALID_DATA' });
  });
});
