/**
 * Tests for worker id, state and memory endpoints
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Client } from '../../client/index.js';
import { MockHttpTransport, createTestClient } from '../../testing/index.js';

describe('Worker', () => {
  let transport: MockHttpTransport;
  let client: Client;

  beforeEach(() => {
    transport = new MockHttpTransport();
    client = createTestClient(transport);
  });

  it('should return the worker id', async () => {
    transport.json('worker/id', 'worker-eu-1');
    expect(await client.worker.id()).toBe('worker-eu-1');
  });

  it('should decode the worker state', async () => {
    transport.json('worker/state', {
      id: 'worker-eu-1',
      startTime: '2024-03-01T10:15:30.123456789Z',
      network: 'Zen Testnet',
      version: 'v1.0.0',
      commit: 'abc1234',
      os: 'linux',
      buildTime: '2024-02-28T09:00:00Z',
    });

    const state = await client.worker.state();

    expect(state.id).toBe('worker-eu-1');
    expect(state.network).toBe('Zen Testnet');
    expect(state.buildTime.toISOString()).toBe('2024-02-28T09:00:00.000Z');
    expect(state.startTime.toISOString()).toBe('2024-03-01T10:15:30.123Z');
  });

  it('should decode memory status', async () => {
    transport.json('worker/memory', {
      download: { available: 900, total: 1024 },
      upload: { available: 512, total: 2048 },
    });

    expect(await client.worker.memory.list()).toEqual({
      download: { available: 900, total: 1024 },
      upload: { available: 512, total: 2048 },
    });
  });

  it('should report a state that does not match the schema', async () => {
    transport.json('worker/memory', { download: { available: -1, total: 1024 } });

    await expect(client.worker.memory.list()).rejects.toMatchObject({ code: 'INVALID_DATA' });
  });
});
