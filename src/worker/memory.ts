/**
 * Worker memory endpoint
 * @module renterd-client/worker/memory
 */

import { z } from 'zod';
import { getJson, type RequestExecutor } from '../executor/index.js';

const memoryStatusSchema = z.object({
  available: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

export const memorySchema = z.object({
  download: memoryStatusSchema,
  upload: memoryStatusSchema,
});

export type MemoryStatus = z.output<typeof memoryStatusSchema>;

/**
 * Memory the worker reserves for transfers, in bytes
 */
export type Memory = z.output<typeof memorySchema>;

export class WorkerMemory {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  list(): Promise<Memory> {
    return getJson(this.executor, 'worker/memory', memorySchema);
  }
}
